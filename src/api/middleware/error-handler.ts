import type { FastifyInstance } from 'fastify';
import { QueryError, QueryTimeoutError } from '../../errors.js';
import type { ErrorCode } from '../../errors.js';

const STATUS_BY_CODE: Record<ErrorCode, number> = {
  INVALID_QUERY: 400,
  INVALID_FIELD: 400,
  NOT_FOUND: 404,
  BACKEND_ERROR: 500,
};

export function statusFor(error: QueryError): number {
  return error instanceof QueryTimeoutError ? 504 : STATUS_BY_CODE[error.errorCode];
}

function hasStatusCode(error: Error): error is Error & { statusCode: number } {
  return 'statusCode' in error && typeof error.statusCode === 'number';
}

export function registerErrorHandler(app: FastifyInstance): void {
  app.setErrorHandler((unknownError, _request, reply) => {
    const error = unknownError instanceof Error ? unknownError : new Error(String(unknownError));

    if (error instanceof QueryError) {
      if (error.errorCode === 'BACKEND_ERROR') {
        app.log.error({ err: error }, 'query failed in backend');
      }
      return reply.status(statusFor(error)).send(error.toResponse());
    }

    // Fastify built-in errors (bad JSON, unknown route, ...) keep their status
    if (hasStatusCode(error) && error.statusCode < 500) {
      return reply.status(error.statusCode).send({ message: error.message, errorCode: 'INVALID_QUERY' });
    }

    app.log.error({ err: error }, 'unhandled error');
    return reply.status(500).send({ message: 'Internal server error', errorCode: 'BACKEND_ERROR' });
  });
}
