import type { Token } from './query/tokens.js';

export type ErrorCode = 'INVALID_QUERY' | 'NOT_FOUND' | 'INVALID_FIELD' | 'BACKEND_ERROR';

export interface ErrorResponse {
  message: string;
  errorCode: ErrorCode;
}

/**
 * Base class for every failure a query or describe request can produce.
 * Each subclass fixes the wire-level error code.
 */
export abstract class QueryError extends Error {
  abstract readonly errorCode: ErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    // Restore prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }

  toResponse(): ErrorResponse {
    return { message: this.message, errorCode: this.errorCode };
  }
}

function describeToken(token: Token | null): string {
  return token === null ? 'end of query' : `'${token.text}' at position ${token.position}`;
}

export class QuerySyntaxError extends QueryError {
  override readonly name = 'QuerySyntaxError';
  readonly errorCode = 'INVALID_QUERY';

  constructor(
    readonly token: Token | null,
    readonly expected: readonly string[],
    readonly position: number,
    message?: string,
  ) {
    super(
      message ??
        (expected.length > 0
          ? `Unexpected ${describeToken(token)}: expected ${expected.join(' or ')}`
          : `Unexpected ${describeToken(token)}`),
    );
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class ObjectNotFoundError extends QueryError {
  override readonly name = 'ObjectNotFoundError';
  readonly errorCode = 'NOT_FOUND';

  constructor(readonly objectName: string) {
    super(`sObject type '${objectName}' is not supported`);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class FieldNotFoundError extends QueryError {
  override readonly name = 'FieldNotFoundError';
  readonly errorCode = 'INVALID_FIELD';

  constructor(
    readonly objectName: string,
    readonly fieldName: string,
    readonly suggestion: string | null = null,
  ) {
    super(
      `No such column '${fieldName}' on entity '${objectName}'` +
        (suggestion === null ? '' : `. Did you mean '${suggestion}'?`),
    );
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class TypeMismatchError extends QueryError {
  override readonly name = 'TypeMismatchError';
  readonly errorCode = 'INVALID_QUERY';

  constructor(
    readonly fieldName: string,
    readonly logicalType: string,
    readonly literal: Token,
  ) {
    super(
      `Value ${literal.text} (${literal.kind}) at position ${literal.position} ` +
        `cannot be compared with field '${fieldName}' of type ${logicalType}`,
    );
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class LiteralError extends QueryError {
  override readonly name = 'LiteralError';
  readonly errorCode = 'INVALID_QUERY';

  constructor(
    readonly literal: Token,
    reason: string,
  ) {
    super(`Invalid literal ${literal.text} at position ${literal.position}: ${reason}`);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class BackendError extends QueryError {
  override readonly name = 'BackendError';
  readonly errorCode = 'BACKEND_ERROR';

  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class QueryTimeoutError extends QueryError {
  override readonly name = 'QueryTimeoutError';
  readonly errorCode = 'BACKEND_ERROR';

  constructor(
    readonly timeoutMs: number,
    cause?: unknown,
  ) {
    super(`Query exceeded the execution limit of ${timeoutMs}ms`, { cause });
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class ConfigError extends Error {
  override readonly name = 'ConfigError';

  constructor(
    message: string,
    readonly issues: readonly string[] = [],
  ) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** Maps any thrown value to the wire failure shape. */
export function toErrorResponse(err: unknown): ErrorResponse {
  if (err instanceof QueryError) {
    return err.toResponse();
  }
  return { message: 'Internal server error', errorCode: 'BACKEND_ERROR' };
}
