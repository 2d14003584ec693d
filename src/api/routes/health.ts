import type { FastifyInstance } from 'fastify';
import type { QueryService } from '../../service.js';

export async function registerHealthRoutes(app: FastifyInstance, service: QueryService): Promise<void> {
  app.get('/health', async (_request, reply) => {
    const objects = service.catalog().size;
    if (objects === 0) {
      return reply.status(503).send({ status: 'unavailable', objects });
    }
    return reply.status(200).send({ status: 'ok', objects });
  });
}
