import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { QuerySyntaxError } from '../../errors.js';
import type { QueryService } from '../../service.js';

const queryString = z.object({ q: z.string().optional() });
const describeParams = z.object({ name: z.string() });

export async function registerQueryRoutes(app: FastifyInstance, service: QueryService): Promise<void> {
  // GET /query?q=<soql>: run a query
  app.get('/query', async (request, reply) => {
    const parsed = queryString.safeParse(request.query);
    const q = parsed.success ? parsed.data.q : undefined;
    if (q === undefined || q.trim() === '') {
      throw new QuerySyntaxError(null, [], 0, "Missing query parameter 'q'");
    }
    return reply.status(200).send(await service.query(q));
  });

  // GET /sobjects: list queryable objects
  app.get('/sobjects', async (_request, reply) => {
    return reply.status(200).send(service.listObjects());
  });

  // GET /sobjects/:name/describe: field metadata for one object
  app.get('/sobjects/:name/describe', async (request, reply) => {
    const { name } = describeParams.parse(request.params);
    return reply.status(200).send(service.describeResult(name));
  });
}
