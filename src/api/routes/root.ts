import type { FastifyInstance } from 'fastify';

export const SERVER_VERSION = '0.1.0';

// GET /: service name and the endpoints it serves
export async function registerRootRoutes(app: FastifyInstance, prefix: string): Promise<void> {
  const endpoints = [
    `${prefix}/sobjects`,
    `${prefix}/sobjects/{object}/describe`,
    `${prefix}/query`,
    '/health',
  ];
  app.get('/', async () => ({
    message: 'CRM Query Mock Server',
    version: SERVER_VERSION,
    endpoints,
  }));
}
