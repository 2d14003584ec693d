import Fastify from 'fastify';
import type { FastifyBaseLogger, FastifyInstance } from 'fastify';
import type { Logger } from '../logger.js';
import { silentLogger } from '../logger.js';
import { DEFAULT_API_VERSION } from '../result/envelope.js';
import type { QueryService } from '../service.js';
import { registerErrorHandler } from './middleware/error-handler.js';
import { registerHealthRoutes } from './routes/health.js';
import { registerQueryRoutes } from './routes/query.js';
import { registerRootRoutes } from './routes/root.js';

export interface ServerOptions {
  apiVersion?: string;
  logger?: Logger;
}

export function buildServer(service: QueryService, options: ServerOptions = {}): FastifyInstance {
  const loggerInstance: FastifyBaseLogger = options.logger ?? silentLogger;
  const app = Fastify({ loggerInstance });

  registerErrorHandler(app);

  const prefix = `/services/data/v${options.apiVersion ?? DEFAULT_API_VERSION}`;

  app.register(async (instance) => {
    await registerQueryRoutes(instance, service);
  }, { prefix });
  app.register(async (instance) => {
    await registerRootRoutes(instance, prefix);
    await registerHealthRoutes(instance, service);
  });

  return app;
}
