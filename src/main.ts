import 'dotenv/config';
import pg from 'pg';
import { buildServer } from './api/server.js';
import { CatalogProvider } from './catalog/catalog.js';
import { introspectCatalog } from './catalog/introspect.js';
import { loadConfig } from './config.js';
import { createLogger } from './logger.js';
import { QueryService } from './service.js';
import { PostgresQueryExecutor } from './store/executor.js';
import { poolOptions } from './store/pool.js';
import { applySchema } from './store/schema.js';

const config = loadConfig();
const logger = createLogger({ level: config.logLevel });

const pool = new pg.Pool(poolOptions(config));

if (config.initSchema) {
  const client = await pool.connect();
  try {
    await applySchema(client);
    logger.info('demo schema applied');
  } finally {
    client.release();
  }
}

const catalog = await CatalogProvider.create(
  () => introspectCatalog(pool, {
      objectTables: config.objectTables,
      schema: config.schema,
      timeoutMs: config.queryTimeoutMs,
      logger,
    }),
  logger,
);

const executor = new PostgresQueryExecutor({
  pool,
  timeoutMs: config.queryTimeoutMs,
  maxRows: config.maxRows,
  logger,
});
const service = new QueryService({ catalog, executor, apiVersion: config.apiVersion, logger });
const app = buildServer(service, { apiVersion: config.apiVersion, logger });

try {
  await app.listen({ port: config.port, host: config.host });
} catch (err) {
  app.log.error(err);
  await pool.end();
  process.exit(1);
}

// Re-read the schema without restarting
process.on('SIGHUP', () => {
  catalog.reload().catch((err: unknown) => logger.error({ err }, 'catalog reload failed'));
});

process.on('SIGTERM', async () => {
  await app.close();
  await pool.end();
});
