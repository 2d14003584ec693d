import type pg from 'pg';
import type { ServerConfig } from '../config.js';

/**
 * Pool settings for the server. pg's own limits bound every acquire and
 * every query, introspection included, by the configured query timeout.
 */
export function poolOptions(config: Pick<ServerConfig, 'databaseUrl' | 'queryTimeoutMs'>): pg.PoolConfig {
  return {
    connectionString: config.databaseUrl,
    connectionTimeoutMillis: config.queryTimeoutMs,
    query_timeout: config.queryTimeoutMs,
  };
}
