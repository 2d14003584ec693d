import type pg from 'pg';
import { BackendError } from '../errors.js';
import type { Logger } from '../logger.js';
import { silentLogger } from '../logger.js';
import { acquireBefore, withDeadline } from '../store/deadline.js';
import { Catalog, buildCatalogEntry } from './catalog.js';
import type { CatalogEntry, ColumnRow, KeyRow } from './types.js';

export const INTROSPECT_COLUMNS_SQL = `
SELECT table_name, column_name, data_type, is_nullable,
       character_maximum_length, numeric_precision, numeric_scale, column_default
FROM information_schema.columns
WHERE table_schema = $1 AND table_name = ANY($2)
ORDER BY table_name, ordinal_position
`.trim();

export const INTROSPECT_KEYS_SQL = `
SELECT tc.constraint_name, kcu.table_name, kcu.column_name, tc.constraint_type,
       ccu.table_name AS foreign_table_name
FROM information_schema.table_constraints AS tc
JOIN information_schema.key_column_usage AS kcu
  ON tc.constraint_name = kcu.constraint_name
  AND tc.table_schema = kcu.table_schema
LEFT JOIN information_schema.constraint_column_usage AS ccu
  ON tc.constraint_type = 'FOREIGN KEY'
  AND ccu.constraint_name = tc.constraint_name
  AND ccu.table_schema = tc.table_schema
WHERE tc.table_schema = $1
  AND tc.constraint_type IN ('PRIMARY KEY', 'FOREIGN KEY', 'UNIQUE')
  AND kcu.table_name = ANY($2)
ORDER BY kcu.table_name, tc.constraint_name, kcu.ordinal_position
`.trim();

export interface IntrospectOptions {
  /** Object name → table name, in the order objects are listed. */
  objectTables: ReadonlyMap<string, string>;
  schema?: string;
  /** Limit for acquiring a client and reading the metadata. */
  timeoutMs?: number;
  logger?: Logger;
}

/**
 * Reads column and key metadata for every mapped table and builds a new
 * Catalog. Objects whose table does not exist are left out.
 */
export async function introspectCatalog(pool: pg.Pool, options: IntrospectOptions): Promise<Catalog> {
  const schema = options.schema ?? 'public';
  const logger = options.logger ?? silentLogger;
  const tableNames = [...options.objectTables.values()];
  const timeoutMs = options.timeoutMs ?? 30_000;
  const deadline = Date.now() + timeoutMs;
  const expired = () => new Error(`timed out after ${timeoutMs}ms`);
  const failed = (err: unknown) => new BackendError(`Failed to introspect schema '${schema}': ${String(err)}`, err);

  let client: pg.PoolClient;
  try {
    client = await acquireBefore(pool.connect(), deadline, expired);
  } catch (err) {
    throw failed(err);
  }

  let columns: ColumnRow[];
  let keys: KeyRow[];
  let broken: Error | undefined;
  try {
    columns = (await withDeadline(client.query<ColumnRow>(INTROSPECT_COLUMNS_SQL, [schema, tableNames]), deadline, expired)).rows;
    keys = (await withDeadline(client.query<KeyRow>(INTROSPECT_KEYS_SQL, [schema, tableNames]), deadline, expired)).rows;
  } catch (err) {
    if (err instanceof Error) broken = err;
    throw failed(err);
  } finally {
    client.release(broken);
  }

  const tableToObject = new Map<string, string>();
  for (const [objectName, tableName] of options.objectTables) {
    tableToObject.set(tableName, objectName);
  }

  const entries: CatalogEntry[] = [];
  for (const [objectName, tableName] of options.objectTables) {
    const tableColumns = columns.filter((c) => c.table_name === tableName);
    if (tableColumns.length === 0) {
      logger.warn({ objectName, tableName, schema }, 'table not found, object skipped');
      continue;
    }
    entries.push(buildCatalogEntry(objectName, tableName, tableColumns, keys, tableToObject));
  }

  return Catalog.fromEntries(entries);
}
