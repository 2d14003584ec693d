import type pg from 'pg';
import { BackendError, QueryTimeoutError } from '../errors.js';
import type { Logger } from '../logger.js';
import { silentLogger } from '../logger.js';
import type { CompiledQuery, SqlParam } from '../query/compiler.js';
import { acquireBefore, withDeadline } from './deadline.js';
import { executeWithRetry, isTransientError } from './retry.js';
import { mapRow } from './row-mapper.js';
import type { Row } from './row-mapper.js';

export interface QueryExecutor {
  execute(compiled: CompiledQuery): Promise<Row[]>;
}

export interface QueryExecutorConfig {
  pool: pg.Pool;
  /** Time limit per query, from acquiring a client to COMMIT, retries included. */
  timeoutMs?: number;
  /** Row ceiling applied to queries without their own LIMIT. */
  maxRows?: number;
  retryDelayMs?: number;
  logger?: Logger;
}

const QUERY_CANCELED = '57014';

function isStatementTimeout(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === QUERY_CANCELED;
}

/** Appends the row ceiling as a bound LIMIT when the query has none. */
export function applyRowCeiling(compiled: CompiledQuery, maxRows: number): { sql: string; params: SqlParam[] } {
  if (compiled.limited) {
    return { sql: compiled.sql, params: compiled.params };
  }
  const params = [...compiled.params, maxRows];
  return { sql: `${compiled.sql}\nLIMIT $${params.length}`, params };
}

/**
 * Runs compiled queries on a pg pool. Each execution holds one client for
 * a read-only transaction with a local statement timeout and always
 * releases it. Transient connection failures are retried once.
 *
 * The same limit is also enforced on the client side, so a pool that never
 * hands out a client or a socket that stops answering still ends in
 * QueryTimeoutError. A client caught by that deadline is destroyed.
 */
export class PostgresQueryExecutor implements QueryExecutor {
  private readonly pool: pg.Pool;
  private readonly timeoutMs: number;
  private readonly maxRows: number;
  private readonly retryDelayMs: number;
  private readonly logger: Logger;

  constructor(config: QueryExecutorConfig) {
    this.pool = config.pool;
    this.timeoutMs = Math.max(1, Math.floor(config.timeoutMs ?? 30_000));
    this.maxRows = config.maxRows ?? 2000;
    this.retryDelayMs = config.retryDelayMs ?? 100;
    this.logger = config.logger ?? silentLogger;
  }

  async execute(compiled: CompiledQuery): Promise<Row[]> {
    const { sql, params } = applyRowCeiling(compiled, this.maxRows);
    const deadline = Date.now() + this.timeoutMs;
    let rows: unknown[][];
    try {
      rows = await executeWithRetry(() => this.run(sql, params, deadline), {
        maxRetries: 1,
        delayMs: this.retryDelayMs,
        isRetryable: isTransientError,
        onRetry: (err, attempt) =>
          this.logger.warn({ err, attempt, objectName: compiled.objectName }, 'transient backend failure, retrying'),
      });
    } catch (err) {
      if (err instanceof QueryTimeoutError) {
        throw err;
      }
      if (isStatementTimeout(err)) {
        throw new QueryTimeoutError(this.timeoutMs, err);
      }
      throw new BackendError(`Query execution failed: ${String(err)}`, err);
    }
    return rows.map((row) => mapRow(compiled.columns, row));
  }

  private async run(sql: string, params: SqlParam[], deadline: number): Promise<unknown[][]> {
    const expired = () => new QueryTimeoutError(this.timeoutMs);
    const step = <R>(work: Promise<R>) => withDeadline(work, deadline, expired);

    const client = await acquireBefore(this.pool.connect(), deadline, expired);
    let failure: Error | undefined;
    try {
      await step(client.query('BEGIN READ ONLY'));
      // timeoutMs is an integer set in the constructor
      await step(client.query(`SET LOCAL statement_timeout = ${this.timeoutMs}`));
      const result = await step(client.query<unknown[]>({ text: sql, values: params, rowMode: 'array' }));
      await step(client.query('COMMIT'));
      return result.rows;
    } catch (err) {
      if (err instanceof QueryTimeoutError || (isTransientError(err) && err instanceof Error)) {
        failure = err;
      } else {
        // A client whose ROLLBACK fails or hangs is not trusted again.
        failure = await step(client.query('ROLLBACK')).then(
          () => undefined,
          (rollbackErr: unknown) => (rollbackErr instanceof Error ? rollbackErr : new Error(String(rollbackErr))),
        );
      }
      throw err;
    } finally {
      // A client that failed on its connection is destroyed, not returned.
      client.release(failure);
    }
  }
}
