import { describe, it, expect, vi } from 'vitest';
import type pg from 'pg';
import { PostgresQueryExecutor, applyRowCeiling } from '../../src/store/executor.js';
import { BackendError, QueryTimeoutError } from '../../src/errors.js';
import { createLogger } from '../../src/logger.js';
import { compileQuery, makeMockClient, makeMockPool, pgError } from './helpers.js';

const limited = compileQuery("SELECT Id, Name FROM Lead WHERE Status = 'New' LIMIT 2");
const unlimited = compileQuery("SELECT Id FROM Lead WHERE Status = 'New'");

describe('applyRowCeiling()', () => {
  it('leaves a query with its own LIMIT alone', () => {
    expect(applyRowCeiling(limited, 50)).toEqual({ sql: limited.sql, params: ['New', 2] });
  });

  it('appends the ceiling as the next parameter', () => {
    expect(applyRowCeiling(unlimited, 50)).toEqual({ sql: `${unlimited.sql}\nLIMIT $2`, params: ['New', 50] });
  });
});

describe('PostgresQueryExecutor.execute() (unit)', () => {
  it('runs the query in a read-only transaction with a statement timeout', async () => {
    const client = makeMockClient([
      {}, // BEGIN
      {}, // SET LOCAL
      { rows: [['00Q1', 'Ada', '00Q1']] },
      {}, // COMMIT
    ]);
    const { pool } = makeMockPool(client);
    const executor = new PostgresQueryExecutor({ pool, timeoutMs: 1500 });

    const rows = await executor.execute(limited);

    expect(rows).toEqual([['00Q1', 'Ada', '00Q1']]);
    expect(client.query.mock.calls.map((call) => call[0])).toEqual([
      'BEGIN READ ONLY',
      'SET LOCAL statement_timeout = 1500',
      { text: limited.sql, values: ['New', 2], rowMode: 'array' },
      'COMMIT',
    ]);
    expect(client.release).toHaveBeenCalledTimes(1);
    expect(client.release.mock.calls[0]?.[0]).toBeUndefined();
  });

  it('applies the row ceiling to queries without LIMIT', async () => {
    const client = makeMockClient([{}, {}, { rows: [] }, {}]);
    const { pool } = makeMockPool(client);
    const executor = new PostgresQueryExecutor({ pool, maxRows: 25 });

    await executor.execute(unlimited);

    expect(client.query.mock.calls[2]?.[0]).toEqual({
      text: `${unlimited.sql}\nLIMIT $2`,
      values: ['New', 25],
      rowMode: 'array',
    });
  });

  it('converts raw values by field type', async () => {
    const compiled = compileQuery('SELECT AnnualRevenue, NumberOfEmployees, IsConverted FROM Lead LIMIT 1');
    const client = makeMockClient([{}, {}, { rows: [['1500.50', 12, true, '00Q1']] }, {}]);
    const { pool } = makeMockPool(client);

    const rows = await new PostgresQueryExecutor({ pool }).execute(compiled);

    expect(rows).toEqual([[1500.5, 12, true, '00Q1']]);
  });

  it('maps a statement timeout to QueryTimeoutError and rolls back', async () => {
    const client = makeMockClient([
      {},
      {},
      pgError('canceling statement due to statement timeout', '57014'),
      {}, // ROLLBACK
    ]);
    const { pool } = makeMockPool(client);
    const executor = new PostgresQueryExecutor({ pool, timeoutMs: 500 });

    const failure = executor.execute(limited);
    await expect(failure).rejects.toBeInstanceOf(QueryTimeoutError);
    await expect(failure).rejects.toThrow('Query exceeded the execution limit of 500ms');
    expect(client.query.mock.calls[3]?.[0]).toBe('ROLLBACK');
    expect(client.release).toHaveBeenCalledTimes(1);
  });

  it('wraps other failures in BackendError without retrying', async () => {
    const client = makeMockClient([{}, {}, pgError('relation "leads" does not exist', '42P01'), {}]);
    const { pool, connect } = makeMockPool(client);
    const executor = new PostgresQueryExecutor({ pool, retryDelayMs: 0 });

    const failure = executor.execute(limited);
    await expect(failure).rejects.toBeInstanceOf(BackendError);
    await expect(failure).rejects.toThrow('Query execution failed: Error: relation "leads" does not exist');
    expect(connect).toHaveBeenCalledTimes(1);
    expect(client.release).toHaveBeenCalledTimes(1);
  });

  it('retries once on a transient connection failure', async () => {
    const lost = pgError('Connection terminated unexpectedly', 'ECONNRESET');
    const broken = makeMockClient([lost]);
    const healthy = makeMockClient([{}, {}, { rows: [['00Q1', 'Ada', '00Q1']] }, {}]);
    const { pool, connect } = makeMockPool(broken, healthy);
    const logger = createLogger({ level: 'silent' });
    const warn = vi.spyOn(logger, 'warn');
    const executor = new PostgresQueryExecutor({ pool, retryDelayMs: 0, logger });

    const rows = await executor.execute(limited);

    expect(rows).toHaveLength(1);
    expect(connect).toHaveBeenCalledTimes(2);
    // The broken client is destroyed, not returned to the pool
    expect(broken.release).toHaveBeenCalledWith(lost);
    expect(broken.query).toHaveBeenCalledTimes(1);
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it('gives up after a second transient failure', async () => {
    const first = makeMockClient([pgError('Connection terminated unexpectedly', 'ECONNRESET')]);
    const second = makeMockClient([pgError('Connection terminated unexpectedly', 'ECONNRESET')]);
    const { pool, connect } = makeMockPool(first, second);
    const executor = new PostgresQueryExecutor({ pool, retryDelayMs: 0 });

    await expect(executor.execute(limited)).rejects.toBeInstanceOf(BackendError);
    expect(connect).toHaveBeenCalledTimes(2);
  });

  it('times out when the pool never hands out a client', async () => {
    const connect = vi.fn(() => new Promise<never>(() => {}));
    const pool = { connect } as unknown as pg.Pool;
    const executor = new PostgresQueryExecutor({ pool, timeoutMs: 50, retryDelayMs: 0 });

    const failure = executor.execute(limited);
    await expect(failure).rejects.toBeInstanceOf(QueryTimeoutError);
    await expect(failure).rejects.toThrow('Query exceeded the execution limit of 50ms');
    expect(connect).toHaveBeenCalledTimes(1);
  });

  it('destroys a client that arrives after the deadline', async () => {
    const late = makeMockClient([]);
    let handOver: (client: typeof late) => void = () => undefined;
    const connect = vi.fn(() => new Promise<typeof late>((resolve) => { handOver = resolve; }));
    const pool = { connect } as unknown as pg.Pool;
    const executor = new PostgresQueryExecutor({ pool, timeoutMs: 50 });

    await expect(executor.execute(limited)).rejects.toBeInstanceOf(QueryTimeoutError);
    handOver(late);
    await vi.waitFor(() => expect(late.release).toHaveBeenCalledWith(true));
    expect(late.query).not.toHaveBeenCalled();
  });

  it('times out and destroys the client when a query never answers', async () => {
    const client = makeMockClient([{}, {}]);
    client.query.mockReturnValueOnce(new Promise(() => {}));
    const { pool, connect } = makeMockPool(client);
    const executor = new PostgresQueryExecutor({ pool, timeoutMs: 50, retryDelayMs: 0 });

    await expect(executor.execute(limited)).rejects.toBeInstanceOf(QueryTimeoutError);
    expect(connect).toHaveBeenCalledTimes(1);
    expect(client.query).toHaveBeenCalledTimes(3);
    expect(client.release).toHaveBeenCalledTimes(1);
    expect(client.release.mock.calls[0]?.[0]).toBeInstanceOf(QueryTimeoutError);
  });

  it('destroys the client when ROLLBACK fails', async () => {
    const rollbackFailed = new Error('rollback failed');
    const client = makeMockClient([{}, {}, pgError('division by zero', '22012'), rollbackFailed]);
    const { pool } = makeMockPool(client);

    await expect(new PostgresQueryExecutor({ pool }).execute(limited)).rejects.toBeInstanceOf(BackendError);
    expect(client.release).toHaveBeenCalledWith(rollbackFailed);
  });
});
