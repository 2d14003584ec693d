import { describe, it, expect, vi, afterEach } from 'vitest';
import type { FastifyInstance } from 'fastify';
import { buildServer } from '../../src/api/server.js';
import { QueryService } from '../../src/service.js';
import { Catalog } from '../../src/catalog/catalog.js';
import { BackendError, QueryTimeoutError } from '../../src/errors.js';
import type { QueryExecutor } from '../../src/store/executor.js';
import type { Row } from '../../src/store/row-mapper.js';
import { makeCatalog } from './helpers.js';

const BASE = '/services/data/v58.0';

function makeApp(execute: QueryExecutor['execute'], catalog: Catalog = makeCatalog()): FastifyInstance {
  const service = new QueryService({ catalog, executor: { execute } });
  return buildServer(service);
}

function queryUrl(soql: string): string {
  return `${BASE}/query?q=${encodeURIComponent(soql)}`;
}

let app: FastifyInstance | undefined;

afterEach(async () => {
  await app?.close();
  app = undefined;
});

describe('GET /query', () => {
  it('returns the result envelope', async () => {
    const rows: Row[] = [['00Q1', 'Ada', '00Q1']];
    app = makeApp(vi.fn().mockResolvedValue(rows));

    const response = await app.inject({ method: 'GET', url: queryUrl('SELECT Id, Name FROM Lead LIMIT 1') });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({
      totalSize: 1,
      done: true,
      records: [{ attributes: { type: 'Lead', url: `${BASE}/sobjects/Lead/00Q1` }, Id: '00Q1', Name: 'Ada' }],
    });
  });

  it('rejects a missing q parameter', async () => {
    app = makeApp(vi.fn());
    const response = await app.inject({ method: 'GET', url: `${BASE}/query` });
    expect(response.statusCode).toBe(400);
    expect(response.json()).toEqual({ message: "Missing query parameter 'q'", errorCode: 'INVALID_QUERY' });
  });

  it('maps syntax errors to 400 INVALID_QUERY', async () => {
    app = makeApp(vi.fn());
    const response = await app.inject({ method: 'GET', url: queryUrl('SELECT FROM Lead') });
    expect(response.statusCode).toBe(400);
    expect(response.json()).toEqual({
      message: "Unexpected 'FROM' at position 7: expected field name",
      errorCode: 'INVALID_QUERY',
    });
  });

  it('maps unknown objects to 404 NOT_FOUND', async () => {
    app = makeApp(vi.fn());
    const response = await app.inject({ method: 'GET', url: queryUrl('SELECT Id FROM Unknown') });
    expect(response.statusCode).toBe(404);
    expect(response.json()).toEqual({ message: "sObject type 'Unknown' is not supported", errorCode: 'NOT_FOUND' });
  });

  it('maps unknown fields to 400 INVALID_FIELD', async () => {
    app = makeApp(vi.fn());
    const response = await app.inject({ method: 'GET', url: queryUrl('SELECT Stauts FROM Lead') });
    expect(response.statusCode).toBe(400);
    expect(response.json()).toEqual({
      message: "No such column 'Stauts' on entity 'Lead'. Did you mean 'Status'?",
      errorCode: 'INVALID_FIELD',
    });
  });

  it('maps backend failures to 500 BACKEND_ERROR', async () => {
    app = makeApp(vi.fn().mockRejectedValue(new BackendError('Query execution failed: Error: boom')));
    const response = await app.inject({ method: 'GET', url: queryUrl('SELECT Id FROM Lead') });
    expect(response.statusCode).toBe(500);
    expect(response.json()).toEqual({ message: 'Query execution failed: Error: boom', errorCode: 'BACKEND_ERROR' });
  });

  it('maps statement timeouts to 504', async () => {
    app = makeApp(vi.fn().mockRejectedValue(new QueryTimeoutError(500)));
    const response = await app.inject({ method: 'GET', url: queryUrl('SELECT Id FROM Lead') });
    expect(response.statusCode).toBe(504);
    expect(response.json()).toEqual({
      message: 'Query exceeded the execution limit of 500ms',
      errorCode: 'BACKEND_ERROR',
    });
  });

  it('hides unexpected errors behind a generic message', async () => {
    app = makeApp(vi.fn().mockRejectedValue(new TypeError('rows is not iterable')));
    const response = await app.inject({ method: 'GET', url: queryUrl('SELECT Id FROM Lead') });
    expect(response.statusCode).toBe(500);
    expect(response.json()).toEqual({ message: 'Internal server error', errorCode: 'BACKEND_ERROR' });
  });
});

describe('GET /sobjects', () => {
  it('lists the catalog objects', async () => {
    app = makeApp(vi.fn());
    const response = await app.inject({ method: 'GET', url: `${BASE}/sobjects` });
    expect(response.statusCode).toBe(200);
    const body = response.json<{ sobjects: Array<{ name: string }> }>();
    expect(body.sobjects.map((s) => s.name)).toEqual(['Lead', 'Campaign', 'Opportunity']);
  });

  it('describes one object', async () => {
    app = makeApp(vi.fn());
    const response = await app.inject({ method: 'GET', url: `${BASE}/sobjects/Campaign/describe` });
    expect(response.statusCode).toBe(200);
    const body = response.json<{ name: string; fields: Array<{ name: string; type: string }> }>();
    expect(body.name).toBe('Campaign');
    expect(body.fields.map((f) => [f.name, f.type])).toEqual([
      ['Id', 'id'],
      ['Name', 'string'],
      ['StartDate', 'date'],
    ]);
  });

  it('returns 404 when describing an unknown object', async () => {
    app = makeApp(vi.fn());
    const response = await app.inject({ method: 'GET', url: `${BASE}/sobjects/Widget/describe` });
    expect(response.statusCode).toBe(404);
    expect(response.json()).toEqual({ message: "sObject type 'Widget' is not supported", errorCode: 'NOT_FOUND' });
  });
});

describe('GET /health', () => {
  it('reports the number of loaded objects', async () => {
    app = makeApp(vi.fn());
    const response = await app.inject({ method: 'GET', url: '/health' });
    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({ status: 'ok', objects: 3 });
  });

  it('returns 503 while the catalog is empty', async () => {
    app = makeApp(vi.fn(), Catalog.fromEntries([]));
    const response = await app.inject({ method: 'GET', url: '/health' });
    expect(response.statusCode).toBe(503);
    expect(response.json()).toEqual({ status: 'unavailable', objects: 0 });
  });
});

describe('GET /', () => {
  it('names the service and lists its endpoints', async () => {
    app = makeApp(vi.fn());
    const response = await app.inject({ method: 'GET', url: '/' });
    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({
      message: 'CRM Query Mock Server',
      version: '0.1.0',
      endpoints: [`${BASE}/sobjects`, `${BASE}/sobjects/{object}/describe`, `${BASE}/query`, '/health'],
    });
  });
});

describe('buildServer() options', () => {
  it('mounts the routes under the configured API version', async () => {
    const service = new QueryService({ catalog: makeCatalog(), executor: { execute: vi.fn() } });
    app = buildServer(service, { apiVersion: '60.0' });
    const response = await app.inject({ method: 'GET', url: '/services/data/v60.0/sobjects' });
    expect(response.statusCode).toBe(200);
    const root = await app.inject({ method: 'GET', url: '/' });
    expect(root.json<{ endpoints: string[] }>().endpoints[2]).toBe('/services/data/v60.0/query');
  });
});
