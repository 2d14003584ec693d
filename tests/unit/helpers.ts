import { vi } from 'vitest';
import type pg from 'pg';
import { Catalog, buildCatalogEntry } from '../../src/catalog/catalog.js';
import type { ColumnRow, KeyRow } from '../../src/catalog/types.js';
import { compile } from '../../src/query/compiler.js';
import { normalize } from '../../src/query/normalizer.js';
import { parseQuery } from '../../src/query/parser.js';
import { resolve } from '../../src/query/resolver.js';

export function column(
  table_name: string,
  column_name: string,
  data_type: string,
  overrides: Partial<ColumnRow> = {},
): ColumnRow {
  return {
    table_name,
    column_name,
    data_type,
    is_nullable: 'YES',
    character_maximum_length: null,
    numeric_precision: null,
    numeric_scale: null,
    column_default: null,
    ...overrides,
  };
}

export const COLUMNS: ColumnRow[] = [
  column('campaigns', 'id', 'character varying', { is_nullable: 'NO', character_maximum_length: 18 }),
  column('campaigns', 'name', 'character varying', { is_nullable: 'NO', character_maximum_length: 255 }),
  column('campaigns', 'start_date', 'date'),

  column('leads', 'id', 'character varying', { is_nullable: 'NO', character_maximum_length: 18 }),
  column('leads', 'name', 'character varying', { character_maximum_length: 120 }),
  column('leads', 'status', 'character varying', { character_maximum_length: 40 }),
  column('leads', 'annual_revenue', 'numeric', { numeric_precision: 12, numeric_scale: 2 }),
  column('leads', 'number_of_employees', 'integer', { numeric_precision: 32, numeric_scale: 0 }),
  column('leads', 'is_converted', 'boolean', { is_nullable: 'NO', column_default: 'false' }),
  column('leads', 'created_date', 'timestamp without time zone', { is_nullable: 'NO', column_default: 'now()' }),
  column('leads', 'campaign_id', 'character varying', { character_maximum_length: 18 }),
  column('leads', 'notes', 'text'),
  column('leads', 'payload', 'jsonb'),

  column('opportunities', 'id', 'character varying', { is_nullable: 'NO', character_maximum_length: 18 }),
  column('opportunities', 'name', 'character varying', { is_nullable: 'NO', character_maximum_length: 120 }),
  column('opportunities', 'close_date', 'date'),
  column('opportunities', 'closed_at', 'timestamp with time zone'),
  column('opportunities', 'lead_id', 'character varying', { character_maximum_length: 18 }),
];

export const KEYS: KeyRow[] = [
  { constraint_name: 'campaigns_pkey', table_name: 'campaigns', column_name: 'id', constraint_type: 'PRIMARY KEY', foreign_table_name: null },
  { constraint_name: 'leads_pkey', table_name: 'leads', column_name: 'id', constraint_type: 'PRIMARY KEY', foreign_table_name: null },
  { constraint_name: 'leads_campaign_id_fkey', table_name: 'leads', column_name: 'campaign_id', constraint_type: 'FOREIGN KEY', foreign_table_name: 'campaigns' },
  { constraint_name: 'opportunities_pkey', table_name: 'opportunities', column_name: 'id', constraint_type: 'PRIMARY KEY', foreign_table_name: null },
  { constraint_name: 'opportunities_lead_id_fkey', table_name: 'opportunities', column_name: 'lead_id', constraint_type: 'FOREIGN KEY', foreign_table_name: 'leads' },
];

export const OBJECT_TABLES = new Map([
  ['Lead', 'leads'],
  ['Campaign', 'campaigns'],
  ['Opportunity', 'opportunities'],
]);

export function makeCatalog(): Catalog {
  const tableToObject = new Map([...OBJECT_TABLES].map(([objectName, tableName]) => [tableName, objectName]));
  return Catalog.fromEntries(
    [...OBJECT_TABLES].map(([objectName, tableName]) =>
      buildCatalogEntry(objectName, tableName, COLUMNS, KEYS, tableToObject),
    ),
  );
}

export function makeMockClient(responses: Array<unknown>) {
  const query = vi.fn();
  for (const response of responses) {
    if (response instanceof Error) query.mockRejectedValueOnce(response);
    else query.mockResolvedValueOnce(response);
  }
  return { query, release: vi.fn() };
}

export function makeMockPool(...clients: Array<ReturnType<typeof makeMockClient>>) {
  const connect = vi.fn();
  for (const client of clients) connect.mockResolvedValueOnce(client);
  return { pool: { connect } as unknown as pg.Pool, connect };
}

export function pgError(message: string, code: string): Error {
  return Object.assign(new Error(message), { code });
}

/** Runs every stage up to SQL generation against the fixture catalog. */
export function compileQuery(soql: string, catalog: Catalog = makeCatalog()) {
  return compile(normalize(resolve(parseQuery(soql), catalog)));
}
