import type pg from 'pg';

// Demo CRM tables, applied at startup when INIT_SCHEMA is set. Column names
// are snake_case; the catalog presents them as PascalCase fields.

export const DDL_CREATE_CAMPAIGNS = `
CREATE TABLE IF NOT EXISTS campaigns (
  id            VARCHAR(18)   PRIMARY KEY,
  name          VARCHAR(255)  NOT NULL,
  type          VARCHAR(40),
  status        VARCHAR(40),
  start_date    DATE,
  budget        NUMERIC(10, 2),
  created_date  TIMESTAMP     NOT NULL DEFAULT NOW()
)
`.trim();

export const DDL_CREATE_ACCOUNTS = `
CREATE TABLE IF NOT EXISTS accounts (
  id            VARCHAR(18)   PRIMARY KEY,
  name          VARCHAR(255)  NOT NULL,
  industry      VARCHAR(40),
  revenue       NUMERIC(12, 2),
  created_date  TIMESTAMP     NOT NULL DEFAULT NOW()
)
`.trim();

export const DDL_CREATE_LEADS = `
CREATE TABLE IF NOT EXISTS leads (
  id            VARCHAR(18)   PRIMARY KEY,
  first_name    VARCHAR(40),
  last_name     VARCHAR(80)   NOT NULL,
  email         VARCHAR(255),
  company       VARCHAR(255),
  status        VARCHAR(40),
  lead_source   VARCHAR(40),
  is_converted  BOOLEAN       NOT NULL DEFAULT FALSE,
  created_date  TIMESTAMP     NOT NULL DEFAULT NOW(),
  campaign_id   VARCHAR(18)   REFERENCES campaigns (id)
)
`.trim();

export const DDL_CREATE_OPPORTUNITIES = `
CREATE TABLE IF NOT EXISTS opportunities (
  id            VARCHAR(18)   PRIMARY KEY,
  name          VARCHAR(120)  NOT NULL,
  amount        NUMERIC(12, 2),
  stage_name    VARCHAR(40),
  probability   INTEGER,
  close_date    DATE,
  account_id    VARCHAR(18)   REFERENCES accounts (id),
  lead_id       VARCHAR(18)   REFERENCES leads (id),
  created_date  TIMESTAMP     NOT NULL DEFAULT NOW()
)
`.trim();

export async function applySchema(client: pg.ClientBase): Promise<void> {
  await client.query(DDL_CREATE_CAMPAIGNS);
  await client.query(DDL_CREATE_ACCOUNTS);
  await client.query(DDL_CREATE_LEADS);
  await client.query(DDL_CREATE_OPPORTUNITIES);
}
