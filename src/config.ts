import { z } from 'zod';
import { ConfigError } from './errors.js';

export const DEFAULT_OBJECT_TABLES: ReadonlyArray<readonly [string, string]> = [
  ['Lead', 'leads'],
  ['Opportunity', 'opportunities'],
  ['Account', 'accounts'],
  ['Contact', 'contacts'],
  ['Case', 'cases'],
  ['Task', 'tasks'],
  ['Event', 'events'],
  ['Campaign', 'campaigns'],
];

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

/** Parses `Lead:leads,Account:accounts`. */
function parseObjectTables(raw: string, ctx: z.RefinementCtx): Map<string, string> {
  const map = new Map<string, string>();
  for (const pair of raw.split(',').map((p) => p.trim()).filter((p) => p.length > 0)) {
    const [objectName, tableName, ...rest] = pair.split(':').map((s) => s.trim());
    if (
      objectName === undefined ||
      tableName === undefined ||
      rest.length > 0 ||
      !IDENTIFIER.test(objectName) ||
      !IDENTIFIER.test(tableName)
    ) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `invalid object mapping '${pair}'` });
      return z.NEVER;
    }
    map.set(objectName, tableName);
  }
  return map;
}

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .default('false')
  .transform((v) => v === 'true' || v === '1');

const envSchema = z.object({
  DATABASE_URL: z
    .string()
    .trim()
    .min(1, 'DATABASE_URL is required')
    .refine((v) => v.startsWith('postgres://') || v.startsWith('postgresql://'), {
      message: 'DATABASE_URL must be a PostgreSQL connection string (postgres:// or postgresql://)',
    }),
  HOST: z.string().default('0.0.0.0'),
  PORT: z.coerce.number().int().min(0).max(65535).default(8000),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  DB_SCHEMA: z.string().regex(IDENTIFIER).default('public'),
  QUERY_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  MAX_ROWS: z.coerce.number().int().positive().default(2000),
  API_VERSION: z.string().regex(/^\d+\.\d+$/).default('58.0'),
  OBJECT_TABLES: z.string().optional().transform((raw, ctx) =>
    raw === undefined ? new Map(DEFAULT_OBJECT_TABLES) : parseObjectTables(raw, ctx),
  ),
  INIT_SCHEMA: booleanFlag,
});

export interface ServerConfig {
  databaseUrl: string;
  host: string;
  port: number;
  logLevel: 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';
  schema: string;
  queryTimeoutMs: number;
  maxRows: number;
  apiVersion: string;
  objectTables: ReadonlyMap<string, string>;
  initSchema: boolean;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError('Invalid configuration', issues);
  }
  const e = parsed.data;
  return {
    databaseUrl: e.DATABASE_URL,
    host: e.HOST,
    port: e.PORT,
    logLevel: e.LOG_LEVEL,
    schema: e.DB_SCHEMA,
    queryTimeoutMs: e.QUERY_TIMEOUT_MS,
    maxRows: e.MAX_ROWS,
    apiVersion: e.API_VERSION,
    objectTables: e.OBJECT_TABLES,
    initSchema: e.INIT_SCHEMA,
  };
}
