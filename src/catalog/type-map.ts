import type { LogicalType } from './types.js';

export const FALLBACK_LOGICAL_TYPE: LogicalType = 'anyType';

/**
 * PostgreSQL `information_schema.columns.data_type` values the catalog
 * knows. Key and foreign-key columns are overridden to `id`/`reference`.
 */
export const BACKEND_TYPE_MAP: Readonly<Record<string, LogicalType>> = {
  'character varying': 'string',
  character: 'string',
  uuid: 'string',
  text: 'textarea',
  smallint: 'int',
  integer: 'int',
  bigint: 'long',
  real: 'double',
  'double precision': 'double',
  numeric: 'currency',
  date: 'date',
  'timestamp without time zone': 'datetime',
  'timestamp with time zone': 'datetime',
  boolean: 'boolean',
};

export function mapBackendType(backendType: string): LogicalType {
  return BACKEND_TYPE_MAP[backendType.toLowerCase()] ?? FALLBACK_LOGICAL_TYPE;
}

const NUMERIC_TYPES: ReadonlySet<LogicalType> = new Set<LogicalType>([
  'int', 'long', 'double', 'currency', 'percent',
]);

export function isNumericType(type: LogicalType): boolean {
  return NUMERIC_TYPES.has(type);
}
