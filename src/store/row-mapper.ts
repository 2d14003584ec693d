import { isNumericType } from '../catalog/type-map.js';
import type { FieldMeta } from '../catalog/types.js';
import type { OutputColumn } from '../query/compiler.js';

export type FieldValue = string | number | boolean | null;

/** One result row, positionally aligned with CompiledQuery.columns. */
export type Row = readonly FieldValue[];

const pad = (n: number, width = 2): string => String(n).padStart(width, '0');

// pg parses DATE and TIMESTAMP (without zone) into local-time Dates, so the
// local getters give back the stored wall-clock value.
function formatLocalDate(value: Date): string {
  return `${value.getFullYear()}-${pad(value.getMonth() + 1)}-${pad(value.getDate())}`;
}

function formatLocalDateTime(value: Date): string {
  return (
    `${formatLocalDate(value)}T${pad(value.getHours())}:${pad(value.getMinutes())}:` +
    `${pad(value.getSeconds())}.${pad(value.getMilliseconds(), 3)}+0000`
  );
}

function formatInstant(value: Date): string {
  return value.toISOString().replace('Z', '+0000');
}

function toNumber(value: string | bigint): number | string {
  const n = Number(value);
  return Number.isSafeInteger(n) || !Number.isInteger(n) ? n : String(value);
}

export function convertValue(field: FieldMeta, raw: unknown): FieldValue {
  if (raw === null || raw === undefined) return null;

  if (raw instanceof Date) {
    if (field.logicalType === 'date') return formatLocalDate(raw);
    if (field.backendType === 'timestamp with time zone') return formatInstant(raw);
    return formatLocalDateTime(raw);
  }

  switch (typeof raw) {
    case 'string':
      // pg returns NUMERIC and BIGINT as strings
      return isNumericType(field.logicalType) ? toNumber(raw) : raw;
    case 'number':
    case 'boolean':
      return raw;
    case 'bigint':
      return toNumber(raw);
    default:
      return JSON.stringify(raw);
  }
}

export function mapRow(columns: readonly OutputColumn[], raw: readonly unknown[]): Row {
  return columns.map((column, i) => convertValue(column.field, raw[i]));
}
