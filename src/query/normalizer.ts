import { isNumericType, mapBackendType } from '../catalog/type-map.js';
import { LiteralError, TypeMismatchError } from '../errors.js';
import type { ComparisonOperator, Token } from './tokens.js';
import { assertNever, mapPredicate } from './types.js';
import type { NormalizedQuery, ResolvedField, ResolvedQuery, SqlValue } from './types.js';

const TEMPORAL_SHAPE =
  /^(\d{4})-(\d{2})-(\d{2})(?:T(\d{2}):(\d{2}):(\d{2})(\.\d{1,3})?(Z|[+-]\d{2}:?\d{2})?)?$/;

const ESCAPES: Readonly<Record<string, string>> = {
  "'": "'",
  '"': '"',
  '\\': '\\',
  n: '\n',
  r: '\r',
  t: '\t',
  b: '\b',
  f: '\f',
};

export function unescapeString(literal: Token): string {
  let out = '';
  for (let i = 0; i < literal.text.length; i++) {
    const ch = literal.text.charAt(i);
    if (ch !== '\\') {
      out += ch;
      continue;
    }
    const next = literal.text.charAt(i + 1);
    const replacement = ESCAPES[next];
    if (replacement === undefined) {
      throw new LiteralError(literal, `invalid escape sequence \\${next}`);
    }
    out += replacement;
    i += 1;
  }
  return out;
}

function daysInMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

/**
 * Validates a date or datetime literal. Datetimes are converted to UTC
 * (`YYYY-MM-DDTHH:MM:SS.sssZ`); a missing zone is read as UTC.
 */
export function parseTemporal(literal: Token, text: string): Extract<SqlValue, { kind: 'date' | 'datetime' }> {
  const match = TEMPORAL_SHAPE.exec(text);
  if (match === null) {
    throw new LiteralError(literal, 'expected a date (YYYY-MM-DD) or datetime (YYYY-MM-DDTHH:MM:SSZ)');
  }
  const [, y, mo, d, h, mi, s, fraction, zone] = match;
  const year = Number(y);
  const month = Number(mo);
  const day = Number(d);
  if (month < 1 || month > 12 || day < 1 || day > daysInMonth(year, month)) {
    throw new LiteralError(literal, 'not a valid calendar date');
  }
  const datePart = `${y}-${mo}-${d}`;
  if (h === undefined || mi === undefined || s === undefined) {
    return { kind: 'date', value: datePart };
  }

  if (Number(h) > 23 || Number(mi) > 59 || Number(s) > 59) {
    throw new LiteralError(literal, 'not a valid time of day');
  }
  let offset = 'Z';
  if (zone !== undefined && zone !== 'Z') {
    const sign = zone.charAt(0);
    const digits = zone.slice(1).replace(':', '');
    const offsetHours = Number(digits.slice(0, 2));
    const offsetMinutes = Number(digits.slice(2));
    if (offsetHours > 14 || offsetMinutes > 59) {
      throw new LiteralError(literal, 'not a valid time zone offset');
    }
    offset = `${sign}${digits.slice(0, 2)}:${digits.slice(2)}`;
  }
  const instant = new Date(`${datePart}T${h}:${mi}:${s}${fraction === undefined ? '' : fraction.padEnd(4, '0')}${offset}`);
  return { kind: 'datetime', value: instant.toISOString() };
}

function parseNumber(literal: Token): SqlValue {
  return literal.text.includes('.')
    ? { kind: 'decimal', value: Number(literal.text) }
    : { kind: 'integer', value: BigInt(literal.text) };
}

/**
 * Converts one literal to a typed value for the column it is compared
 * with. Literal kinds that disagree with the column type are rejected.
 */
export function normalizeLiteral(field: ResolvedField, operator: ComparisonOperator, literal: Token): SqlValue {
  const type = field.field.logicalType;
  const mismatch = (): TypeMismatchError => new TypeMismatchError(field.path, type, literal);

  if (literal.kind === 'Keyword') {
    if (literal.text === 'NULL') {
      if (operator !== '=' && operator !== '!=') {
        throw new LiteralError(literal, 'null can only be compared with = or !=');
      }
      return { kind: 'null' };
    }
    if (type !== 'boolean') throw mismatch();
    return { kind: 'boolean', value: literal.text === 'TRUE' };
  }

  switch (type) {
    case 'id':
    case 'reference':
      // Keys compare by their column's type: integer keys take numbers.
      if (isNumericType(mapBackendType(field.field.backendType))) {
        if (literal.kind !== 'NumberLiteral') throw mismatch();
        return parseNumber(literal);
      }
      if (literal.kind !== 'StringLiteral') throw mismatch();
      return { kind: 'string', value: unescapeString(literal) };

    case 'string':
    case 'textarea':
    case 'picklist':
    case 'email':
    case 'phone':
    case 'url':
      if (literal.kind !== 'StringLiteral') throw mismatch();
      return { kind: 'string', value: unescapeString(literal) };

    case 'int':
    case 'long':
    case 'double':
    case 'currency':
    case 'percent':
      if (literal.kind !== 'NumberLiteral') throw mismatch();
      return parseNumber(literal);

    case 'date':
    case 'datetime': {
      let text: string;
      if (literal.kind === 'DateLiteral') text = literal.text;
      else if (literal.kind === 'StringLiteral') text = unescapeString(literal);
      else throw mismatch();
      const value = parseTemporal(literal, text);
      if (type === 'date' && value.kind === 'datetime') throw mismatch();
      return value;
    }

    case 'boolean':
      throw mismatch();

    case 'anyType':
      if (literal.kind === 'StringLiteral') return { kind: 'string', value: unescapeString(literal) };
      if (literal.kind === 'NumberLiteral') return { kind: 'string', value: literal.text };
      throw mismatch();

    default:
      return assertNever(type);
  }
}

export function normalize(resolved: ResolvedQuery<Token>): NormalizedQuery {
  const predicate =
    resolved.predicate === null
      ? null
      : mapPredicate(resolved.predicate, (comparison) => ({
          kind: 'comparison' as const,
          field: comparison.field,
          operator: comparison.operator,
          literal: normalizeLiteral(comparison.field, comparison.operator, comparison.literal),
        }));
  return { ...resolved, predicate };
}
