import pg from 'pg';
import type { CatalogEntry, FieldMeta } from '../catalog/types.js';
import { assertNever, comparisons } from './types.js';
import type { Comparison, NormalizedQuery, ResolvedField, ResolvedRelationship, SqlValue } from './types.js';

export type SqlParam = string | number | bigint | boolean;

/**
 * One projected column, by position. `field` columns carry the logical
 * path used as the output key; `key` columns hold the record key of the
 * root object (relationship null) or of a joined parent.
 */
export type OutputColumn =
  | { readonly kind: 'field'; readonly alias: string; readonly path: string; readonly field: FieldMeta; readonly relationship: string | null }
  | { readonly kind: 'key'; readonly alias: string; readonly field: FieldMeta; readonly relationship: string | null };

export interface RelationshipShape {
  readonly name: string;
  readonly objectName: string;
}

export interface CompiledQuery {
  sql: string;
  params: SqlParam[];
  columns: readonly OutputColumn[];
  objectName: string;
  /** Parent relationships that appear in the selected fields, first-use order. */
  relationships: readonly RelationshipShape[];
  /** Whether the query carries its own LIMIT. */
  limited: boolean;
}

interface Join {
  alias: string;
  relationship: ResolvedRelationship;
}

function keyField(entry: CatalogEntry): FieldMeta | null {
  return entry.idField === null ? null : entry.fields.get(entry.idField) ?? null;
}

function castFor(field: FieldMeta): string {
  switch (field.backendType) {
    case 'date':
      return '::date';
    case 'timestamp without time zone':
      return '::timestamp';
    case 'timestamp with time zone':
      return '::timestamptz';
    default:
      return '';
  }
}

function toParam(value: Exclude<SqlValue, { kind: 'null' }>): SqlParam {
  switch (value.kind) {
    case 'string':
    case 'date':
    case 'datetime':
      return value.value;
    case 'integer':
      return value.value;
    case 'decimal':
      return value.value;
    case 'boolean':
      return value.value;
    default:
      return assertNever(value);
  }
}

/**
 * Per-compilation state: the parameter list and the joins, both numbered
 * in first-use order so equal input gives equal output.
 */
class QueryWriter {
  readonly params: SqlParam[] = [];
  readonly joins = new Map<string, Join>();

  bind(value: SqlParam): string {
    this.params.push(value);
    return `$${this.params.length}`;
  }

  tableAlias(field: ResolvedField): string {
    const relationship = field.relationship;
    if (relationship === null) return 't0';
    let join = this.joins.get(relationship.name);
    if (join === undefined) {
      join = { alias: `t${this.joins.size + 1}`, relationship };
      this.joins.set(relationship.name, join);
    }
    return join.alias;
  }

  column(field: ResolvedField): string {
    return `${this.tableAlias(field)}.${pg.escapeIdentifier(field.field.columnName)}`;
  }

  comparison(node: Comparison<ResolvedField, SqlValue>): string {
    const column = this.column(node.field);
    const value = node.literal;
    if (value.kind === 'null') {
      return node.operator === '=' ? `${column} IS NULL` : `${column} IS NOT NULL`;
    }
    const operator = node.operator === '!=' ? '<>' : node.operator;
    const cast = value.kind === 'date' || value.kind === 'datetime' ? castFor(node.field.field) : '';
    return `${column} ${operator} ${this.bind(toParam(value))}${cast}`;
  }
}

/**
 * Compiles a normalized query into parameterized PostgreSQL. Literals are
 * always bound as parameters; identifiers come from the catalog only.
 */
export function compile(query: NormalizedQuery): CompiledQuery {
  const writer = new QueryWriter();
  const object = query.object;

  const columns: OutputColumn[] = [];
  const projection: string[] = [];

  query.fields.forEach((field, i) => {
    const alias = `c${i}`;
    projection.push(`${writer.column(field)} AS ${alias}`);
    columns.push({
      kind: 'field',
      alias,
      path: field.path,
      field: field.field,
      relationship: field.relationship?.name ?? null,
    });
  });

  const relationships: RelationshipShape[] = [];
  const rootKey = keyField(object);
  if (rootKey !== null) {
    projection.push(`t0.${pg.escapeIdentifier(rootKey.columnName)} AS k0`);
    columns.push({ kind: 'key', alias: 'k0', field: rootKey, relationship: null });
  }
  for (const join of writer.joins.values()) {
    const parentKey = keyField(join.relationship.target);
    if (parentKey === null) continue;
    const alias = `k${relationships.length + 1}`;
    projection.push(`${join.alias}.${pg.escapeIdentifier(parentKey.columnName)} AS ${alias}`);
    columns.push({ kind: 'key', alias, field: parentKey, relationship: join.relationship.name });
    relationships.push({ name: join.relationship.name, objectName: join.relationship.target.objectName });
  }

  const where =
    query.predicate === null
      ? []
      : comparisons(query.predicate).map((node) => writer.comparison(node));

  const orderBy = query.orderBy.map((item) => `${writer.column(item.field)} ${item.direction}`);

  const lines = [
    `SELECT ${projection.join(', ')}`,
    `FROM ${pg.escapeIdentifier(object.tableName)} AS t0`,
  ];
  for (const join of writer.joins.values()) {
    const parentKey = keyField(join.relationship.target);
    if (parentKey === null) continue;
    lines.push(
      `LEFT JOIN ${pg.escapeIdentifier(join.relationship.target.tableName)} AS ${join.alias}` +
        ` ON ${join.alias}.${pg.escapeIdentifier(parentKey.columnName)}` +
        ` = t0.${pg.escapeIdentifier(join.relationship.via.columnName)}`,
    );
  }
  if (where.length > 0) lines.push(`WHERE ${where.join(' AND ')}`);
  if (orderBy.length > 0) lines.push(`ORDER BY ${orderBy.join(', ')}`);
  if (query.limit !== null) lines.push(`LIMIT ${writer.bind(query.limit)}`);

  return {
    sql: lines.join('\n'),
    params: writer.params,
    columns,
    objectName: object.objectName,
    relationships,
    limited: query.limit !== null,
  };
}
