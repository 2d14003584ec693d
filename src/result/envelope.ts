import type { CompiledQuery } from '../query/compiler.js';
import type { FieldValue, Row } from '../store/row-mapper.js';

export const DEFAULT_API_VERSION = '58.0';

export interface RecordAttributes {
  type: string;
  url: string;
}

export type SObjectRecord = {
  attributes: RecordAttributes;
  [field: string]: FieldValue | RecordAttributes | SObjectRecord;
};

export interface ResultEnvelope {
  totalSize: number;
  done: true;
  records: SObjectRecord[];
}

export interface EnvelopeOptions {
  apiVersion?: string;
}

export function recordUrl(apiVersion: string, objectName: string, id: FieldValue): string {
  const base = `/services/data/v${apiVersion}/sobjects/${objectName}`;
  return id === null ? base : `${base}/${encodeURIComponent(String(id))}`;
}

/**
 * Wraps executed rows in the query response envelope. Keys follow the
 * SELECT order; `attributes` comes first. Parent fields nest under their
 * relationship name, which is null when the row has no parent.
 */
export function buildEnvelope(rows: readonly Row[], compiled: CompiledQuery, options: EnvelopeOptions = {}): ResultEnvelope {
  const apiVersion = options.apiVersion ?? DEFAULT_API_VERSION;

  const keyIndex = new Map<string | null, number>();
  compiled.columns.forEach((column, i) => {
    if (column.kind === 'key') keyIndex.set(column.relationship, i);
  });
  const parentType = new Map(compiled.relationships.map((r) => [r.name, r.objectName]));

  const keyOf = (row: Row, relationship: string | null): FieldValue => {
    const index = keyIndex.get(relationship);
    return index === undefined ? null : row[index] ?? null;
  };

  const records = rows.map((row): SObjectRecord => {
    const record: SObjectRecord = {
      attributes: {
        type: compiled.objectName,
        url: recordUrl(apiVersion, compiled.objectName, keyOf(row, null)),
      },
    };
    const parents = new Map<string, SObjectRecord | null>();

    compiled.columns.forEach((column, i) => {
      if (column.kind !== 'field') return;
      const value = row[i] ?? null;
      if (column.relationship === null) {
        record[column.path] = value;
        return;
      }

      let parent = parents.get(column.relationship);
      if (parent === undefined) {
        const type = parentType.get(column.relationship) ?? column.relationship;
        const parentId = keyOf(row, column.relationship);
        parent = parentId === null ? null : { attributes: { type, url: recordUrl(apiVersion, type, parentId) } };
        parents.set(column.relationship, parent);
        record[column.relationship] = parent;
      }
      if (parent !== null) parent[column.field.name] = value;
    });

    return record;
  });

  return { totalSize: records.length, done: true, records };
}
