import { ObjectNotFoundError } from '../errors.js';
import type { Logger } from '../logger.js';
import { silentLogger } from '../logger.js';
import {
  isCreateable,
  isUpdateable,
  keyPrefixFor,
  pluralize,
  toFieldName,
  toLabel,
  toRelationshipName,
} from './naming.js';
import { mapBackendType } from './type-map.js';
import type { CatalogEntry, ColumnRow, FieldMeta, KeyRow, LogicalType } from './types.js';

/**
 * Read-only registry of the objects the API exposes. Built once from
 * schema introspection; never mutated afterwards.
 */
export class Catalog {
  private readonly entries: ReadonlyMap<string, CatalogEntry>;

  private constructor(entries: ReadonlyMap<string, CatalogEntry>) {
    this.entries = entries;
    Object.freeze(this);
  }

  static fromEntries(entries: Iterable<CatalogEntry>): Catalog {
    const map = new Map<string, CatalogEntry>();
    for (const entry of entries) {
      for (const field of entry.fields.values()) Object.freeze(field);
      map.set(entry.objectName, Object.freeze(entry));
    }
    return new Catalog(map);
  }

  get size(): number {
    return this.entries.size;
  }

  find(objectName: string): CatalogEntry | undefined {
    return this.entries.get(objectName);
  }

  describe(objectName: string): CatalogEntry {
    const entry = this.entries.get(objectName);
    if (entry === undefined) {
      throw new ObjectNotFoundError(objectName);
    }
    return entry;
  }

  objects(): CatalogEntry[] {
    return [...this.entries.values()];
  }
}

/**
 * Builds one catalog entry from the introspected columns of its table.
 * `tableToObject` resolves foreign-key targets to object names; keys that
 * point at tables outside the catalog are treated as plain columns.
 */
export function buildCatalogEntry(
  objectName: string,
  tableName: string,
  columns: readonly ColumnRow[],
  keys: readonly KeyRow[],
  tableToObject: ReadonlyMap<string, string>,
): CatalogEntry {
  const tableKeys = keys.filter((k) => k.table_name === tableName);

  const columnsPerConstraint = new Map<string, KeyRow[]>();
  for (const key of tableKeys) {
    const group = columnsPerConstraint.get(key.constraint_name) ?? [];
    group.push(key);
    columnsPerConstraint.set(key.constraint_name, group);
  }

  let primaryKey: string | null = null;
  const uniqueColumns = new Set<string>();
  const foreignKeys = new Map<string, string>();
  for (const group of columnsPerConstraint.values()) {
    const [first] = group;
    if (first === undefined || group.length !== 1) continue;
    if (first.constraint_type === 'PRIMARY KEY') {
      primaryKey = first.column_name;
      uniqueColumns.add(first.column_name);
    } else if (first.constraint_type === 'UNIQUE') {
      uniqueColumns.add(first.column_name);
    } else if (first.foreign_table_name !== null) {
      const target = tableToObject.get(first.foreign_table_name);
      if (target !== undefined) foreignKeys.set(first.column_name, target);
    }
  }

  const fields = new Map<string, FieldMeta>();
  let idField: string | null = null;
  for (const column of columns) {
    if (column.table_name !== tableName) continue;
    const name = toFieldName(column.column_name);
    const isKey = column.column_name === primaryKey;
    const referenceTo = foreignKeys.get(column.column_name) ?? null;

    let logicalType: LogicalType = mapBackendType(column.data_type);
    if (isKey) logicalType = 'id';
    else if (referenceTo !== null) logicalType = 'reference';

    if (isKey) idField = name;
    fields.set(name, {
      name,
      columnName: column.column_name,
      backendType: column.data_type,
      logicalType,
      label: toLabel(name),
      nullable: column.is_nullable === 'YES',
      createable: isCreateable(name, isKey),
      updateable: isUpdateable(name, isKey),
      unique: uniqueColumns.has(column.column_name),
      length: column.character_maximum_length,
      precision: column.numeric_precision,
      scale: column.numeric_scale,
      defaultValue: column.column_default,
      referenceTo,
      relationshipName: referenceTo === null ? null : toRelationshipName(name),
    });
  }

  return {
    objectName,
    tableName,
    label: objectName,
    labelPlural: pluralize(objectName),
    keyPrefix: keyPrefixFor(objectName),
    idField,
    fields,
  };
}

/**
 * Holds the live Catalog. A reload builds a complete new Catalog and swaps
 * the reference only once it succeeded; readers take one snapshot per
 * request via current().
 */
export class CatalogProvider {
  private catalog: Catalog;
  // Reloads may overlap; a result older than the installed one is dropped.
  private reloadsStarted = 0;
  private installedReload = 0;

  constructor(
    initial: Catalog,
    private readonly loader: () => Promise<Catalog>,
    private readonly logger: Logger = silentLogger,
  ) {
    this.catalog = initial;
  }

  static async create(loader: () => Promise<Catalog>, logger: Logger = silentLogger): Promise<CatalogProvider> {
    const initial = await loader();
    logger.info({ objects: initial.size }, 'catalog loaded');
    return new CatalogProvider(initial, loader, logger);
  }

  current(): Catalog {
    return this.catalog;
  }

  async reload(): Promise<Catalog> {
    const generation = ++this.reloadsStarted;
    const next = await this.loader();
    if (generation < this.installedReload) {
      this.logger.debug({ generation, installed: this.installedReload }, 'stale catalog reload discarded');
      return this.catalog;
    }
    this.installedReload = generation;
    this.catalog = next;
    this.logger.info({ objects: next.size }, 'catalog reloaded');
    return next;
  }
}
