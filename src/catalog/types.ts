/**
 * Logical field types reported by describe and used to check literals.
 * `anyType` is the fallback for backend types without a mapping.
 */
export type LogicalType =
  | 'id'
  | 'reference'
  | 'string'
  | 'textarea'
  | 'picklist'
  | 'email'
  | 'phone'
  | 'url'
  | 'int'
  | 'long'
  | 'double'
  | 'currency'
  | 'percent'
  | 'date'
  | 'datetime'
  | 'boolean'
  | 'anyType';

export interface FieldMeta {
  readonly name: string;
  readonly columnName: string;
  /** Type name as reported by information_schema, e.g. `character varying`. */
  readonly backendType: string;
  readonly logicalType: LogicalType;
  readonly label: string;
  readonly nullable: boolean;
  readonly createable: boolean;
  readonly updateable: boolean;
  readonly unique: boolean;
  readonly length: number | null;
  readonly precision: number | null;
  readonly scale: number | null;
  readonly defaultValue: string | null;
  /** Object the field points at, for `reference` fields. */
  readonly referenceTo: string | null;
  /** Name used in `Relationship.Field` paths, for `reference` fields. */
  readonly relationshipName: string | null;
}

export interface CatalogEntry {
  readonly objectName: string;
  readonly tableName: string;
  readonly label: string;
  readonly labelPlural: string;
  readonly keyPrefix: string;
  /** Name of the primary key field, when the table has a single-column key. */
  readonly idField: string | null;
  /** Ordered by column ordinal position. */
  readonly fields: ReadonlyMap<string, FieldMeta>;
}

/** One row of information_schema.columns, as the introspection query selects it. */
export type ColumnRow = {
  table_name: string;
  column_name: string;
  data_type: string;
  is_nullable: 'YES' | 'NO';
  character_maximum_length: number | null;
  numeric_precision: number | null;
  numeric_scale: number | null;
  column_default: string | null;
};

export type KeyRow = {
  constraint_name: string;
  table_name: string;
  column_name: string;
  constraint_type: 'PRIMARY KEY' | 'FOREIGN KEY' | 'UNIQUE';
  foreign_table_name: string | null;
};
