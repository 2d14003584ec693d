import type { Catalog } from '../catalog/catalog.js';
import type { CatalogEntry, FieldMeta, LogicalType } from '../catalog/types.js';

export interface FieldDescription {
  name: string;
  type: LogicalType;
  label: string;
  length: number | null;
  precision: number | null;
  scale: number | null;
  nullable: boolean;
  createable: boolean;
  updateable: boolean;
  unique: boolean;
  defaultValue: string | null;
  picklistValues: string[];
  referenceTo: string[] | null;
  relationshipName: string | null;
}

export interface DescribeResult {
  name: string;
  label: string;
  labelPlural: string;
  keyPrefix: string;
  custom: boolean;
  createable: boolean;
  updateable: boolean;
  deletable: boolean;
  queryable: boolean;
  fields: FieldDescription[];
}

export interface SObjectSummary {
  name: string;
  label: string;
  labelPlural: string;
  custom: boolean;
  keyPrefix: string;
}

export interface ObjectListResult {
  encoding: 'UTF-8';
  maxBatchSize: number;
  sobjects: SObjectSummary[];
}

function describeField(field: FieldMeta): FieldDescription {
  return {
    name: field.name,
    type: field.logicalType,
    label: field.label,
    length: field.length,
    precision: field.precision,
    scale: field.scale,
    nullable: field.nullable,
    createable: field.createable,
    updateable: field.updateable,
    unique: field.unique,
    defaultValue: field.defaultValue,
    picklistValues: [],
    referenceTo: field.referenceTo === null ? null : [field.referenceTo],
    relationshipName: field.relationshipName,
  };
}

export function toDescribeResult(entry: CatalogEntry): DescribeResult {
  return {
    name: entry.objectName,
    label: entry.label,
    labelPlural: entry.labelPlural,
    keyPrefix: entry.keyPrefix,
    custom: false,
    createable: true,
    updateable: true,
    deletable: true,
    queryable: true,
    fields: [...entry.fields.values()].map(describeField),
  };
}

export function toObjectList(catalog: Catalog): ObjectListResult {
  return {
    encoding: 'UTF-8',
    maxBatchSize: 200,
    sobjects: catalog.objects().map((entry) => ({
      name: entry.objectName,
      label: entry.label,
      labelPlural: entry.labelPlural,
      custom: false,
      keyPrefix: entry.keyPrefix,
    })),
  };
}
