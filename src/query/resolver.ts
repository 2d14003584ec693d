import type { Catalog } from '../catalog/catalog.js';
import type { CatalogEntry, FieldMeta } from '../catalog/types.js';
import { FieldNotFoundError, ObjectNotFoundError } from '../errors.js';
import { findClosestMatch } from './suggest.js';
import type { Token } from './tokens.js';
import { mapPredicate } from './types.js';
import type { FieldRef, ParsedQuery, ResolvedField, ResolvedQuery } from './types.js';

function resolveRelationship(catalog: Catalog, object: CatalogEntry, path: string, relationshipName: string, leaf: string): ResolvedField {
  const references = [...object.fields.values()].filter((f) => f.relationshipName !== null);
  const via = references.find((f) => f.relationshipName === relationshipName);
  if (via === undefined || via.referenceTo === null) {
    const names = references.flatMap((f) => (f.relationshipName === null ? [] : [f.relationshipName]));
    throw new FieldNotFoundError(object.objectName, relationshipName, findClosestMatch(relationshipName, names));
  }

  const target = catalog.find(via.referenceTo);
  if (target === undefined || target.idField === null) {
    throw new FieldNotFoundError(object.objectName, path);
  }

  const field = target.fields.get(leaf);
  if (field === undefined) {
    throw new FieldNotFoundError(target.objectName, leaf, findClosestMatch(leaf, target.fields.keys()));
  }

  return { path, field, relationship: { name: relationshipName, via, target } };
}

function resolveField(catalog: Catalog, object: CatalogEntry, ref: FieldRef): ResolvedField {
  const segments = ref.path.split('.');
  const [head, leaf, ...rest] = segments;

  if (head === undefined) {
    throw new FieldNotFoundError(object.objectName, ref.path);
  }
  if (leaf === undefined) {
    const field = object.fields.get(head);
    if (field === undefined) {
      throw new FieldNotFoundError(object.objectName, head, findClosestMatch(head, object.fields.keys()));
    }
    return { path: head, field, relationship: null };
  }
  if (rest.length > 0) {
    // Only one relationship hop is supported.
    throw new FieldNotFoundError(object.objectName, ref.path);
  }
  return resolveRelationship(catalog, object, ref.path, head, leaf);
}

function ownField(field: FieldMeta): ResolvedField {
  return { path: field.name, field, relationship: null };
}

/**
 * Checks every identifier of a parsed query against the catalog and
 * attaches its metadata. `*` expands to all fields in catalog order.
 */
export function resolve(parsed: ParsedQuery, catalog: Catalog): ResolvedQuery<Token> {
  const object = catalog.find(parsed.objectName);
  if (object === undefined) {
    throw new ObjectNotFoundError(parsed.objectName);
  }

  const fields =
    parsed.selection.kind === 'all'
      ? [...object.fields.values()].map(ownField)
      : parsed.selection.fields.map((ref) => resolveField(catalog, object, ref));

  const predicate =
    parsed.predicate === null
      ? null
      : mapPredicate(parsed.predicate, (comparison) => ({
          kind: 'comparison' as const,
          field: resolveField(catalog, object, comparison.field),
          operator: comparison.operator,
          literal: comparison.literal,
        }));

  const orderBy = parsed.orderBy.map((item) => ({
    field: resolveField(catalog, object, item.field),
    direction: item.direction,
  }));

  return { object, fields, predicate, orderBy, limit: parsed.limit };
}
