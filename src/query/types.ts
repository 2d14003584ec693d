import type { CatalogEntry, FieldMeta } from '../catalog/types.js';
import type { ComparisonOperator, Token } from './tokens.js';

export type Direction = 'ASC' | 'DESC';

/** A field as written in the query: `Name` or `Campaign.Name`. */
export interface FieldRef {
  readonly path: string;
  readonly position: number;
}

export interface Comparison<F, L> {
  readonly kind: 'comparison';
  readonly field: F;
  readonly operator: ComparisonOperator;
  readonly literal: L;
}

export interface Conjunction<F, L> {
  readonly kind: 'conjunction';
  readonly left: PredicateNode<F, L>;
  readonly right: PredicateNode<F, L>;
}

/**
 * WHERE-clause tree. Only AND exists, so the union has exactly two variants.
 * `F` and `L` change as the query moves through the pipeline.
 */
export type PredicateNode<F, L> = Comparison<F, L> | Conjunction<F, L>;

export type Selection =
  | { readonly kind: 'all'; readonly position: number }
  | { readonly kind: 'fields'; readonly fields: readonly FieldRef[] };

export interface OrderItem<F> {
  readonly field: F;
  readonly direction: Direction;
}

export interface ParsedQuery {
  readonly selection: Selection;
  readonly objectName: string;
  readonly objectPosition: number;
  readonly predicate: PredicateNode<FieldRef, Token> | null;
  readonly orderBy: readonly OrderItem<FieldRef>[];
  readonly limit: number | null;
}

/** A parent object reached through a reference field of the queried object. */
export interface ResolvedRelationship {
  readonly name: string;
  readonly via: FieldMeta;
  readonly target: CatalogEntry;
}

export interface ResolvedField {
  /** Logical path, used as the output key. */
  readonly path: string;
  readonly field: FieldMeta;
  readonly relationship: ResolvedRelationship | null;
}

export interface ResolvedQuery<L = Token> {
  readonly object: CatalogEntry;
  readonly fields: readonly ResolvedField[];
  readonly predicate: PredicateNode<ResolvedField, L> | null;
  readonly orderBy: readonly OrderItem<ResolvedField>[];
  readonly limit: number | null;
}

export type SqlValue =
  | { readonly kind: 'string'; readonly value: string }
  | { readonly kind: 'integer'; readonly value: bigint }
  | { readonly kind: 'decimal'; readonly value: number }
  | { readonly kind: 'date'; readonly value: string }
  | { readonly kind: 'datetime'; readonly value: string }
  | { readonly kind: 'boolean'; readonly value: boolean }
  | { readonly kind: 'null' };

export type NormalizedQuery = ResolvedQuery<SqlValue>;

export function assertNever(value: never): never {
  throw new Error(`Unhandled variant: ${JSON.stringify(value)}`);
}

/** Leaf comparisons, left to right. */
export function comparisons<F, L>(node: PredicateNode<F, L>): Comparison<F, L>[] {
  switch (node.kind) {
    case 'comparison':
      return [node];
    case 'conjunction':
      return [...comparisons(node.left), ...comparisons(node.right)];
    default:
      return assertNever(node);
  }
}

/** Rebuilds the tree with every comparison replaced; structure is kept. */
export function mapPredicate<F, L, G, M>(
  node: PredicateNode<F, L>,
  fn: (comparison: Comparison<F, L>) => Comparison<G, M>,
): PredicateNode<G, M> {
  switch (node.kind) {
    case 'comparison':
      return fn(node);
    case 'conjunction':
      return {
        kind: 'conjunction',
        left: mapPredicate(node.left, fn),
        right: mapPredicate(node.right, fn),
      };
    default:
      return assertNever(node);
  }
}
