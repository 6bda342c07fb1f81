import type { DescriptorAncestry } from '../architecture';
import type { CollectionOrigin, CollectionType } from './collection';
import type { CompositeType } from './composite';
import type { LeafType } from './leaf';

/**
 * A sum type: a value is exactly one of `members`.
 *
 * `Optional(T)` is the two-member union `T | null` whose second member is the
 * null leaf.
 */
export type UnionType = {
  readonly kind: 'union';
  readonly members: readonly TypeDescriptor[];
};

/**
 * A deferred type, resolved when the owning composite is reflected.
 *
 * - By name: looked up in `config.forwardReferences`.
 * - By thunk: `resolve()` is called (self-referential declarations).
 */
export type ForwardRef = {
  readonly kind: 'reference';
  readonly name: string;
  readonly resolve?: () => TypeDescriptor;
};

/**
 * Closed description of a conversion target.
 *
 * Dispatch is always by `kind`; there is no runtime introspection of
 * TypeScript types.
 */
export type TypeDescriptor =
  | LeafType
  | CompositeType<object>
  | UnionType
  | CollectionType
  | ForwardRef;

/**
 * Anything that takes part in an ancestry chain.
 */
export type Ancestral = LeafType | CompositeType<object> | CollectionOrigin;

/**
 * Reflexive ancestry check: `true` when `ancestor` is `type` itself or one of
 * its parents. See {@link DescriptorAncestry}.
 */
export function isAncestor(ancestor: Ancestral, type: Ancestral): boolean {
  let current: Ancestral | undefined = type;

  while (current) {
    if (current === ancestor) return true;
    current = current.parent;
  }

  return false;
}
