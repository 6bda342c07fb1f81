import type { TypeDescriptor } from './descriptors';
import { isIterableCollection, isPlainObject } from '../guards';

/**
 * The container families a collection descriptor can target.
 *
 * `collection` is the abstract root; it is never the origin of a concrete
 * descriptor but can be named as a cast target to cover every family.
 */
export type CollectionShape =
  | 'collection'
  | 'sequence'
  | 'tuple'
  | 'set'
  | 'mapping';

/**
 * The unparameterized container type behind a collection descriptor
 * (`Array` behind `Array<integer>`, `Set` behind `Set<string>`).
 *
 * Origins form the ancestry `collection <- sequence <- tuple`,
 * `collection <- set`, `collection <- mapping`, so a cast target of
 * `origins.sequence` also applies to tuple descriptors.
 */
export class CollectionOrigin {
  readonly kind = 'collection-origin';

  constructor(
    readonly name: string,
    readonly shape: CollectionShape,
    readonly parent?: CollectionOrigin
  ) {}

  /**
   * Wraps already-built elements in this origin's container.
   */
  fromItems(items: unknown[]): unknown[] | Set<unknown> {
    return this.shape === 'set' ? new Set(items) : items;
  }

  /**
   * Rebuilds an existing value as this origin's container (the cast path).
   *
   * Mappings are shallow-copied into their own shape; everything else must be
   * an iterable collection.
   *
   * @throws TypeError when the value can not feed this container.
   */
  from(value: unknown): unknown {
    if (this.shape === 'mapping') {
      if (value instanceof Map) return new Map(value);
      if (isPlainObject(value)) return { ...value };
    } else if (isIterableCollection(value)) {
      return this.fromItems(Array.from(value));
    }

    throw new TypeError(
      `"${this.name}" can not be constructed from a value of type "${typeof value}"`
    );
  }
}

/**
 * A parameterized container type.
 *
 * Element layout by origin:
 * - sequence / set: `[element]`
 * - mapping:        `[key, value]`
 * - tuple:          one entry per position, or `[element]` when `variadic`
 */
export type CollectionType = {
  readonly kind: 'collection';
  readonly origin: CollectionOrigin;
  readonly elements: readonly TypeDescriptor[];
  readonly variadic: boolean;
};
