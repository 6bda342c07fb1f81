/**
 * Behavior of a leaf type.
 *
 * @template T - The runtime value type the leaf describes.
 */
export type LeafSpec<T> = {
  /**
   * Structural instance-of check used by type verification and union
   * acceptance.
   */
  test: (value: unknown) => value is T;

  /**
   * Single-argument constructor applied when the leaf (or one of its
   * ancestors) is a configured cast target.
   *
   * May throw; the error reaches the caller unwrapped.
   */
  construct?: (value: unknown) => T;
};

/**
 * A concrete, non-composite, non-collection type: `string`, `integer`, an
 * enumeration, a branded string...
 *
 * Leaves form single-parent chains (`CarCompany -> string`). The chain is what
 * cast targets and `allowSuperclasses` reason about; it does not imply that a
 * value of the parent passes the child's {@link LeafSpec.test}.
 */
export class LeafType<T = unknown> {
  readonly kind = 'leaf';

  constructor(
    readonly name: string,
    private readonly spec: LeafSpec<T>,
    readonly parent?: LeafType
  ) {}

  accepts(value: unknown): value is T {
    return this.spec.test(value);
  }

  /**
   * Runs the leaf's single-argument constructor.
   *
   * @throws TypeError when the leaf declares no constructor.
   */
  construct(value: unknown): T {
    if (!this.spec.construct) {
      throw new TypeError(`"${this.name}" can not be constructed from a value`);
    }
    return this.spec.construct(value);
  }

  /**
   * Derives a child leaf whose parent is this leaf.
   *
   * @example
   * ```ts
   * const Slug = t.string.extend('Slug', {
   *   test: (value): value is string => isString(value) && /^[a-z-]+$/.test(value)
   * });
   * ```
   */
  extend<U>(name: string, spec: LeafSpec<U>): LeafType<U> {
    return new LeafType(name, spec, this);
  }
}
