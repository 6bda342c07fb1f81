/**
 * Path-spec sentinel: the field ignores its remapping and falls back to its
 * own default rule, as if no path had been registered.
 */
export const SKIP_FIELD: unique symbol = Symbol('mapping-hydrator.skip-field');

/**
 * Where a field's raw value lives in the input.
 *
 * - `'a.b.c'`: a dotted path
 * - `['a.b', 'c']`: candidate paths, first structurally present wins
 *   (list the more specific path first)
 * - {@link SKIP_FIELD}
 */
export type PathSpec = string | readonly string[] | typeof SKIP_FIELD;

/**
 * Field name -> path-spec, for one composite.
 */
export type FieldPathTable = Readonly<Record<string, PathSpec>>;
