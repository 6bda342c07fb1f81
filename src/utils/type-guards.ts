export type Guard<T> = (value: unknown) => value is T;

/**
 * Mapping of JavaScript `typeof` results to corresponding TypeScript types.
 * Used by the {@link is} factory.
 */
type PrimitiveTypeMap = {
  boolean: boolean;
  number: number;
  bigint: bigint;
  string: string;
  symbol: symbol;
  undefined: undefined;
  function: (...args: never[]) => unknown;
};

/**
 * Creates a guard for a built-in `typeof` check.
 *
 * @template T  One of the keys of {@link PrimitiveTypeMap}.
 * @param type  The type keyword to compare against `typeof value`.
 * @returns     A guard that returns `true` iff `typeof value === type`.
 */
export function is<T extends keyof PrimitiveTypeMap>(
  type: T
): Guard<PrimitiveTypeMap[T]> {
  return (value: unknown): value is PrimitiveTypeMap[T] =>
    typeof value === type;
}

/** Guard verifying the value is a string. */
export const isString = is('string');

/** Guard verifying the value is a number (including NaN/Infinity). */
export const isNumber = is('number');

/** Guard verifying the value is a boolean. */
export const isBoolean = is('boolean');

/** Guard verifying the value is a bigint. */
export const isBigInt = is('bigint');

/** Guard verifying the value is callable. */
export const isFunction = is('function');

/**
 * Guard verifying the value is `null`.
 *
 * Note:
 * `typeof null === "object"` for historical reasons, so this cannot be
 * expressed via the `is(...)` factory.
 */
export function isNull(value: unknown): value is null {
  return value === null;
}

/**
 * Guard verifying the value is an integral number.
 *
 * Semantics:
 * - true  for:  0, -3, 1e3, 2.0
 * - false for:  1.5, NaN, Infinity, non-numbers
 *
 * Note:
 * JavaScript has a single number type, so `2.0` is indistinguishable from
 * `2` and counts as an integer.
 */
export function isInteger(value: unknown): value is number {
  return isNumber(value) && Number.isInteger(value);
}

/**
 * Creates a guard verifying the value is an array whose elements all satisfy `elementGuard`.
 *
 * @param elementGuard
 *   Guard used to validate each element.
 * @returns
 *   A guard that narrows to `T[]` when the input is an array and every element passes.
 */
export function isArrayOf<T>(elementGuard: Guard<T>): Guard<T[]> {
  return (value: unknown): value is T[] =>
    Array.isArray(value) && value.every(elementGuard);
}
