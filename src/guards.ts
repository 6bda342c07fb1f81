import { isFunction } from './utils/type-guards';

/**
 * A map-shaped input container.
 *
 * Parsers for data-interchange formats (JSON, YAML) decode maps into plain
 * objects; callers building input by hand may also pass a `Map`. Both are
 * accepted wherever the engine expects "a mapping".
 */
export type Mapping = Record<PropertyKey, unknown> | Map<unknown, unknown>;

/**
 * Determines whether a value is a "plain object" (a simple POJO / dictionary
 * object).
 *
 * A value is considered plain if all of the following are true:
 * 1. It is not `null`.
 * 2. `typeof value === "object"`.
 * 3. Its prototype is either:
 *    - `Object.prototype` (typical object literals / `JSON.parse` output), or
 *    - `null` (objects created via `Object.create(null)`).
 *
 * As a result, this returns `false` for arrays, dates, maps, sets and
 * class instances (including already-built composite instances).
 *
 * @typeParam T
 *   The (assumed) type of the object's property values after a successful check.
 *   The generic is a compile-time hint only; it is **not** validated at runtime.
 */
export function isPlainObject<T = unknown>(
  value: unknown
): value is Record<PropertyKey, T> {
  if (typeof value !== 'object' || value === null) return false;

  const proto = Object.getPrototypeOf(value);
  return proto === null || proto === Object.prototype;
}

/**
 * Checks whether a value is map-shaped: a plain object or a `Map`.
 */
export function isMapping(value: unknown): value is Mapping {
  return isPlainObject(value) || value instanceof Map;
}

/**
 * Checks whether a value is an iterable *collection* of elements.
 *
 * Exclusions:
 * - Strings are iterable in JavaScript but are treated as atomic leaves.
 * - Mappings are handled by their own branch; a `Map` iterates entries, which
 *   is never what a sequence/set target wants.
 */
export function isIterableCollection(
  value: unknown
): value is Iterable<unknown> {
  if (typeof value !== 'object' || value === null) return false;
  if (isMapping(value)) return false;

  return isFunction(Reflect.get(value, Symbol.iterator));
}

/**
 * Own-key presence check that works for both mapping shapes.
 *
 * Uses `Object.hasOwn` for plain objects so inherited members
 * (`toString`, `constructor`) never count as input keys.
 */
export function hasKey(mapping: Mapping, key: string): boolean {
  if (mapping instanceof Map) return mapping.has(key);
  return Object.hasOwn(mapping, key);
}

/**
 * Reads a key from either mapping shape. Callers check {@link hasKey} first.
 */
export function readKey(mapping: Mapping, key: string): unknown {
  if (mapping instanceof Map) return mapping.get(key);
  return mapping[key];
}

/**
 * Lists the keys of a mapping in insertion order.
 *
 * Plain objects contribute their own enumerable string keys; `Map` keys are
 * returned as-is (they may be non-strings).
 */
export function mappingKeys(mapping: Mapping): unknown[] {
  if (mapping instanceof Map) return Array.from(mapping.keys());
  return Object.keys(mapping);
}
