import type { NavigatorReadsInPlace } from '../architecture';
import type { PathSpec } from '../path-spec';
import { PathLookupError } from '../errors';
import { hasKey, isMapping, readKey } from '../guards';
import { isArrayOf, isString } from '../utils/type-guards';

/**
 * What a lookup yields when the path is missing.
 *
 * - `{ value }`: returned as the result (boxed, so `undefined` and error
 *   objects are ordinary values here)
 * - an `Error`: thrown
 */
export type PathFallback = { readonly value: unknown } | Error;

const isStringList = isArrayOf(isString);

function splitPath(path: string): string[] {
  return path.split('.');
}

/**
 * Checks whether a dotted path resolves to a present key.
 *
 * Every non-final segment must lead to a nested mapping containing the next
 * segment. Missing segments and non-mapping intermediates yield `false`;
 * this never throws.
 *
 * @example
 * hasPath('a.b', { a: { b: null } })  // true
 * hasPath('a.b', { a: 'text' })       // false
 */
export function hasPath(path: string, data: unknown): boolean {
  let current = data;

  for (const segment of splitPath(path)) {
    if (!isMapping(current) || !hasKey(current, segment)) return false;
    current = readKey(current, segment);
  }

  return true;
}

function missing(fallback: PathFallback): unknown {
  if (fallback instanceof Error) throw fallback;
  return fallback.value;
}

/**
 * Reads the value at a dotted path.
 *
 * Resolution rules:
 * 1. A missing segment (intermediate or final) yields the fallback: its
 *    value is returned, an error is thrown.
 * 2. A present segment whose value is not a mapping, with segments still
 *    left to walk, is a structural fault: `PathLookupError` is thrown
 *    whatever the fallback.
 * 3. A present final segment returns its value (which may be `null`).
 *
 * The input is never copied or modified. See {@link NavigatorReadsInPlace}.
 *
 * @throws PathLookupError | the fallback error
 */
export function getPath(
  path: string,
  data: unknown,
  fallback: PathFallback = new PathLookupError(`missing key path "${path}"`)
): unknown {
  const segments = splitPath(path);
  let current = data;

  for (const [index, segment] of segments.entries()) {
    if (!isMapping(current)) {
      const parent = index === 0 ? '(root)' : segments[index - 1];
      throw new PathLookupError(`element is not a mapping: ${parent}`);
    }
    if (!hasKey(current, segment)) return missing(fallback);

    current = readKey(current, segment);
  }

  return current;
}

/**
 * Resolves a path-spec to a raw value.
 *
 * - A single path delegates to {@link getPath} with the caller's fallback.
 * - A candidate list tries each path in order. A candidate that fails to
 *   resolve (missing or structurally broken) is skipped; the first one that
 *   resolves wins, even when a later one would resolve too. When every
 *   candidate fails, the fallback applies.
 *
 * @throws TypeError for anything other than a path or a list of paths
 *   (including `SKIP_FIELD`, which callers handle before looking up).
 */
export function resolvePathSpec(
  spec: PathSpec,
  data: unknown,
  fallback: PathFallback
): unknown {
  if (isString(spec)) return getPath(spec, data, fallback);

  if (typeof spec === 'symbol' || !isStringList(spec)) {
    throw new TypeError(
      `Expected a dotted path or a list of dotted paths, got ${typeof spec}.`
    );
  }

  for (const candidate of spec) {
    try {
      return getPath(candidate, data);
    } catch (error) {
      if (!(error instanceof PathLookupError)) throw error;
    }
  }

  return missing(fallback);
}
