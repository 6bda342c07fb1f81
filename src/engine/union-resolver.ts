import type { UnionResolutionStrategy } from '../architecture';
import type { Config } from '../config';
import type { TypeDescriptor, UnionType } from '../types/descriptors';
import { NullType } from '../types/builtins';
import { StrictUnionMatchError, UnionMatchError } from '../errors';
import { isInstance, isRuntimeAncestorOf } from './type-checks';
import { buildValue } from './value-builder';

/**
 * A built value counts as a match when it conforms to the candidate, or,
 * under `allowSuperclasses`, when its runtime type is an ancestor of the
 * candidate.
 */
function isAccepted(
  candidate: TypeDescriptor,
  value: unknown,
  config: Config
): boolean {
  return (
    isInstance(value, candidate, config) ||
    (config.allowSuperclasses && isRuntimeAncestorOf(value, candidate))
  );
}

/**
 * Picks the union member a raw value builds into.
 *
 * Resolution:
 * 1. Two members, one of them null: build against the other member
 *    directly (a `null` value never gets here, the value builder returns
 *    it first).
 * 2. Otherwise try members in declaration order. A member whose build
 *    throws, whatever the error, is out; a member whose result is not
 *    accepted is out.
 *    - default: the first accepted member wins
 *    - `strictUnionsMatch`: every member is tried; more than one accepted
 *      member is an error, whatever the declaration order
 * 3. Nothing accepted: the raw value is returned untouched when
 *    `checkTypes` is off, else `UnionMatchError`.
 *
 * See {@link UnionResolutionStrategy}.
 *
 * @throws UnionMatchError | StrictUnionMatchError
 */
export function resolveUnion(
  union: UnionType,
  raw: unknown,
  config: Config
): unknown {
  const { members } = union;

  // 1. Optional fast path
  if (members.length === 2 && members.includes(NullType)) {
    const [first, second] = members;
    return buildValue(first === NullType ? second : first, raw, config);
  }

  // 2. Candidates
  const matches = new Map<TypeDescriptor, unknown>();

  for (const candidate of members) {
    let value: unknown;
    try {
      value = buildValue(candidate, raw, config);
    } catch {
      // Any failure eliminates the candidate.
      continue;
    }

    if (!isAccepted(candidate, value, config)) continue;
    if (!config.strictUnionsMatch) return value;

    matches.set(candidate, value);
  }

  if (matches.size > 1) {
    throw new StrictUnionMatchError([...matches.keys()]);
  }
  if (matches.size === 1) {
    const [value] = matches.values();
    return value;
  }

  // 3. No match
  if (!config.checkTypes) return raw;
  throw new UnionMatchError(union, raw);
}
