import type { Config } from '../config';
import type { TypeDescriptor } from '../types/descriptors';
import { isAncestor } from '../types/descriptors';
import { IntegerType, NumberType } from '../types/builtins';
import { isMapping } from '../guards';
import { isString } from '../utils/type-guards';
import { parseDecimal, parseInteger } from '../utils/numeric';
import { isOptional, resolveReference } from '../reflector';
import { ancestryOf } from './type-checks';
import { resolveUnion } from './union-resolver';
import { buildCollection } from './collection-builder';
import { hydrateComposite } from './object-assembler';

/**
 * Whether a configured cast target applies to the declared type: the
 * target is the type's ancestry node or one of its parents.
 */
function hasCastTarget(type: TypeDescriptor, config: Config): boolean {
  const node = ancestryOf(type);
  if (!node) return false;

  return config.castTargets.some(target => isAncestor(target, node));
}

/**
 * Casting pass. The declared type's own constructor runs, not the cast
 * target's: a target only selects which declared types get constructed.
 */
function castValue(type: TypeDescriptor, value: unknown): unknown {
  switch (type.kind) {
    case 'collection':
      return type.origin.from(value);
    case 'leaf':
      return type.construct(value);
    default:
      return value;
  }
}

/**
 * Builds a typed value from raw input.
 *
 * Steps, in order:
 * 1. Hook: the hook registered for this exact descriptor transforms the raw
 *    value. Hook failures propagate.
 * 2. Null short-circuit: a union admitting null returns a `null` value as-is.
 * 3. Dispatch:
 *    - union: {@link resolveUnion}
 *    - collection: {@link buildCollection}
 *    - composite with a mapping value: {@link hydrateComposite}
 *    - reference: built against its resolved target
 *    - leaf: unchanged
 * 4. Cast: when some cast target is an ancestor of (or equal to) the
 *    declared type, the value is constructed (leaves) or rebuilt as the
 *    declared container (collections). At most one cast applies.
 * 5. Type hints: without a cast and with `followTypeHints`, a string
 *    declared exactly as `integer` or `number` is parsed strictly.
 *
 * Already-typed values pass through steps 2 to 5 unchanged.
 *
 * @throws MappingError | NumericFormatError | any hook or constructor error
 */
export function buildValue(
  type: TypeDescriptor,
  raw: unknown,
  config: Config
): unknown {
  // 1. Hook
  const hook = config.typeHooks.get(type);
  let value = hook ? hook(raw) : raw;

  // 2. Null short-circuit
  if (value === null && isOptional(type)) return value;

  // 3. Dispatch
  switch (type.kind) {
    case 'union':
      value = resolveUnion(type, value, config);
      break;
    case 'collection':
      value = buildCollection(type, value, config);
      break;
    case 'composite':
      if (isMapping(value)) value = hydrateComposite(type, value, config);
      break;
    case 'reference':
      return buildValue(resolveReference(type, config.forwardReferences), value, config);
    case 'leaf':
      break;
  }

  // 4. Cast
  if (hasCastTarget(type, config)) return castValue(type, value);

  // 5. Type hints
  if (config.followTypeHints && isString(value)) {
    if (type === IntegerType) return parseInteger(value);
    if (type === NumberType) return parseDecimal(value);
  }

  return value;
}
