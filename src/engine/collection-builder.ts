import type { PermissiveCollectionFallback } from '../architecture';
import type { Config } from '../config';
import type { CollectionType } from '../types/collection';
import type { TypeDescriptor } from '../types/descriptors';
import { UnknownType } from '../types/builtins';
import { type Mapping, isIterableCollection, isMapping } from '../guards';
import { buildValue } from './value-builder';

function buildMapping(
  raw: Mapping,
  valueType: TypeDescriptor,
  config: Config
): Mapping {
  if (raw instanceof Map) {
    return new Map(
      Array.from(raw, ([key, item]): [unknown, unknown] => [
        key,
        buildValue(valueType, item, config)
      ])
    );
  }

  return Object.fromEntries(
    Object.entries(raw).map(([key, item]): [string, unknown] => [
      key,
      buildValue(valueType, item, config)
    ])
  );
}

/**
 * Pairs positional types with items, padding the shorter side: an item
 * without a type is kept as-is, a type without an item is built from
 * `null`.
 */
function buildFixedTuple(
  items: readonly unknown[],
  elements: readonly TypeDescriptor[],
  config: Config
): unknown[] {
  const length = Math.max(items.length, elements.length);

  return Array.from({ length }, (_, index) => {
    const item = index < items.length ? items[index] : null;
    if (index >= elements.length) return item;

    return buildValue(elements[index], item, config);
  });
}

/**
 * Rebuilds a collection element by element.
 *
 * Shapes:
 * - mapping target, mapping input: same container (`Map` or plain object)
 *   and key order, values built against the value type; keys are kept
 * - tuple target, iterable input:
 *   - empty input -> `[]`
 *   - variadic -> every item built against the single element type
 *   - fixed -> positional, see {@link buildFixedTuple}
 * - sequence / set target, iterable input: every item built against the
 *   element type, wrapped in the declared container (array or `Set`)
 *
 * Any other pairing returns the input unchanged; whether that is an error
 * is left to the type check. See {@link PermissiveCollectionFallback}.
 */
export function buildCollection(
  collection: CollectionType,
  raw: unknown,
  config: Config
): unknown {
  const { origin, elements, variadic } = collection;

  // 1. Mappings
  if (origin.shape === 'mapping') {
    if (!isMapping(raw)) return raw;
    return buildMapping(raw, elements[1] ?? UnknownType, config);
  }

  if (!isIterableCollection(raw)) return raw;
  const items = Array.from(raw);

  // 2. Tuples
  if (origin.shape === 'tuple') {
    if (items.length === 0) return [];
    if (!variadic) return buildFixedTuple(items, elements, config);
  }

  // 3. Sequences, sets and variadic tuples
  const elementType = elements[0] ?? UnknownType;
  return origin.fromItems(items.map(item => buildValue(elementType, item, config)));
}
