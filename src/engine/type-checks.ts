import type { Config } from '../config';
import type { CollectionType } from '../types/collection';
import { type Ancestral, type TypeDescriptor, isAncestor } from '../types/descriptors';
import { UnknownType } from '../types/builtins';
import { runtimeTypeOf } from '../types/runtime-type';
import { isIterableCollection, isPlainObject } from '../guards';
import { resolveReference } from '../reflector';

type ReferenceTable = Pick<Config, 'forwardReferences'>;

/**
 * The node a descriptor occupies in the ancestry graph: leaves and
 * composites are their own node, collections sit under their origin.
 * Unions and references have none.
 */
export function ancestryOf(type: TypeDescriptor): Ancestral | undefined {
  switch (type.kind) {
    case 'leaf':
    case 'composite':
      return type;
    case 'collection':
      return type.origin;
    default:
      return undefined;
  }
}

/**
 * `true` when the value's runtime type is an ancestor of (or equal to) the
 * declared type: the relation `allowSuperclasses` relaxes checks with.
 */
export function isRuntimeAncestorOf(value: unknown, type: TypeDescriptor): boolean {
  const runtimeType = runtimeTypeOf(value);
  const declared = ancestryOf(type);
  return (
    runtimeType !== undefined &&
    declared !== undefined &&
    isAncestor(runtimeType, declared)
  );
}

function elementTypeAt(collection: CollectionType, index: number): TypeDescriptor {
  return collection.elements[index] ?? UnknownType;
}

function everyElement(
  items: Iterable<unknown>,
  type: TypeDescriptor,
  config: ReferenceTable
): boolean {
  for (const item of items) {
    if (!isInstance(item, type, config)) return false;
  }
  return true;
}

function isCollectionInstance(
  value: unknown,
  type: CollectionType,
  config: ReferenceTable
): boolean {
  switch (type.origin.shape) {
    case 'set':
      return value instanceof Set && everyElement(value, elementTypeAt(type, 0), config);

    case 'mapping': {
      const keyType = elementTypeAt(type, 0);
      const valueType = elementTypeAt(type, 1);

      if (value instanceof Map) {
        return (
          everyElement(value.keys(), keyType, config) &&
          everyElement(value.values(), valueType, config)
        );
      }
      return isPlainObject(value) && everyElement(Object.values(value), valueType, config);
    }

    case 'tuple':
      if (!Array.isArray(value)) return false;
      if (type.variadic) return everyElement(value, elementTypeAt(type, 0), config);
      return type.elements.every((elementType, index) =>
        isInstance(value[index], elementType, config)
      );

    case 'sequence':
      return Array.isArray(value) && everyElement(value, elementTypeAt(type, 0), config);

    case 'collection':
      return isIterableCollection(value) && everyElement(value, elementTypeAt(type, 0), config);
  }
}

/**
 * Structural instance-of check against a full descriptor.
 *
 * - leaf: the leaf's own test
 * - composite: `instanceof` the composite's class
 * - union: any member
 * - sequence / set: the declared container, every element conforming
 * - mapping: a plain object or `Map` whose values conform (and keys, for
 *   `Map`s)
 * - tuple: an array whose declared positions conform (every element, when
 *   variadic)
 * - reference: its target
 */
export function isInstance(
  value: unknown,
  type: TypeDescriptor,
  config: ReferenceTable
): boolean {
  switch (type.kind) {
    case 'leaf':
      return type.accepts(value);
    case 'composite':
      return type.isInstance(value);
    case 'union':
      return type.members.some(member => isInstance(value, member, config));
    case 'collection':
      return isCollectionInstance(value, type, config);
    case 'reference':
      return isInstance(value, resolveReference(type, config.forwardReferences), config);
  }
}

/**
 * Whether the first element of a sequence may stand for the declared
 * element type: it conforms, or its runtime type is an ancestor of the
 * declared type.
 */
function isElementAssignable(
  element: unknown,
  declared: TypeDescriptor,
  config: ReferenceTable
): boolean {
  return isRuntimeAncestorOf(element, declared) || isInstance(element, declared, config);
}

/**
 * Post-build verification of a directly supplied field value.
 *
 * Rules, first applicable wins:
 * 1. `allowSuperclasses` and a union: some member descends from the value's
 *    runtime type.
 * 2. A sequence: the value is an array and, when non-empty, its first
 *    element is assignable to the element type. Later elements are not
 *    inspected.
 * 3. `allowSuperclasses` and a leaf/composite whose ancestry includes the
 *    value's runtime type: pass.
 * 4. Otherwise the structural {@link isInstance} check.
 */
export function conformsToFieldType(
  value: unknown,
  type: TypeDescriptor,
  config: Pick<Config, 'forwardReferences' | 'allowSuperclasses'>
): boolean {
  // 1. Superclass-tolerant unions
  if (config.allowSuperclasses && type.kind === 'union') {
    return type.members.some(member => isRuntimeAncestorOf(value, member));
  }

  // 2. Sequences: container plus first element
  if (type.kind === 'collection' && type.origin.shape === 'sequence') {
    if (!Array.isArray(value)) return false;
    return (
      value.length === 0 ||
      isElementAssignable(value[0], elementTypeAt(type, 0), config)
    );
  }

  // 3. Superclass-tolerant leaves and composites
  const isPlain = type.kind === 'leaf' || type.kind === 'composite';
  if (config.allowSuperclasses && isPlain && isRuntimeAncestorOf(value, type)) {
    return true;
  }

  // 4. Structural check
  return isInstance(value, type, config);
}
