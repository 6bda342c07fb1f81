import type { DeferredReferenceResolution } from '../architecture';
import type { ForwardReferences } from '../config';
import type { ForwardRef, TypeDescriptor } from '../types/descriptors';
import { ForwardReferenceError } from '../errors';

function lookupReference(
  ref: ForwardRef,
  forwardReferences: ForwardReferences | undefined
): TypeDescriptor {
  if (ref.resolve) return ref.resolve();

  if (forwardReferences && Object.hasOwn(forwardReferences, ref.name)) {
    return forwardReferences[ref.name];
  }

  throw new ForwardReferenceError(`name '${ref.name}' is not defined`);
}

/**
 * Follows a reference to the first descriptor that is not itself a
 * reference.
 *
 * @throws ForwardReferenceError when a name is undefined, or when the chain
 *   of references loops back on itself before reaching a real type.
 */
export function resolveReference(
  ref: ForwardRef,
  forwardReferences: ForwardReferences | undefined
): TypeDescriptor {
  const chain: ForwardRef[] = [ref];
  let target = lookupReference(ref, forwardReferences);

  while (target.kind === 'reference') {
    const key = referenceKey(target);
    if (chain.some(step => referenceKey(step) === key)) {
      const names = [...chain, target].map(step => step.name).join(' -> ');
      throw new ForwardReferenceError(`reference cycle ${names}`);
    }
    chain.push(target);
    target = lookupReference(target, forwardReferences);
  }

  return target;
}

/**
 * Identifies what a reference points at: its thunk, or its name when it is
 * looked up in the table (`t.ref('Node')` written twice is one reference).
 */
export type ReferenceKey = string | (() => TypeDescriptor);

function referenceKey(ref: ForwardRef): ReferenceKey {
  return ref.resolve ?? ref.name;
}

/**
 * Replaces references with their targets, descending into unions and
 * collections.
 *
 * Traversal rules:
 * 1. Composites are not entered: their own fields are reflected when they
 *    are assembled.
 * 2. A reference met again while its own target is being walked (a
 *    recursive union or collection) stays a reference; the value builder
 *    resolves it when it reaches it.
 * 3. Unchanged unions and collections are returned as the same object.
 *
 * See {@link DeferredReferenceResolution}.
 */
export function resolveReferences(
  type: TypeDescriptor,
  forwardReferences: ForwardReferences | undefined,
  walking: ReadonlySet<ReferenceKey> = new Set()
): TypeDescriptor {
  switch (type.kind) {
    case 'leaf':
    case 'composite':
      return type;

    case 'reference': {
      const key = referenceKey(type);
      if (walking.has(key)) return type;
      const target = resolveReference(type, forwardReferences);
      return resolveReferences(target, forwardReferences, new Set([...walking, key]));
    }

    case 'union': {
      const members = type.members.map(member =>
        resolveReferences(member, forwardReferences, walking)
      );
      return sameItems(members, type.members) ? type : { kind: 'union', members };
    }

    case 'collection': {
      const elements = type.elements.map(element =>
        resolveReferences(element, forwardReferences, walking)
      );
      return sameItems(elements, type.elements) ? type : { ...type, elements };
    }
  }
}

function sameItems(
  left: readonly TypeDescriptor[],
  right: readonly TypeDescriptor[]
): boolean {
  return left.every((item, index) => item === right[index]);
}
