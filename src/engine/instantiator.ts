import type { PostConstructionAssignmentPolicy } from '../architecture';
import type { CompositeType } from '../types/composite';
import { FrozenInstanceError } from '../errors';

/**
 * Creates a composite instance from assembled field values.
 *
 * Steps:
 * 1. Construct from the construction-time fields.
 * 2. Assign the post-construction fields on the instance.
 * 3. Freeze the instance when the composite is declared `frozen`.
 *
 * For a frozen composite the post-construction fields only ever carry
 * defaults: assembly refuses input values for them.
 *
 * A refused assignment (an instance the constructor already froze, a
 * getter-only property) raises instead of losing the value. See
 * {@link PostConstructionAssignmentPolicy}.
 *
 * @throws FrozenInstanceError
 */
export function instantiate<T extends object>(
  composite: CompositeType<T>,
  construction: Readonly<Record<string, unknown>>,
  postConstruction: Readonly<Record<string, unknown>>
): T {
  // 1. Construct
  const instance = composite.construct(construction);

  // 2. Assign
  for (const [name, value] of Object.entries(postConstruction)) {
    if (!Reflect.set(instance, name, value)) {
      throw new FrozenInstanceError(composite.name, name);
    }
  }

  // 3. Freeze
  if (composite.frozen) Object.freeze(instance);

  return instance;
}
