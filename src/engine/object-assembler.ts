import type { Config } from '../config';
import type { CompositeType } from '../types/composite';
import { type FieldPathTable, type PathSpec, SKIP_FIELD } from '../path-spec';
import {
  FieldError,
  FrozenInstanceError,
  MissingValueError,
  UnexpectedDataError,
  WrongTypeError
} from '../errors';
import { type Mapping, hasKey, mappingKeys, readKey } from '../guards';
import { type PathFallback, hasPath, resolvePathSpec } from '../navigator';
import {
  type DefaultResult,
  type FieldDescriptor,
  found,
  lookupDefault,
  resolveFieldTypes
} from '../reflector';
import { conformsToFieldType } from './type-checks';
import { instantiate } from './instantiator';
import { buildValue } from './value-builder';

/**
 * Field values split by how the instantiator applies them.
 */
export type AssembledFields = {
  /**
   * Passed to the composite's constructor.
   */
  construction: Record<string, unknown>;

  /**
   * Assigned on the instance afterwards (`init: false` fields).
   */
  postConstruction: Record<string, unknown>;
};

/**
 * Runs `build`, prefixing the location of any field error it raises with
 * `segment`.
 */
function withFieldPath<T>(segment: string, build: () => T): T {
  try {
    return build();
  } catch (error) {
    if (error instanceof FieldError) error.prependPath(segment);
    throw error;
  }
}

function pathSpecFor(
  table: FieldPathTable | undefined,
  fieldName: string
): PathSpec | undefined {
  if (!table || !Object.hasOwn(table, fieldName)) return undefined;
  return table[fieldName];
}

/**
 * Strict mode: input keys that name no field, checked once per mapping.
 */
function assertNoUnexpectedKeys(
  composite: CompositeType<object>,
  fields: readonly FieldDescriptor[],
  raw: Mapping
): void {
  const declared = new Set(fields.map(field => field.name));
  const unexpected = mappingKeys(raw)
    .filter(key => typeof key !== 'string' || !declared.has(key))
    .map(String);

  if (unexpected.length > 0) {
    throw new UnexpectedDataError(unexpected, composite.name);
  }
}

/**
 * The field's own default, for fields the input does not supply.
 *
 * A field without one is skipped when it is not a construction field, and
 * missing otherwise.
 */
function resolveDefault(field: FieldDescriptor): DefaultResult {
  const fallback = lookupDefault(field.defaultRule);
  if (fallback.success || !field.participatesInConstruction) return fallback;

  throw new MissingValueError(field.name);
}

/**
 * A frozen composite never takes post-construction values from the input.
 * Its `init: false` fields keep their defaults.
 */
function assertAssignable(
  composite: CompositeType<object>,
  field: FieldDescriptor
): void {
  if (composite.frozen && !field.participatesInConstruction) {
    throw new FrozenInstanceError(composite.name, field.name);
  }
}

/**
 * Resolves one field.
 *
 * Sources, first applicable wins:
 * 1. A `SKIP_FIELD` path-spec: the input is not consulted and the field
 *    resolves from its default alone.
 * 2. Any other registered path-spec: the value is looked up in the whole
 *    input (the field's default, or a `MissingValueError` when it has none,
 *    serves as the lookup fallback) and built. No type check follows.
 * 3. A direct key named after the field: the value is built and, with
 *    `checkTypes`, verified against the declared type.
 * 4. The field's default (see {@link resolveDefault}).
 *
 * @returns a missing result when the field stays unset.
 */
function resolveField(
  composite: CompositeType<object>,
  field: FieldDescriptor,
  raw: Mapping,
  pathSpec: PathSpec | undefined,
  config: Config
): DefaultResult {
  // 1. Skipped
  if (pathSpec === SKIP_FIELD) return resolveDefault(field);

  // 2. Remapped
  if (pathSpec !== undefined) {
    const candidates = typeof pathSpec === 'string' ? [pathSpec] : pathSpec;
    if (candidates.some(path => hasPath(path, raw))) assertAssignable(composite, field);

    const fallbackDefault = lookupDefault(field.defaultRule);
    const fallback: PathFallback = fallbackDefault.success
      ? { value: fallbackDefault.value }
      : new MissingValueError(field.name);

    const value = resolvePathSpec(pathSpec, raw, fallback);
    return found(withFieldPath(field.name, () => buildValue(field.type, value, config)));
  }

  // 3. Direct key
  if (hasKey(raw, field.name)) {
    assertAssignable(composite, field);

    const value = withFieldPath(field.name, () =>
      buildValue(field.type, readKey(raw, field.name), config)
    );

    if (config.checkTypes && !conformsToFieldType(value, field.type, config)) {
      throw new WrongTypeError(field.type, value, field.name);
    }
    return found(value);
  }

  // 4. Default
  return resolveDefault(field);
}

/**
 * Resolves every field of a composite from one input mapping.
 *
 * Steps:
 * 1. Reflect the composite's fields (cached).
 * 2. In strict mode, reject undeclared input keys.
 * 3. Resolve each field in declaration order (see {@link resolveField}).
 * 4. Route each value to construction or post-construction.
 *
 * Errors from nested builds carry the field name prepended to their path.
 *
 * @throws MappingError | any hook or constructor error
 */
export function assembleFields(
  composite: CompositeType<object>,
  raw: Mapping,
  config: Config
): AssembledFields {
  // 1. Reflect
  const fields = resolveFieldTypes(composite, config);

  // 2. Strict keys
  if (config.strict) assertNoUnexpectedKeys(composite, fields, raw);

  // 3. Resolve
  const pathTable = config.fieldPaths.get(composite);
  const assembled: AssembledFields = { construction: {}, postConstruction: {} };

  for (const field of fields) {
    const result = resolveField(
      composite,
      field,
      raw,
      pathSpecFor(pathTable, field.name),
      config
    );
    if (!result.success) continue;

    // 4. Route
    const target = field.participatesInConstruction
      ? assembled.construction
      : assembled.postConstruction;
    target[field.name] = result.value;
  }

  return assembled;
}

/**
 * Assembles and instantiates a composite from an input mapping.
 */
export function hydrateComposite<T extends object>(
  composite: CompositeType<T>,
  raw: Mapping,
  config: Config
): T {
  const { construction, postConstruction } = assembleFields(composite, raw, config);
  return instantiate(composite, construction, postConstruction);
}
