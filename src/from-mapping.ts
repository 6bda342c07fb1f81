import type { ConversionLifecycle } from './architecture';
import type { TypeDescriptor } from './types/descriptors';
import type { CompositeType } from './types/composite';
import { type Config, type ConfigOptions, resolveConfig } from './config';
import { formatValueType } from './types/format';
import { isMapping } from './guards';
import { hydrateComposite } from './engine/object-assembler';
import { buildValue } from './engine/value-builder';

/**
 * Converts a mapping into an instance of a composite type.
 *
 * See {@link ConversionLifecycle} for the phases.
 *
 * @param type - The composite to build.
 * @param data - A plain object or `Map`, typically parsed JSON/YAML.
 * @param config - A configuration from `createConfig`, or raw options.
 *
 * @throws TypeError when `data` is not a mapping.
 * @throws MappingError subclasses for conversion failures (with the dotted
 *   field path of the failure), and caller-owned errors (hooks, casts,
 *   numeric parsing) unwrapped.
 *
 * @example
 * ```ts
 * const user = fromMapping(UserType, JSON.parse(text), { strict: true });
 * ```
 */
export function fromMapping<T extends object>(
  type: CompositeType<T>,
  data: unknown,
  config?: Config | ConfigOptions
): T {
  if (!isMapping(data)) {
    throw new TypeError(
      `Expected a mapping (plain object or Map) to build "${type.name}", got ${formatValueType(data)}.`
    );
  }

  return hydrateComposite(type, data, resolveConfig(config));
}

/**
 * Builds a value of any descriptor: a collection of composites, a union, a
 * leaf with casts and hooks applied...
 *
 * Unlike {@link fromMapping}, no field-level type check runs on the result;
 * unions still reject values no member accepts.
 */
export function fromValue(
  type: TypeDescriptor,
  data: unknown,
  config?: Config | ConfigOptions
): unknown {
  return buildValue(type, data, resolveConfig(config));
}
