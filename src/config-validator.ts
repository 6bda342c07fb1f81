import type { Config } from './config';
import type { TypeDescriptor } from './types/descriptors';
import { CollectionOrigin } from './types/collection';
import { CompositeType } from './types/composite';
import { LeafType } from './types/leaf';
import { SKIP_FIELD, type PathSpec } from './path-spec';
import { isPlainObject } from './guards';
import { isArrayOf, isBoolean, isFunction, isString } from './utils/type-guards';

const FLAG_NAMES = [
  'checkTypes',
  'strict',
  'strictUnionsMatch',
  'allowSuperclasses',
  'followTypeHints'
] as const;

const isStringList = isArrayOf(isString);

/**
 * Checks whether a value is one of the descriptor shapes built by `t.*` or
 * `defineComposite`.
 */
export function isTypeDescriptor(value: unknown): value is TypeDescriptor {
  if (value instanceof LeafType || value instanceof CompositeType) return true;
  if (!isPlainObject(value)) return false;

  switch (value.kind) {
    case 'union':
      return Array.isArray(value.members);
    case 'collection':
      return value.origin instanceof CollectionOrigin && Array.isArray(value.elements);
    case 'reference':
      return isString(value.name);
    default:
      return false;
  }
}

function isPathSpec(value: unknown): value is PathSpec {
  if (value === SKIP_FIELD || isString(value)) return true;
  return isStringList(value) && value.length > 0;
}

/**
 * Validates the runtime integrity of a normalized configuration.
 *
 * The option types already describe the contract; this catches what the
 * compiler can not see (untyped callers, tables built dynamically) before a
 * conversion runs into it halfway through the input.
 *
 * @throws Error naming the offending option.
 */
export function validateConfig(config: Config): Config {
  // 1. Hooks: descriptor keys, callable values
  for (const [type, hook] of config.typeHooks) {
    if (!isTypeDescriptor(type)) {
      throw new Error(
        `[mapping-hydrator] Invalid "typeHooks": keys must be type descriptors, got ${typeof type}.`
      );
    }
    if (!isFunction(hook)) {
      throw new Error(
        `[mapping-hydrator] Invalid "typeHooks": the hook for a "${type.kind}" type is not a function.`
      );
    }
  }

  // 2. Cast targets: leaves or collection origins only
  for (const target of config.castTargets) {
    if (!(target instanceof LeafType) && !(target instanceof CollectionOrigin)) {
      throw new Error(
        `[mapping-hydrator] Invalid "castTargets": expected leaf types or collection origins (e.g. t.string, origins.sequence).`
      );
    }
  }

  // 3. Forward references: name -> descriptor
  if (config.forwardReferences !== undefined) {
    if (!isPlainObject(config.forwardReferences)) {
      throw new Error(
        `[mapping-hydrator] Invalid "forwardReferences": expected a plain object mapping names to types.`
      );
    }
    for (const [name, type] of Object.entries(config.forwardReferences)) {
      if (!isTypeDescriptor(type)) {
        throw new Error(
          `[mapping-hydrator] Invalid "forwardReferences": "${name}" is not a type descriptor.`
        );
      }
    }
  }

  // 4. Flags
  for (const flag of FLAG_NAMES) {
    if (!isBoolean(config[flag])) {
      throw new Error(
        `[mapping-hydrator] Invalid "${flag}": expected a boolean, got ${typeof config[flag]}.`
      );
    }
  }

  // 5. Field paths: only declared fields, well-formed path-specs
  for (const [composite, table] of config.fieldPaths) {
    if (!(composite instanceof CompositeType)) {
      throw new Error(
        `[mapping-hydrator] Invalid "fieldPaths": keys must be composite types created by defineComposite.`
      );
    }

    for (const [fieldName, pathSpec] of Object.entries(table)) {
      if (!Object.hasOwn(composite.fields, fieldName)) {
        throw new Error(
          `[mapping-hydrator] Invalid "fieldPaths" for "${composite.name}": "${fieldName}" is not a declared field.`
        );
      }
      if (!isPathSpec(pathSpec)) {
        throw new Error(
          `[mapping-hydrator] Invalid "fieldPaths" for "${composite.name}.${fieldName}": ` +
            `expected a dotted path, a non-empty list of dotted paths, or SKIP_FIELD.`
        );
      }
    }
  }

  return config;
}
