import type { CollectionOrigin } from './types/collection';
import type { CompositeType } from './types/composite';
import type { TypeDescriptor } from './types/descriptors';
import type { LeafType } from './types/leaf';
import type { FieldPathTable } from './path-spec';
import { validateConfig } from './config-validator';

export { SKIP_FIELD } from './path-spec';
export type { FieldPathTable, PathSpec } from './path-spec';

/**
 * Transform applied to a raw value before it is built against the exact
 * descriptor the hook is registered for. Exceptions propagate.
 */
export type TypeHook = (value: unknown) => unknown;

/**
 * A type whose presence in a target's ancestry forces construction.
 *
 * Leaves are constructed with their single-argument constructor; collection
 * origins rebuild the value as their container.
 */
export type CastTarget = LeafType | CollectionOrigin;

/**
 * Name -> descriptor table used to resolve `t.ref(name)`. Owned by the
 * caller; reflection results are cached per table object.
 */
export type ForwardReferences = Readonly<Record<string, TypeDescriptor>>;

export type ConfigOptions = {
  /**
   * Hooks keyed by descriptor identity: a hook registered for `t.string`
   * does not run for a leaf derived from it.
   *
   * @default empty
   */
  typeHooks?: Iterable<readonly [TypeDescriptor, TypeHook]>;

  /**
   * Ordered; the first target that is an ancestor of (or equal to) the
   * declared type applies.
   *
   * @default []
   */
  castTargets?: readonly CastTarget[];

  /**
   * @default undefined
   */
  forwardReferences?: ForwardReferences;

  /**
   * Verify built field values against their declared types.
   *
   * @default true
   */
  checkTypes?: boolean;

  /**
   * Reject input keys that match no declared field.
   *
   * @default false
   */
  strict?: boolean;

  /**
   * Require exactly one union member to accept a value.
   *
   * @default false
   */
  strictUnionsMatch?: boolean;

  /**
   * Accept a value whose runtime type is an ancestor of the declared type.
   *
   * @default false
   */
  allowSuperclasses?: boolean;

  /**
   * Parse bare strings into `integer`/`number` leaves.
   *
   * @default false
   */
  followTypeHints?: boolean;

  /**
   * Per-composite field remapping.
   *
   * @default empty
   */
  fieldPaths?: Iterable<readonly [CompositeType<object>, FieldPathTable]>;
};

/**
 * Normalized, frozen configuration read by every conversion step.
 */
export type Config = {
  readonly typeHooks: ReadonlyMap<TypeDescriptor, TypeHook>;
  readonly castTargets: readonly CastTarget[];
  readonly forwardReferences: ForwardReferences | undefined;
  readonly checkTypes: boolean;
  readonly strict: boolean;
  readonly strictUnionsMatch: boolean;
  readonly allowSuperclasses: boolean;
  readonly followTypeHints: boolean;
  readonly fieldPaths: ReadonlyMap<CompositeType<object>, FieldPathTable>;
};

const createdConfigs = new WeakSet<object>();

/**
 * Builds a configuration.
 *
 * Steps:
 * 1. Copy hook and path tables into fresh maps (callers may keep mutating
 *    theirs).
 * 2. Fill defaults.
 * 3. Validate.
 * 4. Freeze.
 *
 * `forwardReferences` is kept by identity so that conversions sharing one
 * table also share reflection results.
 *
 * @throws Error (prefixed `[mapping-hydrator]`) for malformed options.
 *
 * @example
 * ```ts
 * const config = createConfig({
 *   typeHooks: [[t.string, value => (isString(value) ? value.trim() : value)]],
 *   fieldPaths: [[UserType, { email: ['contact.email', 'email'] }]],
 *   strict: true
 * });
 * ```
 */
export function createConfig(options: ConfigOptions = {}): Config {
  const config: Config = {
    typeHooks: new Map<TypeDescriptor, TypeHook>(options.typeHooks ?? []),
    castTargets: [...(options.castTargets ?? [])],
    forwardReferences: options.forwardReferences,
    checkTypes: options.checkTypes ?? true,
    strict: options.strict ?? false,
    strictUnionsMatch: options.strictUnionsMatch ?? false,
    allowSuperclasses: options.allowSuperclasses ?? false,
    followTypeHints: options.followTypeHints ?? false,
    fieldPaths: new Map<CompositeType<object>, FieldPathTable>(
      options.fieldPaths ?? []
    )
  };

  validateConfig(config);

  Object.freeze(config.castTargets);
  createdConfigs.add(config);
  return Object.freeze(config);
}

function isConfig(value: Config | ConfigOptions): value is Config {
  return createdConfigs.has(value);
}

const DEFAULT_CONFIG = createConfig();

/**
 * Accepts either a built configuration or raw options.
 */
export function resolveConfig(config?: Config | ConfigOptions): Config {
  if (config === undefined) return DEFAULT_CONFIG;
  return isConfig(config) ? config : createConfig(config);
}
