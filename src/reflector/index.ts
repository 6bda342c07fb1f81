import type { Config, ForwardReferences } from '../config';
import type { CompositeType } from '../types/composite';
import type { TypeDescriptor } from '../types/descriptors';
import { type DefaultRule, defaultRuleOf } from './defaults';
import { resolveReferences } from './references';

export {
  type DefaultResult,
  type DefaultRule,
  found,
  isOptional,
  lookupDefault
} from './defaults';
export { resolveReference, resolveReferences } from './references';

/**
 * A composite field, as the assembler consumes it.
 */
export type FieldDescriptor = {
  readonly name: string;

  /**
   * The declared type with references resolved (see {@link resolveReferences}).
   */
  readonly type: TypeDescriptor;

  /**
   * `false` for fields assigned on the instance after construction.
   */
  readonly participatesInConstruction: boolean;

  readonly defaultRule: DefaultRule;
};

/**
 * Cache key standing in for "no forward-reference table".
 */
const NO_REFERENCES: ForwardReferences = Object.freeze({});

const reflectionCache = new WeakMap<
  CompositeType<object>,
  WeakMap<ForwardReferences, readonly FieldDescriptor[]>
>();

function reflect(
  composite: CompositeType<object>,
  forwardReferences: ForwardReferences | undefined
): readonly FieldDescriptor[] {
  const fields = Object.entries(composite.fields).map(
    ([name, spec]): FieldDescriptor => {
      const type = resolveReferences(spec.type, forwardReferences);

      return {
        name,
        type,
        participatesInConstruction: spec.init,
        defaultRule: defaultRuleOf(spec, type)
      };
    }
  );

  return Object.freeze(fields);
}

/**
 * Lists a composite's fields in declaration order (inherited fields first),
 * with every forward reference resolved.
 *
 * Results are cached per composite and per `forwardReferences` table
 * object; a failed resolution is not cached, so defining the missing name
 * in a new table and retrying works.
 *
 * @throws ForwardReferenceError
 */
export function resolveFieldTypes(
  composite: CompositeType<object>,
  config: Pick<Config, 'forwardReferences'>
): readonly FieldDescriptor[] {
  const tableKey = config.forwardReferences ?? NO_REFERENCES;

  let byTable = reflectionCache.get(composite);
  if (!byTable) {
    byTable = new WeakMap();
    reflectionCache.set(composite, byTable);
  }

  const cached = byTable.get(tableKey);
  if (cached) return cached;

  const fields = reflect(composite, config.forwardReferences);
  byTable.set(tableKey, fields);
  return fields;
}
