import type { FieldSpec } from '../types/composite';
import type { TypeDescriptor } from '../types/descriptors';
import { NullType } from '../types/builtins';

/**
 * How a field obtains a value when the input does not supply one.
 *
 * Precedence (first match wins):
 * 1. `value`: an explicit default, returned as-is (also when `undefined`)
 * 2. `factory`: called once per conversion that needs it
 * 3. `optional`: the type admits null, so the default is `null`
 * 4. `none`: the field is required (or, when it does not take part in
 *    construction, left unset)
 */
export type DefaultRule =
  | { readonly kind: 'value'; readonly value: unknown }
  | { readonly kind: 'factory'; readonly factory: () => unknown }
  | { readonly kind: 'optional' }
  | { readonly kind: 'none' };

export type DefaultFound<T = unknown> = {
  success: true;
  value: T;
};

export type DefaultMissing = {
  success: false;
};

/**
 * Outcome of a default lookup.
 *
 * Distinguishes "the default is `undefined`" (found, `value === undefined`)
 * from "there is no default" (missing).
 */
export type DefaultResult<T = unknown> = DefaultFound<T> | DefaultMissing;

export const NO_DEFAULT: DefaultMissing = { success: false } as const;

export function found<T>(value: T): DefaultFound<T> {
  return { success: true, value };
}

/**
 * A union admits null when one of its members is the null leaf.
 */
export function isOptional(type: TypeDescriptor): boolean {
  return type.kind === 'union' && type.members.includes(NullType);
}

export function defaultRuleOf(spec: FieldSpec, type: TypeDescriptor): DefaultRule {
  if (spec.default) return { kind: 'value', value: spec.default.value };
  if (spec.defaultFactory) return { kind: 'factory', factory: spec.defaultFactory };
  if (isOptional(type)) return { kind: 'optional' };
  return { kind: 'none' };
}

/**
 * Evaluates a default rule. Factories run on every call.
 */
export function lookupDefault(rule: DefaultRule): DefaultResult {
  switch (rule.kind) {
    case 'value':
      return found(rule.value);
    case 'factory':
      return found(rule.factory());
    case 'optional':
      return found(null);
    case 'none':
      return NO_DEFAULT;
  }
}
