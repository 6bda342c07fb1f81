import type { Ancestral } from './descriptors';
import { compositeOfInstance } from './composite';
import {
  BigIntType,
  BooleanType,
  IntegerType,
  NullType,
  NumberType,
  StringType,
  origins
} from './builtins';
import { isMapping } from '../guards';

/**
 * The runtime type of a value, as the ancestry checks see it.
 *
 * Mapping:
 * - `null`              -> null
 * - string / boolean    -> string / boolean
 * - integral number     -> integer, other numbers -> number
 * - bigint              -> bigint
 * - array / Set         -> sequence / set origin
 * - plain object / Map  -> mapping origin
 * - composite instance  -> its registered composite
 *
 * Anything else (`undefined`, functions, unregistered class instances) has
 * no runtime type and yields `undefined`.
 */
export function runtimeTypeOf(value: unknown): Ancestral | undefined {
  switch (typeof value) {
    case 'string':
      return StringType;
    case 'boolean':
      return BooleanType;
    case 'number':
      return Number.isInteger(value) ? IntegerType : NumberType;
    case 'bigint':
      return BigIntType;
    case 'object':
      if (value === null) return NullType;
      if (Array.isArray(value)) return origins.sequence;
      if (value instanceof Set) return origins.set;
      if (isMapping(value)) return origins.mapping;
      return compositeOfInstance(value);
    default:
      return undefined;
  }
}
