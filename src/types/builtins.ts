import { CollectionOrigin } from './collection';
import { LeafType } from './leaf';
import {
  isBigInt,
  isBoolean,
  isInteger,
  isNull,
  isNumber,
  isString
} from '../utils/type-guards';
import { toDecimal, toInteger } from '../utils/numeric';

export const StringType = new LeafType<string>('string', {
  test: isString,
  construct: value => String(value)
});

/**
 * Integral numbers. `integer` and `number` are siblings, not parent and
 * child: a number leaf accepts every number, but an integer leaf is never an
 * ancestor of `number`.
 *
 * Parsed input does not tell `1` from `1.0`, so both leaves accept an
 * integral number. Under `strictUnionsMatch`, `t.union(t.integer, t.number)`
 * therefore raises `StrictUnionMatchError` for such input.
 */
export const IntegerType = new LeafType<number>('integer', {
  test: isInteger,
  construct: toInteger
});

export const NumberType = new LeafType<number>('number', {
  test: isNumber,
  construct: toDecimal
});

export const BooleanType = new LeafType<boolean>('boolean', {
  test: isBoolean,
  construct: value => Boolean(value)
});

export const BigIntType = new LeafType<bigint>('bigint', {
  test: isBigInt,
  construct: value => {
    if (isBigInt(value)) return value;
    if (isString(value) || isNumber(value) || isBoolean(value)) {
      return BigInt(value);
    }
    throw new TypeError(
      `can not convert a value of type "${typeof value}" to bigint`
    );
  }
});

/**
 * The null type. `undefined` is deliberately not accepted: parsed input
 * never contains it.
 */
export const NullType = new LeafType<null>('null', {
  test: isNull,
  construct: () => null
});

export const UnknownType = new LeafType<unknown>('unknown', {
  test: (value: unknown): value is unknown => true,
  construct: value => value
});

/**
 * Abstract base of every enumeration leaf. Accepts nothing by itself; name it
 * as a cast target to cast all enumerations at once.
 */
export const EnumType = new LeafType<never>('Enum', {
  test: (value: unknown): value is never => false
});

const collectionRoot = new CollectionOrigin('Collection', 'collection');
const sequenceOrigin = new CollectionOrigin('Array', 'sequence', collectionRoot);

/**
 * Container families usable as cast targets.
 */
export const origins = {
  collection: collectionRoot,
  sequence: sequenceOrigin,
  tuple: new CollectionOrigin('Tuple', 'tuple', sequenceOrigin),
  set: new CollectionOrigin('Set', 'set', collectionRoot),
  mapping: new CollectionOrigin('Record', 'mapping', collectionRoot)
} as const;
