import type { ExplicitTypeDescriptors } from '../architecture';
import type { StandardSchemaV1 } from '@standard-schema/spec';
import type { CollectionType } from './collection';
import type { ForwardRef, TypeDescriptor, UnionType } from './descriptors';
import { LeafType, type LeafSpec } from './leaf';
import {
  BigIntType,
  BooleanType,
  EnumType,
  IntegerType,
  NullType,
  NumberType,
  StringType,
  UnknownType,
  origins
} from './builtins';
import { runSchema, validateWithSchema } from '../validator';

type EnumValue = string | number;

/**
 * Collects member values from either a value list or an enum-like object.
 *
 * Numeric TypeScript enums carry reverse mappings (`{ A: 0, 0: 'A' }`); keys
 * that are canonical numeric strings are skipped so only forward values remain.
 */
function collectEnumValues(
  members: Readonly<Record<string, EnumValue>> | readonly EnumValue[]
): Set<EnumValue> {
  if (Array.isArray(members)) return new Set(members);

  const values = new Set<EnumValue>();
  for (const [key, value] of Object.entries(members)) {
    if (String(Number(key)) === key) continue;
    values.add(value);
  }
  return values;
}

function union(...members: TypeDescriptor[]): UnionType {
  return { kind: 'union', members };
}

function collection(
  origin: CollectionType['origin'],
  elements: TypeDescriptor[],
  variadic = false
): CollectionType {
  return { kind: 'collection', origin, elements, variadic };
}

/**
 * Type descriptor builders. See {@link ExplicitTypeDescriptors}.
 *
 * @example
 * ```ts
 * const Tags = t.array(t.string);
 * const Port = t.union(t.integer, t.string);
 * const Parent = t.optional(t.ref('Node'));
 * ```
 */
export const t = {
  string: StringType,
  integer: IntegerType,
  number: NumberType,
  boolean: BooleanType,
  bigint: BigIntType,
  null: NullType,
  unknown: UnknownType,
  Enum: EnumType,

  union,

  optional(type: TypeDescriptor): UnionType {
    return union(type, NullType);
  },

  array(element: TypeDescriptor): CollectionType {
    return collection(origins.sequence, [element]);
  },

  set(element: TypeDescriptor): CollectionType {
    return collection(origins.set, [element]);
  },

  /**
   * A mapping. Keys are carried over as-is; only values are converted.
   */
  record(key: TypeDescriptor, value: TypeDescriptor): CollectionType {
    return collection(origins.mapping, [key, value]);
  },

  /**
   * A fixed-length tuple with one type per position.
   */
  tuple(...elements: TypeDescriptor[]): CollectionType {
    return collection(origins.tuple, elements);
  },

  /**
   * A homogeneous tuple of any length.
   */
  tupleOf(element: TypeDescriptor): CollectionType {
    return collection(origins.tuple, [element], true);
  },

  /**
   * A reference resolved through `config.forwardReferences`.
   */
  ref(name: string): ForwardRef {
    return { kind: 'reference', name };
  },

  /**
   * A reference resolved by calling `resolve`, for declarations that must
   * point at themselves or at a later declaration.
   */
  lazy(resolve: () => TypeDescriptor, name = 'lazy'): ForwardRef {
    return { kind: 'reference', name, resolve };
  },

  leaf<T>(name: string, spec: LeafSpec<T>, parent?: LeafType): LeafType<T> {
    return new LeafType(name, spec, parent);
  },

  /**
   * An enumeration leaf, child of {@link EnumType}.
   *
   * Members are the enumeration's values (as TypeScript enums represent
   * them). Construction accepts a member value and rejects anything else.
   */
  enumeration(
    name: string,
    members: Readonly<Record<string, EnumValue>> | readonly EnumValue[]
  ): LeafType<EnumValue> {
    const values = collectEnumValues(members);
    const isMember = (value: unknown): value is EnumValue =>
      (typeof value === 'string' || typeof value === 'number') &&
      values.has(value);

    return EnumType.extend(name, {
      test: isMember,
      construct: value => {
        if (isMember(value)) return value;
        throw new TypeError(`${JSON.stringify(value)} is not a valid ${name}`);
      }
    });
  },

  /**
   * A leaf backed by a Standard Schema V1 validator (Zod, Valibot, ...).
   *
   * - Instance check: the schema reports no issues.
   * - Construction (cast): the schema's output value; issues throw.
   */
  schema<S extends StandardSchemaV1>(
    name: string,
    schema: S,
    parent?: LeafType
  ): LeafType<StandardSchemaV1.InferOutput<S>> {
    const test = (value: unknown): value is StandardSchemaV1.InferOutput<S> =>
      !runSchema(schema, value, name).issues;

    return new LeafType(
      name,
      { test, construct: value => validateWithSchema(schema, value, name) },
      parent
    );
  }
};
