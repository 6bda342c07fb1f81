import { describe, expect, test } from 'vitest';

import type { TestScenario } from '../../tests/types';
import { t } from '../builders';
import { origins } from '../builtins';
import { defineComposite, field } from '../composite';
import type { TypeDescriptor } from '../descriptors';
import { formatType, formatValue, formatValueType } from '../format';
import { runtimeTypeOf } from '../runtime-type';

/**
 * Test suite: runtime types and message formatting.
 */

class Shape {
  declare sides: number;
}
class Square extends Shape {}

const ShapeType = defineComposite(Shape, { fields: { sides: field(t.integer) } });

describe('formatType', () => {
  const scenarios: TestScenario<TypeDescriptor, string>[] = [
    { id: 'Leaf', description: 'Leaves render their name', input: t.integer, expected: 'integer' },
    {
      id: 'Optional',
      description: 'Unions join their members',
      input: t.optional(t.string),
      expected: 'string | null'
    },
    {
      id: 'Record',
      description: 'Mappings render key and value',
      input: t.record(t.string, t.integer),
      expected: 'Record<string, integer>'
    },
    {
      id: 'Tuple',
      description: 'Fixed tuples list their positions',
      input: t.tuple(t.string, t.integer),
      expected: '[string, integer]'
    },
    {
      id: 'Variadic Tuple',
      description: 'Variadic tuples render as a rest element',
      input: t.tupleOf(t.integer),
      expected: '[...integer[]]'
    },
    {
      id: 'Nested',
      description: 'Containers nest',
      input: t.array(t.set(t.optional(t.integer))),
      expected: 'Array<Set<integer | null>>'
    },
    { id: 'Composite', description: 'Composites render their name', input: ShapeType, expected: 'Shape' },
    { id: 'Reference', description: 'References render their name', input: t.ref('Json'), expected: 'Json' }
  ];

  test.for(scenarios)('[$id] $description', ({ input, expected }) => {
    expect(formatType(input)).toBe(expected);
  });
});

describe('formatValueType', () => {
  const scenarios: TestScenario<unknown, string>[] = [
    { id: 'String', description: 'Strings', input: 'a', expected: 'string' },
    { id: 'Integer', description: 'Integral numbers', input: 1, expected: 'integer' },
    { id: 'Number', description: 'Other numbers', input: 1.5, expected: 'number' },
    { id: 'Null', description: 'null', input: null, expected: 'null' },
    { id: 'Array', description: 'Arrays', input: [], expected: 'Array' },
    { id: 'Set', description: 'Sets', input: new Set(), expected: 'Set' },
    { id: 'Plain Object', description: 'Plain objects are mappings', input: {}, expected: 'Record' },
    { id: 'Map', description: 'Maps are mappings', input: new Map(), expected: 'Record' },
    {
      id: 'Composite',
      description: 'Instances of a registered class',
      input: new Shape(),
      expected: 'Shape'
    },
    {
      id: 'Unregistered Class',
      description: 'Other instances fall back to their constructor name',
      input: new Date(0),
      expected: 'Date'
    },
    { id: 'Undefined', description: 'undefined falls back to typeof', input: undefined, expected: 'undefined' }
  ];

  test.for(scenarios)('[$id] $description', ({ input, expected }) => {
    expect(formatValueType(input)).toBe(expected);
  });
});

describe('formatValue', () => {
  const scenarios: TestScenario<unknown, string>[] = [
    { id: 'String', description: 'Strings are verbatim', input: 'x', expected: 'x' },
    { id: 'Number', description: 'Numbers are JSON', input: 1, expected: '1' },
    { id: 'Object', description: 'Objects are JSON', input: { a: [1] }, expected: '{"a":[1]}' },
    { id: 'BigInt', description: 'Bigints fall back to String', input: 1n, expected: '1' },
    { id: 'Undefined', description: 'undefined falls back to String', input: undefined, expected: 'undefined' }
  ];

  test.for(scenarios)('[$id] $description', ({ input, expected }) => {
    expect(formatValue(input)).toBe(expected);
  });
});

describe('runtimeTypeOf', () => {
  test('subclass instances resolve to the nearest registered composite', () => {
    expect(runtimeTypeOf(new Square())).toBe(ShapeType);
  });

  test('collections resolve to their origin', () => {
    expect(runtimeTypeOf([1])).toBe(origins.sequence);
    expect(runtimeTypeOf(new Map())).toBe(origins.mapping);
  });

  test('functions have no runtime type', () => {
    expect(runtimeTypeOf(() => 1)).toBeUndefined();
  });
});
