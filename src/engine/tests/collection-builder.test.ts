import { describe, expect, test } from 'vitest';

import type { TestScenario } from '../../tests/types';
import { buildCollection } from '../collection-builder';
import { createConfig } from '../../config';
import { MissingValueError } from '../../errors';
import { t } from '../../types/builders';
import type { CollectionType } from '../../types/collection';
import { Point, PointType } from './fixtures';

/**
 * Test suite: element-wise collection rebuilding.
 *
 * Coverage:
 * - Mappings (plain objects and `Map`s).
 * - Sequences and sets.
 * - Fixed and variadic tuples, including length mismatches.
 * - Permissive fallback for inputs that do not fit the shape.
 */

type CollectionInput = { collection: CollectionType; raw: unknown };

// Type hints make element building observable: '1' becomes 1.
const config = createConfig({ followTypeHints: true });

const build = ({ collection, raw }: CollectionInput): unknown =>
  buildCollection(collection, raw, config);

describe('Mappings', () => {
  test('plain objects keep their keys and build their values', () => {
    const collection = t.record(t.string, t.integer);
    expect(build({ collection, raw: { a: '1', b: 2 } })).toEqual({ a: 1, b: 2 });
  });

  test('Maps stay Maps and keep non-string keys', () => {
    const collection = t.record(t.integer, t.integer);
    const result = build({ collection, raw: new Map([[1, '2']]) });

    expect(result).toBeInstanceOf(Map);
    expect(result).toEqual(new Map([[1, 2]]));
  });

  test('key order is preserved', () => {
    const collection = t.record(t.string, t.string);
    const result = build({ collection, raw: { z: 'a', a: 'b' } });
    expect(JSON.stringify(result)).toBe('{"z":"a","a":"b"}');
  });
});

describe('Sequences and sets', () => {
  const scenarios: TestScenario<CollectionInput>[] = [
    {
      id: 'Array',
      description: 'Every element is built against the element type',
      input: { collection: t.array(t.integer), raw: ['1', '2'] },
      expected: [1, 2]
    },
    {
      id: 'Set Input',
      description: 'Any iterable feeds a sequence target',
      input: { collection: t.array(t.integer), raw: new Set(['1', '2']) },
      expected: [1, 2]
    },
    {
      id: 'Set Target',
      description: 'Set targets collapse duplicates after building',
      input: { collection: t.set(t.integer), raw: ['1', 1, 2] },
      expected: new Set([1, 2])
    },
    {
      id: 'Empty',
      description: 'Empty input builds an empty container',
      input: { collection: t.set(t.string), raw: [] },
      expected: new Set()
    }
  ];

  test.for(scenarios)('[$id] $description', ({ input, expected }) => {
    expect(build(input)).toEqual(expected);
  });

  test('composite elements are hydrated', () => {
    const result = build({ collection: t.array(PointType), raw: [{ x: 1 }] });

    expect(result).toEqual([Object.assign(new Point(), { x: 1, y: 0 })]);
    expect(Array.isArray(result) && result[0] instanceof Point).toBe(true);
  });

  test('element failures propagate', () => {
    const fail = () => build({ collection: t.array(PointType), raw: [{}] });

    expect(fail).toThrow(MissingValueError);
    expect(fail).toThrow('missing value for field "x"');
  });
});

describe('Tuples', () => {
  const scenarios: TestScenario<CollectionInput>[] = [
    {
      id: 'Empty',
      description: 'Empty input builds an empty tuple whatever the arity',
      input: { collection: t.tuple(t.integer, t.string), raw: [] },
      expected: []
    },
    {
      id: 'Positional',
      description: 'Each position is built against its own type',
      input: { collection: t.tuple(t.integer, t.string), raw: ['1', '2'] },
      expected: [1, '2']
    },
    {
      id: 'Extra Items',
      description: 'Items past the declared arity are kept as-is',
      input: { collection: t.tuple(t.integer), raw: ['1', '2'] },
      expected: [1, '2']
    },
    {
      id: 'Missing Optional',
      description: 'A missing position is built from null',
      input: { collection: t.tuple(t.integer, t.optional(t.string)), raw: ['1'] },
      expected: [1, null]
    },
    {
      id: 'Variadic',
      description: 'Every item is built against the single element type',
      input: { collection: t.tupleOf(t.integer), raw: ['1', '2', '3'] },
      expected: [1, 2, 3]
    }
  ];

  test.for(scenarios)('[$id] $description', ({ input, expected }) => {
    expect(build(input)).toEqual(expected);
  });
});

describe('Permissive fallback', () => {
  const scenarios: TestScenario<CollectionInput>[] = [
    {
      id: 'Scalar For Sequence',
      description: 'A scalar is not iterated',
      input: { collection: t.array(t.integer), raw: 5 },
      expected: 5
    },
    {
      id: 'String For Sequence',
      description: 'Strings are atomic, not sequences of characters',
      input: { collection: t.array(t.string), raw: 'abc' },
      expected: 'abc'
    },
    {
      id: 'Array For Mapping',
      description: 'A non-mapping input for a mapping target passes through',
      input: { collection: t.record(t.string, t.integer), raw: ['1'] },
      expected: ['1']
    }
  ];

  test.for(scenarios)('[$id] $description', ({ input, expected }) => {
    expect(build(input)).toEqual(expected);
  });

  test('a mapping for a sequence target is returned untouched', () => {
    const raw = { a: '1' };
    expect(build({ collection: t.array(t.integer), raw })).toBe(raw);
  });
});
