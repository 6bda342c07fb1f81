import { describe, expect, test, vi } from 'vitest';

import type { TestScenario } from '../../tests/types';
import { buildValue } from '../value-builder';
import { type ConfigOptions, createConfig } from '../../config';
import { t } from '../../types/builders';
import { origins } from '../../types/builtins';
import type { TypeDescriptor } from '../../types/descriptors';
import { NumericFormatError } from '../../utils/numeric';
import { isString } from '../../utils/type-guards';
import { CarCompany, Color, Point, PointType } from './fixtures';

/**
 * Test suite: the value builder.
 *
 * Coverage:
 * - Step 1: exact-descriptor hooks.
 * - Step 2: null short-circuit for unions admitting null.
 * - Step 3: dispatch (leaf passthrough, composites, references).
 * - Step 4: casting (leaves, collections, ancestry, first match only).
 * - Step 5: type-hint parsing.
 */

type BuildInput = {
  type: TypeDescriptor;
  raw: unknown;
  options?: ConfigOptions;
};

const build = ({ type, raw, options }: BuildInput): unknown =>
  buildValue(type, raw, createConfig(options));

const lowercase = (value: unknown): unknown =>
  isString(value) ? value.toLowerCase() : value;

describe('Step 1: Hooks', () => {
  const maybeText = t.optional(t.string);

  const scenarios: TestScenario<BuildInput>[] = [
    {
      id: 'Exact Descriptor',
      description: 'A hook registered for the target transforms the raw value',
      input: { type: t.string, raw: 'ABC', options: { typeHooks: [[t.string, lowercase]] } },
      expected: 'abc'
    },
    {
      id: 'Derived Leaf',
      description: 'A hook on a parent leaf does not run for its children',
      input: { type: CarCompany, raw: 'BMW', options: { typeHooks: [[t.string, lowercase]] } },
      expected: 'BMW'
    },
    {
      id: 'Hook Before Null Check',
      description: 'A hook may produce null, which then short-circuits',
      input: {
        type: maybeText,
        raw: '',
        options: { typeHooks: [[maybeText, value => (value === '' ? null : value)]] }
      },
      expected: null
    },
    {
      id: 'Member Hook',
      description: 'A hook on an optional member runs through the fast path',
      input: {
        type: maybeText,
        raw: 'TEST',
        options: { typeHooks: [[t.string, lowercase]] }
      },
      expected: 'test'
    }
  ];

  test.for(scenarios)('[$id] $description', ({ input, expected }) => {
    expect(build(input)).toEqual(expected);
  });

  test('hook failures propagate unchanged', () => {
    const failure = new Error('hook failed');
    const options: ConfigOptions = {
      typeHooks: [
        [
          t.string,
          () => {
            throw failure;
          }
        ]
      ]
    };

    expect(() => build({ type: t.string, raw: 'x', options })).toThrow(failure);
  });
});

describe('Step 2: Null short-circuit', () => {
  test('null is returned for an optional type without casting', () => {
    const construct = vi.fn((value: unknown) => String(value));
    const Text = t.leaf('Text', { test: isString, construct });

    const result = build({
      type: t.optional(Text),
      raw: null,
      options: { castTargets: [Text] }
    });

    expect(result).toBeNull();
    expect(construct).not.toHaveBeenCalled();
  });

  test('null in a wider union is kept without trying members', () => {
    expect(build({ type: t.union(t.integer, t.string, t.null), raw: null })).toBeNull();
  });
});

describe('Step 3: Dispatch', () => {
  test('leaves pass through unchanged, even when they do not conform', () => {
    expect(build({ type: t.integer, raw: 'x' })).toBe('x');
  });

  test('a composite with a mapping value is hydrated', () => {
    const point = build({ type: PointType, raw: { x: 1, y: 2 } });

    expect(point).toBeInstanceOf(Point);
    expect(point).toEqual(Object.assign(new Point(), { x: 1, y: 2 }));
  });

  test('a composite with a non-mapping value passes through', () => {
    expect(build({ type: PointType, raw: 'p' })).toBe('p');
  });

  test('an already built instance is returned as-is', () => {
    const point = Object.assign(new Point(), { x: 1, y: 2 });
    expect(build({ type: PointType, raw: point })).toBe(point);
  });

  test('a reference builds against its target', () => {
    const result = build({
      type: t.ref('Count'),
      raw: '7',
      options: { forwardReferences: { Count: t.integer }, followTypeHints: true }
    });
    expect(result).toBe(7);
  });
});

describe('Step 4: Casting', () => {
  const scenarios: TestScenario<BuildInput>[] = [
    {
      id: 'Leaf',
      description: 'The declared leaf is constructed from the value',
      input: { type: t.string, raw: 5, options: { castTargets: [t.string] } },
      expected: '5'
    },
    {
      id: 'Ancestor Target',
      description: "A parent target runs the child's own constructor",
      input: { type: CarCompany, raw: 'bmw', options: { castTargets: [t.string] } },
      expected: 'BMW'
    },
    {
      id: 'Enumeration Base',
      description: 'The Enum base casts every enumeration',
      input: { type: Color, raw: 'red', options: { castTargets: [t.Enum] } },
      expected: 'red'
    },
    {
      id: 'Unrelated Target',
      description: 'A target outside the ancestry does not apply',
      input: { type: t.integer, raw: '3', options: { castTargets: [t.string] } },
      expected: '3'
    },
    {
      id: 'Collection Origin',
      description: 'A collection is rebuilt as its declared container',
      input: {
        type: t.tupleOf(t.integer),
        raw: new Set([1, 2]),
        options: { castTargets: [origins.sequence] }
      },
      expected: [1, 2]
    },
    {
      id: 'Integer Cast',
      description: 'Numeric casting parses text',
      input: { type: t.integer, raw: ' 12 ', options: { castTargets: [t.integer] } },
      expected: 12
    }
  ];

  test.for(scenarios)('[$id] $description', ({ input, expected }) => {
    expect(build(input)).toEqual(expected);
  });

  test('a mapping cast copies the container', () => {
    const raw = { a: 1 };
    const result = build({
      type: t.record(t.string, t.integer),
      raw,
      options: { castTargets: [origins.mapping] }
    });

    expect(result).toEqual({ a: 1 });
    expect(result).not.toBe(raw);
  });

  test('constructor failures propagate unchanged', () => {
    expect(() =>
      build({ type: Color, raw: 'blue', options: { castTargets: [t.Enum] } })
    ).toThrow('"blue" is not a valid Color');
  });

  test('only the first matching target applies', () => {
    const construct = vi.fn((value: unknown) => String(value));
    const Text = t.string.extend('Text', { test: isString, construct });

    build({ type: Text, raw: 1, options: { castTargets: [t.string, Text] } });

    expect(construct).toHaveBeenCalledTimes(1);
  });
});

describe('Step 5: Type hints', () => {
  const scenarios: TestScenario<BuildInput>[] = [
    {
      id: 'Integer',
      description: 'Integer text becomes an integer',
      input: { type: t.integer, raw: '42', options: { followTypeHints: true } },
      expected: 42
    },
    {
      id: 'Number',
      description: 'Decimal text becomes a number',
      input: { type: t.number, raw: '2.5', options: { followTypeHints: true } },
      expected: 2.5
    },
    {
      id: 'String Target',
      description: 'String targets are left alone',
      input: { type: t.string, raw: '42', options: { followTypeHints: true } },
      expected: '42'
    },
    {
      id: 'Derived Leaf',
      description: 'Only the exact integer/number leaves are parsed',
      input: {
        type: t.integer.extend('Port', { test: isString }),
        raw: '80',
        options: { followTypeHints: true }
      },
      expected: '80'
    },
    {
      id: 'Disabled',
      description: 'Without the flag, text stays text',
      input: { type: t.integer, raw: '42' },
      expected: '42'
    },
    {
      id: 'Non-string',
      description: 'Only strings are parsed',
      input: { type: t.integer, raw: true, options: { followTypeHints: true } },
      expected: true
    }
  ];

  test.for(scenarios)('[$id] $description', ({ input, expected }) => {
    expect(build(input)).toEqual(expected);
  });

  test('malformed text raises NumericFormatError', () => {
    const parse = () =>
      build({ type: t.integer, raw: '4x', options: { followTypeHints: true } });

    expect(parse).toThrow(NumericFormatError);
    expect(parse).toThrow('invalid literal for integer: "4x"');
  });
});
