import { describe, expect, test } from 'vitest';

import type { TestScenario } from '../../tests/types';
import {
  NumericFormatError,
  parseDecimal,
  parseInteger,
  toDecimal,
  toInteger
} from '../numeric';

/**
 * Test suite: strict numeric parsing and coercion.
 *
 * Coverage:
 * - Accepted and rejected integer and decimal spellings.
 * - Cast constructors for `integer` and `number`.
 */

describe('parseInteger', () => {
  const accepted: TestScenario<string, number>[] = [
    { id: 'Plain', description: 'Digits', input: '42', expected: 42 },
    { id: 'Signed', description: 'Sign and whitespace', input: ' -7 ', expected: -7 },
    { id: 'Plus', description: 'Explicit plus sign', input: '+3', expected: 3 },
    { id: 'Grouped', description: 'Underscore digit groups', input: '1_000', expected: 1000 }
  ];

  test.for(accepted)('[$id] $description', ({ input, expected }) => {
    expect(parseInteger(input)).toBe(expected);
  });

  const rejected: TestScenario<string, string>[] = [
    { id: 'Empty', description: 'Empty text', input: '', expected: '' },
    { id: 'Fraction', description: 'A fractional part', input: '1.5', expected: '1.5' },
    { id: 'Hex', description: 'Hex literals', input: '0x10', expected: '0x10' },
    { id: 'Double Underscore', description: 'Repeated separators', input: '1__0', expected: '1__0' },
    { id: 'Leading Underscore', description: 'A separator first', input: '_1', expected: '_1' },
    { id: 'Trailing Garbage', description: 'Digits then text', input: '4x', expected: '4x' }
  ];

  test.for(rejected)('[$id] $description is rejected', ({ input, expected }) => {
    expect(() => parseInteger(input)).toThrow(NumericFormatError);
    expect(() => parseInteger(input)).toThrow(`invalid literal for integer: "${expected}"`);
  });

  test('integers beyond the safe range are refused instead of rounded', () => {
    expect(parseInteger('9007199254740991')).toBe(Number.MAX_SAFE_INTEGER);
    expect(() => parseInteger('9007199254740993')).toThrow(RangeError);
    expect(() => parseInteger('-9007199254740993')).toThrow(
      'integer -9007199254740993 can not be represented exactly'
    );
  });

  test('the error quotes the text as given, whitespace included', () => {
    expect(() => parseInteger(' x ')).toThrow('invalid literal for integer: " x "');
  });
});

describe('parseDecimal', () => {
  const accepted: TestScenario<string, number>[] = [
    { id: 'Fraction', description: 'Digits and a fraction', input: '2.5', expected: 2.5 },
    { id: 'Leading Dot', description: 'No integer part', input: '.5', expected: 0.5 },
    { id: 'Trailing Dot', description: 'No fractional digits', input: '5.', expected: 5 },
    { id: 'Exponent', description: 'Scientific notation', input: '1e3', expected: 1000 },
    { id: 'Infinity', description: 'Signed infinity, any case', input: '-Infinity', expected: -Infinity },
    { id: 'Inf', description: 'Short infinity', input: 'inf', expected: Infinity }
  ];

  test.for(accepted)('[$id] $description', ({ input, expected }) => {
    expect(parseDecimal(input)).toBe(expected);
  });

  test('nan spellings parse to NaN', () => {
    expect(parseDecimal('NaN')).toBeNaN();
  });

  test.for(['abc', '', '1e', '1.2.3'])('"%s" is rejected', input => {
    expect(() => parseDecimal(input)).toThrow(`invalid literal for number: "${input}"`);
  });
});

describe('Cast constructors', () => {
  const integers: TestScenario<unknown, number>[] = [
    { id: 'Truncate', description: 'Fractions truncate toward zero', input: -3.9, expected: -3 },
    { id: 'Text', description: 'Text is parsed strictly', input: '12', expected: 12 },
    { id: 'Boolean', description: 'Booleans become 0 or 1', input: true, expected: 1 },
    { id: 'BigInt', description: 'Bigints are narrowed', input: 5n, expected: 5 }
  ];

  test.for(integers)('[$id] $description', ({ input, expected }) => {
    expect(toInteger(input)).toBe(expected);
  });

  test('bigints that do not fit exactly are refused', () => {
    expect(() => toInteger(2n ** 60n)).toThrow(
      'integer 1152921504606846976 can not be represented exactly'
    );
  });

  test('non-finite numbers can not become integers', () => {
    expect(() => toInteger(Infinity)).toThrow(RangeError);
    expect(() => toInteger(Infinity)).toThrow('can not convert Infinity to integer');
  });

  test('unsupported values raise TypeError', () => {
    expect(() => toInteger({})).toThrow('can not convert a value of type "object" to integer');
    expect(() => toDecimal(null)).toThrow('can not convert a value of type "object" to number');
  });

  test('decimal casts keep numbers and parse text', () => {
    expect(toDecimal(1.5)).toBe(1.5);
    expect(toDecimal('1.5')).toBe(1.5);
    expect(toDecimal(false)).toBe(0);
  });
});
