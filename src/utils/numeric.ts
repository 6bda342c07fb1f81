import { isBigInt, isBoolean, isNumber, isString } from './type-guards';

/**
 * Raised when text can not be read as a number.
 *
 * Not part of the conversion error taxonomy: numeric coercion is a
 * caller-owned step and its failure reaches the caller unwrapped.
 */
export class NumericFormatError extends Error {
  override name = 'NumericFormatError';

  constructor(
    readonly text: string,
    readonly target: 'integer' | 'number'
  ) {
    super(`invalid literal for ${target}: "${text}"`);
  }
}

// Digits with optional single underscores between groups: "1_000".
const INTEGER_PATTERN = /^[+-]?\d+(?:_\d+)*$/;
const DECIMAL_PATTERN =
  /^[+-]?(?:\d+(?:_\d+)*(?:\.(?:\d+(?:_\d+)*)?)?|\.\d+(?:_\d+)*)(?:[eE][+-]?\d+)?$/;
const SPECIAL_DECIMALS = new Map<string, number>([
  ['inf', Infinity],
  ['+inf', Infinity],
  ['-inf', -Infinity],
  ['infinity', Infinity],
  ['+infinity', Infinity],
  ['-infinity', -Infinity],
  ['nan', NaN],
  ['+nan', NaN],
  ['-nan', NaN]
]);

/**
 * Narrows a bigint to a number only when no precision is lost.
 */
function toSafeInteger(value: bigint): number {
  const narrowed = Number(value);
  if (!Number.isSafeInteger(narrowed)) {
    throw new RangeError(`integer ${value} can not be represented exactly`);
  }
  return narrowed;
}

/**
 * Strictly parses base-10 integer text.
 *
 * Surrounding whitespace is ignored. Unlike `Number(...)`/`parseInt(...)`,
 * empty text, fractions, hex literals and trailing garbage are rejected, and
 * so are integers outside the safe range.
 *
 * @throws NumericFormatError | RangeError
 */
export function parseInteger(text: string): number {
  const trimmed = text.trim();
  if (!INTEGER_PATTERN.test(trimmed)) {
    throw new NumericFormatError(text, 'integer');
  }
  return toSafeInteger(BigInt(trimmed.replaceAll('_', '')));
}

/**
 * Strictly parses decimal text, including exponents and the special
 * spellings `inf`/`infinity`/`nan` (case-insensitive, optionally signed).
 *
 * @throws NumericFormatError
 */
export function parseDecimal(text: string): number {
  const trimmed = text.trim();

  const special = SPECIAL_DECIMALS.get(trimmed.toLowerCase());
  if (special !== undefined) return special;

  if (!DECIMAL_PATTERN.test(trimmed)) {
    throw new NumericFormatError(text, 'number');
  }
  return Number(trimmed.replaceAll('_', ''));
}

/**
 * Integer constructor used when `integer` is a cast target.
 *
 * - numbers are truncated toward zero (non-finite numbers are rejected)
 * - text is parsed with {@link parseInteger}
 * - booleans become `0`/`1`, bigints are narrowed when they fit exactly
 *
 * @throws NumericFormatError | RangeError | TypeError
 */
export function toInteger(value: unknown): number {
  if (isNumber(value)) {
    if (!Number.isFinite(value)) {
      throw new RangeError(`can not convert ${value} to integer`);
    }
    return Math.trunc(value);
  }
  if (isString(value)) return parseInteger(value);
  if (isBoolean(value)) return value ? 1 : 0;
  if (isBigInt(value)) return toSafeInteger(value);

  throw new TypeError(`can not convert a value of type "${typeof value}" to integer`);
}

/**
 * Number constructor used when `number` is a cast target.
 *
 * @throws NumericFormatError | TypeError
 */
export function toDecimal(value: unknown): number {
  if (isNumber(value)) return value;
  if (isString(value)) return parseDecimal(value);
  if (isBoolean(value)) return value ? 1 : 0;
  if (isBigInt(value)) return Number(value);

  throw new TypeError(`can not convert a value of type "${typeof value}" to number`);
}
