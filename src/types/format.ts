import type { TypeDescriptor } from './descriptors';
import { runtimeTypeOf } from './runtime-type';

/**
 * Renders a descriptor for error messages.
 *
 * @example
 * - `t.optional(t.string)`          -> `string | null`
 * - `t.record(t.string, t.integer)` -> `Record<string, integer>`
 * - `t.tuple(t.string, t.integer)`  -> `[string, integer]`
 * - `t.tupleOf(t.integer)`          -> `[...integer[]]`
 */
export function formatType(type: TypeDescriptor): string {
  switch (type.kind) {
    case 'leaf':
    case 'composite':
    case 'reference':
      return type.name;

    case 'union':
      return type.members.map(formatType).join(' | ');

    case 'collection': {
      const elements = type.elements.map(formatType);

      switch (type.origin.shape) {
        case 'tuple':
          return type.variadic
            ? `[...${elements[0] ?? 'unknown'}[]]`
            : `[${elements.join(', ')}]`;
        case 'mapping':
          return `${type.origin.name}<${elements[0] ?? 'unknown'}, ${elements[1] ?? 'unknown'}>`;
        default:
          return `${type.origin.name}<${elements[0] ?? 'unknown'}>`;
      }
    }
  }
}

/**
 * Names a value's runtime type: its registered type when it has one, else
 * its constructor name, else `typeof`.
 */
export function formatValueType(value: unknown): string {
  const runtimeType = runtimeTypeOf(value);
  if (runtimeType) return runtimeType.name;

  if (typeof value === 'object' && value !== null) {
    const ctor: unknown = Reflect.get(value, 'constructor');
    if (typeof ctor === 'function' && ctor.name) return ctor.name;
  }

  return typeof value;
}

/**
 * Renders a value for error messages: strings verbatim, everything else as
 * JSON when it serializes, else via `String`.
 */
export function formatValue(value: unknown): string {
  if (typeof value === 'string') return value;

  try {
    const json = JSON.stringify(value);
    if (json !== undefined) return json;
  } catch {
    // Fall through: cycles and bigints do not serialize.
  }

  return String(value);
}
