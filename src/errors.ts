import type {
  CallerOwnedFailurePolicy,
  PostConstructionAssignmentPolicy
} from './architecture';
import type { TypeDescriptor } from './types/descriptors';
import { formatType, formatValue, formatValueType } from './types/format';

/**
 * Root of every error the conversion engine raises on its own behalf.
 *
 * Failures raised by caller-owned code (type hooks, cast constructors,
 * numeric parsing) are not wrapped and do not inherit from this class; see
 * {@link CallerOwnedFailurePolicy}.
 */
export class MappingError extends Error {
  override name = 'MappingError';
}

/**
 * A failure located at a field.
 *
 * `path` grows from the leaf upward: every enclosing composite prepends its
 * field name while the error unwinds, so the final `fieldPath` of a failure
 * three levels deep reads `outer.middle.inner`. The message is re-rendered
 * on every prepend.
 */
export abstract class FieldError extends MappingError {
  override name = 'FieldError';
  readonly path: string[];

  constructor(fieldPath: string | readonly string[] = []) {
    super();
    this.path =
      typeof fieldPath === 'string' ? splitFieldPath(fieldPath) : [...fieldPath];
  }

  get fieldPath(): string {
    return this.path.join('.');
  }

  /**
   * Prepends the enclosing field's name and refreshes the message.
   */
  prependPath(segment: string): this {
    this.path.unshift(segment);
    this.message = this.describe();
    return this;
  }

  protected abstract describe(): string;
}

function splitFieldPath(fieldPath: string): string[] {
  return fieldPath === '' ? [] : fieldPath.split('.');
}

/**
 * A value's runtime type does not conform to the declared type.
 */
export class WrongTypeError extends FieldError {
  override name = 'WrongTypeError';

  constructor(
    readonly fieldType: TypeDescriptor,
    readonly value: unknown,
    fieldPath: string | readonly string[] = []
  ) {
    super(fieldPath);
    this.message = this.describe();
  }

  protected describe(): string {
    return (
      `wrong value type for field "${this.fieldPath}" - should be ` +
      `"${formatType(this.fieldType)}" instead of value "${formatValue(this.value)}" ` +
      `of type "${formatValueType(this.value)}"`
    );
  }
}

/**
 * No member of a union accepted the value.
 *
 * A `WrongTypeError`, so callers catching type mismatches catch this too.
 */
export class UnionMatchError extends WrongTypeError {
  override name = 'UnionMatchError';

  protected override describe(): string {
    return (
      `can not match type "${formatValueType(this.value)}" to any type ` +
      `of "${this.fieldPath}" union: ${formatType(this.fieldType)}`
    );
  }
}

/**
 * More than one union member accepted the value under `strictUnionsMatch`.
 */
export class StrictUnionMatchError extends FieldError {
  override name = 'StrictUnionMatchError';

  constructor(
    readonly candidates: readonly TypeDescriptor[],
    fieldPath: string | readonly string[] = []
  ) {
    super(fieldPath);
    this.message = this.describe();
  }

  protected describe(): string {
    const names = this.candidates.map(formatType).join(', ');
    return `can not choose between possible Union matches for field "${this.fieldPath}": ${names}`;
  }
}

/**
 * A required field is absent and has no default.
 */
export class MissingValueError extends FieldError {
  override name = 'MissingValueError';

  constructor(fieldPath: string | readonly string[]) {
    super(fieldPath);
    this.message = this.describe();
  }

  protected describe(): string {
    return `missing value for field "${this.fieldPath}"`;
  }
}

/**
 * A non-construction field could not be assigned because the instance
 * refused the write (frozen or non-writable).
 *
 * See {@link PostConstructionAssignmentPolicy}.
 */
export class FrozenInstanceError extends FieldError {
  override name = 'FrozenInstanceError';

  constructor(
    readonly typeName: string,
    fieldPath: string | readonly string[]
  ) {
    super(fieldPath);
    this.message = this.describe();
  }

  protected describe(): string {
    return `can not assign field "${this.fieldPath}" after construction: "${this.typeName}" instance is immutable`;
  }
}

/**
 * Strict mode rejected input keys that match no declared field.
 */
export class UnexpectedDataError extends MappingError {
  override name = 'UnexpectedDataError';

  constructor(
    readonly keys: readonly string[],
    readonly typeName: string
  ) {
    const formattedKeys = keys.map(key => `"${key}"`).join(', ');
    super(`can not match ${formattedKeys} to any field of "${typeName}"`);
  }
}

/**
 * A deferred type name could not be resolved.
 */
export class ForwardReferenceError extends MappingError {
  override name = 'ForwardReferenceError';

  constructor(readonly reason: string) {
    super(`can not resolve forward reference: ${reason}`);
  }
}

/**
 * A path lookup hit a missing key (with no fallback) or a non-mapping
 * intermediate value.
 */
export class PathLookupError extends MappingError {
  override name = 'PathLookupError';
}
