import type { StandardSchemaV1 } from '@standard-schema/spec';

/**
 * Runs a Standard Schema V1 validator synchronously.
 *
 * About `~standard`:
 * - Purpose:
 *   It acts as a universal adapter, so a Zod, Valibot or ArkType schema can
 *   back a leaf type without library-specific glue.
 * - Contract:
 *   `validate` returns a result object (`{ value }` or `{ issues }`) and
 *   does not throw.
 *
 * @param schema - The schema instance (must contain `~standard`).
 * @param input - The value to validate.
 * @param typeName - Name of the leaf type backed by the schema (error context).
 * @returns The result; promise-returning validators are rejected.
 *
 * @throws
 * - If the schema object is invalid (missing `~standard`).
 * - If the validator returns a Promise (async validation is not supported).
 */
export function runSchema(
  schema: StandardSchemaV1,
  input: unknown,
  typeName: string
): StandardSchemaV1.Result<unknown> {
  // Guards against plain objects or malformed schemas reaching `validate`.
  if (!('~standard' in schema)) {
    throw new Error(
      `[mapping-hydrator] The schema for "${typeName}" is invalid. Expected an object with the "~standard" property (e.g. Zod, Valibot).`
    );
  }

  const result = schema['~standard'].validate(input);

  // Conversion is strictly synchronous: there is no point to await at.
  if (result instanceof Promise) {
    throw new Error(
      `[mapping-hydrator] Async schema validation is not supported for "${typeName}".`
    );
  }

  return result;
}

/**
 * Validates and transforms a value, throwing on the first issue.
 *
 * Implementation Note - Overloads:
 * The public signature carries the schema's inferred output type; the
 * implementation works on the erased `StandardSchemaV1`, whose output is
 * `unknown`. Separating the two avoids type assertions on the return value.
 *
 * @returns The validated (and potentially transformed) value.
 * @throws Error naming the type, the issue path and the issue message.
 */
export function validateWithSchema<S extends StandardSchemaV1>(
  schema: S,
  input: unknown,
  typeName: string
): StandardSchemaV1.InferOutput<S>;

export function validateWithSchema(
  schema: StandardSchemaV1,
  input: unknown,
  typeName: string
): unknown {
  const result = runSchema(schema, input, typeName);

  // Unlike native methods (e.g. parse), issues must be checked manually.
  if (result.issues) {
    const [firstIssue] = result.issues;
    const issuePath =
      firstIssue?.path?.map(formatIssueSegment).join('.') || '(root)';
    throw new Error(
      `Invalid value for "${typeName}" at "${issuePath}": ${firstIssue?.message ?? 'rejected'}`
    );
  }

  return result.value;
}

function formatIssueSegment(
  segment: PropertyKey | StandardSchemaV1.PathSegment
): string {
  return String(typeof segment === 'object' ? segment.key : segment);
}
