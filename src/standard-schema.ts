import type { StandardSchemaV1 } from '@standard-schema/spec';
import type { CompositeType } from './types/composite';
import { type Config, type ConfigOptions, resolveConfig } from './config';
import { FieldError, MappingError } from './errors';
import { fromMapping } from './from-mapping';
import { formatValueType } from './types/format';
import { isMapping } from './guards';

const VENDOR = 'mapping-hydrator';

function toIssue(error: MappingError): StandardSchemaV1.Issue {
  return error instanceof FieldError && error.path.length > 0
    ? { message: error.message, path: [...error.path] }
    : { message: error.message };
}

/**
 * Exposes a composite as a Standard Schema V1 validator, so it can be used
 * wherever a Zod or Valibot schema is accepted.
 *
 * Result mapping:
 * - success: `{ value }` holding the built instance
 * - conversion failure (`MappingError`): `{ issues: [issue] }`, the issue
 *   path taken from the error's field path
 * - non-mapping input: one root issue
 *
 * Caller-owned failures (hooks, cast constructors, numeric parsing) are
 * rethrown rather than reported as issues.
 *
 * The configuration is resolved once, when the schema is created.
 */
export function toStandardSchema<T extends object>(
  composite: CompositeType<T>,
  config?: Config | ConfigOptions
): StandardSchemaV1<unknown, T> {
  const resolvedConfig = resolveConfig(config);

  return {
    '~standard': {
      version: 1,
      vendor: VENDOR,
      validate(value: unknown): StandardSchemaV1.Result<T> {
        if (!isMapping(value)) {
          return {
            issues: [
              {
                message: `expected a mapping for "${composite.name}", got ${formatValueType(value)}`
              }
            ]
          };
        }

        try {
          return { value: fromMapping(composite, value, resolvedConfig) };
        } catch (error) {
          if (error instanceof MappingError) return { issues: [toIssue(error)] };
          throw error;
        }
      }
    }
  };
}
