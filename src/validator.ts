import type { StandardSchemaV1 } from '@standard-schema/spec';
import type { BindingMap } from './types';
import { BindingValidationError } from './errors';
import { isRecord } from './guards';

/**
 * Renders a Standard Schema issue path as a dotted string.
 */
function formatIssuePath(
  path: StandardSchemaV1.Issue['path']
): string {
  if (!path || path.length === 0) return 'unknown';

  return path
    .map(segment => (isRecord(segment) ? segment.key : segment))
    .map(key => String(key))
    .join('.');
}

/**
 * Validates a binding map with a Standard Schema V1 compliant validator.
 *
 * The `~standard` property is the universal adapter of the Standard Schema
 * specification: it returns `{ value }` or `{ issues }` and never throws, so
 * Zod, Valibot, ArkType and others work without library-specific code.
 *
 * Binding maps are built synchronously, so a validator that returns a Promise
 * is rejected.
 *
 * @param schema - Schema instance carrying `~standard`.
 * @param bindings - The map produced by the writer.
 * @param context - Name used in error messages (e.g. the pipe path).
 * @returns The schema output, or `bindings` when the schema returns no value.
 *
 * @throws
 * - If the schema object is invalid (missing `~standard`).
 * - If the validator returns a Promise.
 * - `BindingValidationError` for the first issue reported.
 */
export function validateBindings<S extends StandardSchemaV1>(
  schema: S,
  bindings: BindingMap,
  context: string
): StandardSchemaV1.InferOutput<S>;

export function validateBindings(
  schema: StandardSchemaV1,
  bindings: BindingMap,
  context: string
): unknown {
  if (!isRecord(schema) || !('~standard' in schema)) {
    throw new Error(
      `The schema for "${context}" is invalid. Expected an object with the "~standard" property (e.g. Zod, Valibot), but received a plain object.`
    );
  }

  const result = schema['~standard'].validate(bindings);

  if (result instanceof Promise) {
    throw new Error(
      `Async schema validation is not supported for "${context}".`
    );
  }

  const [firstIssue] = result.issues ?? [];
  if (firstIssue) {
    throw new BindingValidationError(
      context,
      formatIssuePath(firstIssue.path),
      firstIssue.message
    );
  }

  // Some validators only report issues and do not return a decoded `value`.
  if ('value' in result) {
    return result.value;
  }

  return bindings;
}
