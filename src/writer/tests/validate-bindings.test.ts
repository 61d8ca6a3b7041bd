import type { StandardSchemaV1 } from '@standard-schema/spec';
import { describe, expect, it } from 'vitest';
import { BindingValidationError } from '../../errors';
import { validateBindings } from '../../validator';

/**
 * Builds a schema whose validator always returns `result`.
 */
function schemaReturning(
  result: StandardSchemaV1.Result<unknown> | Promise<StandardSchemaV1.Result<unknown>>
): StandardSchemaV1 {
  return {
    '~standard': { version: 1, vendor: 'test', validate: () => result }
  };
}

describe('validateBindings', () => {
  it('returns the decoded value', () => {
    const schema = schemaReturning({ value: { decoded: true } });

    expect(validateBindings(schema, { raw: 'x' }, 'pipe')).toEqual({
      decoded: true
    });
  });

  it('joins object and key path segments', () => {
    const schema = schemaReturning({
      issues: [{ message: 'expected a string', path: [{ key: 'items' }, 0] }]
    });

    expect(() => validateBindings(schema, {}, 'pipe')).toThrow(
      new BindingValidationError('pipe', 'items.0', 'expected a string')
    );
  });

  it('reports "unknown" when an issue has no path', () => {
    const schema = schemaReturning({ issues: [{ message: 'broken' }] });

    expect(() => validateBindings(schema, {}, 'pipe')).toThrow(
      'Invalid bindings for "pipe" at "unknown": broken'
    );
  });

  it('rejects asynchronous validators', () => {
    const schema = schemaReturning(Promise.resolve({ value: {} }));

    expect(() => validateBindings(schema, {}, 'pipe')).toThrow(
      'Async schema validation is not supported for "pipe".'
    );
  });
});
