import { EMBED_MARKER } from './constants';
import { isString } from './utils/type-guards';

/**
 * Checks whether a value is a string that already carries the embedding
 * marker (`${`) anywhere in its text.
 *
 * Such strings are either complete expressions (`${a + b}`) or literals the
 * author composed around an expression (`/content/${name}`). Both are left
 * to the evaluator as written.
 *
 * @param value
 *   Unknown value to test.
 * @returns
 *   `true` if `value` is a string containing `${`; otherwise `false`.
 */
export function isEmbedded(value: unknown): value is string {
  return isString(value) && value.includes(EMBED_MARKER);
}

/**
 * Checks whether a value is an array.
 *
 * Wrapper around `Array.isArray` that acts as a TypeScript **type guard**
 * (`value is T[]`). Note: `T` is not validated at runtime.
 *
 * @typeParam T  Assumed element type (defaults to `unknown`).
 * @param value  Value to test.
 * @returns      `true` if `value` is an array.
 */
export function isArray<T = unknown>(value: unknown): value is T[] {
  return Array.isArray(value);
}

/**
 * Narrowing helper for "object-like" values.
 *
 * Many type guards start from `unknown`. This helper provides a safe first step:
 * it checks that the value is a non-null object so properties can be read without
 * runtime errors and without type assertions.
 *
 * @param value
 *   Unknown value to test.
 * @returns
 *   `true` if `value` is a non-null object; otherwise `false`.
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}
