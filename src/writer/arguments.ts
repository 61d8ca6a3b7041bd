import { UsageError } from '../errors';
import { isNonEmptyString } from '../utils/type-guards';

/**
 * A validated key/value argument pair.
 */
export type BindingEntry = readonly [key: string, value: unknown];

/**
 * Checks a flat `[key1, value1, key2, value2, ...]` argument list and pairs
 * it up.
 *
 * The whole list is checked before anything is returned, so a caller that
 * writes the pairs never performs a partial write for a rejected list.
 *
 * @param params
 *   Alternating keys and values.
 * @returns
 *   The pairs, in argument order.
 * @throws
 *   `UsageError` when the list has an odd length (a dangling key) or a key
 *   position holds anything but a non-empty string.
 */
export function checkArguments(params: readonly unknown[]): BindingEntry[] {
  if (params.length % 2 !== 0) {
    const dangling = params[params.length - 1];
    throw new UsageError(
      `Expected an even number of key/value arguments, got ${params.length}. ` +
        `Key ${JSON.stringify(String(dangling))} has no value.`
    );
  }

  const entries: BindingEntry[] = [];
  for (let index = 0; index < params.length; index += 2) {
    const key = params[index];
    if (!isNonEmptyString(key)) {
      throw new UsageError(
        `Argument ${index} must be a non-empty string key, got ${key === '' ? 'an empty string' : typeof key}.`
      );
    }
    entries.push([key, params[index + 1]]);
  }

  return entries;
}
