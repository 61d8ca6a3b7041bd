import type { TokenPair } from '../types';
import { findUnguardedSeparator } from './scanner';

/**
 * Splits a `key=value` token into its key and raw value.
 *
 * Grammar
 * -------
 * 1. `${...}` spans are atomic. Their extent is found by brace depth, so a
 *    leading span such as `${a == b ? 1 : 2}` can be the whole key and a
 *    value span may contain `=`, quotes, colons and ternaries.
 * 2. The key is everything before the first `=` outside of any span.
 * 3. The value is everything after that `=`, verbatim: a balanced span, a
 *    quoted literal, a bracketed list or a bare path.
 *
 * No match
 * --------
 * Returns `null` (never throws) when:
 * - there is no `=` outside of a balanced span,
 * - a `${` span never closes, in the key or in the value,
 * - the value holds a second unguarded `=` (ambiguous split),
 * - the key or the value is empty.
 *
 * @example
 * ```ts
 * splitToken('foo/bar=check/some'); // { key: 'foo/bar', value: 'check/some' }
 * splitToken('${foo}=bar');         // { key: '${foo}', value: 'bar' }
 * splitToken('foo=${a == b}');      // { key: 'foo', value: '${a == b}' }
 * splitToken('foo=a=b');            // null
 * ```
 */
export function splitToken(token: string): TokenPair | null {
  const separator = findUnguardedSeparator(token);
  if (separator.kind !== 'separator') return null;

  const key = token.slice(0, separator.index);
  const value = token.slice(separator.index + 1);
  if (key.length === 0 || value.length === 0) return null;

  // The value must be free of further separators and hold only closed spans.
  if (findUnguardedSeparator(value).kind !== 'none') return null;

  return { key, value };
}
