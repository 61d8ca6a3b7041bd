import { isArray } from '../guards';
import { isString } from '../utils/type-guards';

/**
 * A whole bracketed list, with optional whitespace around the brackets.
 * The `s` flag lets the content span lines.
 */
const BRACKETED_LIST = /^\s*\[(.*)\]\s*$/s;

const LIST_SEPARATOR = ',';

/**
 * Trims each entry and drops the empty ones.
 */
function cleanEntries(entries: readonly string[]): string[] {
  return entries.map(entry => entry.trim()).filter(entry => entry.length > 0);
}

/**
 * Decodes a bracketed, comma separated list of names.
 *
 * Tolerant by contract: array-typed keys must always resolve to an array, so
 * malformed input never throws.
 * - missing brackets          -> `[]`
 * - blank content (`[  ]`)    -> `[]`
 * - empty entries (`[a,,b,]`) -> dropped
 *
 * @example
 * ```ts
 * parseList('[ rep:versionable, some:OtherMixin]');
 * // ['rep:versionable', 'some:OtherMixin']
 * ```
 */
export function parseList(raw: string): string[] {
  const match = BRACKETED_LIST.exec(raw);
  if (!match) return [];

  const content = match[1] ?? '';
  return cleanEntries(content.split(LIST_SEPARATOR));
}

/**
 * Resolves any value to the array form of an array-typed key.
 *
 * - strings are parsed with {@link parseList}
 * - arrays keep their string entries, trimmed, empties dropped
 * - every other value resolves to `[]`
 */
export function toNameList(value: unknown): string[] {
  if (isString(value)) return parseList(value);
  if (isArray(value)) return cleanEntries(value.filter(isString));
  return [];
}
