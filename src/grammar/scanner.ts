import {
  CLOSE_BRACE,
  EMBED_MARKER,
  KEY_VALUE_SEPARATOR,
  OPEN_BRACE
} from '../constants';

/**
 * Outcome of searching a string for the key/value separator.
 *
 * - `separator`:  an unguarded `=` was found at `index`.
 * - `none`:       the string holds no unguarded `=`.
 * - `unbalanced`: a `${` span opens but never closes.
 */
export type SeparatorScan =
  | { kind: 'separator'; index: number }
  | { kind: 'none' }
  | { kind: 'unbalanced'; start: number };

const NO_SEPARATOR: SeparatorScan = { kind: 'none' };

/**
 * Finds the end of the embedded span that opens at `start`.
 *
 * Depth counting, not pattern matching: every `{` increments the depth and
 * every `}` decrements it, starting with the brace of the `${` marker. The
 * span ends where the depth returns to zero, so nested object literals and
 * any `=`, `:` or `?` inside the span stay part of it.
 *
 * Quotes are not tracked; a brace inside a string literal counts like any
 * other brace.
 *
 * @param input
 *   Text to scan.
 * @param start
 *   Index of the `$` of a `${` marker.
 * @returns
 *   Index just past the closing brace, or `null` when no marker starts at
 *   `start` or the span never closes.
 */
export function scanEmbeddedSpan(input: string, start: number): number | null {
  if (!input.startsWith(EMBED_MARKER, start)) return null;

  let depth = 0;
  for (let index = start + 1; index < input.length; index++) {
    const char = input.charAt(index);
    if (char === OPEN_BRACE) {
      depth++;
    } else if (char === CLOSE_BRACE) {
      depth--;
      if (depth === 0) return index + 1;
    }
  }

  return null;
}

/**
 * Finds the first `=` of `input` that is not guarded by a `${...}` span.
 *
 * Embedded spans are skipped whole. A span that never closes stops the scan:
 * its extent is unknown, so no later `=` can be trusted as a separator.
 *
 * @param input
 *   Text to scan.
 * @param from
 *   Index the scan starts at.
 */
export function findUnguardedSeparator(
  input: string,
  from = 0
): SeparatorScan {
  let index = from;

  while (index < input.length) {
    if (input.startsWith(EMBED_MARKER, index)) {
      const end = scanEmbeddedSpan(input, index);
      if (end === null) return { kind: 'unbalanced', start: index };
      index = end;
      continue;
    }

    if (input.charAt(index) === KEY_VALUE_SEPARATOR) {
      return { kind: 'separator', index };
    }

    index++;
  }

  return NO_SEPARATOR;
}
