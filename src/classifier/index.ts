import { CLOSE_BRACE, EMBED_MARKER } from '../constants';
import { isEmbedded } from '../guards';
import { isString } from '../utils/type-guards';
import { EMBED_RULES, type ValueShape } from './constants';

export { EMBED_RULES } from './constants';
export type { EmbedTrigger, ValueShape } from './constants';

/**
 * Determines the {@link ValueShape} of a raw value.
 *
 * Pure: depends only on the value's type and its text.
 *
 * @param value
 *   Raw value as found in configuration or produced by `splitToken`.
 * @returns
 *   The first applicable shape, in the order documented on `ValueShape`.
 */
export function detectValueShape(value: unknown): ValueShape {
  if (!isString(value)) return 'non-string';
  if (isEmbedded(value)) return 'embedded';

  const rule = EMBED_RULES.find(candidate => candidate.matches(value));
  return rule ? rule.trigger : 'literal';
}

/**
 * Wraps text as an embedded expression, verbatim (no escaping, no quoting).
 */
export function embed(expression: string): string {
  return `${EMBED_MARKER}${expression}${CLOSE_BRACE}`;
}

/**
 * Classifies a raw value into a literal or an embedded expression.
 *
 * - Non-strings are returned as is.
 * - Strings already containing `${` are returned as is, including mixed
 *   strings such as `/content/json/array/${json.test}`.
 * - Strings with a quote, a square bracket, a parenthesis, or equal to
 *   `true`/`false` are wrapped: `'x'` -> `${'x'}`.
 * - Anything else (paths, identifiers) is a literal, returned as is.
 *
 * Idempotent: a wrapped result contains `${` and is never wrapped again.
 */
export function classify(value: string): string;
export function classify<T>(value: T): T;
export function classify(value: unknown): unknown {
  if (!isString(value)) return value;

  const shape = detectValueShape(value);
  return shape === 'embedded' || shape === 'literal' ? value : embed(value);
}
