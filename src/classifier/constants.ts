import { BOOLEAN_KEYWORDS } from '../constants';

/**
 * Syntactic trait that makes a plain string an expression to embed.
 */
export type EmbedTrigger =
  | 'quote'
  | 'bracket'
  | 'parenthesis'
  | 'boolean-keyword';

/**
 * Shape of a raw value as seen by the classifier.
 *
 * - `non-string`: already typed (number, boolean, array...), passed through.
 * - `embedded`:   contains `${` somewhere, passed through.
 * - `literal`:    no trigger matched (paths, identifiers), passed through.
 * - an {@link EmbedTrigger}: wrapped as `${<value>}`.
 */
export type ValueShape = 'non-string' | 'embedded' | 'literal' | EmbedTrigger;

type EmbedRule = {
  trigger: EmbedTrigger;
  matches: (value: string) => boolean;
};

/**
 * Ordered trigger rules; the first match decides the shape.
 *
 * 1. quote:           `'some string'`, `new Date("2018-05-05")`
 * 2. bracket:         `['one','two']`, `vegetables['jcr:title']`
 * 3. parenthesis:     `f(x)`, `new Date()`
 * 4. boolean-keyword: exactly `true` or `false`
 */
export const EMBED_RULES: readonly EmbedRule[] = [
  { trigger: 'quote', matches: value => /['"]/.test(value) },
  { trigger: 'bracket', matches: value => /[[\]]/.test(value) },
  { trigger: 'parenthesis', matches: value => /[()]/.test(value) },
  { trigger: 'boolean-keyword', matches: value => BOOLEAN_KEYWORDS.has(value) }
];
