export {
  BOOLEAN_KEYWORDS,
  DEFAULT_ARRAY_KEYS,
  EMBED_MARKER,
  NODE_MIXIN_TYPES_KEY
} from './constants';
export { BindingValidationError, TokenSyntaxError, UsageError } from './errors';
export { isEmbedded } from './guards';
export { createLogger, resolveLogLevel } from './logger';

export {
  findUnguardedSeparator,
  scanEmbeddedSpan,
  splitToken,
  tokensToPairs
} from './grammar';
export type { SeparatorScan, TokensToPairsOptions } from './grammar';

export { classify, detectValueShape, embed } from './classifier';
export type { EmbedTrigger, ValueShape } from './classifier';

export { parseList, toNameList } from './mixins';

export {
  checkArguments,
  createBindingWriter,
  resolveWriterOptions,
  writeEntries,
  writeToMap
} from './writer';
export type { BindingEntry, BindingWriter } from './writer';

export { validateBindings } from './validator';

export {
  parseEmbeddedExpression,
  referencedBindings,
  unwrapExpression
} from './expression';
export type { ExpressionParseResult } from './expression';

export type * from './types';
