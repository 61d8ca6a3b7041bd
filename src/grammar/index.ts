export { splitToken } from './split-token';
export { findUnguardedSeparator, scanEmbeddedSpan } from './scanner';
export type { SeparatorScan } from './scanner';
export { tokensToPairs } from './tokens';
export type { TokensToPairsOptions } from './tokens';
