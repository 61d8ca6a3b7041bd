/**
 * Destination of the writer: variable or property name to classified value.
 *
 * Owned by the calling engine. Keys are unique; a later write for the same key
 * replaces the earlier value.
 */
export type BindingMap = Record<string, unknown>;

/**
 * A token split into its key segment and its raw value segment.
 *
 * Example:
 * `foo=${a == b ? 1 : 2}` -> `{ key: 'foo', value: '${a == b ? 1 : 2}' }`
 */
export type TokenPair = {
  key: string;
  value: string;
};

/**
 * What to do with a token that cannot be split.
 *
 * - `throw`: abort with a `TokenSyntaxError`.
 * - `skip`:  drop the token and log it.
 */
export type NoMatchPolicy = 'throw' | 'skip';

/**
 * Minimal logging contract used by the grammar and the writer.
 * A winston `Logger` satisfies it.
 */
export interface BindingLogger {
  warn(message: string, meta?: Record<string, unknown>): void;
  debug(message: string, meta?: Record<string, unknown>): void;
}
