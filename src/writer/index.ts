import type { StandardSchemaV1 } from '@standard-schema/spec';
import type { BindingMap, ResolvedWriterOptions, WriterOptions } from '../types';
import { classify } from '../classifier';
import { tokensToPairs } from '../grammar';
import { isString } from '../utils/type-guards';
import { toNameList } from '../mixins';
import { validateBindings } from '../validator';
import { checkArguments } from './arguments';
import { resolveWriterOptions } from './options';

export { checkArguments, type BindingEntry } from './arguments';
export { resolveWriterOptions } from './options';

/**
 * Writer bound to one set of options.
 *
 * @template Output
 *   Type returned by `bindings(...)`: the schema output when a schema is
 *   configured, otherwise a plain `BindingMap`.
 */
export type BindingWriter<Output = BindingMap> = {
  /**
   * Writes alternating keys and values into `map`.
   * See {@link writeEntries}.
   */
  write(map: BindingMap, embed: boolean, ...params: unknown[]): void;

  /**
   * Splits `key=value` tokens and writes them into `map`.
   */
  writeTokens(map: BindingMap, embed: boolean, tokens: readonly string[]): void;

  /**
   * Builds a fresh map from `key=value` tokens and validates it against the
   * configured schema, if any.
   *
   * @param embed - Classify values (default `true`).
   * @param context - Name used in validation errors (default `'bindings'`).
   */
  bindings(tokens: readonly string[], embed?: boolean, context?: string): Output;
};

/**
 * Stores `value` as an own enumerable property, for every key including
 * `__proto__`.
 */
function setBinding(map: BindingMap, key: string, value: unknown): void {
  Object.defineProperty(map, key, {
    value,
    writable: true,
    enumerable: true,
    configurable: true
  });
}

/**
 * Computes the stored form of one value when embedding is enabled.
 */
function embedValue(
  key: string,
  value: unknown,
  options: ResolvedWriterOptions
): unknown {
  if (!options.arrayKeys.has(key)) return classify(value);

  if (!isString(value)) {
    options.logger.debug('Coercing non-string value of an array-typed key', {
      key,
      type: Array.isArray(value) ? 'array' : typeof value
    });
  }
  return toNameList(value);
}

/**
 * Writes alternating keys and values into a caller-owned binding map.
 *
 * Pipeline
 * --------
 * 1. Check the argument list (even length, string keys). A rejected list
 *    leaves `map` untouched.
 * 2. For each pair, left to right:
 *    - `embed === false`: store the value unmodified.
 *    - array-typed key:   store the parsed name list (always an array).
 *    - any other key:     store `classify(value)`.
 *
 * A later pair for the same key overwrites the earlier one.
 *
 * @throws `UsageError` for a malformed argument list.
 */
export function writeEntries(
  map: BindingMap,
  embed: boolean,
  params: readonly unknown[],
  options: ResolvedWriterOptions
): void {
  const entries = checkArguments(params);

  for (const [key, value] of entries) {
    setBinding(map, key, embed ? embedValue(key, value, options) : value);
  }
}

/**
 * Creates a writer over a fixed set of options.
 *
 * @example
 * ```ts
 * const writer = createBindingWriter({ arrayKeys: ['jcr:mixinTypes', 'tags'] });
 * const map = {};
 * writer.writeTokens(map, true, ['title=\'Hello\'', 'tags=[ a, b ]']);
 * // { title: "${'Hello'}", tags: ['a', 'b'] }
 * ```
 */
export function createBindingWriter<S extends StandardSchemaV1>(
  options: WriterOptions & { schema: S }
): BindingWriter<StandardSchemaV1.InferOutput<S>>;
export function createBindingWriter(options?: WriterOptions): BindingWriter;
export function createBindingWriter(
  options: WriterOptions = {}
): BindingWriter<unknown> {
  const resolved = resolveWriterOptions(options);

  const write = (map: BindingMap, embed: boolean, ...params: unknown[]) => {
    writeEntries(map, embed, params, resolved);
  };

  const writeTokens = (
    map: BindingMap,
    embed: boolean,
    tokens: readonly string[]
  ) => {
    const params = tokensToPairs(tokens, {
      onNoMatch: resolved.onNoMatch,
      logger: resolved.logger
    });
    writeEntries(map, embed, params, resolved);
  };

  const bindings = (
    tokens: readonly string[],
    embed = true,
    context = 'bindings'
  ): unknown => {
    const map: BindingMap = {};
    writeTokens(map, embed, tokens);

    if (!resolved.schema) return map;
    return validateBindings(resolved.schema, map, context);
  };

  return { write, writeTokens, bindings };
}

const defaultWriter = createBindingWriter();

/**
 * Writes alternating keys and values into `map` with the default options
 * (`jcr:mixinTypes` as the only array-typed key).
 *
 * @example
 * ```ts
 * const map = {};
 * writeToMap(map, true, 'p1', "'some string'", 'p2', '/some/path');
 * // { p1: "${'some string'}", p2: '/some/path' }
 * ```
 */
export function writeToMap(
  map: BindingMap,
  embed: boolean,
  ...params: unknown[]
): void {
  defaultWriter.write(map, embed, ...params);
}
