import type { StandardSchemaV1 } from '@standard-schema/spec';
import type { BindingLogger, NoMatchPolicy } from './bindings';

/**
 * Validation applied to a freshly built binding map.
 *
 * Role: Behavioral Driver.
 * - `StandardSchemaV1`: the map is validated and the schema output returned.
 * - `undefined`: passthrough, the map is returned as written.
 */
export type BindingSchema = StandardSchemaV1 | undefined;

/**
 * Options accepted by `createBindingWriter`.
 */
export type WriterOptions = {
  /**
   * Keys whose value always resolves to an array of strings when embedding
   * is enabled.
   * @default ['jcr:mixinTypes']
   */
  arrayKeys?: Iterable<string>;

  /**
   * Policy for tokens the grammar cannot split.
   * @default 'throw'
   */
  onNoMatch?: NoMatchPolicy;

  /**
   * Schema checked against maps built by `bindings(...)`.
   */
  schema?: BindingSchema;

  /**
   * Receives skipped tokens and value coercions.
   * Defaults to the library's winston logger.
   */
  logger?: BindingLogger;
};

/**
 * `WriterOptions` with every default applied.
 */
export type ResolvedWriterOptions = {
  arrayKeys: ReadonlySet<string>;
  onNoMatch: NoMatchPolicy;
  schema: BindingSchema;
  logger: BindingLogger;
};
