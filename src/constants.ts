/**
 * Reserved literals shared by the grammar, the classifier and the writer.
 *
 * Keeping them here prevents the classifier and its callers from drifting
 * apart on what counts as an embedded expression or a reserved key.
 */

/**
 * Opening sequence of an embedded expression (`${...}`).
 *
 * A string containing this sequence anywhere is considered already embedded
 * and is never wrapped again.
 */
export const EMBED_MARKER = '${';

/** Brace that increases the nesting depth inside an embedded span. */
export const OPEN_BRACE = '{';

/** Brace that decreases the nesting depth inside an embedded span. */
export const CLOSE_BRACE = '}';

/** Separator between the key and the value segment of a token. */
export const KEY_VALUE_SEPARATOR = '=';

/**
 * Node property holding the mixin types of a content node.
 * Its value is always written as an array of type names.
 */
export const NODE_MIXIN_TYPES_KEY = 'jcr:mixinTypes';

/**
 * Keys resolved to arrays when no `arrayKeys` option is given.
 */
export const DEFAULT_ARRAY_KEYS: readonly string[] = [NODE_MIXIN_TYPES_KEY];

/**
 * Bare keywords evaluated as native booleans rather than kept as text.
 */
export const BOOLEAN_KEYWORDS: ReadonlySet<string> = new Set(['true', 'false']);
