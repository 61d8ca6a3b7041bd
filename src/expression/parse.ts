import { type types, is } from 'estree-toolkit';
import { parse } from 'meriyah';
import { EMBED_MARKER } from '../constants';
import { scanEmbeddedSpan } from '../grammar';
import { isArray, isRecord } from '../guards';
import { isString } from '../utils/type-guards';

/**
 * Outcome of parsing an embedded expression.
 *
 * Pattern:
 * - `success: true`  => `program` holds the parsed body and `expression` its
 *                       single expression.
 * - `success: false` => `reason` says why the value was not parsable.
 */
export type ExpressionParseResult =
  | { success: true; program: types.Program; expression: types.Expression }
  | { success: false; reason: string };

/**
 * Checks whether a runtime value is “node-like” enough to be treated as an
 * ESTree node by the `estree-toolkit` type guards.
 */
function isNodeLike(value: unknown): value is types.Node {
  return isRecord(value) && !isArray(value) && typeof value.type === 'string';
}

/**
 * Returns the body of a value that is exactly one balanced `${...}` span.
 *
 * @example
 * ```ts
 * unwrapExpression('${a ? 1 : 2}');     // 'a ? 1 : 2'
 * unwrapExpression('/content/${name}'); // null (span is not the whole value)
 * unwrapExpression('${a');              // null (unbalanced)
 * ```
 */
export function unwrapExpression(value: unknown): string | null {
  if (!isString(value) || !value.startsWith(EMBED_MARKER)) return null;

  const end = scanEmbeddedSpan(value, 0);
  if (end !== value.length) return null;

  return value.slice(EMBED_MARKER.length, -1);
}

/**
 * Parses the body of an embedded expression as a JavaScript expression.
 *
 * Inspection only: nothing is evaluated. Never throws; parse errors are
 * reported as `success: false`.
 *
 * The body is wrapped in parentheses so that object literals parse as
 * expressions, and the result must be a single expression statement, so a
 * body such as `a); b(` is rejected.
 */
export function parseEmbeddedExpression(value: unknown): ExpressionParseResult {
  const body = unwrapExpression(value);
  if (body === null) {
    return { success: false, reason: 'Value is not a single ${...} expression.' };
  }

  let ast: unknown;
  try {
    ast = parse(`(${body})`);
  } catch (error) {
    return {
      success: false,
      reason: error instanceof Error ? error.message : String(error)
    };
  }

  if (!isNodeLike(ast) || !is.program(ast)) {
    return { success: false, reason: 'Parser did not produce a Program node.' };
  }

  const [first, ...rest] = ast.body;
  if (!first || rest.length > 0 || !is.expressionStatement(first)) {
    return { success: false, reason: 'Body is not a single expression.' };
  }

  return { success: true, program: ast, expression: first.expression };
}
