import { type NodePath, type types, is, traverse } from 'estree-toolkit';
import { parseEmbeddedExpression } from './parse';

/**
 * Whether the identifier sits where a name is read or declared, as opposed
 * to naming a property.
 *
 * Excluded:
 * - non-computed member properties: `name` in `item.name`
 * - non-computed object keys:       `path` in `{ path: base }`
 * - function expression names:      `f` in `function f() {}`
 */
function isNamePosition(path: NodePath<types.Identifier>): boolean {
  const parent = path.parentPath?.node;
  if (!parent) return true;

  if (is.memberExpression(parent) && path.key === 'property') {
    return parent.computed;
  }
  if (is.property(parent) && path.key === 'key') {
    return parent.computed;
  }
  if (is.functionExpression(parent) && path.key === 'id') {
    return false;
  }

  return true;
}

/**
 * Lists the free identifiers an embedded expression reads, in order of first
 * occurrence.
 *
 * The calling engine uses this to check that a binding map covers the names
 * an expression needs before handing both to the evaluator. Globals such as
 * `Date` are listed too; telling them apart from bindings is the caller's
 * concern.
 *
 * Scope
 * -----
 * A name is free when no enclosing scope of the expression binds it where it
 * is read. Parameters (plain, destructured or defaulted) and declarations of
 * inner functions therefore drop out, but only inside those functions:
 * in `x + list.map(x => x)` the outer `x` is still free.
 *
 * @param value
 *   A value of the form `${...}`.
 * @returns
 *   The names, or `[]` when the value is not a single parsable expression.
 *
 * @example
 * ```ts
 * referencedBindings("${vegetables['jcr:title']}");     // ['vegetables']
 * referencedBindings('${items.map(({ id }) => id)}');    // ['items']
 * referencedBindings('${x + list.map(x => x).length}'); // ['x', 'list']
 * ```
 */
export function referencedBindings(value: unknown): string[] {
  const parsed = parseEmbeddedExpression(value);
  if (!parsed.success) return [];

  const reads: string[] = [];

  traverse(parsed.program, {
    $: { scope: true },
    Identifier(path) {
      const node = path.node;
      if (!node || !isNamePosition(path)) return;

      if (path.scope?.hasBinding(node.name)) return;

      reads.push(node.name);
    }
  });

  return [...new Set(reads)];
}
