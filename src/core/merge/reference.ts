/**
 * Syntactic resolution of resource references in expression text.
 *
 * Only direct addresses of a candidate kind resolve. Variables, locals,
 * module outputs, templates, calls and conditionals never do.
 */
import type { ResourceIdentity } from './types.js';

const NAME = '[A-Za-z_][A-Za-z0-9_-]*';

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Resolve `<kind>.<name>.<field>` or `<kind>["<name>"].<field>`.
 */
export function resolveReference(
  expression: string,
  candidateKinds: readonly string[]
): ResourceIdentity | null {
  const text = expression.trim();
  for (const kind of candidateKinds) {
    const k = escapeRegExp(kind);
    const dot = new RegExp(`^${k}\\.(${NAME})(?:\\[[^\\]]*\\])?\\.${NAME}$`).exec(text);
    if (dot) return { kind, name: dot[1] };
    const indexed = new RegExp(`^${k}\\["([^"\\\\]+)"\\]\\.${NAME}$`).exec(text);
    if (indexed) return { kind, name: indexed[1] };
  }
  return null;
}
