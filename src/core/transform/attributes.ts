/**
 * Attribute-level edits on configuration blocks.
 */
import { parseValue } from '../hcl/literal.js';
import type { Block, Body } from '../hcl/tree.js';
import type { AttributeValue } from '../model/attribute-value.js';

/** Replace the kind label of a `resource "<kind>" "<name>"` block. */
export function renameResourceType(block: Block, kind: string): void {
  const [, ...rest] = block.labels;
  block.setLabels([kind, ...rest]);
}

/** Remove attributes; returns how many were present. */
export function removeAttributes(body: Body, ...names: string[]): number {
  return names.filter((name) => body.removeAttribute(name)).length;
}

/** Set an attribute only when it is missing. */
export function ensureAttribute(body: Body, name: string, value: AttributeValue): boolean {
  if (body.hasAttribute(name)) return false;
  body.setAttributeValue(name, value);
  return true;
}

/** Source attribute, optionally renamed inside the nested object. */
export type NestedField = string | readonly [source: string, field: string];

/**
 * Gather attributes into one object attribute, e.g. `port = 80` and
 * `path = "/"` into `check = { port = 80, path = "/" }`. Field order follows
 * `fields`; the sources are removed. Returns the number of fields moved.
 */
export function moveAttributesToNestedObject(
  body: Body,
  target: string,
  fields: readonly NestedField[]
): number {
  const moved: Array<[string, AttributeValue]> = [];
  const sources: string[] = [];
  for (const field of fields) {
    const [source, name] = typeof field === 'string' ? [field, field] : field;
    const attr = body.getAttribute(source);
    if (!attr) continue;
    moved.push([name, parseValue(attr.expression)]);
    sources.push(source);
  }
  if (moved.length === 0) return 0;
  body.setAttributeValue(target, { kind: 'object', fields: moved });
  for (const source of sources) {
    body.removeAttribute(source);
  }
  return moved.length;
}
