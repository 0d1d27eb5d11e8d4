/**
 * AttributeView over a configuration body. Values are read from the
 * expression text; non-literals come back as expressions.
 */
import type { AttributeView } from '../model/attribute-value.js';
import { parseValue } from './literal.js';
import type { Body } from './tree.js';

export function bodyAttributeView(body: Body): AttributeView {
  return {
    has: (name) => {
      const attr = body.getAttribute(name);
      return attr !== undefined && parseValue(attr.expression).kind !== 'null';
    },
    get: (name) => {
      const attr = body.getAttribute(name);
      return attr === undefined ? undefined : parseValue(attr.expression);
    },
  };
}
