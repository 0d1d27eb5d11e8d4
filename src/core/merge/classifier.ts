/**
 * Variant classification for unified device-profile style resources.
 */
import { isLiteralTrue, type AttributeView } from '../model/attribute-value.js';
import type { ClassifierFields, MergeRule, Variant } from './types.js';

/**
 * First match wins:
 * 1. explicit `isDefault = true` is Default, whatever else is set;
 * 2. both match and precedence present is Custom;
 * 3. anything else is Default.
 */
export function classifyAttributes(view: AttributeView, fields: ClassifierFields): Variant {
  if (isLiteralTrue(view.get(fields.isDefault))) return 'default';
  if (view.has(fields.match) && view.has(fields.precedence)) return 'custom';
  return 'default';
}

/**
 * Variant of a primary of any recognized kind, or undefined when the kind
 * is not a primary under the rule.
 */
export function classifyPrimary(kind: string, view: AttributeView, rule: MergeRule): Variant | undefined {
  if (kind === rule.defaultKind) return 'default';
  if (kind === rule.customKind) return 'custom';
  if (rule.legacyKinds.includes(kind)) return classifyAttributes(view, rule.classifierFields);
  return undefined;
}
