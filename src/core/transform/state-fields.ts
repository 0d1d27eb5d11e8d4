/**
 * Field-level edits on state instance attributes.
 */
import type { JsonObject, JsonValue } from '../model/json.js';

/** Remove fields; returns how many were present. */
export function removeFields(attributes: JsonObject, ...names: string[]): number {
  let removed = 0;
  for (const name of names) {
    if (Object.prototype.hasOwnProperty.call(attributes, name)) {
      delete attributes[name];
      removed++;
    }
  }
  return removed;
}

/**
 * Numeric form of a value. Numeric strings are converted; anything else is
 * returned unchanged.
 */
export function toNumber(value: JsonValue): JsonValue {
  if (typeof value !== 'string' || value.trim() === '') return value;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : value;
}

/** Coerce a field in place with {@link toNumber}, when present. */
export function coerceNumberField(attributes: JsonObject, name: string): void {
  if (Object.prototype.hasOwnProperty.call(attributes, name)) {
    attributes[name] = toNumber(attributes[name]);
  }
}
