/**
 * Attribute values shared by the configuration tree and the state tree.
 *
 * An `expression` is anything that is not a plain literal (references,
 * function calls, templates, conditionals); it keeps its source text and is
 * never evaluated.
 */
import { isJsonArray, type JsonObject, type JsonValue } from './json.js';

export type AttributeValue =
  | { kind: 'string'; value: string }
  | { kind: 'number'; value: number }
  | { kind: 'bool'; value: boolean }
  | { kind: 'null' }
  | { kind: 'list'; items: AttributeValue[] }
  | ObjectValue
  | { kind: 'expression'; text: string };

export interface ObjectValue {
  kind: 'object';
  fields: Array<[string, AttributeValue]>;
}

/**
 * Read-only attribute lookup, independent of where the attributes live.
 * `has` is false for absent and null attributes.
 */
export interface AttributeView {
  has(name: string): boolean;
  get(name: string): AttributeValue | undefined;
}

export const stringValue = (value: string): AttributeValue => ({ kind: 'string', value });
export const numberValue = (value: number): AttributeValue => ({ kind: 'number', value });
export const boolValue = (value: boolean): AttributeValue => ({ kind: 'bool', value });

export function objectValue(fields: Array<[string, AttributeValue]>): ObjectValue {
  return { kind: 'object', fields };
}

export function asString(value: AttributeValue | undefined): string | undefined {
  return value?.kind === 'string' ? value.value : undefined;
}

/**
 * Numeric view of a value; numeric strings count, as state files sometimes
 * carry numbers as strings.
 */
export function asNumber(value: AttributeValue | undefined): number | undefined {
  if (value?.kind === 'number') return value.value;
  if (value?.kind === 'string' && value.value.trim() !== '') {
    const parsed = Number(value.value);
    return Number.isFinite(parsed) ? parsed : undefined;
  }
  return undefined;
}

/**
 * True only for a literal true (`true` or the string "true").
 */
export function isLiteralTrue(value: AttributeValue | undefined): boolean {
  if (value?.kind === 'bool') return value.value;
  return value?.kind === 'string' && value.value === 'true';
}

export function getField(value: ObjectValue, name: string): AttributeValue | undefined {
  return value.fields.find(([key]) => key === name)?.[1];
}

export function fromJson(value: JsonValue): AttributeValue {
  if (value === null) return { kind: 'null' };
  if (typeof value === 'string') return stringValue(value);
  if (typeof value === 'number') return numberValue(value);
  if (typeof value === 'boolean') return boolValue(value);
  if (isJsonArray(value)) return { kind: 'list', items: value.map(fromJson) };
  return objectValue(Object.entries(value).map(([key, item]) => [key, fromJson(item)]));
}

/**
 * Convert to JSON. Expressions have no JSON form and yield undefined.
 */
export function toJson(value: AttributeValue): JsonValue | undefined {
  switch (value.kind) {
    case 'string':
    case 'number':
    case 'bool':
      return value.value;
    case 'null':
      return null;
    case 'list': {
      const items: JsonValue[] = [];
      for (const item of value.items) {
        const converted = toJson(item);
        if (converted === undefined) return undefined;
        items.push(converted);
      }
      return items;
    }
    case 'object': {
      const result: JsonObject = {};
      for (const [key, item] of value.fields) {
        const converted = toJson(item);
        if (converted === undefined) return undefined;
        result[key] = converted;
      }
      return result;
    }
    case 'expression':
      return undefined;
  }
}

/**
 * Attribute view over a JSON object (state attributes, state list items).
 */
export function jsonAttributeView(source: JsonObject): AttributeView {
  return {
    has: (name) => Object.prototype.hasOwnProperty.call(source, name) && source[name] !== null,
    get: (name) => {
      if (!Object.prototype.hasOwnProperty.call(source, name)) return undefined;
      return fromJson(source[name]);
    },
  };
}

/**
 * Attribute view over an object value (config object literals).
 */
export function objectAttributeView(source: ObjectValue): AttributeView {
  return {
    has: (name) => {
      const value = getField(source, name);
      return value !== undefined && value.kind !== 'null';
    },
    get: (name) => getField(source, name),
  };
}
