export * from './types.js';
export {
  renameResourceType,
  removeAttributes,
  ensureAttribute,
  moveAttributesToNestedObject,
  type NestedField,
} from './attributes.js';
export { removeFields, toNumber, coerceNumberField } from './state-fields.js';
