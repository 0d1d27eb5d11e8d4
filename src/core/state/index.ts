export {
  StateDocument,
  parseState,
  serializeState,
  getPath,
  setPath,
  attributesPath,
  removeResources,
  instanceAttributes,
  type JsonPath,
  type StateResource,
} from './document.js';
export { jsonAttributeView as attributeView } from '../model/attribute-value.js';
export { StateFileSchema, StateResourceSchema, StateInstanceSchema } from './schema.js';
