/**
 * HCL configuration files: parsing, editing and serialization.
 */
export { parseConfig } from './parser.js';
export { serializeConfig, renderBlock } from './writer.js';
export { parseValue, renderValue, quoteString } from './literal.js';
export { bodyAttributeView } from './view.js';
export {
  Block,
  Body,
  ConfigFile,
  isBlankTrivia,
  resourceLabels,
  type AttributeNode,
  type BodyItem,
  type TriviaNode,
} from './tree.js';
