export * from './attribute-value.js';
export * from './json.js';
