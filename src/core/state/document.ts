/**
 * Terraform state document: the parsed JSON value plus path helpers.
 *
 * The document keeps the value JSON.parse produced, so fields the migrator
 * never touches (and their order) survive serialization unchanged.
 */
import { ErrorCodes, StateError } from '../../utils/errors.js';
import { formatZodError } from '../../utils/yaml.js';
import { isJsonArray, isJsonObject, type JsonObject, type JsonValue } from '../model/json.js';
import { StateFileSchema } from './schema.js';

export type JsonPath = ReadonlyArray<string | number>;

export interface StateResource {
  /** Position in the `resources` array */
  index: number;
  type: string;
  name: string;
  value: JsonObject;
}

export class StateDocument {
  /** Cross-resource passes already applied to this document in this run */
  readonly passes = new Set<string>();

  constructor(readonly root: JsonObject) {}

  resources(): StateResource[] {
    const list = this.root.resources;
    if (!isJsonArray(list)) return [];
    const result: StateResource[] = [];
    list.forEach((value, index) => {
      if (!isJsonObject(value)) return;
      const { type, name } = value;
      if (typeof type !== 'string' || typeof name !== 'string') return;
      result.push({ index, type, name, value });
    });
    return result;
  }
}

export function parseState(text: string): StateDocument {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new StateError(
      ErrorCodes.INVALID_STATE,
      `Invalid state JSON: ${error instanceof Error ? error.message : 'Unknown error'}`
    );
  }
  if (!isJsonObject(parsed)) {
    throw new StateError(ErrorCodes.INVALID_STATE, 'State document must be a JSON object');
  }
  const result = StateFileSchema.safeParse(parsed);
  if (!result.success) {
    throw new StateError(
      ErrorCodes.INVALID_STATE,
      `Invalid state document: ${formatZodError(result.error)}`,
      { errors: result.error.issues }
    );
  }
  return new StateDocument(parsed);
}

export function serializeState(doc: StateDocument): string {
  return `${JSON.stringify(doc.root, null, 2)}\n`;
}

export function getPath(root: JsonValue, path: JsonPath): JsonValue | undefined {
  let current: JsonValue | undefined = root;
  for (const segment of path) {
    if (typeof segment === 'number') {
      current = isJsonArray(current) ? current[segment] : undefined;
    } else {
      current = isJsonObject(current) ? current[segment] : undefined;
    }
    if (current === undefined) return undefined;
  }
  return current;
}

/**
 * Set a value, creating missing objects along the way. Returns false when
 * an existing value on the path is not a container of the right kind.
 */
export function setPath(root: JsonObject, path: JsonPath, value: JsonValue): boolean {
  if (path.length === 0) return false;
  let current: JsonValue = root;
  for (let i = 0; i < path.length - 1; i++) {
    const segment = path[i];
    let next = readSegment(current, segment);
    if (next === undefined || next === null) {
      next = {};
      if (!writeSegment(current, segment, next)) return false;
    }
    current = next;
  }
  return writeSegment(current, path[path.length - 1], value);
}

function readSegment(container: JsonValue, segment: string | number): JsonValue | undefined {
  if (typeof segment === 'number') return isJsonArray(container) ? container[segment] : undefined;
  return isJsonObject(container) ? container[segment] : undefined;
}

function writeSegment(container: JsonValue, segment: string | number, value: JsonValue): boolean {
  if (typeof segment === 'number') {
    if (!isJsonArray(container)) return false;
    container[segment] = value;
    return true;
  }
  if (!isJsonObject(container)) return false;
  container[segment] = value;
  return true;
}

/** Path of a resource's first instance attributes. */
export function attributesPath(resourceIndex: number): JsonPath {
  return ['resources', resourceIndex, 'instances', 0, 'attributes'];
}

/**
 * Remove every resource the predicate selects. Returns the number removed.
 */
export function removeResources(
  doc: StateDocument,
  predicate: (resource: StateResource) => boolean
): number {
  const list = doc.root.resources;
  if (!isJsonArray(list)) return 0;
  const doomed = doc.resources().filter(predicate).map((resource) => resource.index);
  for (const index of doomed.reverse()) {
    list.splice(index, 1);
  }
  return doomed.length;
}

/** First-instance attributes of a resource, when present. */
export function instanceAttributes(resource: StateResource): JsonObject | undefined {
  const attributes = getPath(resource.value, ['instances', 0, 'attributes']);
  return isJsonObject(attributes) ? attributes : undefined;
}
