/**
 * State pipeline: parse, run document-wide preprocessing, transform every
 * resource instance through its migrator, serialize.
 */
import { isJsonArray, isJsonObject, type JsonValue } from '../model/json.js';
import type { MigratorRegistry } from '../registry/migrator-registry.js';
import { parseState, removeResources, serializeState } from '../state/document.js';
import type { StateContext } from '../transform/types.js';
import { logger as defaultLogger } from '../../utils/logger.js';
import { errorMessage, type PipelineOptions, type StateMigrationResult } from './types.js';

/** Data sources keep their schema; only managed resources migrate. */
const DATA_MODE = 'data';

export function migrateState(
  content: string,
  registry: MigratorRegistry,
  options: PipelineOptions
): StateMigrationResult {
  const doc = parseState(content);
  const log = options.logger ?? defaultLogger;
  const ctx: StateContext = {
    document: doc,
    sourceVersion: options.sourceVersion,
    targetVersion: options.targetVersion,
    diagnostics: [],
    logger: log,
  };
  const before = serializeState(doc);

  for (const migrator of registry.all(options.sourceVersion, options.targetVersion)) {
    if (!migrator.preprocessState) continue;
    try {
      migrator.preprocessState(doc, ctx);
    } catch (error) {
      log.warn(`State preprocessing failed: ${errorMessage(error)}`);
      ctx.diagnostics.push({ level: 'error', message: `State preprocessing failed: ${errorMessage(error)}` });
    }
  }

  let transformed = 0;
  const emptied = new Set<number>();
  for (const resource of doc.resources()) {
    if (resource.value.mode === DATA_MODE) continue;
    const migrator = registry.get(resource.type, options.sourceVersion, options.targetVersion);
    if (!migrator) continue;
    const instances = resource.value.instances;
    if (!isJsonArray(instances)) continue;

    const address = `${resource.type}.${resource.name}`;
    const kept: JsonValue[] = [];
    let resourceType: string | undefined;
    for (const instance of instances) {
      if (!isJsonObject(instance)) {
        kept.push(instance);
        continue;
      }
      try {
        const result = migrator.transformState(instance, resource, ctx);
        if (result.instance) kept.push(result.instance);
        if (result.resourceType) resourceType = result.resourceType;
      } catch (error) {
        kept.push(instance);
        log.warn(`Failed to migrate state of ${address}: ${errorMessage(error)}`);
        ctx.diagnostics.push({
          level: 'error',
          message: `Failed to migrate state of ${address}: ${errorMessage(error)}`,
          resource: address,
        });
      }
    }

    transformed++;
    resource.value.instances = kept;
    if (resourceType) resource.value.type = resourceType;
    if (kept.length === 0 && instances.length > 0) emptied.add(resource.index);
  }

  const removedResources = removeResources(doc, (resource) => emptied.has(resource.index));
  const output = serializeState(doc);
  const changed = output !== before;
  return {
    content: changed ? output : content,
    changed,
    transformed,
    removedResources,
    diagnostics: ctx.diagnostics,
  };
}
