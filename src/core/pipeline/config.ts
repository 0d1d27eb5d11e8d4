/**
 * Configuration pipeline: parse, transform every resource block through
 * its migrator, serialize.
 */
import { parseConfig } from '../hcl/parser.js';
import { resourceLabels } from '../hcl/tree.js';
import { serializeConfig } from '../hcl/writer.js';
import type { MigratorRegistry } from '../registry/migrator-registry.js';
import type { ConfigContext } from '../transform/types.js';
import { logger as defaultLogger } from '../../utils/logger.js';
import { errorMessage, type ConfigMigrationResult, type PipelineOptions } from './types.js';

/**
 * Migrate one configuration file. A failing resource becomes an error
 * diagnostic and the rest of the file is still migrated; syntax errors
 * throw ParseError.
 */
export function migrateConfig(
  content: string,
  filename: string,
  registry: MigratorRegistry,
  options: PipelineOptions
): ConfigMigrationResult {
  const file = parseConfig(content, filename);
  const log = options.logger ?? defaultLogger;
  const ctx: ConfigContext = {
    file,
    sourceVersion: options.sourceVersion,
    targetVersion: options.targetVersion,
    diagnostics: [],
    logger: log,
  };

  let transformed = 0;
  for (const block of file.resourceBlocks()) {
    // an earlier migrator may have removed this block
    if (!file.body.containsBlock(block)) continue;
    const labels = resourceLabels(block);
    if (!labels) continue;
    const migrator = registry.get(labels.kind, options.sourceVersion, options.targetVersion);
    if (!migrator) continue;

    const address = `${labels.kind}.${labels.name}`;
    try {
      migrator.transformConfig(block, ctx);
      transformed++;
    } catch (error) {
      log.warn(`${filename}: failed to migrate ${address}: ${errorMessage(error)}`);
      ctx.diagnostics.push({
        level: 'error',
        message: `Failed to migrate ${address}: ${errorMessage(error)}`,
        resource: address,
      });
    }
  }

  const output = serializeConfig(file);
  return {
    filename,
    content: output,
    changed: output !== content,
    transformed,
    diagnostics: ctx.diagnostics,
  };
}
