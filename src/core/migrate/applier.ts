/**
 * Migration applier - runs the pipelines over a plan and writes results.
 */
import { migrateConfig } from '../pipeline/config.js';
import { migrateState } from '../pipeline/state.js';
import type { MigrationOutput } from '../pipeline/types.js';
import type { MigratorRegistry } from '../registry/migrator-registry.js';
import { copyFile, readFile, writeFile } from '../../utils/file-system.js';
import { TfMigrateError } from '../../utils/errors.js';
import { logger as defaultLogger, type Logger } from '../../utils/logger.js';
import type { MigrateApplyOptions, MigrationPlan, MigrationResult, PlannedFile } from './types.js';

export const BACKUP_SUFFIX = '.backup';

/**
 * Apply migrations from a plan. One failing file does not stop the others.
 */
export async function applyMigrations(
  plan: MigrationPlan,
  registry: MigratorRegistry,
  options: MigrateApplyOptions = {},
  log: Logger = defaultLogger
): Promise<MigrationResult> {
  const result: MigrationResult = {
    success: [],
    unchanged: [],
    failed: [],
    diagnostics: [],
  };

  for (const file of plan.files) {
    try {
      const content = await readFile(file.filePath);
      const output = runPipeline(file, content, plan, registry, log);

      for (const diagnostic of output.diagnostics) {
        result.diagnostics.push({ ...diagnostic, filePath: file.filePath });
      }

      if (!output.changed) {
        result.unchanged.push(file.filePath);
        continue;
      }

      let backupPath: string | undefined;
      if (!options.dryRun) {
        if (options.backup) {
          backupPath = `${file.filePath}${BACKUP_SUFFIX}`;
          await copyFile(file.filePath, backupPath);
        }
        await writeFile(file.filePath, output.content);
      }
      log.debug(`${options.dryRun ? 'Would migrate' : 'Migrated'} ${file.relativePath}`);
      result.success.push({
        filePath: file.filePath,
        target: file.target,
        transformed: output.transformed,
        ...(backupPath ? { backupPath } : {}),
      });
    } catch (error) {
      result.failed.push({
        filePath: file.filePath,
        error: error instanceof Error ? error.message : 'Unknown error',
        ...(error instanceof TfMigrateError ? { code: error.code } : {}),
      });
    }
  }

  return result;
}

function runPipeline(
  file: PlannedFile,
  content: string,
  plan: MigrationPlan,
  registry: MigratorRegistry,
  log: Logger
): MigrationOutput {
  const options = {
    sourceVersion: plan.sourceVersion,
    targetVersion: plan.targetVersion,
    logger: log.child(file.relativePath),
  };
  return file.target === 'config'
    ? migrateConfig(content, file.relativePath, registry, options)
    : migrateState(content, registry, options);
}
