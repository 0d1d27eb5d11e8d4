/**
 * `tfmigrate migrate [dir]` - migrate the configuration and state of a
 * project directory.
 */
import * as path from 'node:path';
import { Command } from 'commander';
import chalk from 'chalk';
import { loadConfig } from '../../core/config/loader.js';
import { VersionSchema, type Config } from '../../core/config/schema.js';
import { createMigrationPlan, applyMigrations } from '../../core/migrate/index.js';
import type { MigrationPlan, MigrationResult } from '../../core/migrate/types.js';
import { createDefaultRegistry } from '../../resources/index.js';
import { ConfigError, ErrorCodes } from '../../utils/errors.js';
import { logger as log } from '../../utils/logger.js';

interface MigrateOptions {
  state?: string;
  config?: string;
  sourceVersion?: string;
  targetVersion?: string;
  dryRun?: boolean;
  backup?: boolean; // Commander sets backup=false for --no-backup
  json?: boolean;
  verbose?: boolean;
}

/**
 * Create the migrate command.
 */
export function createMigrateCommand(): Command {
  return new Command('migrate')
    .description('Migrate Terraform configuration and state to a new provider schema version')
    .argument('[dir]', 'Project directory', '.')
    .option('--state <file>', 'State file (default: terraform.tfstate in the project directory)')
    .option('--config <file>', 'Config file (default: .tfmigrate.yaml)')
    .option('--source-version <version>', 'Provider schema version to migrate from')
    .option('--target-version <version>', 'Provider schema version to migrate to')
    .option('--dry-run', 'Show what would change without writing files')
    .option('--no-backup', 'Do not keep .backup copies of rewritten files')
    .option('--json', 'Output as JSON')
    .option('--verbose', 'Show debug output')
    .action(async (dir: string, options: MigrateOptions) => {
      try {
        const result = await runMigrate(dir, options);
        if (result.failed.length > 0) process.exit(1);
      } catch (error) {
        log.error(error instanceof Error ? error.message : 'Unknown error');
        process.exit(1);
      }
    });
}

function parseVersion(value: string | undefined, fallback: Config['source_version'], flag: string) {
  if (value === undefined) return fallback;
  const parsed = VersionSchema.safeParse(value);
  if (!parsed.success) {
    throw new ConfigError(ErrorCodes.UNSUPPORTED_VERSION, `Unsupported ${flag}: ${value}`, { value });
  }
  return parsed.data;
}

async function runMigrate(dir: string, options: MigrateOptions): Promise<MigrationResult> {
  const projectRoot = path.resolve(dir);
  const config = await loadConfig(projectRoot, options.config);

  log.setLevel(options.verbose ? 'debug' : options.json ? 'silent' : config.log_level);

  const sourceVersion = parseVersion(options.sourceVersion, config.source_version, '--source-version');
  const targetVersion = parseVersion(options.targetVersion, config.target_version, '--target-version');
  if (sourceVersion === targetVersion) {
    throw new ConfigError(ErrorCodes.UNSUPPORTED_VERSION, `Nothing to migrate: both versions are ${sourceVersion}`);
  }

  const plan = await createMigrationPlan(projectRoot, {
    sourceVersion,
    targetVersion,
    include: config.files.include,
    exclude: config.files.exclude,
    stateFile: options.state ?? config.state_file,
  });
  log.info(`Planned ${plan.files.length} file(s) in ${plan.projectRoot}`);

  const result = await applyMigrations(plan, createDefaultRegistry(), {
    dryRun: options.dryRun,
    backup: config.backup && options.backup !== false,
  });

  if (options.json) {
    console.log(JSON.stringify(result, null, 2));
  } else {
    printMigrationResult(plan, result, options.dryRun);
  }
  return result;
}

function printMigrationResult(plan: MigrationPlan, result: MigrationResult, dryRun?: boolean): void {
  const display = (filePath: string) => path.relative(plan.projectRoot, filePath) || filePath;

  console.log();
  if (dryRun) {
    console.log(chalk.yellow.bold('DRY RUN - No changes will be made'));
    console.log();
  }
  console.log(chalk.bold.cyan(`MIGRATION: ${plan.sourceVersion} → ${plan.targetVersion}`));

  if (plan.files.length === 0) {
    console.log();
    console.log(chalk.green('No configuration or state files found.'));
    console.log();
    return;
  }

  const verb = dryRun ? 'Would migrate' : 'Migrated';
  if (result.success.length > 0) {
    console.log();
    console.log(chalk.green.bold(`${verb} ${result.success.length} file(s):`));
    for (const item of result.success) {
      const backup = item.backupPath ? chalk.dim(` (backup: ${display(item.backupPath)})`) : '';
      console.log(`  ${chalk.green('✓')} ${display(item.filePath)} (${item.transformed} resources)${backup}`);
    }
  }

  if (result.unchanged.length > 0) {
    console.log();
    console.log(chalk.dim(`Unchanged: ${result.unchanged.length} file(s)`));
  }

  if (result.diagnostics.length > 0) {
    console.log();
    console.log(chalk.yellow.bold(`Warnings: ${result.diagnostics.length}`));
    for (const diagnostic of result.diagnostics) {
      const icon = diagnostic.level === 'error' ? chalk.red('✗') : chalk.yellow('⚠');
      console.log(`  ${icon} ${display(diagnostic.filePath)}: ${diagnostic.message}`);
    }
  }

  if (result.failed.length > 0) {
    console.log();
    console.log(chalk.red.bold(`Failed: ${result.failed.length} file(s)`));
    for (const item of result.failed) {
      console.log(`  ${chalk.red('✗')} ${display(item.filePath)}: ${item.error}`);
    }
  }

  console.log();
}
