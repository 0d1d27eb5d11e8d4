/**
 * CLI program definition.
 */
import { Command } from 'commander';
import { readFileSync } from 'fs';
import { dirname, resolve } from 'path';
import { fileURLToPath } from 'url';
import { createMigrateCommand } from './commands/migrate.js';

const __dirname = dirname(fileURLToPath(import.meta.url));
const VERSION = readVersion(resolve(__dirname, '../../package.json'));

function readVersion(packagePath: string): string {
  const parsed: unknown = JSON.parse(readFileSync(packagePath, 'utf-8'));
  if (typeof parsed === 'object' && parsed !== null && 'version' in parsed && typeof parsed.version === 'string') {
    return parsed.version;
  }
  return '0.0.0';
}

/** Create the CLI program. */
export function createCli(): Command {
  const program = new Command()
    .name('tfmigrate')
    .description('Migrate Terraform configuration and state between Cloudflare provider versions')
    .version(VERSION);
  [createMigrateCommand].forEach((cmd) => program.addCommand(cmd()));
  return program;
}
