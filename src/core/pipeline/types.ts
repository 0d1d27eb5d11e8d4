import type { PipelineDiagnostic } from '../transform/types.js';
import type { Logger } from '../../utils/logger.js';

export interface PipelineOptions {
  sourceVersion: string;
  targetVersion: string;
  logger?: Logger;
}

export interface MigrationOutput {
  /** Migrated text; the input itself when nothing changed */
  content: string;
  changed: boolean;
  /** Resources handed to a migrator */
  transformed: number;
  diagnostics: PipelineDiagnostic[];
}

export interface ConfigMigrationResult extends MigrationOutput {
  filename: string;
}

export interface StateMigrationResult extends MigrationOutput {
  /** Resources dropped because no instance survived */
  removedResources: number;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
