/**
 * Types for project migration planning and execution.
 */
import type { PipelineDiagnostic } from '../transform/types.js';

export type MigrationTarget = 'config' | 'state';

/**
 * One file the migration will read and possibly rewrite.
 */
export interface PlannedFile {
  /** Absolute path */
  filePath: string;
  /** Path relative to the project root, for display */
  relativePath: string;
  target: MigrationTarget;
}

/**
 * Complete migration plan.
 */
export interface MigrationPlan {
  projectRoot: string;
  sourceVersion: string;
  targetVersion: string;
  files: PlannedFile[];
}

/**
 * Options for migration planning.
 */
export interface MigratePlanOptions {
  sourceVersion: string;
  targetVersion: string;
  /** Glob patterns for configuration files, relative to the project root */
  include: string[];
  exclude: string[];
  /** Explicit state file; otherwise terraform.tfstate in the project root, if present */
  stateFile?: string;
}

/**
 * Options for applying migrations.
 */
export interface MigrateApplyOptions {
  /** Dry run - compute results without writing */
  dryRun?: boolean;
  /** Copy each file to `<file>.backup` before rewriting it */
  backup?: boolean;
}

export interface FileDiagnostic extends PipelineDiagnostic {
  filePath: string;
}

/**
 * Result of applying migrations.
 */
export interface MigrationResult {
  /** Files rewritten (or that would be, in a dry run) */
  success: Array<{
    filePath: string;
    target: MigrationTarget;
    transformed: number;
    backupPath?: string;
  }>;
  /** Files that needed no change */
  unchanged: string[];
  /** Files that could not be migrated */
  failed: Array<{
    filePath: string;
    error: string;
    code?: string;
  }>;
  diagnostics: FileDiagnostic[];
}
