/**
 * Contracts between the pipelines and per-kind resource migrators.
 */
import type { Block, ConfigFile } from '../hcl/tree.js';
import type { DiagnosticReason } from '../merge/types.js';
import type { JsonObject } from '../model/json.js';
import type { StateDocument, StateResource } from '../state/document.js';
import type { Logger } from '../../utils/logger.js';

export type DiagnosticLevel = 'warning' | 'error';

export interface PipelineDiagnostic {
  level: DiagnosticLevel;
  message: string;
  /** `<kind>.<name>` of the resource concerned */
  resource?: string;
  reason?: DiagnosticReason;
}

export interface MigrationContext {
  sourceVersion: string;
  targetVersion: string;
  diagnostics: PipelineDiagnostic[];
  logger: Logger;
}

export interface ConfigContext extends MigrationContext {
  file: ConfigFile;
}

export interface StateContext extends MigrationContext {
  document: StateDocument;
}

export interface StateTransformResult {
  /** Transformed instance, or null to drop it */
  instance: JsonObject | null;
  /** New resource kind, when the migration renames it */
  resourceType?: string;
}

export interface ResourceMigrator {
  /** Resource kinds this migrator handles */
  readonly kinds: readonly string[];
  readonly sourceVersion: string;
  readonly targetVersion: string;
  /**
   * Transform one resource block in place. The migrator may edit or remove
   * other blocks of the file through `ctx.file`.
   */
  transformConfig(block: Block, ctx: ConfigContext): void;
  transformState(instance: JsonObject, resource: StateResource, ctx: StateContext): StateTransformResult;
  /** Document-wide work that must happen before any instance transform */
  preprocessState?(doc: StateDocument, ctx: StateContext): void;
}
