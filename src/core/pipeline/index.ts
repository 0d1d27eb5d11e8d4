export { migrateConfig } from './config.js';
export { migrateState } from './state.js';
export type { PipelineOptions, MigrationOutput, ConfigMigrationResult, StateMigrationResult } from './types.js';
