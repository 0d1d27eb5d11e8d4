export * from './types.js';
export { createMigrationPlan, DEFAULT_STATE_FILE } from './planner.js';
export { applyMigrations, BACKUP_SUFFIX } from './applier.js';
