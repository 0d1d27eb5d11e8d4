/**
 * tfmigrate - Terraform configuration and state migration for the
 * Cloudflare provider.
 * Main library exports barrel file.
 */

// Configuration
export * from './core/config/index.js';

// Configuration files and state documents
export * from './core/model/index.js';
export * from './core/hcl/index.js';
export * from './core/state/index.js';

// Cross-resource merge
export * from './core/merge/index.js';

// Transformation primitives and migrators
export * from './core/transform/index.js';
export * from './core/registry/index.js';
export * from './resources/index.js';

// Pipelines and project runner
export * from './core/pipeline/index.js';
export * from './core/migrate/index.js';

// Utilities
export * from './utils/index.js';

// CLI
export { createCli } from './cli/index.js';
