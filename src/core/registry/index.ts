export { MigratorRegistry, type MigratorFactory } from './migrator-registry.js';
