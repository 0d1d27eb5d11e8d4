/**
 * Registry of resource migrators, keyed by resource kind and version pair.
 */
import type { ResourceMigrator } from '../transform/types.js';

/**
 * Factory function for creating migrators.
 * Used for lazy instantiation.
 */
export type MigratorFactory = () => ResourceMigrator;

interface MigratorRegistration {
  factory: MigratorFactory;
  kinds: readonly string[];
  sourceVersion: string;
  targetVersion: string;
  instance?: ResourceMigrator;
}

function versionKey(sourceVersion: string, targetVersion: string): string {
  return `${sourceVersion}->${targetVersion}`;
}

export class MigratorRegistry {
  private readonly registrations: MigratorRegistration[] = [];
  private readonly byKind = new Map<string, MigratorRegistration>();

  /**
   * Register a migrator for every kind it lists. A later registration for
   * the same kind and versions replaces the earlier one.
   */
  register(
    kinds: readonly string[],
    sourceVersion: string,
    targetVersion: string,
    factory: MigratorFactory
  ): void {
    const registration: MigratorRegistration = { factory, kinds, sourceVersion, targetVersion };
    this.registrations.push(registration);
    for (const kind of kinds) {
      this.byKind.set(`${kind}@${versionKey(sourceVersion, targetVersion)}`, registration);
    }
  }

  /**
   * Get the migrator for a kind, or null when none is registered.
   * Creates the instance lazily if not already created.
   */
  get(kind: string, sourceVersion: string, targetVersion: string): ResourceMigrator | null {
    const registration = this.byKind.get(`${kind}@${versionKey(sourceVersion, targetVersion)}`);
    return registration ? this.instantiate(registration) : null;
  }

  /**
   * All migrators for a version pair, in registration order.
   */
  all(sourceVersion: string, targetVersion: string): ResourceMigrator[] {
    const key = versionKey(sourceVersion, targetVersion);
    return this.registrations
      .filter((r) => versionKey(r.sourceVersion, r.targetVersion) === key)
      .filter((r) => r.kinds.some((kind) => this.byKind.get(`${kind}@${key}`) === r))
      .map((r) => this.instantiate(r));
  }

  private instantiate(registration: MigratorRegistration): ResourceMigrator {
    if (!registration.instance) {
      registration.instance = registration.factory();
    }
    return registration.instance;
  }
}
