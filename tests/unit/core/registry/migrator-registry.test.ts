/**
 * Tests for the migrator registry.
 */
import { describe, it, expect, vi, beforeEach } from 'vitest';
import { MigratorRegistry } from '../../../../src/core/registry/migrator-registry.js';
import type { ResourceMigrator } from '../../../../src/core/transform/types.js';

function fakeMigrator(kinds: string[]): ResourceMigrator {
  return {
    kinds,
    sourceVersion: 'v4',
    targetVersion: 'v5',
    transformConfig: vi.fn(),
    transformState: vi.fn((instance) => ({ instance })),
  };
}

describe('MigratorRegistry', () => {
  let registry: MigratorRegistry;

  beforeEach(() => {
    registry = new MigratorRegistry();
  });

  it('should return null for unknown kinds and versions', () => {
    registry.register(['kind_a'], 'v4', 'v5', () => fakeMigrator(['kind_a']));

    expect(registry.get('kind_b', 'v4', 'v5')).toBeNull();
    expect(registry.get('kind_a', 'v3', 'v4')).toBeNull();
    expect(registry.get('kind_a', 'v4', 'v5')?.kinds).toEqual(['kind_a']);
  });

  it('should create instances lazily and share them across kinds', () => {
    const factory = vi.fn(() => fakeMigrator(['kind_a', 'kind_b']));
    registry.register(['kind_a', 'kind_b'], 'v4', 'v5', factory);

    expect(factory).not.toHaveBeenCalled();
    const first = registry.get('kind_a', 'v4', 'v5');
    const second = registry.get('kind_b', 'v4', 'v5');

    expect(factory).toHaveBeenCalledTimes(1);
    expect(first).toBe(second);
  });

  it('should list migrators for a version pair in registration order', () => {
    const a = fakeMigrator(['kind_a']);
    const b = fakeMigrator(['kind_b']);
    registry.register(['kind_a'], 'v4', 'v5', () => a);
    registry.register(['kind_x'], 'v3', 'v4', () => fakeMigrator(['kind_x']));
    registry.register(['kind_b'], 'v4', 'v5', () => b);

    expect(registry.all('v4', 'v5')).toEqual([a, b]);
  });

  it('should let a later registration replace an earlier one', () => {
    const replaced = fakeMigrator(['kind_a']);
    const replacement = fakeMigrator(['kind_a']);
    registry.register(['kind_a'], 'v4', 'v5', () => replaced);
    registry.register(['kind_a'], 'v4', 'v5', () => replacement);

    expect(registry.get('kind_a', 'v4', 'v5')).toBe(replacement);
    expect(registry.all('v4', 'v5')).toEqual([replacement]);
  });

  it('should return no migrators for an unregistered version pair', () => {
    registry.register(['kind_a'], 'v4', 'v5', () => fakeMigrator(['kind_a']));

    expect(registry.all('v5', 'v6')).toEqual([]);
  });
});
