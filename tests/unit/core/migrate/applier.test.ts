/**
 * Tests for the migration applier.
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, writeFileSync, readFileSync, rmSync, existsSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { applyMigrations, BACKUP_SUFFIX } from '../../../../src/core/migrate/applier.js';
import type { MigrationPlan, PlannedFile } from '../../../../src/core/migrate/types.js';
import { MigratorRegistry } from '../../../../src/core/registry/migrator-registry.js';
import { renameResourceType } from '../../../../src/core/transform/attributes.js';
import { Logger } from '../../../../src/utils/logger.js';

const OLD = 'resource "old_kind" "x" {\n  a = 1\n}\n';
const NEW = 'resource "new_kind" "x" {\n  a = 1\n}\n';
const UNRELATED = 'resource "other" "y" {}\n';

describe('applyMigrations', () => {
  let root: string;
  let registry: MigratorRegistry;
  const logger = new Logger();
  logger.setLevel('silent');

  const planned = (name: string, target: PlannedFile['target'] = 'config'): PlannedFile => ({
    filePath: join(root, name),
    relativePath: name,
    target,
  });

  const planOf = (...files: PlannedFile[]): MigrationPlan => ({
    projectRoot: root,
    sourceVersion: 'v4',
    targetVersion: 'v5',
    files,
  });

  beforeEach(() => {
    root = join(tmpdir(), `tfmigrate-apply-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    mkdirSync(root, { recursive: true });
    writeFileSync(join(root, 'main.tf'), OLD);
    writeFileSync(join(root, 'other.tf'), UNRELATED);

    registry = new MigratorRegistry();
    registry.register(['old_kind'], 'v4', 'v5', () => ({
      kinds: ['old_kind'],
      sourceVersion: 'v4',
      targetVersion: 'v5',
      transformConfig: (block) => renameResourceType(block, 'new_kind'),
      transformState: (instance) => ({ instance, resourceType: 'new_kind' }),
    }));
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  it('should rewrite changed files and list unchanged ones', async () => {
    const result = await applyMigrations(planOf(planned('main.tf'), planned('other.tf')), registry, {}, logger);

    expect(result).toEqual({
      success: [{ filePath: join(root, 'main.tf'), target: 'config', transformed: 1 }],
      unchanged: [join(root, 'other.tf')],
      failed: [],
      diagnostics: [],
    });
    expect(readFileSync(join(root, 'main.tf'), 'utf-8')).toBe(NEW);
    expect(readFileSync(join(root, 'other.tf'), 'utf-8')).toBe(UNRELATED);
  });

  it('should keep a backup of rewritten files', async () => {
    const result = await applyMigrations(planOf(planned('main.tf')), registry, { backup: true }, logger);

    const backupPath = join(root, `main.tf${BACKUP_SUFFIX}`);
    expect(result.success[0].backupPath).toBe(backupPath);
    expect(readFileSync(backupPath, 'utf-8')).toBe(OLD);
    expect(readFileSync(join(root, 'main.tf'), 'utf-8')).toBe(NEW);
  });

  it('should write nothing in a dry run', async () => {
    const result = await applyMigrations(planOf(planned('main.tf')), registry, { dryRun: true, backup: true }, logger);

    expect(result.success).toEqual([{ filePath: join(root, 'main.tf'), target: 'config', transformed: 1 }]);
    expect(readFileSync(join(root, 'main.tf'), 'utf-8')).toBe(OLD);
    expect(existsSync(join(root, `main.tf${BACKUP_SUFFIX}`))).toBe(false);
  });

  it('should migrate state files', async () => {
    writeFileSync(
      join(root, 'terraform.tfstate'),
      JSON.stringify({ version: 4, resources: [{ mode: 'managed', type: 'old_kind', name: 'x', instances: [{ attributes: {} }] }] })
    );

    const result = await applyMigrations(planOf(planned('terraform.tfstate', 'state')), registry, {}, logger);

    expect(result.success).toEqual([{ filePath: join(root, 'terraform.tfstate'), target: 'state', transformed: 1 }]);
    expect(JSON.parse(readFileSync(join(root, 'terraform.tfstate'), 'utf-8')).resources[0].type).toBe('new_kind');
  });

  it('should record failures and carry on', async () => {
    writeFileSync(join(root, 'broken.tf'), 'resource "old_kind" "x" {\n');

    const result = await applyMigrations(
      planOf(planned('broken.tf'), planned('missing.tf'), planned('main.tf')),
      registry,
      {},
      logger
    );

    expect(result.failed).toEqual([
      { filePath: join(root, 'broken.tf'), error: 'broken.tf:2: Unclosed block: expected "}"', code: 'S001' },
      { filePath: join(root, 'missing.tf'), error: expect.stringContaining('ENOENT') },
    ]);
    expect(result.success.map((s) => s.filePath)).toEqual([join(root, 'main.tf')]);
  });
});
