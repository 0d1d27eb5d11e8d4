/**
 * Tests for attribute-level block edits.
 */
import { describe, it, expect } from 'vitest';
import {
  ensureAttribute,
  moveAttributesToNestedObject,
  removeAttributes,
  renameResourceType,
} from '../../../../src/core/transform/attributes.js';
import { parseConfig } from '../../../../src/core/hcl/parser.js';
import { serializeConfig } from '../../../../src/core/hcl/writer.js';
import { boolValue } from '../../../../src/core/model/index.js';

function parse(text: string) {
  const file = parseConfig(text);
  return { file, block: file.resourceBlocks()[0] };
}

describe('renameResourceType', () => {
  it('should replace the kind and keep the name', () => {
    const { file, block } = parse('resource "old_kind" "web" {\n  x = 1\n}\n');

    renameResourceType(block, 'new_kind');

    expect(serializeConfig(file)).toBe('resource "new_kind" "web" {\n  x = 1\n}\n');
  });
});

describe('removeAttributes', () => {
  it('should count only attributes that were present', () => {
    const { file, block } = parse('resource "a" "b" {\n  x = 1\n  y = 2\n  z = 3\n}\n');

    expect(removeAttributes(block.body, 'x', 'missing', 'z')).toBe(2);
    expect(serializeConfig(file)).toBe('resource "a" "b" {\n  y = 2\n}\n');
  });
});

describe('ensureAttribute', () => {
  it('should only add missing attributes', () => {
    const { file, block } = parse('resource "a" "b" {\n  enabled = false\n}\n');

    expect(ensureAttribute(block.body, 'enabled', boolValue(true))).toBe(false);
    expect(ensureAttribute(block.body, 'visible', boolValue(true))).toBe(true);
    expect(serializeConfig(file)).toBe('resource "a" "b" {\n  enabled = false\n  visible = true\n}\n');
  });
});

describe('moveAttributesToNestedObject', () => {
  it('should gather fields in the given order under new names', () => {
    const { file, block } = parse('resource "a" "b" {\n  svc_port = 8080\n  name = "x"\n  svc_mode = "proxy"\n}\n');

    const moved = moveAttributesToNestedObject(block.body, 'svc', [
      ['svc_mode', 'mode'],
      ['svc_port', 'port'],
    ]);

    expect(moved).toBe(2);
    expect(serializeConfig(file)).toBe(
      'resource "a" "b" {\n  name = "x"\n  svc = {\n    mode = "proxy"\n    port = 8080\n  }\n}\n'
    );
  });

  it('should keep non-literal expressions', () => {
    const { file, block } = parse('resource "a" "b" {\n  port = var.port\n}\n');

    moveAttributesToNestedObject(block.body, 'check', ['port']);

    expect(serializeConfig(file)).toBe('resource "a" "b" {\n  check = {\n    port = var.port\n  }\n}\n');
  });

  it('should do nothing when no source is present', () => {
    const { block } = parse('resource "a" "b" {\n  x = 1\n}\n');

    expect(moveAttributesToNestedObject(block.body, 'svc', ['mode'])).toBe(0);
    expect(block.body.hasAttribute('svc')).toBe(false);
  });
});
