/**
 * Tests for serializing edited HCL trees.
 */
import { describe, it, expect } from 'vitest';
import { parseConfig } from '../../../../src/core/hcl/parser.js';
import { renderBlock, serializeConfig } from '../../../../src/core/hcl/writer.js';
import { Block } from '../../../../src/core/hcl/tree.js';
import { boolValue, stringValue } from '../../../../src/core/model/attribute-value.js';

describe('serializeConfig', () => {
  it('should keep untouched items when an attribute changes', () => {
    const file = parseConfig('resource "a" "b" {\n  name = "old" # keep\n  other = 1\n}\n');

    file.resourceBlocks()[0].body.setAttributeValue('name', stringValue('new'));

    expect(serializeConfig(file)).toBe('resource "a" "b" {\n  name = "new" # keep\n  other = 1\n}\n');
  });

  it('should add attributes after the last attribute', () => {
    const file = parseConfig('resource "a" "b" {\n  x = 1\n\n  nested {\n    y = 2\n  }\n}\n');

    file.resourceBlocks()[0].body.setAttributeValue('added', boolValue(true));

    expect(serializeConfig(file)).toBe(
      'resource "a" "b" {\n  x = 1\n  added = true\n\n  nested {\n    y = 2\n  }\n}\n'
    );
  });

  it('should regenerate the header after relabeling', () => {
    const file = parseConfig('resource   "a"  "b" {\n  x = 1\n}\n');

    file.resourceBlocks()[0].setLabels(['c', 'b']);

    expect(serializeConfig(file)).toBe('resource "c" "b" {\n  x = 1\n}\n');
  });

  it('should expand an edited inline block', () => {
    const file = parseConfig('resource "a" "b" { name = "x" }\n');

    file.resourceBlocks()[0].body.setAttributeValue('name', stringValue('y'));

    expect(serializeConfig(file)).toBe('resource "a" "b" {\n  name = "y"\n}\n');
  });

  it('should render edits inside nested blocks at their depth', () => {
    const file = parseConfig('resource "a" "b" {\n  nested {\n    y = 2\n  }\n}\n');

    file.resourceBlocks()[0].body.blocks('nested')[0].body.removeAttribute('y');
    file.resourceBlocks()[0].body.blocks('nested')[0].body.setAttributeValue('z', stringValue('v'));

    expect(serializeConfig(file)).toBe('resource "a" "b" {\n  nested {\n    z = "v"\n  }\n}\n');
  });
});

describe('renderBlock', () => {
  it('should return the source of a clean block', () => {
    const file = parseConfig('resource "a" "b" {\n  x   =   1\n} # end\n');

    expect(renderBlock(file.resourceBlocks()[0])).toBe('resource "a" "b" {\n  x   =   1\n} # end\n');
  });

  it('should render blocks built in code', () => {
    const block = new Block('resource', ['cloudflare_zero_trust_device_custom_profile', 'new'], 0);
    block.body.setAttributeValue('name', stringValue('New'));

    expect(renderBlock(block)).toBe('resource "cloudflare_zero_trust_device_custom_profile" "new" {\n  name = "New"\n}\n');
  });
});
