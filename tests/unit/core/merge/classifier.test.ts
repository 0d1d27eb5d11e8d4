/**
 * Tests for variant classification.
 */
import { describe, it, expect } from 'vitest';
import { classifyAttributes, classifyPrimary } from '../../../../src/core/merge/classifier.js';
import { parseConfig } from '../../../../src/core/hcl/parser.js';
import { bodyAttributeView } from '../../../../src/core/hcl/view.js';
import { jsonAttributeView, type JsonObject } from '../../../../src/core/model/index.js';
import { TEST_RULE } from './test-rule.js';

const classify = (attributes: JsonObject) =>
  classifyAttributes(jsonAttributeView(attributes), TEST_RULE.classifierFields);

describe('classifyAttributes', () => {
  it('should prefer an explicit default over match and precedence', () => {
    expect(classify({ default: true, match: 'x', precedence: 1 })).toBe('default');
    expect(classify({ default: 'true', match: 'x', precedence: 1 })).toBe('default');
  });

  it('should classify match plus precedence as custom', () => {
    expect(classify({ match: 'x', precedence: 10 })).toBe('custom');
    expect(classify({ default: false, match: 'x', precedence: 10 })).toBe('custom');
  });

  it('should fall back to default', () => {
    expect(classify({})).toBe('default');
    expect(classify({ match: 'x' })).toBe('default');
    expect(classify({ match: 'x', precedence: null })).toBe('default');
  });

  it('should count non-literal expressions as present', () => {
    const file = parseConfig('resource "example_policy" "p" {\n  match = var.match\n  precedence = local.p\n}\n');

    expect(classifyAttributes(bodyAttributeView(file.resourceBlocks()[0].body), TEST_RULE.classifierFields)).toBe(
      'custom'
    );
  });
});

describe('classifyPrimary', () => {
  const custom = jsonAttributeView({ match: 'x', precedence: 1 });

  it('should take the variant from split kinds', () => {
    expect(classifyPrimary('example_default_policy', custom, TEST_RULE)).toBe('default');
    expect(classifyPrimary('example_custom_policy', jsonAttributeView({}), TEST_RULE)).toBe('custom');
  });

  it('should classify legacy kinds by attributes', () => {
    expect(classifyPrimary('example_policy', custom, TEST_RULE)).toBe('custom');
  });

  it('should not recognize other kinds', () => {
    expect(classifyPrimary('example_route', custom, TEST_RULE)).toBeUndefined();
  });
});
