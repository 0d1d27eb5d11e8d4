/**
 * Tests for merge diagnostics.
 */
import { describe, it, expect } from 'vitest';
import {
  diagnosticMessage,
  hasWarningMarker,
  renderDiagnosticComment,
} from '../../../../src/core/merge/diagnostics.js';
import type { DiagnosticDetail, DiagnosticReason } from '../../../../src/core/merge/types.js';
import { TEST_RULE } from './test-rule.js';

describe('diagnosticMessage', () => {
  const cases: Array<[DiagnosticReason, DiagnosticDetail, string]> = [
    ['unparseable-reference', {}, 'Route "r" has unparseable policy_id reference - manual migration required'],
    ['target-not-found', { key: 'gone' }, 'Route "r" references policy "gone" which was not found - manual migration required'],
    ['no-default-target', {}, 'No default policy found for route "r" - create example_default_policy resource first'],
    ['unsupported-mode', { mode: 'both' }, 'Route "r" uses unsupported mode "both" - manual migration required'],
    ['unreadable-entries', {}, 'Route "r" has routes that cannot be read without evaluation - manual migration required'],
    [
      'collection-not-list',
      { primary: 'main', collection: 'exclude' },
      'Route "r" was not merged: exclude of policy "main" is not a list - manual migration required',
    ],
  ];

  it.each(cases)('should describe %s', (reason, detail, message) => {
    expect(diagnosticMessage(reason, 'r', TEST_RULE, detail)).toBe(message);
  });
});

describe('renderDiagnosticComment', () => {
  it('should quote the excerpt line by line', () => {
    const comment = renderDiagnosticComment('Something went wrong', 'resource "a" "b" {\n  x = 1\n}\n');

    expect(comment).toBe(
      '/** MIGRATION_WARNING: Something went wrong\n*  resource "a" "b" {\n*    x = 1\n*  }\n*/\n\n'
    );
    expect(hasWarningMarker(comment)).toBe(true);
  });

  it('should break comment terminators in the message and the excerpt', () => {
    const comment = renderDiagnosticComment('Route "x */" failed', 'policy_id = var.p /* legacy */\n');

    expect(comment).toBe(
      '/** MIGRATION_WARNING: Route "x * /" failed\n*  policy_id = var.p /* legacy * /\n*/\n\n'
    );
    expect(comment.indexOf('*/')).toBe(comment.length - 4);
  });

  it('should not find a marker in plain comments', () => {
    expect(hasWarningMarker('/** a doc comment */\n# MIGRATION_WARNING\n')).toBe(false);
  });
});
