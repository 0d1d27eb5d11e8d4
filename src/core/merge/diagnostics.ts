/**
 * Diagnostic messages for satellites that could not be merged, and their
 * comment rendering in configuration files.
 */
import type { DiagnosticDetail, DiagnosticReason, MergeRule } from './types.js';

export const WARNING_MARKER = '/** MIGRATION_WARNING:';

export function hasWarningMarker(text: string): boolean {
  return text.includes(WARNING_MARKER);
}

export function diagnosticMessage(
  reason: DiagnosticReason,
  satelliteName: string,
  rule: MergeRule,
  detail: DiagnosticDetail = {}
): string {
  const { labels } = rule;
  switch (reason) {
    case 'unparseable-reference':
      return `${labels.satellite} "${satelliteName}" has unparseable ${rule.referenceAttribute} reference - manual migration required`;
    case 'target-not-found':
      return `${labels.satellite} "${satelliteName}" references ${labels.primary} "${detail.key ?? ''}" which was not found - manual migration required`;
    case 'no-default-target':
      return `No ${labels.defaultPrimary} found for ${labels.satellite.toLowerCase()} "${satelliteName}" - create ${rule.defaultKind} resource first`;
    case 'unsupported-mode':
      return `${labels.satellite} "${satelliteName}" uses unsupported ${rule.modeAttribute} "${detail.mode ?? ''}" - manual migration required`;
    case 'unreadable-entries':
      return `${labels.satellite} "${satelliteName}" has ${rule.entryField} that cannot be read without evaluation - manual migration required`;
    case 'collection-not-list':
      return `${labels.satellite} "${satelliteName}" was not merged: ${detail.collection ?? ''} of ${labels.primary} "${detail.primary ?? ''}" is not a list - manual migration required`;
  }
}

// A comment terminator inside the quoted text would end the warning early.
function commentSafe(text: string): string {
  return text.replace(/\*\//g, '* /');
}

/**
 * Comment block holding the message and the removed declaration, followed
 * by a blank line.
 */
export function renderDiagnosticComment(message: string, excerpt: string): string {
  const lines = excerpt
    .trim()
    .split('\n')
    .map((line) => `*  ${commentSafe(line)}\n`)
    .join('');
  return `${WARNING_MARKER} ${commentSafe(message)}\n${lines}*/\n\n`;
}
