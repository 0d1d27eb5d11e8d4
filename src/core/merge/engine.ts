/**
 * Representation-independent part of a merge pass. The config and state
 * orchestrators supply an adapter for reading satellites and writing
 * collections; matching, accumulation and diagnostics happen here so both
 * passes reach the same outcome.
 */
import type { AttributeValue } from '../model/attribute-value.js';
import { diagnosticMessage } from './diagnostics.js';
import { collectEntries, type SatelliteEntries } from './entries.js';
import { matchSatellites } from './matcher.js';
import type {
  DiagnosticDetail,
  DiagnosticReason,
  MergeDiagnostic,
  MergeRule,
  PrimaryCandidate,
  SatelliteCandidate,
} from './types.js';

/**
 * A collection as found on a primary. `opaque` is a value that is present
 * but not a list literal (a variable, a function call); it is never
 * overwritten.
 */
export type ExistingCollection =
  | { kind: 'absent' }
  | { kind: 'list'; items: AttributeValue[] }
  | { kind: 'opaque' };

export interface MergeAdapter<P, S> {
  readSatellite(satellite: SatelliteCandidate<S>): SatelliteEntries;
  excerpt(satellite: SatelliteCandidate<S>): string;
  readCollection(primary: P, collection: string): ExistingCollection;
  writeCollection(primary: P, collection: string, items: AttributeValue[]): void;
}

export interface MergeOutcome {
  /** Satellites merged without a diagnostic */
  merged: number;
  diagnostics: MergeDiagnostic[];
}

interface PendingDiagnostic<S> {
  satellite: SatelliteCandidate<S>;
  reason: DiagnosticReason;
  detail?: DiagnosticDetail;
}

export function runMerge<P, S>(
  primaries: readonly PrimaryCandidate<P>[],
  satellites: readonly SatelliteCandidate<S>[],
  rule: MergeRule,
  adapter: MergeAdapter<P, S>
): MergeOutcome {
  const match = matchSatellites(primaries, satellites);
  const pending: PendingDiagnostic<S>[] = [];
  let merged = 0;

  for (const group of match.groups) {
    const read = group.satellites.map((satellite) => adapter.readSatellite(satellite));
    const { writes, unsupportedModes } = collectEntries(read, rule);
    const flagged = new Set<number>();
    const flag = (index: number, reason: DiagnosticReason, detail?: DiagnosticDetail) => {
      flagged.add(index);
      pending.push({ satellite: group.satellites[index], reason, ...(detail ? { detail } : {}) });
    };

    read.forEach((entries, i) => {
      if (entries.opaque.length > 0) flag(i, 'unreadable-entries');
    });
    for (const { index, mode } of unsupportedModes) {
      flag(index, 'unsupported-mode', { mode });
    }

    for (const write of writes) {
      const existing = adapter.readCollection(group.primary.handle, write.collection);
      if (existing.kind === 'opaque') {
        const mode = rule.collections.find((c) => c.collection === write.collection)?.mode;
        read.forEach((entries, i) => {
          if (entries.mode === mode && entries.entries.length > 0) {
            flag(i, 'collection-not-list', { primary: group.primary.name, collection: write.collection });
          }
        });
        continue;
      }
      const items: AttributeValue[] = [...(existing.kind === 'list' ? existing.items : []), ...write.entries];
      adapter.writeCollection(group.primary.handle, write.collection, items);
    }

    merged += group.satellites.length - flagged.size;
  }

  for (const satellite of match.orphans) {
    pending.push({ satellite, reason: 'unparseable-reference' });
  }
  for (const { satellite, reason, key } of match.unmatched) {
    pending.push({ satellite, reason, ...(key !== undefined ? { detail: { key } } : {}) });
  }

  // stable: a satellite's own diagnostics keep the order they were raised in
  const order = new Map(satellites.map((satellite, i) => [satellite, i]));
  pending.sort((a, b) => (order.get(a.satellite) ?? 0) - (order.get(b.satellite) ?? 0));

  const diagnostics = pending.map(({ satellite, reason, detail }) => ({
    reason,
    satelliteName: satellite.name,
    message: diagnosticMessage(reason, satellite.name, rule, detail),
    excerpt: adapter.excerpt(satellite),
  }));
  return { merged, diagnostics };
}
