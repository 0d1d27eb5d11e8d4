/**
 * Grouping of satellites under the primary they belong to.
 */
import type { MatchGroup, MatchResult, PrimaryCandidate, SatelliteCandidate } from './types.js';

/**
 * Match satellites to primaries. Pure: inputs are never mutated.
 *
 * - default target: first Default-variant primary in the same scope
 * - named target: first primary carrying the key
 * - unresolved target: orphan
 */
export function matchSatellites<P, S>(
  primaries: readonly PrimaryCandidate<P>[],
  satellites: readonly SatelliteCandidate<S>[]
): MatchResult<P, S> {
  const assigned = new Map<PrimaryCandidate<P>, SatelliteCandidate<S>[]>();
  const result: MatchResult<P, S> = { groups: [], orphans: [], unmatched: [] };

  for (const satellite of satellites) {
    const { target } = satellite;
    let primary: PrimaryCandidate<P> | undefined;

    switch (target.kind) {
      case 'unresolved':
        result.orphans.push(satellite);
        continue;
      case 'default':
        primary = primaries.find((p) => p.variant === 'default' && p.scope === target.scope);
        if (!primary) {
          result.unmatched.push({ satellite, reason: 'no-default-target' });
          continue;
        }
        break;
      case 'named':
        primary = primaries.find((p) => p.keys.includes(target.key));
        if (!primary) {
          result.unmatched.push({ satellite, reason: 'target-not-found', key: target.key });
          continue;
        }
        break;
    }

    const list = assigned.get(primary) ?? [];
    list.push(satellite);
    assigned.set(primary, list);
  }

  for (const primary of primaries) {
    const list = assigned.get(primary);
    if (list) {
      const group: MatchGroup<P, S> = { primary, satellites: list };
      result.groups.push(group);
    }
  }
  return result;
}
