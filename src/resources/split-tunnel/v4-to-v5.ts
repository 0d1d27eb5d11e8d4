/**
 * cloudflare_split_tunnel, v4 to v5.
 *
 * v5 has no split tunnel resource: its entries become the `include` or
 * `exclude` list of the device profile it belongs to. This migrator does no
 * local transformation; it runs the file-wide merge, which the device
 * profile migrator runs as well, so files holding only split tunnels are
 * still cleaned up.
 */
import type { Block } from '../../core/hcl/tree.js';
import { mergeSatellitesInConfig } from '../../core/merge/config-merge.js';
import { mergeSatellitesInState } from '../../core/merge/state-merge.js';
import type { MergeReport, MergeRule } from '../../core/merge/types.js';
import type { JsonObject } from '../../core/model/json.js';
import type { StateDocument, StateResource } from '../../core/state/document.js';
import type {
  ConfigContext,
  MigrationContext,
  ResourceMigrator,
  StateContext,
  StateTransformResult,
} from '../../core/transform/types.js';
import {
  CUSTOM_PROFILE_KIND,
  DEFAULT_PROFILE_KIND,
  DEVICE_PROFILES_KIND,
  DEVICE_SETTINGS_POLICY_KIND,
  LEGACY_PROFILE_KINDS,
} from '../device-profile/kinds.js';

export const SPLIT_TUNNEL_KIND = 'cloudflare_split_tunnel';

export const SPLIT_TUNNEL_MERGE_RULE: MergeRule = {
  id: 'split-tunnel-merge',
  satelliteKind: SPLIT_TUNNEL_KIND,
  legacyKinds: LEGACY_PROFILE_KINDS,
  defaultKind: DEFAULT_PROFILE_KIND,
  customKind: CUSTOM_PROFILE_KIND,
  candidateKinds: [CUSTOM_PROFILE_KIND, DEVICE_PROFILES_KIND, DEVICE_SETTINGS_POLICY_KIND, DEFAULT_PROFILE_KIND],
  classifierFields: { isDefault: 'default', match: 'match', precedence: 'precedence' },
  referenceAttribute: 'policy_id',
  modeAttribute: 'mode',
  defaultMode: 'exclude',
  entryField: 'tunnels',
  entryKeyField: 'address',
  entryOptionalFields: ['description', 'host'],
  collections: [
    { mode: 'include', collection: 'include' },
    { mode: 'exclude', collection: 'exclude' },
  ],
  labels: {
    satellite: 'Split tunnel',
    primary: 'profile',
    defaultPrimary: 'default device profile',
  },
};

function record(report: MergeReport, ctx: MigrationContext): void {
  if (report.skipped || report.removed === 0) return;
  ctx.logger.debug(`Merged ${report.merged} of ${report.removed} split tunnel resource(s)`);
  for (const diagnostic of report.diagnostics) {
    ctx.diagnostics.push({
      level: 'warning',
      message: diagnostic.message,
      resource: `${SPLIT_TUNNEL_KIND}.${diagnostic.satelliteName}`,
      reason: diagnostic.reason,
    });
  }
}

/** Merge every split tunnel of the context's file. Runs once per file. */
export function mergeSplitTunnelsInConfig(ctx: ConfigContext): MergeReport {
  const report = mergeSatellitesInConfig(ctx.file, SPLIT_TUNNEL_MERGE_RULE);
  record(report, ctx);
  return report;
}

/** Merge every split tunnel of a state document. Runs once per document. */
export function mergeSplitTunnelsInState(doc: StateDocument, ctx: StateContext): MergeReport {
  const report = mergeSatellitesInState(doc, SPLIT_TUNNEL_MERGE_RULE);
  record(report, ctx);
  return report;
}

export class SplitTunnelMigrator implements ResourceMigrator {
  readonly kinds = [SPLIT_TUNNEL_KIND];
  readonly sourceVersion = 'v4';
  readonly targetVersion = 'v5';

  transformConfig(_block: Block, ctx: ConfigContext): void {
    mergeSplitTunnelsInConfig(ctx);
  }

  preprocessState(doc: StateDocument, ctx: StateContext): void {
    mergeSplitTunnelsInState(doc, ctx);
  }

  /** Split tunnels left after the merge have no v5 form. */
  transformState(_instance: JsonObject, _resource: StateResource): StateTransformResult {
    return { instance: null };
  }
}
