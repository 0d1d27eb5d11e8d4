/**
 * Types shared by the satellite merge engine.
 *
 * The engine is representation-agnostic: the config and state adapters
 * build candidates around their own handles (a Block, a state resource
 * index) and the matcher only groups them.
 */

export type Variant = 'default' | 'custom';

/** Attribute names the classifier reads. */
export interface ClassifierFields {
  /** Boolean "is default" discriminator */
  isDefault: string;
  match: string;
  precedence: string;
}

/** Collection on the primary that receives entries of one mode. */
export interface ModeCollection {
  mode: string;
  collection: string;
}

/**
 * Everything resource-specific the engine needs, supplied by the migrator
 * that owns the satellite kind.
 */
export interface MergeRule {
  /** Identifies the pass in a unit's processed set */
  id: string;
  satelliteKind: string;
  /** Unified kinds, classified on the fly */
  legacyKinds: readonly string[];
  defaultKind: string;
  customKind: string;
  /** Kinds a target reference may address, in priority order */
  candidateKinds: readonly string[];
  classifierFields: ClassifierFields;
  referenceAttribute: string;
  modeAttribute: string;
  defaultMode: string;
  /** Block type (config) or list attribute (state) holding the entries */
  entryField: string;
  entryKeyField: string;
  entryOptionalFields: readonly string[];
  /** Write order: collections earlier in the list are written first */
  collections: readonly ModeCollection[];
  /** Labels used in diagnostic messages */
  labels: {
    satellite: string;
    primary: string;
    defaultPrimary: string;
  };
}

export interface ResourceIdentity {
  kind: string;
  name: string;
}

export type TargetReference =
  | { kind: 'default'; scope?: string }
  | { kind: 'named'; key: string }
  | { kind: 'unresolved'; raw: string };

export interface PrimaryCandidate<H> {
  handle: H;
  kind: string;
  name: string;
  variant: Variant;
  /** Keys a named reference can use to address this primary */
  keys: readonly string[];
  scope?: string;
}

export interface SatelliteCandidate<H> {
  handle: H;
  name: string;
  target: TargetReference;
}

export type DiagnosticReason =
  | 'unparseable-reference'
  | 'target-not-found'
  | 'no-default-target'
  | 'unsupported-mode'
  | 'unreadable-entries'
  | 'collection-not-list';

/** Values a diagnostic message names besides the satellite. */
export interface DiagnosticDetail {
  /** Named key that was not found */
  key?: string;
  mode?: string;
  /** Primary and collection a satellite could not be merged into */
  primary?: string;
  collection?: string;
}

export interface MatchGroup<P, S> {
  primary: PrimaryCandidate<P>;
  satellites: SatelliteCandidate<S>[];
}

export interface UnmatchedSatellite<S> {
  satellite: SatelliteCandidate<S>;
  reason: 'target-not-found' | 'no-default-target';
  /** Named key that was not found */
  key?: string;
}

export interface MatchResult<P, S> {
  groups: MatchGroup<P, S>[];
  orphans: SatelliteCandidate<S>[];
  unmatched: UnmatchedSatellite<S>[];
}

export interface MergeDiagnostic {
  reason: DiagnosticReason;
  satelliteName: string;
  message: string;
  /** Verbatim source of the removed satellite */
  excerpt: string;
}

export interface MergeReport {
  /** Satellites whose entries went to a primary */
  merged: number;
  /** Satellites removed from the unit */
  removed: number;
  diagnostics: MergeDiagnostic[];
  /** True when the pass had already run on this unit */
  skipped: boolean;
}
