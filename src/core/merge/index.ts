/**
 * Cross-resource satellite merge.
 */
export * from './types.js';
export { resolveReference } from './reference.js';
export { classifyAttributes, classifyPrimary } from './classifier.js';
export { matchSatellites } from './matcher.js';
export { collectEntries, readEntry, readEntryList, readMode } from './entries.js';
export type {
  ModeEntries,
  SatelliteEntries,
  EntryList,
  CollectionWrite,
  CollectedEntries,
  UnsupportedMode,
} from './entries.js';
export { diagnosticMessage, renderDiagnosticComment, hasWarningMarker, WARNING_MARKER } from './diagnostics.js';
export { runMerge, type ExistingCollection, type MergeAdapter, type MergeOutcome } from './engine.js';
export { mergeSatellitesInConfig } from './config-merge.js';
export { mergeSatellitesInState } from './state-merge.js';
