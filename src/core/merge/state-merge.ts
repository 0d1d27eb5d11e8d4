/**
 * Satellite merge over a state document.
 *
 * Primaries are addressed by their remote ids: a satellite's reference is
 * the primary's policy id, and satellites without one belong to the
 * default primary of the same account.
 */
import { fromJson, jsonAttributeView, toJson } from '../model/attribute-value.js';
import { isJsonArray, type JsonObject, type JsonValue } from '../model/json.js';
import {
  attributesPath,
  getPath,
  instanceAttributes,
  removeResources,
  setPath,
  type StateDocument,
  type StateResource,
} from '../state/document.js';
import { classifyPrimary } from './classifier.js';
import { runMerge, type ExistingCollection, type MergeAdapter } from './engine.js';
import { readEntryList, readMode } from './entries.js';
import type { MergeReport, MergeRule, PrimaryCandidate, SatelliteCandidate, TargetReference } from './types.js';

const SCOPE_ATTRIBUTE = 'account_id';

function stringAttribute(attributes: JsonObject, name: string): string | undefined {
  const value = attributes[name];
  return typeof value === 'string' && value !== '' ? value : undefined;
}

/**
 * Ids a satellite may use for this primary: its policy id, and the part
 * after "/" of a compound `<account>/<policy>` id.
 */
function primaryKeys(attributes: JsonObject, rule: MergeRule): string[] {
  const keys: string[] = [];
  const policyId = stringAttribute(attributes, rule.referenceAttribute);
  if (policyId) keys.push(policyId);
  const id = stringAttribute(attributes, 'id');
  const slash = id?.indexOf('/') ?? -1;
  if (id && slash >= 0 && slash < id.length - 1) {
    const suffix = id.slice(slash + 1);
    if (!keys.includes(suffix)) keys.push(suffix);
  }
  return keys;
}

function targetOf(attributes: JsonObject, rule: MergeRule): TargetReference {
  const reference: JsonValue | undefined = attributes[rule.referenceAttribute];
  if (reference === undefined || reference === null || reference === '') {
    return { kind: 'default', scope: stringAttribute(attributes, SCOPE_ATTRIBUTE) };
  }
  if (typeof reference === 'string') return { kind: 'named', key: reference };
  return { kind: 'unresolved', raw: JSON.stringify(reference) };
}

function stateAdapter(doc: StateDocument, rule: MergeRule): MergeAdapter<StateResource, StateResource> {
  const collectionPath = (primary: StateResource, collection: string) => [
    ...attributesPath(primary.index),
    collection,
  ];
  return {
    readSatellite: (satellite) => {
      const view = jsonAttributeView(instanceAttributes(satellite.handle) ?? {});
      return {
        name: satellite.name,
        mode: readMode(view.get(rule.modeAttribute), rule),
        ...readEntryList(view.get(rule.entryField), rule),
      };
    },
    excerpt: (satellite) => JSON.stringify(satellite.handle.value, null, 2),
    readCollection: (primary, collection): ExistingCollection => {
      const existing = getPath(doc.root, collectionPath(primary, collection));
      if (existing === undefined || existing === null) return { kind: 'absent' };
      return isJsonArray(existing) ? { kind: 'list', items: existing.map(fromJson) } : { kind: 'opaque' };
    },
    writeCollection: (primary, collection, items) => {
      const value = toJson({ kind: 'list', items });
      if (value !== undefined) setPath(doc.root, collectionPath(primary, collection), value);
    },
  };
}

/**
 * Fold every satellite of the rule's kind into its primary and remove all
 * satellites from the document. Runs at most once per document.
 */
export function mergeSatellitesInState(doc: StateDocument, rule: MergeRule): MergeReport {
  if (doc.passes.has(rule.id)) {
    return { merged: 0, removed: 0, diagnostics: [], skipped: true };
  }
  doc.passes.add(rule.id);

  const primaries: PrimaryCandidate<StateResource>[] = [];
  const satellites: SatelliteCandidate<StateResource>[] = [];
  for (const resource of doc.resources()) {
    const attributes = instanceAttributes(resource);
    if (resource.type === rule.satelliteKind) {
      satellites.push({ handle: resource, name: resource.name, target: targetOf(attributes ?? {}, rule) });
      continue;
    }
    if (!attributes) continue;
    const variant = classifyPrimary(resource.type, jsonAttributeView(attributes), rule);
    if (variant) {
      primaries.push({
        handle: resource,
        kind: resource.type,
        name: resource.name,
        variant,
        keys: primaryKeys(attributes, rule),
        scope: stringAttribute(attributes, SCOPE_ATTRIBUTE),
      });
    }
  }

  if (satellites.length === 0) {
    return { merged: 0, removed: 0, diagnostics: [], skipped: false };
  }

  const { merged, diagnostics } = runMerge(primaries, satellites, rule, stateAdapter(doc, rule));
  const removed = removeResources(doc, (resource) => resource.type === rule.satelliteKind);
  return { merged, removed, diagnostics, skipped: false };
}
