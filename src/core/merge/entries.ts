/**
 * Accumulation of satellite entries into per-mode collections.
 */
import {
  objectAttributeView,
  toJson,
  type AttributeValue,
  type AttributeView,
  type ObjectValue,
} from '../model/attribute-value.js';
import type { MergeRule } from './types.js';

/** Entries of one satellite under its mode, in source order. */
export interface ModeEntries {
  name: string;
  mode: string;
  entries: ObjectValue[];
}

/** Everything read from one satellite. */
export interface SatelliteEntries extends ModeEntries {
  /** Source of entry definitions that cannot be read without evaluation */
  opaque: string[];
}

export interface EntryList {
  entries: ObjectValue[];
  opaque: string[];
}

export interface CollectionWrite {
  collection: string;
  entries: ObjectValue[];
}

export interface UnsupportedMode {
  /** Position of the satellite in the input list */
  index: number;
  name: string;
  mode: string;
}

export interface CollectedEntries {
  writes: CollectionWrite[];
  unsupportedModes: UnsupportedMode[];
}

function presentValue(value: AttributeValue | undefined): AttributeValue | undefined {
  if (value === undefined || value.kind === 'null') return undefined;
  if (value.kind === 'string' && value.value === '') return undefined;
  return value;
}

/**
 * Convert one entry to a uniform object. Entries without a usable key
 * field are dropped; empty optional fields are left out.
 */
export function readEntry(view: AttributeView, rule: MergeRule): ObjectValue | undefined {
  const key = presentValue(view.get(rule.entryKeyField));
  if (!key) return undefined;
  const fields: Array<[string, AttributeValue]> = [[rule.entryKeyField, key]];
  for (const name of rule.entryOptionalFields) {
    const value = presentValue(view.get(name));
    if (value) fields.push([name, value]);
  }
  return { kind: 'object', fields };
}

/**
 * Entries held in a list value (state lists, or a config list literal).
 * Expression items, and a value that is not a list at all, are opaque.
 * Other non-object items are malformed entries and are skipped.
 */
export function readEntryList(value: AttributeValue | undefined, rule: MergeRule): EntryList {
  const result: EntryList = { entries: [], opaque: [] };
  if (value === undefined || value.kind === 'null') return result;
  if (value.kind !== 'list') {
    result.opaque.push(sourceText(value));
    return result;
  }
  for (const item of value.items) {
    if (item.kind === 'expression') {
      result.opaque.push(item.text);
    } else if (item.kind === 'object') {
      const entry = readEntry(objectAttributeView(item), rule);
      if (entry) result.entries.push(entry);
    }
  }
  return result;
}

function sourceText(value: AttributeValue): string {
  return value.kind === 'expression' ? value.text : JSON.stringify(toJson(value) ?? null);
}

/**
 * Mode of a satellite; absent, null and empty values take the default.
 * Non-string values are kept in source form so they can be reported.
 */
export function readMode(value: AttributeValue | undefined, rule: MergeRule): string {
  if (value === undefined || value.kind === 'null') return rule.defaultMode;
  switch (value.kind) {
    case 'string':
      return value.value === '' ? rule.defaultMode : value.value;
    case 'number':
    case 'bool':
      return String(value.value);
    default:
      return sourceText(value);
  }
}

/**
 * Group entries by mode across satellites, in satellite then entry order.
 * Only non-empty collections are written, in the rule's collection order.
 */
export function collectEntries(satellites: readonly ModeEntries[], rule: MergeRule): CollectedEntries {
  const byMode = new Map<string, ObjectValue[]>();
  const unsupportedModes: UnsupportedMode[] = [];

  satellites.forEach((satellite, index) => {
    if (!rule.collections.some((c) => c.mode === satellite.mode)) {
      unsupportedModes.push({ index, name: satellite.name, mode: satellite.mode });
      return;
    }
    const list = byMode.get(satellite.mode) ?? [];
    list.push(...satellite.entries);
    byMode.set(satellite.mode, list);
  });

  const writes: CollectionWrite[] = [];
  for (const { mode, collection } of rule.collections) {
    const entries = byMode.get(mode);
    if (entries && entries.length > 0) writes.push({ collection, entries });
  }
  return { writes, unsupportedModes };
}
