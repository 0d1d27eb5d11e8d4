/**
 * Satellite merge over a configuration file.
 */
import { bodyAttributeView } from '../hcl/view.js';
import { parseValue } from '../hcl/literal.js';
import { renderBlock, serializeConfig } from '../hcl/writer.js';
import { isBlankTrivia, resourceLabels, type Block, type ConfigFile } from '../hcl/tree.js';
import type { ObjectValue } from '../model/attribute-value.js';
import { classifyPrimary } from './classifier.js';
import { hasWarningMarker, renderDiagnosticComment } from './diagnostics.js';
import { runMerge, type ExistingCollection, type MergeAdapter } from './engine.js';
import { readEntry, readEntryList, readMode, type SatelliteEntries } from './entries.js';
import { resolveReference } from './reference.js';
import type {
  MergeReport,
  MergeRule,
  PrimaryCandidate,
  SatelliteCandidate,
  TargetReference,
} from './types.js';

function targetOf(block: Block, rule: MergeRule): TargetReference {
  const attr = block.body.getAttribute(rule.referenceAttribute);
  if (!attr || parseValue(attr.expression).kind === 'null') return { kind: 'default' };
  const identity = resolveReference(attr.expression, rule.candidateKinds);
  return identity ? { kind: 'named', key: identity.name } : { kind: 'unresolved', raw: attr.expression };
}

function readSatellite(satellite: SatelliteCandidate<Block>, rule: MergeRule): SatelliteEntries {
  const { body } = satellite.handle;
  const view = bodyAttributeView(body);
  const entries: ObjectValue[] = [];
  const opaque: string[] = [];
  // entries may be nested blocks or a list literal
  for (const entryBlock of body.blocks(rule.entryField)) {
    const entry = readEntry(bodyAttributeView(entryBlock.body), rule);
    if (entry) entries.push(entry);
  }
  for (const dynamic of body.blocks('dynamic')) {
    if (dynamic.labels[0] === rule.entryField) opaque.push(`dynamic "${rule.entryField}"`);
  }
  const list = readEntryList(view.get(rule.entryField), rule);
  entries.push(...list.entries);
  opaque.push(...list.opaque);
  return { name: satellite.name, mode: readMode(view.get(rule.modeAttribute), rule), entries, opaque };
}

function configAdapter(rule: MergeRule): MergeAdapter<Block, Block> {
  return {
    readSatellite: (satellite) => readSatellite(satellite, rule),
    excerpt: (satellite) => renderBlock(satellite.handle),
    readCollection: (primary, collection): ExistingCollection => {
      const attr = primary.body.getAttribute(collection);
      if (!attr) return { kind: 'absent' };
      const value = parseValue(attr.expression);
      if (value.kind === 'null') return { kind: 'absent' };
      return value.kind === 'list' ? { kind: 'list', items: value.items } : { kind: 'opaque' };
    },
    writeCollection: (primary, collection, items) => {
      primary.body.setAttributeValue(collection, { kind: 'list', items });
    },
  };
}

/**
 * Fold every satellite of the rule's kind into its primary, remove all
 * satellites and append diagnostics for those that could not be merged.
 * Runs at most once per file; diagnostics are not appended again when the
 * file already carries a warning from an earlier run.
 */
export function mergeSatellitesInConfig(file: ConfigFile, rule: MergeRule): MergeReport {
  if (file.passes.has(rule.id)) {
    return { merged: 0, removed: 0, diagnostics: [], skipped: true };
  }
  file.passes.add(rule.id);

  const primaries: PrimaryCandidate<Block>[] = [];
  const satellites: SatelliteCandidate<Block>[] = [];
  for (const block of file.resourceBlocks()) {
    const labels = resourceLabels(block);
    if (!labels) continue;
    if (labels.kind === rule.satelliteKind) {
      satellites.push({ handle: block, name: labels.name, target: targetOf(block, rule) });
      continue;
    }
    const variant = classifyPrimary(labels.kind, bodyAttributeView(block.body), rule);
    if (variant) {
      primaries.push({ handle: block, kind: labels.kind, name: labels.name, variant, keys: [labels.name] });
    }
  }

  if (satellites.length === 0) {
    return { merged: 0, removed: 0, diagnostics: [], skipped: false };
  }

  const { merged, diagnostics } = runMerge(primaries, satellites, rule, configAdapter(rule));

  for (const satellite of satellites) {
    file.body.removeBlock(satellite.handle);
  }

  if (diagnostics.length > 0 && !hasWarningMarker(serializeConfig(file))) {
    const last = file.body.items[file.body.items.length - 1];
    if (last && !isBlankTrivia(last)) file.body.appendTrivia('\n');
    for (const diagnostic of diagnostics) {
      file.body.appendTrivia(renderDiagnosticComment(diagnostic.message, diagnostic.excerpt));
    }
  }

  return { merged, removed: satellites.length, diagnostics, skipped: false };
}
