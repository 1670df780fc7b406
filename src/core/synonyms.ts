import { z } from 'zod';
import { SlotName, type Slot } from '../schemas/chat.js';
import { loadDataFile } from '../util/data.js';

const SynonymTableSchema = z.record(SlotName, z.record(z.string().min(1), z.array(z.string().min(1))));
export type SynonymTable = z.infer<typeof SynonymTableSchema>;

type LookupIndex = Map<Slot, Map<string, string>>;

let index: LookupIndex | undefined;
let table: SynonymTable | undefined;

export function normalizeKey(raw: string): string {
  return raw.trim().toLowerCase().replace(/\s+/g, ' ');
}

export function titleCase(raw: string): string {
  return raw
    .trim()
    .replace(/\s+/g, ' ')
    .toLowerCase()
    .replace(/(^|[\s-])([a-z])/g, (_m: string, sep: string, ch: string) => sep + ch.toUpperCase());
}

export function getSynonymTable(): SynonymTable {
  if (!table) table = loadDataFile('synonyms.json', SynonymTableSchema);
  return table;
}

function buildIndex(source: SynonymTable): LookupIndex {
  const out: LookupIndex = new Map();
  for (const slot of SlotName.options) {
    const entries = new Map<string, string>();
    for (const [canonical, variants] of Object.entries(source[slot] ?? {})) {
      // canonical values resolve to themselves
      entries.set(normalizeKey(canonical), canonical);
      for (const variant of variants) {
        entries.set(normalizeKey(variant), canonical);
      }
    }
    out.set(slot, entries);
  }
  return out;
}

function getIndex(): LookupIndex {
  if (!index) index = buildIndex(getSynonymTable());
  return index;
}

/** Canonical value for a known variant, or undefined on a miss. */
export function lookupSynonym(type: Slot, raw: string): string | undefined {
  return getIndex().get(type)?.get(normalizeKey(raw));
}

/**
 * Maps recognized entity text to its canonical display value.
 * Unknown text comes back title-cased.
 */
export function canonicalize(type: Slot, raw: string): string {
  return lookupSynonym(type, raw) ?? titleCase(raw);
}

/** Every lowercase variant (canonical values included) for a slot. */
export function variantsOf(type: Slot): string[] {
  return Array.from(getIndex().get(type)?.keys() ?? []);
}
