import { z } from 'zod';
import { SlotName, type Slot } from '../schemas/chat.js';
import { loadDataFile } from '../util/data.js';
import { getSynonymTable, lookupSynonym, titleCase } from './synonyms.js';

const TypoData = z.object({
  vocabulary: z.array(z.string().min(1)),
  corrections: z.record(z.string().min(1), z.string().min(1)),
});

/** Minimum edit similarity for a fuzzy replacement. */
export const FUZZY_THRESHOLD = 0.85;
const MIN_FUZZY_LENGTH = 4;
const FUZZY_SLOTS: readonly Slot[] = ['species', 'color', 'location'];

interface Dictionaries {
  corrections: Map<string, string>;
  /** lowercase word -> replacement as it should be written */
  vocabulary: Map<string, string>;
}

let dictionaries: Dictionaries | undefined;

function getDictionaries(): Dictionaries {
  if (dictionaries) return dictionaries;
  const raw = loadDataFile('typos.json', TypoData);

  const vocabulary = new Map<string, string>();
  for (const word of raw.vocabulary) vocabulary.set(word.toLowerCase(), word);
  const table = getSynonymTable();
  for (const slot of FUZZY_SLOTS) {
    for (const [canonical, variants] of Object.entries(table[slot] ?? {})) {
      for (const word of [canonical, ...variants]) {
        if (!/^[a-z]+$/i.test(word)) continue;
        const key = word.toLowerCase();
        if (!vocabulary.has(key)) vocabulary.set(key, slot === 'location' ? titleCase(word) : key);
      }
    }
  }

  dictionaries = {
    corrections: new Map(Object.entries(raw.corrections).map(([k, v]) => [k.toLowerCase(), v])),
    vocabulary,
  };
  return dictionaries;
}

/** Insertions and deletions only; a substitution counts as two edits. */
export function indelDistance(a: string, b: string): number {
  if (a === b) return 0;
  if (a.length === 0) return b.length;
  if (b.length === 0) return a.length;
  const dp = Array.from({ length: a.length + 1 }, () => new Array<number>(b.length + 1).fill(0));
  for (let i = 0; i <= a.length; i += 1) dp[i][0] = i;
  for (let j = 0; j <= b.length; j += 1) dp[0][j] = j;
  for (let i = 1; i <= a.length; i += 1) {
    for (let j = 1; j <= b.length; j += 1) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 2;
      dp[i][j] = Math.min(dp[i - 1][j] + 1, dp[i][j - 1] + 1, dp[i - 1][j - 1] + cost);
    }
  }
  return dp[a.length][b.length];
}

/** 1 for identical strings, 0 for strings with nothing in common. */
export function similarity(a: string, b: string): number {
  const total = a.length + b.length;
  return total === 0 ? 1 : 1 - indelDistance(a, b) / total;
}

function isKnownWord(word: string, vocabulary: Map<string, string>): boolean {
  return vocabulary.has(word) || SlotName.options.some((slot) => lookupSynonym(slot, word) !== undefined);
}

function fuzzyCorrect(word: string, vocabulary: Map<string, string>): string | undefined {
  const lower = word.toLowerCase();
  if (lower.length < MIN_FUZZY_LENGTH || isKnownWord(lower, vocabulary)) return undefined;

  let best: { replacement: string; score: number } | undefined;
  for (const [known, replacement] of vocabulary) {
    const score = similarity(lower, known);
    if (score >= FUZZY_THRESHOLD && (!best || score > best.score)) best = { replacement, score };
  }
  return best?.replacement;
}

/**
 * Light typo correction on whole words, keeping leading and trailing
 * punctuation. Listed misspellings are replaced directly; other longer words
 * are matched against the known vocabulary.
 */
export function autocorrect(text: string): string {
  const { corrections, vocabulary } = getDictionaries();
  return text
    .split(/(\s+)/)
    .map((token) => {
      const m = token.match(/^([^A-Za-z]*)([A-Za-z]+)([^A-Za-z]*)$/);
      if (!m) return token;
      const [, lead, word, trail] = m;
      const fix = corrections.get(word.toLowerCase()) ?? fuzzyCorrect(word, vocabulary);
      return fix ? `${lead}${fix}${trail}` : token;
    })
    .join('');
}
