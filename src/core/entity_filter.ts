import type pino from 'pino';
import type { EntitySpanT, NoticeT, Slot } from '../schemas/chat.js';
import { canonicalize, lookupSynonym, variantsOf } from './synonyms.js';

export const SUPPORTED_SPECIES = new Set(['dog', 'cat']);

const OUT_OF_SCOPE_ANIMALS = [
  'hamster', 'hamsters', 'rabbit', 'rabbits', 'bunny', 'bird', 'birds',
  'parrot', 'parrots', 'fish', 'fishes', 'snake', 'snakes', 'turtle', 'turtles', 'guinea',
];

const PLACEHOLDER_VALUES: Partial<Record<Slot, Set<string>>> = {
  species: new Set(['one', 'it', 'animal', 'pet', 'pets']),
  age: new Set(['one', '1', 'single']),
};

export interface ScreenedEntities {
  spans: EntitySpanT[];
  notice?: NoticeT;
}

const hasVowel = (s: string) => /[aeiou]/i.test(s);

function words(text: string): string[] {
  return text.toLowerCase().match(/[a-z]+/g) ?? [];
}

export function mentionsOutOfScopeAnimal(text: string): boolean {
  const tokens = new Set(words(text));
  return OUT_OF_SCOPE_ANIMALS.some((a) => tokens.has(a));
}

export function looksLikeGibberish(text: string): boolean {
  const t = text.trim();
  return t.length > 4 && !hasVowel(t);
}

/**
 * Earliest known variant of `type` in the text, read left to right. At each
 * position the longest phrase wins, so "johor bahru" beats "johor".
 */
function findVariant(type: Slot, text: string, skip: (variant: string) => boolean): string | undefined {
  const tokens = words(text);
  const variants = new Set(variantsOf(type).filter((v) => /^[a-z]+( [a-z]+)*$/.test(v)));
  const longest = Math.max(0, ...Array.from(variants, (v) => v.split(' ').length));

  for (let start = 0; start < tokens.length; start++) {
    for (let size = Math.min(longest, tokens.length - start); size > 0; size--) {
      const phrase = tokens.slice(start, start + size).join(' ');
      if (variants.has(phrase) && !skip(phrase)) return phrase;
    }
  }
  return undefined;
}

function keepSpan(span: EntitySpanT, log?: pino.Logger): boolean {
  const raw = span.text.trim().toLowerCase();
  if (PLACEHOLDER_VALUES[span.type]?.has(raw)) {
    log?.debug({ span }, 'entity_filter: dropped placeholder');
    return false;
  }
  if (span.type === 'breed') {
    const knownBreed = lookupSynonym('breed', raw) !== undefined;
    if (OUT_OF_SCOPE_ANIMALS.includes(raw) || (!knownBreed && !hasVowel(raw))) {
      log?.debug({ span }, 'entity_filter: dropped invalid breed');
      return false;
    }
  }
  const value = canonicalize(span.type, span.text);
  if (value.length < 3 || !hasVowel(value)) {
    log?.debug({ span, value }, 'entity_filter: dropped short or nonsense value');
    return false;
  }
  return true;
}

/**
 * Validates raw extractor spans against the utterance before they reach the
 * controller. Returns the surviving spans, or a notice when the request is
 * out of scope or unreadable.
 */
export function screenEntities(
  utterance: string,
  spans: readonly EntitySpanT[],
  log?: pino.Logger,
): ScreenedEntities {
  if (mentionsOutOfScopeAnimal(utterance)) {
    return { spans: [], notice: 'unsupported_species' };
  }
  if (looksLikeGibberish(utterance)) {
    return { spans: [], notice: 'unclear' };
  }

  const kept = spans.filter((s) => keepSpan(s, log));

  const species = kept.find((s) => s.type === 'species');
  if (species && !SUPPORTED_SPECIES.has(canonicalize('species', species.text))) {
    return { spans: [], notice: 'unsupported_species' };
  }

  for (const type of ['color', 'location'] as const) {
    if (kept.some((s) => s.type === type)) continue;
    // "golden retriever" is a breed, not a golden coat
    const insideBreed = (variant: string) =>
      kept.some((s) => s.type === 'breed' && s.text.toLowerCase().includes(variant));
    const variant = findVariant(type, utterance, insideBreed);
    if (!variant) continue;
    log?.debug({ type, variant }, 'entity_filter: keyword fallback');
    kept.push({ type, text: variant });
  }

  if (spans.length > 0 && kept.length === 0) {
    return { spans: [], notice: 'unclear' };
  }
  return { spans: kept };
}
