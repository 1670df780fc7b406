import { describe, it, expect } from '@jest/globals';
import {
  canonicalize,
  getSynonymTable,
  lookupSynonym,
  titleCase,
  variantsOf,
} from '../../src/core/synonyms.js';
import { SlotName } from '../../src/schemas/chat.js';

describe('Synonym canonicalizer', () => {
  it('maps known variants to canonical values', () => {
    expect(canonicalize('location', 'kl')).toBe('Kuala Lumpur');
    expect(canonicalize('location', '  KL ')).toBe('Kuala Lumpur');
    expect(canonicalize('location', 'shah alam')).toBe('Selangor');
    expect(canonicalize('species', 'Puppies')).toBe('dog');
    expect(canonicalize('species', 'kitten')).toBe('cat');
    expect(canonicalize('breed', 'golden   retriever')).toBe('Golden Retriever');
    expect(canonicalize('color', 'grey')).toBe('Gray');
  });

  it('falls back to the title-cased input on a miss', () => {
    expect(canonicalize('breed', 'border collie')).toBe('Border Collie');
    expect(canonicalize('location', 'alor   GAJAH')).toBe('Alor Gajah');
    expect(lookupSynonym('color', 'purple')).toBeUndefined();
  });

  it('looks up per entity type', () => {
    // "golden" is a color, not a breed on its own
    expect(lookupSynonym('color', 'golden')).toBe('Golden');
    expect(lookupSynonym('breed', 'golden')).toBeUndefined();
  });

  it('is idempotent for every entry in the table', () => {
    const table = getSynonymTable();
    for (const slot of SlotName.options) {
      for (const [canonical, variants] of Object.entries(table[slot] ?? {})) {
        for (const raw of [canonical, ...variants]) {
          const once = canonicalize(slot, raw);
          expect(once).toBe(canonical);
          expect(canonicalize(slot, once)).toBe(once);
        }
      }
    }
  });

  it('is idempotent for unmapped text', () => {
    const once = canonicalize('breed', 'jack russell terrier');
    expect(once).toBe('Jack Russell Terrier');
    expect(canonicalize('breed', once)).toBe(once);
  });

  it('lists variants in lowercase, canonical values included', () => {
    const locations = variantsOf('location');
    expect(locations).toContain('kuala lumpur');
    expect(locations).toContain('jb');
    expect(locations.every((v) => v === v.toLowerCase())).toBe(true);
  });

  it('title-cases hyphenated words', () => {
    expect(titleCase('shih-tzu mix')).toBe('Shih-Tzu Mix');
  });
});
