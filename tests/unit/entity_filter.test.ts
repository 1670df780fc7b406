import { describe, it, expect } from '@jest/globals';
import {
  looksLikeGibberish,
  mentionsOutOfScopeAnimal,
  screenEntities,
} from '../../src/core/entity_filter.js';

describe('Entity screening', () => {
  it('reports animals the service does not cover', () => {
    expect(screenEntities('can I adopt a hamster', [])).toEqual({ spans: [], notice: 'unsupported_species' });
    expect(mentionsOutOfScopeAnimal('Any Rabbits near me?')).toBe(true);
    expect(mentionsOutOfScopeAnimal('a fishing dog')).toBe(false);
  });

  it('rejects species values other than dogs and cats', () => {
    const out = screenEntities('I want a lizard', [{ type: 'species', text: 'lizard' }]);
    expect(out).toEqual({ spans: [], notice: 'unsupported_species' });
  });

  it('flags vowel-less input as unclear', () => {
    expect(looksLikeGibberish('xkcd zzz')).toBe(true);
    expect(looksLikeGibberish('kl')).toBe(false);
    expect(screenEntities('xkcd zzz', [])).toEqual({ spans: [], notice: 'unclear' });
  });

  it('drops placeholder species and ages', () => {
    const pet = screenEntities('any pet in penang', [
      { type: 'species', text: 'pet' },
      { type: 'location', text: 'penang' },
    ]);
    expect(pet).toEqual({ spans: [{ type: 'location', text: 'penang' }] });

    const age = screenEntities('one dog please', [
      { type: 'age', text: '1' },
      { type: 'species', text: 'dog' },
    ]);
    expect(age).toEqual({ spans: [{ type: 'species', text: 'dog' }] });
  });

  it('reports unclear when every extracted span was rejected', () => {
    expect(screenEntities('xz', [{ type: 'breed', text: 'xz' }])).toEqual({ spans: [], notice: 'unclear' });
  });

  it('adds a color from keywords when the model missed it', () => {
    const out = screenEntities('looking for a ginger cat', [{ type: 'species', text: 'cat' }]);
    expect(out.spans).toEqual([
      { type: 'species', text: 'cat' },
      { type: 'color', text: 'ginger' },
    ]);
  });

  it('does not read a breed name as a coat color', () => {
    const out = screenEntities('a golden retriever in kl', [{ type: 'breed', text: 'golden retriever' }]);
    expect(out.spans).toEqual([
      { type: 'breed', text: 'golden retriever' },
      { type: 'location', text: 'kl' },
    ]);
  });

  it('prefers the longest location phrase', () => {
    const out = screenEntities('adopt near johor bahru', []);
    expect(out.spans).toEqual([{ type: 'location', text: 'johor bahru' }]);
  });

  it('takes the first color mentioned', () => {
    expect(screenEntities('a grey or brown cat', [{ type: 'species', text: 'cat' }]).spans).toEqual([
      { type: 'species', text: 'cat' },
      { type: 'color', text: 'grey' },
    ]);
    expect(screenEntities('not black, white please', [])).toEqual({ spans: [{ type: 'color', text: 'black' }] });
  });

  it('takes the first location mentioned', () => {
    expect(screenEntities('from ipoh but moving to penang', []).spans).toEqual([{ type: 'location', text: 'ipoh' }]);
  });

  it('returns no notice when nothing was extracted or found', () => {
    expect(screenEntities('what can you do', [])).toEqual({ spans: [] });
  });
});
