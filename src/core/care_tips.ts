import { z } from 'zod';
import { loadDataFile } from '../util/data.js';
import { lookupSynonym } from './synonyms.js';

const CareTopic = z.object({
  id: z.string().min(1),
  keywords: z.array(z.string().min(1)).min(1),
  answers: z.object({
    dog: z.string().optional(),
    cat: z.string().optional(),
    default: z.string().min(1),
  }),
});

const CareTipsData = z.object({
  topics: z.array(CareTopic),
  fallback: z.string().min(1),
});

export type CareTipsDataT = z.infer<typeof CareTipsData>;

let data: CareTipsDataT | undefined;

function getCareTips(): CareTipsDataT {
  if (!data) data = loadDataFile('care_tips.json', CareTipsData);
  return data;
}

function tokenize(text: string): string[] {
  return text.toLowerCase().match(/[a-z]+/g) ?? [];
}

function speciesMentioned(tokens: string[]): string | undefined {
  for (const token of tokens) {
    const species = lookupSynonym('species', token);
    if (species) return species;
  }
  return undefined;
}

/**
 * Canned pet-care answer. Topic comes from keyword prefixes in the question,
 * species from the question itself or from the current search.
 */
export function answerCareQuestion(utterance: string, sessionSpecies?: string): string {
  const tips = getCareTips();
  const tokens = tokenize(utterance);
  const topic = tips.topics.find((t) =>
    tokens.some((token) => t.keywords.some((kw) => token.startsWith(kw))),
  );
  if (!topic) return tips.fallback;

  const species = speciesMentioned(tokens) ?? sessionSpecies;
  if (species === 'dog' && topic.answers.dog) return topic.answers.dog;
  if (species === 'cat' && topic.answers.cat) return topic.answers.cat;
  return topic.answers.default;
}
