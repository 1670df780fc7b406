/**
 * Entity extraction over a fine-tuned token-classification model.
 *
 * The model tags tokens with BIO labels (B-PET_TYPE, I-STATE, ...). Tokens are
 * grouped into spans and labels are mapped onto conversation slots; labels
 * without a slot are logged and dropped.
 *
 * Environment variables (see config/chat.ts):
 * - NER_MODEL: model folder under MODELS_DIR (default: ner)
 * - ALLOW_REMOTE_MODELS: allow Transformers.js to fetch the model
 */
import { existsSync } from 'node:fs';
import type pino from 'pino';
import { z } from 'zod';
import type { ChatConfig } from '../config/chat.js';
import { EntitySpan, type EntitySpanT, type Slot } from '../schemas/chat.js';
import { describeError, ModelUnavailableError } from './errors.js';
import { importTransformers, localModelDir } from './transformers-env.js';

const MAX_TEXT_LENGTH = 512;

export interface EntityExtractor {
  extract(utterance: string): Promise<EntitySpanT[]>;
}

export const RawToken = z.object({
  entity: z.string(),
  word: z.string(),
  score: z.number().optional(),
  index: z.number().optional(),
});
export type RawTokenT = z.infer<typeof RawToken>;

/** Per-token tagger, i.e. the model pipeline. */
export type TokenTagger = (text: string) => Promise<RawTokenT[]>;

export const LABEL_TO_SLOT: Readonly<Record<string, Slot>> = {
  PET_TYPE: 'species',
  SPECIES: 'species',
  STATE: 'location',
  LOCATION: 'location',
  CITY: 'location',
  BREED: 'breed',
  COLOR: 'color',
  COLOUR: 'color',
  AGE: 'age',
};

export type LabeledSpan = { label: string; text: string };

function splitTag(entity: string): { prefix: 'B' | 'I' | null; label: string } {
  const m = entity.match(/^([BI])-(.+)$/);
  if (m) return { prefix: m[1] === 'B' ? 'B' : 'I', label: m[2].toUpperCase() };
  return { prefix: null, label: entity.toUpperCase() };
}

/**
 * Groups BIO-tagged tokens into labeled spans. WordPiece continuations (##)
 * are glued to the previous piece; SentencePiece word starts (▁) get a space.
 */
export function groupTokens(tokens: readonly RawTokenT[]): LabeledSpan[] {
  const spans: LabeledSpan[] = [];
  let current: (LabeledSpan & { lastIndex?: number }) | null = null;

  for (const token of tokens) {
    const { prefix, label } = splitTag(token.entity);
    if (label === 'O') {
      current = null;
      continue;
    }

    const adjacent =
      current !== null &&
      (token.index === undefined || current.lastIndex === undefined || token.index === current.lastIndex + 1);
    const continues = current !== null && current.label === label && prefix !== 'B' && adjacent;

    const glue = token.word.startsWith('##');
    const piece = token.word.replace(/^##/, '').replace(/^▁/, '');

    if (current && continues) {
      current.text += glue ? piece : ` ${piece}`;
      current.lastIndex = token.index;
    } else {
      current = { label, text: piece, lastIndex: token.index };
      spans.push(current);
    }
  }

  return spans.map(({ label, text }) => ({ label, text: text.trim() }));
}

export function createEntityExtractor(tagger: TokenTagger, log?: pino.Logger): EntityExtractor {
  return {
    async extract(utterance: string): Promise<EntitySpanT[]> {
      if (!utterance.trim()) return [];

      const tokens = await tagger(utterance.slice(0, MAX_TEXT_LENGTH));
      const out: EntitySpanT[] = [];
      for (const { label, text } of groupTokens(tokens)) {
        const slot = LABEL_TO_SLOT[label];
        if (!slot) {
          log?.warn({ label, text }, 'ner: ignoring unrecognized entity type');
          continue;
        }
        const parsed = EntitySpan.safeParse({ type: slot, text });
        if (parsed.success) out.push(parsed.data);
      }
      log?.debug({ spans: out }, 'ner: extracted');
      return out;
    },
  };
}

export function toRawTokens(output: unknown): RawTokenT[] {
  const items: unknown[] = Array.isArray(output) ? output.flat() : [];
  return items.flatMap((item) => {
    const parsed = RawToken.safeParse(item);
    return parsed.success ? [parsed.data] : [];
  });
}

/** Loads the token-classification pipeline; failures are fatal. */
export async function loadEntityExtractor(cfg: ChatConfig, log: pino.Logger): Promise<EntityExtractor> {
  const modelDir = localModelDir(cfg, cfg.nerModel);
  if (!cfg.allowRemoteModels && !existsSync(modelDir)) {
    throw new ModelUnavailableError('ner', `missing model folder ${modelDir}`);
  }

  try {
    log.debug({ model: cfg.nerModel }, 'ner: loading pipeline');
    const { pipeline } = await importTransformers(cfg);
    const ner = await pipeline('token-classification', cfg.nerModel);
    log.debug({ model: cfg.nerModel }, 'ner: pipeline loaded');

    const tagger: TokenTagger = async (text) => toRawTokens(await ner(text));
    return createEntityExtractor(tagger, log);
  } catch (e) {
    throw new ModelUnavailableError('ner', describeError(e), { cause: e });
  }
}
