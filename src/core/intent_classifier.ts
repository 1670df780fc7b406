import { existsSync, readFileSync } from 'node:fs';
import type pino from 'pino';
import { z } from 'zod';
import type { ChatConfig } from '../config/chat.js';
import { Intent, type IntentPredictionT } from '../schemas/chat.js';
import { describeError, ModelArtifactError, ModelUnavailableError } from './errors.js';
import { importTransformers, localModelDir } from './transformers-env.js';

export interface IntentClassifier {
  classify(utterance: string): Promise<IntentPredictionT>;
}

/** Sentence embedding of one utterance. */
export type Embedder = (text: string) => Promise<number[]>;

/**
 * Logistic-regression head exported next to the encoder:
 * one coefficient row and one intercept per label.
 */
export const IntentHead = z
  .object({
    labels: z.array(Intent).min(2),
    coef: z.array(z.array(z.number()).min(1)).min(2),
    intercept: z.array(z.number()),
    threshold: z.number().min(0).max(1).optional(),
    multiClass: z.enum(['multinomial', 'ovr']).default('multinomial'),
  })
  .superRefine((head, ctx) => {
    if (head.coef.length !== head.labels.length || head.intercept.length !== head.labels.length) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'labels, coef and intercept must have the same length' });
    }
    const dim = head.coef[0].length;
    if (head.coef.some((row) => row.length !== dim)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'coef rows must share one dimension' });
    }
  });
export type IntentHeadT = z.infer<typeof IntentHead>;

function dot(a: readonly number[], b: readonly number[]): number {
  let sum = 0;
  for (let i = 0; i < a.length; i++) sum += a[i] * (b[i] ?? 0);
  return sum;
}

/** Class probabilities for one embedding. */
export function predictProba(head: IntentHeadT, embedding: readonly number[]): number[] {
  const logits = head.coef.map((row, i) => dot(row, embedding) + head.intercept[i]);
  if (head.multiClass === 'ovr') {
    const sig = logits.map((z) => 1 / (1 + Math.exp(-z)));
    const total = sig.reduce((s, p) => s + p, 0);
    return sig.map((p) => p / total);
  }
  const max = Math.max(...logits);
  const exps = logits.map((z) => Math.exp(z - max));
  const total = exps.reduce((s, e) => s + e, 0);
  return exps.map((e) => e / total);
}

export function createIntentClassifier(
  embed: Embedder,
  head: IntentHeadT,
  opts: { threshold: number; log?: pino.Logger },
): IntentClassifier {
  const threshold = head.threshold ?? opts.threshold;
  return {
    async classify(utterance: string): Promise<IntentPredictionT> {
      if (!utterance.trim()) return { intent: 'unknown', confidence: 0 };

      const probs = predictProba(head, await embed(utterance));
      let best = 0;
      for (let i = 1; i < probs.length; i++) {
        if (probs[i] > probs[best]) best = i;
      }
      const confidence = probs[best];
      const intent = confidence >= threshold ? head.labels[best] : 'unknown';
      opts.log?.debug({ intent, top: head.labels[best], confidence }, 'intent: classified');
      return { intent, confidence };
    },
  };
}

export function readIntentHead(headPath: string): IntentHeadT {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(headPath, { encoding: 'utf-8' }));
  } catch (e) {
    throw new ModelArtifactError(headPath, describeError(e));
  }
  const parsed = IntentHead.safeParse(raw);
  if (!parsed.success) {
    throw new ModelArtifactError(headPath, parsed.error.issues.map((i) => i.message).join('; '));
  }
  return parsed.data;
}

/**
 * Loads the sentence encoder and the regression head. Any failure is reported
 * as ModelUnavailableError so the CLI can stop before the first turn.
 */
export async function loadIntentClassifier(cfg: ChatConfig, log: pino.Logger): Promise<IntentClassifier> {
  if (!existsSync(cfg.intentHeadPath)) {
    throw new ModelUnavailableError('intent', `missing classifier head ${cfg.intentHeadPath}`);
  }
  const encoderDir = localModelDir(cfg, cfg.intentEncoderModel);
  if (!cfg.allowRemoteModels && !existsSync(encoderDir)) {
    throw new ModelUnavailableError('intent', `missing encoder folder ${encoderDir}`);
  }

  try {
    const head = readIntentHead(cfg.intentHeadPath);
    log.debug({ model: cfg.intentEncoderModel, labels: head.labels }, 'intent: loading encoder');

    const { pipeline } = await importTransformers(cfg);
    const encoder = await pipeline('feature-extraction', cfg.intentEncoderModel);
    const embed: Embedder = async (text) => {
      const tensor = await encoder(text, { pooling: 'mean', normalize: true });
      const values: number[] = [];
      for (const v of tensor.data) values.push(Number(v));
      return values;
    };

    const probe = await embed('hello');
    if (probe.length !== head.coef[0].length) {
      throw new ModelArtifactError(
        cfg.intentHeadPath,
        `head expects ${head.coef[0].length}-dim embeddings, encoder gives ${probe.length}`,
      );
    }

    log.debug({ model: cfg.intentEncoderModel, dim: probe.length }, 'intent: encoder loaded');
    return createIntentClassifier(embed, head, { threshold: cfg.intentThreshold, log });
  } catch (e) {
    throw new ModelUnavailableError('intent', describeError(e), { cause: e });
  }
}
