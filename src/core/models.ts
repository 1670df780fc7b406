import type pino from 'pino';
import type { ChatConfig } from '../config/chat.js';
import { loadIntentClassifier, type IntentClassifier } from './intent_classifier.js';
import { loadEntityExtractor, type EntityExtractor } from './ner.js';

export interface ChatModels {
  classifier: IntentClassifier;
  extractor: EntityExtractor;
}

/**
 * Acquires both models once per process. Rejects with ModelUnavailableError
 * when either cannot be loaded.
 */
export async function loadModels(cfg: ChatConfig, log: pino.Logger): Promise<ChatModels> {
  const t0 = Date.now();
  const [classifier, extractor] = await Promise.all([
    loadIntentClassifier(cfg, log),
    loadEntityExtractor(cfg, log),
  ]);
  log.info({ ms: Date.now() - t0 }, 'models loaded');
  return { classifier, extractor };
}
