import path from 'node:path';
import type * as Transformers from '@huggingface/transformers';
import type { ChatConfig } from '../config/chat.js';

export type TransformersModule = typeof Transformers;

let loaded: Promise<TransformersModule> | null = null;

/**
 * Imports Transformers.js once and points it at the local model folder.
 * Remote downloads stay off unless ALLOW_REMOTE_MODELS is set.
 */
export function importTransformers(
  cfg: Pick<ChatConfig, 'modelsDir' | 'allowRemoteModels'>,
): Promise<TransformersModule> {
  if (!loaded) {
    loaded = import('@huggingface/transformers')
      .then((mod) => {
        mod.env.allowRemoteModels = cfg.allowRemoteModels;
        mod.env.allowLocalModels = true;
        mod.env.useFSCache = true;
        mod.env.localModelPath = path.resolve(process.cwd(), cfg.modelsDir);
        return mod;
      })
      .catch((e: unknown) => {
        loaded = null;
        throw e;
      });
  }
  return loaded;
}

/** Local models must exist on disk before the pipeline is asked for them. */
export function localModelDir(cfg: Pick<ChatConfig, 'modelsDir'>, model: string): string {
  return path.resolve(process.cwd(), cfg.modelsDir, model);
}
