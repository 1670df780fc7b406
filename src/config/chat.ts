import 'dotenv/config';
import path from 'node:path';
import { z } from 'zod';

const booleanish = z
  .union([z.boolean(), z.enum(['true', 'false', '1', '0'])])
  .transform((v) => v === true || v === 'true' || v === '1');

const ChatConfigSchema = z.object({
  modelsDir: z.string().min(1).default('models'),
  intentEncoderModel: z.string().min(1).default('all-MiniLM-L6-v2'),
  intentHeadPath: z.string().min(1).optional(),
  nerModel: z.string().min(1).default('ner'),
  intentThreshold: z.coerce.number().min(0).max(1).default(0.55),
  allowRemoteModels: booleanish.default(false),
  logLevel: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('error'),
  streamingDelayMs: z.coerce.number().int().min(0).max(1000).default(2),
});

export type ChatConfig = Omit<z.infer<typeof ChatConfigSchema>, 'intentHeadPath'> & {
  intentHeadPath: string;
};

type Env = Record<string, string | undefined>;

export function loadChatConfig(env: Env = process.env): ChatConfig {
  const parsed = ChatConfigSchema.parse({
    modelsDir: env.MODELS_DIR || undefined,
    intentEncoderModel: env.INTENT_ENCODER_MODEL || undefined,
    intentHeadPath: env.INTENT_HEAD_PATH || undefined,
    nerModel: env.NER_MODEL || undefined,
    intentThreshold: env.INTENT_THRESHOLD || undefined,
    allowRemoteModels: env.ALLOW_REMOTE_MODELS || undefined,
    logLevel: env.LOG_LEVEL || undefined,
    streamingDelayMs: env.CLI_STREAMING_DELAY_MS || undefined,
  });
  return {
    ...parsed,
    intentHeadPath: parsed.intentHeadPath ?? path.join(parsed.modelsDir, 'intent', 'head.json'),
  };
}
