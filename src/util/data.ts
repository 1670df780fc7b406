import { readFileSync } from 'node:fs';
import path from 'node:path';
import type { z } from 'zod';

const MAX_DATA_FILE_BYTES = 262_144;

function candidatePaths(fileName: string): string[] {
  return [
    process.env.PET_CHAT_DATA_DIR ? path.join(process.env.PET_CHAT_DATA_DIR, fileName) : undefined,
    path.join(__dirname, '..', 'data', fileName),
    path.join(process.cwd(), 'src', 'data', fileName),
  ].filter((p): p is string => !!p);
}

/**
 * Reads a JSON file from the data directory and validates it.
 * A missing or invalid file throws; callers cache the result.
 */
export function loadDataFile<S extends z.ZodTypeAny>(fileName: string, schema: S): z.infer<S> {
  let lastErr: unknown;
  for (const p of candidatePaths(fileName)) {
    try {
      const txt = readFileSync(p, { encoding: 'utf-8' });
      if (txt.length > MAX_DATA_FILE_BYTES) throw new Error(`data_file_too_large: ${fileName}`);
      return schema.parse(JSON.parse(txt));
    } catch (e) {
      lastErr = e;
    }
  }
  throw lastErr ?? new Error(`data_file_not_found: ${fileName}`);
}
