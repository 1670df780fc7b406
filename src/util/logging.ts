import pino from 'pino';
import { scrubPII } from './redact.js';

/**
 * Creates a pino logger writing to stderr, so logs never interleave with the
 * chat on stdout. Contact details are redacted unless the level is debug.
 */
export function createLogger(level: string = process.env.LOG_LEVEL ?? 'info'): pino.Logger {
  const redactEnabled = level !== 'debug' && level !== 'trace';

  return pino(
    {
      level,
      hooks: {
        logMethod(args, method) {
          // widen the overload tuple so objects and strings scrub alike
          const raw: unknown[] = args;
          Reflect.apply(method, this, raw.map((a) => scrubPII(a, redactEnabled)));
        },
      },
    },
    pino.destination(2),
  );
}
