/**
 * Redaction utilities for logs. Replaces emails and phone numbers people
 * sometimes type when asking about an adoption.
 * Redaction is disabled when LOG_LEVEL=debug to aid local debugging.
 */

function scrubString(input: string): string {
  let out = input;
  out = out.replace(/[\w.+-]+@[\w-]+(\.[\w-]+)+/g, '[REDACTED_EMAIL]');
  // Malaysian and international phone numbers: +60 12-345 6789, 012-3456789
  out = out.replace(/(\+?\d[\d\s-]{7,}\d)/g, '[REDACTED_PHONE]');
  return out;
}

function scrubDeep(value: unknown, seen = new WeakSet<object>()): unknown {
  if (typeof value === 'string') return scrubString(value);
  if (typeof value !== 'object' || value === null) return value;
  if (seen.has(value)) return value;
  seen.add(value);
  if (Array.isArray(value)) {
    return value.map((v) => scrubDeep(v, seen));
  }
  if (value instanceof Error) return value;
  const out: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(value)) {
    out[k] = scrubDeep(v, seen);
  }
  return out;
}

/**
 * Scrub contact details from a log argument.
 */
export function scrubPII(arg: unknown, enabled: boolean): unknown {
  if (!enabled) return arg;
  return scrubDeep(arg);
}

/**
 * Convenience for messages.
 */
export function scrubMessage(msg: string, enabled: boolean): string {
  return enabled ? scrubString(msg) : msg;
}
