// Transformers.js and the ONNX runtime print setup chatter through console.
const NOISY_PATTERNS: RegExp[] = [
  /dtype not specified for "model"/i,
  /Using the default dtype \(fp32\) for this device \(cpu\)/i,
  /Removing initializer/i,
  /CleanUnusedInitializersAndNodeArgs/i,
];

export function isNoisyLibMessage(value: unknown): boolean {
  const text = typeof value === 'string' ? value : value instanceof Error ? value.message : '';
  return NOISY_PATTERNS.some((re) => re.test(text));
}

/** Drops known library chatter from console output unless debugging. */
export function silenceNoisyLibLogs(logLevel: string | undefined = process.env.LOG_LEVEL): void {
  const level = String(logLevel || '').toLowerCase();
  if (level === 'debug' || level === 'trace') return;

  for (const name of ['warn', 'info', 'log'] as const) {
    const orig = console[name].bind(console);
    console[name] = (...args: unknown[]) => {
      if (args.some(isNoisyLibMessage)) return;
      orig(...args);
    };
  }
}
