#!/usr/bin/env node
import 'dotenv/config';
import { createInterface } from 'node:readline';
import type { Readable, Writable } from 'node:stream';
import chalk from 'chalk';
import MarkdownIt from 'markdown-it';
import type pino from 'pino';
import { loadChatConfig } from './config/chat.js';
import { describeError, ModelUnavailableError } from './core/errors.js';
import { loadModels } from './core/models.js';
import { ChatPipeline } from './core/pipeline.js';
import type { SearchQueryT, TurnResultT } from './schemas/chat.js';
import { createLogger } from './util/logging.js';
import { silenceNoisyLibLogs } from './util/noise_filter.js';

const md = new MarkdownIt({ breaks: true });

const FRAME_BAR = '─'.repeat(44);
const EXIT_COMMANDS = new Set(['exit', 'quit']);
const RESET_COMMANDS = new Set(['restart', 'reset', 'new chat']);

type Styler = (value: string) => string;

const identity: Styler = (value: string) => value;

interface BlockParts {
  top: string;
  body: string;
  bottom: string;
}

export function createBlock(title: string, message: string, accent: Styler, body: Styler): BlockParts {
  const lines = message.split('\n').map((line) => (line.length === 0 ? ' ' : line));
  const topPlain = `┌─ ${title.toUpperCase()} ${FRAME_BAR}`;
  const bottomPlain = `└${'─'.repeat(Math.max(topPlain.length - 1, 0))}`;
  const prefixed = lines.map((line) => `${accent('│')} ${body(line)}`).join('\n');
  return {
    top: accent(topPlain),
    body: prefixed,
    bottom: accent(bottomPlain),
  };
}

/** Renders the little markdown the replies use (bold, italics, bullets). */
export function renderMarkdownToTerminal(markdown: string): string {
  const html = md.render(markdown);
  return html
    .replace(/<strong>(.*?)<\/strong>/gi, (_m: string, text: string) => chalk.bold(text))
    .replace(/<em>(.*?)<\/em>/gi, (_m: string, text: string) => chalk.italic(text))
    .replace(/<li>(.*?)<\/li>/gi, '  • $1\n')
    .replace(/<p>(.*?)<\/p>/gis, '$1\n')
    .replace(/<br\s*\/?>\n?/gi, '\n')
    .replace(/<\/?[^>]+(>|$)/g, '')
    .replace(/&amp;/g, '&')
    .replace(/&lt;/g, '<')
    .replace(/&gt;/g, '>')
    .replace(/&quot;/g, '"')
    .replace(/&#39;/g, "'")
    .replace(/\n\s*\n/g, '\n\n')
    .trim();
}

export function formatSearch(search: SearchQueryT): string {
  const parts = Object.entries(search).map(([k, v]) => `${k}=${v}`);
  return `→ search: ${parts.join(' ')}`;
}

async function streamText(out: Writable, text: string, delayMs: number): Promise<void> {
  if (delayMs <= 0) {
    out.write(text);
    return;
  }
  for (const char of text) {
    out.write(char);
    await new Promise((resolve) => setTimeout(resolve, delayMs));
  }
}

export interface ChatLoopOptions {
  input: Readable;
  output: Writable;
  log: pino.Logger;
  streamingDelayMs?: number;
}

/**
 * Reads one line at a time and prints the assistant's reply. Each turn is
 * finished before the next line is taken. Stops on goodbye or end of input.
 */
export async function runChatLoop(pipeline: ChatPipeline, opts: ChatLoopOptions): Promise<void> {
  const { input, output, log } = opts;
  const delay = opts.streamingDelayMs ?? 0;
  const rl = createInterface({ input, terminal: false, crlfDelay: Infinity });
  const prompt = () => output.write(chalk.blue.bold('You> '));

  const printAssistant = async (res: TurnResultT) => {
    const block = createBlock('Assistant', renderMarkdownToTerminal(res.reply), chalk.greenBright, identity);
    output.write(`${block.top}\n`);
    await streamText(output, `${block.body}\n`, delay);
    if (res.search) output.write(`${chalk.gray(formatSearch(res.search))}\n`);
    output.write(`${block.bottom}\n\n`);
  };

  await printAssistant(pipeline.controller.greet());
  prompt();

  try {
    for await (const line of rl) {
      const q = line.trim();
      const command = q.toLowerCase();

      if (EXIT_COMMANDS.has(command)) {
        await printAssistant(pipeline.controller.handleTurn({ utterance: q, intent: 'goodbye', spans: [] }));
        break;
      }

      let res: TurnResultT;
      if (RESET_COMMANDS.has(command)) {
        res = pipeline.reset();
      } else {
        log.debug({ message: q }, 'cli: processing user message');
        res = await pipeline.handleMessage(q);
      }

      if (res.search) log.info({ search: res.search }, 'cli: adoption search requested');
      await printAssistant(res);
      if (res.ended) break;
      prompt();
    }
  } finally {
    rl.close();
  }
}

async function main() {
  const cfg = loadChatConfig();
  const log = createLogger(cfg.logLevel);
  silenceNoisyLibLogs(cfg.logLevel);
  log.debug({ logLevel: cfg.logLevel, modelsDir: cfg.modelsDir }, 'CLI starting');

  console.log(chalk.yellow.bold('🐾  Pet Adoption Assistant: find a cat or dog to adopt'));
  console.log(chalk.gray('─'.repeat(60)));
  console.log(
    chalk.green('• Tell me the pet, where you are, and any breed, color or age\n') +
      chalk.green('• Ask pet care questions any time\n') +
      chalk.blue("Commands: 'restart' (new search), ") +
      chalk.red("'exit' (quit)"),
  );
  console.log(chalk.gray('─'.repeat(60)));
  console.log(chalk.gray('Loading models...'));

  const models = await loadModels(cfg, log);
  const pipeline = new ChatPipeline(models, { log });

  await runChatLoop(pipeline, {
    input: process.stdin,
    output: process.stdout,
    log,
    streamingDelayMs: cfg.streamingDelayMs,
  });
}

if (require.main === module) {
  main().catch((e: unknown) => {
    if (e instanceof ModelUnavailableError) {
      console.error(chalk.red(`❌ ${e.message}`));
      console.error(chalk.gray('Check MODELS_DIR, INTENT_HEAD_PATH and NER_MODEL.'));
    } else {
      console.error(chalk.red(`❌ ${describeError(e)}`));
    }
    process.exit(1);
  });
}
