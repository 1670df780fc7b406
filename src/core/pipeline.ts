import type pino from 'pino';
import type { EntitySpanT, IntentLabel, TurnResultT } from '../schemas/chat.js';
import { autocorrect } from './autocorrect.js';
import { ConversationController } from './conversation.js';
import { screenEntities } from './entity_filter.js';
import type { ChatModels } from './models.js';

const DECLINES = new Set(['no', 'nope', 'nah']);
const GREETINGS = new Set(['hi', 'hey', 'hello']);

type PipelineContext = { log: pino.Logger; controller?: ConversationController };

/**
 * One chat session: runs each message through the models and hands the
 * predictions to the conversation controller.
 */
export class ChatPipeline {
  readonly controller: ConversationController;
  private readonly log: pino.Logger;

  constructor(private readonly models: ChatModels, ctx: PipelineContext) {
    this.log = ctx.log;
    this.controller = ctx.controller ?? new ConversationController({ log: ctx.log });
  }

  reset(): TurnResultT {
    return this.controller.reset();
  }

  async handleMessage(message: string): Promise<TurnResultT> {
    const trimmed = message.trim();
    if (this.controller.ended) return this.controller.endedReply();
    if (!trimmed) return this.controller.greet();

    const text = autocorrect(trimmed);
    if (text !== trimmed) this.log.debug({ from: trimmed, to: text }, 'pipeline: autocorrected');

    const lower = text.toLowerCase().replace(/[!.?]+$/, '');
    if (DECLINES.has(lower)) return this.controller.decline();
    if (GREETINGS.has(lower)) return this.turn(text, 'greeting', 1, []);

    const [prediction, extracted] = await Promise.all([
      this.models.classifier.classify(text),
      this.models.extractor.extract(text),
    ]);

    let spans = extracted;
    if (prediction.intent === 'unknown' && spans.length === 0 && this.controller.inSearchContext) {
      spans = await this.reextractSingleWord(text);
    }

    this.log.debug({ intent: prediction.intent, confidence: prediction.confidence, spans }, 'pipeline: predictions');

    const screened = screenEntities(text, spans, this.log);
    return this.controller.handleTurn({
      utterance: text,
      intent: prediction.intent,
      confidence: prediction.confidence,
      spans: screened.spans,
      notice: screened.notice,
    });
  }

  /** "fluffy" alone means little to the model; "I want a fluffy dog" does. */
  private async reextractSingleWord(text: string): Promise<EntitySpanT[]> {
    const words = text.split(/\s+/);
    if (words.length !== 1 || text.length <= 2) return [];
    const species = this.controller.snapshot().slots.species ?? 'pet';
    const pseudo = `I want a ${text} ${species}`;
    const spans = await this.models.extractor.extract(pseudo);
    // the species word was ours, not the user's
    return spans.filter((s) => s.type !== 'species');
  }

  private turn(utterance: string, intent: IntentLabel, confidence: number, spans: EntitySpanT[]): TurnResultT {
    return this.controller.handleTurn({ utterance, intent, confidence, spans });
  }
}
