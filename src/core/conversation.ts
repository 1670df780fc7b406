import type pino from 'pino';
import {
  EntitySpan,
  OPTIONAL_SLOTS,
  REQUIRED_SLOTS,
  SearchQuery,
  SLOT_PRIORITY,
  type EntitySpanT,
  type IntentLabel,
  type PhaseT,
  type SearchQueryT,
  type SessionState,
  type Slot,
  type Slots,
  type TurnInput,
  type TurnResultT,
} from '../schemas/chat.js';
import { answerCareQuestion } from './care_tips.js';
import {
  askFor,
  CLARIFY,
  CLARIFY_WITH_CONTEXT,
  confirmSlot,
  DECLINE,
  ENDED,
  FAREWELL,
  GREETING,
  GREETING_AGAIN,
  joinReply,
  noticeReply,
  searchReply,
  THANKS,
} from './replies.js';
import { canonicalize } from './synonyms.js';

/** Intents whose entities are merged into the search. */
const MERGE_INTENTS: ReadonlySet<IntentLabel> = new Set(['find_pet', 'correction', 'unknown']);

export function createSessionState(): SessionState {
  return { slots: {}, phase: 'AWAITING_SPECIES', greeted: false };
}

/** Phase implied by the filled slots alone. */
export function slotPhase(slots: Slots): PhaseT {
  if (!slots.species) return 'AWAITING_SPECIES';
  if (!slots.location) return 'AWAITING_LOCATION';
  return 'READY_TO_SEARCH';
}

export function nextMissingSlot(slots: Slots, among: readonly Slot[] = SLOT_PRIORITY): Slot | undefined {
  return among.find((slot) => !slots[slot]);
}

export function toSearchQuery(slots: Slots): SearchQueryT | undefined {
  const parsed = SearchQuery.safeParse(slots);
  return parsed.success ? parsed.data : undefined;
}

export type CareAnswer = (utterance: string, species?: string) => string;

export interface ConversationOptions {
  log?: pino.Logger;
  careAnswer?: CareAnswer;
}

/**
 * Owns the state of one conversation and turns each classified utterance into
 * a reply. Entities are canonicalized before they are stored and a newer value
 * always replaces an older one.
 */
export class ConversationController {
  private state: SessionState = createSessionState();
  private readonly log?: pino.Logger;
  private readonly careAnswer: CareAnswer;

  constructor(opts: ConversationOptions = {}) {
    this.log = opts.log;
    this.careAnswer = opts.careAnswer ?? answerCareQuestion;
  }

  get phase(): PhaseT {
    return this.state.phase;
  }

  get ended(): boolean {
    return this.state.phase === 'ENDED';
  }

  /** True once the user has started describing a pet. */
  get inSearchContext(): boolean {
    const last = this.state.lastIntent;
    return REQUIRED_SLOTS.some((s) => !!this.state.slots[s]) || last === 'find_pet' || last === 'correction';
  }

  snapshot(): SessionState {
    return { ...this.state, slots: { ...this.state.slots } };
  }

  reset(): TurnResultT {
    this.state = createSessionState();
    this.log?.debug('conversation: reset');
    return this.greet();
  }

  greet(): TurnResultT {
    const first = !this.state.greeted;
    this.state.greeted = true;
    return this.result(first ? GREETING : GREETING_AGAIN);
  }

  decline(): TurnResultT {
    return this.result(DECLINE);
  }

  /** Reply shown for any input after the farewell. */
  endedReply(): TurnResultT {
    return this.result(ENDED);
  }

  handleTurn(input: TurnInput): TurnResultT {
    if (this.ended) {
      this.log?.debug({ intent: input.intent }, 'conversation: ignoring turn after goodbye');
      return this.endedReply();
    }

    const { intent } = input;
    this.log?.debug({ intent, confidence: input.confidence, phase: this.state.phase }, 'conversation: turn');

    switch (intent) {
      case 'goodbye':
        this.state.phase = 'ENDED';
        this.state.lastIntent = intent;
        return { ...this.result(FAREWELL), ended: true };
      case 'greeting':
        this.state.lastIntent = intent;
        return this.greet();
      case 'thank_you':
        this.state.greeted = true;
        this.state.lastIntent = intent;
        return this.result(THANKS);
      case 'pet_care':
        this.state.greeted = true;
        this.state.lastIntent = intent;
        this.state.phase = 'CARE_QA';
        return this.result(this.careAnswer(input.utterance, this.state.slots.species));
      default:
        return this.handleSearchTurn(input);
    }
  }

  private handleSearchTurn(input: TurnInput): TurnResultT {
    const { intent } = input;
    const hadContext = this.inSearchContext;
    this.state.greeted = true;

    const spans = this.validSpans(input.spans);
    if (spans.length > 0 && MERGE_INTENTS.has(intent)) {
      if (intent !== 'unknown') this.state.lastIntent = intent;
      return this.mergeAndRespond(spans);
    }

    if (intent === 'unknown') {
      if (input.notice) return this.result(noticeReply(input.notice));
      if (hadContext) return this.result(CLARIFY_WITH_CONTEXT);
      return this.result(CLARIFY);
    }

    // find_pet or correction without usable entities
    this.state.lastIntent = intent;
    if (input.notice) return this.result(noticeReply(input.notice));
    this.state.phase = slotPhase(this.state.slots);
    const missing = nextMissingSlot(this.state.slots, REQUIRED_SLOTS);
    if (missing) return this.result(askFor(missing));
    return this.searchResult([], []);
  }

  private validSpans(raw: readonly unknown[]): EntitySpanT[] {
    const out: EntitySpanT[] = [];
    for (const candidate of raw) {
      const parsed = EntitySpan.safeParse(candidate);
      if (parsed.success) {
        out.push(parsed.data);
      } else {
        this.log?.warn({ span: candidate }, 'conversation: ignoring malformed entity');
      }
    }
    return out;
  }

  private mergeAndRespond(spans: EntitySpanT[]): TurnResultT {
    const confirmations: string[] = [];
    const filled: Slot[] = [];

    for (const span of spans) {
      const value = canonicalize(span.type, span.text);
      const previous = this.state.slots[span.type];
      this.state.slots[span.type] = value;
      if (previous !== value && !filled.includes(span.type)) filled.push(span.type);
      const line = confirmSlot(span.type, value, previous);
      if (line) confirmations.push(line);
      this.log?.debug({ slot: span.type, value, previous }, 'conversation: slot merged');
    }

    this.state.phase = slotPhase(this.state.slots);
    if (this.state.phase === 'READY_TO_SEARCH') {
      return this.searchResult(confirmations, filled);
    }

    const missing = nextMissingSlot(this.state.slots, REQUIRED_SLOTS);
    return this.result(joinReply(...confirmations, missing ? askFor(missing) : undefined), filled);
  }

  private searchResult(confirmations: string[], filled: Slot[]): TurnResultT {
    const search = toSearchQuery(this.state.slots);
    const refine = nextMissingSlot(this.state.slots, OPTIONAL_SLOTS);
    this.log?.info({ search }, 'conversation: search triggered');
    return {
      ...this.result(joinReply(...confirmations, searchReply(this.state.slots), refine ? askFor(refine) : undefined), filled),
      search,
    };
  }

  private result(reply: string, filled: Slot[] = []): TurnResultT {
    return { reply, phase: this.state.phase, filled, ended: this.ended };
  }
}
