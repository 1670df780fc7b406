import { z } from 'zod';

export const Intent = z.enum(['find_pet', 'pet_care', 'greeting', 'thank_you', 'goodbye', 'correction', 'unknown']);
export type IntentLabel = z.infer<typeof Intent>;

export const SlotName = z.enum(['species', 'breed', 'color', 'location', 'age']);
export type Slot = z.infer<typeof SlotName>;

/** Order in which unset slots are prompted for. */
export const SLOT_PRIORITY: readonly Slot[] = ['species', 'location', 'breed', 'color', 'age'];
export const REQUIRED_SLOTS: readonly Slot[] = ['species', 'location'];
export const OPTIONAL_SLOTS: readonly Slot[] = ['breed', 'color', 'age'];

export const IntentPrediction = z.object({
  intent: Intent,
  confidence: z.number().min(0).max(1),
});
export type IntentPredictionT = z.infer<typeof IntentPrediction>;

export const EntitySpan = z.object({
  type: SlotName,
  text: z.string().trim().min(1),
});
export type EntitySpanT = z.infer<typeof EntitySpan>;

export const Phase = z.enum(['AWAITING_SPECIES', 'AWAITING_LOCATION', 'READY_TO_SEARCH', 'CARE_QA', 'ENDED']);
export type PhaseT = z.infer<typeof Phase>;

export type Slots = Partial<Record<Slot, string>>;

export interface SessionState {
  slots: Slots;
  phase: PhaseT;
  greeted: boolean;
  lastIntent?: IntentLabel;
}

export const SearchQuery = z.object({
  species: z.string().min(1),
  location: z.string().min(1),
  breed: z.string().min(1).optional(),
  color: z.string().min(1).optional(),
  age: z.string().min(1).optional(),
});
export type SearchQueryT = z.infer<typeof SearchQuery>;

export const Notice = z.enum(['unsupported_species', 'unclear']);
export type NoticeT = z.infer<typeof Notice>;

export interface TurnInput {
  utterance: string;
  intent: IntentLabel;
  confidence?: number;
  /** Spans straight from the extractor; validated again before merging. */
  spans: readonly unknown[];
  notice?: NoticeT;
}

export const TurnResult = z.object({
  reply: z.string().min(1),
  phase: Phase,
  filled: z.array(SlotName),
  search: SearchQuery.optional(),
  ended: z.boolean(),
});
export type TurnResultT = z.infer<typeof TurnResult>;
