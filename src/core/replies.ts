import type { NoticeT, Slot, Slots } from '../schemas/chat.js';

export const GREETING =
  "Hello! 👋 I can help you find cats 🐱 or dogs 🐶 for adoption, or answer pet care questions.\n" +
  'You can say things like:\n' +
  "• I'm looking for a dog in Johor\n" +
  '• How do I groom a cat?\n' +
  'So, what would you like to do today?';

export const GREETING_AGAIN = 'Hello again! 👋 How can I help you today?';
export const THANKS = "You're most welcome! 😊 Anything else you'd like to ask?";
export const FAREWELL = 'Goodbye! 👋 Hope you find your perfect furry friend 🐶🐱';
export const ENDED = "This chat has ended. Type 'restart' to start a new search.";
export const DECLINE = 'Alright 😊 Let me know anytime if you change your mind.';

export const CLARIFY =
  "I'm not sure I understood. 🤔 You can say 'I want to adopt a cat in Penang' or 'How do I feed a puppy?'.";
export const CLARIFY_WITH_CONTEXT =
  "Hmm, I didn't quite catch that. Could you tell me a bit more, like 'small cream dog' or 'young cat'?";

const NOTICES: Record<NoticeT, string> = {
  unsupported_species:
    'Sorry, I currently only help with cats 🐱 and dogs 🐶. Would you like to search for one of those instead?',
  unclear: "Hmm, I didn't quite catch that. Could you try again?",
};

const SLOT_PROMPTS: Record<Slot, string> = {
  species: 'Are you looking for a dog or a cat?',
  location: 'Which state or area are you in?',
  breed: 'Do you have a preferred breed?',
  color: 'Any color preference?',
  age: 'Young, adult or senior?',
};

export function noticeReply(notice: NoticeT): string {
  return NOTICES[notice];
}

export function askFor(slot: Slot): string {
  return SLOT_PROMPTS[slot];
}

export function confirmSlot(slot: Slot, value: string, previous?: string): string | undefined {
  if (previous === value) return undefined;
  return previous ? `Okay, updated ${slot} to ${value}.` : `Added ${slot}: ${value}.`;
}

/** e.g. "Got it! Searching for Brown Poodle dog in Selangor..." */
export function searchReply(slots: Slots): string {
  const pet = slots.species ?? 'pet';
  const where = slots.location ?? 'your area';
  const desc = [slots.color, slots.age, slots.breed, pet].filter(Boolean).join(' ');
  return `Got it! Searching for ${desc}${slots.breed ? '' : 's'} in ${where}...`;
}

export function joinReply(...parts: Array<string | undefined>): string {
  return parts.filter((p): p is string => !!p && p.trim().length > 0).join(' ');
}
