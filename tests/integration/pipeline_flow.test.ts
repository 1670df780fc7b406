import { describe, it, expect } from '@jest/globals';
import pino from 'pino';
import { ChatPipeline } from '../../src/core/pipeline.js';
import { DECLINE, ENDED, FAREWELL, GREETING } from '../../src/core/replies.js';
import { scriptedModels } from '../helpers/fake_models.js';

const log = pino({ level: 'silent' });

describe('Chat pipeline flow', () => {
  it('fills slots, searches, corrects and ends', async () => {
    const { models, classify } = scriptedModels({
      'hi i want a dog': { intent: 'find_pet', spans: [{ type: 'species', text: 'dog' }] },
      kl: { intent: 'unknown', confidence: 0.3, spans: [{ type: 'location', text: 'kl' }] },
      'actually i want a cat': { intent: 'correction', spans: [{ type: 'species', text: 'cat' }] },
      'thanks!': { intent: 'thank_you' },
      bye: { intent: 'goodbye' },
    });
    const pipeline = new ChatPipeline(models, { log });

    const first = await pipeline.handleMessage('hi i want a dog');
    expect(first.reply).toBe('Added species: dog. Which state or area are you in?');
    expect(first.phase).toBe('AWAITING_LOCATION');

    const second = await pipeline.handleMessage('kl');
    expect(second.reply).toBe(
      'Added location: Kuala Lumpur. Got it! Searching for dogs in Kuala Lumpur... Do you have a preferred breed?',
    );
    expect(second.search).toEqual({ species: 'dog', location: 'Kuala Lumpur' });

    const third = await pipeline.handleMessage('actually i want a cat');
    expect(third.reply).toBe(
      'Okay, updated species to cat. Got it! Searching for cats in Kuala Lumpur... Do you have a preferred breed?',
    );
    expect(third.search).toEqual({ species: 'cat', location: 'Kuala Lumpur' });

    expect((await pipeline.handleMessage('thanks!')).reply).toBe(
      "You're most welcome! 😊 Anything else you'd like to ask?",
    );

    const bye = await pipeline.handleMessage('bye');
    expect(bye.reply).toBe(FAREWELL);
    expect(bye.ended).toBe(true);

    const after = await pipeline.handleMessage('a dog please');
    expect(after.reply).toBe(ENDED);
    expect(classify).not.toHaveBeenCalledWith('a dog please');
    expect(pipeline.controller.snapshot().slots).toEqual({ species: 'cat', location: 'Kuala Lumpur' });
  });

  it('fixes typos before the models see the text', async () => {
    const { models, classify } = scriptedModels({
      'i want a dog': { intent: 'find_pet', spans: [{ type: 'species', text: 'dog' }] },
    });
    const pipeline = new ChatPipeline(models, { log });

    const res = await pipeline.handleMessage('i wan a doog');
    expect(classify).toHaveBeenCalledWith('i want a dog');
    expect(res.filled).toEqual(['species']);
  });

  it('answers greetings and refusals without the models', async () => {
    const { models, classify, extract } = scriptedModels({});
    const pipeline = new ChatPipeline(models, { log });

    expect((await pipeline.handleMessage('Hello!')).reply).toBe(GREETING);
    expect((await pipeline.handleMessage('nope')).reply).toBe(DECLINE);
    expect(classify).not.toHaveBeenCalled();
    expect(extract).not.toHaveBeenCalled();
  });

  it('greets on empty input', async () => {
    const { models } = scriptedModels({});
    expect((await new ChatPipeline(models, { log }).handleMessage('   ')).reply).toBe(GREETING);
  });

  it('turns down other animals', async () => {
    const { models } = scriptedModels({ 'do you have rabbits': { intent: 'find_pet' } });
    const res = await new ChatPipeline(models, { log }).handleMessage('do you have rabbits');
    expect(res.reply).toBe(
      'Sorry, I currently only help with cats 🐱 and dogs 🐶. Would you like to search for one of those instead?',
    );
    expect(res.filled).toEqual([]);
  });

  it('answers care questions for the species being discussed', async () => {
    const { models } = scriptedModels({
      'i want a cat': { intent: 'find_pet', spans: [{ type: 'species', text: 'cat' }] },
      'how do I groom it?': { intent: 'pet_care' },
    });
    const pipeline = new ChatPipeline(models, { log });
    await pipeline.handleMessage('i want a cat');

    const res = await pipeline.handleMessage('how do I groom it?');
    expect(res.phase).toBe('CARE_QA');
    expect(res.reply).toBe(
      'Most cats groom themselves, but **weekly brushing** reduces hairballs. Long-haired cats need daily brushing. Trim claws every 2-3 weeks.',
    );
  });

  it('reads a lone word as a refinement of the current search', async () => {
    const { models, extract } = scriptedModels({
      'i want a dog': { intent: 'find_pet', spans: [{ type: 'species', text: 'dog' }] },
      'I want a golden dog': {
        spans: [
          { type: 'species', text: 'dog' },
          { type: 'color', text: 'golden' },
        ],
      },
    });
    const pipeline = new ChatPipeline(models, { log });
    await pipeline.handleMessage('i want a dog');

    const res = await pipeline.handleMessage('golden');
    expect(extract).toHaveBeenCalledWith('I want a golden dog');
    expect(res.reply).toBe('Added color: Golden. Which state or area are you in?');
    expect(pipeline.controller.snapshot().slots).toEqual({ species: 'dog', color: 'Golden' });
  });

  it('asks for clarification on gibberish', async () => {
    const { models } = scriptedModels({
      'i want a dog': { intent: 'find_pet', spans: [{ type: 'species', text: 'dog' }] },
    });
    const pipeline = new ChatPipeline(models, { log });
    await pipeline.handleMessage('i want a dog');

    const res = await pipeline.handleMessage('xkcdzz');
    expect(res.reply).toBe("Hmm, I didn't quite catch that. Could you try again?");
    expect(pipeline.controller.snapshot().slots).toEqual({ species: 'dog' });
  });

  it('starts over after reset', async () => {
    const { models } = scriptedModels({ bye: { intent: 'goodbye' } });
    const pipeline = new ChatPipeline(models, { log });
    await pipeline.handleMessage('bye');

    expect(pipeline.reset().reply).toBe(GREETING);
    expect(pipeline.controller.ended).toBe(false);
  });
});
