import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { WireCardSchema } from '@shared/schemas';
import type { FulfillerInput } from './Fulfiller';
import { CannedFulfiller, createSampleFulfillers, firstPick } from './sampleFulfillers';

const input = (signal = new AbortController().signal): FulfillerInput => ({
  sessionId: 's1',
  documentText: 'draft',
  cursor: [0, 5],
  context: { scopeRoot: '/work' },
  signal,
});

describe('sample fulfillers', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('pairs an immediate completion source with a background feed source', () => {
    const fulfillers = createSampleFulfillers(firstPick);
    expect(fulfillers.map((f) => [f.name, f.mode])).toEqual([
      ['sample-completion', 'immediate'],
      ['sample-feed', 'background'],
    ]);
    expect(fulfillers.every((f) => f.isAvailable())).toBe(true);
  });

  it('returns valid cards of the configured kinds', async () => {
    const fulfiller = new CannedFulfiller({
      name: 'feed',
      mode: 'immediate',
      kinds: ['question', 'context'],
      count: 2,
      pick: firstPick,
    });

    const cards = await fulfiller.fulfill(input());

    expect(cards.map((c) => c.type)).toEqual(['question', 'question', 'context', 'context']);
    for (const card of cards) {
      expect(WireCardSchema.safeParse(card).success).toBe(true);
      expect(card.metadata).toEqual({ source: 'sample' });
    }
  });

  it('waits for its simulated latency', async () => {
    const fulfiller = new CannedFulfiller({ name: 'slow', mode: 'background', kinds: ['completion'], delayMs: 1500 });
    let settled = false;
    const pending = fulfiller.fulfill(input()).then((cards) => {
      settled = true;
      return cards;
    });

    await vi.advanceTimersByTimeAsync(1499);
    expect(settled).toBe(false);
    await vi.advanceTimersByTimeAsync(1);
    expect(await pending).toHaveLength(1);
  });

  it('stops waiting when aborted', async () => {
    const controller = new AbortController();
    const fulfiller = new CannedFulfiller({ name: 'slow', mode: 'background', kinds: ['question'], delayMs: 5000 });
    const pending = fulfiller.fulfill(input(controller.signal));
    controller.abort();
    await expect(pending).rejects.toThrow('aborted');
  });

  it('is unavailable for kinds without canned cards', () => {
    const fulfiller = new CannedFulfiller({ name: 'math', mode: 'immediate', kinds: ['math'] });
    expect(fulfiller.isAvailable()).toBe(false);
  });
});
