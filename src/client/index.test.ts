import { describe, expect, it, vi } from 'vitest';
import {
  FulfillmentController,
  MemoryEditorSurface,
  createEditorStore,
  createFeedStore,
  fulfillmentStore,
  type FulfillmentBackend,
} from './index';

describe('client entry point', () => {
  it('wires a controller to caller-supplied stores', async () => {
    vi.useFakeTimers();
    const backend: FulfillmentBackend = {
      submit: vi.fn().mockResolvedValue({ cards: [{ header: 'Q1', text: 'Why?', type: 'question' }], processing: false }),
      poll: vi.fn(),
      clear: vi.fn().mockResolvedValue(undefined),
    };
    const feed = createFeedStore(3);
    const surface = new MemoryEditorSurface(createEditorStore('Hello'));
    const controller = new FulfillmentController({
      client: backend,
      surface,
      context: { scopeRoot: '/work/notes' },
      stores: { feed, status: fulfillmentStore },
    });

    controller.trigger();
    await vi.advanceTimersByTimeAsync(0);

    expect(feed.getState().cards.map((c) => c.header)).toEqual(['Q1']);
    expect(fulfillmentStore.getState().completedCycles).toBe(1);

    controller.dispose();
    fulfillmentStore.getState().reset();
    vi.useRealTimers();
  });
});
