/**
 * Completion Store
 * Holds the single live ghost-text suggestion. Setting a new completion
 * silently discards the previous one.
 */

import { createStore } from 'zustand/vanilla';
import { immer } from 'zustand/middleware/immer';
import type { Card, CardMetadata } from '@shared/types';

export interface CompletionSlot {
  cardId: string;
  text: string;
  /** Document length when the suggestion was produced. */
  anchorLength: number;
  metadata: CardMetadata;
}

interface CompletionState {
  slot: CompletionSlot | null;

  // Actions
  setCompletion: (card: Card, anchorLength: number) => void;
  clearCompletion: () => void;
}

export const createCompletionStore = () =>
  createStore<CompletionState>()(
    immer((set) => ({
      slot: null,

      setCompletion: (card, anchorLength) => {
        set({
          slot: {
            cardId: card.id,
            text: card.body,
            anchorLength,
            metadata: card.metadata,
          },
        });
      },

      clearCompletion: () => {
        set({ slot: null });
      },
    })),
  );

export type CompletionStore = ReturnType<typeof createCompletionStore>;

export const completionStore = createCompletionStore();
