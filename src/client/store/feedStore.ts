/**
 * Feed Store
 * Ordered sidebar cards with a per-kind cap. A full kind evicts its own oldest
 * card; kinds never evict each other.
 */

import { createStore } from 'zustand/vanilla';
import { immer } from 'zustand/middleware/immer';
import type { Card, CardKind } from '@shared/types';
import { DEFAULT_FULFILLMENT_SETTINGS } from '@shared/types';

interface FeedState {
  cards: Card[];
  selectedCardId: string | null;
  capacityPerKind: number;

  // Actions
  insertCard: (card: Card) => Card | null;
  replaceCards: (cards: readonly Card[]) => Card[];
  removeCard: (cardId: string) => Card | null;
  clearCards: () => void;
  clearCardsByKind: (kind: CardKind) => void;
  selectCard: (cardId: string | null) => void;
  cardsOfKind: (kind: CardKind) => Card[];
}

interface InsertResult {
  cards: Card[];
  evicted: Card | null;
}

function insertWithCap(cards: readonly Card[], card: Card, capacity: number): InsertResult {
  const sameKind = cards.filter((c) => c.kind === card.kind);
  const evicted = sameKind.length >= capacity ? sameKind[0] : null;
  const kept = evicted ? cards.filter((c) => c !== evicted) : [...cards];
  kept.push(card);
  return { cards: kept, evicted };
}

function keepSelection(selectedCardId: string | null, cards: readonly Card[]): string | null {
  if (selectedCardId === null) return null;
  return cards.some((c) => c.id === selectedCardId) ? selectedCardId : null;
}

export const createFeedStore = (capacityPerKind = DEFAULT_FULFILLMENT_SETTINGS.feedCapacityPerKind) =>
  createStore<FeedState>()(
    immer((set, get) => ({
      cards: [],
      selectedCardId: null,
      capacityPerKind,

      insertCard: (card) => {
        const { cards, selectedCardId } = get();
        const result = insertWithCap(cards, card, capacityPerKind);
        set({
          cards: result.cards,
          selectedCardId: keepSelection(selectedCardId, result.cards),
        });
        return result.evicted;
      },

      replaceCards: (incoming) => {
        let cards: Card[] = [];
        const evicted: Card[] = [];
        for (const card of incoming) {
          const result = insertWithCap(cards, card, capacityPerKind);
          cards = result.cards;
          if (result.evicted) evicted.push(result.evicted);
        }
        set({
          cards,
          selectedCardId: keepSelection(get().selectedCardId, cards),
        });
        return evicted;
      },

      removeCard: (cardId) => {
        const removed = get().cards.find((c) => c.id === cardId) ?? null;
        if (!removed) return null;
        set((state) => {
          state.cards = state.cards.filter((c) => c.id !== cardId);
          if (state.selectedCardId === cardId) state.selectedCardId = null;
        });
        return removed;
      },

      clearCards: () => {
        set({ cards: [], selectedCardId: null });
      },

      clearCardsByKind: (kind) => {
        set((state) => {
          state.cards = state.cards.filter((c) => c.kind !== kind);
          state.selectedCardId = keepSelection(state.selectedCardId, state.cards);
        });
      },

      selectCard: (cardId) => {
        set({ selectedCardId: keepSelection(cardId, get().cards) });
      },

      cardsOfKind: (kind) => get().cards.filter((c) => c.kind === kind),
    })),
  );

export type FeedStore = ReturnType<typeof createFeedStore>;

export const feedStore = createFeedStore();
