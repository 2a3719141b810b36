/**
 * Editor Store
 * Backing state for the in-memory editor surface: document, cursor, the
 * ghost text currently rendered and the feed cards currently displayed.
 */

import { createStore } from 'zustand/vanilla';
import { immer } from 'zustand/middleware/immer';
import type { Card, CursorPosition } from '@shared/types';

interface EditorState {
  content: string;
  cursor: CursorPosition;
  ghostText: string | null;
  displayedFeed: Card[];

  // Actions
  setContent: (content: string) => void;
  setCursor: (cursor: CursorPosition) => void;
  setGhostText: (text: string | null) => void;
  appendFeed: (cards: readonly Card[]) => void;
  clearFeed: () => void;
  reset: () => void;
}

export const createEditorStore = (initialContent = '') =>
  createStore<EditorState>()(
    immer((set) => ({
      content: initialContent,
      cursor: [0, 0],
      ghostText: null,
      displayedFeed: [],

      setContent: (content) => {
        set({ content });
      },

      setCursor: (cursor) => {
        set({ cursor: [cursor[0], cursor[1]] });
      },

      setGhostText: (text) => {
        set({ ghostText: text });
      },

      appendFeed: (cards) => {
        set((state) => {
          state.displayedFeed.push(...cards);
        });
      },

      clearFeed: () => {
        set({ displayedFeed: [] });
      },

      reset: () => {
        set({ content: initialContent, cursor: [0, 0], ghostText: null, displayedFeed: [] });
      },
    })),
  );

export type EditorStore = ReturnType<typeof createEditorStore>;
