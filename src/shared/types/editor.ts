/**
 * Editor Surface contract
 * The only view of the editor the fulfillment core is allowed to touch.
 */

import type { Card } from './card';
import type { CursorPosition } from './fulfillment';

export interface DocumentChange {
  /** Signed change in document length caused by this edit. */
  delta: number;
  text: string;
  cursor: CursorPosition;
}

export type DocumentChangeListener = (change: DocumentChange) => void;

export interface EditorSurface {
  getText(): string;
  getCursor(): CursorPosition;

  /** Returns an unsubscribe function. */
  onChange(listener: DocumentChangeListener): () => void;

  /** Render-only: must not touch the document. */
  setGhostText(text: string): void;
  clearGhostText(): void;

  /** Inserts `text` at `position` and returns the new cursor position. */
  spliceText(position: CursorPosition, text: string): CursorPosition;

  addFeedCards(cards: readonly Card[]): void;
  clearFeed(): void;
}
