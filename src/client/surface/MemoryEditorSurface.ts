/**
 * MemoryEditorSurface
 *
 * Reference EditorSurface backed by an editor store. A UI binding (or a test)
 * drives it through applyEdit/setCursor and reads ghost text and the displayed
 * feed back from the store.
 */

import type { Card, CursorPosition, DocumentChangeListener, EditorSurface } from '@shared/types';
import { spliceAtCursor } from '@shared/utils';
import { createEditorStore, type EditorStore } from '../store/editorStore';
import { SurfaceEmitter } from './SurfaceEmitter';

export class MemoryEditorSurface implements EditorSurface {
  private readonly emitter = new SurfaceEmitter();

  constructor(readonly store: EditorStore = createEditorStore()) {}

  // ── Document ─────────────────────────────────────────────────────────

  getText(): string {
    return this.store.getState().content;
  }

  getCursor(): CursorPosition {
    const [line, column] = this.store.getState().cursor;
    return [line, column];
  }

  setCursor(cursor: CursorPosition): void {
    this.store.getState().setCursor(cursor);
  }

  /**
   * Replace the document text (a user edit) and notify listeners with the
   * resulting length delta.
   */
  applyEdit(text: string, cursor?: CursorPosition): void {
    const previous = this.getText();
    const state = this.store.getState();
    state.setContent(text);
    if (cursor) state.setCursor(cursor);
    this.emitter.emit('change', {
      delta: text.length - previous.length,
      text,
      cursor: this.getCursor(),
    });
  }

  spliceText(position: CursorPosition, text: string): CursorPosition {
    const result = spliceAtCursor(this.getText(), position, text);
    this.applyEdit(result.text, result.cursor);
    return result.cursor;
  }

  onChange(listener: DocumentChangeListener): () => void {
    this.emitter.on('change', listener);
    return () => {
      this.emitter.off('change', listener);
    };
  }

  // ── Ghost text ───────────────────────────────────────────────────────

  setGhostText(text: string): void {
    this.store.getState().setGhostText(text);
  }

  clearGhostText(): void {
    this.store.getState().setGhostText(null);
  }

  getGhostText(): string | null {
    return this.store.getState().ghostText;
  }

  // ── Feed ─────────────────────────────────────────────────────────────

  addFeedCards(cards: readonly Card[]): void {
    this.store.getState().appendFeed(cards);
  }

  clearFeed(): void {
    this.store.getState().clearFeed();
  }

  getDisplayedFeed(): readonly Card[] {
    return this.store.getState().displayedFeed;
  }
}
