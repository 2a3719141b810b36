/**
 * GhostTextEngine
 *
 * Mediates between the completion slot and the live document.
 *
 *   Empty ──offer──▶ Suggested ──accept/reject/invalidate──▶ Empty
 *
 * Only accept() mutates the document. Its own splice echoes back through the
 * surface's change stream; that echo must not invalidate anything, which is
 * what the `applying` flag is for.
 */

import type { Card, CursorPosition, DocumentChange, EditorSurface } from '@shared/types';
import { DEFAULT_FULFILLMENT_SETTINGS } from '@shared/types';
import { InvalidCursorError } from '@shared/errors';
import { assertCursorInDocument } from '@shared/utils';
import { completionStore as defaultCompletionStore } from '../store/completionStore';
import type { CompletionSlot, CompletionStore } from '../store/completionStore';

export interface GhostTextEngineOptions {
  /**
   * Allowed |documentLength − anchorLength| before a suggestion is dropped.
   * 0 = any edit invalidates.
   */
  driftTolerance?: number;
  store?: CompletionStore;
}

export interface GhostTextState {
  slot: CompletionSlot | null;
  applying: boolean;
}

export class GhostTextEngine {
  private readonly store: CompletionStore;
  private readonly driftTolerance: number;
  private applying = false;

  constructor(
    private readonly surface: EditorSurface,
    options: GhostTextEngineOptions = {},
  ) {
    this.store = options.store ?? defaultCompletionStore;
    this.driftTolerance = options.driftTolerance ?? DEFAULT_FULFILLMENT_SETTINGS.driftTolerance;
  }

  /**
   * Show `card` as ghost text. `anchorLength` is the document length the
   * suggestion was computed against. Returns false when the document has
   * already moved on.
   */
  offer(card: Card, anchorLength: number): boolean {
    if (card.body.length === 0) return false;
    if (this.hasDrifted(this.surface.getText().length, anchorLength)) {
      return false;
    }
    this.store.getState().setCompletion(card, anchorLength);
    this.surface.setGhostText(card.body);
    return true;
  }

  /**
   * Insert the suggestion at the cursor. Returns true if the document changed.
   */
  accept(): boolean {
    const { slot } = this.store.getState();
    if (!slot) return false;

    const cursor: CursorPosition = this.surface.getCursor();
    try {
      assertCursorInDocument(this.surface.getText(), cursor);
      this.applying = true;
      this.surface.spliceText(cursor, slot.text);
    } catch (error) {
      if (!(error instanceof InvalidCursorError)) throw error;
      console.debug(`[GhostTextEngine] Dropped completion: ${error.message}`);
      return false;
    } finally {
      this.applying = false;
      this.clear();
    }
    return true;
  }

  /** Drop the suggestion; the document is never touched. */
  reject(): boolean {
    if (!this.store.getState().slot) return false;
    this.clear();
    return true;
  }

  handleDocumentChange(change: DocumentChange): void {
    if (this.applying) return;
    const { slot } = this.store.getState();
    if (!slot) return;

    if (this.driftTolerance === 0 || this.hasDrifted(change.text.length, slot.anchorLength)) {
      this.clear();
    }
  }

  /** Returns true when the key was consumed; a failed accept leaves Tab to the host. */
  handleKey(key: string): boolean {
    if (!this.store.getState().slot) return false;
    switch (key) {
      case 'Tab':
        return this.accept();
      case 'Escape':
        this.reject();
        return true;
      default:
        return false;
    }
  }

  getState(): GhostTextState {
    return { slot: this.store.getState().slot, applying: this.applying };
  }

  private hasDrifted(currentLength: number, anchorLength: number): boolean {
    return Math.abs(currentLength - anchorLength) > this.driftTolerance;
  }

  private clear(): void {
    this.store.getState().clearCompletion();
    this.surface.clearGhostText();
  }
}
