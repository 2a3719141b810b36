/**
 * FulfillmentController
 *
 * Owns the fulfillment cycle for one document:
 *
 *   edits ──▶ DebounceTrigger ──▶ submit ──▶ CardRouter ──▶ {ghost slot, feed}
 *                                   │
 *                                   └─ processing=true ──▶ PollLoop ──▶ CardRouter
 *
 * At most one cycle is active. Starting a cycle cancels the previous one's
 * timers and bumps the CycleGuard generation so any response still in flight
 * is dropped on arrival. Backend failures, and snapshots that cannot be
 * applied, end the cycle and are reported as diagnostics; they never reach the
 * caller or the document.
 */

import type {
  Card,
  CursorPosition,
  EditorSurface,
  FulfillmentContext,
  FulfillmentDiagnostic,
  FulfillmentSettings,
  FulfillResponse,
} from '@shared/types';
import { BackendError, RoutingError, toFulfillmentError } from '@shared/errors';
import { resolveFulfillmentSettings } from '@shared/schemas';
import { createCompletionStore } from '../store/completionStore';
import type { CompletionStore } from '../store/completionStore';
import { createFeedStore } from '../store/feedStore';
import type { FeedStore } from '../store/feedStore';
import { createFulfillmentStore } from '../store/fulfillmentStore';
import type { FulfillmentErrorInfo, FulfillmentStore } from '../store/fulfillmentStore';
import { toCards } from '../utils/cards';
import { deriveSessionId } from '../utils/sessionId';
import type { FulfillmentBackend } from './FulfillmentClient';
import { CardRouter } from './CardRouter';
import { CycleGuard, type CycleToken } from './CycleGuard';
import { DebounceTrigger } from './DebounceTrigger';
import { DismissedCardTracker } from './DismissedCardTracker';
import { FulfillmentEmitter, type CycleStartReason } from './FulfillmentEmitter';
import { GhostTextEngine } from './GhostTextEngine';
import { PollLoop } from './PollLoop';

export interface FulfillmentControllerOptions {
  client: FulfillmentBackend;
  surface: EditorSurface;
  context: FulfillmentContext;
  settings?: Partial<FulfillmentSettings>;
  /** Each controller gets fresh stores unless these are supplied. */
  stores?: {
    completion?: CompletionStore;
    feed?: FeedStore;
    status?: FulfillmentStore;
  };
  dismissed?: DismissedCardTracker;
}

export class FulfillmentController {
  readonly sessionId: string;
  readonly settings: FulfillmentSettings;
  readonly events = new FulfillmentEmitter();
  readonly ghost: GhostTextEngine;
  readonly router: CardRouter;
  readonly status: FulfillmentStore;

  private readonly client: FulfillmentBackend;
  private readonly surface: EditorSurface;
  private readonly context: FulfillmentContext;
  private readonly debounce: DebounceTrigger;
  private readonly guard = new CycleGuard();
  private activeToken: CycleToken | null = null;
  private pollLoop: PollLoop | null = null;
  private unsubscribe: (() => void) | null;
  private disposed = false;

  constructor(options: FulfillmentControllerOptions) {
    this.client = options.client;
    this.surface = options.surface;
    this.context = options.context;
    this.settings = resolveFulfillmentSettings(options.settings);
    this.sessionId = deriveSessionId(options.context);

    this.status = options.stores?.status ?? createFulfillmentStore();
    this.ghost = new GhostTextEngine(this.surface, {
      driftTolerance: this.settings.driftTolerance,
      store: options.stores?.completion ?? createCompletionStore(),
    });
    this.router = new CardRouter({
      ghost: this.ghost,
      surface: this.surface,
      feed: options.stores?.feed ?? createFeedStore(this.settings.feedCapacityPerKind),
      dismissed: options.dismissed ?? new DismissedCardTracker(),
    });
    this.debounce = new DebounceTrigger(
      {
        charThreshold: this.settings.charThreshold,
        idleTimeoutMs: this.settings.idleTimeoutMs,
        idleFallbackMs: this.settings.idleFallbackMs,
      },
      {
        isBusy: () => this.isBusy(),
        onFire: (reason) => this.startCycle(reason),
        onPendingDeltaChange: (pendingDelta) => this.status.getState().setPendingDelta(pendingDelta),
      },
    );

    // Invalidation has to see the edit before the trigger does.
    this.unsubscribe = this.surface.onChange((change) => {
      this.ghost.handleDocumentChange(change);
      this.debounce.recordEdit(change.delta);
    });
  }

  // ── Public API ───────────────────────────────────────────────────────

  /** Fulfill now, superseding whatever cycle is running. */
  trigger(): void {
    if (this.disposed) return;
    this.debounce.reset();
    this.startCycle('manual');
  }

  isBusy(): boolean {
    return this.activeToken !== null;
  }

  getLastError(): FulfillmentErrorInfo | null {
    return this.status.getState().lastError;
  }

  acceptCompletion(): boolean {
    return this.ghost.accept();
  }

  rejectCompletion(): boolean {
    return this.ghost.reject();
  }

  /** Returns true when the key was consumed by the ghost text engine. */
  handleKey(key: string): boolean {
    return this.ghost.handleKey(key);
  }

  dismissCard(cardId: string): Card | null {
    return this.router.dismiss(cardId);
  }

  /**
   * Forget everything for this document, locally and on the backend. A
   * failing backend call is reported as a diagnostic.
   */
  async clearSession(): Promise<void> {
    this.cancelActiveCycle();
    this.debounce.reset();
    this.ghost.reject();
    this.router.feed.getState().clearCards();
    this.router.renderFeed();

    try {
      await this.client.clear(this.sessionId);
    } catch (error) {
      this.report('clear', error);
    }
  }

  dispose(): void {
    if (this.disposed) return;
    this.cancelActiveCycle();
    this.disposed = true;
    this.debounce.dispose();
    this.unsubscribe?.();
    this.unsubscribe = null;
    this.events.removeAllListeners();
  }

  // ── Cycle ────────────────────────────────────────────────────────────

  private startCycle(reason: CycleStartReason): void {
    if (this.disposed) return;
    this.cancelActiveCycle();

    const token = this.guard.begin();
    this.activeToken = token;
    this.router.beginCycle();
    this.status.getState().setPhase('submitting');
    this.events.emit('cycle-start', {
      generation: token.generation,
      reason,
      sessionId: this.sessionId,
    });

    this.runCycle(token).catch((error: unknown) => {
      console.error('[FulfillmentController] Cycle handler threw:', error);
    });
  }

  private async runCycle(token: CycleToken): Promise<void> {
    const documentText = this.surface.getText();
    const cursor: CursorPosition = this.surface.getCursor();

    let response: FulfillResponse;
    try {
      response = await this.client.submit({
        sessionId: this.sessionId,
        documentText,
        cursor,
        context: this.context,
      });
    } catch (error) {
      if (token.isActive()) this.failCycle(token, 'submit', error);
      return;
    }

    if (!token.isActive()) return;
    const anchorLength = documentText.length;
    if (!this.applySnapshot(token, 'submit', response, anchorLength)) return;

    if (!token.isActive()) return;
    if (!response.processing) {
      this.finishCycle(token);
      return;
    }

    this.status.getState().setPhase('polling');
    const loop = new PollLoop({
      poll: (sessionId) => this.client.poll(sessionId),
      sessionId: this.sessionId,
      token,
      intervalMs: this.settings.pollIntervalMs,
      handlers: {
        onSnapshot: (snapshot) => {
          this.applySnapshot(token, 'poll', snapshot, anchorLength);
        },
        onComplete: () => this.finishCycle(token),
        onError: (error) => this.failCycle(token, 'poll', error),
      },
    });
    this.pollLoop = loop;
    loop.start();
  }

  /** Returns false when applying threw; the cycle has then been failed. */
  private applySnapshot(
    token: CycleToken,
    source: 'submit' | 'poll',
    response: FulfillResponse,
    anchorLength: number,
  ): boolean {
    try {
      // A submit answered while background work runs often carries no feed
      // cards yet; the previous feed stays up until a snapshot brings some.
      const applied = this.router.apply(toCards(response.cards), anchorLength, {
        keepFeedWhenEmpty: source === 'submit' && response.processing,
      });
      this.events.emit('cards', {
        generation: token.generation,
        source,
        completion: applied.completion,
        feedCards: applied.feedCards,
        processing: response.processing,
      });
      return true;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      const failure = new RoutingError(`Applying ${source} cards failed: ${message}`, { cause: error });
      this.failCycle(token, source, failure);
      return false;
    }
  }

  private finishCycle(token: CycleToken): void {
    this.endCycle();
    this.status.getState().recordCompleted();
    this.events.emit('cycle-end', { generation: token.generation, outcome: 'completed' });
    this.debounce.evaluate();
  }

  private failCycle(token: CycleToken, phase: 'submit' | 'poll', error: unknown): void {
    this.pollLoop?.cancel();
    this.endCycle();
    const info = this.report(phase, error);
    this.status.getState().recordFailed(info);
    this.events.emit('cycle-end', { generation: token.generation, outcome: 'failed' });
    this.debounce.evaluate();
  }

  private cancelActiveCycle(): void {
    const token = this.activeToken;
    if (!token) return;
    this.pollLoop?.cancel();
    this.guard.invalidate();
    this.endCycle();
    this.status.getState().setPhase('idle');
    this.events.emit('cycle-end', { generation: token.generation, outcome: 'cancelled' });
  }

  private endCycle(): void {
    this.activeToken = null;
    this.pollLoop = null;
  }

  /** Log, store and emit a cycle failure. */
  private report(phase: FulfillmentDiagnostic['phase'], error: unknown): FulfillmentErrorInfo {
    const failure = toFulfillmentError(error);
    const info: FulfillmentErrorInfo = {
      kind: failure.kind,
      message: failure.message,
      ...(failure instanceof BackendError ? { status: failure.status } : {}),
    };
    console.warn(`[FulfillmentController] ${phase} failed for ${this.sessionId}: ${failure.message}`);

    if (phase === 'clear') this.status.getState().recordError(info);
    this.events.emit('diagnostic', { phase, sessionId: this.sessionId, ...info });
    return info;
  }
}
