/**
 * FulfillmentOrchestrator
 *
 * Runs the registered fulfillers for a submit and keeps the per-session result
 * set that polls read from.
 *
 *  - A submit starts a new cycle: the session's cards are reset and its cycle
 *    counter bumped.
 *  - Immediate fulfillers are awaited; their cards are in the submit response.
 *  - Background fulfillers are started and left running. Whatever they return
 *    is merged only if the session is still on the cycle that started them.
 *  - A fulfiller that throws or runs past `fulfillerTimeoutMs` contributes no
 *    cards; the rest of the cycle is unaffected.
 */

import type { FulfillRequest, FulfillResponse, HealthResponse, WireCard } from '@shared/types';
import { DEFAULT_SERVER_CONFIG } from '@shared/types';
import { mergeWithKindCap } from '@shared/utils';
import type { FulfillmentSession, SessionRegistry } from '../session/SessionRegistry';
import type { Fulfiller, FulfillerInput } from './Fulfiller';

export interface FulfillmentOrchestratorOptions {
  sessions: SessionRegistry;
  fulfillers: readonly Fulfiller[];
  fulfillerTimeoutMs?: number;
  cardsPerKind?: number;
}

class FulfillerTimeoutError extends Error {
  constructor(name: string, ms: number) {
    super(`${name} timed out after ${ms}ms`);
    this.name = 'FulfillerTimeoutError';
  }
}

export class FulfillmentOrchestrator {
  private readonly sessions: SessionRegistry;
  private readonly fulfillers: readonly Fulfiller[];
  private readonly fulfillerTimeoutMs: number;
  private readonly cardsPerKind: number;

  constructor(options: FulfillmentOrchestratorOptions) {
    this.sessions = options.sessions;
    this.fulfillers = options.fulfillers;
    this.fulfillerTimeoutMs = options.fulfillerTimeoutMs ?? DEFAULT_SERVER_CONFIG.fulfillerTimeoutMs;
    this.cardsPerKind = options.cardsPerKind ?? DEFAULT_SERVER_CONFIG.cardsPerKind;
  }

  async submit(request: FulfillRequest): Promise<FulfillResponse> {
    const session = this.sessions.getOrCreate(request.sessionId);
    session.cycle += 1;
    session.cards = [];
    session.pending = 0;
    const cycle = session.cycle;

    const available = this.fulfillers.filter((f) => this.isAvailable(f));
    const immediate = available.filter((f) => f.mode === 'immediate');
    const background = available.filter((f) => f.mode === 'background');

    console.log(
      `[Orchestrator] ${session.id} cycle ${cycle}: ${immediate.length} immediate, ${background.length} background`,
    );

    const { sessionId, documentText, cursor, context } = request;
    const base = { sessionId, documentText, cursor, context };

    session.pending = background.length;
    for (const fulfiller of background) {
      this.runBackground(fulfiller, base, session, cycle).catch((error: unknown) => {
        console.error(`[Orchestrator] Merging ${fulfiller.name} result failed:`, error);
      });
    }

    const results = await Promise.all(immediate.map((f) => this.run(f, base)));
    if (this.isCurrent(session, cycle)) {
      for (const cards of results) this.merge(session, cards);
    }

    return this.toResponse(session);
  }

  /** Read-only view of a session. Unknown sessions read as empty and idle. */
  snapshot(sessionId: string): FulfillResponse {
    const session = this.sessions.get(sessionId);
    if (!session) return { cards: [], processing: false };
    return this.toResponse(session);
  }

  /** Idempotent. */
  clear(sessionId: string): void {
    if (this.sessions.delete(sessionId)) {
      console.log(`[Orchestrator] Cleared ${sessionId}`);
    }
  }

  health(): HealthResponse {
    const fulfillers: Record<string, boolean> = {};
    for (const f of this.fulfillers) fulfillers[f.name] = this.isAvailable(f);
    return { status: 'healthy', fulfillers };
  }

  // ── Private ──────────────────────────────────────────────────────────

  private async runBackground(
    fulfiller: Fulfiller,
    base: Omit<FulfillerInput, 'signal'>,
    session: FulfillmentSession,
    cycle: number,
  ): Promise<void> {
    const cards = await this.run(fulfiller, base);
    if (!this.isCurrent(session, cycle)) {
      console.debug(`[Orchestrator] Discarded ${fulfiller.name} result for superseded cycle ${cycle}`);
      return;
    }
    this.merge(session, cards);
    session.pending = Math.max(0, session.pending - 1);
  }

  /** Never rejects: failures and timeouts become an empty result. */
  private async run(fulfiller: Fulfiller, base: Omit<FulfillerInput, 'signal'>): Promise<WireCard[]> {
    const controller = new AbortController();
    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        controller.abort();
        reject(new FulfillerTimeoutError(fulfiller.name, this.fulfillerTimeoutMs));
      }, this.fulfillerTimeoutMs);
    });

    try {
      return await Promise.race([fulfiller.fulfill({ ...base, signal: controller.signal }), timeout]);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.warn(`[Orchestrator] Fulfiller ${fulfiller.name} failed: ${message}`);
      return [];
    } finally {
      clearTimeout(timer);
    }
  }

  private isAvailable(fulfiller: Fulfiller): boolean {
    try {
      return fulfiller.isAvailable();
    } catch (error) {
      console.warn(`[Orchestrator] Availability check for ${fulfiller.name} threw:`, error);
      return false;
    }
  }

  /** The session must still be registered and on the same cycle. */
  private isCurrent(session: FulfillmentSession, cycle: number): boolean {
    return this.sessions.peek(session.id) === session && session.cycle === cycle;
  }

  private merge(session: FulfillmentSession, cards: readonly WireCard[]): void {
    if (cards.length === 0) return;
    session.cards = mergeWithKindCap(session.cards, cards, this.cardsPerKind, (c) => c.type);
  }

  private toResponse(session: FulfillmentSession): FulfillResponse {
    return { cards: [...session.cards], processing: session.pending > 0 };
  }
}
