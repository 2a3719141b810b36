/**
 * SessionRegistry
 *
 * In-memory fulfillment sessions keyed by the client-derived session id.
 * Sessions are created on first submit and evicted after `ttlMs` without a
 * submit or poll.
 */

import type { WireCard } from '@shared/types';
import { DEFAULT_SERVER_CONFIG } from '@shared/types';

export interface FulfillmentSession {
  readonly id: string;
  /** Accumulated result set for the current cycle. */
  cards: WireCard[];
  /** Bumped on every submit; results tagged with an older value are dropped. */
  cycle: number;
  /** Background fulfillers still running for `cycle`. */
  pending: number;
  touchedAt: number;
}

export interface SessionRegistryOptions {
  ttlMs?: number;
  now?: () => number;
}

export class SessionRegistry {
  private readonly sessions = new Map<string, FulfillmentSession>();
  private readonly ttlMs: number;
  private readonly now: () => number;
  private sweeper: ReturnType<typeof setInterval> | null = null;

  constructor(options: SessionRegistryOptions = {}) {
    this.ttlMs = options.ttlMs ?? DEFAULT_SERVER_CONFIG.sessionTtlMs;
    this.now = options.now ?? Date.now;
  }

  getOrCreate(id: string): FulfillmentSession {
    const existing = this.get(id);
    if (existing) return existing;

    const session: FulfillmentSession = {
      id,
      cards: [],
      cycle: 0,
      pending: 0,
      touchedAt: this.now(),
    };
    this.sessions.set(id, session);
    console.debug(`[SessionRegistry] Created ${id}`);
    return session;
  }

  /** Looks a session up and marks it as used. */
  get(id: string): FulfillmentSession | undefined {
    const session = this.sessions.get(id);
    if (session) session.touchedAt = this.now();
    return session;
  }

  /** Same lookup without touching the session. */
  peek(id: string): FulfillmentSession | undefined {
    return this.sessions.get(id);
  }

  delete(id: string): boolean {
    return this.sessions.delete(id);
  }

  size(): number {
    return this.sessions.size;
  }

  /** Evict expired sessions; returns how many were removed. */
  sweep(now: number = this.now()): number {
    let evicted = 0;
    for (const [id, session] of this.sessions) {
      if (now - session.touchedAt > this.ttlMs) {
        this.sessions.delete(id);
        evicted++;
      }
    }
    if (evicted > 0) {
      console.log(`[SessionRegistry] Evicted ${evicted} idle session(s)`);
    }
    return evicted;
  }

  /** Sweep periodically. The timer never keeps the process alive. */
  startSweeper(intervalMs = 60_000): void {
    this.stopSweeper();
    this.sweeper = setInterval(() => this.sweep(), intervalMs);
    this.sweeper.unref();
  }

  stopSweeper(): void {
    if (this.sweeper) {
      clearInterval(this.sweeper);
      this.sweeper = null;
    }
  }
}
