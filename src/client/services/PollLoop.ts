/**
 * PollLoop — fetches the accumulated card set for one cycle until the backend
 * reports processing=false.
 *
 * Polls are strictly sequential: the next timer is armed only after the
 * previous response has been handled, so at most one poll is in flight.
 * No iteration cap; the loop runs until completion, an error, or cancel().
 */

import type { FulfillResponse } from '@shared/types';
import type { CycleToken } from './CycleGuard';

export type PollLoopState = 'idle' | 'polling' | 'completed' | 'failed' | 'cancelled';

export interface PollLoopHandlers {
  /** Every fresh response, including the final one. */
  onSnapshot: (response: FulfillResponse) => void;
  onComplete: () => void;
  onError: (error: unknown) => void;
}

export interface PollLoopOptions {
  poll: (sessionId: string) => Promise<FulfillResponse>;
  sessionId: string;
  token: CycleToken;
  intervalMs: number;
  handlers: PollLoopHandlers;
}

export class PollLoop {
  private state: PollLoopState = 'idle';
  private timer: ReturnType<typeof setTimeout> | null = null;
  private polls = 0;

  constructor(private readonly options: PollLoopOptions) {}

  start(): void {
    if (this.state !== 'idle') return;
    this.state = 'polling';
    this.schedule();
  }

  /** Stops the loop; a response already in flight is dropped on arrival. */
  cancel(): void {
    if (this.state !== 'idle' && this.state !== 'polling') return;
    this.state = 'cancelled';
    this.clearTimer();
  }

  getState(): PollLoopState {
    return this.state;
  }

  getPollCount(): number {
    return this.polls;
  }

  private schedule(): void {
    this.timer = setTimeout(() => {
      this.timer = null;
      this.tick().catch((error: unknown) => {
        console.error('[PollLoop] Snapshot handler threw:', error);
      });
    }, this.options.intervalMs);
  }

  private isLive(): boolean {
    return this.state === 'polling' && this.options.token.isActive();
  }

  private async tick(): Promise<void> {
    if (!this.isLive()) return;
    this.polls++;

    let response: FulfillResponse;
    try {
      response = await this.options.poll(this.options.sessionId);
    } catch (error) {
      if (!this.isLive()) return;
      this.state = 'failed';
      this.options.handlers.onError(error);
      return;
    }

    if (!this.isLive()) return;
    this.options.handlers.onSnapshot(response);

    // A handler may have cancelled the loop.
    if (!this.isLive()) return;
    if (response.processing) {
      this.schedule();
      return;
    }
    this.state = 'completed';
    this.options.handlers.onComplete();
  }

  private clearTimer(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }
}
