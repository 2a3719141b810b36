/**
 * FulfillmentEmitter
 *
 * Typed EventEmitter for the controller's cycle lifecycle.
 *
 * Events:
 *   cycle-start  (info: CycleStartEvent)      — a submit is about to go out
 *   cards        (info: CardsEvent)           — a snapshot was routed
 *   cycle-end    (info: CycleEndEvent)        — the cycle finished, failed or was superseded
 *   diagnostic   (info: FulfillmentDiagnostic) — a backend call failed
 */

import { EventEmitter } from 'events';
import type { Card, CycleOutcome, FulfillmentDiagnostic } from '@shared/types';
import type { TriggerReason } from './DebounceTrigger';

export type CycleStartReason = TriggerReason | 'manual';

export interface CycleStartEvent {
  generation: number;
  reason: CycleStartReason;
  sessionId: string;
}

export interface CardsEvent {
  generation: number;
  source: 'submit' | 'poll';
  completion: Card | null;
  feedCards: Card[];
  processing: boolean;
}

export interface CycleEndEvent {
  generation: number;
  outcome: CycleOutcome;
}

export class FulfillmentEmitter extends EventEmitter {
  emit(event: 'cycle-start', info: CycleStartEvent): boolean;
  emit(event: 'cards', info: CardsEvent): boolean;
  emit(event: 'cycle-end', info: CycleEndEvent): boolean;
  emit(event: 'diagnostic', info: FulfillmentDiagnostic): boolean;
  // eslint-disable-next-line @typescript-eslint/no-explicit-any
  emit(event: string | symbol, ...args: any[]): boolean {
    return super.emit(event, ...args);
  }

  on(event: 'cycle-start', listener: (info: CycleStartEvent) => void): this;
  on(event: 'cards', listener: (info: CardsEvent) => void): this;
  on(event: 'cycle-end', listener: (info: CycleEndEvent) => void): this;
  on(event: 'diagnostic', listener: (info: FulfillmentDiagnostic) => void): this;
  // eslint-disable-next-line @typescript-eslint/no-explicit-any
  on(event: string | symbol, listener: (...args: any[]) => void): this {
    return super.on(event, listener);
  }

  off(event: 'cycle-start', listener: (info: CycleStartEvent) => void): this;
  off(event: 'cards', listener: (info: CardsEvent) => void): this;
  off(event: 'cycle-end', listener: (info: CycleEndEvent) => void): this;
  off(event: 'diagnostic', listener: (info: FulfillmentDiagnostic) => void): this;
  // eslint-disable-next-line @typescript-eslint/no-explicit-any
  off(event: string | symbol, listener: (...args: any[]) => void): this {
    return super.off(event, listener);
  }
}
