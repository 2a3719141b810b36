/**
 * Fulfillment protocol types shared by the client and the backend.
 */

import type { WireCard } from './card';

/** Zero-indexed [line, column]. */
export type CursorPosition = [line: number, column: number];

export interface FulfillmentContext {
  scopeRoot: string;
  planPath?: string;
}

export interface FulfillRequest {
  sessionId: string;
  documentText: string;
  cursor: CursorPosition;
  context: FulfillmentContext;
}

/**
 * Returned by both submit and poll. `cards` is the accumulated set for the
 * current cycle, never a delta.
 */
export interface FulfillResponse {
  cards: WireCard[];
  processing: boolean;
}

export interface HealthResponse {
  status: string;
  fulfillers: Record<string, boolean>;
}

export type CyclePhase = 'idle' | 'submitting' | 'polling';

export type CycleOutcome = 'completed' | 'failed' | 'cancelled';

export type FulfillmentErrorKind = 'transport' | 'backend' | 'routing';

/** Reported to listeners whenever a backend call fails or its cards cannot be applied. */
export interface FulfillmentDiagnostic {
  phase: 'submit' | 'poll' | 'clear';
  kind: FulfillmentErrorKind;
  status?: number;
  message: string;
  sessionId: string;
}
