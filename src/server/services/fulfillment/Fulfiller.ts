import type { CursorPosition, FulfillmentContext, WireCard } from '@shared/types';

export interface FulfillerInput {
  sessionId: string;
  documentText: string;
  cursor: CursorPosition;
  context: FulfillmentContext;
  /** Aborted when the fulfiller runs out of time. */
  signal: AbortSignal;
}

/**
 * immediate  — awaited by submit; its cards are in the submit response
 * background — started by submit, merged later and picked up by polling
 */
export type FulfillerMode = 'immediate' | 'background';

/**
 * A source of cards. Implementations wrap a search or model backend; the
 * orchestrator only sees this interface.
 */
export interface Fulfiller {
  readonly name: string;
  readonly mode: FulfillerMode;
  isAvailable(): boolean;
  fulfill(input: FulfillerInput): Promise<WireCard[]>;
}
