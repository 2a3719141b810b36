/**
 * Fulfillment error taxonomy.
 *
 * Backend-facing failures are either TransportError (the request never got an
 * HTTP answer: network down, DNS, abort, timeout) or BackendError (an answer
 * arrived but was a non-2xx status or an unreadable body). Both end the active
 * cycle and are otherwise handled identically by the controller.
 */

import type { FulfillmentErrorKind } from './types';

export abstract class FulfillmentError extends Error {
  abstract readonly kind: FulfillmentErrorKind;
}

export class TransportError extends FulfillmentError {
  readonly kind = 'transport' as const;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TransportError';
  }
}

export class BackendError extends FulfillmentError {
  readonly kind = 'backend' as const;

  constructor(
    readonly status: number,
    message: string,
  ) {
    super(message);
    this.name = 'BackendError';
  }
}

/** A response arrived but routing its cards into the editor or feed threw. */
export class RoutingError extends FulfillmentError {
  readonly kind = 'routing' as const;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'RoutingError';
  }
}

/** Raised by the ghost text engine only; never leaves it. */
export class InvalidCursorError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidCursorError';
  }
}

/**
 * Normalise anything thrown by a backend call. Unknown throwables are treated
 * as transport failures because no HTTP status was observed.
 */
export function toFulfillmentError(error: unknown): FulfillmentError {
  if (error instanceof FulfillmentError) return error;
  const message = error instanceof Error ? error.message : String(error);
  return new TransportError(message, { cause: error });
}
