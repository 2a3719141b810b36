/**
 * Fulfillment settings
 */

export interface FulfillmentSettings {
  backendUrl: string;

  /** Characters changed since the last submit before the idle timer is armed. */
  charThreshold: number;

  /** Quiet period after the threshold is reached before submitting (ms). */
  idleTimeoutMs: number;

  /** Gap between the end of one poll and the start of the next (ms). */
  pollIntervalMs: number;

  /** Upper bound for a single backend call (ms). */
  requestTimeoutMs: number;

  /** Cards kept per kind in the feed. */
  feedCapacityPerKind: number;

  /**
   * Quiet period after which a cycle fires even below charThreshold (ms).
   * 0 = disabled.
   */
  idleFallbackMs: number;

  /**
   * Length drift tolerated before a shown completion is invalidated.
   * 0 = any edit invalidates.
   */
  driftTolerance: number;
}

export const DEFAULT_FULFILLMENT_SETTINGS: FulfillmentSettings = {
  backendUrl: 'http://localhost:8000',
  charThreshold: 20,
  idleTimeoutMs: 4000,
  pollIntervalMs: 3000,
  requestTimeoutMs: 10000,
  feedCapacityPerKind: 3,
  idleFallbackMs: 0,
  driftTolerance: 0,
};

export interface ServerConfig {
  host: string;
  port: number;
  /** Idle time after which a session is evicted (ms). */
  sessionTtlMs: number;
  /** Per-fulfiller time budget (ms). */
  fulfillerTimeoutMs: number;
  /** Cards kept per kind in a session. */
  cardsPerKind: number;
}

export const DEFAULT_SERVER_CONFIG: ServerConfig = {
  host: '0.0.0.0',
  port: 8000,
  sessionTtlMs: 30 * 60 * 1000,
  fulfillerTimeoutMs: 10000,
  cardsPerKind: 3,
};
