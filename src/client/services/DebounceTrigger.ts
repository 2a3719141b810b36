/**
 * DebounceTrigger
 *
 * Turns a stream of document edits into a bounded rate of fulfillment cycles.
 *
 *  - Every edit adds |delta| to pendingDelta.
 *  - Once pendingDelta reaches charThreshold the idle timer is (re)armed;
 *    each further edit pushes it back. pendingDelta keeps accumulating until
 *    a cycle actually fires.
 *  - While a cycle is in flight no timer is armed. The owner calls evaluate()
 *    when the cycle ends so an already-met threshold arms the timer then.
 *  - Optional idle fallback (idleFallbackMs > 0): below the threshold, a
 *    long enough pause still fires a cycle.
 */

export interface DebounceTriggerConfig {
  charThreshold: number;
  idleTimeoutMs: number;
  /** 0 = disabled. */
  idleFallbackMs: number;
}

export type TriggerReason = 'threshold' | 'idle-fallback';

export interface DebounceTriggerHooks {
  /** True while a cycle (submit or its poll loop) is running. */
  isBusy: () => boolean;
  onFire: (reason: TriggerReason) => void;
  onPendingDeltaChange?: (pendingDelta: number) => void;
}

export class DebounceTrigger {
  private pendingDelta = 0;
  private idleTimer: ReturnType<typeof setTimeout> | null = null;
  private fallbackTimer: ReturnType<typeof setTimeout> | null = null;
  private disposed = false;

  constructor(
    private readonly config: DebounceTriggerConfig,
    private readonly hooks: DebounceTriggerHooks,
  ) {}

  // ── Public API ───────────────────────────────────────────────────────

  recordEdit(delta: number): void {
    if (this.disposed) return;
    const size = Math.abs(delta);
    if (size === 0) return;
    this.setPendingDelta(this.pendingDelta + size);
    this.evaluate();
  }

  /**
   * Arm whichever timer the current pendingDelta calls for. No-op while a
   * cycle is in flight.
   */
  evaluate(): void {
    if (this.disposed || this.hooks.isBusy()) return;

    if (this.pendingDelta >= this.config.charThreshold) {
      this.clearFallbackTimer();
      this.clearIdleTimer();
      this.idleTimer = setTimeout(() => {
        this.idleTimer = null;
        this.fire('threshold');
      }, this.config.idleTimeoutMs);
      return;
    }

    if (this.config.idleFallbackMs > 0 && this.pendingDelta > 0) {
      this.clearFallbackTimer();
      this.fallbackTimer = setTimeout(() => {
        this.fallbackTimer = null;
        this.fire('idle-fallback');
      }, this.config.idleFallbackMs);
    }
  }

  getPendingDelta(): number {
    return this.pendingDelta;
  }

  isArmed(): boolean {
    return this.idleTimer !== null || this.fallbackTimer !== null;
  }

  /** Drop pending timers and the accumulated delta (manual trigger path). */
  reset(): void {
    this.cancel();
    this.setPendingDelta(0);
  }

  /** Drop pending timers; the accumulated delta is kept. */
  cancel(): void {
    this.clearIdleTimer();
    this.clearFallbackTimer();
  }

  /** Safe to call multiple times. */
  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    this.cancel();
  }

  // ── Private ──────────────────────────────────────────────────────────

  private fire(reason: TriggerReason): void {
    if (this.disposed || this.hooks.isBusy()) return;
    this.cancel();
    this.setPendingDelta(0);
    this.hooks.onFire(reason);
  }

  private setPendingDelta(value: number): void {
    this.pendingDelta = value;
    this.hooks.onPendingDeltaChange?.(value);
  }

  private clearIdleTimer(): void {
    if (this.idleTimer) {
      clearTimeout(this.idleTimer);
      this.idleTimer = null;
    }
  }

  private clearFallbackTimer(): void {
    if (this.fallbackTimer) {
      clearTimeout(this.fallbackTimer);
      this.fallbackTimer = null;
    }
  }
}
