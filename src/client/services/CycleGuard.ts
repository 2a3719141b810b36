/**
 * Generation counter for fulfillment cycles. Every async resumption point
 * compares its token against the current generation; a mismatch means the
 * cycle was cancelled or superseded and the result must be dropped.
 */

export interface CycleToken {
  readonly generation: number;
  isActive(): boolean;
}

export class CycleGuard {
  private generation = 0;

  /** Invalidate every outstanding token and hand out a fresh one. */
  begin(): CycleToken {
    const generation = ++this.generation;
    return {
      generation,
      isActive: () => this.generation === generation,
    };
  }

  invalidate(): void {
    this.generation++;
  }

  current(): number {
    return this.generation;
  }
}
