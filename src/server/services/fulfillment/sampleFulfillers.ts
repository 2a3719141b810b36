/**
 * Sample fulfillers returning canned cards. They exercise the immediate and
 * background paths end to end without any search or model provider.
 */

import type { CardKind, WireCard } from '@shared/types';
import { WireCardSchema } from '@shared/schemas';
import sampleCards from './sampleCards.json';
import type { Fulfiller, FulfillerInput, FulfillerMode } from './Fulfiller';

/** Picks `count` entries out of `pool`. */
export type CardPicker = <T>(pool: readonly T[], count: number) => T[];

export const randomPick: CardPicker = (pool, count) => {
  const copy = [...pool];
  for (let i = copy.length - 1; i > 0; i--) {
    const j = Math.floor(Math.random() * (i + 1));
    [copy[i], copy[j]] = [copy[j], copy[i]];
  }
  return copy.slice(0, count);
};

export const firstPick: CardPicker = (pool, count) => pool.slice(0, count);

const CANNED = loadCanned();

function loadCanned(): Map<CardKind, WireCard[]> {
  const canned = new Map<CardKind, WireCard[]>();
  for (const [kind, entries] of Object.entries(sampleCards)) {
    const cards = entries.map((entry) =>
      WireCardSchema.parse({ ...entry, type: kind, metadata: { source: 'sample' } }),
    );
    canned.set(WireCardSchema.shape.type.parse(kind), cards);
  }
  return canned;
}

function delay(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal.aborted) {
      reject(new Error('aborted'));
      return;
    }
    const timer = setTimeout(resolve, ms);
    signal.addEventListener(
      'abort',
      () => {
        clearTimeout(timer);
        reject(new Error('aborted'));
      },
      { once: true },
    );
  });
}

export interface CannedFulfillerOptions {
  name: string;
  mode: FulfillerMode;
  kinds: readonly CardKind[];
  /** Cards per kind per call. */
  count?: number;
  /** Simulated latency. */
  delayMs?: number;
  pick?: CardPicker;
}

export class CannedFulfiller implements Fulfiller {
  readonly name: string;
  readonly mode: FulfillerMode;
  private readonly kinds: readonly CardKind[];
  private readonly count: number;
  private readonly delayMs: number;
  private readonly pick: CardPicker;

  constructor(options: CannedFulfillerOptions) {
    this.name = options.name;
    this.mode = options.mode;
    this.kinds = options.kinds;
    this.count = options.count ?? 1;
    this.delayMs = options.delayMs ?? 0;
    this.pick = options.pick ?? randomPick;
  }

  isAvailable(): boolean {
    return this.kinds.some((kind) => (CANNED.get(kind) ?? []).length > 0);
  }

  async fulfill(input: FulfillerInput): Promise<WireCard[]> {
    if (this.delayMs > 0) await delay(this.delayMs, input.signal);
    return this.kinds.flatMap((kind) => this.pick(CANNED.get(kind) ?? [], this.count));
  }
}

/** One immediate completion source and one slower feed source. */
export function createSampleFulfillers(pick: CardPicker = randomPick): Fulfiller[] {
  return [
    new CannedFulfiller({ name: 'sample-completion', mode: 'immediate', kinds: ['completion'], pick }),
    new CannedFulfiller({
      name: 'sample-feed',
      mode: 'background',
      kinds: ['question', 'context'],
      count: 2,
      delayMs: 1500,
      pick,
    }),
  ];
}
