import { CARD_KINDS, type CardKind } from '../types/card';

/**
 * Append `incoming` to `existing`, keeping at most `cap` entries per kind.
 * When a kind overflows, its oldest entries are dropped; other kinds are
 * never touched. Output is grouped by kind in CARD_KINDS order, preserving
 * arrival order within each kind.
 */
export function mergeWithKindCap<T>(
  existing: readonly T[],
  incoming: readonly T[],
  cap: number,
  kindOf: (item: T) => CardKind,
): T[] {
  const buckets = new Map<CardKind, T[]>();
  for (const item of [...existing, ...incoming]) {
    const kind = kindOf(item);
    const bucket = buckets.get(kind) ?? [];
    bucket.push(item);
    if (bucket.length > cap) bucket.shift();
    buckets.set(kind, bucket);
  }
  return CARD_KINDS.flatMap((kind) => buckets.get(kind) ?? []);
}
