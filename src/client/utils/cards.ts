import { v4 as uuidv4 } from 'uuid';
import type { Card, WireCard } from '@shared/types';

/** Build a frozen client card from a wire card, assigning a fresh id. */
export function toCard(wire: WireCard): Card {
  return Object.freeze({
    id: uuidv4(),
    kind: wire.type,
    header: wire.header,
    body: wire.text,
    metadata: Object.freeze({ ...(wire.metadata ?? {}) }),
  });
}

export function toCards(wire: readonly WireCard[]): Card[] {
  return wire.map(toCard);
}
