/**
 * Remembers feed cards the user dismissed so later cycles do not re-offer
 * them. Cards are matched by header and body; ids are per-delivery.
 */

import type { Card } from '@shared/types';

type CardContent = Pick<Card, 'header' | 'body'>;

const keyOf = (card: CardContent): string => `${card.header}|||${card.body}`;

export class DismissedCardTracker {
  private readonly dismissed = new Set<string>();

  mark(card: CardContent): void {
    this.dismissed.add(keyOf(card));
  }

  isDismissed(card: CardContent): boolean {
    return this.dismissed.has(keyOf(card));
  }

  clear(): void {
    this.dismissed.clear();
  }

  size(): number {
    return this.dismissed.size;
  }
}
