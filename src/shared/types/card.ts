/**
 * Card types
 * A card is one suggestion produced by the fulfillment backend.
 */

export const CARD_KINDS = ['completion', 'question', 'context', 'math', 'email'] as const;

export type CardKind = (typeof CARD_KINDS)[number];

/** Kinds that land in the sidebar feed rather than the ghost-text slot. */
export type FeedCardKind = Exclude<CardKind, 'completion'>;

export type CardMetadata = Readonly<Record<string, unknown>>;

/**
 * Card as it travels over HTTP.
 */
export interface WireCard {
  header: string;
  text: string;
  type: CardKind;
  metadata?: Record<string, unknown>;
}

/**
 * Card as held by the client. Frozen on construction; routing and eviction
 * move references around and never edit a card in place.
 */
export interface Card {
  readonly id: string;
  readonly kind: CardKind;
  readonly header: string;
  readonly body: string;
  readonly metadata: CardMetadata;
}
