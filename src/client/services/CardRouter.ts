/**
 * CardRouter
 * Splits a backend snapshot into the single ghost-text candidate and the
 * sidebar feed, then applies both.
 */

import type { Card, EditorSurface } from '@shared/types';
import { feedStore as defaultFeedStore } from '../store/feedStore';
import type { FeedStore } from '../store/feedStore';
import type { GhostTextEngine } from './GhostTextEngine';
import { DismissedCardTracker } from './DismissedCardTracker';

export interface RoutedCards {
  completion: Card | null;
  feedCards: Card[];
}

/** First completion wins; later completions in the batch are discarded. */
export function routeCards(cards: readonly Card[]): RoutedCards {
  let completion: Card | null = null;
  const feedCards: Card[] = [];
  for (const card of cards) {
    if (card.kind === 'completion') {
      completion ??= card;
    } else {
      feedCards.push(card);
    }
  }
  return { completion, feedCards };
}

function identityKey(card: Card): string {
  return `${card.kind}|||${card.header}|||${card.body}`;
}

export interface CardRouterDeps {
  ghost: GhostTextEngine;
  surface: EditorSurface;
  feed?: FeedStore;
  dismissed?: DismissedCardTracker;
}

export interface ApplyOptions {
  /** Leave the current feed up when the snapshot carries no feed cards. */
  keepFeedWhenEmpty?: boolean;
}

export interface AppliedCards extends RoutedCards {
  /** True when the completion was handed to the ghost text engine and shown. */
  offered: boolean;
}

export class CardRouter {
  readonly feed: FeedStore;
  readonly dismissed: DismissedCardTracker;
  private readonly ghost: GhostTextEngine;
  private readonly surface: EditorSurface;
  private offeredThisCycle = new Set<string>();

  constructor(deps: CardRouterDeps) {
    this.ghost = deps.ghost;
    this.surface = deps.surface;
    this.feed = deps.feed ?? defaultFeedStore;
    this.dismissed = deps.dismissed ?? new DismissedCardTracker();
  }

  /** Forget which completions were offered; called when a new cycle starts. */
  beginCycle(): void {
    this.offeredThisCycle = new Set();
  }

  /**
   * Apply one authoritative snapshot. The feed is replaced even when the
   * snapshot holds no feed cards, unless `keepFeedWhenEmpty` is set; the slot
   * is only ever overwritten. Feed cards that match one already shown keep its
   * id, so selection and dismissal survive the next poll.
   */
  apply(cards: readonly Card[], anchorLength: number, options: ApplyOptions = {}): AppliedCards {
    const visible = cards.filter((card) => !this.dismissed.isDismissed(card));
    const routed = routeCards(visible);

    let offered = false;
    if (routed.completion && !this.offeredThisCycle.has(routed.completion.body)) {
      this.offeredThisCycle.add(routed.completion.body);
      offered = this.ghost.offer(routed.completion, anchorLength);
    }

    if (options.keepFeedWhenEmpty && routed.feedCards.length === 0) {
      return { completion: routed.completion, feedCards: this.feed.getState().cards, offered };
    }

    const feedCards = this.reuseShownCards(routed.feedCards);
    this.feed.getState().replaceCards(feedCards);
    this.renderFeed();

    return { completion: routed.completion, feedCards, offered };
  }

  /** Remove a card from the feed and keep it from coming back. */
  dismiss(cardId: string): Card | null {
    const removed = this.feed.getState().removeCard(cardId);
    if (!removed) return null;
    this.dismissed.mark(removed);
    this.renderFeed();
    return removed;
  }

  renderFeed(): void {
    this.surface.clearFeed();
    const { cards } = this.feed.getState();
    if (cards.length > 0) this.surface.addFeedCards(cards);
  }

  private reuseShownCards(incoming: readonly Card[]): Card[] {
    const shown = new Map<string, Card[]>();
    for (const card of this.feed.getState().cards) {
      const key = identityKey(card);
      const bucket = shown.get(key);
      if (bucket) bucket.push(card);
      else shown.set(key, [card]);
    }
    return incoming.map((card) => shown.get(identityKey(card))?.shift() ?? card);
  }
}
