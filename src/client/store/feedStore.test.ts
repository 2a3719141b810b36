import { describe, expect, it } from 'vitest';
import type { CardKind } from '@shared/types';
import { toCard } from '../utils/cards';
import { createFeedStore } from './feedStore';

const card = (kind: CardKind, header: string) => toCard({ header, text: `${header} body`, type: kind });
const headers = (store: ReturnType<typeof createFeedStore>) =>
  store.getState().cards.map((c) => c.header);

describe('feedStore', () => {
  it('evicts the oldest card of a full kind', () => {
    const store = createFeedStore(3);
    const [q1, q2, q3, q4] = ['Q1', 'Q2', 'Q3', 'Q4'].map((h) => card('question', h));
    store.getState().insertCard(q1);
    store.getState().insertCard(q2);
    store.getState().insertCard(q3);

    const evicted = store.getState().insertCard(q4);

    expect(evicted).toBe(q1);
    expect(headers(store)).toEqual(['Q2', 'Q3', 'Q4']);
  });

  it('keeps exactly the newest N of K inserted cards', () => {
    const store = createFeedStore(2);
    for (let i = 1; i <= 5; i++) store.getState().insertCard(card('math', `M${i}`));
    expect(headers(store)).toEqual(['M4', 'M5']);
  });

  it('never evicts across kinds', () => {
    const store = createFeedStore(1);
    store.getState().insertCard(card('question', 'Q1'));
    const evicted = store.getState().insertCard(card('context', 'C1'));
    expect(evicted).toBeNull();
    expect(headers(store)).toEqual(['Q1', 'C1']);
  });

  it('replaces the feed wholesale and reports overflow', () => {
    const store = createFeedStore(2);
    store.getState().insertCard(card('email', 'E1'));

    const evicted = store.getState().replaceCards([
      card('question', 'Q1'),
      card('question', 'Q2'),
      card('question', 'Q3'),
    ]);

    expect(headers(store)).toEqual(['Q2', 'Q3']);
    expect(evicted.map((c) => c.header)).toEqual(['Q1']);
  });

  it('empties the feed when replaced with nothing', () => {
    const store = createFeedStore();
    store.getState().insertCard(card('context', 'C1'));
    store.getState().replaceCards([]);
    expect(store.getState().cards).toEqual([]);
  });

  it('removes a card by id', () => {
    const store = createFeedStore();
    const c1 = card('context', 'C1');
    store.getState().insertCard(c1);
    store.getState().insertCard(card('context', 'C2'));

    expect(store.getState().removeCard(c1.id)).toBe(c1);
    expect(store.getState().removeCard('missing')).toBeNull();
    expect(headers(store)).toEqual(['C2']);
  });

  it('clears one kind only', () => {
    const store = createFeedStore();
    store.getState().insertCard(card('question', 'Q1'));
    store.getState().insertCard(card('context', 'C1'));
    store.getState().clearCardsByKind('question');
    expect(headers(store)).toEqual(['C1']);
  });

  it('drops the selection when the selected card leaves', () => {
    const store = createFeedStore(1);
    const q1 = card('question', 'Q1');
    store.getState().insertCard(q1);
    store.getState().selectCard(q1.id);
    expect(store.getState().selectedCardId).toBe(q1.id);

    store.getState().insertCard(card('question', 'Q2'));
    expect(store.getState().selectedCardId).toBeNull();
  });

  it('ignores selection of an unknown card', () => {
    const store = createFeedStore();
    store.getState().selectCard('nope');
    expect(store.getState().selectedCardId).toBeNull();
  });

  it('lists cards of one kind in order', () => {
    const store = createFeedStore();
    store.getState().insertCard(card('math', 'M1'));
    store.getState().insertCard(card('email', 'E1'));
    store.getState().insertCard(card('math', 'M2'));
    expect(store.getState().cardsOfKind('math').map((c) => c.header)).toEqual(['M1', 'M2']);
  });
});
