import { describe, expect, it, vi } from 'vitest';
import { createCompletionStore } from '../store/completionStore';
import { createEditorStore } from '../store/editorStore';
import { MemoryEditorSurface } from '../surface/MemoryEditorSurface';
import { toCard } from '../utils/cards';
import { GhostTextEngine } from './GhostTextEngine';

const completion = (text: string) => toCard({ header: '', text, type: 'completion' });

function setup(text: string, driftTolerance = 0) {
  const surface = new MemoryEditorSurface(createEditorStore(text));
  const store = createCompletionStore();
  const engine = new GhostTextEngine(surface, { driftTolerance, store });
  surface.onChange((change) => engine.handleDocumentChange(change));
  return { surface, store, engine };
}

describe('GhostTextEngine', () => {
  it('accepts a completion at the cursor', () => {
    const { surface, store, engine } = setup('Hello world');
    surface.setCursor([0, 6]);

    expect(engine.offer(completion('beautiful '), 11)).toBe(true);
    expect(surface.getGhostText()).toBe('beautiful ');

    expect(engine.accept()).toBe(true);
    expect(surface.getText()).toBe('Hello beautiful world');
    expect(surface.getCursor()).toEqual([0, 16]);
    expect(store.getState().slot).toBeNull();
    expect(surface.getGhostText()).toBeNull();
  });

  it('splits lines for a multi-line completion', () => {
    const { surface, engine } = setup('ab\ncd');
    surface.setCursor([0, 1]);
    engine.offer(completion('X\nYZ'), 5);

    engine.accept();

    expect(surface.getText()).toBe('aX\nYZb\ncd');
    expect(surface.getCursor()).toEqual([1, 2]);
  });

  it('rejects without touching the document', () => {
    const { surface, store, engine } = setup('Hello');
    surface.setCursor([0, 5]);
    engine.offer(completion(' there'), 5);

    expect(engine.reject()).toBe(true);
    expect(surface.getText()).toBe('Hello');
    expect(surface.getCursor()).toEqual([0, 5]);
    expect(store.getState().slot).toBeNull();
    expect(surface.getGhostText()).toBeNull();
  });

  it('clears silently when the cursor line no longer exists', () => {
    const { surface, store, engine } = setup('one\ntwo\nthree');
    surface.setCursor([2, 5]);
    engine.offer(completion('!'), 13);
    vi.spyOn(console, 'debug').mockImplementation(() => undefined);
    // Cursor left dangling by a host that shrank the document behind our back.
    surface.store.getState().setContent('one');

    expect(engine.accept()).toBe(false);
    expect(surface.getText()).toBe('one');
    expect(store.getState().slot).toBeNull();
  });

  it('treats a column past the line end as invalid', () => {
    const { surface, store, engine } = setup('abc');
    engine.offer(completion('x'), 3);
    surface.store.getState().setCursor([0, 9]);

    vi.spyOn(console, 'debug').mockImplementation(() => undefined);
    expect(engine.accept()).toBe(false);
    expect(surface.getText()).toBe('abc');
    expect(store.getState().slot).toBeNull();
  });

  it('invalidates on any edit with zero tolerance', () => {
    const { surface, store, engine } = setup('Hello');
    engine.offer(completion(' there'), 5);

    surface.applyEdit('Hello!', [0, 6]);

    expect(store.getState().slot).toBeNull();
    expect(surface.getGhostText()).toBeNull();
  });

  it('does not invalidate on its own acceptance', () => {
    const { surface, engine } = setup('Hi');
    surface.setCursor([0, 2]);
    const listener = vi.fn();
    surface.onChange(listener);
    engine.offer(completion(' there'), 2);

    expect(engine.accept()).toBe(true);
    expect(listener).toHaveBeenCalledTimes(1);
    expect(surface.getText()).toBe('Hi there');
  });

  it('keeps the suggestion while drift stays within tolerance', () => {
    const { surface, store, engine } = setup('0123456789', 6);
    engine.offer(completion('abc'), 10);

    surface.applyEdit('0123456789xyz');
    expect(store.getState().slot?.text).toBe('abc');

    surface.applyEdit('0123456789xyzuvw');
    expect(store.getState().slot?.text).toBe('abc');

    surface.applyEdit('0123456789xyzuvwq');
    expect(store.getState().slot).toBeNull();
  });

  it('drops an offer computed against a document that already moved on', () => {
    const { surface, store, engine } = setup('Hello there');
    expect(engine.offer(completion('!'), 5)).toBe(false);
    expect(store.getState().slot).toBeNull();
    expect(surface.getGhostText()).toBeNull();
  });

  it('a new offer replaces the previous one', () => {
    const { store, engine } = setup('abc');
    engine.offer(completion('one'), 3);
    engine.offer(completion('two'), 3);
    expect(store.getState().slot?.text).toBe('two');
  });

  it('maps Tab and Escape only when a suggestion is showing', () => {
    const { surface, engine } = setup('Hi');
    surface.setCursor([0, 2]);
    expect(engine.handleKey('Tab')).toBe(false);

    engine.offer(completion('!'), 2);
    expect(engine.handleKey('Enter')).toBe(false);
    expect(engine.handleKey('Tab')).toBe(true);
    expect(surface.getText()).toBe('Hi!');

    engine.offer(completion('?'), 3);
    expect(engine.handleKey('Escape')).toBe(true);
    expect(surface.getText()).toBe('Hi!');
    expect(engine.getState()).toEqual({ slot: null, applying: false });
  });

  it('leaves Tab to the host when the accept fails', () => {
    const { surface, store, engine } = setup('abc');
    engine.offer(completion('x'), 3);
    surface.store.getState().setCursor([4, 0]);

    vi.spyOn(console, 'debug').mockImplementation(() => undefined);
    expect(engine.handleKey('Tab')).toBe(false);
    expect(surface.getText()).toBe('abc');
    expect(store.getState().slot).toBeNull();
  });

  it('accept and reject are no-ops with an empty slot', () => {
    const { surface, engine } = setup('abc');
    expect(engine.accept()).toBe(false);
    expect(engine.reject()).toBe(false);
    expect(surface.getText()).toBe('abc');
  });
});
