import { describe, expect, it } from 'vitest';
import { InvalidCursorError } from '../errors';
import { assertCursorInDocument, offsetOf, spliceAtCursor } from './textSplice';

describe('spliceAtCursor', () => {
  it('inserts single-line text and moves the cursor past it', () => {
    const result = spliceAtCursor('Hello world', [0, 6], 'beautiful ');
    expect(result.text).toBe('Hello beautiful world');
    expect(result.cursor).toEqual([0, 16]);
  });

  it('splits the cursor line for multi-line text', () => {
    const result = spliceAtCursor('ab\ncd', [0, 1], 'X\nYZ');
    expect(result.text).toBe('aX\nYZb\ncd');
    expect(result.cursor).toEqual([1, 2]);
  });

  it('handles text that ends with a newline', () => {
    const result = spliceAtCursor('one\ntwo', [1, 3], '\n');
    expect(result.text).toBe('one\ntwo\n');
    expect(result.cursor).toEqual([2, 0]);
  });

  it('inserts at the end of a line', () => {
    const result = spliceAtCursor('abc\ndef', [0, 3], '!');
    expect(result.text).toBe('abc!\ndef');
    expect(result.cursor).toEqual([0, 4]);
  });

  it('inserts into an empty document', () => {
    const result = spliceAtCursor('', [0, 0], 'first\nsecond');
    expect(result.text).toBe('first\nsecond');
    expect(result.cursor).toEqual([1, 6]);
  });

  it('leaves the cursor offset just after the inserted text', () => {
    const doc = 'line one\nline two\nline three';
    const insertion = 'A\nBB\nCCC';
    const result = spliceAtCursor(doc, [1, 5], insertion);
    expect(offsetOf(result.text, result.cursor)).toBe(offsetOf(doc, [1, 5]) + insertion.length);
    expect(result.text).toBe('line one\nline A\nBB\nCCCtwo\nline three');
  });

  it('rejects a line past the end of the document', () => {
    expect(() => spliceAtCursor('only line', [3, 0], 'x')).toThrow(InvalidCursorError);
  });

  it('rejects a column past the end of the line', () => {
    expect(() => spliceAtCursor('short', [0, 6], 'x')).toThrow(InvalidCursorError);
  });
});

describe('assertCursorInDocument', () => {
  it('accepts a column equal to the line length', () => {
    expect(() => assertCursorInDocument('abc', [0, 3])).not.toThrow();
  });

  it('reports the offending line', () => {
    expect(() => assertCursorInDocument('a\nb', [2, 0])).toThrow('Line 2 is outside a 2-line document');
  });
});

describe('offsetOf', () => {
  it('counts newline characters between lines', () => {
    expect(offsetOf('ab\ncde\nf', [2, 1])).toBe(8);
  });
});
