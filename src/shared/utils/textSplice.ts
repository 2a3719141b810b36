/**
 * Cursor-relative text splicing on a '\n'-separated document.
 */

import type { CursorPosition } from '../types';
import { InvalidCursorError } from '../errors';

export interface SpliceResult {
  text: string;
  cursor: CursorPosition;
}

/**
 * Throws InvalidCursorError unless `cursor` addresses an existing line and a
 * column within (or at the end of) that line.
 */
export function assertCursorInDocument(text: string, cursor: CursorPosition): void {
  const [line, column] = cursor;
  const lines = text.split('\n');
  if (!Number.isInteger(line) || line < 0 || line >= lines.length) {
    throw new InvalidCursorError(`Line ${line} is outside a ${lines.length}-line document`);
  }
  const lineLength = lines[line].length;
  if (!Number.isInteger(column) || column < 0 || column > lineLength) {
    throw new InvalidCursorError(`Column ${column} is outside line ${line} (length ${lineLength})`);
  }
}

/**
 * Insert `insertion` at `cursor`. A multi-line insertion splits the cursor
 * line: the head stays on the first line, the tail follows the last inserted
 * line, and the cursor ends at the column just after the last inserted line.
 */
export function spliceAtCursor(text: string, cursor: CursorPosition, insertion: string): SpliceResult {
  assertCursorInDocument(text, cursor);
  const [line, column] = cursor;
  const lines = text.split('\n');
  const head = lines[line].slice(0, column);
  const tail = lines[line].slice(column);
  const inserted = insertion.split('\n');
  const last = inserted.length - 1;

  const replacement = inserted.map((part, i) => {
    let out = part;
    if (i === 0) out = head + out;
    if (i === last) out = out + tail;
    return out;
  });
  lines.splice(line, 1, ...replacement);

  const cursorColumn = last === 0 ? column + inserted[0].length : inserted[last].length;
  return {
    text: lines.join('\n'),
    cursor: [line + last, cursorColumn],
  };
}

/** Absolute character offset of `cursor` in `text`. */
export function offsetOf(text: string, cursor: CursorPosition): number {
  assertCursorInDocument(text, cursor);
  const [line, column] = cursor;
  const lines = text.split('\n');
  let offset = 0;
  for (let i = 0; i < line; i++) {
    offset += lines[i].length + 1;
  }
  return offset + column;
}
