/**
 * SurfaceEmitter
 *
 * Typed EventEmitter for document changes on the in-memory surface.
 *
 * Events:
 *   change  (change: DocumentChange) — the document text changed
 */

import { EventEmitter } from 'events';
import type { DocumentChange } from '@shared/types';

export class SurfaceEmitter extends EventEmitter {
  emit(event: 'change', change: DocumentChange): boolean;
  // eslint-disable-next-line @typescript-eslint/no-explicit-any
  emit(event: string | symbol, ...args: any[]): boolean {
    return super.emit(event, ...args);
  }

  on(event: 'change', listener: (change: DocumentChange) => void): this;
  // eslint-disable-next-line @typescript-eslint/no-explicit-any
  on(event: string | symbol, listener: (...args: any[]) => void): this {
    return super.on(event, listener);
  }

  off(event: 'change', listener: (change: DocumentChange) => void): this;
  // eslint-disable-next-line @typescript-eslint/no-explicit-any
  off(event: string | symbol, listener: (...args: any[]) => void): this {
    return super.off(event, listener);
  }
}
