/**
 * Fulfillment Store
 * Observable status of the fulfillment cycle for whatever renders it.
 */

import { createStore } from 'zustand/vanilla';
import { immer } from 'zustand/middleware/immer';
import type { CyclePhase, FulfillmentErrorKind } from '@shared/types';

export interface FulfillmentErrorInfo {
  kind: FulfillmentErrorKind;
  status?: number;
  message: string;
}

interface FulfillmentState {
  phase: CyclePhase;
  pendingDelta: number;
  lastError: FulfillmentErrorInfo | null;
  completedCycles: number;
  failedCycles: number;

  // Actions
  setPhase: (phase: CyclePhase) => void;
  setPendingDelta: (pendingDelta: number) => void;
  recordCompleted: () => void;
  recordFailed: (error: FulfillmentErrorInfo) => void;
  recordError: (error: FulfillmentErrorInfo) => void;
  reset: () => void;
}

export const createFulfillmentStore = () =>
  createStore<FulfillmentState>()(
    immer((set) => ({
      phase: 'idle',
      pendingDelta: 0,
      lastError: null,
      completedCycles: 0,
      failedCycles: 0,

      setPhase: (phase) => {
        set({ phase });
      },

      setPendingDelta: (pendingDelta) => {
        set({ pendingDelta });
      },

      recordCompleted: () => {
        set((state) => {
          state.phase = 'idle';
          state.lastError = null;
          state.completedCycles += 1;
        });
      },

      recordFailed: (error) => {
        set((state) => {
          state.phase = 'idle';
          state.lastError = error;
          state.failedCycles += 1;
        });
      },

      /** Outside a cycle (session clear): no counters move. */
      recordError: (error) => {
        set({ lastError: error });
      },

      reset: () => {
        set({ phase: 'idle', pendingDelta: 0, lastError: null, completedCycles: 0, failedCycles: 0 });
      },
    })),
  );

export type FulfillmentStore = ReturnType<typeof createFulfillmentStore>;

export const fulfillmentStore = createFulfillmentStore();
