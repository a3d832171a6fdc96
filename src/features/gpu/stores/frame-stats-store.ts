import { createStore } from 'zustand/vanilla';
import type { FrameGraphErrorCode } from '../graph/errors';

export const FRAME_HISTORY_SIZE = 120;

export interface FrameStats {
  frame: number;
  passes: number;
  allocated: number;
  reused: number;
  bound: number;
  destroyed: number;
}

interface FrameStatsState {
  /** Statistics of the last rendered frame */
  last: FrameStats | null;
  /** Most recent frames, oldest first */
  history: FrameStats[];
  lastError: FrameGraphErrorCode | null;
  skippedFrames: number;
  recordFrame: (stats: FrameStats) => void;
  recordSkip: () => void;
  recordError: (code: FrameGraphErrorCode) => void;
  reset: () => void;
}

export function createFrameStatsStore(historySize = FRAME_HISTORY_SIZE) {
  return createStore<FrameStatsState>()((set) => ({
    last: null,
    history: [],
    lastError: null,
    skippedFrames: 0,

    recordFrame: (stats) =>
      set((state) => ({
        last: stats,
        history: [...state.history, stats].slice(-historySize),
      })),

    recordSkip: () => set((state) => ({ skippedFrames: state.skippedFrames + 1 })),

    recordError: (code) => set({ lastError: code }),

    reset: () => set({ last: null, history: [], lastError: null, skippedFrames: 0 }),
  }));
}

export type FrameStatsStore = ReturnType<typeof createFrameStatsStore>;
