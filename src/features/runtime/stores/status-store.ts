import { createStore, type StoreApi } from 'zustand/vanilla';
import type { SchedulerState } from '@/features/player/frame-scheduler';

export type RuntimePhase = 'empty' | 'running' | 'failed';

export interface ActivePresetInfo {
  id: string;
  name: string;
  author: string;
  /** File the preset came from, when it was loaded from disk */
  path: string | null;
}

export interface OverlayText {
  name: string;
  author: string;
}

export interface RuntimeErrorInfo {
  code: string;
  message: string;
}

interface StatusState {
  phase: RuntimePhase;
  preset: ActivePresetInfo | null;
  /** Build warnings and compile errors of the active graph */
  warnings: string[];
  /** Last rejected load or reload; cleared by the next activation */
  lastError: RuntimeErrorInfo | null;
  reloadPending: boolean;
  /** Preset name and author while the overlay is shown */
  overlay: OverlayText | null;
  schedulerState: SchedulerState;
  consecutiveGpuErrors: number;
  droppedFrames: number;
  frame: number;
  time: number;
  frameRate: number;

  setActivePreset: (preset: ActivePresetInfo, warnings: string[]) => void;
  setLastError: (error: RuntimeErrorInfo | null) => void;
  setReloadPending: (pending: boolean) => void;
  setOverlay: (overlay: OverlayText | null) => void;
  setSchedulerState: (state: SchedulerState) => void;
  setFrameStats: (stats: { frame: number; time: number; frameRate: number }) => void;
  recordGpuError: (error: RuntimeErrorInfo, fatal: boolean) => void;
  reset: () => void;
}

export type StatusStore = StoreApi<StatusState>;
export type RuntimeStatus = StatusState;

type StatusData = Omit<
  StatusState,
  | 'setActivePreset'
  | 'setLastError'
  | 'setReloadPending'
  | 'setOverlay'
  | 'setSchedulerState'
  | 'setFrameStats'
  | 'recordGpuError'
  | 'reset'
>;

const initialState: StatusData = {
  phase: 'empty',
  preset: null,
  warnings: [],
  lastError: null,
  reloadPending: false,
  overlay: null,
  schedulerState: 'idle',
  consecutiveGpuErrors: 0,
  droppedFrames: 0,
  frame: 0,
  time: 0,
  frameRate: 0,
};

/**
 * Observable status of one runtime, for overlays and host UIs
 */
export function createStatusStore(): StatusStore {
  return createStore<StatusState>()((set) => ({
    ...initialState,

    setActivePreset: (preset, warnings) =>
      set({ phase: 'running', preset, warnings, lastError: null, consecutiveGpuErrors: 0, frame: 0 }),

    setLastError: (error) => set({ lastError: error }),

    setReloadPending: (pending) => set({ reloadPending: pending }),

    setOverlay: (overlay) => set({ overlay }),

    setSchedulerState: (schedulerState) => set({ schedulerState }),

    setFrameStats: ({ frame, time, frameRate }) => set({ frame, time, frameRate, consecutiveGpuErrors: 0 }),

    recordGpuError: (error, fatal) =>
      set((state) => ({
        consecutiveGpuErrors: state.consecutiveGpuErrors + 1,
        droppedFrames: state.droppedFrames + 1,
        lastError: error,
        phase: fatal ? 'failed' : state.phase,
      })),

    reset: () => set({ ...initialState }),
  }));
}
