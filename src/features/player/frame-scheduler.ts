/**
 * Frame Scheduler
 *
 * Decides on every presentation tick whether a new frame is rendered or the
 * last one is held, and how far the cross-fade between the last two rendered
 * frames has progressed.
 *
 * With an interval of 0 every tick renders. Otherwise a frame renders once the
 * wall time since the previous render reaches the interval; in between the
 * scheduler holds. The cross-fade window is the last `ratio * interval`
 * seconds of each interval: the newest frame's weight is 0 until the window
 * opens and climbs linearly to 1 when the interval ends.
 */

import type { PresetSettings } from '@/features/preset/types';

export type SchedulerState = 'idle' | 'rendering' | 'holding';

export type FrameDecision =
  | {
      action: 'render';
      /** Wall seconds since the previous rendered frame (0 for the first) */
      elapsed: number;
    }
  | {
      action: 'hold';
      /** Weight of the newest rendered frame against the one before it */
      blend: number;
    };

export type SchedulerSettings = Pick<PresetSettings, 'intervalBetweenFrames' | 'crossfadeOverlapRatio'>;

/**
 * Weight of the newest frame `elapsed` seconds into an interval
 */
export function crossfadeWeight(elapsed: number, interval: number, ratio: number): number {
  if (interval <= 0 || ratio <= 0) return 1;

  const window = interval * Math.min(ratio, 1);
  const windowStart = interval - window;
  if (elapsed <= windowStart) return 0;
  if (elapsed >= interval) return 1;
  return (elapsed - windowStart) / window;
}

export class FrameScheduler {
  private _state: SchedulerState = 'idle';
  private _interval: number;
  private _ratio: number;

  /** Wall seconds since the last rendered frame; null before the first */
  private sinceRender: number | null = null;
  /** Wall seconds since the last rendered frame, including dropped attempts */
  private pendingElapsed = 0;

  constructor(settings: SchedulerSettings) {
    this._interval = settings.intervalBetweenFrames;
    this._ratio = settings.crossfadeOverlapRatio;
  }

  // ============================================
  // Getters
  // ============================================

  get state(): SchedulerState {
    return this._state;
  }

  get interval(): number {
    return this._interval;
  }

  /** Whether a frame has been rendered since the last reset */
  get hasRendered(): boolean {
    return this.sinceRender !== null;
  }

  /** Current weight of the newest rendered frame */
  get blend(): number {
    if (this.sinceRender === null) return 1;
    return crossfadeWeight(this.sinceRender, this._interval, this._ratio);
  }

  // ============================================
  // Control
  // ============================================

  /**
   * Apply new settings; the timing of the last render is kept
   */
  configure(settings: SchedulerSettings): void {
    this._interval = settings.intervalBetweenFrames;
    this._ratio = settings.crossfadeOverlapRatio;
  }

  /**
   * Forget the last render so the next tick renders immediately
   */
  reset(): void {
    this._state = 'idle';
    this.sinceRender = null;
    this.pendingElapsed = 0;
  }

  /**
   * Advance by the wall time since the previous tick and decide what to present
   */
  tick(wallDelta: number): FrameDecision {
    if (!Number.isFinite(wallDelta) || wallDelta < 0) {
      throw new RangeError(`Invalid tick delta: ${wallDelta}`);
    }

    if (this.sinceRender === null) {
      this.pendingElapsed += wallDelta;
      this._state = 'rendering';
      return { action: 'render', elapsed: 0 };
    }

    this.sinceRender += wallDelta;
    this.pendingElapsed += wallDelta;

    if (this._interval <= 0 || this.sinceRender >= this._interval) {
      this._state = 'rendering';
      return { action: 'render', elapsed: this.pendingElapsed };
    }

    this._state = 'holding';
    return { action: 'hold', blend: this.blend };
  }

  /**
   * A render decided by the last tick completed
   */
  rendered(): void {
    if (this.sinceRender === null || this._interval <= 0) {
      this.sinceRender = 0;
    } else if (this.sinceRender >= this._interval * 2) {
      // Too far behind to keep the cadence; restart it
      this.sinceRender = 0;
    } else {
      this.sinceRender -= this._interval;
    }
    this.pendingElapsed = 0;
    this._state = this._interval > 0 ? 'holding' : 'idle';
  }

  /**
   * A render decided by the last tick was dropped; the next tick retries
   */
  dropped(): void {
    this._state = this.sinceRender === null ? 'idle' : 'holding';
  }
}
