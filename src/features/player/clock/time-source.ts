/**
 * TimeSource - simulation clock of the render loop
 *
 * Simulation time only moves when a frame is rendered:
 *   time = accumulated(wallElapsed * timeScale) + timeOffset
 * Held frames and throttling never touch it. The frame counter restarts at 0
 * whenever the render graph or its targets are rebuilt.
 */

export interface TimeState {
  /** Simulation seconds (iTime) */
  time: number;
  /** Scaled seconds since the previous rendered frame (iTimeDelta) */
  delta: number;
  /** Index of the frame (iFrame) */
  frame: number;
  /** Rendered frames per wall-clock second, measured over about a second */
  frameRate: number;
}

export interface TimeSourceConfig {
  timeScale?: number;
  timeOffset?: number;
}

const FRAME_RATE_WINDOW_SECONDS = 1;

export class TimeSource {
  // Configuration
  private _timeScale: number;
  private _timeOffset: number;

  // State
  private _accumulated = 0;
  private _delta = 0;
  private _nextFrame = 0;

  // Frame rate window
  private _frameRate = 0;
  private _windowElapsed = 0;
  private _windowFrames = 0;

  constructor(config: TimeSourceConfig = {}) {
    this._timeScale = config.timeScale ?? 1;
    this._timeOffset = config.timeOffset ?? 0;
  }

  // ============================================
  // Getters / Setters
  // ============================================

  get timeScale(): number {
    return this._timeScale;
  }

  set timeScale(scale: number) {
    if (!Number.isFinite(scale) || scale < 0) {
      throw new RangeError(`Invalid time scale: ${scale}`);
    }
    this._timeScale = scale;
  }

  get timeOffset(): number {
    return this._timeOffset;
  }

  set timeOffset(offset: number) {
    if (!Number.isFinite(offset)) {
      throw new RangeError(`Invalid time offset: ${offset}`);
    }
    this._timeOffset = offset;
  }

  get time(): number {
    return this._accumulated + this._timeOffset;
  }

  /** Frames rendered since the last reset */
  get renderedFrames(): number {
    return this._nextFrame;
  }

  get frameRate(): number {
    return this._frameRate;
  }

  // ============================================
  // Frame advance
  // ============================================

  /**
   * Time state the next rendered frame would get, without committing it
   * @param wallElapsed - wall seconds since the previous rendered frame
   */
  peekNext(wallElapsed: number): TimeState {
    this.assertElapsed(wallElapsed);
    const delta = wallElapsed * this._timeScale;
    return {
      time: this._accumulated + delta + this._timeOffset,
      delta,
      frame: this._nextFrame,
      frameRate: this._frameRate,
    };
  }

  /**
   * Commit a rendered frame
   * @returns the state that frame was rendered with
   */
  advance(wallElapsed: number): TimeState {
    const state = this.peekNext(wallElapsed);

    this._accumulated += state.delta;
    this._delta = state.delta;
    this._nextFrame++;
    this.measureFrameRate(wallElapsed);

    return state;
  }

  /**
   * State of the most recently rendered frame
   */
  snapshot(): TimeState {
    return {
      time: this.time,
      delta: this._delta,
      frame: Math.max(0, this._nextFrame - 1),
      frameRate: this._frameRate,
    };
  }

  /**
   * Restart the frame counter; simulation time continues
   */
  resetFrame(): void {
    this._nextFrame = 0;
    this._delta = 0;
  }

  private measureFrameRate(wallElapsed: number): void {
    this._windowElapsed += wallElapsed;
    this._windowFrames++;
    if (this._windowElapsed >= FRAME_RATE_WINDOW_SECONDS) {
      this._frameRate = this._windowFrames / this._windowElapsed;
      this._windowElapsed = 0;
      this._windowFrames = 0;
    }
  }

  private assertElapsed(wallElapsed: number): void {
    if (!Number.isFinite(wallElapsed) || wallElapsed < 0) {
      throw new RangeError(`Invalid elapsed time: ${wallElapsed}`);
    }
  }
}
