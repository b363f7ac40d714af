import { describe, it, expect } from 'vitest';
import { TimeSource } from './time-source';

describe('TimeSource', () => {
  it('starts at the offset with frame 0', () => {
    const clock = new TimeSource({ timeOffset: 10 });

    expect(clock.advance(0)).toEqual({ time: 10, delta: 0, frame: 0, frameRate: 0 });
  });

  it('accumulates scaled wall time per rendered frame', () => {
    const clock = new TimeSource({ timeScale: 2, timeOffset: 1 });

    clock.advance(0.25);
    const state = clock.advance(0.5);

    expect(state).toEqual({ time: 2.5, delta: 1, frame: 1, frameRate: 0 });
    expect(clock.time).toBe(2.5);
  });

  it('increments the frame by one per advance', () => {
    const clock = new TimeSource();
    const frames = [0.1, 0.1, 0.1, 0.1].map((elapsed) => clock.advance(elapsed).frame);

    expect(frames).toEqual([0, 1, 2, 3]);
    expect(clock.renderedFrames).toBe(4);
  });

  it('previews the next frame without committing it', () => {
    const clock = new TimeSource();
    clock.advance(0.5);

    expect(clock.peekNext(0.25)).toEqual({ time: 0.75, delta: 0.25, frame: 1, frameRate: 0 });
    expect(clock.peekNext(0.25)).toEqual({ time: 0.75, delta: 0.25, frame: 1, frameRate: 0 });
    expect(clock.snapshot()).toEqual({ time: 0.5, delta: 0.5, frame: 0, frameRate: 0 });
  });

  it('freezes time with a zero scale', () => {
    const clock = new TimeSource({ timeScale: 0, timeOffset: 3 });
    clock.advance(1);

    expect(clock.advance(1)).toMatchObject({ time: 3, delta: 0, frame: 1 });
  });

  it('restarts the frame counter but keeps time on reset', () => {
    const clock = new TimeSource();
    clock.advance(0.5);
    clock.advance(0.5);

    clock.resetFrame();

    expect(clock.advance(0.5)).toMatchObject({ time: 1.5, frame: 0 });
  });

  it('measures the frame rate over a one second window', () => {
    const clock = new TimeSource();
    for (let i = 0; i < 4; i++) clock.advance(0.25);

    expect(clock.frameRate).toBe(4);
    expect(clock.peekNext(0.25).frameRate).toBe(4);
  });

  it('applies changed scale and offset to later frames', () => {
    const clock = new TimeSource();
    clock.advance(1);
    clock.timeScale = 0.5;
    clock.timeOffset = 10;

    expect(clock.advance(1)).toMatchObject({ time: 11.5, delta: 0.5 });
  });

  it('rejects invalid values', () => {
    const clock = new TimeSource();

    expect(() => clock.advance(-1)).toThrow(RangeError);
    expect(() => {
      clock.timeScale = -2;
    }).toThrow('Invalid time scale: -2');
  });
});
