import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { FrameLoop } from './frameLoop';

describe('FrameLoop', () => {
  let clock = 0;
  const now = () => clock;

  beforeEach(() => {
    vi.useFakeTimers();
    clock = 0;
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('passes the measured time since the previous frame', () => {
    const onFrame = vi.fn();
    const loop = new FrameLoop({ onFrame, intervalMs: 16, now });
    loop.start();

    clock = 16;
    vi.advanceTimersByTime(16);
    // A late frame reports the real elapsed time
    clock = 56;
    vi.advanceTimersByTime(16);

    expect(onFrame.mock.calls).toEqual([[16], [40]]);
    loop.stop();
  });

  it('never reports a negative delta', () => {
    const onFrame = vi.fn();
    clock = 100;
    const loop = new FrameLoop({ onFrame, intervalMs: 16, now });
    loop.start();

    clock = 90;
    vi.advanceTimersByTime(16);

    expect(onFrame).toHaveBeenCalledWith(0);
    loop.stop();
  });

  it('stops calling back once stopped', () => {
    const onFrame = vi.fn();
    const loop = new FrameLoop({ onFrame, intervalMs: 16, now });
    loop.start();
    expect(loop.running).toBe(true);

    loop.stop();
    vi.advanceTimersByTime(100);

    expect(loop.running).toBe(false);
    expect(onFrame).not.toHaveBeenCalled();
  });

  it('ignores a second start', () => {
    const onFrame = vi.fn();
    const loop = new FrameLoop({ onFrame, intervalMs: 16, now });
    loop.start();
    loop.start();

    clock = 16;
    vi.advanceTimersByTime(16);

    expect(onFrame).toHaveBeenCalledTimes(1);
    loop.stop();
  });
});
