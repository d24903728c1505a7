const DEFAULT_FRAME_INTERVAL_MS = 16;

export interface FrameLoopOptions {
  onFrame: (deltaMs: number) => void;
  intervalMs?: number;
  now?: () => number;
}

/**
 * Recurring frame callback driven by wall-clock deltas rather than the
 * nominal interval, so late frames still account for the real elapsed time.
 */
export class FrameLoop {
  private readonly onFrame: (deltaMs: number) => void;
  private readonly intervalMs: number;
  private readonly now: () => number;
  private timer: ReturnType<typeof setInterval> | null = null;
  private lastFrameAt = 0;

  constructor(options: FrameLoopOptions) {
    this.onFrame = options.onFrame;
    this.intervalMs = options.intervalMs ?? DEFAULT_FRAME_INTERVAL_MS;
    this.now = options.now ?? (() => performance.now());
  }

  get running(): boolean {
    return this.timer !== null;
  }

  start(): void {
    if (this.timer !== null) return;
    this.lastFrameAt = this.now();
    this.timer = setInterval(() => {
      const now = this.now();
      const delta = Math.max(0, now - this.lastFrameAt);
      this.lastFrameAt = now;
      this.onFrame(delta);
    }, this.intervalMs);
  }

  stop(): void {
    if (this.timer === null) return;
    clearInterval(this.timer);
    this.timer = null;
  }
}
