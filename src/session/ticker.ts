export type TickCallback = () => void;

/** Periodic tick source with start/stop semantics */
export interface TickSource {
  start(onTick: TickCallback): void;
  stop(): void;
  readonly isRunning: boolean;
  /** Seconds of activity each tick represents */
  readonly intervalSeconds: number;
}

/** Ticks on a Node.js interval timer. */
export class IntervalTicker implements TickSource {
  private timer: ReturnType<typeof setInterval> | null = null;

  constructor(private readonly intervalMs: number = 1000) {}

  get intervalSeconds(): number {
    return this.intervalMs / 1000;
  }

  get isRunning(): boolean {
    return this.timer !== null;
  }

  start(onTick: TickCallback): void {
    if (this.timer) return;
    this.timer = setInterval(onTick, this.intervalMs);
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }
}

/**
 * Tick source driven by hand, for unit tests.
 */
export class ManualTicker implements TickSource {
  private onTick: TickCallback | null = null;

  readonly intervalSeconds = 1;

  get isRunning(): boolean {
    return this.onTick !== null;
  }

  start(onTick: TickCallback): void {
    this.onTick = onTick;
  }

  stop(): void {
    this.onTick = null;
  }

  /** Fire `count` ticks; ignored while stopped. */
  tick(count: number = 1): void {
    for (let i = 0; i < count; i++) {
      this.onTick?.();
    }
  }
}
