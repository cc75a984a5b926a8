import { describe, it, expect, vi, afterEach } from 'vitest';
import { IntervalTicker, ManualTicker } from './ticker';

describe('IntervalTicker', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('fires once per interval until stopped', () => {
    vi.useFakeTimers();
    const ticker = new IntervalTicker(1000);
    const onTick = vi.fn();

    ticker.start(onTick);
    vi.advanceTimersByTime(3500);
    ticker.stop();
    vi.advanceTimersByTime(5000);

    expect(onTick).toHaveBeenCalledTimes(3);
    expect(ticker.isRunning).toBe(false);
  });

  it('ignores a second start', () => {
    vi.useFakeTimers();
    const ticker = new IntervalTicker(500);
    const onTick = vi.fn();

    ticker.start(onTick);
    ticker.start(onTick);
    vi.advanceTimersByTime(1000);
    ticker.stop();

    expect(onTick).toHaveBeenCalledTimes(2);
  });

  it('reports the interval in seconds', () => {
    expect(new IntervalTicker(250).intervalSeconds).toBe(0.25);
  });
});

describe('ManualTicker', () => {
  it('ticks only while started', () => {
    const ticker = new ManualTicker();
    const onTick = vi.fn();

    ticker.tick();
    ticker.start(onTick);
    ticker.tick(3);
    ticker.stop();
    ticker.tick();

    expect(onTick).toHaveBeenCalledTimes(3);
  });
});
