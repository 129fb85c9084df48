import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { ExpiryScheduler, MAX_TIMER_DELAY_MS } from './expiryScheduler.js';

describe('ExpiryScheduler', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  it('runs an action once its delay has passed', async () => {
    const scheduler = new ExpiryScheduler();
    const action = vi.fn();

    scheduler.schedule(1000, action);
    expect(scheduler.pending()).toBe(1);

    await vi.advanceTimersByTimeAsync(999);
    expect(action).not.toHaveBeenCalled();

    await vi.advanceTimersByTimeAsync(1);
    expect(action).toHaveBeenCalledTimes(1);
    expect(scheduler.pending()).toBe(0);
  });

  it('logs a failing action instead of throwing', async () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const scheduler = new ExpiryScheduler();

    scheduler.schedule(10, async () => {
      throw new Error('disk gone');
    }, 'artifact eviction');
    await vi.advanceTimersByTimeAsync(10);

    expect(errorSpy).toHaveBeenCalledWith('[portal-relay] scheduled artifact eviction failed error=disk gone');
  });

  it('drops outstanding actions on stop', async () => {
    const scheduler = new ExpiryScheduler();
    const action = vi.fn();

    scheduler.schedule(50, action);
    scheduler.schedule(60, action);
    scheduler.stop();
    await vi.advanceTimersByTimeAsync(100);

    expect(action).not.toHaveBeenCalled();
    expect(scheduler.pending()).toBe(0);
  });

  it('waits out delays longer than a single timer can hold', async () => {
    const scheduler = new ExpiryScheduler();
    const action = vi.fn();
    const thirtyDaysMs = 30 * 24 * 60 * 60 * 1000;

    scheduler.schedule(thirtyDaysMs, action);
    await vi.advanceTimersByTimeAsync(1);
    expect(action).not.toHaveBeenCalled();

    await vi.advanceTimersByTimeAsync(MAX_TIMER_DELAY_MS);
    expect(action).not.toHaveBeenCalled();
    expect(scheduler.pending()).toBe(1);

    await vi.advanceTimersByTimeAsync(thirtyDaysMs - MAX_TIMER_DELAY_MS - 2);
    expect(action).not.toHaveBeenCalled();

    await vi.advanceTimersByTimeAsync(1);
    expect(action).toHaveBeenCalledTimes(1);
    expect(scheduler.pending()).toBe(0);
  });

  it('can be stopped while a long delay is chained', async () => {
    const scheduler = new ExpiryScheduler();
    const action = vi.fn();

    scheduler.schedule(MAX_TIMER_DELAY_MS + 5000, action);
    await vi.advanceTimersByTimeAsync(MAX_TIMER_DELAY_MS);
    scheduler.stop();
    await vi.advanceTimersByTimeAsync(10_000);

    expect(action).not.toHaveBeenCalled();
  });
});
