import { describe, it, expect, afterEach, vi } from 'vitest';
import { ExpirySweeper } from './expiry-sweeper.js';
import type { ExpiryReport } from './registry.js';

function createRegistry() {
  return {
    expire: vi.fn(async (_now?: number): Promise<ExpiryReport> => ({ expired: [], purged: 0 })),
  };
}

describe('ExpirySweeper', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('should pass the current time to the registry', async () => {
    const registry = createRegistry();
    registry.expire.mockResolvedValueOnce({ expired: ['req1'], purged: 2 });
    const sweeper = new ExpirySweeper(registry, { intervalMs: 1_000, now: () => 42_000 });

    await expect(sweeper.sweep()).resolves.toEqual({ expired: ['req1'], purged: 2 });
    expect(registry.expire).toHaveBeenCalledWith(42_000);
    expect(sweeper.getState()).toEqual({
      running: false,
      sweeping: false,
      lastSweepAt: 42_000,
      lastError: null,
    });
  });

  it('should never run two sweeps at once', async () => {
    const registry = createRegistry();
    let finish: (report: ExpiryReport) => void = () => undefined;
    registry.expire.mockImplementationOnce(
      () =>
        new Promise<ExpiryReport>((resolve) => {
          finish = resolve;
        })
    );
    const sweeper = new ExpirySweeper(registry, { intervalMs: 1_000 });

    const first = sweeper.sweep();
    const second = await sweeper.sweep();

    expect(second).toBeNull();
    expect(sweeper.getState().sweeping).toBe(true);
    expect(registry.expire).toHaveBeenCalledTimes(1);

    finish({ expired: [], purged: 0 });
    await expect(first).resolves.toEqual({ expired: [], purged: 0 });
    expect(sweeper.getState().sweeping).toBe(false);
  });

  it('should record a failed sweep and recover on the next one', async () => {
    const registry = createRegistry();
    registry.expire.mockRejectedValueOnce(new Error('storage unavailable'));
    const sweeper = new ExpirySweeper(registry, { intervalMs: 1_000, now: () => 5_000 });

    await expect(sweeper.sweep()).resolves.toBeNull();
    expect(sweeper.getState().lastError).toBe('storage unavailable');
    expect(sweeper.getState().lastSweepAt).toBeNull();

    await expect(sweeper.sweep()).resolves.toEqual({ expired: [], purged: 0 });
    expect(sweeper.getState().lastError).toBeNull();
    expect(sweeper.getState().lastSweepAt).toBe(5_000);
  });

  it('should sweep on every interval until stopped', async () => {
    vi.useFakeTimers();
    const registry = createRegistry();
    const sweeper = new ExpirySweeper(registry, { intervalMs: 1_000 });

    sweeper.start();
    sweeper.start();
    expect(sweeper.getState().running).toBe(true);

    await vi.advanceTimersByTimeAsync(3_000);
    expect(registry.expire).toHaveBeenCalledTimes(3);

    await sweeper.stop();
    await vi.advanceTimersByTimeAsync(3_000);
    expect(registry.expire).toHaveBeenCalledTimes(3);
    expect(sweeper.getState().running).toBe(false);
  });
});
