import type { RelayLogger } from '../telemetry/logger.js';
import type { ExpiryReport, KeyExchangeRegistry } from './registry.js';

// -----------------------------------------------------------------------------
// Types
// -----------------------------------------------------------------------------

export interface ExpirySweeperOptions {
  intervalMs: number;
  logger?: RelayLogger;
  now?: () => number;
}

export interface SweeperState {
  running: boolean;
  sweeping: boolean;
  lastSweepAt: number | null;
  lastError: string | null;
}

// -----------------------------------------------------------------------------
// Expiry Sweeper
// -----------------------------------------------------------------------------

/**
 * Periodically expires abandoned handshakes. Only one sweep is in flight at a
 * time; a tick that fires while a sweep is still running is skipped. A failed
 * sweep is logged and simply retried on the next tick.
 */
export class ExpirySweeper {
  private timer: NodeJS.Timeout | null = null;
  private inFlight: Promise<ExpiryReport | null> | null = null;
  private lastSweepAt: number | null = null;
  private lastError: string | null = null;
  private readonly now: () => number;

  constructor(
    private registry: Pick<KeyExchangeRegistry, 'expire'>,
    private options: ExpirySweeperOptions
  ) {
    this.now = options.now ?? Date.now;
  }

  start(): void {
    if (this.timer) return;

    this.timer = setInterval(() => {
      void this.sweep();
    }, this.options.intervalMs);
    this.timer.unref();

    this.options.logger?.debug({ intervalMs: this.options.intervalMs }, 'Expiry sweeper started');
  }

  /**
   * Stop scheduling sweeps and wait for an in-flight one to settle.
   */
  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    if (this.inFlight) {
      await this.inFlight;
    }
  }

  /**
   * Run one sweep now. Resolves null when skipped or failed.
   */
  sweep(): Promise<ExpiryReport | null> {
    if (this.inFlight) {
      this.options.logger?.debug('Expiry sweep already running, skipping tick');
      return Promise.resolve(null);
    }

    this.inFlight = this.runSweep().finally(() => {
      this.inFlight = null;
    });
    return this.inFlight;
  }

  getState(): SweeperState {
    return {
      running: this.timer !== null,
      sweeping: this.inFlight !== null,
      lastSweepAt: this.lastSweepAt,
      lastError: this.lastError,
    };
  }

  private async runSweep(): Promise<ExpiryReport | null> {
    const startedAt = this.now();
    try {
      const report = await this.registry.expire(startedAt);
      this.lastSweepAt = startedAt;
      this.lastError = null;
      return report;
    } catch (error) {
      this.lastError = error instanceof Error ? error.message : String(error);
      this.options.logger?.error({ err: error }, 'Expiry sweep failed, retrying on next tick');
      return null;
    }
  }
}
