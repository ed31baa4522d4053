// src/services/StatPoller.ts
import { PollerFatalError } from 'App/errors/CustomError';
import type { StatAggregator } from 'App/stats/StatAggregator';
import { createLogger, formatError } from 'App/utils/logger';
import { performance } from 'node:perf_hooks';
import { StatMonitorState } from './StatMonitorState';

const log = createLogger('Poller');

export interface StatPollerOptions {
  intervalMs: number;
  /** Consecutive failed cycles tolerated; one more is fatal. */
  maxErrors: number;
  fetchSnapshot: () => Promise<unknown>;
  /**
   * Runs inside the state lock right after a successful update
   * (chart redraw, WebSocket emit). A throw counts as a failed cycle.
   */
  onCycle?: (stats: StatAggregator, cycle: number) => void | Promise<void>;
  /** Monotonic clock in ms. */
  now?: () => number;
}

/**
 * Fetch → update → sleep loop around a {@link StatMonitorState}.
 *
 * The fetch runs outside the lock. Elapsed time fed to the aggregator is the
 * monotonic time since the previous successful fetch (the nominal interval on
 * the first one). Failures double the delay before the next attempt; more than
 * `maxErrors` in a row stops the loop with a {@link PollerFatalError}.
 */
export class StatPoller {
  private readonly now: () => number;
  private consecutiveErrors = 0;
  private cycles = 0;
  private lastSuccessAt: number | null = null;
  private timer: NodeJS.Timeout | null = null;
  private stopped = true;
  private settle: (() => void) | null = null;

  constructor(
    private readonly state: StatMonitorState,
    private readonly options: StatPollerOptions,
  ) {
    this.now = options.now ?? (() => performance.now());
  }

  get errorCount(): number {
    return this.consecutiveErrors;
  }

  get cycleCount(): number {
    return this.cycles;
  }

  /**
   * One polling cycle.
   * @returns delay in ms before the next cycle should start
   * @throws PollerFatalError once the consecutive failure budget is spent
   */
  async pollOnce(): Promise<number> {
    const { intervalMs, maxErrors, fetchSnapshot, onCycle } = this.options;
    try {
      const snapshot = await fetchSnapshot();
      const fetchedAt = this.now();
      const elapsedMs =
        this.lastSuccessAt === null
          ? intervalMs
          : Math.round(fetchedAt - this.lastSuccessAt);

      await this.state.runExclusive(async stats => {
        stats.updateFromSnapshot(snapshot, elapsedMs);
        // counters have moved on even if onCycle throws below
        this.lastSuccessAt = fetchedAt;
        this.cycles += 1;
        if (onCycle) await onCycle(stats, this.cycles);
      });

      this.consecutiveErrors = 0;
      this.state.noteSuccess();
      log.debug(`cycle ${this.cycles} applied (elapsed ${elapsedMs}ms)`);
      return intervalMs;
    } catch (error) {
      this.consecutiveErrors += 1;
      const message = formatError(error);
      this.state.noteFailure(message);
      if (this.consecutiveErrors > maxErrors) {
        throw new PollerFatalError(
          `giving up after ${this.consecutiveErrors} consecutive failures: ${message}`,
          error,
        );
      }
      const delay = intervalMs * 2 ** this.consecutiveErrors;
      log.warn(
        `cycle failed (${this.consecutiveErrors}/${maxErrors}): ${message}; retry in ${delay}ms`,
      );
      return delay;
    }
  }

  /**
   * Polls until {@link stop} (resolves) or until the failure budget is spent
   * (rejects with PollerFatalError).
   */
  run(): Promise<void> {
    if (!this.stopped) {
      return Promise.reject(new Error('Poller is already running'));
    }
    this.stopped = false;
    this.state.setPolling(true);
    log.info(`polling every ${this.options.intervalMs}ms`);

    return new Promise<void>((resolve, reject) => {
      this.settle = resolve;
      const loop = async () => {
        if (this.stopped) return;
        let delay: number;
        try {
          delay = await this.pollOnce();
        } catch (error) {
          this.halt();
          reject(error);
          return;
        }
        if (this.stopped) return;
        this.timer = setTimeout(() => {
          void loop();
        }, delay);
      };
      void loop();
    });
  }

  stop() {
    this.halt();
    const settle = this.settle;
    this.settle = null;
    settle?.();
  }

  private halt() {
    this.stopped = true;
    this.state.setPolling(false);
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }
}
