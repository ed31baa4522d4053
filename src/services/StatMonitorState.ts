// src/services/StatMonitorState.ts
import { StatAggregator } from 'App/stats/StatAggregator';
import type { MetricDefinition } from 'App/stats/metrics';

export interface PollStatus {
  polling: boolean;
  cycles: number;
  consecutiveErrors: number;
  lastError?: string;
  lastSuccessAt?: string;
}

/**
 * Owns the aggregator shared by the poller and every reader (chart, HTTP,
 * WebSocket). All access goes through {@link runExclusive}: one lock, no
 * read/write split, so a render never observes a half-applied snapshot.
 */
export class StatMonitorState {
  private readonly aggregator: StatAggregator;
  private tail: Promise<void> = Promise.resolve();
  private readonly status: PollStatus = {
    polling: false,
    cycles: 0,
    consecutiveErrors: 0,
  };

  constructor(windowSize: number, definitions?: readonly MetricDefinition[]) {
    this.aggregator = new StatAggregator(windowSize, definitions);
  }

  /**
   * Runs `fn` once every previously queued section has settled.
   * A rejected section does not poison the queue.
   */
  runExclusive<T>(fn: (stats: StatAggregator) => T | Promise<T>): Promise<T> {
    const run = this.tail.then(() => fn(this.aggregator));
    this.tail = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  getStatus(): PollStatus {
    return { ...this.status };
  }

  setPolling(polling: boolean) {
    this.status.polling = polling;
  }

  noteSuccess(at: Date = new Date()) {
    this.status.cycles += 1;
    this.status.consecutiveErrors = 0;
    this.status.lastSuccessAt = at.toISOString();
    this.status.lastError = undefined;
  }

  noteFailure(message: string) {
    this.status.consecutiveErrors += 1;
    this.status.lastError = message;
  }
}
