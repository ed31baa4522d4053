// src/stats/StatSeries.ts
import { ValidationError } from 'App/errors/CustomError';
import {
  Counter,
  CounterKind,
  counterLabel,
  createCounter,
  updateCounter,
} from './counters';

export interface SeriesSummary {
  last: number;
  avg: number;
  min: number;
  max: number;
  count: number;
}

/**
 * One counter plus the rolling window of its derived values (oldest first).
 *
 * The first rate update yields no value and is not stored, so the window only
 * starts filling on the second polling cycle.
 */
export class StatSeries {
  private readonly counter: Counter;
  private readonly values: number[] = [];
  public readonly capacity: number;

  constructor(kind: CounterKind, label: string, capacity: number) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new ValidationError(
        `Window size must be a positive integer, got ${capacity}`,
      );
    }
    this.counter = createCounter(kind, label);
    this.capacity = capacity;
  }

  get label(): string {
    return counterLabel(this.counter);
  }

  get kind(): CounterKind {
    return this.counter.kind;
  }

  /** Chronological view of the window; do not mutate. */
  get history(): readonly number[] {
    return this.values;
  }

  get previousRawValue(): number | undefined {
    return this.counter.previousRawValue;
  }

  update(rawValue: number, elapsedMs: number): number | null {
    const derived = updateCounter(this.counter, rawValue, elapsedMs);
    if (derived === null) return null;

    // expire one
    if (this.values.length >= this.capacity) {
      this.values.shift();
    }
    this.values.push(derived);
    return derived;
  }

  last(): number | undefined {
    return this.values.length > 0
      ? this.values[this.values.length - 1]
      : undefined;
  }

  /** last/avg/min/max over the window, or null while it is empty. */
  summary(): SeriesSummary | null {
    const last = this.last();
    if (last === undefined) return null;
    const count = this.values.length;
    let sum = 0;
    let min = Infinity;
    let max = -Infinity;
    for (const v of this.values) {
      sum += v;
      if (v < min) min = v;
      if (v > max) max = v;
    }
    return {
      last,
      avg: sum / count,
      min,
      max,
      count,
    };
  }

  reset(): void {
    this.values.length = 0;
    this.counter.previousRawValue = undefined;
  }
}
