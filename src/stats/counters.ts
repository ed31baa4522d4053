// src/stats/counters.ts
import { DivisionByZeroError } from 'App/errors/CustomError';

export type CounterKind = 'rate' | 'gauge';

/**
 * Stateful scalar transform turning a raw absolute value into a derived one.
 *
 * - `rate`: difference to the previous raw value divided by the elapsed milliseconds
 * - `gauge`: the raw value itself
 *
 * `previousRawValue` is always the last raw input, whatever the kind.
 */
export interface Counter {
  readonly kind: CounterKind;
  readonly label: string;
  previousRawValue: number | undefined;
}

export const createCounter = (kind: CounterKind, label: string): Counter => ({
  kind,
  label,
  previousRawValue: undefined,
});

export const counterLabel = (counter: Counter): string => counter.label;

/**
 * Feeds one raw value into the counter.
 *
 * Returns `null` while a rate counter has no previous value yet (nothing to
 * plot on the very first cycle). Throws {@link DivisionByZeroError} for a rate
 * update over a zero interval; the raw value is still recorded in that case.
 * A decreasing raw value (upstream restart) yields a negative rate.
 */
export function updateCounter(
  counter: Counter,
  rawValue: number,
  elapsedMs: number,
): number | null {
  switch (counter.kind) {
    case 'gauge':
      counter.previousRawValue = rawValue;
      return rawValue;
    case 'rate': {
      const previous = counter.previousRawValue;
      counter.previousRawValue = rawValue;
      if (elapsedMs === 0) {
        throw new DivisionByZeroError(
          `division by zero while updating "${counter.label}"`,
        );
      }
      if (previous === undefined) return null;
      return (rawValue - previous) / elapsedMs;
    }
  }
}
