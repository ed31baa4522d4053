// src/stats/metrics.ts
import type { CounterKind } from './counters';

/** Where a metric's raw value comes from on each snapshot. */
export type MetricSource =
  /** Sum of the listed `actions` counters (missing fields count as 0). */
  | { type: 'actions'; fields: readonly string[] }
  /** Sum of the raw totals computed this cycle for other `actions` metrics. */
  | { type: 'sum'; of: readonly string[] }
  /** Mean of the numeric entries of an array field. */
  | { type: 'mean'; field: string };

export interface MetricDefinition {
  readonly id: string;
  readonly label: string;
  readonly kind: CounterKind;
  readonly source: MetricSource;
}

/**
 * Rates come out per millisecond; upstream counters are scaled by this
 * factor first so the charted values read as messages per second.
 */
export const ACTION_RATE_SCALE = 1000;

export const DEFAULT_METRICS: readonly MetricDefinition[] = [
  {
    id: 'reject',
    label: 'spam msg/sec',
    kind: 'rate',
    source: { type: 'actions', fields: ['reject'] },
  },
  {
    id: 'clean',
    label: 'ham msg/sec',
    kind: 'rate',
    source: { type: 'actions', fields: ['no action'] },
  },
  {
    id: 'flagged',
    label: 'junk msg/sec',
    kind: 'rate',
    source: { type: 'actions', fields: ['add header', 'rewrite subject'] },
  },
  {
    id: 'total',
    label: 'total msg/sec',
    kind: 'rate',
    source: { type: 'sum', of: ['reject', 'clean', 'flagged'] },
  },
  {
    id: 'scanTime',
    label: 'average_time sec',
    kind: 'gauge',
    source: { type: 'mean', field: 'scan_times' },
  },
];
