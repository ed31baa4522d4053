// src/stats/StatAggregator.ts
import { MissingFieldError, ValidationError } from 'App/errors/CustomError';
import { compensatedMean } from 'App/utils/sum';
import type { CounterKind } from './counters';
import {
  ACTION_RATE_SCALE,
  DEFAULT_METRICS,
  MetricDefinition,
} from './metrics';
import { SeriesSummary, StatSeries } from './StatSeries';

/* -------------------------------------------------------------------------------------------------
 * Types
 * ------------------------------------------------------------------------------------------------- */

/** What a renderer or exporter gets for one metric. */
export interface MetricView {
  id: string;
  label: string;
  kind: CounterKind;
  capacity: number;
  history: number[];
  summary: SeriesSummary | null;
}

type JsonObject = Record<string, unknown>;

const isJsonObject = (value: unknown): value is JsonObject =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

/** Upstream action counters are non-negative safe integers; anything else counts as 0. */
const toCount = (value: unknown): number =>
  typeof value === 'number' && Number.isSafeInteger(value) && value >= 0
    ? value
    : 0;

/* -------------------------------------------------------------------------------------------------
 * Implementation
 * ------------------------------------------------------------------------------------------------- */

/**
 * Folds decoded `/stat` snapshots into one rolling series per tracked metric.
 *
 * Contract:
 * - Inputs: a decoded snapshot with an `actions` object and optional `scan_times` array,
 *   plus the milliseconds elapsed since the previous snapshot.
 * - Outputs: per-metric windows via views()/series().
 * - Error modes: MissingFieldError before any series is touched; the first
 *   DivisionByZeroError aborts the rest of the cycle.
 */
export class StatAggregator {
  private readonly definitions: readonly MetricDefinition[];
  private readonly seriesById = new Map<string, StatSeries>();

  constructor(
    windowSize: number,
    definitions: readonly MetricDefinition[] = DEFAULT_METRICS,
  ) {
    const actionIds = new Set<string>();
    for (const def of definitions) {
      if (this.seriesById.has(def.id)) {
        throw new ValidationError(`Duplicate metric id "${def.id}"`);
      }
      if (def.source.type === 'sum') {
        const unknown = def.source.of.filter(id => !actionIds.has(id));
        if (unknown.length > 0) {
          throw new ValidationError(
            `Metric "${def.id}" sums unknown or later metrics: ${unknown.join(', ')}`,
          );
        }
      }
      if (def.source.type === 'actions') actionIds.add(def.id);
      this.seriesById.set(
        def.id,
        new StatSeries(def.kind, def.label, windowSize),
      );
    }
    this.definitions = definitions;
  }

  /**
   * Updates every series from one snapshot.
   * @param elapsedMs - wall-clock milliseconds since the previous snapshot
   */
  updateFromSnapshot(snapshot: unknown, elapsedMs: number): void {
    const actions = isJsonObject(snapshot) ? snapshot.actions : undefined;
    if (!isJsonObject(snapshot) || !isJsonObject(actions)) {
      throw new MissingFieldError('actions');
    }

    // raw (scaled) totals of this cycle, consumed by 'sum' metrics
    const totals = new Map<string, number>();

    for (const def of this.definitions) {
      const series = this.requireSeries(def.id);
      const { source } = def;
      switch (source.type) {
        case 'actions': {
          const count = source.fields.reduce(
            (acc, field) => acc + toCount(actions[field]),
            0,
          );
          const total = count * ACTION_RATE_SCALE;
          series.update(total, elapsedMs);
          totals.set(def.id, total);
          break;
        }
        case 'sum': {
          const total = source.of.reduce(
            (acc, id) => acc + (totals.get(id) ?? 0),
            0,
          );
          series.update(total, elapsedMs);
          break;
        }
        case 'mean': {
          const raw = snapshot[source.field];
          if (!Array.isArray(raw)) break;
          const samples = raw
            .map((v: unknown) => (typeof v === 'number' ? v : Number.NaN))
            .filter(v => !Number.isNaN(v));
          if (samples.length === 0) break;
          series.update(compensatedMean(samples), elapsedMs);
          break;
        }
      }
    }
  }

  series(id: string): StatSeries | undefined {
    return this.seriesById.get(id);
  }

  ids(): string[] {
    return this.definitions.map(d => d.id);
  }

  view(id: string): MetricView | undefined {
    const series = this.seriesById.get(id);
    if (!series) return undefined;
    return {
      id,
      label: series.label,
      kind: series.kind,
      capacity: series.capacity,
      history: [...series.history],
      summary: series.summary(),
    };
  }

  views(): MetricView[] {
    const out: MetricView[] = [];
    for (const id of this.ids()) {
      const v = this.view(id);
      if (v) out.push(v);
    }
    return out;
  }

  /** Drops every window and forgets previous raw values. */
  reset(): void {
    for (const series of this.seriesById.values()) series.reset();
  }

  private requireSeries(id: string): StatSeries {
    const series = this.seriesById.get(id);
    if (!series) throw new ValidationError(`Unknown metric "${id}"`);
    return series;
  }
}
