// src/services/PrometheusExporter.ts
import type { MetricView } from 'App/stats/StatAggregator';
import client from 'prom-client';

const STATS = ['last', 'avg', 'min', 'max'] as const;

/**
 * Exposes the current windows in Prometheus text format. Values are copied in
 * from the views on every scrape; nothing is accumulated here.
 */
export class PrometheusExporter {
  private readonly registry = new client.Registry();
  private readonly value: client.Gauge<'metric' | 'stat'>;
  private readonly samples: client.Gauge<'metric'>;

  constructor(prefix: string = 'scanstat') {
    this.value = new client.Gauge({
      name: `${prefix}_metric_value`,
      help: 'Derived value over the rolling window (stat = last|avg|min|max)',
      labelNames: ['metric', 'stat'],
      registers: [this.registry],
    });
    this.samples = new client.Gauge({
      name: `${prefix}_metric_samples`,
      help: 'Points currently held in the rolling window',
      labelNames: ['metric'],
      registers: [this.registry],
    });
  }

  get contentType(): string {
    return this.registry.contentType;
  }

  async render(views: readonly MetricView[]): Promise<string> {
    this.value.reset();
    this.samples.reset();
    for (const view of views) {
      this.samples.set({ metric: view.id }, view.history.length);
      const { summary } = view;
      if (!summary) continue;
      for (const stat of STATS) {
        if (!Number.isFinite(summary[stat])) continue;
        this.value.set({ metric: view.id, stat }, summary[stat]);
      }
    }
    return this.registry.metrics();
  }
}
