// src/observability/MetricsCollector.ts

import { Registry, Counter, Histogram, Gauge } from 'prom-client';

export interface MetricsConfig {
  enabled?: boolean;
}

type Labels = Record<string, string | number>;

export class MetricsCollector {
  private registry: Registry;
  private counters: Map<string, Counter> = new Map();
  private histograms: Map<string, Histogram> = new Map();
  private gauges: Map<string, Gauge> = new Map();

  constructor(config: MetricsConfig = {}) {
    this.registry = new Registry();

    if (config.enabled !== false) {
      this.initializeMetrics();
    }
  }

  private initializeMetrics(): void {
    // HTTP metrics
    this.counters.set(
      'http_requests_total',
      new Counter({
        name: 'http_requests_total',
        help: 'Total HTTP requests',
        labelNames: ['method', 'status'],
        registers: [this.registry],
      })
    );

    this.histograms.set(
      'http_request_duration',
      new Histogram({
        name: 'http_request_duration_seconds',
        help: 'HTTP request duration',
        labelNames: ['status'],
        buckets: [0.1, 0.5, 1, 2, 5],
        registers: [this.registry],
      })
    );

    this.counters.set(
      'http_errors',
      new Counter({
        name: 'http_errors_total',
        help: 'HTTP errors',
        labelNames: ['status'],
        registers: [this.registry],
      })
    );

    // Export pipeline metrics
    this.counters.set(
      'pages_fetched',
      new Counter({
        name: 'pages_fetched_total',
        help: 'Bookmark pages fetched, including the terminating empty page',
        registers: [this.registry],
      })
    );

    this.counters.set(
      'bookmarks_fetched',
      new Counter({
        name: 'bookmarks_fetched_total',
        help: 'Bookmarks decoded from the source API',
        registers: [this.registry],
      })
    );

    this.counters.set(
      'rows_written',
      new Counter({
        name: 'rows_written_total',
        help: 'CSV rows written',
        registers: [this.registry],
      })
    );

    this.histograms.set(
      'export_duration',
      new Histogram({
        name: 'export_duration_seconds',
        help: 'Full export duration',
        labelNames: ['status'],
        buckets: [1, 5, 15, 60, 300],
        registers: [this.registry],
      })
    );

    this.gauges.set(
      'export_last_bookmark_count',
      new Gauge({
        name: 'export_last_bookmark_count',
        help: 'Number of bookmarks in the last completed fetch',
        registers: [this.registry],
      })
    );
  }

  incrementCounter(name: string, labels: Labels = {}, value = 1): void {
    const counter = this.counters.get(name);
    counter?.inc(labels, value);
  }

  recordLatency(name: string, durationMs: number, labels: Labels = {}): void {
    const histogram = this.histograms.get(name);
    histogram?.observe(labels, durationMs / 1000);
  }

  recordGauge(name: string, value: number, labels: Labels = {}): void {
    const gauge = this.gauges.get(name);
    gauge?.set(labels, value);
  }

  async getMetrics(): Promise<string> {
    return this.registry.metrics();
  }
}
