import { Counter, Histogram, Registry, collectDefaultMetrics } from 'prom-client';
import type { ProbeStatus } from '../polling/types';
import { IMetricsSink } from './types';

export interface PrometheusMetricsSinkOptions {
  registry?: Registry;
  /** Also expose process metrics (CPU, memory, event loop). */
  collectDefaults?: boolean;
}

/**
 * Exposes monitor metrics in a dedicated prom-client registry for scraping.
 */
export class PrometheusMetricsSink implements IMetricsSink {
  readonly registry: Registry;
  private requests: Counter<'url' | 'status'>;
  private duration: Histogram<'url'>;

  constructor(options: PrometheusMetricsSinkOptions = {}) {
    this.registry = options.registry ?? new Registry();

    this.requests = new Counter({
      name: 'http_monitor_requests_total',
      help: 'Total HTTP requests made by monitor, labeled by url and status',
      labelNames: ['url', 'status'],
      registers: [this.registry],
    });

    this.duration = new Histogram({
      name: 'http_monitor_request_duration_seconds',
      help: 'HTTP request duration in seconds',
      labelNames: ['url'],
      registers: [this.registry],
    });

    if (options.collectDefaults ?? true) {
      collectDefaultMetrics({ register: this.registry });
    }
  }

  incrementRequestCounter(url: string, status: ProbeStatus): void {
    this.requests.inc({ url, status });
  }

  observeLatency(url: string, latencySeconds: number): void {
    this.duration.observe({ url }, latencySeconds);
  }

  get contentType(): string {
    return this.registry.contentType;
  }

  metrics(): Promise<string> {
    return this.registry.metrics();
  }
}
