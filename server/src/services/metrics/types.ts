import type { ProbeStatus } from '../polling/types';

/**
 * Per-request metrics recorded by the monitor.
 */
export interface IMetricsSink {
  incrementRequestCounter(url: string, status: ProbeStatus): void;
  observeLatency(url: string, latencySeconds: number): void;
}
