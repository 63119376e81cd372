export { PrometheusMetricsSink } from './PrometheusMetricsSink';
export { MetricsServer } from './MetricsServer';
export type { PrometheusMetricsSinkOptions } from './PrometheusMetricsSink';
export type { MetricsServerOptions } from './MetricsServer';
export type { IMetricsSink } from './types';
