export { loadConfig, STDOUT_ONLY } from './loadConfig';
export type { LoadConfigOptions } from './loadConfig';
export { CONFIG_DEFAULTS } from './types';
export type { MonitorConfig, MetricsConfig } from './types';
