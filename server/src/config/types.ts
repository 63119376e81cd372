import type { LogLevel } from '../utils/logger';

export interface MetricsConfig {
  enabled: boolean;
  host: string;
  port: number;
}

export interface MonitorConfig {
  urls: string[];
  intervalMs: number;
  timeoutMs: number;
  concurrency: number;
  cooldownMs: number;
  latencyThresholdMs: number; // 0 = disabled
  webhook: string | null;
  log: {
    file: string | null;
    level: LogLevel;
  };
  metrics: MetricsConfig;
  /** Where the settings came from, for the startup log. */
  source: 'file' | 'env';
  configPath: string | null;
}

export const CONFIG_DEFAULTS = {
  intervalSeconds: 10,
  timeoutSeconds: 5,
  concurrency: 4,
  cooldownSeconds: 60,
  latencyThresholdMs: 0,
  logFile: 'monitor.log',
  metricsHost: '0.0.0.0',
  metricsPort: 2112,
} as const;
