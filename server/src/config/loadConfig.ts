import fs from 'fs';
import path from 'path';
import yaml from 'js-yaml';
import type { Logger } from 'pino';
import defaultLogger, { parseLogLevel } from '../utils/logger';
import { ConfigurationError, errorMessage } from '../utils/errors';
import {
  isPlainObject,
  isValidUrl,
  parseBoolean,
  parseNumber,
  parseString,
  splitList,
} from '../utils/validation';
import { CONFIG_DEFAULTS, MonitorConfig } from './types';

const DEFAULT_CONFIG_FILE = 'config.yaml';

/** Largest delay setTimeout honours; longer delays fire after 1 ms. */
const MAX_TIMER_MS = 2_147_483_647;

/** Log file value meaning "stdout only". */
export const STDOUT_ONLY = '-';

export interface LoadConfigOptions {
  /** Explicit path from --config; must exist when given. */
  configPath?: string;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  logger?: Logger;
}

/**
 * Settings as read from a source, before defaults and validation.
 */
interface RawSettings {
  urls: unknown;
  interval: unknown;
  timeout: unknown;
  concurrency: unknown;
  cooldown: unknown;
  latencyThreshold: unknown;
  webhook: unknown;
  logFile: unknown;
  logLevel: unknown;
  metricsEnabled: unknown;
  metricsHost: unknown;
  metricsPort: unknown;
}

/**
 * Load monitor configuration.
 *
 * A YAML file wins when one is found (--config, CONFIG_FILE, or ./config.yaml);
 * otherwise settings come from environment variables.
 * @throws ConfigurationError on unreadable files, malformed values, or no URLs
 */
export function loadConfig(options: LoadConfigOptions = {}): MonitorConfig {
  const env = options.env ?? process.env;
  const cwd = options.cwd ?? process.cwd();
  const logger = options.logger ?? defaultLogger;

  const configPath = resolveConfigPath(options.configPath ?? env.CONFIG_FILE, cwd);

  if (configPath) {
    const raw = readYamlSettings(configPath);
    return normalize(raw, 'file', configPath, logger);
  }

  return normalize(readEnvSettings(env), 'env', null, logger);
}

function resolveConfigPath(explicit: string | undefined, cwd: string): string | null {
  if (explicit) {
    const resolved = path.resolve(cwd, explicit);
    if (!fs.existsSync(resolved)) {
      throw new ConfigurationError(`config file not found: ${resolved}`, 'config');
    }
    return resolved;
  }

  const fallback = path.resolve(cwd, DEFAULT_CONFIG_FILE);
  return fs.existsSync(fallback) ? fallback : null;
}

function section(doc: Record<string, unknown>, key: string): Record<string, unknown> {
  const value = doc[key];
  if (value === undefined || value === null) return {};
  if (!isPlainObject(value)) {
    throw new ConfigurationError(`${key} must be a mapping`, key);
  }
  return value;
}

function readYamlSettings(configPath: string): RawSettings {
  let doc: unknown;
  try {
    doc = yaml.load(fs.readFileSync(configPath, 'utf8'));
  } catch (error) {
    throw new ConfigurationError(`failed to read ${configPath}: ${errorMessage(error)}`, 'config');
  }

  if (doc === undefined || doc === null) doc = {};
  if (!isPlainObject(doc)) {
    throw new ConfigurationError(`${configPath} must contain a mapping`, 'config');
  }

  const monitor = section(doc, 'monitor');
  const notifier = section(doc, 'notifier');
  const legacyNotifier = section(doc, 'feishu');
  const alert = section(doc, 'alert');
  const log = section(doc, 'log');
  const metrics = section(doc, 'metrics');

  return {
    urls: monitor.urls,
    interval: monitor.interval_seconds,
    timeout: monitor.timeout_seconds,
    concurrency: monitor.concurrency,
    cooldown: alert.cooldown_seconds,
    latencyThreshold: alert.latency_threshold_ms,
    webhook: notifier.webhook ?? legacyNotifier.webhook,
    logFile: log.file,
    logLevel: log.level,
    metricsEnabled: metrics.enabled,
    metricsHost: metrics.host,
    metricsPort: metrics.port,
  };
}

function readEnvSettings(env: NodeJS.ProcessEnv): RawSettings {
  return {
    urls: env.MONITOR_URLS,
    interval: env.INTERVAL_SECONDS,
    timeout: env.TIMEOUT_SECONDS,
    concurrency: env.MONITOR_CONCURRENCY,
    cooldown: env.ALERT_COOLDOWN_SECONDS,
    latencyThreshold: env.ALERT_LATENCY_THRESHOLD_MS,
    webhook: env.WEBHOOK_URL || env.FEISHU_WEBHOOK,
    logFile: env.LOG_FILE,
    logLevel: env.LOG_LEVEL,
    metricsEnabled: env.METRICS_ENABLED,
    metricsHost: env.METRICS_HOST,
    metricsPort: env.METRICS_PORT,
  };
}

function parseUrls(value: unknown): string[] {
  if (value === undefined || value === null) return [];
  if (typeof value === 'string') return splitList(value);
  if (!Array.isArray(value)) {
    throw new ConfigurationError('urls must be a list of strings', 'urls');
  }

  return value.map((item, index) => {
    if (typeof item !== 'string') {
      throw new ConfigurationError(`urls[${index}] must be a string`, 'urls');
    }
    return item.trim();
  }).filter(item => item !== '');
}

/** Positive values pass through; missing, zero, or negative fall back. */
function positiveOr(value: number | undefined, fallback: number): number {
  return value !== undefined && value > 0 ? value : fallback;
}

function secondsToTimerMs(seconds: number, field: string): number {
  const ms = seconds * 1000;
  if (ms > MAX_TIMER_MS) {
    throw new ConfigurationError(`${field} must be at most ${MAX_TIMER_MS / 1000} seconds`, field);
  }
  return ms;
}

/** Negative values clamp to zero; missing falls back. */
function nonNegativeOr(value: number | undefined, fallback: number): number {
  if (value === undefined) return fallback;
  return Math.max(0, value);
}

function normalize(
  raw: RawSettings,
  source: MonitorConfig['source'],
  configPath: string | null,
  logger: Logger
): MonitorConfig {
  const urls = dedupeUrls(parseUrls(raw.urls), logger);
  if (urls.length === 0) {
    throw new ConfigurationError(
      source === 'file'
        ? 'monitor.urls is empty; list at least one URL to monitor'
        : 'no URLs configured; set MONITOR_URLS (comma-separated) or provide config.yaml',
      'urls'
    );
  }
  for (const url of urls) {
    if (!isValidUrl(url)) {
      throw new ConfigurationError(`invalid URL "${url}": must be http or https`, 'urls');
    }
  }

  const webhook = parseString(raw.webhook, 'webhook') || null;
  if (webhook && !isValidUrl(webhook)) {
    throw new ConfigurationError('webhook must be a valid HTTP or HTTPS URL', 'webhook');
  }

  const intervalSeconds = positiveOr(parseNumber(raw.interval, 'interval_seconds'), CONFIG_DEFAULTS.intervalSeconds);
  const timeoutSeconds = positiveOr(parseNumber(raw.timeout, 'timeout_seconds'), CONFIG_DEFAULTS.timeoutSeconds);
  const concurrency = Math.max(1, Math.floor(positiveOr(parseNumber(raw.concurrency, 'concurrency'), CONFIG_DEFAULTS.concurrency)));
  const cooldownSeconds = nonNegativeOr(parseNumber(raw.cooldown, 'cooldown_seconds'), CONFIG_DEFAULTS.cooldownSeconds);
  const latencyThresholdMs = nonNegativeOr(
    parseNumber(raw.latencyThreshold, 'latency_threshold_ms'),
    CONFIG_DEFAULTS.latencyThresholdMs
  );

  const logFile = parseString(raw.logFile, 'log.file') || CONFIG_DEFAULTS.logFile;
  const logLevelRaw = parseString(raw.logLevel, 'log.level');

  const metricsPort = parseNumber(raw.metricsPort, 'metrics.port') ?? CONFIG_DEFAULTS.metricsPort;
  if (!Number.isInteger(metricsPort) || metricsPort < 1 || metricsPort > 65535) {
    throw new ConfigurationError('metrics.port must be an integer between 1 and 65535', 'metrics.port');
  }

  return {
    urls,
    intervalMs: secondsToTimerMs(intervalSeconds, 'interval_seconds'),
    timeoutMs: secondsToTimerMs(timeoutSeconds, 'timeout_seconds'),
    concurrency,
    cooldownMs: cooldownSeconds * 1000,
    latencyThresholdMs,
    webhook,
    log: {
      file: logFile === STDOUT_ONLY ? null : logFile,
      level: parseLogLevel(logLevelRaw),
    },
    metrics: {
      enabled: parseBoolean(raw.metricsEnabled, 'metrics.enabled') ?? true,
      host: parseString(raw.metricsHost, 'metrics.host') || CONFIG_DEFAULTS.metricsHost,
      port: metricsPort,
    },
    source,
    configPath,
  };
}

function dedupeUrls(urls: string[], logger: Logger): string[] {
  const unique = [...new Set(urls)];
  if (unique.length !== urls.length) {
    logger.warn({ configured: urls.length, unique: unique.length }, 'duplicate URLs ignored');
  }
  return unique;
}
