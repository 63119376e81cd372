import type { AddressInfo } from 'net';
import type { Logger } from 'pino';
import { createApp } from './app';
import { MonitorConfig } from './config';
import { AlertStateStore, INotifier, WebhookSender } from './services/alerts';
import { MetricsServer, PrometheusMetricsSink } from './services/metrics';
import { HttpProber, IProber, MonitorService } from './services/polling';

export interface MonitorHandle {
  service: MonitorService;
  metricsServer: MetricsServer | null;
  metricsAddress: AddressInfo | null;
  shutdown(): Promise<void>;
}

export interface StartMonitorOverrides {
  prober?: IProber;
  notifier?: INotifier | null;
  metricsSink?: PrometheusMetricsSink;
}

/**
 * Wire the runtime from a validated config and start both the polling
 * loop and the metrics listener.
 */
export async function startMonitor(
  config: MonitorConfig,
  logger: Logger,
  overrides: StartMonitorOverrides = {}
): Promise<MonitorHandle> {
  const policy = { cooldownMs: config.cooldownMs, latencyThresholdMs: config.latencyThresholdMs };
  const alertState = new AlertStateStore();
  const metricsSink = overrides.metricsSink ?? new PrometheusMetricsSink();

  let notifier: INotifier | null;
  if (overrides.notifier !== undefined) {
    notifier = overrides.notifier;
  } else {
    notifier = config.webhook ? new WebhookSender(config.webhook) : null;
  }
  if (!notifier) {
    logger.warn('no webhook configured; alerts will only be logged');
  }

  const service = new MonitorService(
    {
      urls: config.urls,
      intervalMs: config.intervalMs,
      timeoutMs: config.timeoutMs,
      concurrency: config.concurrency,
      policy,
    },
    {
      prober: overrides.prober ?? new HttpProber({ policy, logger }),
      metrics: metricsSink,
      notifier,
      alertState,
      logger,
    }
  );

  let metricsServer: MetricsServer | null = null;
  let metricsAddress: AddressInfo | null = null;
  if (config.metrics.enabled) {
    const app = createApp({
      registry: metricsSink.registry,
      logger,
      alertState,
      getStatus: () => service.getStatus(),
    });
    metricsServer = new MetricsServer(app, { host: config.metrics.host, port: config.metrics.port, logger });
    try {
      metricsAddress = await metricsServer.start();
    } catch (err: unknown) {
      // Polling continues without the scrape endpoint.
      logger.error({ err, port: config.metrics.port }, 'failed to start metrics server');
      metricsServer = null;
    }
  }

  service.start();

  return {
    service,
    metricsServer,
    metricsAddress,
    async shutdown() {
      await Promise.all([
        service.shutdown(),
        metricsServer ? metricsServer.stop() : Promise.resolve(),
      ]);
    },
  };
}
