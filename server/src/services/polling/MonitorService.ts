import { EventEmitter } from 'events';
import type { Logger } from 'pino';
import defaultLogger from '../../utils/logger';
import { errorMessage } from '../../utils/errors';
import { AlertStateStore } from '../alerts/AlertStateStore';
import { INotifier, SendResult } from '../alerts/types';
import { IMetricsSink } from '../metrics/types';
import { isAlertWorthy } from './classify';
import { runWithConcurrency } from './concurrency';
import {
  AlertEventPayload,
  CycleSummary,
  IProber,
  MonitorEventType,
  MonitorRuntime,
  MonitorStatus,
  PollOutcome,
  ProbeStatus,
} from './types';

export interface MonitorServiceDeps {
  prober: IProber;
  metrics: IMetricsSink;
  notifier?: INotifier | null;
  alertState?: AlertStateStore;
  logger?: Logger;
  now?: () => number;
}

/**
 * Drives the polling cycle: probes every target, records metrics,
 * and sends cooldown-limited alerts for error and slow outcomes.
 *
 * Only one cycle is ever in flight. The next cycle starts one interval
 * after the previous one started, or immediately if it overran.
 */
export class MonitorService extends EventEmitter {
  private runtime: MonitorRuntime;
  private prober: IProber;
  private metrics: IMetricsSink;
  private notifier: INotifier | null;
  private alertState: AlertStateStore;
  private logger: Logger;
  private now: () => number;

  private controller: AbortController | null = null;
  private detachSignal: (() => void) | null = null;
  private loop: Promise<void> | null = null;
  private cyclesCompleted = 0;
  private lastCycle: CycleSummary | null = null;

  constructor(runtime: MonitorRuntime, deps: MonitorServiceDeps) {
    super();
    this.runtime = runtime;
    this.prober = deps.prober;
    this.metrics = deps.metrics;
    this.notifier = deps.notifier ?? null;
    this.alertState = deps.alertState ?? new AlertStateStore();
    this.logger = deps.logger ?? defaultLogger;
    this.now = deps.now ?? (() => Date.now());
  }

  /**
   * Start the loop. The first cycle runs immediately.
   * An external signal, when given, stops the loop like shutdown().
   */
  start(signal?: AbortSignal): void {
    if (this.loop) return;

    const controller = new AbortController();
    this.controller = controller;
    if (signal?.aborted) {
      controller.abort();
    } else if (signal) {
      const onAbort = () => controller.abort();
      signal.addEventListener('abort', onAbort, { once: true });
      this.detachSignal = () => signal.removeEventListener('abort', onAbort);
    }

    const { urls, intervalMs, timeoutMs, policy } = this.runtime;
    this.logger.info(
      {
        targets: urls.length,
        intervalMs,
        timeoutMs,
        cooldownMs: policy.cooldownMs,
        latencyThresholdMs: policy.latencyThresholdMs,
      },
      'monitor started'
    );

    this.loop = this.runLoop(controller.signal).catch((err: unknown) => {
      controller.abort();
      this.logger.error({ err }, 'monitor loop crashed');
    });
  }

  /**
   * Stop the loop, abandoning in-flight probes, and wait for it to exit.
   */
  async shutdown(): Promise<void> {
    this.controller?.abort();
    if (this.loop) {
      await this.loop;
    }
    this.loop = null;
    this.controller = null;
    this.detachSignal?.();
    this.detachSignal = null;
    this.alertState.clear();
    this.removeAllListeners();
    this.logger.info('monitor stopped');
  }

  get isRunning(): boolean {
    return this.controller !== null && !this.controller.signal.aborted;
  }

  getStatus(): MonitorStatus {
    return {
      running: this.isRunning,
      targets: this.runtime.urls.length,
      cyclesCompleted: this.cyclesCompleted,
      lastCycle: this.lastCycle,
    };
  }

  getAlertState(): AlertStateStore {
    return this.alertState;
  }

  /**
   * Probe every target once. Per-URL failures are contained;
   * only cancellation ends a cycle early.
   */
  async runCycle(signal?: AbortSignal): Promise<CycleSummary> {
    const startedAt = this.now();
    const counts: Record<ProbeStatus, number> = { healthy: 0, error: 0, slow: 0 };

    const results = await runWithConcurrency(
      this.runtime.urls,
      this.runtime.concurrency,
      async (url) => {
        if (signal?.aborted) return null;
        return this.checkTarget(url, signal);
      }
    );

    for (const [index, result] of results.entries()) {
      if (result.status === 'rejected') {
        this.logger.error({ err: result.reason, url: this.runtime.urls[index] }, 'target check failed');
      } else if (result.value) {
        counts[result.value.status]++;
      }
    }

    const summary: CycleSummary = { startedAt, durationMs: this.now() - startedAt, counts };
    this.lastCycle = summary;
    this.cyclesCompleted++;
    try {
      this.emit(MonitorEventType.CYCLE_COMPLETE, summary);
    } catch (err: unknown) {
      this.logger.error({ err }, 'cycle listener failed');
    }
    this.logger.debug({ ...summary }, 'cycle complete');
    return summary;
  }

  private async runLoop(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      const startedAt = this.now();
      await this.runCycle(signal);
      if (signal.aborted) break;

      const elapsed = this.now() - startedAt;
      if (elapsed >= this.runtime.intervalMs) {
        this.logger.warn({ elapsedMs: elapsed, intervalMs: this.runtime.intervalMs }, 'cycle overran interval');
        continue;
      }
      await waitFor(this.runtime.intervalMs - elapsed, signal);
    }
  }

  private async checkTarget(url: string, signal?: AbortSignal): Promise<PollOutcome | null> {
    const outcome = await this.prober.probe(url, this.runtime.timeoutMs, signal);

    // Probes abandoned by shutdown are not real observations.
    if (signal?.aborted) return null;

    this.recordMetrics(outcome);
    this.emit(MonitorEventType.OUTCOME, outcome);

    if (outcome.status === 'healthy') {
      const recovered = this.alertState.reset(url);
      if (recovered) {
        this.logger.info({ url, detail: outcome.detail }, 'target recovered');
        const payload: AlertEventPayload = { outcome };
        this.emit(MonitorEventType.RECOVERED, payload);
      } else {
        this.logger.info({ url, detail: outcome.detail }, 'target ok');
      }
      return outcome;
    }

    await this.handleAlert(outcome);
    return outcome;
  }

  private async handleAlert(outcome: PollOutcome): Promise<void> {
    const { url, status, detail, latencyMs, timestamp } = outcome;
    this.logger.warn({ url, status, detail, latencyMs }, 'target alert');

    if (!this.notifier || !isAlertWorthy(status)) return;

    const now = this.now();
    if (!this.alertState.shouldNotify(url, now, this.runtime.policy.cooldownMs)) {
      this.logger.debug({ url, lastAlertAt: this.alertState.getLastAlertAt(url) }, 'alert suppressed by cooldown');
      const payload: AlertEventPayload = { outcome };
      this.emit(MonitorEventType.ALERT_SUPPRESSED, payload);
      return;
    }

    let result: SendResult;
    try {
      result = await this.notifier.send({ url, status, detail, latencyMs, timestamp });
    } catch (err: unknown) {
      result = { success: false, error: errorMessage(err) };
    }

    if (!result.success) {
      this.logger.error({ url, error: result.error }, 'failed to send alert');
      const payload: AlertEventPayload = { outcome, error: result.error };
      this.emit(MonitorEventType.ALERT_FAILED, payload);
      return;
    }

    this.alertState.recordAlert(url, now);
    this.logger.info({ url, status }, 'alert sent');
    const payload: AlertEventPayload = { outcome };
    this.emit(MonitorEventType.ALERT_SENT, payload);
  }

  private recordMetrics(outcome: PollOutcome): void {
    try {
      this.metrics.incrementRequestCounter(outcome.url, outcome.status);
      this.metrics.observeLatency(outcome.url, outcome.latencyMs / 1000);
    } catch (err: unknown) {
      this.logger.warn({ err, url: outcome.url }, 'failed to record metrics');
    }
  }
}

/**
 * Resolve after `ms`, or as soon as the signal aborts.
 */
function waitFor(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise<void>(resolve => {
    const done = () => {
      clearTimeout(timer);
      signal.removeEventListener('abort', done);
      resolve();
    };
    const timer = setTimeout(done, ms);
    signal.addEventListener('abort', done, { once: true });
  });
}
