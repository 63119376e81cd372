export type ProbeStatus = 'healthy' | 'error' | 'slow';

/** Statuses that warrant a notification. */
export type AlertStatus = Exclude<ProbeStatus, 'healthy'>;

export interface PollOutcome {
  url: string;
  status: ProbeStatus;
  latencyMs: number;
  detail: string;
  timestamp: number;          // probe start, epoch ms
  statusCode?: number;        // absent on transport failure
}

export interface AlertPolicy {
  cooldownMs: number;
  latencyThresholdMs: number; // 0 disables slow detection
}

/**
 * What a single request produced, before classification.
 * Exactly one of `error` / `statusCode` is set.
 */
export interface ProbeResult {
  error?: string;
  statusCode?: number;
  latencyMs: number;
}

export interface IProber {
  probe(url: string, timeoutMs: number, signal?: AbortSignal): Promise<PollOutcome>;
}

export interface MonitorRuntime {
  urls: readonly string[];
  intervalMs: number;
  timeoutMs: number;
  concurrency: number;
  policy: AlertPolicy;
}

export interface CycleSummary {
  startedAt: number;
  durationMs: number;
  counts: Record<ProbeStatus, number>;
}

export interface MonitorStatus {
  running: boolean;
  targets: number;
  cyclesCompleted: number;
  lastCycle: CycleSummary | null;
}

export interface AlertEventPayload {
  outcome: PollOutcome;
  error?: string;
}

export enum MonitorEventType {
  OUTCOME = 'poll:outcome',
  ALERT_SENT = 'alert:sent',
  ALERT_SUPPRESSED = 'alert:suppressed',
  ALERT_FAILED = 'alert:failed',
  RECOVERED = 'target:recovered',
  CYCLE_COMPLETE = 'cycle:complete',
}
