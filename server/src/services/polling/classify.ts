import { AlertPolicy, AlertStatus, ProbeResult, ProbeStatus } from './types';

export interface Classification {
  status: ProbeStatus;
  detail: string;
}

/**
 * Format a duration in milliseconds: "850ms" below a second, "1.25s" above.
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) return `${Math.round(ms)}ms`;
  return `${(ms / 1000).toFixed(2)}s`;
}

/**
 * Classify one probe result. Pure: depends only on its arguments.
 *
 * Priority: transport error, non-2xx status, latency over threshold, healthy.
 */
export function classifyProbe(result: ProbeResult, policy: AlertPolicy): Classification {
  if (result.error !== undefined || result.statusCode === undefined) {
    return { status: 'error', detail: result.error ?? 'no response received' };
  }

  const code = result.statusCode;
  if (code < 200 || code >= 300) {
    return { status: 'error', detail: `HTTP ${code}` };
  }

  const latency = formatDuration(result.latencyMs);

  if (policy.latencyThresholdMs > 0 && result.latencyMs > policy.latencyThresholdMs) {
    return {
      status: 'slow',
      detail: `HTTP ${code} in ${latency} exceeds latency threshold ${formatDuration(policy.latencyThresholdMs)}`,
    };
  }

  return { status: 'healthy', detail: `HTTP ${code} in ${latency}` };
}

export function isAlertWorthy(status: ProbeStatus): status is AlertStatus {
  return status !== 'healthy';
}
