import type { AlertStatus } from '../polling/types';

/**
 * One alert to deliver for an unhealthy or slow URL.
 */
export interface AlertNotification {
  url: string;
  status: AlertStatus;
  detail: string;
  latencyMs: number;
  timestamp: number; // epoch ms of the probe
}

/**
 * Result of sending an alert to the channel.
 */
export interface SendResult {
  success: boolean;
  error?: string;
}

/**
 * Interface for the outbound alert channel. Implementations report
 * delivery failures through SendResult rather than throwing.
 */
export interface INotifier {
  send(alert: AlertNotification): Promise<SendResult>;
}
