import { AlertNotification, INotifier, SendResult } from '../types';
import { formatDuration } from '../../polling/classify';

const WEBHOOK_TIMEOUT_MS = 10_000;

interface CardText {
  tag: 'plain_text' | 'lark_md';
  content: string;
}

export interface MessageCardPayload {
  msg_type: 'interactive';
  card: {
    config: { wide_screen_mode: boolean };
    header: { title: CardText; template: string };
    elements: Array<{ tag: 'div'; text: CardText }>;
  };
}

/**
 * Posts alerts to a chat-bot webhook as an interactive message card.
 * Any non-2xx reply counts as a failed delivery.
 */
export class WebhookSender implements INotifier {
  private webhookUrl: string;
  private timeoutMs: number;

  constructor(webhookUrl: string, timeoutMs = WEBHOOK_TIMEOUT_MS) {
    this.webhookUrl = webhookUrl;
    this.timeoutMs = timeoutMs;
  }

  async send(alert: AlertNotification): Promise<SendResult> {
    const payload = this.buildPayload(alert);
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const response = await fetch(this.webhookUrl, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(payload),
        signal: controller.signal,
      });

      if (response.ok) {
        return { success: true };
      }

      const body = await response.text().catch(() => '');
      return { success: false, error: `Webhook returned ${response.status}: ${body}` };
    } catch (err: unknown) {
      if (err instanceof Error && err.name === 'AbortError') {
        return { success: false, error: `Webhook request timed out (${formatDuration(this.timeoutMs)})` };
      }
      const message = err instanceof Error ? err.message : String(err);
      return { success: false, error: `Webhook request failed: ${message}` };
    } finally {
      clearTimeout(timeoutId);
    }
  }

  buildPayload(alert: AlertNotification): MessageCardPayload {
    const lines = [
      `**URL**: ${alert.url}`,
      `**Status**: ${alert.status.toUpperCase()}`,
      `**Detail**: ${alert.detail}`,
      `**Latency**: ${formatDuration(alert.latencyMs)}`,
      `**Time**: ${new Date(alert.timestamp).toISOString()}`,
    ];

    return {
      msg_type: 'interactive',
      card: {
        config: { wide_screen_mode: true },
        header: {
          title: { tag: 'plain_text', content: 'HTTP monitor alert' },
          template: alert.status === 'slow' ? 'orange' : 'red',
        },
        elements: [
          { tag: 'div', text: { tag: 'lark_md', content: lines.join('\n') } },
        ],
      },
    };
  }
}
