export { AlertStateStore } from './AlertStateStore';
export { WebhookSender } from './senders/WebhookSender';
export type { MessageCardPayload } from './senders/WebhookSender';
export type { AlertNotification, INotifier, SendResult } from './types';
