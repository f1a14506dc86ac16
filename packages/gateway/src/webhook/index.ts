export { SequenceWindow } from './sequence-window.js';
export { WebhookReceiver, type WebhookReceiverOptions } from './receiver.js';
export { createLoggingSink } from './logging-sink.js';
