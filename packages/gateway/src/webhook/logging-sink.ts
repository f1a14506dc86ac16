/**
 * Sink that records every webhook event in the log.
 * Used when the receiver runs without a consumer of its own.
 */

import type { WebhookEventSink } from '../types/index.js';
import { getLog } from '../services/log.js';

const log = getLog('WebhookEvents');

export function createLoggingSink(): WebhookEventSink {
  return {
    onEvent(data, sequence) {
      log.info('Webhook event', {
        sn: sequence,
        type: data.type,
        channelType: data.channel_type,
        targetId: data.target_id,
        authorId: data.author_id,
        msgId: data.msg_id,
      });
    },
  };
}
