/**
 * Send command - posts one message to a channel through the REST API
 */

import { createKookApiClient } from '@kookgate/channels';
import { getErrorMessage } from '@kookgate/core';
import { resolveConfig } from './shared.js';

export interface SendOptions {
  token?: string;
  apiBaseUrl?: string;
  /** Message type: 1 text, 9 KMarkdown */
  type?: string;
  /** Message ID to quote */
  quote?: string;
}

export async function sendMessage(
  targetId: string,
  content: string,
  options: SendOptions
): Promise<void> {
  const config = resolveConfig();
  if (!config) return;

  const token = options.token ?? config.kook.botToken;
  if (!token) {
    console.error('❌ Error: KOOK bot token is required');
    console.error('   Set KOOK_BOT_TOKEN or use the --token flag');
    process.exit(1);
    return;
  }

  const type = options.type === undefined ? undefined : Number(options.type);
  if (type !== undefined && !Number.isInteger(type)) {
    console.error(`❌ Invalid message type: ${options.type}`);
    process.exit(1);
    return;
  }

  const api = createKookApiClient({
    token,
    baseUrl: options.apiBaseUrl ?? config.kook.apiBaseUrl,
  });

  try {
    const sent = await api.sendMessage(targetId, content, { type, quote: options.quote });
    console.log(`✅ Sent message ${sent.msgId}`);
  } catch (err) {
    console.error(`❌ Failed to send: ${getErrorMessage(err)}`);
    process.exit(1);
  }
}
