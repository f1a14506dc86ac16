/**
 * Connect command - streams events from the KOOK WebSocket gateway
 *
 * Token and connection settings come from the environment
 * (KOOK_BOT_TOKEN, KOOK_API_BASE_URL, KOOK_COMPRESS); flags override them.
 */

import { createKookBot, type ChannelEvent, type KookConfig } from '@kookgate/channels';
import { getErrorMessage } from '@kookgate/core';
import { onShutdown, parseIdList, resolveConfig } from './shared.js';

export interface ConnectOptions {
  token?: string;
  apiBaseUrl?: string;
  /** false when --no-compress is given */
  compress?: boolean;
  /** false when --no-resume is given */
  resume?: boolean;
  users?: string;
  channels?: string;
  /** Reply "pong" to messages that say "ping" */
  pingPong?: boolean;
}

export async function startConnect(options: ConnectOptions): Promise<void> {
  const config = resolveConfig();
  if (!config) return;

  const token = options.token ?? config.kook.botToken;
  if (!token) {
    console.error('❌ Error: KOOK bot token is required');
    console.error('   Set KOOK_BOT_TOKEN or use the --token flag');
    process.exit(1);
    return;
  }

  const botConfig: KookConfig = {
    type: 'kook',
    enabled: true,
    botToken: token,
    apiBaseUrl: options.apiBaseUrl ?? config.kook.apiBaseUrl,
    compress: options.compress === false ? false : config.kook.compress,
    allowedUserIds: parseIdList(options.users),
    allowedChannelIds: parseIdList(options.channels),
  };

  const bot = createKookBot(botConfig, { session: { resume: options.resume !== false } });

  let failed = false;
  bot.onChannelEvent((event: ChannelEvent) => {
    switch (event.type) {
      case 'connected':
        console.log(`✅ Connected to the gateway (session ${event.sessionId ?? 'unknown'})`);
        break;
      case 'disconnected':
        console.log('⚠️  Gateway requested a reconnect');
        break;
      case 'message':
        console.log(
          `📨 [${event.message.chatId}] ${event.message.username ?? event.message.userId}: ${event.message.text}`
        );
        break;
      case 'error':
        failed = true;
        console.error(`❌ ${event.error.message}`);
        break;
    }
  });

  if (options.pingPong) {
    bot.onMessage(async (message) => {
      if (message.text.trim().toLowerCase() === 'ping') {
        await bot.sendMessage({ chatId: message.chatId, text: 'pong', replyToMessageId: message.id });
      }
    });
  }

  console.log('\n🤖 Connecting to KOOK...\n');
  console.log(`   Compression:      ${botConfig.compress ? 'on' : 'off'}`);
  console.log(`   Resume:           ${options.resume !== false ? 'on' : 'off'}`);
  console.log(`   Allowed Users:    ${botConfig.allowedUserIds?.join(', ') || 'all'}`);
  console.log(`   Allowed Channels: ${botConfig.allowedChannelIds?.join(', ') || 'all'}`);
  console.log('');

  try {
    await bot.start();
  } catch (err) {
    console.error(`❌ Failed to start: ${getErrorMessage(err)}`);
    process.exit(1);
    return;
  }

  console.log('Press Ctrl+C to stop');
  const removeHandlers = onShutdown(() => bot.stop());

  await bot.waitUntilStopped();
  removeHandlers();

  if (failed) {
    process.exit(1);
  }
}
