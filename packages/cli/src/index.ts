#!/usr/bin/env -S node --import tsx
/**
 * kookgate CLI
 */

import { Command } from 'commander';
import { loadEnvFile } from '@kookgate/gateway';
import { startConnect } from './commands/connect.js';
import { startWebhook } from './commands/webhook.js';
import { sendMessage } from './commands/send.js';

// Load environment variables from .env (variables already set win)
loadEnvFile();

const program = new Command();

program
  .name('kookgate')
  .description('KOOK gateway client and webhook receiver')
  .version('0.1.0');

// Connect command - WebSocket gateway session
program
  .command('connect')
  .description('Connect to the KOOK event gateway and print incoming events')
  .option('-t, --token <token>', 'Bot token (or use KOOK_BOT_TOKEN env)')
  .option('--api-base-url <url>', 'REST API base URL (or use KOOK_API_BASE_URL env)')
  .option('--no-compress', 'Ask the gateway for uncompressed frames')
  .option('--no-resume', 'Start a fresh session after every disconnect')
  .option('--users <ids>', 'Comma-separated allowed user IDs')
  .option('--channels <ids>', 'Comma-separated allowed channel IDs')
  .option('--ping-pong', 'Reply "pong" to messages that say "ping"')
  .action(startConnect);

// Webhook command - HTTP receiver
program
  .command('webhook')
  .description('Start the HTTP receiver for webhook deliveries')
  .option('-p, --port <port>', 'Port to listen on (or use WEBHOOK_PORT env)')
  .option('--host <host>', 'Host to bind to (or use WEBHOOK_HOST env)')
  .option('--path <path>', 'Path deliveries are posted to (or use WEBHOOK_PATH env)')
  .option('--verify-token <token>', 'Verify token (or use KOOK_VERIFY_TOKEN env)')
  .option('--no-decompress', 'Leave compressed request bodies undecoded')
  .action(startWebhook);

// Send command - one-off REST call
program
  .command('send <targetId> <content>')
  .description('Send a message to a channel')
  .option('-t, --token <token>', 'Bot token (or use KOOK_BOT_TOKEN env)')
  .option('--api-base-url <url>', 'REST API base URL (or use KOOK_API_BASE_URL env)')
  .option('--type <type>', 'Message type: 1 text, 9 KMarkdown')
  .option('-q, --quote <msgId>', 'Message ID to quote')
  .action(sendMessage);

// Parse arguments
program.parse();
