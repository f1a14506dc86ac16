/**
 * Helpers shared by the CLI commands
 */

import { setLogService } from '@kookgate/core';
import { ConfigError, createLogService, loadConfig, type AppConfig } from '@kookgate/gateway';

/**
 * Validate the environment and install the root logger.
 * Prints the problem and exits on invalid configuration.
 */
export function resolveConfig(): AppConfig | null {
  let config: AppConfig;
  try {
    config = loadConfig();
  } catch (err) {
    if (err instanceof ConfigError) {
      console.error('❌ Invalid configuration:');
      for (const issue of err.issues) {
        console.error(`   ${issue}`);
      }
      process.exit(1);
      return null;
    }
    throw err;
  }

  setLogService(createLogService(config.log));
  return config;
}

/**
 * Split a comma-separated ID list, dropping blanks
 */
export function parseIdList(value: string | undefined): string[] | undefined {
  if (value === undefined) return undefined;
  const ids = value
    .split(',')
    .map((id) => id.trim())
    .filter(Boolean);
  return ids.length > 0 ? ids : undefined;
}

/**
 * Parse a TCP port option. Returns null when out of range.
 */
export function parsePort(value: string): number | null {
  const port = Number(value);
  return Number.isInteger(port) && port >= 1 && port <= 65_535 ? port : null;
}

/**
 * Run `stop` on the first SIGINT or SIGTERM. Returns a function that
 * removes the handlers.
 */
export function onShutdown(stop: () => Promise<void>): () => void {
  const remove = () => {
    process.off('SIGINT', handler);
    process.off('SIGTERM', handler);
  };
  const handler = () => {
    remove();
    console.log('\n🛑 Shutting down...');
    stop().catch((err: unknown) => {
      console.error('❌ Shutdown failed:', err instanceof Error ? err.message : err);
      process.exit(1);
    });
  };
  process.on('SIGINT', handler);
  process.on('SIGTERM', handler);
  return remove;
}
