/**
 * Environment configuration
 *
 * Values come from process.env, optionally seeded from a .env file, and are
 * validated with zod before anything starts.
 */

import { existsSync } from 'node:fs';
import { resolve } from 'node:path';
import { config as loadDotenv } from 'dotenv';
import { z } from 'zod';
import type { LogLevel } from '@kookgate/core';
import type { GatewayConfig } from '../types/index.js';
import {
  BODY_SIZE_LIMIT_BYTES,
  WEBHOOK_DEDUP_CAPACITY,
  WEBHOOK_HOST,
  WEBHOOK_PATH,
  WEBHOOK_PORT,
} from './defaults.js';

const flag = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

const envSchema = z.object({
  KOOK_BOT_TOKEN: z.string().min(1).optional(),
  KOOK_API_BASE_URL: z.string().url().optional(),
  KOOK_COMPRESS: flag.default('true'),
  KOOK_VERIFY_TOKEN: z.string().default(''),
  WEBHOOK_HOST: z.string().min(1).default(WEBHOOK_HOST),
  WEBHOOK_PORT: z.coerce.number().int().min(1).max(65_535).default(WEBHOOK_PORT),
  WEBHOOK_PATH: z
    .string()
    .transform((value) => value.replace(/^\/+|\/+$/g, ''))
    .pipe(z.string().regex(/^[\w.~/-]+$/, 'must be a URL path'))
    .default(WEBHOOK_PATH),
  WEBHOOK_DECOMPRESS: flag.default('true'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  LOG_JSON: flag.optional(),
});

export interface KookSettings {
  botToken?: string;
  apiBaseUrl?: string;
  compress: boolean;
}

export interface LogSettings {
  level: LogLevel;
  json?: boolean;
}

export interface AppConfig {
  kook: KookSettings;
  webhook: GatewayConfig;
  log: LogSettings;
}

/**
 * Invalid or missing environment values
 */
export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
  }
}

/**
 * Validate the environment into typed settings.
 * Empty strings count as unset.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== '')
  );
  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }
  const values = parsed.data;

  return {
    kook: {
      botToken: values.KOOK_BOT_TOKEN,
      apiBaseUrl: values.KOOK_API_BASE_URL,
      compress: values.KOOK_COMPRESS,
    },
    webhook: {
      host: values.WEBHOOK_HOST,
      port: values.WEBHOOK_PORT,
      webhookPath: values.WEBHOOK_PATH,
      verifyToken: values.KOOK_VERIFY_TOKEN,
      decompress: values.WEBHOOK_DECOMPRESS,
      dedupCapacity: WEBHOOK_DEDUP_CAPACITY,
      bodyLimitBytes: BODY_SIZE_LIMIT_BYTES,
    },
    log: {
      level: values.LOG_LEVEL,
      json: values.LOG_JSON,
    },
  };
}

/**
 * Load the first .env file found into process.env.
 * Variables already set in the environment win.
 */
export function loadEnvFile(candidates: string[] = [resolve(process.cwd(), '.env')]): string | null {
  for (const envPath of candidates) {
    if (existsSync(envPath)) {
      loadDotenv({ path: envPath });
      return envPath;
    }
  }
  return null;
}
