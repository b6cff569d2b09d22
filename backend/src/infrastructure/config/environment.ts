/**
 * Environment Configuration
 *
 * Loads and validates environment variables.
 *
 * @module infrastructure/config/environment
 */

import dotenv from 'dotenv';
import { z } from 'zod';
import { RELAY_CONFIG } from '@relayshare/shared';

// Load .env file (override: false preserves existing env vars for testing)
dotenv.config({ override: false });

const positiveInt = (fallback: number) =>
  z.string().default(String(fallback)).transform(Number).pipe(z.number().int().positive());

const nonNegativeInt = (fallback: number) =>
  z.string().default(String(fallback)).transform(Number).pipe(z.number().int().nonnegative());

/**
 * Environment variables schema for validation
 */
const envSchema = z.object({
  // Server
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.string().default('3001').transform(Number).pipe(z.number().min(1000).max(65535)),

  // Logging
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).default('info'),

  // Telegram Bot API
  BOT_TOKEN: z.string().optional(),
  BOT_USERNAME: z.string().optional(),
  TELEGRAM_API_BASE_URL: z.string().url().default('https://api.telegram.org'),
  WEBHOOK_URL: z.string().url().optional(),
  WEBHOOK_SECRET: z.string().optional(),

  // Private channel holding relayed files
  PRIVATE_CHANNEL_ID: z.string().optional(),

  // Membership gate
  REQUIRED_GROUP_ID: z.string().optional(),
  GROUP_INVITE_LINK: z.string().url().optional(),

  // Database
  DATABASE_SERVER: z.string().optional(),
  DATABASE_NAME: z.string().optional(),
  DATABASE_USER: z.string().optional(),
  DATABASE_PASSWORD: z.string().optional(),
  DATABASE_POOL_MAX: positiveInt(10),

  // Redis (optional: upload sessions fall back to process memory without it)
  REDIS_HOST: z.string().optional(),
  REDIS_PORT: z.string().transform(Number).pipe(z.number()).optional(),
  REDIS_PASSWORD: z.string().optional(),

  // Relay behaviour
  FILES_PER_PAGE: positiveInt(RELAY_CONFIG.FILES_PER_PAGE),
  MEDIA_GROUP_DEBOUNCE_MS: nonNegativeInt(RELAY_CONFIG.MEDIA_GROUP_DEBOUNCE_MS),
  PANEL_SETTLE_DELAY_MS: nonNegativeInt(RELAY_CONFIG.PANEL_SETTLE_DELAY_MS),
});

export type EnvConfig = z.infer<typeof envSchema>;

/**
 * Parse and validate environment variables
 */
const parsedEnv = envSchema.safeParse(process.env);

if (!parsedEnv.success) {
  console.error('❌ Invalid environment variables:', parsedEnv.error.flatten().fieldErrors);
  throw new Error('Invalid environment variables');
}

/**
 * Typed environment configuration
 */
export const env = parsedEnv.data;

export const isProd = env.NODE_ENV === 'production';

export const isDev = env.NODE_ENV === 'development';

export const isTest = env.NODE_ENV === 'test';

/**
 * Settings the bot cannot run without
 */
const REQUIRED_SECRETS = [
  'BOT_TOKEN',
  'PRIVATE_CHANNEL_ID',
  'REQUIRED_GROUP_ID',
  'GROUP_INVITE_LINK',
  'DATABASE_SERVER',
  'DATABASE_NAME',
  'DATABASE_USER',
  'DATABASE_PASSWORD',
] as const;

/**
 * Validate that required secrets are present
 *
 * Throws in production; warns in development.
 */
export function validateRequiredSecrets(source: Partial<Record<string, unknown>> = env): void {
  const missing = REQUIRED_SECRETS.filter((key) => !source[key]);

  if (missing.length > 0 && isProd) {
    throw new Error(`Missing required secrets: ${missing.join(', ')}`);
  }

  if (missing.length > 0 && isDev) {
    console.warn(`⚠️  Warning: Missing secrets in development: ${missing.join(', ')}`);
  }
}

/**
 * Telegram settings, narrowed to present values
 *
 * @throws Error if any Telegram setting is missing
 */
export function requireTelegramConfig(): {
  botToken: string;
  privateChannelId: string;
  requiredGroupId: string;
  groupInviteLink: string;
} {
  const { BOT_TOKEN, PRIVATE_CHANNEL_ID, REQUIRED_GROUP_ID, GROUP_INVITE_LINK } = env;
  if (!BOT_TOKEN || !PRIVATE_CHANNEL_ID || !REQUIRED_GROUP_ID || !GROUP_INVITE_LINK) {
    throw new Error(
      'Telegram configuration is incomplete. Provide BOT_TOKEN, PRIVATE_CHANNEL_ID, REQUIRED_GROUP_ID and GROUP_INVITE_LINK.'
    );
  }
  return {
    botToken: BOT_TOKEN,
    privateChannelId: PRIVATE_CHANNEL_ID,
    requiredGroupId: REQUIRED_GROUP_ID,
    groupInviteLink: GROUP_INVITE_LINK,
  };
}

/**
 * Print configuration summary (without sensitive data)
 */
export function printConfig(): void {
  console.log('📋 Configuration:');
  console.log(`   Environment: ${env.NODE_ENV}`);
  console.log(`   Port: ${env.PORT}`);
  console.log(`   Log Level: ${env.LOG_LEVEL}`);
  console.log(`   Webhook: ${env.WEBHOOK_URL ?? 'not configured'}`);
  console.log(`   Session store: ${env.REDIS_HOST ? 'redis' : 'memory'}`);
  console.log(`   Files per page: ${env.FILES_PER_PAGE}`);
  console.log(`   Media group debounce: ${env.MEDIA_GROUP_DEBOUNCE_MS}ms`);
  console.log(`   Panel settle delay: ${env.PANEL_SETTLE_DELAY_MS}ms`);
}
