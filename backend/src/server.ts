/**
 * Share Relay - Backend Server
 *
 * Express server receiving Telegram webhook updates. Integrates with SQL
 * Server (share index), Redis (upload sessions, optional) and the Bot API.
 *
 * @module server
 */

import { createServer } from 'http';
import { env, printConfig, requireTelegramConfig, validateRequiredSecrets } from '@/infrastructure/config/environment';
import { initDatabase, ensureSchema, closeDatabase, checkDatabaseHealth } from '@/infrastructure/database';
import { initRedis, closeRedis, checkRedisHealth, isRedisConfigured } from '@/infrastructure/redis';
import { TelegramClient } from '@/infrastructure/telegram';
import { MssqlShareRepository } from '@/domains/shares';
import { logger } from '@/shared/utils/logger';
import { createContainer, type RelayContainer } from '@/bootstrap/container';
import { createApp } from '@/app';
import type { HealthCheck } from '@/routes/health';

const WEBHOOK_PATH = '/api/telegram/webhook';

let container: RelayContainer | null = null;
const httpServer = createServer();

async function resolveBotUsername(client: TelegramClient): Promise<string> {
  if (env.BOT_USERNAME) {
    return env.BOT_USERNAME;
  }
  const me = await client.getMe();
  if (!me.username) {
    throw new Error('Bot has no username; set BOT_USERNAME');
  }
  return me.username;
}

/**
 * Start the server
 */
async function startServer(): Promise<void> {
  try {
    validateRequiredSecrets();
    printConfig();
    const telegram = requireTelegramConfig();

    await initDatabase();
    await ensureSchema();

    const redis = isRedisConfigured() ? await initRedis() : null;

    const client = new TelegramClient({ botToken: telegram.botToken, baseUrl: env.TELEGRAM_API_BASE_URL });
    const botUsername = await resolveBotUsername(client);

    const relay = createContainer(
      client,
      {
        botUsername,
        storageChatId: telegram.privateChannelId,
        requiredGroupId: telegram.requiredGroupId,
        groupInviteLink: telegram.groupInviteLink,
        pageSize: env.FILES_PER_PAGE,
        debounceMs: env.MEDIA_GROUP_DEBOUNCE_MS,
        settleDelayMs: env.PANEL_SETTLE_DELAY_MS,
      },
      { redis, shareRepository: new MssqlShareRepository() }
    );
    container = relay;

    const healthChecks: Record<string, HealthCheck> = { database: checkDatabaseHealth };
    if (redis) {
      healthChecks.redis = checkRedisHealth;
    }

    httpServer.on(
      'request',
      createApp({
        onUpdate: (update) => relay.queue.enqueue(update),
        webhookSecret: env.WEBHOOK_SECRET,
        healthChecks,
      })
    );

    await new Promise<void>((resolve) => {
      httpServer.listen(env.PORT, resolve);
    });
    logger.info({ port: env.PORT, botUsername }, 'Server running');

    if (env.WEBHOOK_URL) {
      await client.setWebhook(`${env.WEBHOOK_URL.replace(/\/+$/, '')}${WEBHOOK_PATH}`, env.WEBHOOK_SECRET);
    } else {
      logger.warn('WEBHOOK_URL not set, updates are only received if the webhook was registered elsewhere');
    }
  } catch (error) {
    logger.fatal({ err: error }, 'Failed to start server');
    process.exit(1);
  }
}

/**
 * Graceful shutdown
 *
 * Albums still inside their debounce window are dropped.
 */
async function gracefulShutdown(signal: string): Promise<void> {
  logger.warn({ signal }, 'Shutting down gracefully');

  try {
    await new Promise<void>((resolve) => {
      httpServer.close(() => resolve());
    });

    if (container) {
      await container.shutdown();
    }

    await closeDatabase();
    await closeRedis();

    logger.info('All connections closed, exiting');
    process.exit(0);
  } catch (error) {
    logger.error({ err: error }, 'Error during graceful shutdown');
    process.exit(1);
  }
}

process.on('uncaughtException', (error: Error) => {
  logger.fatal({ err: error }, 'Uncaught exception');
  void gracefulShutdown('UNCAUGHT_EXCEPTION');
});

process.on('unhandledRejection', (reason: unknown) => {
  logger.fatal({ err: reason }, 'Unhandled rejection');
  void gracefulShutdown('UNHANDLED_REJECTION');
});

process.on('SIGTERM', () => void gracefulShutdown('SIGTERM'));
process.on('SIGINT', () => void gracefulShutdown('SIGINT'));

void startServer();
