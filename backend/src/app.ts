/**
 * Express application
 *
 * @module app
 */

import express, { type NextFunction, type Request, type Response } from 'express';
import { ErrorCode } from '@relayshare/shared';
import { createChildLogger } from '@/shared/utils/logger';
import { sendError, sendInternalError } from '@/shared/utils/error-response';
import type { TelegramUpdate } from '@/infrastructure/telegram';
import { httpLogger } from '@/middleware/logging';
import { createTelegramWebhookRouter } from '@/routes/telegram-webhook';
import { createHealthRouter, type HealthCheck } from '@/routes/health';

const logger = createChildLogger({ service: 'App' });

export interface AppOptions {
  onUpdate: (update: TelegramUpdate) => Promise<void>;
  webhookSecret?: string;
  healthChecks?: Record<string, HealthCheck>;
  /** pino-http request logging; off in tests */
  requestLogging?: boolean;
}

export function createApp(options: AppOptions): express.Express {
  const app = express();

  app.disable('x-powered-by');
  if (options.requestLogging ?? true) {
    app.use(httpLogger);
  }
  app.use(express.json({ limit: '1mb' }));

  app.use('/health', createHealthRouter(options.healthChecks ?? {}));
  app.use(
    '/api/telegram',
    createTelegramWebhookRouter({ secretToken: options.webhookSecret, onUpdate: options.onUpdate })
  );

  app.use((_req: Request, res: Response) => {
    sendError(res, ErrorCode.NOT_FOUND);
  });

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof SyntaxError) {
      sendError(res, ErrorCode.BAD_REQUEST, 'Request body is not valid JSON');
      return;
    }
    logger.error({ err }, 'Unhandled request error');
    sendInternalError(res);
  });

  return app;
}
