/**
 * Telegram webhook endpoint
 *
 * Endpoint: POST /api/telegram/webhook
 *
 * The update is acknowledged with 200 right away and handled in the
 * background; the Bot API retries deliveries that are not acknowledged.
 */

import { timingSafeEqual } from 'node:crypto';
import { Router, type Request, type Response } from 'express';
import { ErrorCode } from '@relayshare/shared';
import { createChildLogger } from '@/shared/utils/logger';
import { sendError } from '@/shared/utils/error-response';
import { telegramUpdateSchema, type TelegramUpdate } from '@/infrastructure/telegram';

const logger = createChildLogger({ service: 'TelegramWebhookRoutes' });

export const SECRET_HEADER = 'x-telegram-bot-api-secret-token';

export interface TelegramWebhookRouterOptions {
  /** Checked against the secret header when set */
  secretToken?: string;
  onUpdate: (update: TelegramUpdate) => Promise<void>;
}

function secretMatches(expected: string, received: string | undefined): boolean {
  if (received === undefined) {
    return false;
  }
  const a = Buffer.from(expected);
  const b = Buffer.from(received);
  return a.length === b.length && timingSafeEqual(a, b);
}

export function createTelegramWebhookRouter(options: TelegramWebhookRouterOptions): Router {
  const router = Router();

  router.post('/webhook', (req: Request, res: Response) => {
    if (options.secretToken !== undefined && !secretMatches(options.secretToken, req.get(SECRET_HEADER))) {
      logger.warn({ ip: req.ip }, 'Webhook call with invalid secret token');
      sendError(res, ErrorCode.UNAUTHORIZED, 'Invalid webhook secret');
      return;
    }

    const parsed = telegramUpdateSchema.safeParse(req.body);
    if (!parsed.success) {
      logger.warn({ issues: parsed.error.issues.length }, 'Malformed update rejected');
      sendError(res, ErrorCode.VALIDATION_ERROR, 'Malformed update', {
        issue: parsed.error.issues[0]?.message ?? 'invalid',
      });
      return;
    }

    res.status(200).json({ ok: true });

    options.onUpdate(parsed.data).catch((error: unknown) => {
      logger.error({ err: error, updateId: parsed.data.update_id }, 'Update processing failed');
    });
  });

  return router;
}
