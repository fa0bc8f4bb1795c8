import { Router, type Request, type Response } from 'express';
import { timingSafeEqual } from 'node:crypto';
import { telegramUpdateSchema } from '../../domain/schemas.js';
import { successResponse, errorResponse, zodDetails } from '../middleware/error-handler.js';
import { handleRateUpdateCallback, type RateUpdateCallbackDeps } from '../../services/rate-update/index.js';
import { logger } from '../../infrastructure/logger.js';

export const WEBHOOK_SECRET_HEADER = 'x-telegram-bot-api-secret-token';

const log = logger.child({ module: 'telegram-webhook' });

export interface TelegramRouterDeps extends RateUpdateCallbackDeps {
  webhookSecret?: string;
}

function secretMatches(expected: string, received: string | undefined): boolean {
  if (received === undefined) return false;
  const a = Buffer.from(expected);
  const b = Buffer.from(received);
  return a.length === b.length && timingSafeEqual(a, b);
}

export function createTelegramRouter(deps: TelegramRouterDeps): Router {
  const router = Router();

  router.post('/telegram/webhook', async (req: Request, res: Response) => {
    if (deps.webhookSecret !== undefined && !secretMatches(deps.webhookSecret, req.get(WEBHOOK_SECRET_HEADER))) {
      log.warn('Webhook call with a wrong secret token');
      res.status(401).json(errorResponse('AUTH_INVALID', 'Invalid webhook secret'));
      return;
    }

    const parsed = telegramUpdateSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(422).json(errorResponse('VALIDATION_ERROR', 'Invalid Telegram update', zodDetails(parsed.error)));
      return;
    }

    const callback = parsed.data.callback_query;
    if (!callback) {
      res.json(successResponse({ handled: false }));
      return;
    }

    const handling = await handleRateUpdateCallback(deps, callback);
    if (!handling.handled) {
      res.json(successResponse({ handled: false }));
      return;
    }

    // Telegram retries non-2xx deliveries; failures were already shown to the user.
    res.json(successResponse({
      handled: true,
      action: handling.action,
      status: handling.result.ok ? handling.result.value.status : 'failed',
    }));
  });

  return router;
}
