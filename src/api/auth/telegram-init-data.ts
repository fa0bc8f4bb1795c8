import { createHmac, timingSafeEqual } from 'node:crypto';
import type { Request } from 'express';
import { ok, err, type Result } from '../../domain/result.js';
import { createAppError, type AppError } from '../../domain/errors.js';
import { telegramAuthUserSchema, type TelegramAuthUser } from '../../domain/schemas.js';

export const INIT_DATA_HEADER = 'x-telegram-init-data';
export const MAX_AUTH_AGE_SECONDS = 86_400;

function invalid(message: string): Result<never, AppError> {
  return err(createAppError('AUTH_INVALID', message, false));
}

export function dataCheckString(params: URLSearchParams): string {
  return [...params.entries()]
    .filter(([key]) => key !== 'hash')
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([key, value]) => `${key}=${value}`)
    .join('\n');
}

export function signInitData(params: URLSearchParams, botToken: string): string {
  const secret = createHmac('sha256', 'WebAppData').update(botToken).digest();
  return createHmac('sha256', secret).update(dataCheckString(params)).digest('hex');
}

/**
 * Verifies Telegram Web App init data and returns the user it was issued for.
 * See https://core.telegram.org/bots/webapps#validating-data-received-via-the-mini-app
 */
export function validateInitData(
  initData: string,
  botToken: string,
  nowMs: number = Date.now(),
): Result<TelegramAuthUser, AppError> {
  const params = new URLSearchParams(initData);

  const hash = params.get('hash');
  if (!hash) return invalid('Init data has no hash');

  const expected = Buffer.from(signInitData(params, botToken), 'hex');
  const received = Buffer.from(hash, 'hex');
  if (expected.length !== received.length || !timingSafeEqual(expected, received)) {
    return invalid('Init data signature mismatch');
  }

  const authDate = Number(params.get('auth_date'));
  if (!Number.isInteger(authDate) || authDate <= 0) {
    return invalid('Init data has no valid auth_date');
  }
  if (nowMs / 1000 - authDate > MAX_AUTH_AGE_SECONDS) {
    return invalid('Init data expired');
  }

  const rawUser = params.get('user');
  if (!rawUser) return invalid('Init data has no user');

  let userJson: unknown;
  try {
    userJson = JSON.parse(rawUser);
  } catch {
    return invalid('Init data user is not valid JSON');
  }

  const user = telegramAuthUserSchema.safeParse(userJson);
  if (!user.success) return invalid('Init data user has no id');

  return ok(user.data);
}

export function authenticateRequest(
  req: Request,
  botToken: string,
): Result<TelegramAuthUser, AppError> {
  const initData = req.get(INIT_DATA_HEADER);
  if (!initData) return invalid('Missing X-Telegram-Init-Data header');
  return validateInitData(initData, botToken);
}
