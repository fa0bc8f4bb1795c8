import { z } from 'zod';
import { ok, err, type Result } from '../domain/result.js';
import { createAppError, type AppError } from '../domain/errors.js';

const configSchema = z.object({
  DATABASE_URL: z.string().min(1),
  TELEGRAM_BOT_TOKEN: z.string().min(1),
  TELEGRAM_WEBHOOK_SECRET: z.string().min(1).optional(),
  PORT: z.coerce.number().int().positive().default(3000),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  NOTIFY_HOUR: z.coerce.number().int().min(0).max(23).default(10),
  NOTIFY_CONCURRENCY: z.coerce.number().int().min(1).max(30).default(10),
  TELEGRAM_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
});

export interface AppConfig {
  databaseUrl: string;
  telegramBotToken: string;
  telegramWebhookSecret?: string;
  port: number;
  logLevel: string;
  notifyHour: number;
  notifyConcurrency: number;
  telegramTimeoutMs: number;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Result<AppConfig, AppError> {
  // Empty strings from .env files count as unset.
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== ''),
  );

  const parsed = configSchema.safeParse(present);
  if (!parsed.success) {
    const details = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    return err(createAppError('CONFIG_INVALID', 'Invalid configuration', false, details));
  }

  const values = parsed.data;
  return ok({
    databaseUrl: values.DATABASE_URL,
    telegramBotToken: values.TELEGRAM_BOT_TOKEN,
    ...(values.TELEGRAM_WEBHOOK_SECRET !== undefined && { telegramWebhookSecret: values.TELEGRAM_WEBHOOK_SECRET }),
    port: values.PORT,
    logLevel: values.LOG_LEVEL,
    notifyHour: values.NOTIFY_HOUR,
    notifyConcurrency: values.NOTIFY_CONCURRENCY,
    telegramTimeoutMs: values.TELEGRAM_TIMEOUT_MS,
  });
}
