import 'dotenv/config';
import { createApp } from './app.js';
import { loadConfig } from '../infrastructure/config.js';
import { createDatabaseWithRetry } from '../infrastructure/db/client.js';
import { errorMessage } from '../domain/errors.js';
import { logger } from '../infrastructure/logger.js';
import { runNotificationCycle } from '../services/dispatcher/index.js';
import { createDependencies } from '../workflows/scripts/shared.js';
import { startDailySchedule } from '../workflows/scheduler.js';

async function main(): Promise<void> {
  const config = loadConfig();
  if (!config.ok) {
    throw new Error(`[${config.error.code}] ${config.error.message}: ${config.error.details ?? ''}`);
  }

  logger.level = config.value.logLevel;

  const db = await createDatabaseWithRetry(config.value.databaseUrl);
  if (!db.ok) {
    throw new Error(`[${db.error.code}] ${db.error.message}`);
  }

  const deps = createDependencies(config.value, db.value);

  const app = createApp({
    ...deps,
    botToken: config.value.telegramBotToken,
    webhookSecret: config.value.telegramWebhookSecret,
  });

  app.listen(config.value.port, () => {
    logger.info({ port: config.value.port }, 'Tariff Tracker API started');
  });

  startDailySchedule(config.value.notifyHour, async () => {
    const summary = await runNotificationCycle(deps, { concurrency: config.value.notifyConcurrency });
    if (!summary.ok) {
      logger.error({ errorCode: summary.error.code }, 'Scheduled notification cycle failed');
    }
  });
}

main().catch((err: unknown) => {
  logger.fatal({ err: errorMessage(err) }, 'Failed to start server');
  process.exit(1);
});
