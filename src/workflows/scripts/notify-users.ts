import { loadConfig } from '../../infrastructure/config.js';
import { createDatabaseWithRetry } from '../../infrastructure/db/client.js';
import { logger } from '../../infrastructure/logger.js';
import { runNotificationCycle, type CycleSummary } from '../../services/dispatcher/index.js';
import { createDependencies } from './shared.js';

const log = logger.child({ module: 'script:notify-users' });

export async function main(): Promise<CycleSummary> {
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
  const summary = await runNotificationCycle(deps, { concurrency: config.value.notifyConcurrency });
  if (!summary.ok) {
    log.error({ errorCode: summary.error.code, retryable: summary.error.retryable }, 'Notification run failed');
    throw new Error(`[${summary.error.code}] ${summary.error.message}`);
  }

  return summary.value;
}
