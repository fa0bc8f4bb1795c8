import 'dotenv/config';
import { main } from '../src/workflows/scripts/notify-users.js';
import { errorMessage } from '../src/domain/errors.js';
import { logger } from '../src/infrastructure/logger.js';

try {
  const summary = await main();
  logger.info(summary, 'Notification run complete');
} catch (error) {
  logger.error({ error: errorMessage(error), step: 'notify' }, 'Notification run failed');
  process.exitCode = 1;
}
