import { Cron } from 'croner';
import { errorMessage } from '../domain/errors.js';
import { logger } from '../infrastructure/logger.js';

const log = logger.child({ module: 'scheduler' });

export function dailyPattern(hour: number): string {
  return `0 ${hour} * * *`;
}

/**
 * Runs `task` every day at `hour`:00 local time. A run that is still going when
 * the next one is due is skipped; a failed run is logged and the schedule stays.
 */
export function startDailySchedule(hour: number, task: () => Promise<void>): Cron {
  const job = new Cron(dailyPattern(hour), { name: 'notification-cycle', protect: true }, async () => {
    try {
      await task();
    } catch (error) {
      log.error({ error: errorMessage(error) }, 'Scheduled run failed');
    }
    log.info({ nextRun: job.nextRun()?.toISOString() }, 'Next notification run scheduled');
  });

  log.info({ hour, nextRun: job.nextRun()?.toISOString() }, 'Daily notification run scheduled');
  return job;
}
