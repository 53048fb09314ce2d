import cron from 'node-cron';
import { createLogger } from '../utils/logger.js';
import { ConfigError } from '../utils/errors.js';
import type { ScheduleRefreshJob } from './ScheduleRefreshJob.js';

const logger = createLogger({ component: 'scheduler' });

export function scheduleRefresh(job: ScheduleRefreshJob, cronExpression: string, timezone: string): cron.ScheduledTask {
  if (!cron.validate(cronExpression)) {
    throw new ConfigError(`Invalid SCHEDULE_REFRESH_CRON expression: ${cronExpression}`);
  }

  logger.info({ cronExpression, timezone }, 'Scheduling calendar refresh job');

  return cron.schedule(
    cronExpression,
    () => {
      job.run().catch((error: unknown) => {
        logger.error({ error }, 'Calendar refresh job failed');
      });
    },
    { timezone }
  );
}
