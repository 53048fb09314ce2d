import type { ScheduleService } from '../core/schedule/ScheduleService.js';
import type { NotifierPort } from '../ports/NotifierPort.js';
import { createLogger } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';

/**
 * Re-reads the calendar so Mini App requests hit a warm cache.
 * Admins hear about the first failure of a streak and about the recovery, not every retry.
 */
export class ScheduleRefreshJob {
  private readonly logger = createLogger({ job: 'ScheduleRefreshJob' });
  private failing = false;

  constructor(
    private readonly schedule: ScheduleService,
    private readonly notifier: NotifierPort
  ) {}

  async run(): Promise<void> {
    const logger = this.logger.child({ method: 'run' });
    try {
      const events = await this.schedule.refreshEvents();
      logger.info({ events: events.length }, 'Scheduled refresh completed');
      if (this.failing) {
        this.failing = false;
        await this.notifier.notifyAdmins(`✅ Календарь снова доступен (${events.length} событий).`);
      }
    } catch (error) {
      logger.error({ error }, 'Scheduled refresh failed');
      if (!this.failing) {
        this.failing = true;
        await this.notifier.notifyAdmins(`⚠️ Не удалось обновить календарь: ${errorMessage(error)}`);
      }
    }
  }

  isFailing(): boolean {
    return this.failing;
  }
}
