// Load environment variables first
import 'dotenv/config';

import { loadConfig } from './config/index.js';
import { createLogger } from './utils/logger.js';
import { GridParser } from './core/calendar/GridParser.js';
import { ScheduleService } from './core/schedule/ScheduleService.js';
import { createGridSource } from './adapters/sheets/createGridSource.js';
import { TelegramAdapter } from './adapters/telegram/TelegramAdapter.js';
import { DisabledNotifier } from './adapters/telegram/DisabledNotifier.js';
import { getDatabase, closeDatabase } from './persistence/database.js';
import { UserProfileRepository } from './persistence/repositories/UserProfileRepository.js';
import { ScheduleRefreshJob } from './scheduler/ScheduleRefreshJob.js';
import { scheduleRefresh } from './scheduler/index.js';
import { createApp, startServer } from './server.js';

const logger = createLogger({ component: 'index' });

async function main(): Promise<void> {
  logger.info('Starting schedule Mini App backend');

  try {
    const config = loadConfig();

    const source = createGridSource(config);
    const parser = new GridParser({ year: config.scheduleYear });
    const schedule = new ScheduleService(source, parser, { ttlSeconds: config.scheduleCacheTtlSeconds });
    const users = new UserProfileRepository(getDatabase(config.databasePath));

    const telegram = config.telegramBotToken
      ? new TelegramAdapter({ ...config, telegramBotToken: config.telegramBotToken }, schedule)
      : undefined;
    if (telegram) {
      await telegram.initialize();
    } else {
      logger.warn('TELEGRAM_BOT_TOKEN not set; bot disabled');
    }
    const notifier = telegram ?? new DisabledNotifier();

    const refreshJob = new ScheduleRefreshJob(schedule, notifier);
    const task = scheduleRefresh(refreshJob, config.scheduleRefreshCron, config.timezone);

    const app = createApp({
      schedule,
      users,
      telegram,
      botToken: config.telegramBotToken,
      corsOrigins: config.corsOrigins,
    });
    const server = await startServer(app, config.port, config.host);
    logger.info({ host: config.host, port: config.port, source: source.describe() }, 'Server started successfully');

    await notifier.notifyAdmins('🤖 Бот и API сервер запущены!');
    // Warm the cache; a failure here is reported to admins and retried by the cron job
    await refreshJob.run();

    const shutdown = (signal: string): void => {
      logger.info({ signal }, 'Shutting down');
      task.stop();
      server.close();
      closeDatabase();
      void (telegram?.shutdown() ?? Promise.resolve())
        .catch((error: unknown) => logger.error({ error }, 'Failed to stop Telegram polling'))
        .finally(() => process.exit(0));
    };
    process.once('SIGINT', shutdown);
    process.once('SIGTERM', shutdown);
  } catch (error) {
    logger.error({ error }, 'Failed to start application');
    process.exit(1);
  }
}

main().catch((error) => {
  console.error('Unhandled error:', error);
  process.exit(1);
});
