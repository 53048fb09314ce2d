import { z } from 'zod';
import { ConfigError } from '../utils/errors.js';

const csvList = z
  .string()
  .optional()
  .transform((value) =>
    (value ?? '')
      .split(',')
      .map((item) => item.trim())
      .filter((item) => item.length > 0)
  );

const configSchema = z.object({
  // Telegram
  telegramBotToken: z.string().min(1).optional(), // Optional: without it the bot is off and initData is not verified
  telegramWebhookUrl: z.string().url().optional(), // Optional: if not set, uses polling
  webAppUrl: z.string().url().default('https://localhost:8001'),
  adminIds: csvList.pipe(z.array(z.string().regex(/^-?\d+$/, 'admin id must be a numeric chat id'))),

  // Google Sheets
  spreadsheetUrl: z.string().min(1).optional(),
  googleCredentialsPath: z.string().default('credentials.json'),
  worksheetName: z.string().default('календарь new'),
  calendarCsvPath: z.string().optional(), // Read the calendar from a CSV export instead of Sheets

  // Schedule
  scheduleYear: z.coerce.number().int().min(2000).max(2100).default(2025),
  scheduleCacheTtlSeconds: z.coerce.number().int().nonnegative().default(600),
  scheduleRefreshCron: z.string().default('*/30 * * * *'),
  timezone: z.string().default('Europe/Moscow'),

  // App
  databasePath: z.string().optional(),
  corsOrigins: csvList,
  logLevel: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
  host: z.string().default('127.0.0.1'),
  port: z.coerce.number().int().positive().default(8001),
});

export type Config = z.infer<typeof configSchema>;
/** Raw values keyed like {@link Config}, before coercion and defaults. */
export type RawConfig = Partial<Record<keyof Config, string | undefined>>;

export function parseConfig(raw: RawConfig): Config {
  const result = configSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Configuration validation failed:\n${issues.join('\n')}`);
  }
  return result.data;
}

export function loadConfig(source: NodeJS.ProcessEnv = process.env): Config {
  // Helper to convert empty strings to undefined
  const env = (key: string): string | undefined => {
    const value = source[key];
    return value === '' ? undefined : value;
  };

  return parseConfig({
    telegramBotToken: env('TELEGRAM_BOT_TOKEN'),
    telegramWebhookUrl: env('TELEGRAM_WEBHOOK_URL'),
    webAppUrl: env('WEBAPP_URL'),
    adminIds: env('ADMIN_IDS'),
    spreadsheetUrl: env('SPREADSHEET_URL'),
    googleCredentialsPath: env('GOOGLE_CREDENTIALS_PATH'),
    worksheetName: env('WORKSHEET_NAME'),
    calendarCsvPath: env('CALENDAR_CSV_PATH'),
    scheduleYear: env('SCHEDULE_YEAR'),
    scheduleCacheTtlSeconds: env('SCHEDULE_CACHE_TTL_SECONDS'),
    scheduleRefreshCron: env('SCHEDULE_REFRESH_CRON'),
    timezone: env('TIMEZONE'),
    databasePath: env('DATABASE_PATH'),
    corsOrigins: env('CORS_ORIGINS'),
    logLevel: env('LOG_LEVEL'),
    host: env('HOST'),
    port: env('PORT'),
  });
}
