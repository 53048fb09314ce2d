import TelegramBot from 'node-telegram-bot-api';
import type { NotifierPort } from '../../ports/NotifierPort.js';
import type { Config } from '../../config/index.js';
import type { ScheduleService } from '../../core/schedule/ScheduleService.js';
import { escapeHtml, formatDayEvents, todayInTimezone } from '../../core/schedule/formatSchedule.js';
import { createLogger } from '../../utils/logger.js';
import { TelegramError } from '../../utils/errors.js';

type TelegramAdapterConfig = Pick<
  Config,
  'telegramWebhookUrl' | 'webAppUrl' | 'adminIds' | 'timezone'
> & { telegramBotToken: string };

export const START_TEXT = '<b>Привет!</b> Жми кнопку – откроется Mini App.';
export const OPEN_APP_BUTTON = '🚀 Открыть Mini App';

export class TelegramAdapter implements NotifierPort {
  private readonly logger = createLogger({ adapter: 'TelegramAdapter' });
  private readonly bot: TelegramBot;

  constructor(
    private readonly config: TelegramAdapterConfig,
    private readonly schedule: ScheduleService
  ) {
    // Use polling if no webhook URL is set, otherwise webhook mode
    const options: TelegramBot.ConstructorOptions = config.telegramWebhookUrl
      ? { webHook: false } // Will set webhook manually
      : { polling: { interval: 300, autoStart: false } };
    this.bot = new TelegramBot(config.telegramBotToken, options);
  }

  async initialize(): Promise<void> {
    const logger = this.logger.child({ method: 'initialize' });
    logger.info('Initializing Telegram bot adapter');

    try {
      const me = await this.bot.getMe();
      logger.info({ botId: me.id, botUsername: me.username }, 'Telegram bot verified');

      this.setupMessageHandlers();

      if (this.config.telegramWebhookUrl) {
        await this.setupWebhook(this.config.telegramWebhookUrl);
      } else {
        logger.info('No webhook URL configured, using polling mode');
        await this.bot.startPolling();
      }
    } catch (error) {
      logger.error({ error }, 'Failed to initialize Telegram adapter');
      throw new TelegramError('Failed to initialize Telegram adapter', { cause: error });
    }
  }

  async shutdown(): Promise<void> {
    if (this.bot.isPolling()) {
      await this.bot.stopPolling();
    }
  }

  private setupMessageHandlers(): void {
    this.bot.on('message', (msg: TelegramBot.Message) => {
      this.handleMessage(msg).catch((error: unknown) => {
        this.logger.error({ error, chatId: msg.chat.id }, 'Error processing message');
      });
    });

    this.bot.on('error', (error: Error) => {
      this.logger.error({ error }, 'Telegram bot error');
    });

    // Network blips and 409s while another poller is active are transient; polling retries by itself
    this.bot.on('polling_error', (error: Error) => {
      this.logger.warn({ err: error }, 'Telegram polling error');
    });
  }

  private async setupWebhook(webhookUrl: string): Promise<void> {
    const logger = this.logger.child({ method: 'setupWebhook' });
    try {
      await this.bot.setWebHook(webhookUrl);
      logger.info({ webhookUrl }, 'Webhook set successfully');
    } catch (error) {
      // Keep running: the HTTP server still accepts updates once the URL is reachable
      logger.error({ error, webhookUrl }, 'Failed to set webhook');
    }
  }

  /** Entry point for `POST /webhook/telegram`. */
  async handleWebhook(update: TelegramBot.Update): Promise<void> {
    const logger = this.logger.child({ method: 'handleWebhook', updateId: update.update_id });
    if (!update.message) {
      logger.debug('Webhook update does not contain a message');
      return;
    }
    await this.handleMessage(update.message);
  }

  async handleMessage(msg: TelegramBot.Message): Promise<void> {
    const chatId = msg.chat.id.toString();
    const logger = this.logger.child({ method: 'handleMessage', chatId });

    if (msg.web_app_data) {
      logger.info({ buttonText: msg.web_app_data.button_text }, 'Received Mini App data');
      await this.sendMessage(
        chatId,
        `⛳ Получены данные из Mini App: <code>${escapeHtml(msg.web_app_data.data)}</code>`
      );
      return;
    }

    const command = parseCommand(msg.text);
    switch (command) {
      case 'start':
        await this.sendMessage(chatId, START_TEXT, {
          reply_markup: {
            keyboard: [[{ text: OPEN_APP_BUTTON, web_app: { url: this.config.webAppUrl } }]],
            resize_keyboard: true,
          },
        });
        return;
      case 'today': {
        const date = todayInTimezone(this.config.timezone);
        const events = await this.schedule.getEventsForDay(date);
        await this.sendMessage(chatId, formatDayEvents(date, events));
        return;
      }
      default:
        logger.debug({ text: msg.text }, 'Ignoring message');
    }
  }

  async sendMessage(chatId: string, text: string, options: TelegramBot.SendMessageOptions = {}): Promise<void> {
    const logger = this.logger.child({ method: 'sendMessage', chatId });
    try {
      const id = Number.parseInt(chatId, 10);
      if (Number.isNaN(id)) {
        throw new Error(`Invalid chat ID: ${chatId}`);
      }
      const sent = await this.bot.sendMessage(id, text, { parse_mode: 'HTML', ...options });
      logger.info({ messageId: sent.message_id, textLength: text.length }, 'Message sent');
    } catch (error) {
      logger.error({ error }, 'Failed to send message');
      throw new TelegramError('Failed to send message', { cause: error });
    }
  }

  async notifyAdmins(text: string): Promise<void> {
    for (const adminId of this.config.adminIds) {
      try {
        await this.sendMessage(adminId, text);
      } catch (error) {
        this.logger.warn({ error, adminId }, 'Admin notification failed');
      }
    }
  }
}

/** "/start", "/start@my_bot payload" → "start"; anything else → null. */
export function parseCommand(text: string | undefined): string | null {
  const match = /^\/([a-z_]+)(?:@\w+)?(?:\s|$)/i.exec(text?.trim() ?? '');
  return match?.[1] ? match[1].toLowerCase() : null;
}
