import type { NotifierPort } from '../../ports/NotifierPort.js';
import { createLogger } from '../../utils/logger.js';

export class DisabledNotifier implements NotifierPort {
  private readonly logger = createLogger({ adapter: 'DisabledNotifier' });

  async sendMessage(chatId: string, text: string): Promise<void> {
    this.logger.debug({ chatId, textLength: text.length }, 'Telegram disabled; message dropped');
  }

  async notifyAdmins(text: string): Promise<void> {
    this.logger.info({ text }, 'Telegram disabled; admin notification dropped');
  }
}
