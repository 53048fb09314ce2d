import type { Router } from 'express';
import express from 'express';
import type TelegramBot from 'node-telegram-bot-api';
import type { TelegramAdapter } from './TelegramAdapter.js';
import { createLogger, generateCorrelationId } from '../../utils/logger.js';

function isTelegramUpdate(body: unknown): body is TelegramBot.Update {
  return typeof body === 'object' && body !== null && 'update_id' in body && typeof body.update_id === 'number';
}

export function createWebhookRouter(adapter: TelegramAdapter): Router {
  const logger = createLogger({ component: 'webhookRouter' });
  const router = express.Router();

  router.post('/telegram', async (req, res) => {
    const requestLogger = logger.child({ correlationId: generateCorrelationId() });
    const body: unknown = req.body;

    if (!isTelegramUpdate(body)) {
      requestLogger.warn('Ignoring webhook request without update_id');
      res.status(200).json({ ok: true });
      return;
    }

    try {
      requestLogger.info({ updateId: body.update_id }, 'Received webhook update');
      await adapter.handleWebhook(body);
      // Telegram expects 200 OK
      res.status(200).json({ ok: true });
    } catch (error) {
      requestLogger.error({ error }, 'Error processing webhook');
      res.status(500).json({ ok: false, error: 'Internal server error' });
    }
  });

  return router;
}
