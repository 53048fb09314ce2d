import express, { type Router } from 'express';
import { z } from 'zod';
import type { UserProfileRepository } from '../persistence/repositories/UserProfileRepository.js';
import { toWire } from '../core/users/userProfile.js';
import { parseInitDataUnsafe, validateInitData } from '../adapters/telegram/initData.js';
import { NotFoundError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import { asyncHandler, parseOrThrow } from './http.js';

const authRequestSchema = z.object({
  init_data: z.string().min(1, 'init_data is required'),
});

/**
 * Mini App sign-in: the user must already have a profile.
 * Without a bot token the initData is read but not verified (local development).
 */
export function createAuthRouter(users: UserProfileRepository, botToken: string | undefined): Router {
  const logger = createLogger({ component: 'authRouter' });
  const router = express.Router();

  if (!botToken) {
    logger.warn('TELEGRAM_BOT_TOKEN not set; initData hashes will not be verified');
  }

  router.post(
    '/telegram',
    asyncHandler(async (req, res) => {
      const { init_data: initData } = parseOrThrow(authRequestSchema, req.body);
      const user = botToken ? validateInitData(initData, botToken) : parseInitDataUnsafe(initData);

      const profile = users.getByTelegramId(user.id);
      if (!profile) {
        throw new NotFoundError('Пользователь не найден в базе данных. Обратитесь к администратору.');
      }

      logger.info({ telegramId: user.id }, 'Telegram authentication succeeded');
      res.status(200).json({ user_profile: toWire(profile) });
    })
  );

  return router;
}
