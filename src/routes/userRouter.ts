import express, { type Router } from 'express';
import { z } from 'zod';
import type { UserProfileRepository } from '../persistence/repositories/UserProfileRepository.js';
import {
  changesFromWire,
  fromWire,
  toWire,
  userProfileUpdateSchema,
  userProfileWireSchema,
} from '../core/users/userProfile.js';
import { NotFoundError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import { asyncHandler, parseOrThrow } from './http.js';

const telegramIdParam = z.coerce.number().int().positive();

export function createUserRouter(users: UserProfileRepository): Router {
  const logger = createLogger({ component: 'userRouter' });
  const router = express.Router();

  router.get(
    '/:telegramId',
    asyncHandler(async (req, res) => {
      const telegramId = parseOrThrow(telegramIdParam, req.params.telegramId);
      const profile = users.getByTelegramId(telegramId);
      if (!profile) {
        throw new NotFoundError('Пользователь не найден');
      }
      res.status(200).json({ user_profile: toWire(profile) });
    })
  );

  router.post(
    '/create',
    asyncHandler(async (req, res) => {
      const wire = parseOrThrow(userProfileWireSchema, req.body);
      logger.info({ telegramId: wire.telegram_id }, 'Creating user profile');
      const created = users.create(fromWire(wire));
      res.status(200).json({ user_profile: toWire(created) });
    })
  );

  router.post(
    '/update',
    asyncHandler(async (req, res) => {
      const request = parseOrThrow(userProfileUpdateSchema, req.body);
      logger.info(
        { telegramId: request.telegram_id, fields: Object.keys(request.fields) },
        'Updating user profile'
      );
      const updated = users.update(request.telegram_id, changesFromWire(request.fields));
      res.status(200).json(updated !== null);
    })
  );

  return router;
}
