import express, { type Router } from 'express';
import { z } from 'zod';
import type { ScheduleService } from '../core/schedule/ScheduleService.js';
import { isCalendarDate } from '../core/calendar/gridCell.js';
import { ValidationError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import { asyncHandler, parseOrThrow } from './http.js';

const calendarDate = z.string().refine(isCalendarDate, 'expected a YYYY-MM-DD date');

const scheduleQuerySchema = z.object({
  refresh: z
    .enum(['true', 'false', '1', '0'])
    .optional()
    .transform((value) => value === 'true' || value === '1'),
  start_date: calendarDate.optional(),
  end_date: calendarDate.optional(),
});

export function createScheduleRouter(schedule: ScheduleService): Router {
  const logger = createLogger({ component: 'scheduleRouter' });
  const router = express.Router();

  router.get('/health', (_req, res) => {
    res.status(200).json({
      status: 'healthy',
      google_api: schedule.isConnected() ? 'connected' : 'disconnected',
    });
  });

  router.get(
    '/schedule',
    asyncHandler(async (req, res) => {
      const query = parseOrThrow(scheduleQuerySchema, req.query);
      if (query.start_date && query.end_date && query.start_date > query.end_date) {
        throw new ValidationError('start_date must not be after end_date');
      }

      if (query.refresh) {
        const events = await schedule.refreshEvents();
        logger.info({ events: events.length }, 'Schedule refreshed on request');
        res.status(200).json({ events });
        return;
      }

      const events = await schedule.getEvents({ startDate: query.start_date, endDate: query.end_date });
      res.status(200).json({ events });
    })
  );

  return router;
}
