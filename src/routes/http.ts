import type { NextFunction, Request, RequestHandler, Response } from 'express';
import type { z } from 'zod';
import {
  AuthError,
  ConflictError,
  NotFoundError,
  SheetFetchError,
  ValidationError,
} from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger({ component: 'http' });

/** Forwards rejections of async handlers to the error middleware (Express 4 does not). */
export function asyncHandler(
  handler: (req: Request, res: Response, next: NextFunction) => Promise<void>
): RequestHandler {
  return (req, res, next) => {
    handler(req, res, next).catch(next);
  };
}

export function parseOrThrow<T extends z.ZodTypeAny>(schema: T, value: unknown): z.output<T> {
  const result = schema.safeParse(value);
  if (!result.success) {
    const issues = result.error.issues.map((issue) =>
      issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
    );
    throw new ValidationError(issues.join('; '), { cause: result.error });
  }
  return result.data;
}

export function statusFor(error: unknown): number {
  if (error instanceof ValidationError) return 400;
  if (error instanceof AuthError) return 401;
  if (error instanceof NotFoundError) return 404;
  if (error instanceof ConflictError) return 409;
  if (error instanceof SheetFetchError) return 502;
  return clientErrorStatus(error) ?? 500;
}

/** 4xx status set by express middleware itself, e.g. body-parser's 400 on malformed JSON. */
function clientErrorStatus(error: unknown): number | null {
  if (!(error instanceof Error) || !('status' in error) || typeof error.status !== 'number') {
    return null;
  }
  return error.status >= 400 && error.status < 500 ? error.status : null;
}

export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction): void {
  const status = statusFor(err);
  if (status >= 500) {
    logger.error({ error: err, method: req.method, path: req.path }, 'Request failed');
  } else {
    logger.warn({ error: err, method: req.method, path: req.path }, 'Request rejected');
  }
  const message = status === 500 || !(err instanceof Error) ? 'Internal server error' : err.message;
  res.status(status).json({ error: message });
}
