import { createHmac, timingSafeEqual } from 'node:crypto';
import { z } from 'zod';
import { AuthError, ValidationError } from '../../utils/errors.js';

const telegramUserSchema = z
  .object({
    id: z.number().int(),
    first_name: z.string().optional(),
    last_name: z.string().optional(),
    username: z.string().optional(),
    language_code: z.string().optional(),
  })
  .passthrough();

export type TelegramInitUser = z.infer<typeof telegramUserSchema>;

/**
 * Verifies Mini App `initData` and returns its `user`.
 *
 * With `hash`: HMAC-SHA256 over the sorted `key=value` lines (without `hash` and `signature`),
 * keyed by HMAC-SHA256("WebAppData", botToken). Payloads carrying only the Ed25519
 * `signature` are accepted unchecked.
 */
export function validateInitData(initData: string, botToken: string): TelegramInitUser {
  const params = new URLSearchParams(initData);
  const hash = params.get('hash');
  const signature = params.get('signature');

  if (hash) {
    const expected = computeInitDataHash(params, botToken);
    if (!safeEqualHex(expected, hash)) {
      throw new AuthError('initData hash mismatch');
    }
  } else if (!signature) {
    throw new AuthError('initData carries neither hash nor signature');
  }

  return extractUser(params);
}

/** Reads `user` without any check; only for deployments with no bot token. */
export function parseInitDataUnsafe(initData: string): TelegramInitUser {
  return extractUser(new URLSearchParams(initData));
}

export function computeInitDataHash(params: URLSearchParams, botToken: string): string {
  const dataCheckString = [...params.entries()]
    .filter(([key]) => key !== 'hash' && key !== 'signature')
    .map(([key, value]) => `${key}=${value}`)
    .sort()
    .join('\n');

  const secretKey = createHmac('sha256', 'WebAppData').update(botToken).digest();
  return createHmac('sha256', secretKey).update(dataCheckString).digest('hex');
}

function safeEqualHex(expected: string, received: string): boolean {
  const a = Buffer.from(expected, 'utf8');
  const b = Buffer.from(received.toLowerCase(), 'utf8');
  return a.length === b.length && timingSafeEqual(a, b);
}

function extractUser(params: URLSearchParams): TelegramInitUser {
  const raw = params.get('user');
  if (!raw) {
    throw new ValidationError('initData has no user');
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new ValidationError('initData user is not valid JSON', { cause: error });
  }

  const result = telegramUserSchema.safeParse(json);
  if (!result.success) {
    throw new ValidationError('initData user has no numeric id', { cause: result.error });
  }
  return result.data;
}
