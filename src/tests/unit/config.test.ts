import { describe, it, expect } from 'vitest';
import { loadConfig, parseConfig } from '../../config/index.js';
import { ConfigError } from '../../utils/errors.js';

describe('config', () => {
  it('applies defaults', () => {
    const config = loadConfig({});

    expect(config.telegramBotToken).toBeUndefined();
    expect(config.adminIds).toEqual([]);
    expect(config.worksheetName).toBe('календарь new');
    expect(config.scheduleYear).toBe(2025);
    expect(config.scheduleCacheTtlSeconds).toBe(600);
    expect(config.scheduleRefreshCron).toBe('*/30 * * * *');
    expect(config.timezone).toBe('Europe/Moscow');
    expect(config.host).toBe('127.0.0.1');
    expect(config.port).toBe(8001);
  });

  it('reads and coerces environment values', () => {
    const config = loadConfig({
      TELEGRAM_BOT_TOKEN: 'test-secret',
      ADMIN_IDS: '111, 222,,',
      SCHEDULE_YEAR: '2026',
      SCHEDULE_CACHE_TTL_SECONDS: '0',
      CORS_ORIGINS: 'https://a.example, https://b.example',
      PORT: '9000',
    });

    expect(config.telegramBotToken).toBe('test-secret');
    expect(config.adminIds).toEqual(['111', '222']);
    expect(config.scheduleYear).toBe(2026);
    expect(config.scheduleCacheTtlSeconds).toBe(0);
    expect(config.corsOrigins).toEqual(['https://a.example', 'https://b.example']);
    expect(config.port).toBe(9000);
  });

  it('treats empty strings as unset', () => {
    const config = loadConfig({ TELEGRAM_BOT_TOKEN: '', PORT: '' });

    expect(config.telegramBotToken).toBeUndefined();
    expect(config.port).toBe(8001);
  });

  it('lists every invalid value', () => {
    expect(() => parseConfig({ port: 'abc', adminIds: 'alice' })).toThrow(ConfigError);

    try {
      parseConfig({ port: 'abc', webAppUrl: 'not a url' });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError);
      const message = error instanceof Error ? error.message : '';
      expect(message).toContain('webAppUrl: Invalid url');
      expect(message).toContain('port: Expected number, received nan');
    }
  });
});
