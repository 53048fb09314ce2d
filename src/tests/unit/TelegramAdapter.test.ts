import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import type TelegramBot from 'node-telegram-bot-api';
import { OPEN_APP_BUTTON, START_TEXT, TelegramAdapter, parseCommand } from '../../adapters/telegram/TelegramAdapter.js';
import { ScheduleService } from '../../core/schedule/ScheduleService.js';
import { GridParser } from '../../core/calendar/GridParser.js';
import { TelegramError } from '../../utils/errors.js';

const mockBot = vi.hoisted(() => ({
  getMe: vi.fn(),
  setWebHook: vi.fn(),
  startPolling: vi.fn(),
  stopPolling: vi.fn(),
  isPolling: vi.fn(),
  sendMessage: vi.fn(),
  on: vi.fn(),
}));

// Mock node-telegram-bot-api
vi.mock('node-telegram-bot-api', () => ({
  default: vi.fn(function () {
    return mockBot;
  }),
}));

function message(fields: Partial<TelegramBot.Message>): TelegramBot.Message {
  return {
    message_id: 1,
    date: 1720000000,
    chat: { id: 100, type: 'private' },
    ...fields,
  };
}

describe('TelegramAdapter', () => {
  const config = {
    telegramBotToken: 'test-secret',
    webAppUrl: 'https://app.example',
    adminIds: ['1', '2'],
    timezone: 'UTC',
  };

  const schedule = new ScheduleService(
    {
      fetchGrid: async () => [['ИЮЛЬ'], ['', '1', '2'], ['A', 'x', ''], ['B', '', 'y']],
      isConnected: () => true,
      describe: () => 'fake',
    },
    new GridParser(),
    { ttlSeconds: 60 }
  );

  beforeEach(() => {
    vi.clearAllMocks();
    mockBot.sendMessage.mockResolvedValue({ message_id: 10 });
    mockBot.getMe.mockResolvedValue({ id: 5, username: 'schedule_bot' });
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('answers /start with the Mini App keyboard', async () => {
    const adapter = new TelegramAdapter(config, schedule);

    await adapter.handleMessage(message({ text: '/start' }));

    expect(mockBot.sendMessage).toHaveBeenCalledWith(100, START_TEXT, {
      parse_mode: 'HTML',
      reply_markup: {
        keyboard: [[{ text: OPEN_APP_BUTTON, web_app: { url: 'https://app.example' } }]],
        resize_keyboard: true,
      },
    });
  });

  it('echoes Mini App data escaped', async () => {
    const adapter = new TelegramAdapter(config, schedule);

    await adapter.handleMessage(message({ web_app_data: { data: '<hi>', button_text: 'Go' } }));

    expect(mockBot.sendMessage).toHaveBeenCalledWith(
      100,
      '⛳ Получены данные из Mini App: <code>&lt;hi&gt;</code>',
      { parse_mode: 'HTML' }
    );
  });

  it("lists today's events on /today", async () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2025-07-02T09:00:00Z'));
    const adapter = new TelegramAdapter(config, schedule);

    await adapter.handleMessage(message({ text: '/today' }));

    expect(mockBot.sendMessage).toHaveBeenCalledWith(100, '<b>2 июля</b>\n• B: y', { parse_mode: 'HTML' });
  });

  it('ignores plain text', async () => {
    const adapter = new TelegramAdapter(config, schedule);

    await adapter.handleMessage(message({ text: 'привет' }));
    await adapter.handleWebhook({ update_id: 1 });

    expect(mockBot.sendMessage).not.toHaveBeenCalled();
  });

  it('handles messages delivered by webhook', async () => {
    const adapter = new TelegramAdapter(config, schedule);

    await adapter.handleWebhook({ update_id: 2, message: message({ text: '/start@schedule_bot' }) });

    expect(mockBot.sendMessage).toHaveBeenCalledTimes(1);
    expect(mockBot.sendMessage.mock.calls[0]?.[1]).toBe(START_TEXT);
  });

  it('wraps send failures in TelegramError', async () => {
    mockBot.sendMessage.mockRejectedValueOnce(new Error('Forbidden: bot was blocked by the user'));
    const adapter = new TelegramAdapter(config, schedule);

    await expect(adapter.sendMessage('100', 'hi')).rejects.toBeInstanceOf(TelegramError);
    await expect(adapter.sendMessage('abc', 'hi')).rejects.toThrow('Failed to send message');
  });

  it('notifies every admin even when one fails', async () => {
    mockBot.sendMessage.mockRejectedValueOnce(new Error('chat not found'));
    const adapter = new TelegramAdapter(config, schedule);

    await adapter.notifyAdmins('hello');

    expect(mockBot.sendMessage).toHaveBeenCalledTimes(2);
    expect(mockBot.sendMessage).toHaveBeenLastCalledWith(2, 'hello', { parse_mode: 'HTML' });
  });

  it('starts polling without a webhook URL', async () => {
    const adapter = new TelegramAdapter(config, schedule);

    await adapter.initialize();

    expect(mockBot.startPolling).toHaveBeenCalledTimes(1);
    expect(mockBot.setWebHook).not.toHaveBeenCalled();
    expect(mockBot.on).toHaveBeenCalledWith('message', expect.any(Function));
  });

  it('sets the webhook when a URL is configured', async () => {
    mockBot.setWebHook.mockResolvedValue(true);
    const adapter = new TelegramAdapter({ ...config, telegramWebhookUrl: 'https://bot.example/webhook/telegram' }, schedule);

    await adapter.initialize();

    expect(mockBot.setWebHook).toHaveBeenCalledWith('https://bot.example/webhook/telegram');
    expect(mockBot.startPolling).not.toHaveBeenCalled();
  });

  it('fails initialization when the token is rejected', async () => {
    mockBot.getMe.mockRejectedValueOnce(new Error('401 Unauthorized'));
    const adapter = new TelegramAdapter(config, schedule);

    await expect(adapter.initialize()).rejects.toBeInstanceOf(TelegramError);
  });
});

describe('parseCommand', () => {
  it('extracts the command name', () => {
    expect(parseCommand('/start')).toBe('start');
    expect(parseCommand('/Today@schedule_bot')).toBe('today');
    expect(parseCommand('/start payload')).toBe('start');
    expect(parseCommand('start')).toBeNull();
    expect(parseCommand(undefined)).toBeNull();
  });
});
