import { describe, it, expect, vi, beforeEach, type Mock } from 'vitest';
import {
  ConsoleChannel,
  SlackWebhookChannel,
  TelegramChannel,
  createChatChannel,
  formatChatText,
} from '../clients/chat.js';

let fetchImpl: Mock<typeof fetch>;

beforeEach(() => {
  fetchImpl = vi.fn<typeof fetch>();
});

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

describe('formatChatText', () => {
  it('prefixes the severity marker', () => {
    expect(formatChatText('Disk cleaned', 'info')).toBe('ℹ️ Disk cleaned');
    expect(formatChatText('Disk full', 'error')).toBe('❌ Disk full');
  });
});

describe('TelegramChannel', () => {
  it('refuses to post without a bot token', async () => {
    const channel = new TelegramChannel({ botToken: '', chatId: '42', fetchImpl });

    expect(await channel.post('hello', 'info')).toEqual({ ok: false, error: 'TELEGRAM_BOT_TOKEN not configured' });
    expect(fetchImpl).not.toHaveBeenCalled();
  });

  it('sends the message through sendMessage', async () => {
    fetchImpl.mockResolvedValue(jsonResponse({ ok: true, result: {} }));
    const channel = new TelegramChannel({ botToken: 'test-token', chatId: '42', fetchImpl });

    expect(await channel.post('High CPU', 'warning')).toEqual({ ok: true });

    const [url, init] = fetchImpl.mock.calls[0] ?? [];
    expect(url).toBe('https://api.telegram.org/bottest-token/sendMessage');
    expect(JSON.parse(String(init?.body))).toEqual({ chat_id: '42', text: '⚠️ High CPU' });
  });

  it('returns the API description on failure', async () => {
    fetchImpl.mockResolvedValue(jsonResponse({ ok: false, description: 'Bad Request: chat not found' }, 400));
    const channel = new TelegramChannel({ botToken: 'test-token', chatId: '42', fetchImpl });

    expect(await channel.post('hello', 'info')).toEqual({ ok: false, error: 'Bad Request: chat not found' });
  });

  it('keeps the token out of network error messages', async () => {
    fetchImpl.mockRejectedValue(new Error('request to https://api.telegram.org/bottest-token/sendMessage failed'));
    const channel = new TelegramChannel({ botToken: 'test-token', chatId: '42', fetchImpl });

    expect(await channel.post('hello', 'info')).toEqual({
      ok: false,
      error: 'request to https://api.telegram.org/bot***/sendMessage failed',
    });
  });
});

describe('SlackWebhookChannel', () => {
  const webhookUrl = 'https://hooks.slack.test/services/placeholder';

  it('posts channel, username and text to the webhook', async () => {
    fetchImpl.mockResolvedValue(new Response('ok', { status: 200 }));
    const channel = new SlackWebhookChannel({ webhookUrl, channel: '#devops-alerts', fetchImpl });

    expect(await channel.post('Disk cleaned', 'info')).toEqual({ ok: true });

    const [url, init] = fetchImpl.mock.calls[0] ?? [];
    expect(url).toBe(webhookUrl);
    expect(JSON.parse(String(init?.body))).toEqual({
      channel: '#devops-alerts',
      username: 'hostwatch',
      text: 'ℹ️ Disk cleaned',
    });
  });

  it('reports a rejected webhook call', async () => {
    fetchImpl.mockResolvedValue(new Response('no_service', { status: 404 }));
    const channel = new SlackWebhookChannel({ webhookUrl, channel: '#devops-alerts', fetchImpl });

    expect(await channel.post('hello', 'info')).toEqual({
      ok: false,
      error: 'Slack webhook returned HTTP 404: no_service',
    });
  });
});

describe('createChatChannel', () => {
  const base = {
    telegramBotToken: 'test-token',
    telegramChatId: '42',
    slackWebhookUrl: 'https://hooks.slack.test/services/placeholder',
    slackChannel: '#ops',
  };

  it('builds the configured transport', () => {
    expect(createChatChannel({ ...base, chatChannel: 'telegram' })).toBeInstanceOf(TelegramChannel);
    expect(createChatChannel({ ...base, chatChannel: 'slack' }).name).toBe('#ops');
    expect(createChatChannel({ ...base, chatChannel: 'console' })).toBeInstanceOf(ConsoleChannel);
  });

  it('logs console messages at the matching level', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});

    expect(await new ConsoleChannel().post('High CPU', 'warning')).toEqual({ ok: true });
    expect(warn).toHaveBeenCalledWith('[Chat] ⚠️ High CPU');

    warn.mockRestore();
  });
});
