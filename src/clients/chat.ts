/**
 * Chat channel transports.
 *
 *  - telegram: Bot API sendMessage (token + chat id)
 *  - slack:    incoming webhook
 *  - console:  log only, used when nothing is configured
 *
 * All transports use fetch directly with an AbortSignal timeout and report
 * failures through PostResult instead of throwing.
 */

import { z } from 'zod';
import type { ChatChannel, NotificationSeverity, PostResult } from '../monitor/types.js';

const SEVERITY_PREFIX: Record<NotificationSeverity, string> = {
  info: 'ℹ️',
  warning: '⚠️',
  error: '❌',
  critical: '🚨',
};

const POST_TIMEOUT_MS = 10_000;

const telegramResponseSchema = z.object({
  ok: z.boolean(),
  description: z.string().optional(),
});

export function formatChatText(text: string, severity: NotificationSeverity): string {
  return `${SEVERITY_PREFIX[severity]} ${text}`;
}

// ---------------------------------------------------------------------------
// Telegram
// ---------------------------------------------------------------------------

export interface TelegramChannelOptions {
  botToken: string;
  chatId: string;
  fetchImpl?: typeof fetch;
}

export class TelegramChannel implements ChatChannel {
  readonly name = 'telegram';
  private readonly botToken: string;
  private readonly chatId: string;
  private readonly fetchImpl: typeof fetch;

  constructor(options: TelegramChannelOptions) {
    this.botToken = options.botToken;
    this.chatId = options.chatId;
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
  }

  async post(text: string, severity: NotificationSeverity): Promise<PostResult> {
    if (!this.botToken) return { ok: false, error: 'TELEGRAM_BOT_TOKEN not configured' };
    if (!this.chatId) return { ok: false, error: 'TELEGRAM_CHAT_ID not configured' };

    try {
      const response = await this.fetchImpl(`https://api.telegram.org/bot${this.botToken}/sendMessage`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ chat_id: this.chatId, text: formatChatText(text, severity) }),
        signal: AbortSignal.timeout(POST_TIMEOUT_MS),
      });

      const parsed = telegramResponseSchema.safeParse(await response.json());
      if (!parsed.success || !parsed.data.ok) {
        const description = parsed.success ? parsed.data.description : undefined;
        return { ok: false, error: description || `Telegram API error (HTTP ${response.status})` };
      }
      return { ok: true };
    } catch (err) {
      // The request URL embeds the token; keep only the error name/message
      const message = err instanceof Error ? err.message : String(err);
      return { ok: false, error: message.split(this.botToken).join('***') };
    }
  }
}

// ---------------------------------------------------------------------------
// Slack incoming webhook
// ---------------------------------------------------------------------------

export interface SlackWebhookChannelOptions {
  webhookUrl: string;
  channel: string;
  username?: string;
  fetchImpl?: typeof fetch;
}

export class SlackWebhookChannel implements ChatChannel {
  readonly name: string;
  private readonly webhookUrl: string;
  private readonly username: string;
  private readonly fetchImpl: typeof fetch;

  constructor(options: SlackWebhookChannelOptions) {
    this.name = options.channel;
    this.webhookUrl = options.webhookUrl;
    this.username = options.username ?? 'hostwatch';
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
  }

  async post(text: string, severity: NotificationSeverity): Promise<PostResult> {
    if (!this.webhookUrl) return { ok: false, error: 'SLACK_WEBHOOK_URL not configured' };

    try {
      const response = await this.fetchImpl(this.webhookUrl, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({
          channel: this.name,
          username: this.username,
          text: formatChatText(text, severity),
        }),
        signal: AbortSignal.timeout(POST_TIMEOUT_MS),
      });

      if (!response.ok) {
        const body = await response.text().catch(() => '');
        return { ok: false, error: `Slack webhook returned HTTP ${response.status}${body ? `: ${body.slice(0, 100)}` : ''}` };
      }
      return { ok: true };
    } catch (err) {
      return { ok: false, error: err instanceof Error ? err.message : String(err) };
    }
  }
}

// ---------------------------------------------------------------------------
// Console
// ---------------------------------------------------------------------------

export class ConsoleChannel implements ChatChannel {
  readonly name = 'console';

  async post(text: string, severity: NotificationSeverity): Promise<PostResult> {
    const line = `[Chat] ${formatChatText(text, severity)}`;
    if (severity === 'error' || severity === 'critical') console.error(line);
    else if (severity === 'warning') console.warn(line);
    else console.log(line);
    return { ok: true };
  }
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

export interface ChatChannelConfig {
  chatChannel: 'telegram' | 'slack' | 'console';
  telegramBotToken: string;
  telegramChatId: string;
  slackWebhookUrl: string;
  slackChannel: string;
}

export function createChatChannel(config: ChatChannelConfig): ChatChannel {
  switch (config.chatChannel) {
    case 'telegram':
      return new TelegramChannel({ botToken: config.telegramBotToken, chatId: config.telegramChatId });
    case 'slack':
      return new SlackWebhookChannel({ webhookUrl: config.slackWebhookUrl, channel: config.slackChannel });
    case 'console':
      return new ConsoleChannel();
  }
}
