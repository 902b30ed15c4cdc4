import 'dotenv/config';
import { z } from 'zod';
import type { ChatChannelConfig } from './clients/chat.js';
import { ConfigurationError } from './monitor/errors.js';
import { validateThresholds } from './monitor/thresholds.js';
import type { ThresholdConfig } from './monitor/types.js';

// Unset and empty variables both fall back to the default
const blankToUndefined = (value: unknown) => (value === '' ? undefined : value);

const percent = (fallback: number) =>
  z.preprocess(blankToUndefined, z.coerce.number().min(0).max(100).default(fallback));

const optionalPercent = () => z.preprocess(blankToUndefined, z.coerce.number().min(0).max(100).optional());

const positiveInt = (fallback: number) =>
  z.preprocess(blankToUndefined, z.coerce.number().int().positive().default(fallback));

const nonNegativeInt = (fallback: number) =>
  z.preprocess(blankToUndefined, z.coerce.number().int().nonnegative().default(fallback));

const text = (fallback: string) => z.preprocess(blankToUndefined, z.string().default(fallback));

const envSchema = z.object({
  NODE_ENV: text('development'),
  PORT: z.preprocess(blankToUndefined, z.coerce.number().int().min(1).max(65535).default(4100)),

  // Thresholds (percent)
  CPU_THRESHOLD: percent(90),
  MEMORY_THRESHOLD: percent(90),
  DISK_THRESHOLD: percent(90),
  CPU_LOW_WATER: optionalPercent(),
  MEMORY_LOW_WATER: optionalPercent(),
  DISK_LOW_WATER: optionalPercent(),

  // Loop timing (seconds unless noted)
  CHECK_INTERVAL: positiveInt(60),
  HEALTH_CHECK_INTERVAL: positiveInt(300),
  COOLDOWN_SECONDS: nonNegativeInt(60),
  RENOTIFY_INTERVAL: positiveInt(5),
  METRIC_TIMEOUT_MS: positiveInt(10_000),
  DISK_PATH: text('/'),

  // Remediation service
  REMEDIATOR_URL: z.preprocess(blankToUndefined, z.string().url().default('http://localhost:5001')),
  REMEDIATOR_TIMEOUT: positiveInt(30),
  REMEDIATOR_RETRY_ATTEMPTS: nonNegativeInt(3),
  REMEDIATION_MODE: z.preprocess(blankToUndefined, z.enum(['live', 'simulated']).default('simulated')),

  // Notifications
  NOTIFICATION_DEDUPE_WINDOW_SECONDS: nonNegativeInt(60),
  CHAT_CHANNEL: z.preprocess(blankToUndefined, z.enum(['telegram', 'slack', 'console']).default('console')),
  TELEGRAM_BOT_TOKEN: text(''),
  TELEGRAM_CHAT_ID: text(''),
  SLACK_WEBHOOK_URL: text(''),
  SLACK_CHANNEL: text('#devops-alerts'),
});

export interface MonitorConfig {
  nodeEnv: string;
  port: number;

  thresholds: ThresholdConfig[];
  checkIntervalMs: number;
  healthCheckIntervalMs: number;
  cooldownMs: number;
  renotifyInterval: number;
  metricTimeoutMs: number;
  diskPath: string;

  remediatorUrl: string;
  remediatorTimeoutMs: number;
  remediatorRetryAttempts: number;
  remediationMode: 'live' | 'simulated';

  dedupeWindowMs: number;
  chat: ChatChannelConfig;
}

/** Default hysteresis floor: ten points under the threshold */
function defaultLowWater(threshold: number): number {
  return Math.max(0, threshold - 10);
}

/**
 * Parse and validate the environment. Throws ConfigurationError listing
 * every invalid variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): MonitorConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError(`Invalid configuration: ${problems.join('; ')}`, { problems });
  }

  const e = parsed.data;
  const checkIntervalMs = e.CHECK_INTERVAL * 1000;
  const healthCheckIntervalMs = e.HEALTH_CHECK_INTERVAL * 1000;

  const thresholds: ThresholdConfig[] = [
    {
      kind: 'cpu',
      highWaterMark: e.CPU_THRESHOLD,
      lowWaterMark: e.CPU_LOW_WATER ?? defaultLowWater(e.CPU_THRESHOLD),
      checkIntervalMs,
    },
    {
      kind: 'memory',
      highWaterMark: e.MEMORY_THRESHOLD,
      lowWaterMark: e.MEMORY_LOW_WATER ?? defaultLowWater(e.MEMORY_THRESHOLD),
      checkIntervalMs,
    },
    {
      kind: 'disk',
      highWaterMark: e.DISK_THRESHOLD,
      lowWaterMark: e.DISK_LOW_WATER ?? defaultLowWater(e.DISK_THRESHOLD),
      checkIntervalMs,
    },
    // Boolean-coded: 100 = unreachable breaches, 0 = healthy clears
    { kind: 'service_health', highWaterMark: 100, lowWaterMark: 50, checkIntervalMs: healthCheckIntervalMs },
  ];
  validateThresholds(thresholds);

  if (e.CHAT_CHANNEL === 'telegram' && (!e.TELEGRAM_BOT_TOKEN || !e.TELEGRAM_CHAT_ID)) {
    throw new ConfigurationError('CHAT_CHANNEL=telegram requires TELEGRAM_BOT_TOKEN and TELEGRAM_CHAT_ID');
  }
  if (e.CHAT_CHANNEL === 'slack' && !e.SLACK_WEBHOOK_URL) {
    throw new ConfigurationError('CHAT_CHANNEL=slack requires SLACK_WEBHOOK_URL');
  }

  return {
    nodeEnv: e.NODE_ENV,
    port: e.PORT,

    thresholds,
    checkIntervalMs,
    healthCheckIntervalMs,
    cooldownMs: e.COOLDOWN_SECONDS * 1000,
    renotifyInterval: e.RENOTIFY_INTERVAL,
    metricTimeoutMs: e.METRIC_TIMEOUT_MS,
    diskPath: e.DISK_PATH,

    remediatorUrl: e.REMEDIATOR_URL,
    remediatorTimeoutMs: e.REMEDIATOR_TIMEOUT * 1000,
    remediatorRetryAttempts: e.REMEDIATOR_RETRY_ATTEMPTS,
    remediationMode: e.REMEDIATION_MODE,

    dedupeWindowMs: e.NOTIFICATION_DEDUPE_WINDOW_SECONDS * 1000,
    chat: {
      chatChannel: e.CHAT_CHANNEL,
      telegramBotToken: e.TELEGRAM_BOT_TOKEN,
      telegramChatId: e.TELEGRAM_CHAT_ID,
      slackWebhookUrl: e.SLACK_WEBHOOK_URL,
      slackChannel: e.SLACK_CHANNEL,
    },
  };
}

/** Configured values that must be masked out of every outbound message */
export function secretValues(config: MonitorConfig): string[] {
  return [config.chat.telegramBotToken, config.chat.slackWebhookUrl].filter((s) => s.length > 0);
}
