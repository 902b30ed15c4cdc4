/**
 * Notification dispatcher -- turns alert transitions and remediation
 * outcomes into chat messages.
 *
 * Rules:
 *  - suppressed repeats are never posted
 *  - one delivered message per dedupe key (kind + target status) per window
 *  - every text goes through maskSecrets() before it reaches the channel
 *  - at most one retry per message, then drop with a log line
 *
 * notify() never rejects. A failed delivery leaves alert state untouched.
 */

import { maskSecrets } from '../safety/secrets.js';
import { TransportError, errorMessage } from './errors.js';
import { issueFor } from './issue-types.js';
import { METRIC_LABELS, formatPercent } from './thresholds.js';
import { withTimeout } from './timeout.js';
import type {
  AlertTransition,
  ChatChannel,
  ClockFn,
  DeliveryResult,
  MetricKind,
  NotificationMessage,
  NotificationSeverity,
  RemediationOutcome,
} from './types.js';

/** Severity of a raised or re-notified alert before any remediation result */
const ALERT_SEVERITY: Record<MetricKind, NotificationSeverity> = {
  cpu: 'warning',
  memory: 'warning',
  disk: 'error',
  service_health: 'error',
};

export const MAX_DELIVERY_ATTEMPTS = 2;
export const DEFAULT_POST_TIMEOUT_MS = 10_000;

export interface NotificationDispatcherOptions {
  channel: ChatChannel;
  dedupeWindowMs: number;
  /** Per-attempt bound on channel.post() */
  postTimeoutMs?: number;
  /** Exact secret values that must never appear in a message */
  secrets?: readonly string[];
  clock?: ClockFn;
}

export interface NotificationStats {
  delivered: number;
  deduplicated: number;
  suppressed: number;
  failed: number;
}

export function dedupeKeyFor(transition: AlertTransition): string {
  return `${transition.kind}:${transition.to}`;
}

export function severityFor(transition: AlertTransition, outcome?: RemediationOutcome): NotificationSeverity {
  if (outcome && !outcome.success) return 'error';
  if (transition.type === 'cleared') return 'info';
  return ALERT_SEVERITY[transition.kind];
}

/**
 * Human-readable summary of a transition. Only reading values, thresholds
 * and the remediation message are included; masking happens afterwards.
 */
export function formatTransition(transition: AlertTransition, outcome?: RemediationOutcome): string {
  const { kind, reading, threshold } = transition;
  const label = METRIC_LABELS[kind];
  const host = reading.hostname;
  const lines: string[] = [];

  if (kind === 'service_health') {
    switch (transition.type) {
      case 'raised':
        lines.push(`${label} unreachable from ${host}`);
        break;
      case 'repeated':
        lines.push(`${label} still unreachable from ${host} (check #${transition.consecutiveBreaches})`);
        break;
      case 'cleared':
        lines.push(`${label} reachable again from ${host}`);
        break;
    }
  } else {
    const value = formatPercent(reading.value);
    switch (transition.type) {
      case 'raised':
        lines.push(`High ${label} usage on ${host}: ${value} (threshold: ${threshold.highWaterMark}%)`);
        break;
      case 'repeated':
        lines.push(
          `${label} usage still high on ${host}: ${value} ` +
            `(breach #${transition.consecutiveBreaches}, threshold: ${threshold.highWaterMark}%)`,
        );
        break;
      case 'cleared':
        lines.push(`${label} usage recovered on ${host}: ${value} (low-water mark: ${threshold.lowWaterMark}%)`);
        break;
    }
  }

  if (outcome) {
    const { issueType } = issueFor(kind);
    lines.push(
      outcome.success
        ? `Remediation ${issueType} succeeded: ${outcome.message}`
        : `Remediation ${issueType} failed: ${outcome.message}`,
    );
  }

  return lines.join('\n');
}

export class NotificationDispatcher {
  private readonly channel: ChatChannel;
  private readonly dedupeWindowMs: number;
  private readonly postTimeoutMs: number;
  private readonly secrets: readonly string[];
  private readonly clock: ClockFn;
  /** dedupe key -> time of last delivered message */
  private readonly lastDelivered = new Map<string, number>();
  private readonly stats: NotificationStats = { delivered: 0, deduplicated: 0, suppressed: 0, failed: 0 };

  constructor(options: NotificationDispatcherOptions) {
    this.channel = options.channel;
    this.dedupeWindowMs = options.dedupeWindowMs;
    this.postTimeoutMs = options.postTimeoutMs ?? DEFAULT_POST_TIMEOUT_MS;
    this.secrets = options.secrets ?? [];
    this.clock = options.clock ?? Date.now;
  }

  async notify(transition: AlertTransition, outcome?: RemediationOutcome): Promise<DeliveryResult> {
    const dedupeKey = dedupeKeyFor(transition);

    if (transition.type === 'repeated' && transition.suppressed) {
      this.stats.suppressed++;
      console.log(
        `[Notifier] ${dedupeKey}: repeat #${transition.consecutiveBreaches} suppressed (re-notify interval not reached)`,
      );
      return { delivered: false, attempts: 0, dedupeKey, reason: 'suppressed' };
    }

    const now = this.clock();
    this.pruneExpired(now);

    const last = this.lastDelivered.get(dedupeKey);
    if (last !== undefined && now - last < this.dedupeWindowMs) {
      this.stats.deduplicated++;
      console.log(`[Notifier] ${dedupeKey}: duplicate within ${this.dedupeWindowMs}ms window, skipping`);
      return { delivered: false, attempts: 0, dedupeKey, reason: 'deduplicated' };
    }

    const message: NotificationMessage = {
      severity: severityFor(transition, outcome),
      text: maskSecrets(formatTransition(transition, outcome), this.secrets),
      channel: this.channel.name,
      dedupeKey,
    };

    const result = await this.deliver(message);
    if (result.delivered) {
      this.lastDelivered.set(dedupeKey, this.clock());
    }
    return result;
  }

  /**
   * Lifecycle messages (startup, shutdown). No dedupe; masking and the
   * single retry still apply.
   */
  async announce(text: string, severity: NotificationSeverity = 'info'): Promise<DeliveryResult> {
    return this.deliver({
      severity,
      text: maskSecrets(text, this.secrets),
      channel: this.channel.name,
      dedupeKey: 'lifecycle',
    });
  }

  getStats(): NotificationStats {
    return { ...this.stats };
  }

  private async deliver(message: NotificationMessage): Promise<DeliveryResult> {
    let lastError = '';

    for (let attempt = 1; attempt <= MAX_DELIVERY_ATTEMPTS; attempt++) {
      try {
        const result = await withTimeout(
          this.channel.post(message.text, message.severity),
          this.postTimeoutMs,
          () => new TransportError(`post to ${message.channel} timed out after ${this.postTimeoutMs}ms`),
        );

        if (result.ok) {
          this.stats.delivered++;
          console.log(`[Notifier] Delivered ${message.severity} message to ${message.channel} (${message.dedupeKey})`);
          return { delivered: true, attempts: attempt, dedupeKey: message.dedupeKey };
        }
        lastError = result.error;
      } catch (err) {
        lastError = errorMessage(err);
      }

      console.warn(`[Notifier] Delivery attempt ${attempt}/${MAX_DELIVERY_ATTEMPTS} to ${message.channel} failed: ${lastError}`);
    }

    this.stats.failed++;
    console.error(`[Notifier] Dropping ${message.dedupeKey} message after ${MAX_DELIVERY_ATTEMPTS} attempts: ${lastError}`);
    return { delivered: false, attempts: MAX_DELIVERY_ATTEMPTS, dedupeKey: message.dedupeKey, reason: 'failed' };
  }

  private pruneExpired(now: number): void {
    for (const [key, at] of this.lastDelivered) {
      if (now - at >= this.dedupeWindowMs) this.lastDelivered.delete(key);
    }
  }
}
