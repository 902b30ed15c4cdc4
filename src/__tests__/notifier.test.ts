import { describe, it, expect, vi, beforeEach, type Mock } from 'vitest';
import { NotificationDispatcher, dedupeKeyFor, formatTransition, severityFor } from '../monitor/notifier.js';
import type {
  AlertTransition,
  ChatChannel,
  ClearedTransition,
  RaisedTransition,
  RemediationOutcome,
  RepeatedTransition,
  ThresholdConfig,
} from '../monitor/types.js';

vi.spyOn(console, 'log').mockImplementation(() => {});
vi.spyOn(console, 'warn').mockImplementation(() => {});
vi.spyOn(console, 'error').mockImplementation(() => {});

const cpu: ThresholdConfig = { kind: 'cpu', highWaterMark: 90, lowWaterMark: 80, checkIntervalMs: 60_000 };

const raised: RaisedTransition = {
  type: 'raised',
  kind: 'cpu',
  from: 'ok',
  to: 'alerting',
  reading: { kind: 'cpu', value: 95, hostname: 'web-01', observedAt: 0 },
  threshold: cpu,
  consecutiveBreaches: 1,
};

function repeated(consecutiveBreaches: number, suppressed: boolean): RepeatedTransition {
  return { ...raised, type: 'repeated', from: 'alerting', to: 'alerting', consecutiveBreaches, suppressed };
}

const cleared: ClearedTransition = {
  ...raised,
  type: 'cleared',
  from: 'alerting',
  to: 'cooldown',
  reading: { kind: 'cpu', value: 60, hostname: 'web-01', observedAt: 0 },
  consecutiveBreaches: 3,
};

const remediated: RemediationOutcome = {
  success: true,
  message: 'Killed runaway process',
  detailSteps: [],
  executionDurationMs: 50,
};

let now = 0;
let post: Mock<ChatChannel['post']>;

function createNotifier(options: { secrets?: string[]; postTimeoutMs?: number } = {}): NotificationDispatcher {
  return new NotificationDispatcher({
    channel: { name: 'test-channel', post },
    dedupeWindowMs: 60_000,
    clock: () => now,
    ...options,
  });
}

beforeEach(() => {
  now = 1_000_000;
  post = vi.fn<ChatChannel['post']>().mockResolvedValue({ ok: true });
});

describe('formatTransition', () => {
  it('describes a raised alert with its remediation outcome', () => {
    expect(formatTransition(raised, remediated)).toBe(
      'High CPU usage on web-01: 95.0% (threshold: 90%)\nRemediation high_cpu succeeded: Killed runaway process',
    );
  });

  it('describes a re-notification and a recovery', () => {
    expect(formatTransition(repeated(5, false))).toBe(
      'CPU usage still high on web-01: 95.0% (breach #5, threshold: 90%)',
    );
    expect(formatTransition(cleared)).toBe('CPU usage recovered on web-01: 60.0% (low-water mark: 80%)');
  });

  it('describes service health without percentages', () => {
    const health: AlertTransition = {
      ...raised,
      kind: 'service_health',
      reading: { kind: 'service_health', value: 100, hostname: 'web-01', observedAt: 0 },
      threshold: { kind: 'service_health', highWaterMark: 100, lowWaterMark: 50, checkIntervalMs: 300_000 },
    };
    expect(formatTransition(health)).toBe('Remediation service unreachable from web-01');
  });
});

describe('severityFor', () => {
  it('grades by kind, recovery and remediation result', () => {
    expect(severityFor(raised)).toBe('warning');
    expect(severityFor({ ...raised, kind: 'disk' })).toBe('error');
    expect(severityFor(cleared)).toBe('info');
    expect(severityFor(raised, { ...remediated, success: false })).toBe('error');
  });
});

describe('NotificationDispatcher', () => {
  it('keys dedupe on kind and target status', () => {
    expect(dedupeKeyFor(raised)).toBe('cpu:alerting');
    expect(dedupeKeyFor(cleared)).toBe('cpu:cooldown');
  });

  it('posts a raised alert once', async () => {
    const notifier = createNotifier();

    const result = await notifier.notify(raised, remediated);

    expect(result).toEqual({ delivered: true, attempts: 1, dedupeKey: 'cpu:alerting' });
    expect(post).toHaveBeenCalledWith(
      'High CPU usage on web-01: 95.0% (threshold: 90%)\nRemediation high_cpu succeeded: Killed runaway process',
      'warning',
    );
  });

  it('drops a second message for the same key inside the window', async () => {
    const notifier = createNotifier();

    await notifier.notify(raised);
    now += 30_000;
    const second = await notifier.notify(raised);

    expect(second).toEqual({ delivered: false, attempts: 0, dedupeKey: 'cpu:alerting', reason: 'deduplicated' });
    expect(post).toHaveBeenCalledTimes(1);
  });

  it('delivers again once the window has passed', async () => {
    const notifier = createNotifier();

    await notifier.notify(raised);
    now += 60_000;
    const second = await notifier.notify(raised);

    expect(second.delivered).toBe(true);
    expect(post).toHaveBeenCalledTimes(2);
  });

  it('does not dedupe different target statuses against each other', async () => {
    const notifier = createNotifier();

    await notifier.notify(raised);
    const recovery = await notifier.notify(cleared);

    expect(recovery.delivered).toBe(true);
    expect(post).toHaveBeenLastCalledWith('CPU usage recovered on web-01: 60.0% (low-water mark: 80%)', 'info');
  });

  it('never posts a suppressed repeat', async () => {
    const notifier = createNotifier();

    const result = await notifier.notify(repeated(2, true));

    expect(result).toEqual({ delivered: false, attempts: 0, dedupeKey: 'cpu:alerting', reason: 'suppressed' });
    expect(post).not.toHaveBeenCalled();
    expect(notifier.getStats().suppressed).toBe(1);
  });

  it('retries a failed post once', async () => {
    post.mockResolvedValueOnce({ ok: false, error: 'HTTP 502' }).mockResolvedValueOnce({ ok: true });
    const notifier = createNotifier();

    const result = await notifier.notify(raised);

    expect(result).toEqual({ delivered: true, attempts: 2, dedupeKey: 'cpu:alerting' });
  });

  it('drops the message after two failed attempts without opening a window', async () => {
    post.mockResolvedValue({ ok: false, error: 'HTTP 500' });
    const notifier = createNotifier();

    const result = await notifier.notify(raised);
    expect(result).toEqual({ delivered: false, attempts: 2, dedupeKey: 'cpu:alerting', reason: 'failed' });

    await notifier.notify(raised);
    expect(post).toHaveBeenCalledTimes(4);
    expect(notifier.getStats()).toEqual({ delivered: 0, deduplicated: 0, suppressed: 0, failed: 2 });
  });

  it('treats a rejected post as a failed attempt', async () => {
    post.mockRejectedValue(new Error('socket hang up'));
    const notifier = createNotifier();

    const result = await notifier.notify(raised);

    expect(result.reason).toBe('failed');
    expect(post).toHaveBeenCalledTimes(2);
  });

  it('bounds each attempt with the post timeout', async () => {
    post.mockImplementation(() => new Promise(() => {}));
    const notifier = createNotifier({ postTimeoutMs: 20 });

    const result = await notifier.notify(raised);

    expect(result).toEqual({ delivered: false, attempts: 2, dedupeKey: 'cpu:alerting', reason: 'failed' });
  });

  it('masks configured secrets before posting', async () => {
    const notifier = createNotifier({ secrets: ['test-secret-value'] });
    const failed: RemediationOutcome = {
      success: false,
      message: 'auth rejected for test-secret-value',
      detailSteps: [],
      executionDurationMs: 10,
    };

    await notifier.notify(raised, failed);

    expect(post).toHaveBeenCalledWith(
      'High CPU usage on web-01: 95.0% (threshold: 90%)\nRemediation high_cpu failed: auth rejected for ***',
      'error',
    );
  });

  it('sends every announcement regardless of dedupe', async () => {
    const notifier = createNotifier();

    await notifier.announce('Host monitor started');
    await notifier.announce('Host monitor started');

    expect(post).toHaveBeenCalledTimes(2);
    expect(post).toHaveBeenCalledWith('Host monitor started', 'info');
  });
});
