import { describe, it, expect, vi, beforeEach, type Mock } from 'vitest';
import { loadConfig } from '../config.js';
import { createMonitor, getMonitorStatus, shutdownTimeoutMs, startMonitor, stopMonitor } from '../monitor/index.js';
import { SimulatedRemediationExecutor } from '../clients/simulated-remediator.js';
import type { ChatChannel, MetricSource } from '../monitor/types.js';

vi.spyOn(console, 'log').mockImplementation(() => {});
vi.spyOn(console, 'warn').mockImplementation(() => {});

let post: Mock<ChatChannel['post']>;
let sample: Mock<MetricSource['sample']>;

beforeEach(() => {
  post = vi.fn<ChatChannel['post']>().mockResolvedValue({ ok: true });
  sample = vi.fn<MetricSource['sample']>(async (kind) => ({
    kind,
    value: 10,
    hostname: 'web-01',
    observedAt: Date.now(),
  }));
});

function buildMonitor() {
  return createMonitor(loadConfig({}), {
    source: { sample },
    healthSource: null,
    executor: new SimulatedRemediationExecutor(),
    channel: { name: 'test-channel', post },
  });
}

describe('monitor lifecycle', () => {
  it('leaves service health out when nothing checks it', () => {
    const monitor = buildMonitor();
    expect(monitor.stateMachine.kinds()).toEqual(['cpu', 'memory', 'disk']);
  });

  it('announces startup and shutdown with counters', async () => {
    const monitor = buildMonitor();

    await startMonitor(monitor);
    expect(post).toHaveBeenCalledWith('Host monitor started: watching cpu, memory, disk (remediation: simulated)', 'info');
    expect(monitor.scheduler.isRunning()).toBe(true);

    await stopMonitor(monitor);
    expect(monitor.scheduler.isRunning()).toBe(false);
    expect(post).toHaveBeenLastCalledWith(
      'Host monitor stopped after 0s: 1 checks, 0 alerts, 0 remediations',
      'info',
    );
  });

  it('reports scheduler, remediation and notification state together', () => {
    const monitor = buildMonitor();
    monitor.remediation.setKillSwitch(true);

    const status = getMonitorStatus(monitor);

    expect(status.running).toBe(false);
    expect(status.remediationMode).toBe('simulated');
    expect(status.remediation).toEqual({ dispatched: 0, succeeded: 0, failed: 0, retries: 0, killSwitch: true });
    expect(status.notifications).toEqual({ delivered: 0, deduplicated: 0, suppressed: 0, failed: 0 });
    expect(status.alerts.map((a) => a.status)).toEqual(['ok', 'ok', 'ok']);
    expect(status.thresholds).toHaveLength(3);
  });
});

describe('shutdownTimeoutMs', () => {
  it('covers a full tick of exhausted retries with default settings', () => {
    // per kind: 10s read + 4 x 30s attempts + 7s backoff + 2 x 10s posts = 157s
    expect(shutdownTimeoutMs(loadConfig({}))).toBe(3 * 157_000 + 20_000 + 5_000);
  });

  it('shrinks with fewer retries and shorter timeouts', () => {
    const config = loadConfig({ REMEDIATOR_RETRY_ATTEMPTS: '0', REMEDIATOR_TIMEOUT: '5', METRIC_TIMEOUT_MS: '1000' });
    // per kind: 1s read + 5s attempt + 20s posts = 26s
    expect(shutdownTimeoutMs(config)).toBe(3 * 26_000 + 20_000 + 5_000);
  });
});
