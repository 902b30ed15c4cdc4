import { describe, it, expect, vi, beforeEach, type Mock } from 'vitest';
import { applyKillSwitch, liveness } from '../api/routes.js';
import { loadConfig } from '../config.js';
import { createMonitor, getMonitorStatus, type Monitor } from '../monitor/index.js';
import { SimulatedRemediationExecutor } from '../clients/simulated-remediator.js';
import type { ChatChannel } from '../monitor/types.js';

vi.spyOn(console, 'log').mockImplementation(() => {});

let post: Mock<ChatChannel['post']>;
let monitor: Monitor;

beforeEach(() => {
  post = vi.fn<ChatChannel['post']>().mockResolvedValue({ ok: true });
  monitor = createMonitor(loadConfig({}), {
    source: { sample: async (kind) => ({ kind, value: 10, hostname: 'web-01', observedAt: Date.now() }) },
    healthSource: null,
    executor: new SimulatedRemediationExecutor(),
    channel: { name: 'test-channel', post },
  });
});

describe('liveness', () => {
  it('reports ok with the package version', () => {
    const body = liveness();

    expect(body.status).toBe('ok');
    expect(body.version).toBe('1.0.0');
    expect(body.uptime).toBeGreaterThan(0);
  });
});

describe('applyKillSwitch', () => {
  it('rejects a body without a boolean flag', () => {
    expect(applyKillSwitch(monitor, { active: 'yes' })).toEqual({
      ok: false,
      error: 'Body must be { "active": boolean }',
    });
    expect(applyKillSwitch(monitor, undefined).ok).toBe(false);
    expect(monitor.remediation.isKillSwitchActive()).toBe(false);
    expect(post).not.toHaveBeenCalled();
  });

  it('activates the kill switch and announces it', () => {
    expect(applyKillSwitch(monitor, { active: true })).toEqual({ ok: true, killSwitch: true });

    expect(monitor.remediation.isKillSwitchActive()).toBe(true);
    expect(post).toHaveBeenCalledWith(
      'KILL SWITCH ACTIVATED -- automated remediation disabled by operator',
      'warning',
    );
  });

  it('deactivates it again', () => {
    applyKillSwitch(monitor, { active: true });
    expect(applyKillSwitch(monitor, { active: false })).toEqual({ ok: true, killSwitch: false });
    expect(monitor.remediation.isKillSwitchActive()).toBe(false);
  });
});

describe('monitor status', () => {
  it('reports the kill switch the route toggled', () => {
    applyKillSwitch(monitor, { active: true });
    const status = getMonitorStatus(monitor);

    expect(status.running).toBe(false);
    expect(status.checkCount).toBe(0);
    expect(status.remediationMode).toBe('simulated');
    expect(status.remediation.killSwitch).toBe(true);
    expect(status.alerts.map((a) => a.kind)).toEqual(['cpu', 'memory', 'disk']);
  });
});
