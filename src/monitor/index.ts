/**
 * Monitor lifecycle management.
 *
 * Builds the collaborators from configuration, validates the issue registry
 * and runs the scheduler:
 *  - Metrics: every CHECK_INTERVAL (cpu, memory, disk)
 *  - Health:  every HEALTH_CHECK_INTERVAL (remediation service, live mode only)
 */

import { createChatChannel } from '../clients/chat.js';
import { HostMetricSource, ServiceHealthSource } from '../clients/host-metrics.js';
import { HttpRemediationExecutor } from '../clients/remediator.js';
import { SimulatedRemediationExecutor } from '../clients/simulated-remediator.js';
import { secretValues, type MonitorConfig } from '../config.js';
import { validateIssueRegistry } from './issue-types.js';
import {
  DEFAULT_POST_TIMEOUT_MS,
  MAX_DELIVERY_ATTEMPTS,
  NotificationDispatcher,
  type NotificationStats,
} from './notifier.js';
import { RemediationDispatcher, backoffDelay, type RemediationStats } from './remediation.js';
import { Scheduler, type SchedulerStatus } from './scheduler.js';
import { AlertStateMachine } from './state-machine.js';
import { HOST_METRIC_KINDS, type ChatChannel, type MetricSource, type RemediationExecutor } from './types.js';

export interface Monitor {
  scheduler: Scheduler;
  stateMachine: AlertStateMachine;
  remediation: RemediationDispatcher;
  notifier: NotificationDispatcher;
  executor: RemediationExecutor;
}

/** Overrides for the outward-facing collaborators */
export interface MonitorDeps {
  source?: MetricSource;
  healthSource?: MetricSource | null;
  executor?: RemediationExecutor;
  channel?: ChatChannel;
}

export interface MonitorStatus extends SchedulerStatus {
  remediationMode: RemediationExecutor['mode'];
  remediation: RemediationStats;
  notifications: NotificationStats;
}

function buildExecutor(config: MonitorConfig): RemediationExecutor {
  if (config.remediationMode === 'live') {
    return new HttpRemediationExecutor({ baseUrl: config.remediatorUrl });
  }
  return new SimulatedRemediationExecutor();
}

/**
 * Wire the monitor from configuration. Nothing runs until startMonitor().
 */
export function createMonitor(config: MonitorConfig, deps: MonitorDeps = {}): Monitor {
  const executor = deps.executor ?? buildExecutor(config);

  // Only a live executor has a remote service worth probing
  let healthSource: MetricSource | undefined;
  if (deps.healthSource !== undefined) {
    healthSource = deps.healthSource ?? undefined;
  } else if (executor instanceof HttpRemediationExecutor) {
    healthSource = new ServiceHealthSource(executor);
  }

  const thresholds = healthSource ? config.thresholds : config.thresholds.filter((t) => t.kind !== 'service_health');

  const stateMachine = new AlertStateMachine({
    thresholds,
    cooldownMs: config.cooldownMs,
    renotifyInterval: config.renotifyInterval,
  });

  const remediation = new RemediationDispatcher({
    executor,
    timeoutMs: config.remediatorTimeoutMs,
    retryAttempts: config.remediatorRetryAttempts,
  });

  const notifier = new NotificationDispatcher({
    channel: deps.channel ?? createChatChannel(config.chat),
    dedupeWindowMs: config.dedupeWindowMs,
    secrets: secretValues(config),
  });

  const scheduler = new Scheduler({
    source: deps.source ?? new HostMetricSource({ diskPath: config.diskPath }),
    healthSource,
    stateMachine,
    remediation,
    notifier,
    checkIntervalMs: config.checkIntervalMs,
    healthCheckIntervalMs: config.healthCheckIntervalMs,
    metricTimeoutMs: config.metricTimeoutMs,
  });

  return { scheduler, stateMachine, remediation, notifier, executor };
}

/**
 * Validate the issue registry, announce startup and start the loops.
 * Rejects with ConfigurationError when the executor cannot handle a
 * configured kind.
 */
export async function startMonitor(monitor: Monitor): Promise<void> {
  if (monitor.scheduler.isRunning()) {
    console.warn('[Monitor] Already running, skipping start');
    return;
  }

  await validateIssueRegistry(monitor.stateMachine.kinds(), monitor.executor);

  const kinds = monitor.stateMachine.kinds().join(', ');
  await monitor.notifier.announce(
    `Host monitor started: watching ${kinds} (remediation: ${monitor.executor.mode})`,
    'info',
  );

  monitor.scheduler.start();
  console.log('[Monitor] Host monitoring service started');
}

/**
 * Stop the loops, let in-flight ticks finish and announce the shutdown
 * with uptime and counters.
 */
export async function stopMonitor(monitor: Monitor): Promise<void> {
  if (!monitor.scheduler.isRunning()) return;

  const { uptimeSeconds } = monitor.scheduler.getStatus();
  await monitor.scheduler.stop();

  const { checkCount, alertCount, remediationCount } = monitor.scheduler.getStatus();
  await monitor.notifier.announce(
    `Host monitor stopped after ${uptimeSeconds}s: ${checkCount} checks, ` +
      `${alertCount} alerts, ${remediationCount} remediations`,
    'info',
  );
  console.log('[Monitor] Host monitoring service stopped');
}

export function getMonitorStatus(monitor: Monitor): MonitorStatus {
  return {
    ...monitor.scheduler.getStatus(),
    remediationMode: monitor.executor.mode,
    remediation: monitor.remediation.getStats(),
    notifications: monitor.notifier.getStats(),
  };
}

/**
 * Upper bound on a cooperative shutdown: one full metrics tick where every
 * kind acquires, exhausts its remediation retries and both delivery
 * attempts, then the shutdown announcement, plus 5s of slack.
 */
export function shutdownTimeoutMs(config: MonitorConfig): number {
  let remediation = (config.remediatorRetryAttempts + 1) * config.remediatorTimeoutMs;
  for (let retry = 1; retry <= config.remediatorRetryAttempts; retry++) {
    remediation += backoffDelay(retry, config.remediatorTimeoutMs);
  }

  const delivery = MAX_DELIVERY_ATTEMPTS * DEFAULT_POST_TIMEOUT_MS;
  const perKind = config.metricTimeoutMs + remediation + delivery;
  return HOST_METRIC_KINDS.length * perKind + delivery + 5_000;
}
