/**
 * Scheduler -- drives the monitor loop.
 *
 * Two independent loops share one alert state machine:
 *  - metrics (checkInterval):       cpu, memory, disk, evaluated in order
 *  - health  (healthCheckInterval): service_health
 *
 * Per kind: acquire -> evaluate -> advance -> raised: remediate, then notify
 * with the outcome; repeated/cleared: notify only; no transition: nothing.
 *
 * Each loop runs at most one tick at a time. A timer that fires while the
 * previous tick is still in flight is skipped (not queued) and logged. The
 * two loops never touch the same kind, and the state machine commits each
 * kind's state synchronously, so interleaving their awaits is safe.
 */

import { z } from 'zod';
import { AcquisitionError, errorMessage } from './errors.js';
import type { AlertStateMachine } from './state-machine.js';
import type { RemediationDispatcher } from './remediation.js';
import type { NotificationDispatcher } from './notifier.js';
import { formatPercent } from './thresholds.js';
import { withTimeout } from './timeout.js';
import {
  ALL_METRIC_KINDS,
  HOST_METRIC_KINDS,
  type AlertState,
  type ClockFn,
  type DeliveryResult,
  type MetricKind,
  type MetricReading,
  type MetricSource,
  type RemediationOutcome,
  type ThresholdConfig,
} from './types.js';

type LoopName = 'metrics' | 'health';

export interface SchedulerOptions {
  source: MetricSource;
  /** Source for the service_health kind; the health loop is off without one */
  healthSource?: MetricSource;
  stateMachine: AlertStateMachine;
  remediation: RemediationDispatcher;
  notifier: NotificationDispatcher;
  checkIntervalMs: number;
  healthCheckIntervalMs: number;
  metricTimeoutMs: number;
  clock?: ClockFn;
}

export interface KindResult {
  kind: MetricKind;
  /** 'skipped' when acquisition failed */
  status: 'evaluated' | 'skipped';
  reading?: MetricReading;
  transition?: 'raised' | 'repeated' | 'cleared';
  outcome?: RemediationOutcome;
  delivery?: DeliveryResult;
  error?: string;
}

export interface TickReport {
  loop: LoopName;
  startedAt: number;
  durationMs: number;
  results: KindResult[];
}

export interface SchedulerStatus {
  running: boolean;
  startedAt: string | null;
  uptimeSeconds: number;
  checkCount: number;
  healthCheckCount: number;
  alertCount: number;
  remediationCount: number;
  skippedTicks: number;
  lastTickAt: string | null;
  alerts: AlertState[];
  thresholds: ThresholdConfig[];
}

const readingSchema = z.object({
  kind: z.enum(ALL_METRIC_KINDS),
  value: z.number().finite().min(0).max(100),
  hostname: z.string().min(1),
  observedAt: z.number().finite(),
});

export class Scheduler {
  private readonly options: SchedulerOptions;
  private readonly clock: ClockFn;
  private readonly timers: ReturnType<typeof setInterval>[] = [];
  private readonly inFlight: Record<LoopName, Promise<TickReport> | null> = { metrics: null, health: null };
  private running = false;
  private startedAt: number | null = null;
  private lastTickAt: number | null = null;
  private readonly counters = {
    checkCount: 0,
    healthCheckCount: 0,
    alertCount: 0,
    remediationCount: 0,
    skippedTicks: 0,
  };

  constructor(options: SchedulerOptions) {
    this.options = options;
    this.clock = options.clock ?? Date.now;
  }

  /**
   * Run the first ticks immediately, then start the interval timers.
   */
  start(): void {
    if (this.running) {
      console.warn('[Scheduler] Already running, skipping start');
      return;
    }

    this.running = true;
    this.startedAt = this.clock();
    const { checkIntervalMs, healthCheckIntervalMs, healthSource } = this.options;

    this.trigger('metrics');
    this.timers.push(setInterval(() => this.trigger('metrics'), checkIntervalMs));

    if (healthSource) {
      this.trigger('health');
      this.timers.push(setInterval(() => this.trigger('health'), healthCheckIntervalMs));
    }

    console.log('[Scheduler] Monitoring started');
    console.log(`[Scheduler]   Metrics: every ${checkIntervalMs / 1000}s (${this.metricKinds().join(', ')})`);
    if (healthSource) {
      console.log(`[Scheduler]   Health:  every ${healthCheckIntervalMs / 1000}s (service_health)`);
    }
  }

  /**
   * Cooperative shutdown: no new ticks start, in-flight ticks finish within
   * their own timeouts.
   */
  async stop(): Promise<void> {
    if (!this.running) return;

    this.running = false;
    for (const timer of this.timers) {
      clearInterval(timer);
    }
    this.timers.length = 0;

    const pending = [this.inFlight.metrics, this.inFlight.health].filter(
      (p): p is Promise<TickReport> => p !== null,
    );
    if (pending.length > 0) {
      console.log(`[Scheduler] Waiting for ${pending.length} in-flight tick(s) to finish`);
      await Promise.allSettled(pending);
    }

    console.log('[Scheduler] Monitoring stopped');
  }

  isRunning(): boolean {
    return this.running;
  }

  /** Run one metrics tick now (cpu, memory, disk). */
  async runMetricTick(): Promise<TickReport> {
    const report = await this.runTick('metrics', this.metricKinds(), this.options.source);
    this.counters.checkCount++;
    return report;
  }

  /** Run one service-health tick now. */
  async runHealthTick(): Promise<TickReport> {
    const source = this.options.healthSource;
    const kinds: MetricKind[] = source && this.options.stateMachine.hasKind('service_health') ? ['service_health'] : [];
    const report = await this.runTick('health', kinds, source ?? this.options.source);
    this.counters.healthCheckCount++;
    return report;
  }

  getStatus(): SchedulerStatus {
    const { stateMachine } = this.options;
    const now = this.clock();
    return {
      running: this.running,
      startedAt: this.startedAt === null ? null : new Date(this.startedAt).toISOString(),
      uptimeSeconds: this.startedAt === null ? 0 : Math.floor((now - this.startedAt) / 1000),
      ...this.counters,
      lastTickAt: this.lastTickAt === null ? null : new Date(this.lastTickAt).toISOString(),
      alerts: stateMachine.snapshot(),
      thresholds: stateMachine.kinds().map((k) => stateMachine.getThreshold(k)),
    };
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  private metricKinds(): MetricKind[] {
    return HOST_METRIC_KINDS.filter((k) => this.options.stateMachine.hasKind(k));
  }

  /** Timer entry point: skip if the previous tick of this loop is still running */
  private trigger(loop: LoopName): void {
    if (!this.running) return;

    if (this.inFlight[loop]) {
      this.counters.skippedTicks++;
      console.warn(`[Scheduler] ${loop} tick overran its interval, skipping this tick`);
      return;
    }

    const tick = (loop === 'metrics' ? this.runMetricTick() : this.runHealthTick())
      .catch((err): TickReport => {
        console.error(`[Scheduler] ${loop} tick error:`, errorMessage(err));
        return { loop, startedAt: this.clock(), durationMs: 0, results: [] };
      })
      .finally(() => {
        this.inFlight[loop] = null;
      });

    this.inFlight[loop] = tick;
  }

  private async runTick(loop: LoopName, kinds: readonly MetricKind[], source: MetricSource): Promise<TickReport> {
    const startedAt = this.clock();
    const results: KindResult[] = [];

    // One kind at a time
    for (const kind of kinds) {
      results.push(await this.processKind(kind, source));
    }

    this.lastTickAt = this.clock();
    const durationMs = this.lastTickAt - startedAt;
    console.log(`[Scheduler] ${loop} tick completed in ${durationMs}ms (${results.length} kinds)`);
    return { loop, startedAt, durationMs, results };
  }

  private async processKind(kind: MetricKind, source: MetricSource): Promise<KindResult> {
    let reading: MetricReading;
    try {
      reading = await this.acquire(kind, source);
    } catch (err) {
      const message = errorMessage(err);
      console.warn(`[Scheduler] ${kind}: acquisition failed, skipping this tick: ${message}`);
      return { kind, status: 'skipped', error: message };
    }

    try {
      const { previous, next, severity, transition } = this.options.stateMachine.advance(reading);

      if (previous.status !== next.status) {
        console.log(
          `[Scheduler] ${kind}: ${previous.status} -> ${next.status} ` +
            `(${transition?.type ?? 'none'}, ${formatPercent(reading.value)}, ${severity})`,
        );
      }

      if (!transition) {
        return { kind, status: 'evaluated', reading };
      }

      switch (transition.type) {
        case 'raised': {
          this.counters.alertCount++;
          const outcome = await this.options.remediation.dispatch(transition);
          if (outcome.success) this.counters.remediationCount++;
          const delivery = await this.options.notifier.notify(transition, outcome);
          return { kind, status: 'evaluated', reading, transition: 'raised', outcome, delivery };
        }
        case 'repeated':
        case 'cleared': {
          const delivery = await this.options.notifier.notify(transition);
          return { kind, status: 'evaluated', reading, transition: transition.type, delivery };
        }
      }
    } catch (err) {
      // Dispatchers do not throw; anything landing here is confined to this kind
      const message = errorMessage(err);
      console.error(`[Scheduler] ${kind}: unexpected error after evaluation: ${message}`);
      return { kind, status: 'evaluated', reading, error: message };
    }
  }

  private async acquire(kind: MetricKind, source: MetricSource): Promise<MetricReading> {
    const { metricTimeoutMs } = this.options;
    const raw = await withTimeout(
      source.sample(kind),
      metricTimeoutMs,
      () => new AcquisitionError(`${kind} sample timed out after ${metricTimeoutMs}ms`, { kind }),
    );

    const parsed = readingSchema.safeParse(raw);
    if (!parsed.success) {
      throw new AcquisitionError(`Malformed ${kind} reading: ${parsed.error.issues[0]?.message ?? 'invalid'}`, {
        kind,
      });
    }
    if (parsed.data.kind !== kind) {
      throw new AcquisitionError(`Expected a ${kind} reading, got ${parsed.data.kind}`, { kind });
    }
    return parsed.data;
  }
}
