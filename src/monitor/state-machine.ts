/**
 * AlertStateMachine -- owns the alert state of every configured metric kind.
 *
 * Lifecycle per kind: ok -> alerting -> cooldown -> ok. Cooldown is never
 * skipped, so a cleared alert has to dwell in cooldown and then spend at
 * least one tick in ok before it can be raised again.
 *
 * The machine is a plain object owned by the scheduler. Each advance()
 * computes the complete next state first and commits it with a single Map
 * write, so a state is never observed half-updated.
 */

import { ConfigurationError } from './errors.js';
import { evaluateSeverity } from './thresholds.js';
import type {
  AlertState,
  AlertTransition,
  ClockFn,
  MetricKind,
  MetricReading,
  Severity,
  ThresholdConfig,
} from './types.js';

export interface AlertStateMachineOptions {
  thresholds: readonly ThresholdConfig[];
  cooldownMs: number;
  /** Every Nth consecutive breach is re-notified; the rest are suppressed */
  renotifyInterval: number;
  clock?: ClockFn;
}

export interface AdvanceResult {
  severity: Severity;
  previous: AlertState;
  next: AlertState;
  transition: AlertTransition | null;
}

export class AlertStateMachine {
  private readonly states = new Map<MetricKind, AlertState>();
  private readonly thresholds = new Map<MetricKind, ThresholdConfig>();
  private readonly cooldownMs: number;
  private readonly renotifyInterval: number;
  private readonly clock: ClockFn;

  constructor(options: AlertStateMachineOptions) {
    if (!Number.isInteger(options.renotifyInterval) || options.renotifyInterval < 1) {
      throw new ConfigurationError(`renotifyInterval must be a positive integer, got ${options.renotifyInterval}`);
    }
    if (!(options.cooldownMs >= 0)) {
      throw new ConfigurationError(`cooldownMs must not be negative, got ${options.cooldownMs}`);
    }

    this.cooldownMs = options.cooldownMs;
    this.renotifyInterval = options.renotifyInterval;
    this.clock = options.clock ?? Date.now;

    const now = this.clock();
    for (const threshold of options.thresholds) {
      this.thresholds.set(threshold.kind, threshold);
      this.states.set(threshold.kind, {
        kind: threshold.kind,
        status: 'ok',
        lastTransitionAt: now,
        consecutiveBreaches: 0,
        cooldownUntil: now,
      });
    }
  }

  /**
   * Evaluate a reading against its kind's thresholds and move the kind's
   * state one step. Never throws for a configured kind.
   */
  advance(reading: MetricReading): AdvanceResult {
    const previous = this.getState(reading.kind);
    const threshold = this.getThreshold(reading.kind);
    const now = this.clock();

    const severity = evaluateSeverity(reading, threshold, previous.status);
    let next: AlertState = previous;
    let transition: AlertTransition | null = null;

    switch (previous.status) {
      case 'ok': {
        if (severity === 'breach') {
          next = {
            ...previous,
            status: 'alerting',
            lastTransitionAt: now,
            consecutiveBreaches: 1,
            cooldownUntil: Math.max(previous.cooldownUntil, now),
          };
          transition = {
            type: 'raised',
            kind: reading.kind,
            from: 'ok',
            to: 'alerting',
            reading,
            threshold,
            consecutiveBreaches: 1,
          };
        }
        break;
      }

      case 'alerting': {
        if (severity === 'breach') {
          const consecutiveBreaches = previous.consecutiveBreaches + 1;
          next = { ...previous, consecutiveBreaches };
          transition = {
            type: 'repeated',
            kind: reading.kind,
            from: 'alerting',
            to: 'alerting',
            reading,
            threshold,
            consecutiveBreaches,
            suppressed: consecutiveBreaches % this.renotifyInterval !== 0,
          };
        } else if (severity === 'normal') {
          next = {
            ...previous,
            status: 'cooldown',
            lastTransitionAt: now,
            consecutiveBreaches: 0,
            cooldownUntil: now + this.cooldownMs,
          };
          transition = {
            type: 'cleared',
            kind: reading.kind,
            from: 'alerting',
            to: 'cooldown',
            reading,
            threshold,
            consecutiveBreaches: previous.consecutiveBreaches,
          };
        }
        // warning while alerting: hysteresis hold, nothing changes
        break;
      }

      case 'cooldown': {
        if (now >= previous.cooldownUntil) {
          next = { ...previous, status: 'ok', lastTransitionAt: now, cooldownUntil: now };
        }
        break;
      }
    }

    if (next !== previous) {
      this.states.set(reading.kind, next);
    }

    return { severity, previous, next, transition };
  }

  /** Copy of a kind's current state */
  getState(kind: MetricKind): AlertState {
    const state = this.states.get(kind);
    if (!state) {
      throw new ConfigurationError(`No alert state configured for metric kind "${kind}"`, { kind });
    }
    return { ...state };
  }

  getThreshold(kind: MetricKind): ThresholdConfig {
    const threshold = this.thresholds.get(kind);
    if (!threshold) {
      throw new ConfigurationError(`No threshold configured for metric kind "${kind}"`, { kind });
    }
    return threshold;
  }

  hasKind(kind: MetricKind): boolean {
    return this.states.has(kind);
  }

  kinds(): MetricKind[] {
    return [...this.states.keys()];
  }

  /** Copies of every kind's state, for the status API */
  snapshot(): AlertState[] {
    return [...this.states.values()].map((s) => ({ ...s }));
  }

  /** Number of kinds currently alerting */
  getActiveCount(): number {
    let count = 0;
    for (const state of this.states.values()) {
      if (state.status === 'alerting') count++;
    }
    return count;
  }
}
