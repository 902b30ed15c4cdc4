/**
 * Remediation dispatcher -- turns a raised alert into one remediation
 * request against the configured executor.
 *
 * Pipeline:
 *  1. Kill switch check (operator toggle, skips the executor entirely)
 *  2. Build the request from the issue registry and the reading
 *  3. Execute with a per-attempt timeout, enforced on the executor call
 *  4. Retry transport failures only, with exponential backoff from 1s
 *     capped at the timeout
 *  5. Degrade to a synthetic failed outcome once retries run out
 *
 * dispatch() never rejects; the scheduler relies on that.
 */

import { TransportError, errorMessage } from './errors.js';
import { issueFor } from './issue-types.js';
import { withTimeout } from './timeout.js';
import type {
  ClockFn,
  RaisedTransition,
  RemediationExecutor,
  RemediationOutcome,
  RemediationRequest,
  SleepFn,
} from './types.js';

export const UNREACHABLE_MESSAGE = 'remediation service unreachable';
export const KILL_SWITCH_MESSAGE = 'remediation disabled by kill switch';

const BASE_BACKOFF_MS = 1_000;

export interface RemediationDispatcherOptions {
  executor: RemediationExecutor;
  /** Per-attempt timeout */
  timeoutMs: number;
  /** Retries after the first attempt */
  retryAttempts: number;
  sleep?: SleepFn;
  clock?: ClockFn;
}

export interface RemediationStats {
  dispatched: number;
  succeeded: number;
  failed: number;
  retries: number;
  killSwitch: boolean;
}

const defaultSleep: SleepFn = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Backoff before retry number `retry` (1-based): 1s, 2s, 4s, ... never more
 * than the per-attempt timeout.
 */
export function backoffDelay(retry: number, timeoutMs: number): number {
  return Math.min(BASE_BACKOFF_MS * 2 ** (retry - 1), timeoutMs);
}

export function buildRemediationRequest(transition: RaisedTransition): RemediationRequest {
  const { issueType, priority } = issueFor(transition.kind);
  const { reading, threshold } = transition;

  return {
    issueType,
    priority,
    context: {
      hostname: reading.hostname,
      timestamp: new Date(reading.observedAt).toISOString(),
      [`${transition.kind}_percent`]: Math.round(reading.value * 10) / 10,
      threshold: threshold.highWaterMark,
      consecutiveBreaches: transition.consecutiveBreaches,
    },
  };
}

export class RemediationDispatcher {
  private readonly executor: RemediationExecutor;
  private readonly timeoutMs: number;
  private readonly retryAttempts: number;
  private readonly sleep: SleepFn;
  private readonly clock: ClockFn;
  private killSwitch = false;
  private readonly stats = { dispatched: 0, succeeded: 0, failed: 0, retries: 0 };

  constructor(options: RemediationDispatcherOptions) {
    this.executor = options.executor;
    this.timeoutMs = options.timeoutMs;
    this.retryAttempts = options.retryAttempts;
    this.sleep = options.sleep ?? defaultSleep;
    this.clock = options.clock ?? Date.now;
  }

  async dispatch(transition: RaisedTransition): Promise<RemediationOutcome> {
    this.stats.dispatched++;
    const request = buildRemediationRequest(transition);
    const started = this.clock();

    if (this.killSwitch) {
      console.warn(`[Remediation] ${request.issueType} for ${transition.kind} skipped: kill switch is active`);
      return this.record({
        success: false,
        message: KILL_SWITCH_MESSAGE,
        detailSteps: [],
        executionDurationMs: 0,
      });
    }

    let lastError = '';
    for (let attempt = 1; attempt <= this.retryAttempts + 1; attempt++) {
      if (attempt > 1) {
        const delay = backoffDelay(attempt - 1, this.timeoutMs);
        this.stats.retries++;
        console.log(
          `[Remediation] Retrying ${request.issueType} in ${delay}ms (retry ${attempt - 1}/${this.retryAttempts})`,
        );
        await this.sleep(delay);
      }

      console.log(
        `[Remediation] Dispatching ${request.issueType} for ${transition.kind} ` +
          `(attempt ${attempt}, priority ${request.priority}, mode ${this.executor.mode})`,
      );

      try {
        // Enforced here as well as inside the executor
        const outcome = await withTimeout(
          this.executor.execute(request, this.timeoutMs),
          this.timeoutMs,
          () => new TransportError(`remediation timed out after ${this.timeoutMs}ms`),
        );
        console.log(
          `[Remediation] ${request.issueType}: ${outcome.success ? 'SUCCESS' : 'FAILURE'} -- ${outcome.message}`,
        );
        return this.record(outcome);
      } catch (err) {
        if (!(err instanceof TransportError)) {
          // Not a transport problem: surface once, do not retry
          console.error(`[Remediation] ${request.issueType} failed unexpectedly:`, errorMessage(err));
          return this.record({
            success: false,
            message: `remediation failed: ${errorMessage(err)}`,
            detailSteps: [],
            executionDurationMs: this.clock() - started,
            error: errorMessage(err),
          });
        }
        lastError = err.message;
        console.warn(`[Remediation] Transport failure on attempt ${attempt}: ${err.message}`);
      }
    }

    console.error(
      `[Remediation] ${request.issueType} gave up after ${this.retryAttempts + 1} attempts: ${lastError}`,
    );
    return this.record({
      success: false,
      message: UNREACHABLE_MESSAGE,
      detailSteps: [`last error: ${lastError}`],
      executionDurationMs: this.clock() - started,
      error: lastError,
    });
  }

  setKillSwitch(active: boolean): void {
    this.killSwitch = active;
    console.log(`[Remediation] Kill switch ${active ? 'ACTIVATED' : 'deactivated'}`);
  }

  isKillSwitchActive(): boolean {
    return this.killSwitch;
  }

  getStats(): RemediationStats {
    return { ...this.stats, killSwitch: this.killSwitch };
  }

  private record(outcome: RemediationOutcome): RemediationOutcome {
    if (outcome.success) this.stats.succeeded++;
    else this.stats.failed++;
    return outcome;
  }
}
