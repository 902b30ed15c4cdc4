/**
 * Threshold evaluator -- maps a reading to a severity using a high-water mark
 * and a hysteresis floor.
 *
 * Boundary convention (applied the same way to every kind):
 *  - breach:   value >= highWaterMark
 *  - recovery: value <= lowWaterMark, but only while alerting
 *  - outside an alert, [lowWaterMark, highWaterMark) is a warning
 */

import { ConfigurationError } from './errors.js';
import type { AlertStatus, MetricKind, MetricReading, Severity, ThresholdConfig } from './types.js';

export const METRIC_LABELS: Record<MetricKind, string> = {
  cpu: 'CPU',
  memory: 'Memory',
  disk: 'Disk',
  service_health: 'Remediation service',
};

/**
 * Evaluate one reading. Pure; malformed readings are rejected upstream.
 */
export function evaluateSeverity(
  reading: MetricReading,
  threshold: ThresholdConfig,
  status: AlertStatus = 'ok',
): Severity {
  if (reading.value >= threshold.highWaterMark) return 'breach';

  if (status === 'alerting') {
    // Sticky band: only a drop to the floor counts as recovery
    return reading.value <= threshold.lowWaterMark ? 'normal' : 'warning';
  }

  return reading.value < threshold.lowWaterMark ? 'normal' : 'warning';
}

/**
 * Reject bounds the evaluator cannot work with. Called once at startup;
 * a kind with bad bounds is never evaluated.
 */
export function validateThresholds(thresholds: readonly ThresholdConfig[]): void {
  const seen = new Set<MetricKind>();

  for (const t of thresholds) {
    if (seen.has(t.kind)) {
      throw new ConfigurationError(`Duplicate threshold for ${t.kind}`, { kind: t.kind });
    }
    seen.add(t.kind);

    for (const [name, value] of [['highWaterMark', t.highWaterMark], ['lowWaterMark', t.lowWaterMark]] as const) {
      if (!Number.isFinite(value) || value < 0 || value > 100) {
        throw new ConfigurationError(
          `Invalid ${name} for ${t.kind}: expected a percentage in [0, 100], got ${value}`,
          { kind: t.kind, setting: name, value },
        );
      }
    }

    if (t.lowWaterMark >= t.highWaterMark) {
      throw new ConfigurationError(
        `Invalid thresholds for ${t.kind}: low-water mark ${t.lowWaterMark} must be below high-water mark ${t.highWaterMark}`,
        { kind: t.kind, lowWaterMark: t.lowWaterMark, highWaterMark: t.highWaterMark },
      );
    }

    if (!(t.checkIntervalMs > 0)) {
      throw new ConfigurationError(`Check interval for ${t.kind} must be positive`, {
        kind: t.kind,
        checkIntervalMs: t.checkIntervalMs,
      });
    }
  }
}

/** One-decimal percentage used in log lines and chat messages */
export function formatPercent(value: number): string {
  return `${value.toFixed(1)}%`;
}
