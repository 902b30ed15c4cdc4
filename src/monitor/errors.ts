/**
 * Error taxonomy for the monitor loop.
 *
 * Only ConfigurationError ever leaves the core, and only during startup.
 * Acquisition and transport errors are caught at the tick boundary and
 * turned into skipped kinds or degraded outcomes.
 */

export class MonitorError extends Error {
  readonly details: Record<string, unknown>;

  constructor(message: string, details: Record<string, unknown> = {}) {
    super(message);
    this.name = new.target.name;
    this.details = details;
  }
}

/** Invalid or inconsistent configuration. Fatal at startup. */
export class ConfigurationError extends MonitorError {}

/** The metric source could not produce a usable reading. */
export class AcquisitionError extends MonitorError {}

/**
 * A remote call failed before an application-level answer came back:
 * connection refused, timeout, non-2xx status, unparseable body.
 */
export class TransportError extends MonitorError {
  readonly status?: number;

  constructor(message: string, status?: number) {
    super(message, status === undefined ? {} : { status });
    this.status = status;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
