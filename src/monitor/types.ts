// ---------------------------------------------------------------------------
// Monitoring domain types
// ---------------------------------------------------------------------------

/**
 * Kinds of metrics the scheduler samples. `service_health` is boolean-coded:
 * 0 means the remediation service answered healthy, 100 means it did not.
 */
export const ALL_METRIC_KINDS = ['cpu', 'memory', 'disk', 'service_health'] as const;

export type MetricKind = (typeof ALL_METRIC_KINDS)[number];

export const HOST_METRIC_KINDS: readonly MetricKind[] = ['cpu', 'memory', 'disk'];

/**
 * A single sample. Created once per acquisition and never mutated.
 */
export interface MetricReading {
  readonly kind: MetricKind;
  /** Percentage in [0, 100] */
  readonly value: number;
  readonly hostname: string;
  /** Unix epoch milliseconds */
  readonly observedAt: number;
}

/**
 * Per-kind thresholds. `lowWaterMark` is the hysteresis floor an alerting
 * metric must drop to before it clears.
 */
export interface ThresholdConfig {
  readonly kind: MetricKind;
  readonly highWaterMark: number;
  readonly lowWaterMark: number;
  readonly checkIntervalMs: number;
}

export type Severity = 'normal' | 'warning' | 'breach';

export type AlertStatus = 'ok' | 'alerting' | 'cooldown';

export interface AlertState {
  kind: MetricKind;
  status: AlertStatus;
  lastTransitionAt: number;
  consecutiveBreaches: number;
  cooldownUntil: number;
}

interface TransitionBase {
  kind: MetricKind;
  reading: MetricReading;
  threshold: ThresholdConfig;
  consecutiveBreaches: number;
}

export interface RaisedTransition extends TransitionBase {
  type: 'raised';
  from: 'ok';
  to: 'alerting';
}

export interface RepeatedTransition extends TransitionBase {
  type: 'repeated';
  from: 'alerting';
  to: 'alerting';
  /** True unless consecutiveBreaches hit a multiple of the re-notify interval */
  suppressed: boolean;
}

export interface ClearedTransition extends TransitionBase {
  type: 'cleared';
  from: 'alerting';
  to: 'cooldown';
}

/**
 * Produced at most once per kind per tick and consumed immediately by the
 * remediation and notification dispatchers.
 */
export type AlertTransition = RaisedTransition | RepeatedTransition | ClearedTransition;

// ---------------------------------------------------------------------------
// Remediation
// ---------------------------------------------------------------------------

export type IssueType = 'high_cpu' | 'high_memory' | 'high_disk' | 'service_restart';

export type RemediationContextValue = string | number | boolean | null;

export interface RemediationRequest {
  issueType: IssueType;
  context: Record<string, RemediationContextValue>;
  /** 1 (lowest) to 10 (highest) */
  priority: number;
}

export interface RemediationOutcome {
  success: boolean;
  message: string;
  detailSteps: string[];
  executionDurationMs: number;
  error?: string;
}

/**
 * Capability interface for whatever actually performs remediation. Transport
 * problems (unreachable, timed out, non-2xx) must surface as TransportError so
 * the dispatcher can retry them; an explicit failure is a resolved outcome
 * with `success: false`.
 */
export interface RemediationExecutor {
  readonly mode: 'live' | 'simulated';
  execute(request: RemediationRequest, timeoutMs: number): Promise<RemediationOutcome>;
  /** Issue types this executor can handle */
  supportedIssueTypes(): Promise<readonly string[]>;
}

// ---------------------------------------------------------------------------
// Notifications
// ---------------------------------------------------------------------------

export type NotificationSeverity = 'info' | 'warning' | 'error' | 'critical';

export interface NotificationMessage {
  severity: NotificationSeverity;
  text: string;
  channel: string;
  dedupeKey: string;
}

export type PostResult = { ok: true } | { ok: false; error: string };

/**
 * Outbound chat transport. Authentication and rendering are its concern;
 * callers only hand it sanitized text.
 */
export interface ChatChannel {
  readonly name: string;
  post(text: string, severity: NotificationSeverity): Promise<PostResult>;
}

export interface DeliveryResult {
  delivered: boolean;
  attempts: number;
  dedupeKey: string;
  reason?: 'suppressed' | 'deduplicated' | 'failed';
}

// ---------------------------------------------------------------------------
// Metric acquisition
// ---------------------------------------------------------------------------

export interface MetricSource {
  sample(kind: MetricKind): Promise<MetricReading>;
}

/** Injectable clock, epoch milliseconds */
export type ClockFn = () => number;

/** Injectable delay used for retry backoff */
export type SleepFn = (ms: number) => Promise<void>;
