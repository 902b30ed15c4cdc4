/**
 * Metric kind -> remediation issue type registry.
 *
 * Keyed by MetricKind so a missing or misspelled entry is a compile error,
 * and checked again at startup against the executor's supported issue
 * types so a remote service without a handler fails fast instead of
 * silently ignoring requests.
 */

import { ConfigurationError } from './errors.js';
import type { IssueType, MetricKind, RemediationExecutor } from './types.js';

interface IssueDefinition {
  issueType: IssueType;
  priority: number;
}

export const ISSUE_REGISTRY: Record<MetricKind, IssueDefinition> = {
  cpu: { issueType: 'high_cpu', priority: 6 },
  memory: { issueType: 'high_memory', priority: 7 },
  disk: { issueType: 'high_disk', priority: 5 },
  service_health: { issueType: 'service_restart', priority: 9 },
};

export function issueFor(kind: MetricKind): IssueDefinition {
  return ISSUE_REGISTRY[kind];
}

/**
 * Verify every configured kind maps to an issue type the executor handles.
 * A live executor that cannot list its actions only gets a warning; the
 * remote side may simply not be up yet.
 */
export async function validateIssueRegistry(
  kinds: readonly MetricKind[],
  executor: RemediationExecutor,
): Promise<void> {
  let supported: readonly string[];
  try {
    supported = await executor.supportedIssueTypes();
  } catch (err) {
    if (executor.mode === 'simulated') throw err;
    console.warn(
      '[Remediation] Could not list remote remediation actions, skipping registry check:',
      err instanceof Error ? err.message : err,
    );
    return;
  }

  const missing = kinds
    .map((kind) => ({ kind, issueType: ISSUE_REGISTRY[kind].issueType }))
    .filter(({ issueType }) => !supported.includes(issueType));

  if (missing.length > 0) {
    const list = missing.map((m) => `${m.kind} -> ${m.issueType}`).join(', ');
    throw new ConfigurationError(`Remediation executor (${executor.mode}) has no handler for: ${list}`, {
      missing: missing.map((m) => m.issueType),
      supported: [...supported],
    });
  }

  console.log(`[Remediation] Issue registry validated against ${executor.mode} executor (${kinds.length} kinds)`);
}
