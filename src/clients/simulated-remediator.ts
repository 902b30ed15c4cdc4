/**
 * Simulated remediation executor.
 *
 * Same contract as the live HTTP executor, but each issue type maps to a
 * handler that only describes the steps it would take. Selected with
 * REMEDIATION_MODE=simulated so the dispatcher runs unchanged in
 * environments where nothing should actually be touched.
 */

import type { IssueType, RemediationExecutor, RemediationOutcome, RemediationRequest } from '../monitor/types.js';

type SimulatedHandler = (request: RemediationRequest) => string[];

function contextString(request: RemediationRequest, key: string, fallback: string): string {
  const value = request.context[key];
  return typeof value === 'string' && value ? value : fallback;
}

const HANDLERS: Record<IssueType, SimulatedHandler> = {
  high_cpu: (request) => [
    `Identified top CPU consumers on ${contextString(request, 'hostname', 'host')} (simulated)`,
    'Simulated termination of runaway process',
    'Simulated cleanup of stale temp files',
  ],
  high_memory: () => [
    'Simulated release of reclaimable memory',
    'Simulated page cache drop',
  ],
  high_disk: () => [
    'Simulated cleanup of temp files older than 1 day',
    'Simulated removal of log files older than 30 days',
    'Simulated package cache cleanup',
  ],
  service_restart: (request) => {
    const service = contextString(request, 'serviceName', 'remediation-service');
    return [`Simulated restart of ${service}`];
  },
};

function isIssueType(value: string): value is IssueType {
  return Object.hasOwn(HANDLERS, value);
}

export class SimulatedRemediationExecutor implements RemediationExecutor {
  readonly mode = 'simulated' as const;

  async execute(request: RemediationRequest): Promise<RemediationOutcome> {
    const started = Date.now();
    const issueType: string = request.issueType;

    if (!isIssueType(issueType)) {
      return {
        success: false,
        message: `Unknown issue type: ${issueType}`,
        detailSteps: [],
        executionDurationMs: 0,
        error: 'unsupported_issue_type',
      };
    }

    const steps = HANDLERS[issueType](request);
    return {
      success: true,
      message: `${issueType} remediation simulated (${steps.length} steps)`,
      detailSteps: steps,
      executionDurationMs: Date.now() - started,
    };
  }

  async supportedIssueTypes(): Promise<readonly string[]> {
    return Object.keys(HANDLERS);
  }
}
