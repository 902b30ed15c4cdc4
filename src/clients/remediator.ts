/**
 * Remediation service HTTP client (live executor).
 *
 * Endpoints:
 *  - POST /api/remediation/execute   run a remediation
 *  - GET  /api/remediation/actions   list supported issue types
 *  - GET  /health                    liveness, { status: "healthy" }
 *
 * Every call carries an AbortSignal timeout. Anything short of a parsed
 * 2xx answer is a TransportError so the dispatcher can retry it.
 */

import { z } from 'zod';
import { TransportError, errorMessage } from '../monitor/errors.js';
import type { RemediationExecutor, RemediationOutcome, RemediationRequest } from '../monitor/types.js';

const resultSchema = z.object({
  success: z.boolean(),
  message: z.string(),
  details: z.array(z.string()).nullish(),
  executionTimeMs: z.number().nonnegative().optional(),
  error: z.string().nullish(),
});

const actionsSchema = z.object({
  actions: z.array(z.string()),
});

const healthSchema = z.object({
  status: z.string(),
});

export interface ServiceHealth {
  healthy: boolean;
  responseMs: number;
  status: string;
}

export interface HttpRemediationExecutorOptions {
  baseUrl: string;
  /** Timeout for the health and actions endpoints */
  probeTimeoutMs?: number;
  fetchImpl?: typeof fetch;
}

function describeFetchError(err: unknown, timeoutMs: number): string {
  if (err instanceof Error && (err.name === 'TimeoutError' || err.name === 'AbortError')) {
    return `timed out after ${timeoutMs}ms`;
  }
  return errorMessage(err);
}

export class HttpRemediationExecutor implements RemediationExecutor {
  readonly mode = 'live' as const;
  private readonly baseUrl: string;
  private readonly probeTimeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(options: HttpRemediationExecutorOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.probeTimeoutMs = options.probeTimeoutMs ?? 5_000;
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
  }

  async execute(request: RemediationRequest, timeoutMs: number): Promise<RemediationOutcome> {
    const started = Date.now();
    const hostname = request.context.hostname;
    const timestamp = request.context.timestamp;

    const body = await this.request(
      '/api/remediation/execute',
      {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({
          issueType: request.issueType,
          context: request.context,
          priority: request.priority,
          timestamp: typeof timestamp === 'string' ? timestamp : null,
          hostname: typeof hostname === 'string' ? hostname : null,
        }),
      },
      timeoutMs,
    );

    const parsed = resultSchema.safeParse(body);
    if (!parsed.success) {
      throw new TransportError(`Unexpected remediation response: ${parsed.error.issues[0]?.message ?? 'invalid body'}`);
    }

    const result = parsed.data;
    return {
      success: result.success,
      message: result.message,
      detailSteps: result.details ?? [],
      executionDurationMs: result.executionTimeMs ?? Date.now() - started,
      ...(result.error ? { error: result.error } : {}),
    };
  }

  async supportedIssueTypes(): Promise<readonly string[]> {
    const body = await this.request('/api/remediation/actions', { method: 'GET' }, this.probeTimeoutMs);
    const parsed = actionsSchema.safeParse(body);
    if (!parsed.success) {
      throw new TransportError('Unexpected actions response from remediation service');
    }
    return parsed.data.actions.map((a) => a.toLowerCase());
  }

  /**
   * GET /health. Never throws: an unreachable service is reported as
   * unhealthy.
   */
  async checkHealth(): Promise<ServiceHealth> {
    const start = Date.now();
    try {
      const body = await this.request('/health', { method: 'GET' }, this.probeTimeoutMs);
      const parsed = healthSchema.safeParse(body);
      const status = parsed.success ? parsed.data.status : 'unknown';
      return { healthy: status === 'healthy', responseMs: Date.now() - start, status };
    } catch (err) {
      return { healthy: false, responseMs: Date.now() - start, status: errorMessage(err) };
    }
  }

  private async request(path: string, init: RequestInit, timeoutMs: number): Promise<unknown> {
    let res: Response;
    try {
      res = await this.fetchImpl(`${this.baseUrl}${path}`, {
        ...init,
        signal: AbortSignal.timeout(timeoutMs),
      });
    } catch (err) {
      throw new TransportError(`${init.method ?? 'GET'} ${path} failed: ${describeFetchError(err, timeoutMs)}`);
    }

    if (!res.ok) {
      throw new TransportError(`${init.method ?? 'GET'} ${path} returned HTTP ${res.status}`, res.status);
    }

    try {
      return await res.json();
    } catch (err) {
      throw new TransportError(`${init.method ?? 'GET'} ${path} returned a non-JSON body: ${describeFetchError(err, timeoutMs)}`);
    }
  }
}
