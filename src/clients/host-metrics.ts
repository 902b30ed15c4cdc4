/**
 * Metric sources.
 *
 * HostMetricSource reads the local host through node:os and statfs:
 *  - cpu:    busy share across all cores over a short sampling window
 *  - memory: (total - free) / total
 *  - disk:   used / (used + available) on the configured mount, like df
 *
 * ServiceHealthSource turns the remediation service's /health answer into a
 * boolean-coded reading: 0 healthy, 100 unreachable or unhealthy.
 */

import os from 'node:os';
import { statfs } from 'node:fs/promises';
import { AcquisitionError } from '../monitor/errors.js';
import type { MetricKind, MetricReading, MetricSource, SleepFn } from '../monitor/types.js';
import type { ServiceHealth } from './remediator.js';

interface CpuTimes {
  idle: number;
  total: number;
}

function readCpuTimes(): CpuTimes {
  let idle = 0;
  let total = 0;
  for (const cpu of os.cpus()) {
    const t = cpu.times;
    idle += t.idle;
    total += t.user + t.nice + t.sys + t.idle + t.irq;
  }
  return { idle, total };
}

function round(value: number): number {
  return Math.round(Math.min(100, Math.max(0, value)) * 10) / 10;
}

export interface HostMetricSourceOptions {
  diskPath: string;
  /** CPU sampling window */
  cpuSampleMs?: number;
  sleep?: SleepFn;
}

export class HostMetricSource implements MetricSource {
  private readonly diskPath: string;
  private readonly cpuSampleMs: number;
  private readonly sleep: SleepFn;

  constructor(options: HostMetricSourceOptions) {
    this.diskPath = options.diskPath;
    this.cpuSampleMs = options.cpuSampleMs ?? 1_000;
    this.sleep = options.sleep ?? ((ms) => new Promise((resolve) => setTimeout(resolve, ms)));
  }

  async sample(kind: MetricKind): Promise<MetricReading> {
    const value = await this.read(kind);
    return { kind, value: round(value), hostname: os.hostname(), observedAt: Date.now() };
  }

  private async read(kind: MetricKind): Promise<number> {
    switch (kind) {
      case 'cpu': {
        const before = readCpuTimes();
        await this.sleep(this.cpuSampleMs);
        const after = readCpuTimes();
        const total = after.total - before.total;
        if (total <= 0) throw new AcquisitionError('CPU counters did not advance', { kind });
        return ((total - (after.idle - before.idle)) / total) * 100;
      }
      case 'memory': {
        const total = os.totalmem();
        if (total <= 0) throw new AcquisitionError('Total memory reported as 0', { kind });
        return ((total - os.freemem()) / total) * 100;
      }
      case 'disk': {
        const stats = await statfs(this.diskPath);
        const used = stats.blocks - stats.bfree;
        const capacity = used + stats.bavail;
        if (capacity <= 0) throw new AcquisitionError(`No capacity reported for ${this.diskPath}`, { kind });
        return (used / capacity) * 100;
      }
      case 'service_health':
        throw new AcquisitionError('HostMetricSource does not sample service_health', { kind });
    }
  }
}

export interface HealthProbe {
  checkHealth(): Promise<ServiceHealth>;
}

export class ServiceHealthSource implements MetricSource {
  private readonly probe: HealthProbe;

  constructor(probe: HealthProbe) {
    this.probe = probe;
  }

  async sample(kind: MetricKind): Promise<MetricReading> {
    if (kind !== 'service_health') {
      throw new AcquisitionError(`ServiceHealthSource only samples service_health, not ${kind}`, { kind });
    }

    const health = await this.probe.checkHealth();
    if (!health.healthy) {
      console.warn(`[Health] Remediation service unhealthy (${health.status}, ${health.responseMs}ms)`);
    }
    return {
      kind,
      value: health.healthy ? 0 : 100,
      hostname: os.hostname(),
      observedAt: Date.now(),
    };
  }
}
