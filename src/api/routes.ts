import { Router } from 'express';
import type { Request, Response } from 'express';
import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { dirname, join } from 'node:path';
import { z } from 'zod';
import { getMonitorStatus, type Monitor } from '../monitor/index.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

const packageSchema = z.object({ version: z.string() });

function readVersion(): string {
  try {
    const pkgPath = join(__dirname, '..', '..', 'package.json');
    const parsed = packageSchema.safeParse(JSON.parse(readFileSync(pkgPath, 'utf-8')));
    return parsed.success ? parsed.data.version : '1.0.0';
  } catch (err) {
    console.warn('[API] Could not read package version:', err instanceof Error ? err.message : err);
    return '1.0.0';
  }
}

const version = readVersion();

const killSwitchSchema = z.object({ active: z.boolean() });

export interface Liveness {
  status: 'ok';
  timestamp: string;
  uptime: number;
  version: string;
}

export function liveness(): Liveness {
  return { status: 'ok', timestamp: new Date().toISOString(), uptime: process.uptime(), version };
}

export type KillSwitchResult = { ok: true; killSwitch: boolean } | { ok: false; error: string };

/**
 * Validate a kill switch request body and apply it. The operator toggle is
 * announced on the chat channel.
 */
export function applyKillSwitch(monitor: Monitor, body: unknown): KillSwitchResult {
  const parsed = killSwitchSchema.safeParse(body);
  if (!parsed.success) {
    return { ok: false, error: 'Body must be { "active": boolean }' };
  }

  const { active } = parsed.data;
  monitor.remediation.setKillSwitch(active);
  void monitor.notifier.announce(
    active
      ? 'KILL SWITCH ACTIVATED -- automated remediation disabled by operator'
      : 'Kill switch deactivated -- automated remediation re-enabled',
    active ? 'warning' : 'info',
  );
  return { ok: true, killSwitch: active };
}

// ---------------------------------------------------------------------------
// Status API -- liveness, monitor status, kill switch
// Wired via dependency injection (monitor passed in, no module state)
// ---------------------------------------------------------------------------

export function createRouter(monitor: Monitor): Router {
  const router = Router();

  // GET /api/health -- liveness for container health checks
  router.get('/api/health', (_req: Request, res: Response) => {
    res.json(liveness());
  });

  // GET /api/monitor/status -- scheduler counters, alert states, dispatcher stats
  router.get('/api/monitor/status', (_req: Request, res: Response) => {
    res.json(getMonitorStatus(monitor));
  });

  // PUT /api/monitor/killswitch -- toggle remediation kill switch
  router.put('/api/monitor/killswitch', (req: Request, res: Response) => {
    const result = applyKillSwitch(monitor, req.body);
    if (!result.ok) {
      res.status(400).json({ error: result.error });
      return;
    }
    res.json({ killSwitch: result.killSwitch });
  });

  return router;
}
