import { Router } from 'express';
import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { dirname, join } from 'node:path';
import { config } from '../config.js';
import { sqlite } from '../db/index.js';
import type { MonitorRuntime } from '../monitor/index.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

let version = '1.0.0';
try {
  const pkgPath = join(__dirname, '..', '..', 'package.json');
  const pkg: unknown = JSON.parse(readFileSync(pkgPath, 'utf-8'));
  if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
    version = pkg.version;
  }
} catch (err) {
  console.warn('[Health] Could not read package version:', err instanceof Error ? err.message : err);
}

type ComponentStatus = 'up' | 'down';

// In-process components are up whenever the server answers
const UP: ComponentStatus = 'up';

export function createHealthRouter(runtime: MonitorRuntime): Router {
  const healthRouter = Router();

  healthRouter.get('/', (req, res) => {
    // Liveness check for container healthcheck compatibility
    if (req.query.liveness !== undefined) {
      res.json({ status: 'ok', timestamp: new Date().toISOString(), uptime: process.uptime(), version });
      return;
    }

    // Database check
    const dbStart = Date.now();
    let dbStatus: ComponentStatus = 'up';
    try {
      sqlite.prepare('SELECT 1').get();
    } catch (err) {
      dbStatus = 'down';
      console.warn('[Health] Database check failed:', err instanceof Error ? err.message : err);
    }

    const engine = runtime.engine.getStatus();

    const components = {
      database: { status: dbStatus, responseMs: Date.now() - dbStart, audit: config.auditEnabled },
      remediation: {
        status: UP,
        enabled: engine.enabled,
        running: engine.running,
        cycles: engine.cycles,
        lastCycleAt: engine.lastCycleAt,
      },
      compute: { status: UP, backend: config.computeBackend },
    };

    const allUp = Object.values(components).every((c) => c.status === 'up');

    res.status(allUp ? 200 : 503).json({
      status: allUp ? 'healthy' : 'degraded',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      version,
      components,
    });
  });

  return healthRouter;
}
