import 'dotenv/config';

export type ComputeBackend = 'simulation' | 'http';

/** Unknown values fall back to the in-process simulation backend. */
export function parseComputeBackend(value: string | undefined): ComputeBackend {
  return value === 'http' ? 'http' : 'simulation';
}

/** Integer setting; unset, blank or non-numeric values use the fallback. */
export function intEnv(value: string | undefined, fallback: number): number {
  const parsed = parseInt(value ?? '', 10);
  return Number.isFinite(parsed) ? parsed : fallback;
}

export function floatEnv(value: string | undefined, fallback: number): number {
  const parsed = parseFloat(value ?? '');
  return Number.isFinite(parsed) ? parsed : fallback;
}

export const config = {
  port: intEnv(process.env.PORT, 4000),
  nodeEnv: process.env.NODE_ENV || 'development',

  // Audit trail (best-effort SQLite mirror of the event log)
  dbPath: process.env.DB_PATH || './data/sentinel.db',
  auditEnabled: process.env.AUDIT_ENABLED !== 'false', // default true
  auditRetentionDays: intEnv(process.env.AUDIT_RETENTION_DAYS, 30),

  // Remediation engine
  remediationIntervalMs: intEnv(process.env.REMEDIATION_INTERVAL_MS, 30000),
  remediationSettleDelayMs: intEnv(process.env.REMEDIATION_SETTLE_DELAY_MS, 1000),
  remediationAutoStart: process.env.AUTO_REMEDIATION === 'true', // default false
  recordQuietScans: process.env.RECORD_QUIET_SCANS === 'true',

  // Compute backend used for restarts
  computeBackend: parseComputeBackend(process.env.COMPUTE_BACKEND),
  computeEndpoint: process.env.COMPUTE_ENDPOINT || '',
  computeApiKey: process.env.COMPUTE_API_KEY || '',
  restartTimeoutMs: intEnv(process.env.RESTART_TIMEOUT_MS, 30000),
  simRestartSuccessRate: floatEnv(process.env.SIM_RESTART_SUCCESS_RATE, 0.85),

  // Real-time fleet snapshots on /fleet
  fleetEmitIntervalMs: intEnv(process.env.FLEET_EMIT_INTERVAL_MS, 15000),

  // CORS
  corsOrigins: (process.env.CORS_ORIGINS || 'http://localhost:5173,http://localhost:3000')
    .split(',')
    .map((o) => o.trim())
    .filter(Boolean),
} as const;
