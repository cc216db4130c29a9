/**
 * Audit cleanup service -- prunes audit rows past the retention window.
 * Runs once at startup, then every hour.
 */

import { config } from '../config.js';
import { auditStore } from '../db/audit.js';

const CLEANUP_INTERVAL_MS = 3_600_000;

let intervalId: ReturnType<typeof setInterval> | null = null;

function runCleanup(): void {
  try {
    const deleted = auditStore.pruneOlderThan(config.auditRetentionDays);
    if (deleted > 0) {
      console.log(`[Audit] Cleanup: pruned ${deleted} rows older than ${config.auditRetentionDays} days`);
    }
  } catch (err) {
    console.warn('[Audit] Cleanup failed:', err instanceof Error ? err.message : err);
  }
}

export function startAuditCleanup(): void {
  runCleanup();
  intervalId = setInterval(runCleanup, CLEANUP_INTERVAL_MS);
  console.log(`[Audit] Cleanup service started (retention ${config.auditRetentionDays} days)`);
}

export function stopAuditCleanup(): void {
  if (intervalId !== null) {
    clearInterval(intervalId);
    intervalId = null;
    console.log('[Audit] Cleanup service stopped');
  }
}
