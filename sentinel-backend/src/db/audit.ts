/**
 * Best-effort SQLite audit trail for remediation events and incident reports.
 *
 * The in-memory EventLog is the source of truth; this store only mirrors it
 * so history survives a restart for inspection. Write failures are logged by
 * the EventLog and never reach the engine.
 */

import { and, desc, eq, lt, count } from 'drizzle-orm';
import { db } from './index.js';
import { remediationEvents, incidentReports } from './schema.js';
import type { EventLogEntry, EventSink } from '../monitor/event-log.js';

// ---------------------------------------------------------------------------
// Writes
// ---------------------------------------------------------------------------

function saveEntry({ event, report }: EventLogEntry): void {
  db.transaction((tx) => {
    tx.insert(remediationEvents).values({
      eventId: event.eventId,
      serviceId: event.serviceId,
      severity: event.assessment.severity,
      actionTaken: event.actionTaken,
      escalated: event.escalated,
      skipReason: event.skipReason ?? null,
      restartStatus: event.restart?.status ?? null,
      postRestartHealth: event.restart?.postRestartHealth ?? null,
      durationMs: event.restart?.durationMs ?? null,
      reason: event.assessment.reason,
      payload: JSON.stringify(event),
      timestamp: event.timestamp,
    }).run();

    if (report) {
      tx.insert(incidentReports).values({
        eventId: report.eventId,
        serviceId: report.serviceId,
        rootCause: report.rootCause,
        actionTaken: report.actionTaken,
        outcome: report.outcome,
        durationMs: report.durationMs,
        generatedAt: report.generatedAt,
      }).run();
    }
  });
}

/**
 * Delete audit rows older than the retention window. Returns rows removed.
 */
function pruneOlderThan(days: number, now: Date = new Date()): number {
  const cutoff = new Date(now.getTime() - days * 86_400_000).toISOString();
  const reports = db.delete(incidentReports).where(lt(incidentReports.generatedAt, cutoff)).run();
  const events = db.delete(remediationEvents).where(lt(remediationEvents.timestamp, cutoff)).run();
  return reports.changes + events.changes;
}

// ---------------------------------------------------------------------------
// Reads
// ---------------------------------------------------------------------------

function getRecentEvents(limit = 50, serviceId?: string) {
  return db.select().from(remediationEvents)
    .where(serviceId ? eq(remediationEvents.serviceId, serviceId) : undefined)
    .orderBy(desc(remediationEvents.id))
    .limit(limit)
    .all();
}

function getRecentReports(limit = 50, outcome?: 'resolved' | 'escalated' | 'failed') {
  return db.select().from(incidentReports)
    .where(outcome ? eq(incidentReports.outcome, outcome) : undefined)
    .orderBy(desc(incidentReports.id))
    .limit(limit)
    .all();
}

function getReport(eventId: string) {
  return db.select().from(incidentReports).where(eq(incidentReports.eventId, eventId)).get();
}

function countEscalations(serviceId: string): number {
  const row = db.select({ total: count() }).from(remediationEvents)
    .where(and(eq(remediationEvents.serviceId, serviceId), eq(remediationEvents.escalated, true)))
    .get();
  return row?.total ?? 0;
}

// ---------------------------------------------------------------------------
// Export
// ---------------------------------------------------------------------------

export const auditStore = {
  saveEntry,
  pruneOlderThan,
  getRecentEvents,
  getRecentReports,
  getReport,
  countEscalations,
};

/** EventLog sink that mirrors every entry into SQLite. */
export const auditSink: EventSink = {
  name: 'sqlite-audit',
  write: (entry) => auditStore.saveEntry(entry),
};
