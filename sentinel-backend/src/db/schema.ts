import { sqliteTable, text, integer, real } from 'drizzle-orm/sqlite-core';
import { sql } from 'drizzle-orm';

// ---------------------------------------------------------------------------
// Remediation events -- audit mirror of the in-memory event log
// ---------------------------------------------------------------------------
export const remediationEvents = sqliteTable('remediation_events', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  eventId: text('event_id').notNull().unique(),
  serviceId: text('service_id').notNull(),
  severity: text('severity', { enum: ['none', 'low', 'medium', 'high', 'critical'] }).notNull(),
  actionTaken: text('action_taken', { enum: ['restart', 'escalate', 'none'] }).notNull(),
  escalated: integer('escalated', { mode: 'boolean' }).notNull().default(false),
  skipReason: text('skip_reason'),
  restartStatus: text('restart_status', { enum: ['success', 'failed'] }),
  postRestartHealth: real('post_restart_health'),
  durationMs: integer('duration_ms'),
  reason: text('reason').notNull(),
  payload: text('payload').notNull(), // JSON string of the full event
  timestamp: text('timestamp').notNull(),
  recordedAt: text('recorded_at').notNull().default(sql`(datetime('now'))`),
});

// ---------------------------------------------------------------------------
// Incident reports -- one per restart attempt
// ---------------------------------------------------------------------------
export const incidentReports = sqliteTable('incident_reports', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  eventId: text('event_id').notNull().unique(),
  serviceId: text('service_id').notNull(),
  rootCause: text('root_cause').notNull(),
  actionTaken: text('action_taken', { enum: ['restart', 'escalate', 'none'] }).notNull(),
  outcome: text('outcome', { enum: ['resolved', 'escalated', 'failed'] }).notNull(),
  durationMs: integer('duration_ms').notNull(),
  generatedAt: text('generated_at').notNull(),
  recordedAt: text('recorded_at').notNull().default(sql`(datetime('now'))`),
});
