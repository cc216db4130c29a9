/**
 * Audit trail tests against an in-memory SQLite database (DB_PATH=:memory:),
 * directly and through the audit routes.
 */

import { describe, it, expect, vi, beforeAll, beforeEach, afterEach } from 'vitest';
import request from 'supertest';
import { createApp } from '../app.js';
import { SimulatedFleet } from '../clients/infra-sim.js';
import { createToolServer } from '../mcp/server.js';
import { createMonitorRuntime } from '../monitor/index.js';
import { sqlite } from '../db/index.js';
import { runMigrations } from '../db/migrate.js';
import { auditSink, auditStore } from '../db/audit.js';
import { EventLog } from '../monitor/event-log.js';
import { buildIncidentReport } from '../monitor/reporter.js';
import type { RemediationEvent } from '../monitor/types.js';

function makeEvent(eventId: string, serviceId: string, timestamp: string, escalated = false): RemediationEvent {
  return {
    eventId,
    serviceId,
    assessment: {
      serviceId,
      hasAnomaly: true,
      severity: 'critical',
      reason: 'avg latency 3500ms > 2000ms',
      evidence: ['avg latency 3500ms > 2000ms'],
      anomalyType: 'latency_spike',
    },
    actionTaken: escalated ? 'escalate' : 'restart',
    restart: escalated
      ? { status: 'failed', durationMs: 40, postRestartHealth: 0, error: 'node drained' }
      : { status: 'success', durationMs: 1200, postRestartHealth: 0.87 },
    escalated,
    timestamp,
  };
}

function record(log: EventLog, event: RemediationEvent): void {
  log.append(event, buildIncidentReport(event, event.timestamp));
}

beforeAll(async () => {
  vi.spyOn(console, 'log').mockImplementation(() => undefined);
  await runMigrations();
});

beforeEach(() => {
  vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  sqlite.exec('DELETE FROM incident_reports; DELETE FROM remediation_events;');
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe('auditStore', () => {
  it('mirrors event log entries through the sink', () => {
    const log = new EventLog([auditSink]);
    record(log, makeEvent('evt-1', 'svc_api', '2026-03-01T12:00:00.000Z'));
    record(log, makeEvent('evt-2', 'svc_worker', '2026-03-01T12:01:00.000Z', true));

    const rows = auditStore.getRecentEvents();
    expect(rows.map((r) => [r.eventId, r.actionTaken, r.escalated])).toEqual([
      ['evt-2', 'escalate', true],
      ['evt-1', 'restart', false],
    ]);
    expect(rows[1]).toMatchObject({ restartStatus: 'success', postRestartHealth: 0.87, durationMs: 1200, severity: 'critical' });
    expect(JSON.parse(rows[1].payload)).toMatchObject({ eventId: 'evt-1', serviceId: 'svc_api' });
  });

  it('stores incident reports by event id', () => {
    auditStore.saveEntry({
      event: makeEvent('evt-1', 'svc_api', '2026-03-01T12:00:00.000Z'),
      report: buildIncidentReport(makeEvent('evt-1', 'svc_api', '2026-03-01T12:00:00.000Z'), '2026-03-01T12:00:00.000Z'),
    });

    expect(auditStore.getReport('evt-1')).toMatchObject({
      serviceId: 'svc_api',
      rootCause: 'latency_spike (critical): avg latency 3500ms > 2000ms',
      outcome: 'resolved',
      durationMs: 1200,
    });
    expect(auditStore.getReport('evt-99')).toBeUndefined();
  });

  it('filters events by service and limit', () => {
    const log = new EventLog([auditSink]);
    record(log, makeEvent('evt-1', 'svc_api', '2026-03-01T12:00:00.000Z'));
    record(log, makeEvent('evt-2', 'svc_web', '2026-03-01T12:01:00.000Z'));
    record(log, makeEvent('evt-3', 'svc_api', '2026-03-01T12:02:00.000Z'));

    expect(auditStore.getRecentEvents(50, 'svc_api').map((r) => r.eventId)).toEqual(['evt-3', 'evt-1']);
    expect(auditStore.getRecentEvents(1).map((r) => r.eventId)).toEqual(['evt-3']);
    expect(auditStore.getRecentReports(50, 'resolved')).toHaveLength(3);
  });

  it('counts escalations per service', () => {
    const log = new EventLog([auditSink]);
    record(log, makeEvent('evt-1', 'svc_worker', '2026-03-01T12:00:00.000Z', true));
    record(log, makeEvent('evt-2', 'svc_worker', '2026-03-01T12:01:00.000Z', true));
    record(log, makeEvent('evt-3', 'svc_api', '2026-03-01T12:02:00.000Z', true));

    expect(auditStore.countEscalations('svc_worker')).toBe(2);
    expect(auditStore.countEscalations('svc_db')).toBe(0);
  });

  it('prunes rows older than the retention window', () => {
    const log = new EventLog([auditSink]);
    record(log, makeEvent('evt-old', 'svc_api', '2026-01-01T00:00:00.000Z'));
    record(log, makeEvent('evt-new', 'svc_api', '2026-02-28T00:00:00.000Z'));

    // one report + one event
    expect(auditStore.pruneOlderThan(30, new Date('2026-03-01T00:00:00.000Z'))).toBe(2);
    expect(auditStore.getRecentEvents().map((r) => r.eventId)).toEqual(['evt-new']);
  });

  it('keeps the in-memory log intact when a write fails', () => {
    const log = new EventLog([auditSink]);
    const event = makeEvent('evt-1', 'svc_api', '2026-03-01T12:00:00.000Z');
    auditStore.saveEntry({ event, report: null });

    // duplicate event_id violates the UNIQUE constraint in SQLite only
    record(log, event);

    expect(log.size).toBe(1);
    expect(console.warn).toHaveBeenCalledWith(
      '[EventLog] Sink "sqlite-audit" failed:',
      expect.stringContaining('UNIQUE constraint failed'),
    );
  });
});

describe('audit routes', () => {
  const NOW = new Date('2026-03-01T12:00:00.000Z');

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  // Every restart fails, so svc_api and svc_worker both escalate
  async function escalatedFleet() {
    let counter = 0;
    const runtime = createMonitorRuntime({
      fleet: new SimulatedFleet({ random: () => 0.5, now: () => NOW, restartDelayMs: 0, restartSuccessRate: 0 }),
      sinks: [auditSink],
      engine: { settleDelayMs: 0, recordQuietScans: false, now: () => NOW, idFactory: () => `evt-${++counter}` },
    });
    runtime.engine.setEnabled(true);
    const events = await runtime.engine.scanOnce();
    return { app: createApp(runtime, createToolServer(runtime)), events };
  }

  it('lists persisted incident reports newest first, filtered by outcome', async () => {
    const { app } = await escalatedFleet();

    const res = await request(app).get('/api/remediation/audit/incidents?outcome=escalated');
    expect(res.status).toBe(200);
    expect(res.body.reports.map((r: { serviceId: string; outcome: string; actionTaken: string }) =>
      [r.serviceId, r.outcome, r.actionTaken])).toEqual([
      ['svc_worker', 'escalated', 'restart'],
      ['svc_api', 'escalated', 'restart'],
    ]);

    const resolved = await request(app).get('/api/remediation/audit/incidents?outcome=resolved');
    expect(resolved.body.reports).toEqual([]);

    const limited = await request(app).get('/api/remediation/audit/incidents?limit=1');
    expect(limited.body.reports).toHaveLength(1);
  });

  it('rejects an unknown outcome filter', async () => {
    const { app } = await escalatedFleet();
    const res = await request(app).get('/api/remediation/audit/incidents?outcome=lost');
    expect(res.status).toBe(400);
  });

  it('returns a persisted report by event id', async () => {
    const { app, events } = await escalatedFleet();
    const eventId = events[0].eventId;

    const res = await request(app).get(`/api/remediation/audit/incidents/${eventId}`);
    expect(res.status).toBe(200);
    expect(res.body.report).toMatchObject({ eventId, serviceId: 'svc_api', outcome: 'escalated' });

    const missing = await request(app).get('/api/remediation/audit/incidents/evt-99');
    expect(missing.status).toBe(404);
    expect(missing.body.error).toBe("No audited incident report for event 'evt-99'");
  });

  it('counts escalations on record per service', async () => {
    const { app } = await escalatedFleet();

    const api = await request(app).get('/api/remediation/audit/escalations/svc_api');
    expect(api.body).toEqual({ serviceId: 'svc_api', escalations: 1 });

    const db = await request(app).get('/api/remediation/audit/escalations/svc_db');
    expect(db.body).toEqual({ serviceId: 'svc_db', escalations: 0 });
  });
});
