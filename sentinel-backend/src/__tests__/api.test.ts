/**
 * HTTP API tests -- the express app driven in process with supertest.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import request from 'supertest';
import type { Express } from 'express';
import { createApp } from '../app.js';
import { SimulatedFleet } from '../clients/infra-sim.js';
import { createToolServer } from '../mcp/server.js';
import { createMonitorRuntime, type MonitorRuntime } from '../monitor/index.js';

const NOW = new Date('2026-03-01T12:00:00.000Z');

let runtime: MonitorRuntime;
let app: Express;

beforeEach(() => {
  vi.spyOn(console, 'log').mockImplementation(() => undefined);
  vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  vi.spyOn(console, 'error').mockImplementation(() => undefined);

  let counter = 0;
  runtime = createMonitorRuntime({
    fleet: new SimulatedFleet({ random: () => 0.5, now: () => NOW, restartDelayMs: 0 }),
    engine: { settleDelayMs: 0, recordQuietScans: false, now: () => NOW, idFactory: () => `evt-${++counter}` },
  });
  app = createApp(runtime, createToolServer(runtime));
});

afterEach(() => {
  runtime.engine.stop();
  vi.restoreAllMocks();
});

// ---------------------------------------------------------------------------
// Health
// ---------------------------------------------------------------------------

describe('GET /api/health', () => {
  it('reports every component up', async () => {
    const res = await request(app).get('/api/health');
    expect(res.status).toBe(200);
    expect(res.body.status).toBe('healthy');
    expect(res.body.components.database.status).toBe('up');
    expect(res.body.components.remediation).toMatchObject({ status: 'up', enabled: false, running: false, cycles: 0 });
    expect(res.body.components.compute).toEqual({ status: 'up', backend: 'simulation' });
  });

  it('answers a liveness probe', async () => {
    const res = await request(app).get('/api/health?liveness');
    expect(res.status).toBe(200);
    expect(res.body.status).toBe('ok');
  });
});

// ---------------------------------------------------------------------------
// Fleet
// ---------------------------------------------------------------------------

describe('fleet routes', () => {
  it('lists services', async () => {
    const res = await request(app).get('/api/fleet/services');
    expect(res.status).toBe(200);
    expect(res.body.services).toHaveLength(6);
    expect(res.body.policies).toEqual([]);
  });

  it('returns 404 for metrics of an unknown service', async () => {
    const res = await request(app).get('/api/fleet/metrics/svc_nope');
    expect(res.status).toBe(404);
    expect(res.body).toEqual({ error: "Service 'svc_nope' not found" });
  });

  it('assesses a degraded service', async () => {
    const res = await request(app).get('/api/fleet/anomaly/svc_api');
    expect(res.status).toBe(200);
    expect(res.body).toMatchObject({ serviceId: 'svc_api', severity: 'high', anomalyType: 'latency_spike' });
  });

  it('forecasts a requested month and validates it', async () => {
    const ok = await request(app).get('/api/fleet/forecast?month=2026-04');
    expect(ok.status).toBe(200);
    expect(ok.body).toMatchObject({ month: '2026-04', predictedCost: 525.6 });

    const bad = await request(app).get('/api/fleet/forecast?month=2026-13');
    expect(bad.status).toBe(400);
    expect(bad.body).toEqual({ error: 'month: expected YYYY-MM' });
  });

  it('scores arbitrary hygiene inputs', async () => {
    const res = await request(app)
      .post('/api/fleet/hygiene/compute')
      .send({ idlePercentage: 20, anomalyPenalty: 10, costRiskPenalty: 40, restartFailureRate: 0 });
    expect(res.status).toBe(200);
    expect(res.body).toMatchObject({ score: 82, status: 'healthy' });
  });

  it('rejects incomplete hygiene inputs', async () => {
    const res = await request(app).post('/api/fleet/hygiene/compute').send({ idlePercentage: 20 });
    expect(res.status).toBe(400);
  });
});

// ---------------------------------------------------------------------------
// Remediation
// ---------------------------------------------------------------------------

describe('remediation routes', () => {
  it('logs skipped events when remediation is off', async () => {
    const res = await request(app).post('/api/remediation/scan').send({});
    expect(res.status).toBe(200);
    expect(res.body.events.map((e: { serviceId: string; skipReason: string }) => `${e.serviceId}:${e.skipReason}`)).toEqual([
      'svc_api:remediation_disabled',
      'svc_worker:remediation_disabled',
    ]);
    expect(res.body.reports).toEqual([]);
  });

  it('returns 404 when scanning an unknown service', async () => {
    const res = await request(app).post('/api/remediation/scan').send({ serviceId: 'svc_nope' });
    expect(res.status).toBe(404);
  });

  it('serves incident reports after a remediating scan', async () => {
    runtime.engine.setEnabled(true);
    await request(app).post('/api/remediation/scan').send({});

    const resolved = await request(app).get('/api/remediation/incidents?outcome=resolved');
    expect(resolved.body.reports.map((r: { eventId: string }) => r.eventId)).toEqual(['evt-3', 'evt-6']);

    const escalated = await request(app).get('/api/remediation/incidents?outcome=escalated');
    expect(escalated.body.reports).toEqual([]);

    const one = await request(app).get('/api/remediation/incidents/evt-3');
    expect(one.status).toBe(200);
    expect(one.body.text.split('\n')[0]).toBe('Incident evt-3');

    const missing = await request(app).get('/api/remediation/incidents/evt-99');
    expect(missing.status).toBe(404);
  });

  it('validates the events query', async () => {
    const res = await request(app).get('/api/remediation/events?limit=0');
    expect(res.status).toBe(400);
  });

  it('returns 404 when re-enabling a service never scanned', async () => {
    const res = await request(app).post('/api/remediation/services/svc_nope/enable');
    expect(res.status).toBe(404);
  });

  it('starts and stops the loop', async () => {
    const started = await request(app).post('/api/remediation/start');
    expect(started.body).toMatchObject({ enabled: true, running: true });

    const stopped = await request(app).post('/api/remediation/stop');
    expect(stopped.body).toMatchObject({ enabled: false, running: false });
  });
});

// ---------------------------------------------------------------------------
// Tools
// ---------------------------------------------------------------------------

describe('POST /api/tools/execute', () => {
  it('returns 403 for an unconfirmed RED tool', async () => {
    const res = await request(app)
      .post('/api/tools/execute')
      .send({ tool: 'set_auto_remediation', args: { enabled: false } });
    expect(res.status).toBe(403);
    expect(res.body).toEqual({
      success: false,
      error: 'Tool "set_auto_remediation" is classified as RED tier and requires confirmed=true',
      tier: 'red',
      blocked: true,
    });
  });

  it('runs a RED tool once confirmed', async () => {
    const res = await request(app)
      .post('/api/tools/execute')
      .send({ tool: 'set_auto_remediation', args: { enabled: false }, confirmed: true });
    expect(res.status).toBe(200);
    expect(res.body).toMatchObject({ success: true, tier: 'red' });
  });

  it('returns 404 for an unknown tool', async () => {
    const res = await request(app).post('/api/tools/execute').send({ tool: 'drop_fleet' });
    expect(res.status).toBe(404);
    expect(res.body.tier).toBe('black');
  });

  it('returns 400 for a malformed body', async () => {
    const res = await request(app).post('/api/tools/execute').send({ tool: '' });
    expect(res.status).toBe(400);
  });

  it('returns 500 when the tool reports an error', async () => {
    const res = await request(app)
      .post('/api/tools/execute')
      .send({ tool: 'restart_service', args: { service_id: 'svc_nope' } });
    expect(res.status).toBe(500);
    expect(res.body).toEqual({ success: false, error: 'Unknown service "svc_nope"', tier: 'yellow' });
  });

  it('lists tools', async () => {
    const res = await request(app).get('/api/tools');
    expect(res.body.tools).toHaveLength(13);
  });
});

// ---------------------------------------------------------------------------
// Chat
// ---------------------------------------------------------------------------

describe('POST /api/chat', () => {
  it('asks for clarification when a restart names no service', async () => {
    const res = await request(app).post('/api/chat').send({ message: 'restart' });
    expect(res.body).toMatchObject({
      message: 'Which service would you like to restart? Available: svc_web, svc_web_alt, svc_api, svc_db, svc_cache, svc_worker',
      toolsCalled: [],
      clarificationNeeded: true,
    });
  });

  it('runs the matched tool and returns its output', async () => {
    const res = await request(app).post('/api/chat').send({ message: 'show idle instances' });
    expect(res.body).toMatchObject({
      toolsCalled: ['list_idle_instances'],
      tier: 'green',
      isError: false,
      clarificationNeeded: false,
    });
    expect(JSON.parse(res.body.message)).toMatchObject({ totalIdleCount: 1, totalMonthlySavings: 36 });
  });

  it('prompts for input on an empty message', async () => {
    const res = await request(app).post('/api/chat').send({ message: '   ' });
    expect(res.body.message).toBe('Please enter a question or command.');
  });
});
