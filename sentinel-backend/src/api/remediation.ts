/**
 * Remediation REST API -- engine control, event history, incident reports
 * and per-service auto-restart policy.
 */

import { Router } from 'express';
import type { Request, Response } from 'express';
import { z } from 'zod';
import { config } from '../config.js';
import { auditStore } from '../db/audit.js';
import type { MonitorRuntime } from '../monitor/index.js';
import { formatIncidentReport } from '../monitor/reporter.js';
import { issuesOf } from './validate.js';

const limitSchema = z.coerce.number().int().min(1).max(500).optional();

const eventsQuerySchema = z.object({
  limit: limitSchema,
  serviceId: z.string().min(1).optional(),
});

const incidentsQuerySchema = z.object({
  outcome: z.enum(['resolved', 'escalated', 'failed']).optional(),
});

const auditIncidentsQuerySchema = incidentsQuerySchema.extend({
  limit: limitSchema,
});

const scanBodySchema = z.object({
  serviceId: z.string().min(1).optional(),
}).default({});

export function createRemediationRouter(runtime: MonitorRuntime): Router {
  const { engine, eventLog } = runtime;
  const router = Router();

  // GET /api/remediation/status
  router.get('/status', (_req: Request, res: Response) => {
    res.json(engine.getStatus());
  });

  // POST /api/remediation/start -- enable auto-remediation and start the loop
  router.post('/start', (_req: Request, res: Response) => {
    engine.start();
    res.json(engine.getStatus());
  });

  // POST /api/remediation/stop
  router.post('/stop', (_req: Request, res: Response) => {
    engine.stop();
    res.json(engine.getStatus());
  });

  // POST /api/remediation/scan -- one cycle now, optionally for a single service
  router.post('/scan', async (req: Request, res: Response) => {
    const parsed = scanBodySchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      res.status(400).json({ error: issuesOf(parsed.error) });
      return;
    }

    const { serviceId } = parsed.data;
    if (serviceId) {
      const event = await engine.scanService(serviceId);
      if (!event) {
        res.status(404).json({ error: `Service '${serviceId}' not found` });
        return;
      }
      const report = eventLog.getReport(event.eventId);
      res.json({ events: [event], reports: report ? [report] : [] });
      return;
    }

    const events = await engine.scanOnce();
    res.json({
      events,
      reports: events.flatMap((e) => eventLog.getReport(e.eventId) ?? []),
    });
  });

  // GET /api/remediation/events?limit=50&serviceId=svc_api
  router.get('/events', (req: Request, res: Response) => {
    const parsed = eventsQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      res.status(400).json({ error: issuesOf(parsed.error) });
      return;
    }
    const events = eventLog.recent(parsed.data.limit ?? 50, parsed.data.serviceId);
    res.json({ events, total: eventLog.size });
  });

  // GET /api/remediation/incidents?outcome=escalated
  router.get('/incidents', (req: Request, res: Response) => {
    const parsed = incidentsQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      res.status(400).json({ error: issuesOf(parsed.error) });
      return;
    }
    const { outcome } = parsed.data;
    const reports = eventLog.listReports().filter((r) => !outcome || r.outcome === outcome);
    res.json({ reports });
  });

  // GET /api/remediation/incidents/:eventId
  router.get('/incidents/:eventId', (req: Request, res: Response) => {
    const eventId = req.params.eventId;
    const report = eventLog.getReport(eventId);
    if (!report) {
      res.status(404).json({ error: `No incident report for event '${eventId}'` });
      return;
    }
    res.json({ report, text: formatIncidentReport(report, eventLog.get(eventId)) });
  });

  // GET /api/remediation/policies
  router.get('/policies', (_req: Request, res: Response) => {
    res.json({ policies: engine.listPolicies() });
  });

  // POST /api/remediation/services/:serviceId/enable -- operator re-enable after escalation
  router.post('/services/:serviceId/enable', (req: Request, res: Response) => {
    const serviceId = req.params.serviceId;
    if (!engine.reEnableService(serviceId)) {
      res.status(404).json({ error: `No remediation policy for '${serviceId}'` });
      return;
    }
    res.json({ policy: engine.getPolicy(serviceId) });
  });

  // Persisted mirror: 404 when disabled, 503 when the store cannot be read
  function fromAudit<T>(res: Response, query: () => T): T | undefined {
    if (!config.auditEnabled) {
      res.status(404).json({ error: 'Audit trail is disabled (AUDIT_ENABLED=false)' });
      return undefined;
    }
    try {
      return query();
    } catch (err) {
      console.error('[Audit] Query failed:', err instanceof Error ? err.message : err);
      res.status(503).json({ error: 'Audit trail unavailable' });
      return undefined;
    }
  }

  // GET /api/remediation/audit?limit=50&serviceId=svc_api
  router.get('/audit', (req: Request, res: Response) => {
    const parsed = eventsQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      res.status(400).json({ error: issuesOf(parsed.error) });
      return;
    }
    const { limit, serviceId } = parsed.data;
    const events = fromAudit(res, () => auditStore.getRecentEvents(limit ?? 50, serviceId));
    if (events) res.json({ events });
  });

  // GET /api/remediation/audit/incidents?limit=50&outcome=escalated
  router.get('/audit/incidents', (req: Request, res: Response) => {
    const parsed = auditIncidentsQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      res.status(400).json({ error: issuesOf(parsed.error) });
      return;
    }
    const { limit, outcome } = parsed.data;
    const reports = fromAudit(res, () => auditStore.getRecentReports(limit ?? 50, outcome));
    if (reports) res.json({ reports });
  });

  // GET /api/remediation/audit/incidents/:eventId
  router.get('/audit/incidents/:eventId', (req: Request, res: Response) => {
    const eventId = req.params.eventId;
    const found = fromAudit(res, () => ({ report: auditStore.getReport(eventId) }));
    if (!found) return;
    if (!found.report) {
      res.status(404).json({ error: `No audited incident report for event '${eventId}'` });
      return;
    }
    res.json({ report: found.report });
  });

  // GET /api/remediation/audit/escalations/:serviceId -- escalations on record
  router.get('/audit/escalations/:serviceId', (req: Request, res: Response) => {
    const serviceId = req.params.serviceId;
    const escalations = fromAudit(res, () => auditStore.countEscalations(serviceId));
    if (escalations !== undefined) res.json({ serviceId, escalations });
  });

  return router;
}
