/**
 * Fleet REST API -- instances, services, metrics, anomalies, cost and hygiene.
 */

import { Router } from 'express';
import type { Request, Response } from 'express';
import { z } from 'zod';
import { averageMetrics, detectAnomaly } from '../clients/anomaly.js';
import { computeHygiene } from '../hygiene/score.js';
import { monthSchema } from '../mcp/tools/fleet.js';
import type { MonitorRuntime } from '../monitor/index.js';
import { currentMonth, forecastBilling } from '../services/cost-forecast.js';
import { computeFleetHygiene, summarizeInfra } from '../services/fleet-summary.js';
import { listIdleInstances } from '../services/idle-instances.js';
import { issuesOf } from './validate.js';

const forecastQuerySchema = z.object({
  month: monthSchema.optional(),
});

const hygieneInputsSchema = z.object({
  idlePercentage: z.number(),
  anomalyPenalty: z.number(),
  costRiskPenalty: z.number(),
  restartFailureRate: z.number(),
});

export function createFleetRouter(runtime: MonitorRuntime): Router {
  const { fleet, engine } = runtime;
  const router = Router();

  // GET /api/fleet/instances
  router.get('/instances', (_req: Request, res: Response) => {
    res.json({ instances: fleet.listInstances() });
  });

  // GET /api/fleet/idle
  router.get('/idle', (_req: Request, res: Response) => {
    res.json(listIdleInstances(fleet.listInstances()));
  });

  // GET /api/fleet/services
  router.get('/services', (_req: Request, res: Response) => {
    res.json({ services: fleet.listServices(), policies: engine.listPolicies() });
  });

  // GET /api/fleet/metrics/:serviceId
  router.get('/metrics/:serviceId', (req: Request, res: Response) => {
    const serviceId = req.params.serviceId;
    if (!fleet.hasService(serviceId)) {
      res.status(404).json({ error: `Service '${serviceId}' not found` });
      return;
    }
    const points = fleet.getMetrics(serviceId);
    res.json({ serviceId, averages: averageMetrics(points), points });
  });

  // GET /api/fleet/anomaly/:serviceId
  router.get('/anomaly/:serviceId', (req: Request, res: Response) => {
    const serviceId = req.params.serviceId;
    if (!fleet.hasService(serviceId)) {
      res.status(404).json({ error: `Service '${serviceId}' not found` });
      return;
    }
    res.json(detectAnomaly(serviceId, fleet.getMetrics(serviceId)));
  });

  // GET /api/fleet/forecast?month=2026-03
  router.get('/forecast', (req: Request, res: Response) => {
    const parsed = forecastQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      res.status(400).json({ error: issuesOf(parsed.error) });
      return;
    }
    res.json(forecastBilling(fleet.listInstances(), parsed.data.month ?? currentMonth()));
  });

  // GET /api/fleet/hygiene -- score from the live fleet and remediation history
  router.get('/hygiene', (_req: Request, res: Response) => {
    res.json(computeFleetHygiene({ fleet, engine }));
  });

  // POST /api/fleet/hygiene/compute -- score arbitrary inputs (clamped to 0-100)
  router.post('/hygiene/compute', (req: Request, res: Response) => {
    const parsed = hygieneInputsSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ error: issuesOf(parsed.error) });
      return;
    }
    res.json(computeHygiene(parsed.data));
  });

  // GET /api/fleet/summary
  router.get('/summary', (_req: Request, res: Response) => {
    res.json(summarizeInfra({ fleet, engine }));
  });

  return router;
}
