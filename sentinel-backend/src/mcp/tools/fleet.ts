/**
 * 7 fleet insight and operations tools.
 *
 * Read-only tools are GREEN. restart_service is YELLOW and is the manual
 * restart path: it calls the compute backend directly and neither reads nor
 * writes the remediation engine's per-service policy.
 */

import { z } from 'zod';
import { averageMetrics, detectAnomaly } from '../../clients/anomaly.js';
import type { MonitorRuntime } from '../../monitor/index.js';
import { currentMonth, forecastBilling } from '../../services/cost-forecast.js';
import { computeFleetHygiene, summarizeInfra } from '../../services/fleet-summary.js';
import { listIdleInstances } from '../../services/idle-instances.js';
import { SERVICE_ID_PATTERN } from '../../safety/sanitize.js';
import { errorResult, jsonResult, type ToolRegistry } from '../registry.js';

export const serviceIdSchema = z.string().min(1).max(64).regex(SERVICE_ID_PATTERN, 'letters, digits, - and _ only');
export const monthSchema = z.string().regex(/^\d{4}-(0[1-9]|1[0-2])$/, 'expected YYYY-MM');

/**
 * Register the fleet tools on the registry.
 */
export function registerFleetTools(registry: ToolRegistry, runtime: MonitorRuntime): void {
  const { fleet, engine } = runtime;

  // 1. list_idle_instances
  registry.register(
    'list_idle_instances',
    'Detect idle compute instances (avg CPU < 5%, avg RAM < 15%, no requests for 24h) and the monthly savings from terminating them',
    {},
    async () => jsonResult(listIdleInstances(fleet.listInstances())),
  );

  // 2. get_billing_forecast
  registry.register(
    'get_billing_forecast',
    'Forecast cloud cost for a month with breakdown by tier and region, confidence and risk factors',
    {
      month: monthSchema.optional().describe('Month in YYYY-MM format (defaults to the current month)'),
    },
    async ({ month }) => jsonResult(forecastBilling(fleet.listInstances(), month ?? currentMonth())),
  );

  // 3. get_metrics
  registry.register(
    'get_metrics',
    'Get the last 24h of hourly metrics (CPU, RAM, latency, error rate) for a service',
    {
      service_id: serviceIdSchema.describe('Service ID (e.g., svc_web, svc_api)'),
    },
    async ({ service_id }) => {
      const points = fleet.getMetrics(service_id);
      return jsonResult({
        service_id,
        found: fleet.hasService(service_id),
        averages: points.length ? averageMetrics(points) : null,
        points,
      });
    },
  );

  // 4. detect_anomaly
  registry.register(
    'detect_anomaly',
    'Analyse a service\'s metrics for latency, error-rate and saturation anomalies',
    {
      service_id: serviceIdSchema.describe('Service ID to analyse'),
    },
    async ({ service_id }) => jsonResult(detectAnomaly(service_id, fleet.getMetrics(service_id))),
  );

  // 5. restart_service
  registry.register(
    'restart_service',
    'Restart a service through the configured compute backend (manual path, ignores auto-restart policy)',
    {
      service_id: serviceIdSchema.describe('Service ID to restart'),
    },
    async ({ service_id }) => {
      if (!fleet.hasService(service_id)) {
        return errorResult(`Unknown service "${service_id}"`);
      }
      try {
        const result = await runtime.restartExecutor.restart(service_id);
        return jsonResult({ service_id, ...result, service: fleet.getService(service_id) });
      } catch (err) {
        return errorResult(`Error restarting ${service_id}: ${err instanceof Error ? err.message : String(err)}`);
      }
    },
  );

  // 6. summarize_infra
  registry.register(
    'summarize_infra',
    'Infrastructure summary: totals, service health, anomalies, cost, remediation activity, hygiene score and recommendations',
    {},
    async () => jsonResult(summarizeInfra({ fleet, engine })),
  );

  // 7. get_hygiene_score
  registry.register(
    'get_hygiene_score',
    'Compute the 0-100 infrastructure hygiene score from idle instances, anomalies, cost risk and restart failures',
    {},
    async () => jsonResult(computeFleetHygiene({ fleet, engine })),
  );
}
