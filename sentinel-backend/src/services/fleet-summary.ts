/**
 * Fleet-wide views: anomaly sweep, hygiene score and the infrastructure
 * summary report. Each call takes a fresh snapshot of the simulated fleet.
 *
 * The summary carries an ops report built without a language model: a
 * health class, one root cause line per anomaly, the idle waste, the cost
 * forecast, recommended actions and a plain-text narrative.
 */

import { detectAnomaly } from '../clients/anomaly.js';
import type { Instance, Service, ServiceStatus, SimulatedFleet } from '../clients/infra-sim.js';
import { collectHygieneInputs } from '../hygiene/factors.js';
import { computeHygiene, type HygieneScore } from '../hygiene/score.js';
import type { RemediationEngine } from '../monitor/engine.js';
import type { AnomalyAssessment } from '../monitor/types.js';
import { forecastBilling, currentMonth, type CostForecast } from './cost-forecast.js';
import { listIdleInstances, type IdleInstanceReport } from './idle-instances.js';

export interface FleetContext {
  fleet: SimulatedFleet;
  engine: RemediationEngine;
  now?: Date;
}

export interface FleetSnapshot {
  instances: Instance[];
  services: Service[];
  idle: IdleInstanceReport;
  assessments: AnomalyAssessment[];
  forecast: CostForecast;
}

export type InfraHealth = 'Healthy' | 'Degraded' | 'Critical';

export interface OpsReport {
  infraHealth: InfraHealth;
  idleWasteSummary: string;
  rootCauses: string[];
  costForecastSummary: string;
  recommendedActions: string[];
  narrative: string;
  provider: 'simulation';
}

/** Forecasts above this monthly cost get a cost review recommendation */
export const COST_REVIEW_THRESHOLD = 1500;

export interface InfraSummary {
  generatedAt: string;
  totals: {
    instances: number;
    services: number;
    idleInstances: number;
    servicesByStatus: Record<ServiceStatus, number>;
  };
  cost: {
    month: string;
    predictedCost: number;
    potentialSavings: number;
    confidence: number;
    narrative: string;
  };
  anomalies: AnomalyAssessment[];
  remediation: {
    enabled: boolean;
    running: boolean;
    events: number;
    escalations: number;
    disabledServices: string[];
  };
  hygiene: HygieneScore;
  recommendations: string[];
  report: OpsReport;
}

/** Anomaly assessment for every service in the fleet. */
export function assessFleet(fleet: SimulatedFleet): AnomalyAssessment[] {
  return fleet.listServices().map((s) => detectAnomaly(s.serviceId, fleet.getMetrics(s.serviceId)));
}

export function snapshotFleet(fleet: SimulatedFleet, now: Date = new Date()): FleetSnapshot {
  const instances = fleet.listInstances();
  return {
    instances,
    services: fleet.listServices(),
    idle: listIdleInstances(instances, now),
    assessments: assessFleet(fleet),
    forecast: forecastBilling(instances, currentMonth(now), now),
  };
}

function hygieneFor(snapshot: FleetSnapshot, engine: RemediationEngine, now: Date): HygieneScore {
  const inputs = collectHygieneInputs({
    totalInstances: snapshot.instances.length,
    idleInstances: snapshot.idle.totalIdleCount,
    assessments: snapshot.assessments,
    forecast: snapshot.forecast,
    events: engine.eventLog.list(),
  });
  return computeHygiene(inputs, now);
}

// ---------------------------------------------------------------------------
// Ops report
// ---------------------------------------------------------------------------

export function classifyInfraHealth(anomalyCount: number, idleCount: number): InfraHealth {
  if (anomalyCount === 0 && idleCount <= 1) return 'Healthy';
  if (anomalyCount <= 2 && idleCount <= 3) return 'Degraded';
  return 'Critical';
}

/** `service: type - reason` for each anomalous assessment. */
export function describeRootCauses(assessments: readonly AnomalyAssessment[]): string[] {
  return assessments
    .filter((a) => a.hasAnomaly)
    .map((a) => `${a.serviceId}: ${a.anomalyType ?? 'unknown'} - ${a.reason.trim() || 'no details'}`);
}

export function recommendActions(anomalyCount: number, idleCount: number, predictedCost: number): string[] {
  const actions: string[] = [];
  if (idleCount > 0) actions.push(`Terminate or downsize ${idleCount} idle instances`);
  if (anomalyCount > 0) actions.push(`Investigate ${anomalyCount} service anomalies`);
  if (predictedCost > COST_REVIEW_THRESHOLD) actions.push('Review cost optimization opportunities');
  actions.push('Enable auto-scaling for variable workloads');
  actions.push('Set up alerting for anomaly detection');
  return actions;
}

function percent(value: number): string {
  return `${Math.round(value * 100)}%`;
}

export function buildOpsReport(snapshot: FleetSnapshot, now: Date): OpsReport {
  const anomalyCount = snapshot.assessments.filter((a) => a.hasAnomaly).length;
  const idleCount = snapshot.idle.totalIdleCount;
  const savings = snapshot.idle.totalMonthlySavings;
  const { predictedCost, confidence } = snapshot.forecast;

  const infraHealth = classifyInfraHealth(anomalyCount, idleCount);
  const rootCauses = describeRootCauses(snapshot.assessments);
  const recommendedActions = recommendActions(anomalyCount, idleCount, predictedCost);
  const idleWasteSummary = `${idleCount} idle instances detected, potential monthly savings: $${savings.toFixed(2)}`;
  const costForecastSummary = `Predicted monthly cost: $${predictedCost.toFixed(2)} (confidence: ${percent(confidence)})`;

  const narrative = [
    `Cloud Operations Report - ${now.toISOString().slice(0, 16).replace('T', ' ')} UTC`,
    '',
    'SUMMARY',
    `Monitoring ${snapshot.instances.length} instances across ${snapshot.services.length} services. `
      + `Infrastructure health: ${infraHealth}.`,
    '',
    'INFRASTRUCTURE',
    `- Active instances: ${snapshot.instances.length - idleCount}`,
    `- Idle instances: ${idleCount}`,
    `- Anomalies detected: ${anomalyCount}`,
    ...rootCauses.map((cause) => `  - ${cause}`),
    '',
    'COST',
    `- ${costForecastSummary}`,
    `- ${idleWasteSummary}`,
    '',
    'RECOMMENDED ACTIONS',
    ...recommendedActions.map((action, i) => `${i + 1}. ${action}`),
    '',
    'Generated in simulation mode (no language model configured).',
  ].join('\n');

  return {
    infraHealth,
    idleWasteSummary,
    rootCauses,
    costForecastSummary,
    recommendedActions,
    narrative,
    provider: 'simulation',
  };
}

// ---------------------------------------------------------------------------
// Summaries
// ---------------------------------------------------------------------------

export function computeFleetHygiene(ctx: FleetContext): HygieneScore {
  const now = ctx.now ?? new Date();
  return hygieneFor(snapshotFleet(ctx.fleet, now), ctx.engine, now);
}

export function summarizeInfra(ctx: FleetContext): InfraSummary {
  const now = ctx.now ?? new Date();
  const snapshot = snapshotFleet(ctx.fleet, now);
  const hygiene = hygieneFor(snapshot, ctx.engine, now);
  const events = ctx.engine.eventLog.list();
  const status = ctx.engine.getStatus();

  const servicesByStatus: Record<ServiceStatus, number> = { healthy: 0, degraded: 0, stopped: 0 };
  for (const service of snapshot.services) servicesByStatus[service.status]++;

  return {
    generatedAt: now.toISOString(),
    totals: {
      instances: snapshot.instances.length,
      services: snapshot.services.length,
      idleInstances: snapshot.idle.totalIdleCount,
      servicesByStatus,
    },
    cost: {
      month: snapshot.forecast.month,
      predictedCost: snapshot.forecast.predictedCost,
      potentialSavings: snapshot.forecast.potentialSavings,
      confidence: snapshot.forecast.confidence,
      narrative: snapshot.forecast.narrative,
    },
    anomalies: snapshot.assessments.filter((a) => a.hasAnomaly),
    remediation: {
      enabled: status.enabled,
      running: status.running,
      events: events.length,
      escalations: events.filter((e) => e.escalated).length,
      disabledServices: status.disabledServices,
    },
    hygiene,
    recommendations: hygiene.suggestions,
    report: buildOpsReport(snapshot, now),
  };
}
