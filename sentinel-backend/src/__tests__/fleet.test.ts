/**
 * Tests for the simulated fleet and the reports built on it.
 * Randomness is pinned to 0.5 so every metric sits at the middle of its range.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { averageMetrics, detectAnomaly } from '../clients/anomaly.js';
import { HttpRestartExecutor } from '../clients/compute.js';
import { scoreHealth } from '../clients/health.js';
import { METRICS_WINDOW_POINTS, SimulatedFleet, type MetricPoint } from '../clients/infra-sim.js';
import { createMonitorRuntime } from '../monitor/index.js';
import { estimateMonthlyCost, forecastBilling } from '../services/cost-forecast.js';
import { listIdleInstances } from '../services/idle-instances.js';
import {
  classifyInfraHealth,
  computeFleetHygiene,
  describeRootCauses,
  recommendActions,
  summarizeInfra,
} from '../services/fleet-summary.js';

const NOW = new Date('2026-03-01T12:00:00.000Z');

function pinnedFleet(restartSuccessRate = 0.85): SimulatedFleet {
  return new SimulatedFleet({ random: () => 0.5, now: () => NOW, restartDelayMs: 0, restartSuccessRate });
}

function point(latencyMs: number, errorRate: number, cpu = 40, ram = 40): MetricPoint {
  return { timestamp: NOW.toISOString(), cpu, ram, latencyMs, errorRate };
}

beforeEach(() => {
  vi.spyOn(console, 'log').mockImplementation(() => undefined);
  vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  vi.spyOn(console, 'error').mockImplementation(() => undefined);
});

afterEach(() => {
  vi.restoreAllMocks();
});

// ---------------------------------------------------------------------------
// Simulated fleet
// ---------------------------------------------------------------------------

describe('SimulatedFleet', () => {
  it('lays out six services in a fixed order', async () => {
    const fleet = pinnedFleet();
    expect(await fleet.listServiceIds()).toEqual(['svc_web', 'svc_web_alt', 'svc_api', 'svc_db', 'svc_cache', 'svc_worker']);
    expect(fleet.getService('svc_api')?.status).toBe('degraded');
    expect(fleet.getService('svc_worker')?.instanceId).toBe('inst_worker-1');
  });

  it('returns a 24h hourly window ending now', () => {
    const points = pinnedFleet().getMetrics('svc_web');
    expect(points).toHaveLength(METRICS_WINDOW_POINTS);
    expect(points[0].timestamp).toBe('2026-02-28T12:00:00.000Z');
    expect(points[points.length - 1].timestamp).toBe(NOW.toISOString());
  });

  it('has no metrics for unknown services', () => {
    expect(pinnedFleet().getMetrics('svc_nope')).toEqual([]);
  });

  it('returns copies that callers cannot mutate', () => {
    const fleet = pinnedFleet();
    const [first] = fleet.listServices();
    first.status = 'stopped';
    expect(fleet.getService('svc_web')?.status).toBe('healthy');
  });

  it('marks a service healthy after a successful restart', async () => {
    const fleet = pinnedFleet();
    const result = await fleet.restart('svc_worker');
    expect(result).toEqual({ status: 'success', durationMs: 0, via: 'simulation' });
    expect(fleet.getService('svc_worker')).toMatchObject({ status: 'healthy', lastRestart: NOW.toISOString() });
  });

  it('leaves the service down when the restart fails', async () => {
    const fleet = pinnedFleet(0);
    const result = await fleet.restart('svc_worker');
    expect(result.status).toBe('failed');
    expect(result.error).toBe('Simulated restart of svc_worker did not come back up');
    expect(fleet.getService('svc_worker')?.status).toBe('stopped');
  });

  it('rejects restarts of unknown services', async () => {
    await expect(pinnedFleet().restart('svc_nope')).rejects.toThrow('Unknown service: svc_nope');
  });

  it('injects faults through setStatus', () => {
    const fleet = pinnedFleet();
    expect(fleet.setStatus('svc_db', 'degraded')).toBe(true);
    expect(fleet.setStatus('svc_nope', 'degraded')).toBe(false);
    expect(fleet.getService('svc_db')?.status).toBe('degraded');
  });
});

// ---------------------------------------------------------------------------
// Anomaly detection and health
// ---------------------------------------------------------------------------

describe('detectAnomaly', () => {
  it('reports no anomaly without data', () => {
    expect(detectAnomaly('svc_web', [])).toEqual({
      serviceId: 'svc_web',
      hasAnomaly: false,
      severity: 'none',
      reason: 'No metrics data',
      evidence: [],
    });
  });

  it('reports healthy services within thresholds', () => {
    const fleet = pinnedFleet();
    const result = detectAnomaly('svc_web', fleet.getMetrics('svc_web'));
    expect(result.hasAnomaly).toBe(false);
    expect(result.reason).toBe('All metrics within normal thresholds');
    expect(result.evidence).toEqual(['avg latency 160ms', 'avg error rate 2.5%']);
  });

  it('rates a degraded service high with every violation as evidence', () => {
    const fleet = pinnedFleet();
    const result = detectAnomaly('svc_api', fleet.getMetrics('svc_api'));
    expect(result).toMatchObject({
      hasAnomaly: true,
      severity: 'high',
      anomalyType: 'latency_spike',
      recommendedAction: 'restart_service',
    });
    expect(result.evidence).toEqual(['avg latency 1200ms > 1000ms', 'avg error rate 22.5% > 20.0%']);
    expect(result.reason).toBe('avg latency 1200ms > 1000ms; avg error rate 22.5% > 20.0%');
  });

  it('rates a stopped service critical', () => {
    const fleet = pinnedFleet();
    const result = detectAnomaly('svc_worker', fleet.getMetrics('svc_worker'));
    expect(result.severity).toBe('critical');
    expect(result.evidence).toEqual(['avg latency 3500ms > 2000ms', 'avg error rate 75.0% > 30.0%']);
  });

  it('takes the anomaly type from the worst violation', () => {
    const result = detectAnomaly('svc_db', [point(600, 0.4)]);
    expect(result.severity).toBe('critical');
    expect(result.anomalyType).toBe('error_rate_spike');
  });

  it('flags resource saturation as low severity', () => {
    const result = detectAnomaly('svc_db', [point(100, 0.01, 95, 40)]);
    expect(result).toMatchObject({ severity: 'low', anomalyType: 'resource_saturation', recommendedAction: 'monitor' });
    expect(result.evidence).toEqual(['avg CPU 95.0% > 90.0%']);
  });
});

describe('averageMetrics', () => {
  it('averages each metric over the window', () => {
    expect(averageMetrics([point(100, 0.1, 10, 20), point(300, 0.3, 30, 40)])).toEqual({
      latencyMs: 200,
      errorRate: 0.2,
      cpu: 20,
      ram: 30,
    });
  });
});

describe('scoreHealth', () => {
  it('scores from the last five points', () => {
    const points = [point(5000, 1), ...Array.from({ length: 5 }, () => point(200, 0.05))];
    // 1 - 0.05*2 - 0.2*0.5
    expect(scoreHealth(points)).toBeCloseTo(0.8, 10);
  });

  it('clamps to zero for a failing service and scores an empty window 0', () => {
    expect(scoreHealth([point(3000, 0.8)])).toBe(0);
    expect(scoreHealth([])).toBe(0);
  });
});

// ---------------------------------------------------------------------------
// Idle instances and cost
// ---------------------------------------------------------------------------

describe('listIdleInstances', () => {
  it('finds the idle staging worker and its savings', () => {
    const report = listIdleInstances(pinnedFleet().listInstances(), NOW);
    expect(report.totalIdleCount).toBe(1);
    expect(report.totalMonthlySavings).toBe(36);
    expect(report.idleInstances[0]).toMatchObject({
      instanceId: 'inst_worker-1',
      region: 'eu-west-1',
      tier: 'worker',
      avgRam: 9.5,
      hoursSinceRequest: 97,
      hourlyCost: 0.05,
      monthlySavings: 36,
    });
  });
});

describe('cost forecast', () => {
  it('estimates the monthly cost by tier and region', () => {
    const estimate = estimateMonthlyCost(pinnedFleet().listInstances(), NOW);
    expect(estimate).toEqual({
      totalMonthlyCost: 525.6,
      costByTier: { frontend: 144, api: 108, database: 180, cache: 57.6, worker: 36 },
      costByRegion: { 'us-east-1': 381.6, 'us-west-2': 108, 'eu-west-1': 36 },
      idleInstanceCount: 1,
      potentialSavings: 36,
    });
  });

  it('forecasts with high confidence for a full fleet', () => {
    const forecast = forecastBilling(pinnedFleet().listInstances(), '2026-04', NOW);
    expect(forecast.predictedCost).toBe(525.6);
    expect(forecast.confidence).toBe(0.75);
    expect(forecast.riskFactors).toEqual([]);
    expect(forecast.narrative).toBe(
      'Forecast for 2026-04: predicted cost $525.60 with 75% confidence. Potential savings of $36.00 from idle resources.',
    );
  });

  it('lowers confidence and lists risks for a small fleet', () => {
    const instances = pinnedFleet().listInstances().slice(0, 2);
    const forecast = forecastBilling(instances, '2026-04', NOW);
    expect(forecast.confidence).toBe(0.55);
    expect(forecast.riskFactors).toEqual(['Limited historical data available', 'High variance in usage patterns']);
    expect(forecast.narrative).toBe('Forecast for 2026-04: predicted cost $144.00 with 55% confidence.');
  });
});

// ---------------------------------------------------------------------------
// HTTP compute backend
// ---------------------------------------------------------------------------

describe('HttpRestartExecutor', () => {
  type FetchInit = Parameters<typeof fetch>[1];

  function recordingFetch(status: number, body: unknown) {
    const calls: Array<{ url: string; init: FetchInit }> = [];
    const fetchImpl: typeof fetch = async (input, init) => {
      calls.push({ url: String(input), init });
      return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
    };
    return { calls, fetchImpl };
  }

  it('posts the service id with a bearer key', async () => {
    const { calls, fetchImpl } = recordingFetch(200, { status: 'success', duration_ms: 850 });
    const executor = new HttpRestartExecutor({ endpoint: 'http://compute.test/', apiKey: 'test-secret', fetchImpl });

    expect(await executor.restart('svc_api')).toEqual({ status: 'success', durationMs: 850, via: 'http' });
    expect(calls).toHaveLength(1);
    expect(calls[0].url).toBe('http://compute.test/services/restart');
    expect(calls[0].init?.method).toBe('POST');
    expect(calls[0].init?.headers).toEqual({ 'Content-Type': 'application/json', Authorization: 'Bearer test-secret' });
    expect(JSON.parse(String(calls[0].init?.body))).toEqual({ service_id: 'svc_api' });
  });

  it('reads the boolean success form and falls back to measured duration', async () => {
    const { fetchImpl } = recordingFetch(200, { success: false, error: 'node drained' });
    const executor = new HttpRestartExecutor({ endpoint: 'http://compute.test', fetchImpl, now: () => 1000 });

    expect(await executor.restart('svc_api')).toEqual({
      status: 'failed',
      durationMs: 0,
      via: 'http',
      error: 'node drained',
    });
  });

  it('throws on HTTP errors', async () => {
    const { fetchImpl } = recordingFetch(502, {});
    const executor = new HttpRestartExecutor({ endpoint: 'http://compute.test', fetchImpl });
    await expect(executor.restart('svc_api')).rejects.toThrow('Compute backend returned HTTP 502');
  });

  it('throws on an unexpected body', async () => {
    const { fetchImpl } = recordingFetch(200, { status: 'maybe' });
    const executor = new HttpRestartExecutor({ endpoint: 'http://compute.test', fetchImpl });
    await expect(executor.restart('svc_api')).rejects.toThrow(/^Compute backend returned an unexpected body/);
  });

  it('requires an endpoint', () => {
    expect(() => new HttpRestartExecutor({ endpoint: '' })).toThrow('HTTP compute backend requires an endpoint');
  });
});

// ---------------------------------------------------------------------------
// Full stack: simulated fleet -> engine -> reports
// ---------------------------------------------------------------------------

describe('monitor runtime on the simulated fleet', () => {
  let counter = 0;
  const engineOptions = {
    settleDelayMs: 0,
    recordQuietScans: false,
    now: () => NOW,
    idFactory: () => `evt-${++counter}`,
  };

  beforeEach(() => {
    counter = 0;
  });

  it('restarts the degraded and stopped services and resolves both', async () => {
    const runtime = createMonitorRuntime({ fleet: pinnedFleet(), engine: engineOptions });
    runtime.engine.setEnabled(true);

    const events = await runtime.engine.scanOnce();

    expect(events.map((e) => [e.serviceId, e.actionTaken, e.escalated])).toEqual([
      ['svc_api', 'restart', false],
      ['svc_worker', 'restart', false],
    ]);
    expect(events[0].restart).toEqual({ status: 'success', durationMs: 0, via: 'simulation', postRestartHealth: 0.87 });
    expect(runtime.eventLog.listReports().map((r) => r.outcome)).toEqual(['resolved', 'resolved']);
    expect(runtime.fleet.getService('svc_api')?.status).toBe('healthy');
  });

  it('escalates and disables services whose restarts fail', async () => {
    const runtime = createMonitorRuntime({ fleet: pinnedFleet(0), engine: engineOptions });
    runtime.engine.setEnabled(true);

    const first = await runtime.engine.scanOnce();
    expect(first.map((e) => [e.actionTaken, e.escalated, e.restart?.status])).toEqual([
      ['restart', true, 'failed'],
      ['restart', true, 'failed'],
    ]);
    expect(runtime.engine.getStatus().disabledServices).toEqual(['svc_api', 'svc_worker']);

    const second = await runtime.engine.scanOnce();
    expect(second.map((e) => e.skipReason)).toEqual(['auto_restart_disabled', 'auto_restart_disabled']);
  });

  it('feeds remediation history into the fleet hygiene score', async () => {
    const runtime = createMonitorRuntime({ fleet: pinnedFleet(0), engine: engineOptions });
    runtime.engine.setEnabled(true);
    await runtime.engine.scanOnce();

    const hygiene = computeFleetHygiene({ fleet: runtime.fleet, engine: runtime.engine, now: NOW });
    expect(hygiene.breakdown.restartFailureRate.penalty).toBe(100);

    const summary = summarizeInfra({ fleet: runtime.fleet, engine: runtime.engine, now: NOW });
    expect(summary.remediation).toEqual({
      enabled: true,
      running: false,
      events: 2,
      escalations: 2,
      disabledServices: ['svc_api', 'svc_worker'],
    });
    expect(summary.totals.servicesByStatus).toEqual({ healthy: 4, degraded: 1, stopped: 1 });
    expect(summary.cost.month).toBe('2026-03');
    expect(summary.recommendations).toEqual(hygiene.suggestions);
  });
});

// ---------------------------------------------------------------------------
// Ops report
// ---------------------------------------------------------------------------

describe('classifyInfraHealth', () => {
  it.each([
    [0, 0, 'Healthy'],
    [0, 1, 'Healthy'],
    [0, 2, 'Degraded'],
    [1, 0, 'Degraded'],
    [2, 3, 'Degraded'],
    [3, 0, 'Critical'],
    [0, 4, 'Critical'],
    [2, 4, 'Critical'],
  ])('%i anomalies and %i idle instances is %s', (anomalies, idle, expected) => {
    expect(classifyInfraHealth(anomalies, idle)).toBe(expected);
  });
});

describe('describeRootCauses', () => {
  it('lists anomalous services only, with fallbacks for missing details', () => {
    expect(describeRootCauses([
      { serviceId: 'svc_web', hasAnomaly: false, severity: 'none', reason: 'All metrics within normal thresholds', evidence: [] },
      { serviceId: 'svc_db', hasAnomaly: true, severity: 'low', reason: 'avg CPU 95.0% > 90.0%', evidence: [], anomalyType: 'resource_saturation' },
      { serviceId: 'svc_cache', hasAnomaly: true, severity: 'high', reason: ' ', evidence: [] },
    ])).toEqual([
      'svc_db: resource_saturation - avg CPU 95.0% > 90.0%',
      'svc_cache: unknown - no details',
    ]);
  });
});

describe('recommendActions', () => {
  it('adds a cost review only above the threshold', () => {
    expect(recommendActions(0, 0, 1500)).toEqual([
      'Enable auto-scaling for variable workloads',
      'Set up alerting for anomaly detection',
    ]);
    expect(recommendActions(0, 0, 1500.01)[0]).toBe('Review cost optimization opportunities');
  });
});

describe('summarizeInfra ops report', () => {
  it('reports the pinned fleet as degraded', () => {
    const runtime = createMonitorRuntime({ fleet: pinnedFleet(), engine: { settleDelayMs: 0, now: () => NOW } });

    const { report } = summarizeInfra({ fleet: runtime.fleet, engine: runtime.engine, now: NOW });

    expect(report.infraHealth).toBe('Degraded');
    expect(report.provider).toBe('simulation');
    expect(report.rootCauses).toEqual([
      'svc_api: latency_spike - avg latency 1200ms > 1000ms; avg error rate 22.5% > 20.0%',
      'svc_worker: latency_spike - avg latency 3500ms > 2000ms; avg error rate 75.0% > 30.0%',
    ]);
    expect(report.idleWasteSummary).toBe('1 idle instances detected, potential monthly savings: $36.00');
    expect(report.costForecastSummary).toBe('Predicted monthly cost: $525.60 (confidence: 75%)');
    expect(report.recommendedActions).toEqual([
      'Terminate or downsize 1 idle instances',
      'Investigate 2 service anomalies',
      'Enable auto-scaling for variable workloads',
      'Set up alerting for anomaly detection',
    ]);

    const lines = report.narrative.split('\n');
    expect(lines[0]).toBe('Cloud Operations Report - 2026-03-01 12:00 UTC');
    expect(lines).toContain('Monitoring 6 instances across 6 services. Infrastructure health: Degraded.');
    expect(lines).toContain('- Active instances: 5');
    expect(lines).toContain('  - svc_worker: latency_spike - avg latency 3500ms > 2000ms; avg error rate 75.0% > 30.0%');
    expect(lines).toContain('2. Investigate 2 service anomalies');
    expect(lines[lines.length - 1]).toBe('Generated in simulation mode (no language model configured).');
  });
});
