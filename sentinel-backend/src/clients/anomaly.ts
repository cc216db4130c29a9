/**
 * Threshold-based anomaly detection over a service's metrics window.
 */

import { evaluateThresholds, maxSeverity, type MetricName, type ThresholdViolation } from '../monitor/thresholds.js';
import type { AnomalyAssessment, AnomalySource, Severity } from '../monitor/types.js';
import type { MetricPoint } from './infra-sim.js';

export interface MetricsProvider {
  getMetrics(serviceId: string): MetricPoint[];
}

const RECOMMENDED_ACTION: Record<Severity, string | undefined> = {
  none: undefined,
  low: 'monitor',
  medium: 'investigate',
  high: 'restart_service',
  critical: 'restart_service',
};

export function averageMetrics(points: readonly MetricPoint[]): Record<MetricName, number> {
  const n = points.length || 1;
  const sum = (pick: (p: MetricPoint) => number) => points.reduce((acc, p) => acc + pick(p), 0) / n;
  return {
    latencyMs: sum((p) => p.latencyMs),
    errorRate: sum((p) => p.errorRate),
    cpu: sum((p) => p.cpu),
    ram: sum((p) => p.ram),
  };
}

function formatMetric(metric: MetricName, value: number): string {
  switch (metric) {
    case 'latencyMs':
      return `${value.toFixed(0)}ms`;
    case 'errorRate':
      return `${(value * 100).toFixed(1)}%`;
    case 'cpu':
    case 'ram':
      return `${value.toFixed(1)}%`;
  }
}

const METRIC_LABEL: Record<MetricName, string> = {
  latencyMs: 'avg latency',
  errorRate: 'avg error rate',
  cpu: 'avg CPU',
  ram: 'avg RAM',
};

function describeViolation(v: ThresholdViolation): string {
  return `${METRIC_LABEL[v.metric]} ${formatMetric(v.metric, v.value)} > ${formatMetric(v.metric, v.threshold)}`;
}

/**
 * Assess a metrics window. Severity is the worst threshold crossed; the
 * anomaly type is taken from the first violation at that severity.
 */
export function detectAnomaly(serviceId: string, points: readonly MetricPoint[]): AnomalyAssessment {
  if (points.length === 0) {
    return { serviceId, hasAnomaly: false, severity: 'none', reason: 'No metrics data', evidence: [] };
  }

  const averages = averageMetrics(points);
  const violations = evaluateThresholds(averages);

  if (violations.length === 0) {
    return {
      serviceId,
      hasAnomaly: false,
      severity: 'none',
      reason: 'All metrics within normal thresholds',
      evidence: [
        `${METRIC_LABEL.latencyMs} ${formatMetric('latencyMs', averages.latencyMs)}`,
        `${METRIC_LABEL.errorRate} ${formatMetric('errorRate', averages.errorRate)}`,
      ],
    };
  }

  const severity = violations.reduce<Severity>((worst, v) => maxSeverity(worst, v.severity), 'none');
  const primary = violations.find((v) => v.severity === severity) ?? violations[0];
  const evidence = violations.map(describeViolation);

  return {
    serviceId,
    hasAnomaly: true,
    severity,
    reason: evidence.join('; '),
    evidence,
    anomalyType: primary.anomalyType,
    recommendedAction: RECOMMENDED_ACTION[severity],
  };
}

/** Anomaly source backed by live metrics windows. */
export class MetricsAnomalySource implements AnomalySource {
  constructor(private readonly metrics: MetricsProvider) {}

  async assess(serviceId: string): Promise<AnomalyAssessment> {
    return detectAnomaly(serviceId, this.metrics.getMetrics(serviceId));
  }
}
