/**
 * Severity gates and metric thresholds for anomaly classification and
 * post-restart health verification.
 */

import type { Severity } from './types.js';

// ---------------------------------------------------------------------------
// Severity ordering
// ---------------------------------------------------------------------------

export const SEVERITY_RANK: Record<Severity, number> = {
  none: 0,
  low: 1,
  medium: 2,
  high: 3,
  critical: 4,
};

/** Severities that trigger an autonomous restart. */
export const REMEDIATION_SEVERITIES: ReadonlySet<Severity> = new Set<Severity>(['high', 'critical']);

export function requiresRemediation(severity: Severity): boolean {
  return REMEDIATION_SEVERITIES.has(severity);
}

export function maxSeverity(a: Severity, b: Severity): Severity {
  return SEVERITY_RANK[b] > SEVERITY_RANK[a] ? b : a;
}

// ---------------------------------------------------------------------------
// Health
// ---------------------------------------------------------------------------

/** Minimum post-restart health for a remediation to count as resolved. */
export const HEALTH_THRESHOLD = 0.7;

/** Clamp a probe result into [0, 1]; anything non-finite counts as 0. */
export function normalizeHealth(value: number): number {
  if (!Number.isFinite(value)) return 0;
  return Math.min(1, Math.max(0, value));
}

export function isHealthy(health: number): boolean {
  return normalizeHealth(health) >= HEALTH_THRESHOLD;
}

// ---------------------------------------------------------------------------
// Metric thresholds
// ---------------------------------------------------------------------------

export type MetricName = 'latencyMs' | 'errorRate' | 'cpu' | 'ram';

interface MetricThreshold {
  metric: MetricName;
  operator: '>';
  value: number;
  severity: Severity;
  anomalyType: string;
}

/**
 * Ordered most severe first per metric: the first match wins for that metric.
 */
export const METRIC_THRESHOLDS: MetricThreshold[] = [
  { metric: 'latencyMs', operator: '>', value: 2000, severity: 'critical', anomalyType: 'latency_spike' },
  { metric: 'latencyMs', operator: '>', value: 1000, severity: 'high', anomalyType: 'latency_spike' },
  { metric: 'latencyMs', operator: '>', value: 500, severity: 'medium', anomalyType: 'latency_spike' },
  { metric: 'errorRate', operator: '>', value: 0.3, severity: 'critical', anomalyType: 'error_rate_spike' },
  { metric: 'errorRate', operator: '>', value: 0.2, severity: 'high', anomalyType: 'error_rate_spike' },
  { metric: 'errorRate', operator: '>', value: 0.1, severity: 'medium', anomalyType: 'error_rate_spike' },
  { metric: 'cpu', operator: '>', value: 90, severity: 'low', anomalyType: 'resource_saturation' },
  { metric: 'ram', operator: '>', value: 90, severity: 'low', anomalyType: 'resource_saturation' },
];

export interface ThresholdViolation {
  metric: MetricName;
  value: number;
  threshold: number;
  severity: Severity;
  anomalyType: string;
}

/**
 * Evaluate averaged metrics against METRIC_THRESHOLDS.
 * Returns at most one violation per metric (its most severe).
 */
export function evaluateThresholds(averages: Record<MetricName, number>): ThresholdViolation[] {
  const violations: ThresholdViolation[] = [];
  const seen = new Set<MetricName>();

  for (const threshold of METRIC_THRESHOLDS) {
    if (seen.has(threshold.metric)) continue;
    const value = averages[threshold.metric];
    if (value > threshold.value) {
      seen.add(threshold.metric);
      violations.push({
        metric: threshold.metric,
        value,
        threshold: threshold.value,
        severity: threshold.severity,
        anomalyType: threshold.anomalyType,
      });
    }
  }

  return violations;
}
