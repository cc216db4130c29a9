/**
 * Post-restart health scoring from the most recent metrics.
 *
 *   health = 1 - avgErrorRate * 2 - (avgLatencyMs / 1000) * 0.5, clamped to [0, 1]
 */

import { normalizeHealth } from '../monitor/thresholds.js';
import type { HealthProber } from '../monitor/types.js';
import type { MetricsProvider } from './anomaly.js';
import type { MetricPoint } from './infra-sim.js';

/** Number of trailing metric points the health score looks at */
export const HEALTH_WINDOW = 5;

export function scoreHealth(points: readonly MetricPoint[]): number {
  const recent = points.slice(-HEALTH_WINDOW);
  if (recent.length === 0) return 0;

  const avgErrorRate = recent.reduce((sum, p) => sum + p.errorRate, 0) / recent.length;
  const avgLatencyMs = recent.reduce((sum, p) => sum + p.latencyMs, 0) / recent.length;

  return normalizeHealth(1 - avgErrorRate * 2 - (avgLatencyMs / 1000) * 0.5);
}

export class MetricsHealthProber implements HealthProber {
  constructor(private readonly metrics: MetricsProvider) {}

  async probeHealth(serviceId: string): Promise<number> {
    return scoreHealth(this.metrics.getMetrics(serviceId));
  }
}
