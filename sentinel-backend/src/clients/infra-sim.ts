/**
 * Simulated cloud fleet: six instances, six services, synthetic telemetry.
 *
 * Stateful for the process lifetime so restarts have a visible effect:
 * a successful restart marks the service healthy and its next metrics
 * window is drawn from the healthy ranges. Randomness and clock are
 * injectable for tests.
 */

import type { RestartResult, ServiceCatalog } from '../monitor/types.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type ServiceStatus = 'healthy' | 'degraded' | 'stopped';

export const SERVICE_STATUSES: readonly ServiceStatus[] = ['healthy', 'degraded', 'stopped'];

export interface Instance {
  instanceId: string;
  name: string;
  region: string;
  env: 'prod' | 'staging';
  tier: string;
  /** Hourly CPU %, last 24h */
  cpuUsage: number[];
  /** Hourly RAM %, last 24h */
  ramUsage: number[];
  lastRequest: string;
}

export interface Service {
  serviceId: string;
  instanceId: string;
  name: string;
  status: ServiceStatus;
  lastRestart: string;
}

export interface MetricPoint {
  timestamp: string;
  cpu: number;
  ram: number;
  latencyMs: number;
  errorRate: number;
}

export interface SimulatedFleetOptions {
  random?: () => number;
  now?: () => Date;
  /** Simulated restart duration */
  restartDelayMs?: number;
  /** Probability in [0, 1] that a restart succeeds */
  restartSuccessRate?: number;
}

// ---------------------------------------------------------------------------
// Fleet layout
// ---------------------------------------------------------------------------

const INSTANCE_LAYOUT: ReadonlyArray<Pick<Instance, 'name' | 'region' | 'env' | 'tier'>> = [
  { name: 'web-server-1', region: 'us-east-1', env: 'prod', tier: 'frontend' },
  { name: 'web-server-2', region: 'us-east-1', env: 'prod', tier: 'frontend' },
  { name: 'api-server-1', region: 'us-west-2', env: 'prod', tier: 'api' },
  { name: 'db-server-1', region: 'us-east-1', env: 'prod', tier: 'database' },
  { name: 'cache-server-1', region: 'us-east-1', env: 'prod', tier: 'cache' },
  { name: 'worker-1', region: 'eu-west-1', env: 'staging', tier: 'worker' },
];

const SERVICE_LAYOUT: ReadonlyArray<{ serviceId: string; instance: number; name: string; status: ServiceStatus }> = [
  { serviceId: 'svc_web', instance: 0, name: 'web-service', status: 'healthy' },
  { serviceId: 'svc_web_alt', instance: 1, name: 'web-service-alt', status: 'healthy' },
  { serviceId: 'svc_api', instance: 2, name: 'api-service', status: 'degraded' },
  { serviceId: 'svc_db', instance: 3, name: 'database', status: 'healthy' },
  { serviceId: 'svc_cache', instance: 4, name: 'cache', status: 'healthy' },
  { serviceId: 'svc_worker', instance: 5, name: 'worker-service', status: 'stopped' },
];

interface MetricRanges {
  cpu: [number, number];
  ram: [number, number];
  latencyMs: [number, number];
  errorRate: [number, number];
}

const METRIC_RANGES: Record<ServiceStatus, MetricRanges> = {
  healthy: { cpu: [5, 70], ram: [15, 80], latencyMs: [20, 300], errorRate: [0, 0.05] },
  degraded: { cpu: [60, 95], ram: [60, 95], latencyMs: [800, 1600], errorRate: [0.15, 0.3] },
  stopped: { cpu: [0, 2], ram: [0, 5], latencyMs: [2000, 5000], errorRate: [0.5, 1] },
};

/** Hourly points per metrics window (24h inclusive of both ends) */
export const METRICS_WINDOW_POINTS = 25;

const HOUR_MS = 3_600_000;

// ---------------------------------------------------------------------------
// Simulated fleet
// ---------------------------------------------------------------------------

export class SimulatedFleet implements ServiceCatalog {
  private readonly random: () => number;
  private readonly now: () => Date;
  private readonly restartDelayMs: number;
  private readonly restartSuccessRate: number;
  private readonly instances: Instance[];
  private readonly services = new Map<string, Service>();

  constructor(options: SimulatedFleetOptions = {}) {
    this.random = options.random ?? Math.random;
    this.now = options.now ?? (() => new Date());
    this.restartDelayMs = options.restartDelayMs ?? 1200;
    this.restartSuccessRate = Math.min(1, Math.max(0, options.restartSuccessRate ?? 0.85));

    this.instances = INSTANCE_LAYOUT.map((layout) => this.generateInstance(layout));
    for (const layout of SERVICE_LAYOUT) {
      this.services.set(layout.serviceId, {
        serviceId: layout.serviceId,
        instanceId: this.instances[layout.instance].instanceId,
        name: layout.name,
        status: layout.status,
        lastRestart: this.hoursAgo(this.randomInt(1, 168)),
      });
    }
  }

  // -------------------------------------------------------------------------
  // Random helpers
  // -------------------------------------------------------------------------

  private uniform([min, max]: [number, number]): number {
    return min + this.random() * (max - min);
  }

  private randomInt(min: number, max: number): number {
    return min + Math.floor(this.random() * (max - min + 1));
  }

  private hoursAgo(hours: number): string {
    return new Date(this.now().getTime() - hours * HOUR_MS).toISOString();
  }

  private generateInstance(layout: Pick<Instance, 'name' | 'region' | 'env' | 'tier'>): Instance {
    // Staging and worker boxes sit idle: near-zero load, no traffic for a day or more
    const idle = layout.env === 'staging' || layout.tier === 'worker';
    const cpuRange: [number, number] = idle ? [0.1, 2] : [5, 80];
    const ramRange: [number, number] = idle ? [5, 14] : [10, 90];

    return {
      instanceId: `inst_${layout.name}`,
      ...layout,
      cpuUsage: Array.from({ length: 24 }, () => this.uniform(cpuRange)),
      ramUsage: Array.from({ length: 24 }, () => this.uniform(ramRange)),
      lastRequest: this.hoursAgo(idle ? this.randomInt(25, 168) : this.randomInt(1, 72)),
    };
  }

  // -------------------------------------------------------------------------
  // Queries
  // -------------------------------------------------------------------------

  listInstances(): Instance[] {
    return this.instances.map((i) => ({ ...i, cpuUsage: [...i.cpuUsage], ramUsage: [...i.ramUsage] }));
  }

  listServices(): Service[] {
    return Array.from(this.services.values(), (s) => ({ ...s }));
  }

  getService(serviceId: string): Service | undefined {
    const service = this.services.get(serviceId);
    return service ? { ...service } : undefined;
  }

  hasService(serviceId: string): boolean {
    return this.services.has(serviceId);
  }

  async listServiceIds(): Promise<string[]> {
    return Array.from(this.services.keys());
  }

  /**
   * A fresh 24h window of hourly metrics, oldest first.
   * Unknown services have no metrics.
   */
  getMetrics(serviceId: string): MetricPoint[] {
    const service = this.services.get(serviceId);
    if (!service) return [];

    const ranges = METRIC_RANGES[service.status];
    const end = this.now().getTime();
    const points: MetricPoint[] = [];

    for (let i = 0; i < METRICS_WINDOW_POINTS; i++) {
      points.push({
        timestamp: new Date(end - (METRICS_WINDOW_POINTS - 1 - i) * HOUR_MS).toISOString(),
        cpu: this.uniform(ranges.cpu),
        ram: this.uniform(ranges.ram),
        latencyMs: this.uniform(ranges.latencyMs),
        errorRate: this.uniform(ranges.errorRate),
      });
    }

    return points;
  }

  // -------------------------------------------------------------------------
  // Mutations
  // -------------------------------------------------------------------------

  /** Force a service into a status (fault injection for demos and tests). */
  setStatus(serviceId: string, status: ServiceStatus): boolean {
    const service = this.services.get(serviceId);
    if (!service) return false;
    service.status = status;
    return true;
  }

  /**
   * Simulated restart: waits the restart delay, then succeeds with the
   * configured probability. Success marks the service healthy.
   */
  async restart(serviceId: string): Promise<RestartResult> {
    const service = this.services.get(serviceId);
    if (!service) {
      throw new Error(`Unknown service: ${serviceId}`);
    }

    if (this.restartDelayMs > 0) {
      await new Promise((resolve) => setTimeout(resolve, this.restartDelayMs));
    }

    if (this.random() >= this.restartSuccessRate) {
      return {
        status: 'failed',
        durationMs: this.restartDelayMs,
        via: 'simulation',
        error: `Simulated restart of ${serviceId} did not come back up`,
      };
    }

    service.status = 'healthy';
    service.lastRestart = this.now().toISOString();
    return { status: 'success', durationMs: this.restartDelayMs, via: 'simulation' };
  }
}
