/**
 * Idle instance classification and the savings from terminating them.
 *
 * An instance is idle when all three hold:
 *  - average CPU below 5%
 *  - average RAM below 15%
 *  - last request more than 24 hours ago
 */

import type { Instance } from '../clients/infra-sim.js';
import { HOURS_PER_MONTH, hourlyCost, roundCurrency } from './pricing.js';

export const IDLE_CPU_PERCENT = 5;
export const IDLE_RAM_PERCENT = 15;
export const IDLE_AFTER_HOURS = 24;

export interface IdleInstance {
  instanceId: string;
  name: string;
  region: string;
  tier: string;
  avgCpu: number;
  avgRam: number;
  hoursSinceRequest: number;
  hourlyCost: number;
  monthlySavings: number;
}

export interface IdleInstanceReport {
  idleInstances: IdleInstance[];
  totalIdleCount: number;
  totalMonthlySavings: number;
}

function average(values: readonly number[]): number {
  return values.length ? values.reduce((a, b) => a + b, 0) / values.length : 0;
}

export function hoursSince(iso: string, now: Date): number {
  return (now.getTime() - new Date(iso).getTime()) / 3_600_000;
}

export function isIdle(instance: Instance, now: Date = new Date()): boolean {
  return average(instance.cpuUsage) < IDLE_CPU_PERCENT
    && average(instance.ramUsage) < IDLE_RAM_PERCENT
    && hoursSince(instance.lastRequest, now) > IDLE_AFTER_HOURS;
}

export function computeIdleInstances(instances: readonly Instance[], now: Date = new Date()): Instance[] {
  return instances.filter((i) => isIdle(i, now));
}

export function listIdleInstances(instances: readonly Instance[], now: Date = new Date()): IdleInstanceReport {
  const idleInstances = computeIdleInstances(instances, now).map((i): IdleInstance => {
    const cost = hourlyCost(i.tier);
    return {
      instanceId: i.instanceId,
      name: i.name,
      region: i.region,
      tier: i.tier,
      avgCpu: Math.round(average(i.cpuUsage) * 10) / 10,
      avgRam: Math.round(average(i.ramUsage) * 10) / 10,
      hoursSinceRequest: Math.floor(hoursSince(i.lastRequest, now)),
      hourlyCost: cost,
      monthlySavings: roundCurrency(cost * HOURS_PER_MONTH),
    };
  });

  return {
    idleInstances,
    totalIdleCount: idleInstances.length,
    totalMonthlySavings: roundCurrency(idleInstances.reduce((sum, i) => sum + i.monthlySavings, 0)),
  };
}
