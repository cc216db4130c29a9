/**
 * On-demand pricing used by the idle-instance and forecast reports.
 */

/** Hourly price (USD) per instance tier */
export const INSTANCE_COSTS: Readonly<Record<string, number>> = {
  frontend: 0.1,
  api: 0.15,
  database: 0.25,
  cache: 0.08,
  worker: 0.05,
};

export const DEFAULT_HOURLY_COST = 0.1;

/** Hours in the 30-day billing month */
export const HOURS_PER_MONTH = 24 * 30;

export function hourlyCost(tier: string): number {
  return INSTANCE_COSTS[tier] ?? DEFAULT_HOURLY_COST;
}

export function roundCurrency(value: number): number {
  return Math.round(value * 100) / 100;
}
