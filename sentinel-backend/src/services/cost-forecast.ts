/**
 * Monthly cost estimate and billing forecast for the fleet.
 */

import type { Instance } from '../clients/infra-sim.js';
import { computeIdleInstances } from './idle-instances.js';
import { hourlyCost, roundCurrency } from './pricing.js';

export interface MonthlyCostEstimate {
  totalMonthlyCost: number;
  costByTier: Record<string, number>;
  costByRegion: Record<string, number>;
  idleInstanceCount: number;
  potentialSavings: number;
}

export interface CostForecast {
  month: string;
  predictedCost: number;
  confidence: number;
  narrative: string;
  breakdown: Record<string, number>;
  costByRegion: Record<string, number>;
  riskFactors: string[];
  potentialSavings: number;
}

/** Fleets at least this large forecast with high confidence */
const HIGH_CONFIDENCE_MIN_INSTANCES = 5;

export function currentMonth(now: Date = new Date()): string {
  return now.toISOString().slice(0, 7);
}

export function estimateMonthlyCost(instances: readonly Instance[], now: Date = new Date(), days = 30): MonthlyCostEstimate {
  const hours = days * 24;
  const costByTier: Record<string, number> = {};
  const costByRegion: Record<string, number> = {};
  let total = 0;

  for (const instance of instances) {
    const cost = hourlyCost(instance.tier) * hours;
    total += cost;
    costByTier[instance.tier] = (costByTier[instance.tier] ?? 0) + cost;
    costByRegion[instance.region] = (costByRegion[instance.region] ?? 0) + cost;
  }

  const idle = computeIdleInstances(instances, now);
  const savings = idle.reduce((sum, i) => sum + hourlyCost(i.tier) * hours, 0);

  const round = (record: Record<string, number>) =>
    Object.fromEntries(Object.entries(record).map(([k, v]) => [k, roundCurrency(v)]));

  return {
    totalMonthlyCost: roundCurrency(total),
    costByTier: round(costByTier),
    costByRegion: round(costByRegion),
    idleInstanceCount: idle.length,
    potentialSavings: roundCurrency(savings),
  };
}

export function forecastBilling(instances: readonly Instance[], month: string, now: Date = new Date()): CostForecast {
  const estimate = estimateMonthlyCost(instances, now);
  const confidence = instances.length >= HIGH_CONFIDENCE_MIN_INSTANCES ? 0.75 : 0.55;

  const riskFactors: string[] = [];
  if (confidence < 0.6) {
    riskFactors.push('Limited historical data available');
    riskFactors.push('High variance in usage patterns');
  }
  if (estimate.idleInstanceCount > 2) {
    riskFactors.push(`${estimate.idleInstanceCount} idle instances may be terminated`);
  }

  let narrative = `Forecast for ${month}: predicted cost $${estimate.totalMonthlyCost.toFixed(2)} with ${Math.round(confidence * 100)}% confidence.`;
  if (estimate.potentialSavings > 0) {
    narrative += ` Potential savings of $${estimate.potentialSavings.toFixed(2)} from idle resources.`;
  }

  return {
    month,
    predictedCost: estimate.totalMonthlyCost,
    confidence,
    narrative,
    breakdown: estimate.costByTier,
    costByRegion: estimate.costByRegion,
    riskFactors,
    potentialSavings: estimate.potentialSavings,
  };
}
