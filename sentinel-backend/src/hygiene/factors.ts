/**
 * Derivation of the four hygiene penalties from fleet state.
 */

import type { RemediationEvent, Severity } from '../monitor/types.js';
import type { HygieneInputs } from './score.js';

/** Penalty points per detected anomaly, summed and capped at 100. */
export const ANOMALY_SEVERITY_PENALTY: Readonly<Record<Severity, number>> = {
  none: 0,
  low: 5,
  medium: 15,
  high: 30,
  critical: 50,
};

/** Cost-risk penalty used when no forecast is available. */
export const DEFAULT_COST_RISK_PENALTY = 20;

export interface ForecastRisk {
  confidence: number;
  riskFactors: readonly string[];
}

export function idlePercentage(idleCount: number, totalCount: number): number {
  if (totalCount <= 0) return 0;
  return (idleCount / totalCount) * 100;
}

export function anomalyPenalty(assessments: ReadonlyArray<{ severity: Severity }>): number {
  const total = assessments.reduce((sum, a) => sum + ANOMALY_SEVERITY_PENALTY[a.severity], 0);
  return Math.min(100, total);
}

/**
 * (1 - confidence) * 50 + 10 per risk factor, capped at 100.
 */
export function costRiskPenalty(forecast: ForecastRisk | null | undefined): number {
  if (!forecast) return DEFAULT_COST_RISK_PENALTY;
  const confidence = Math.min(1, Math.max(0, forecast.confidence));
  return Math.min(100, (1 - confidence) * 50 + forecast.riskFactors.length * 10);
}

/**
 * Share of restart attempts that escalated, as a percentage.
 * No attempts means no failures.
 */
export function restartFailureRate(events: readonly RemediationEvent[]): number {
  const attempts = events.filter((e) => e.actionTaken !== 'none');
  if (attempts.length === 0) return 0;
  const failures = attempts.filter((e) => e.escalated).length;
  return (failures / attempts.length) * 100;
}

export interface FleetHygieneState {
  totalInstances: number;
  idleInstances: number;
  assessments: ReadonlyArray<{ severity: Severity }>;
  forecast: ForecastRisk | null;
  events: readonly RemediationEvent[];
}

export function collectHygieneInputs(state: FleetHygieneState): HygieneInputs {
  return {
    idlePercentage: idlePercentage(state.idleInstances, state.totalInstances),
    anomalyPenalty: anomalyPenalty(state.assessments),
    costRiskPenalty: costRiskPenalty(state.forecast),
    restartFailureRate: restartFailureRate(state.events),
  };
}
