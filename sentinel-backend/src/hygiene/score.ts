/**
 * Infrastructure hygiene score.
 *
 *   score = (100 - idlePercentage)     * 0.25
 *         + (100 - anomalyPenalty)     * 0.30
 *         + (100 - costRiskPenalty)    * 0.25
 *         + (100 - restartFailureRate) * 0.20
 *
 * Every input is a 0-100 penalty, clamped before weighting. Pure: the score
 * is recomputed on demand and never stored.
 */

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface HygieneInputs {
  idlePercentage: number;
  anomalyPenalty: number;
  costRiskPenalty: number;
  restartFailureRate: number;
}

export type HygieneFactor = keyof HygieneInputs;

export type HygieneStatus = 'critical' | 'needs_attention' | 'healthy';

export interface FactorBreakdown {
  /** Clamped penalty, 0-100 */
  penalty: number;
  weight: number;
  /** (100 - penalty) * weight */
  contribution: number;
  /** penalty * weight */
  pointsLost: number;
}

export interface HygieneScore {
  score: number;
  status: HygieneStatus;
  breakdown: Record<HygieneFactor, FactorBreakdown>;
  suggestions: string[];
  calculatedAt: string;
}

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

export const HYGIENE_WEIGHTS: Readonly<Record<HygieneFactor, number>> = {
  idlePercentage: 0.25,
  anomalyPenalty: 0.3,
  costRiskPenalty: 0.25,
  restartFailureRate: 0.2,
};

const FACTORS: readonly HygieneFactor[] = [
  'idlePercentage',
  'anomalyPenalty',
  'costRiskPenalty',
  'restartFailureRate',
];

export const HEALTHY_ABOVE = 75;
export const CRITICAL_BELOW = 50;

/** Scores are exact weighted sums; only float noise below this is removed. */
const SCORE_PRECISION = 1e9;

const HEALTHY_SUGGESTION = 'Infrastructure is healthy - continue monitoring';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Clamp a penalty into [0, 100]. Non-numeric input counts as the worst case. */
export function clampPenalty(value: number): number {
  if (Number.isNaN(value)) return 100;
  return Math.min(100, Math.max(0, value));
}

/**
 * < 50 critical, 50..75 inclusive needs_attention, > 75 healthy.
 */
export function classifyHygieneStatus(score: number): HygieneStatus {
  if (score < CRITICAL_BELOW) return 'critical';
  if (score <= HEALTHY_ABOVE) return 'needs_attention';
  return 'healthy';
}

function suggestionFor(factor: HygieneFactor, penalty: number): string {
  switch (factor) {
    case 'idlePercentage':
      return penalty > 20
        ? `Terminate or downsize idle instances (${penalty.toFixed(0)}% of the fleet is idle)`
        : 'Review idle instances for potential consolidation';
    case 'anomalyPenalty':
      return penalty >= 30
        ? `Investigate service anomalies immediately (anomaly penalty ${penalty.toFixed(0)})`
        : 'Monitor detected anomalies and set up alerting';
    case 'costRiskPenalty':
      return penalty > 40
        ? 'Review cost forecast risk factors and implement budget alerts'
        : 'Consider reserved instances for predictable workloads';
    case 'restartFailureRate':
      return penalty > 20
        ? 'Investigate restart failures - check service dependencies'
        : 'Review restart procedures and health check configurations';
  }
}

/** One suggestion per factor that lost points, biggest loss first. */
function buildSuggestions(breakdown: Record<HygieneFactor, FactorBreakdown>): string[] {
  const losing = FACTORS
    .filter((f) => breakdown[f].pointsLost > 0)
    .sort((a, b) => breakdown[b].pointsLost - breakdown[a].pointsLost);

  if (losing.length === 0) return [HEALTHY_SUGGESTION];
  return losing.map((f) => suggestionFor(f, breakdown[f].penalty));
}

// ---------------------------------------------------------------------------
// Calculator
// ---------------------------------------------------------------------------

function factorBreakdown(inputs: HygieneInputs, factor: HygieneFactor): FactorBreakdown {
  const penalty = clampPenalty(inputs[factor]);
  const weight = HYGIENE_WEIGHTS[factor];
  return {
    penalty,
    weight,
    contribution: (100 - penalty) * weight,
    pointsLost: penalty * weight,
  };
}

export function computeHygiene(inputs: HygieneInputs, now: Date = new Date()): HygieneScore {
  const breakdown: Record<HygieneFactor, FactorBreakdown> = {
    idlePercentage: factorBreakdown(inputs, 'idlePercentage'),
    anomalyPenalty: factorBreakdown(inputs, 'anomalyPenalty'),
    costRiskPenalty: factorBreakdown(inputs, 'costRiskPenalty'),
    restartFailureRate: factorBreakdown(inputs, 'restartFailureRate'),
  };

  const raw = FACTORS.reduce((sum, f) => sum + breakdown[f].contribution, 0);
  const score = Math.min(100, Math.max(0, Math.round(raw * SCORE_PRECISION) / SCORE_PRECISION));

  return {
    score,
    status: classifyHygieneStatus(score),
    breakdown,
    suggestions: buildSuggestions(breakdown),
    calculatedAt: now.toISOString(),
  };
}
