// ---------------------------------------------------------------------------
// Auto-remediation domain types
// ---------------------------------------------------------------------------

/** Ordered anomaly severities, least to most severe. */
export const SEVERITIES = ['none', 'low', 'medium', 'high', 'critical'] as const;

export type Severity = (typeof SEVERITIES)[number];

/**
 * What the engine did about an assessment. Every restart attempt is recorded
 * as `restart`, including one whose executor failed; whether it escalated is
 * carried by `RemediationEvent.escalated`. `escalate` is kept for records
 * written by hand or by other producers.
 */
export type RemediationAction = 'restart' | 'escalate' | 'none';

export type IncidentOutcome = 'resolved' | 'escalated' | 'failed';

export type RestartStatus = 'success' | 'failed';

/**
 * Result of analysing one service's recent telemetry.
 * Invariant: `hasAnomaly === (severity !== 'none')`.
 */
export interface AnomalyAssessment {
  serviceId: string;
  hasAnomaly: boolean;
  severity: Severity;
  reason: string;
  evidence: readonly string[];
  anomalyType?: string;
  recommendedAction?: string;
}

/** What a compute backend reports for one restart request. */
export interface RestartResult {
  status: RestartStatus;
  durationMs: number;
  /** Backend that carried out the restart (simulation, http, ...) */
  via?: string;
  error?: string;
}

export interface RestartOutcome extends RestartResult {
  /** Health in [0, 1] measured after the settle delay; 0 when the restart failed */
  postRestartHealth: number;
}

/** Reasons the engine recorded an event without acting on it. */
export type SkipReason =
  | 'below_threshold'
  | 'auto_restart_disabled'
  | 'remediation_disabled';

/**
 * One remediation decision. Frozen once created and never edited.
 */
export interface RemediationEvent {
  readonly eventId: string;
  readonly serviceId: string;
  readonly assessment: AnomalyAssessment;
  readonly actionTaken: RemediationAction;
  readonly restart: Readonly<RestartOutcome> | null;
  readonly escalated: boolean;
  readonly skipReason?: SkipReason;
  /** ISO-8601 */
  readonly timestamp: string;
}

/** Human-readable summary of an event in which a restart was attempted. */
export interface IncidentReport {
  readonly eventId: string;
  readonly serviceId: string;
  readonly rootCause: string;
  readonly actionTaken: RemediationAction;
  readonly outcome: IncidentOutcome;
  readonly durationMs: number;
  readonly generatedAt: string;
}

/**
 * Per-service remediation policy. `autoRestartEnabled` only goes false through
 * escalation and only comes back through an explicit operator re-enable.
 */
export interface ServicePolicyState {
  serviceId: string;
  autoRestartEnabled: boolean;
  lastEventId: string | null;
  disabledAt: string | null;
}

// ---------------------------------------------------------------------------
// Collaborators
// ---------------------------------------------------------------------------

export interface AnomalySource {
  assess(serviceId: string): Promise<AnomalyAssessment>;
}

export interface RestartExecutor {
  restart(serviceId: string): Promise<RestartResult>;
}

export interface HealthProber {
  /** Returns a health score in [0, 1]. */
  probeHealth(serviceId: string): Promise<number>;
}

export interface ServiceCatalog {
  listServiceIds(): Promise<string[]>;
}
