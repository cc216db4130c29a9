/**
 * Incident reports for remediation events.
 *
 * A report is built for every event whose action is not `none`, i.e. every
 * restart attempt. No-action events get none.
 */

import { HEALTH_THRESHOLD, normalizeHealth } from './thresholds.js';
import type { IncidentOutcome, IncidentReport, RemediationEvent } from './types.js';

const DEFAULT_ROOT_CAUSE = 'Unspecified anomaly';

// ---------------------------------------------------------------------------
// Outcome
// ---------------------------------------------------------------------------

/**
 * Decide the outcome of an event:
 *  - no action -> null (not an incident)
 *  - escalated -> escalated
 *  - post-restart health >= HEALTH_THRESHOLD -> resolved
 *  - anything else -> failed
 */
export function resolveOutcome(event: RemediationEvent): IncidentOutcome | null {
  if (event.actionTaken === 'none') return null;
  if (event.escalated) return 'escalated';
  const health = event.restart ? normalizeHealth(event.restart.postRestartHealth) : 0;
  return health >= HEALTH_THRESHOLD ? 'resolved' : 'failed';
}

// ---------------------------------------------------------------------------
// Root cause
// ---------------------------------------------------------------------------

/** Non-empty, derived from the assessment that triggered the event. */
export function describeRootCause(event: RemediationEvent): string {
  const { assessment } = event;
  const detail = assessment.reason.trim() || assessment.evidence.find((e) => e.trim().length > 0)?.trim();

  if (!detail) return DEFAULT_ROOT_CAUSE;

  const label = assessment.anomalyType ? `${assessment.anomalyType} (${assessment.severity})` : assessment.severity;
  return `${label}: ${detail}`;
}

// ---------------------------------------------------------------------------
// Report construction
// ---------------------------------------------------------------------------

export function buildIncidentReport(event: RemediationEvent, generatedAt: string): IncidentReport | null {
  const outcome = resolveOutcome(event);
  if (outcome === null) return null;

  return Object.freeze({
    eventId: event.eventId,
    serviceId: event.serviceId,
    rootCause: describeRootCause(event),
    actionTaken: event.actionTaken,
    outcome,
    durationMs: event.restart?.durationMs ?? 0,
    generatedAt,
  });
}

// ---------------------------------------------------------------------------
// Text rendering
// ---------------------------------------------------------------------------

const OUTCOME_LABEL: Record<IncidentOutcome, string> = {
  resolved: 'RESOLVED',
  escalated: 'ESCALATED -- auto-restart disabled until re-enabled',
  failed: 'FAILED -- service still unhealthy',
};

/**
 * Plain-text report used by the tool server and the event feed.
 */
export function formatIncidentReport(report: IncidentReport, event?: RemediationEvent): string {
  const lines = [
    `Incident ${report.eventId}`,
    `Service:    ${report.serviceId}`,
    `Root cause: ${report.rootCause}`,
    `Action:     ${report.actionTaken}`,
    `Outcome:    ${OUTCOME_LABEL[report.outcome]}`,
    `Duration:   ${report.durationMs}ms`,
  ];

  if (event?.restart) {
    lines.push(`Health:     ${event.restart.postRestartHealth.toFixed(2)} (threshold ${HEALTH_THRESHOLD})`);
    if (event.restart.error) lines.push(`Error:      ${event.restart.error}`);
  }
  if (event && event.assessment.evidence.length > 0) {
    lines.push('Evidence:');
    for (const item of event.assessment.evidence) lines.push(`  - ${item}`);
  }

  lines.push(`Generated:  ${report.generatedAt}`);
  return lines.join('\n');
}
