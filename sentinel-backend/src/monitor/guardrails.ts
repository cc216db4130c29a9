/**
 * Pre-restart guardrails for autonomous remediation.
 *
 * Enforces:
 *  - Sticky escalation: a service whose remediation escalated is never
 *    restarted autonomously until an operator re-enables it
 *  - Mode switch: the engine's enabled flag gates every restart
 *
 * Policy state is owned by a PolicyRegistry instance (one per engine).
 */

import type { ServicePolicyState, SkipReason } from './types.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface GuardrailResult {
  allowed: boolean;
  reason?: SkipReason;
}

// ---------------------------------------------------------------------------
// Policy registry
// ---------------------------------------------------------------------------

export class PolicyRegistry {
  private readonly policies = new Map<string, ServicePolicyState>();

  /** Get the policy for a service, creating the default on first sight. */
  ensure(serviceId: string): ServicePolicyState {
    let policy = this.policies.get(serviceId);
    if (!policy) {
      policy = { serviceId, autoRestartEnabled: true, lastEventId: null, disabledAt: null };
      this.policies.set(serviceId, policy);
    }
    return policy;
  }

  /** Snapshot copy, or undefined for a service never scanned. */
  get(serviceId: string): ServicePolicyState | undefined {
    const policy = this.policies.get(serviceId);
    return policy ? { ...policy } : undefined;
  }

  list(): ServicePolicyState[] {
    return Array.from(this.policies.values(), (p) => ({ ...p }));
  }

  /** Point the policy at an event that is already in the log. */
  recordEvent(serviceId: string, eventId: string): void {
    this.ensure(serviceId).lastEventId = eventId;
  }

  disable(serviceId: string, at: string): void {
    const policy = this.ensure(serviceId);
    policy.autoRestartEnabled = false;
    policy.disabledAt = at;
  }

  /**
   * Operator re-enable. Returns false for services the registry has never seen.
   */
  reEnable(serviceId: string): boolean {
    const policy = this.policies.get(serviceId);
    if (!policy) return false;
    policy.autoRestartEnabled = true;
    policy.disabledAt = null;
    return true;
  }

  disabledServices(): string[] {
    return Array.from(this.policies.values())
      .filter((p) => !p.autoRestartEnabled)
      .map((p) => p.serviceId);
  }
}

// ---------------------------------------------------------------------------
// Combined guardrail check
// ---------------------------------------------------------------------------

/**
 * Check order:
 *  1. Service disabled by a previous escalation -> blocked
 *  2. Engine mode disabled -> blocked
 *  3. All pass -> allowed
 */
export function checkGuardrails(policy: ServicePolicyState, modeEnabled: boolean): GuardrailResult {
  if (!policy.autoRestartEnabled) {
    return { allowed: false, reason: 'auto_restart_disabled' };
  }

  if (!modeEnabled) {
    return { allowed: false, reason: 'remediation_disabled' };
  }

  return { allowed: true };
}
