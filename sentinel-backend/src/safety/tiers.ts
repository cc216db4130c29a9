/**
 * 4-tier action classification for tool safety enforcement.
 *
 * Every tool invocation passes through checkSafety() which:
 *  1. Looks up the tool's tier
 *  2. Applies tier-specific logic (GREEN/YELLOW run, RED needs confirmation, BLACK blocked)
 *
 * Fail-safe: unknown tools default to BLACK (blocked).
 */

// ---------------------------------------------------------------------------
// Tier enum
// ---------------------------------------------------------------------------

export enum ActionTier {
  /** Auto-execute: read-only operations, no side effects */
  GREEN = 'green',

  /** Execute + log: service restarts, scans, policy resets */
  YELLOW = 'yellow',

  /** Require confirmed=true flag: switching autonomous remediation on or off */
  RED = 'red',

  /** Always blocked */
  BLACK = 'black',
}

// ---------------------------------------------------------------------------
// Tool-to-tier mapping
// ---------------------------------------------------------------------------

export const TOOL_TIERS: Record<string, ActionTier> = {
  // GREEN -- read-only fleet insight
  list_idle_instances: ActionTier.GREEN,
  get_billing_forecast: ActionTier.GREEN,
  get_metrics: ActionTier.GREEN,
  detect_anomaly: ActionTier.GREEN,
  summarize_infra: ActionTier.GREEN,
  get_hygiene_score: ActionTier.GREEN,

  // GREEN -- read-only remediation state
  get_remediation_status: ActionTier.GREEN,
  list_remediation_events: ActionTier.GREEN,
  get_incident_report: ActionTier.GREEN,

  // YELLOW -- operational actions with controlled side effects
  restart_service: ActionTier.YELLOW,
  run_remediation_scan: ActionTier.YELLOW,
  re_enable_auto_restart: ActionTier.YELLOW,

  // RED -- changes what the engine may do unattended
  set_auto_remediation: ActionTier.RED,
};

// ---------------------------------------------------------------------------
// Lookup helpers
// ---------------------------------------------------------------------------

/**
 * Get the safety tier for a tool. Unknown tools return BLACK (fail-safe).
 */
export function getToolTier(toolName: string): ActionTier {
  return Object.prototype.hasOwnProperty.call(TOOL_TIERS, toolName) ? TOOL_TIERS[toolName] : ActionTier.BLACK;
}

// ---------------------------------------------------------------------------
// Safety check
// ---------------------------------------------------------------------------

export interface SafetyResult {
  allowed: boolean;
  reason?: string;
  tier: ActionTier;
}

/**
 * Evaluation order:
 *  1. Look up tool tier
 *  2. BLACK -> always block
 *  3. RED && !confirmed -> block with "requires confirmation"
 *  4. YELLOW / GREEN -> allow
 */
export function checkSafety(tool: string, confirmed: boolean = false): SafetyResult {
  const tier = getToolTier(tool);

  switch (tier) {
    case ActionTier.BLACK:
      return {
        allowed: false,
        reason: `Tool "${tool}" is classified as BLACK tier and is always blocked`,
        tier,
      };
    case ActionTier.RED:
      if (!confirmed) {
        return {
          allowed: false,
          reason: `Tool "${tool}" is classified as RED tier and requires confirmed=true`,
          tier,
        };
      }
      return { allowed: true, tier };
    case ActionTier.YELLOW:
    case ActionTier.GREEN:
      return { allowed: true, tier };
  }
}
