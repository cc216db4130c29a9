/**
 * Keyword intent parser for the chat endpoint.
 *
 * Each tool has a list of keyword patterns; the tool with the most matching
 * patterns wins (ties go to the earlier tool). Service ids are extracted by
 * exact id first, then by short name. There is no LLM in the loop.
 */

// ---- Keyword patterns per tool (order breaks ties) ----
const INTENT_PATTERNS: ReadonlyArray<readonly [tool: string, patterns: readonly RegExp[]]> = [
  ['list_idle_instances', [/\bidle\b/, /\bidel\b/, /\bunused\b/, /\binactive\b/, /\bwasted?\b/]],
  ['get_metrics', [/\bmetrics?\b/, /\bperformance\b/, /\bcpu\b/, /\bram\b/, /\blatency\b/, /\bstats?\b/]],
  ['get_billing_forecast', [/\bforecast\b/, /\bcost\b/, /\bbilling\b/, /\bbudget\b/, /\bspending\b/, /\bmoney\b/]],
  ['detect_anomaly', [/\banomaly\b/, /\banomalies\b/, /\bissues?\b/, /\bproblems?\b/, /\balerts?\b/, /\bdetect\b/]],
  ['restart_service', [/\brestart\b/, /\breboot\b/, /\breset\b/, /\brecycle\b/]],
  ['summarize_infra', [/\bsummary\b/, /\boverview\b/, /\breport\b/, /\bstatus\b/, /\binfra\w*\b/, /\bdashboard\b/]],
  ['get_hygiene_score', [/\bhygiene\b/, /\bscore\b/, /\bhealth\b/, /\bgrade\b/, /\brating\b/]],
  ['list_remediation_events', [/\bremediation\b/, /\bescalat\w*\b/, /\bincidents?\b/, /\bauto-?restarts?\b/]],
];

const SERVICE_TOOLS = new Set(['get_metrics', 'detect_anomaly', 'restart_service']);

const SHORT_NAMES: ReadonlyArray<readonly [name: string, serviceId: string]> = [
  ['web', 'svc_web'],
  ['api', 'svc_api'],
  ['db', 'svc_db'],
  ['database', 'svc_db'],
  ['cache', 'svc_cache'],
  ['worker', 'svc_worker'],
];

const MONTH_PATTERN = /\b(\d{4}-\d{2})\b/;

export interface ParsedIntent {
  /** Tool to execute, or null when the user must clarify */
  tool: string | null;
  args: Record<string, string>;
  clarification: string | null;
}

export const HELP_MESSAGE = [
  "I didn't quite understand that. Here's what I can help with:",
  '',
  '- "Show idle instances" - find underutilized resources',
  '- "Get metrics for svc_web" - check service performance',
  '- "What\'s the cost forecast?" - predict cloud spending',
  '- "Check for anomalies in api" - detect service issues',
  '- "Restart svc_api" - restart a service',
  '- "Show summary" - infrastructure overview',
  '- "What\'s the hygiene score?" - overall infrastructure health',
  '- "Show remediation incidents" - recent auto-remediation activity',
].join('\n');

/**
 * Find a service id in free text. Exact ids win, longest first, so that
 * `svc_web_alt` is not read as `svc_web`.
 */
export function extractServiceId(text: string, knownServiceIds: readonly string[]): string | null {
  const lower = text.toLowerCase();
  const exact = [...knownServiceIds].sort((a, b) => b.length - a.length);
  for (const id of exact) {
    if (new RegExp(`\\b${id}\\b`).test(lower)) return id;
  }

  for (const [name, serviceId] of SHORT_NAMES) {
    if (new RegExp(`\\b${name}\\b`).test(lower) && knownServiceIds.includes(serviceId)) {
      return serviceId;
    }
  }
  return null;
}

export function parseIntent(message: string, knownServiceIds: readonly string[]): ParsedIntent {
  const lower = message.toLowerCase().trim();

  let bestTool: string | null = null;
  let bestScore = 0;
  for (const [tool, patterns] of INTENT_PATTERNS) {
    const score = patterns.filter((p) => p.test(lower)).length;
    if (score > bestScore) {
      bestScore = score;
      bestTool = tool;
    }
  }

  if (!bestTool) {
    return { tool: null, args: {}, clarification: HELP_MESSAGE };
  }

  const args: Record<string, string> = {};

  if (SERVICE_TOOLS.has(bestTool)) {
    const serviceId = extractServiceId(lower, knownServiceIds);
    if (serviceId) {
      args.service_id = serviceId;
    } else if (bestTool === 'restart_service') {
      return {
        tool: null,
        args: {},
        clarification: `Which service would you like to restart? Available: ${knownServiceIds.join(', ')}`,
      };
    } else {
      // get_metrics / detect_anomaly need a target; fall back to the first service
      const first = knownServiceIds[0];
      if (first) args.service_id = first;
    }
  }

  if (bestTool === 'get_billing_forecast') {
    const month = MONTH_PATTERN.exec(message);
    if (month?.[1]) args.month = month[1];
  }

  return { tool: bestTool, args, clarification: null };
}
