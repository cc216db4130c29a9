/**
 * 6 auto-remediation control tools.
 *
 * set_auto_remediation is RED tier (requires confirmed=true). Scans and
 * re-enabling a service are YELLOW; the read tools are GREEN.
 * Safety enforcement happens in the executeTool() pipeline.
 */

import { z } from 'zod';
import type { MonitorRuntime } from '../../monitor/index.js';
import { formatIncidentReport } from '../../monitor/reporter.js';
import { errorResult, jsonResult, type ToolRegistry } from '../registry.js';
import { serviceIdSchema } from './fleet.js';

/**
 * Register all remediation tools on the registry.
 */
export function registerRemediationTools(registry: ToolRegistry, runtime: MonitorRuntime): void {
  const { engine, eventLog } = runtime;

  // 1. get_remediation_status
  registry.register(
    'get_remediation_status',
    'Auto-remediation engine status: mode, loop state, cycle count and services with auto-restart disabled',
    {},
    async () => jsonResult({ ...engine.getStatus(), policies: engine.listPolicies() }),
  );

  // 2. set_auto_remediation
  registry.register(
    'set_auto_remediation',
    'Turn the autonomous remediation loop on or off (RED tier -- requires confirmation)',
    {
      enabled: z.boolean().describe('true starts the loop, false stops it'),
      confirmed: z.boolean().optional().describe('Must be true to execute (safety confirmation)'),
    },
    async ({ enabled }) => {
      if (enabled) engine.start();
      else engine.stop();
      return jsonResult({ success: true, action: 'set_auto_remediation', ...engine.getStatus() });
    },
  );

  // 3. run_remediation_scan
  registry.register(
    'run_remediation_scan',
    'Run one remediation scan now, over the whole fleet or a single service',
    {
      service_id: serviceIdSchema.optional().describe('Only scan this service'),
    },
    async ({ service_id }) => {
      if (service_id) {
        const event = await engine.scanService(service_id);
        if (!event) return errorResult(`Unknown service "${service_id}"`);
        return jsonResult({ events: [event], report: eventLog.getReport(event.eventId) ?? null });
      }
      const events = await engine.scanOnce();
      return jsonResult({
        cycle: engine.getStatus().cycles,
        events,
        reports: events.flatMap((e) => eventLog.getReport(e.eventId) ?? []),
      });
    },
  );

  // 4. list_remediation_events
  registry.register(
    'list_remediation_events',
    'List recent remediation events, newest first',
    {
      service_id: serviceIdSchema.optional().describe('Only events for this service'),
      limit: z.number().int().min(1).max(500).optional().describe('Maximum events to return (default 50)'),
    },
    async ({ service_id, limit }) => {
      const events = eventLog.recent(limit ?? 50, service_id);
      return jsonResult({ count: events.length, total: eventLog.size, events });
    },
  );

  // 5. get_incident_report
  registry.register(
    'get_incident_report',
    'Get the incident report for a remediation event that attempted a restart',
    {
      event_id: z.string().min(1).describe('Event ID from list_remediation_events'),
    },
    async ({ event_id }) => {
      const report = eventLog.getReport(event_id);
      if (!report) {
        return errorResult(`No incident report for event "${event_id}"`);
      }
      return jsonResult({ report, text: formatIncidentReport(report, eventLog.get(event_id)) });
    },
  );

  // 6. re_enable_auto_restart
  registry.register(
    're_enable_auto_restart',
    'Allow autonomous restarts again for a service that was escalated',
    {
      service_id: serviceIdSchema.describe('Service ID to re-enable'),
    },
    async ({ service_id }) => {
      const ok = engine.reEnableService(service_id);
      if (!ok) {
        return errorResult(`No remediation policy for "${service_id}" -- the engine has never scanned it`);
      }
      return jsonResult({ success: true, service_id, policy: engine.getPolicy(service_id) });
    },
  );
}
