/**
 * Monitor runtime and lifecycle.
 *
 * Wires the simulated fleet, the metrics-backed anomaly source and health
 * prober, the configured compute backend and the event log into one
 * RemediationEngine. startMonitor() bridges the event log onto the /events
 * Socket.IO namespace and, when AUTO_REMEDIATION=true, starts the loop.
 */

import crypto from 'node:crypto';
import type { Namespace } from 'socket.io';
import { config } from '../config.js';
import { MetricsAnomalySource } from '../clients/anomaly.js';
import { createRestartExecutor } from '../clients/compute.js';
import { MetricsHealthProber } from '../clients/health.js';
import { SimulatedFleet } from '../clients/infra-sim.js';
import { RemediationEngine, type RemediationEngineOptions } from './engine.js';
import { EventLog, type EventLogEntry, type EventSink } from './event-log.js';
import type { RestartExecutor } from './types.js';

// ---------------------------------------------------------------------------
// Runtime
// ---------------------------------------------------------------------------

export interface MonitorRuntime {
  fleet: SimulatedFleet;
  engine: RemediationEngine;
  eventLog: EventLog;
  restartExecutor: RestartExecutor;
}

export interface MonitorRuntimeOptions {
  fleet?: SimulatedFleet;
  restartExecutor?: RestartExecutor;
  sinks?: EventSink[];
  engine?: Partial<Pick<RemediationEngineOptions, 'intervalMs' | 'settleDelayMs' | 'recordQuietScans' | 'now' | 'idFactory'>>;
}

export function createMonitorRuntime(options: MonitorRuntimeOptions = {}): MonitorRuntime {
  const fleet = options.fleet ?? new SimulatedFleet({ restartSuccessRate: config.simRestartSuccessRate });
  const eventLog = new EventLog(options.sinks ?? []);
  const restartExecutor = options.restartExecutor ?? createRestartExecutor(fleet);

  const engine = new RemediationEngine({
    catalog: fleet,
    anomalySource: new MetricsAnomalySource(fleet),
    restartExecutor,
    healthProber: new MetricsHealthProber(fleet),
    eventLog,
    intervalMs: config.remediationIntervalMs,
    settleDelayMs: config.remediationSettleDelayMs,
    recordQuietScans: config.recordQuietScans,
    ...options.engine,
  });

  return { fleet, engine, eventLog, restartExecutor };
}

// ---------------------------------------------------------------------------
// Event feed
// ---------------------------------------------------------------------------

export interface FeedEvent {
  id: string;
  type: 'action' | 'alert' | 'status';
  severity: 'info' | 'warning' | 'error' | 'critical';
  title: string;
  message: string;
  node: string;
  source: 'monitor';
  timestamp: string;
  eventId: string;
  outcome: string | null;
}

/** Dashboard-friendly rendering of a log entry. */
export function toFeedEvent({ event, report }: EventLogEntry): FeedEvent {
  const base = {
    id: crypto.randomUUID(),
    node: event.serviceId,
    source: 'monitor' as const,
    timestamp: event.timestamp,
    eventId: event.eventId,
    outcome: report?.outcome ?? null,
  };

  if (event.escalated) {
    return {
      ...base,
      type: 'alert',
      severity: 'critical',
      title: `Escalated: ${event.serviceId}`,
      message: report?.rootCause ?? event.assessment.reason,
    };
  }

  if (event.actionTaken !== 'none') {
    const resolved = report?.outcome === 'resolved';
    return {
      ...base,
      type: 'action',
      severity: resolved ? 'info' : 'error',
      title: resolved ? `Resolved: ${event.serviceId} restarted` : `Remediation failed: ${event.serviceId}`,
      message: report?.rootCause ?? event.assessment.reason,
    };
  }

  if (event.skipReason === 'below_threshold') {
    return {
      ...base,
      type: 'status',
      severity: 'info',
      title: `Scan: ${event.serviceId} ${event.assessment.severity}`,
      message: event.assessment.reason,
    };
  }

  return {
    ...base,
    type: 'status',
    severity: 'warning',
    title: `Remediation skipped: ${event.serviceId}`,
    message: `${event.assessment.severity} anomaly not remediated (${event.skipReason ?? 'remediation_disabled'})`,
  };
}

// ---------------------------------------------------------------------------
// Lifecycle
// ---------------------------------------------------------------------------

let unsubscribe: (() => void) | null = null;

/**
 * Bridge the event log onto the /events namespace and start the engine
 * when auto-remediation is configured on.
 */
export function startMonitor(runtime: MonitorRuntime, eventsNs: Namespace): void {
  if (unsubscribe) {
    console.warn('[Monitor] Already running, skipping start');
    return;
  }

  unsubscribe = runtime.eventLog.subscribe((entry) => {
    eventsNs.emit('event', toFeedEvent(entry));
    if (entry.report) {
      eventsNs.emit('incident', entry.report);
    }
  });

  if (config.remediationAutoStart) {
    runtime.engine.start();
  } else {
    console.log('[Monitor] Auto-remediation is off (AUTO_REMEDIATION=false) -- start it via API or tool');
  }
}

export function stopMonitor(runtime: MonitorRuntime): void {
  runtime.engine.stop();
  if (unsubscribe) {
    unsubscribe();
    unsubscribe = null;
  }
  console.log('[Monitor] Monitoring stopped');
}
