/**
 * Append-only log of remediation events and their incident reports.
 *
 * The engine is the only writer. Readers always get copies, and a failing
 * subscriber or sink is logged and skipped so it can never reach the engine.
 */

import type { IncidentReport, RemediationEvent } from './types.js';

export interface EventLogEntry {
  event: RemediationEvent;
  report: IncidentReport | null;
}

export type EventLogListener = (entry: EventLogEntry) => void;

/** Secondary destination for log entries, e.g. the SQLite audit trail. */
export interface EventSink {
  name: string;
  write(entry: EventLogEntry): void;
}

export class EventLog {
  private readonly events: RemediationEvent[] = [];
  private readonly byId = new Map<string, RemediationEvent>();
  private readonly reports = new Map<string, IncidentReport>();
  private readonly listeners = new Set<EventLogListener>();
  private readonly sinks: EventSink[];

  constructor(sinks: EventSink[] = []) {
    this.sinks = [...sinks];
  }

  get size(): number {
    return this.events.length;
  }

  /**
   * Store an event (frozen) with its report, then fan out to sinks and
   * subscribers. Duplicate event ids are rejected.
   */
  append(event: RemediationEvent, report: IncidentReport | null = null): void {
    if (this.byId.has(event.eventId)) {
      throw new Error(`Event ${event.eventId} is already in the log`);
    }
    if (report && report.eventId !== event.eventId) {
      throw new Error(`Report for ${report.eventId} does not belong to event ${event.eventId}`);
    }

    const frozen = Object.isFrozen(event) ? event : Object.freeze({ ...event });
    const frozenReport = report ? Object.freeze({ ...report }) : null;

    this.events.push(frozen);
    this.byId.set(frozen.eventId, frozen);
    if (frozenReport) this.reports.set(frozen.eventId, frozenReport);

    const entry: EventLogEntry = { event: frozen, report: frozenReport };

    for (const sink of this.sinks) {
      try {
        sink.write(entry);
      } catch (err) {
        console.warn(`[EventLog] Sink "${sink.name}" failed:`, err instanceof Error ? err.message : err);
      }
    }

    for (const listener of this.listeners) {
      try {
        listener(entry);
      } catch (err) {
        console.warn('[EventLog] Subscriber failed:', err instanceof Error ? err.message : err);
      }
    }
  }

  /** Ordered snapshot, oldest first. */
  list(): RemediationEvent[] {
    return [...this.events];
  }

  /** Most recent events first, optionally for one service. */
  recent(limit = 50, serviceId?: string): RemediationEvent[] {
    if (limit <= 0) return [];
    const matching = serviceId
      ? this.events.filter((e) => e.serviceId === serviceId)
      : this.events;
    return matching.slice(-limit).reverse();
  }

  get(eventId: string): RemediationEvent | undefined {
    return this.byId.get(eventId);
  }

  getReport(eventId: string): IncidentReport | undefined {
    return this.reports.get(eventId);
  }

  /** Reports in event order. */
  listReports(): IncidentReport[] {
    const out: IncidentReport[] = [];
    for (const event of this.events) {
      const report = this.reports.get(event.eventId);
      if (report) out.push(report);
    }
    return out;
  }

  /** Returns an unsubscribe function. */
  subscribe(listener: EventLogListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }
}
