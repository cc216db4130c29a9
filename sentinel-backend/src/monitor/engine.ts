/**
 * Auto-remediation engine.
 *
 * Each scan cycle walks the service catalog and, per service:
 *  1. Asks the anomaly source for an assessment
 *  2. Gates on severity (high/critical only)
 *  3. Checks guardrails (sticky per-service disable, engine mode)
 *  4. Restarts the service and waits for it to finish
 *  5. Waits the settle delay, then probes health
 *  6. Resolves (health >= 0.7) or escalates and disables the service
 *  7. Builds an incident report for every restart attempt
 * Events are appended to the event log before the cycle returns.
 *
 * Cycles are serialized: a scan requested while another is running waits for
 * it. Collaborator failures never escape a cycle.
 */

import crypto from 'node:crypto';
import { EventLog, type EventLogEntry } from './event-log.js';
import { PolicyRegistry, checkGuardrails } from './guardrails.js';
import { buildIncidentReport } from './reporter.js';
import { isHealthy, normalizeHealth, requiresRemediation } from './thresholds.js';
import type {
  AnomalyAssessment,
  AnomalySource,
  HealthProber,
  RemediationEvent,
  RestartExecutor,
  RestartOutcome,
  RestartResult,
  ServiceCatalog,
  ServicePolicyState,
  SkipReason,
} from './types.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface RemediationEngineOptions {
  catalog: ServiceCatalog;
  anomalySource: AnomalySource;
  restartExecutor: RestartExecutor;
  healthProber: HealthProber;
  eventLog?: EventLog;
  policies?: PolicyRegistry;
  /** Delay between the end of one cycle and the start of the next */
  intervalMs?: number;
  /** Wait between a completed restart and the health probe */
  settleDelayMs?: number;
  /** Also log no-action events for services below the severity gate */
  recordQuietScans?: boolean;
  /** Initial mode; `start()` turns it on */
  enabled?: boolean;
  now?: () => Date;
  idFactory?: () => string;
}

export interface EngineStatus {
  enabled: boolean;
  running: boolean;
  intervalMs: number;
  settleDelayMs: number;
  cycles: number;
  lastCycleAt: string | null;
  lastCycleEvents: number;
  eventCount: number;
  disabledServices: string[];
}


const DEFAULT_INTERVAL_MS = 30_000;
const DEFAULT_SETTLE_DELAY_MS = 1_000;

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function sleep(ms: number): Promise<void> {
  if (ms <= 0) return Promise.resolve();
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/** Force `hasAnomaly` to agree with severity and freeze the result. */
function normalizeAssessment(serviceId: string, raw: AnomalyAssessment): AnomalyAssessment {
  return Object.freeze({
    ...raw,
    serviceId,
    hasAnomaly: raw.severity !== 'none',
    evidence: Object.freeze([...raw.evidence]),
  });
}

// ---------------------------------------------------------------------------
// Engine
// ---------------------------------------------------------------------------

export class RemediationEngine {
  readonly eventLog: EventLog;
  readonly policies: PolicyRegistry;

  private readonly catalog: ServiceCatalog;
  private readonly anomalySource: AnomalySource;
  private readonly restartExecutor: RestartExecutor;
  private readonly healthProber: HealthProber;
  private readonly intervalMs: number;
  private readonly settleDelayMs: number;
  private readonly recordQuietScans: boolean;
  private readonly now: () => Date;
  private readonly idFactory: () => string;

  private enabled: boolean;
  private running = false;
  private generation = 0;
  private timer: ReturnType<typeof setTimeout> | null = null;
  private queue: Promise<unknown> = Promise.resolve();
  private readonly reservedIds = new Set<string>();

  private cycles = 0;
  private lastCycleAt: string | null = null;
  private lastCycleEvents = 0;

  constructor(options: RemediationEngineOptions) {
    this.catalog = options.catalog;
    this.anomalySource = options.anomalySource;
    this.restartExecutor = options.restartExecutor;
    this.healthProber = options.healthProber;
    this.eventLog = options.eventLog ?? new EventLog();
    this.policies = options.policies ?? new PolicyRegistry();
    this.intervalMs = options.intervalMs ?? DEFAULT_INTERVAL_MS;
    this.settleDelayMs = options.settleDelayMs ?? DEFAULT_SETTLE_DELAY_MS;
    this.recordQuietScans = options.recordQuietScans ?? false;
    this.enabled = options.enabled ?? false;
    this.now = options.now ?? (() => new Date());
    this.idFactory = options.idFactory ?? (() => crypto.randomUUID());
  }

  // -------------------------------------------------------------------------
  // Lifecycle
  // -------------------------------------------------------------------------

  /** Enable remediation and start the background loop. Idempotent. */
  start(): void {
    this.enabled = true;
    if (this.running) {
      console.warn('[Remediation] Already running, skipping start');
      return;
    }

    this.running = true;
    const generation = ++this.generation;
    this.schedule(generation, 0);
    console.log(`[Remediation] Auto-remediation started (every ${Math.round(this.intervalMs / 1000)}s)`);
  }

  /**
   * Disable remediation and stop the loop. Idempotent.
   * A cycle already in flight finishes with the mode it started with.
   */
  stop(): void {
    this.enabled = false;
    if (!this.running) return;

    this.running = false;
    this.generation++;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    console.log('[Remediation] Auto-remediation stopped');
  }

  isEnabled(): boolean {
    return this.enabled;
  }

  isRunning(): boolean {
    return this.running;
  }

  /** Flip the mode without touching the loop (manual scans only). */
  setEnabled(enabled: boolean): void {
    this.enabled = enabled;
  }

  /** Resolves once every queued cycle has finished. */
  idle(): Promise<void> {
    return this.enqueue(async () => undefined);
  }

  private schedule(generation: number, delayMs: number): void {
    this.timer = setTimeout(() => {
      this.timer = null;
      void this.tick(generation);
    }, delayMs);
  }

  private async tick(generation: number): Promise<void> {
    try {
      await this.scanOnce();
    } catch (err) {
      console.error('[Remediation] Scan cycle error:', errorMessage(err));
    } finally {
      if (this.running && generation === this.generation) {
        this.schedule(generation, this.intervalMs);
      }
    }
  }

  // -------------------------------------------------------------------------
  // Scanning
  // -------------------------------------------------------------------------

  /** Run one full cycle over the catalog. */
  scanOnce(): Promise<RemediationEvent[]> {
    return this.enqueue(() => this.runCycle());
  }

  /**
   * Scan a single service. Unknown ids are a no-op returning null.
   * The resulting event is always logged, even below the severity gate.
   */
  scanService(serviceId: string): Promise<RemediationEvent | null> {
    return this.enqueue(async () => {
      const known = await this.listServiceIds();
      if (!known.includes(serviceId)) return null;

      const entry = await this.processService(serviceId, this.enabled);
      if (!entry) return null;
      this.commit([entry]);
      return entry.event;
    });
  }

  private enqueue<T>(task: () => Promise<T>): Promise<T> {
    const run = this.queue.then(task, task);
    this.queue = run.catch(() => undefined);
    return run;
  }

  private async listServiceIds(): Promise<string[]> {
    try {
      return await this.catalog.listServiceIds();
    } catch (err) {
      console.warn('[Remediation] Service catalog unavailable:', errorMessage(err));
      return [];
    }
  }

  private async runCycle(): Promise<RemediationEvent[]> {
    const modeEnabled = this.enabled;
    const serviceIds = await this.listServiceIds();
    const entries: EventLogEntry[] = [];

    for (const serviceId of serviceIds) {
      try {
        const entry = await this.processService(serviceId, modeEnabled);
        if (!entry) continue;
        if (entry.event.skipReason === 'below_threshold' && !this.recordQuietScans) continue;
        entries.push(entry);
      } catch (err) {
        console.error(`[Remediation] Error processing ${serviceId}:`, errorMessage(err));
      }
    }

    this.commit(entries);
    this.cycles++;
    this.lastCycleAt = this.now().toISOString();
    this.lastCycleEvents = entries.length;
    return entries.map((e) => e.event);
  }

  private commit(entries: EventLogEntry[]): void {
    for (const { event, report } of entries) {
      try {
        this.eventLog.append(event, report);
        this.policies.recordEvent(event.serviceId, event.eventId);
      } catch (err) {
        console.error(`[Remediation] Failed to log event ${event.eventId}:`, errorMessage(err));
      }
    }
    this.reservedIds.clear();
  }

  /**
   * Event ids are unique across the log and the cycle in progress. An id
   * factory that repeats itself falls back to a random UUID.
   */
  private nextEventId(): string {
    let id = this.idFactory();
    if (this.eventLog.get(id) || this.reservedIds.has(id)) {
      const fallback = crypto.randomUUID();
      console.warn(`[Remediation] Event id ${id} already used, using ${fallback}`);
      id = fallback;
    }
    this.reservedIds.add(id);
    return id;
  }

  /**
   * Assess one service and act on it. Returns null only when the anomaly
   * source failed, in which case the service is skipped for this cycle.
   */
  private async processService(serviceId: string, modeEnabled: boolean): Promise<EventLogEntry | null> {
    let assessment: AnomalyAssessment;
    try {
      assessment = normalizeAssessment(serviceId, await this.anomalySource.assess(serviceId));
    } catch (err) {
      console.warn(`[Remediation] Anomaly source failed for ${serviceId}, skipping:`, errorMessage(err));
      return null;
    }

    const policy = this.policies.ensure(serviceId);
    const eventId = this.nextEventId();

    if (!requiresRemediation(assessment.severity)) {
      return this.noAction(eventId, assessment, 'below_threshold');
    }

    const guardrail = checkGuardrails(policy, modeEnabled);
    if (!guardrail.allowed) {
      const reason = guardrail.reason ?? 'remediation_disabled';
      console.log(`[Remediation] ${assessment.severity} anomaly on ${serviceId} not remediated: ${reason}`);
      return this.noAction(eventId, assessment, reason);
    }

    console.log(`[Remediation] ${assessment.severity} anomaly on ${serviceId} -- restarting`);
    const outcome = await this.attemptRestart(serviceId);
    const escalated = outcome.status !== 'success' || !isHealthy(outcome.postRestartHealth);
    const timestamp = this.now().toISOString();

    const event: RemediationEvent = {
      eventId,
      serviceId,
      assessment,
      actionTaken: 'restart',
      restart: Object.freeze(outcome),
      escalated,
      timestamp,
    };
    Object.freeze(event);

    if (escalated) {
      this.policies.disable(serviceId, timestamp);
      console.warn(
        `[Remediation] Escalated ${serviceId} (health ${outcome.postRestartHealth.toFixed(2)}) -- auto-restart disabled`,
      );
    } else {
      console.log(`[Remediation] Resolved ${serviceId} (health ${outcome.postRestartHealth.toFixed(2)})`);
    }

    return { event, report: buildIncidentReport(event, timestamp) };
  }

  private noAction(eventId: string, assessment: AnomalyAssessment, skipReason: SkipReason): EventLogEntry {
    const event: RemediationEvent = {
      eventId,
      serviceId: assessment.serviceId,
      assessment,
      actionTaken: 'none',
      restart: null,
      escalated: false,
      skipReason,
      timestamp: this.now().toISOString(),
    };
    Object.freeze(event);
    return { event, report: null };
  }

  /**
   * Restart, settle, probe. Executor errors, failed restarts and prober
   * errors all come back as health 0, like any other unhealthy restart.
   */
  private async attemptRestart(serviceId: string): Promise<RestartOutcome> {
    const startedAt = this.now().getTime();

    let result: RestartResult;
    try {
      result = await this.restartExecutor.restart(serviceId);
    } catch (err) {
      const message = errorMessage(err);
      console.error(`[Remediation] Restart of ${serviceId} failed:`, message);
      return {
        status: 'failed',
        durationMs: Math.max(0, this.now().getTime() - startedAt),
        postRestartHealth: 0,
        error: message,
      };
    }

    if (result.status !== 'success') {
      console.error(`[Remediation] Restart of ${serviceId} reported failure:`, result.error ?? 'unknown error');
      return { ...result, postRestartHealth: 0 };
    }

    await sleep(this.settleDelayMs);

    let health = 0;
    try {
      health = normalizeHealth(await this.healthProber.probeHealth(serviceId));
    } catch (err) {
      console.warn(`[Remediation] Health probe for ${serviceId} failed, treating as unhealthy:`, errorMessage(err));
    }

    return { ...result, postRestartHealth: health };
  }

  // -------------------------------------------------------------------------
  // Policy and status
  // -------------------------------------------------------------------------

  /** Operator action: allow autonomous restarts of an escalated service again. */
  reEnableService(serviceId: string): boolean {
    const ok = this.policies.reEnable(serviceId);
    if (ok) console.log(`[Remediation] Auto-restart re-enabled for ${serviceId}`);
    return ok;
  }

  getPolicy(serviceId: string): ServicePolicyState | undefined {
    return this.policies.get(serviceId);
  }

  listPolicies(): ServicePolicyState[] {
    return this.policies.list();
  }

  getStatus(): EngineStatus {
    return {
      enabled: this.enabled,
      running: this.running,
      intervalMs: this.intervalMs,
      settleDelayMs: this.settleDelayMs,
      cycles: this.cycles,
      lastCycleAt: this.lastCycleAt,
      lastCycleEvents: this.lastCycleEvents,
      eventCount: this.eventLog.size,
      disabledServices: this.policies.disabledServices(),
    };
  }
}
