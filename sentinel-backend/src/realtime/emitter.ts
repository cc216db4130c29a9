/**
 * Real-time data emitter for the /fleet Socket.IO namespace.
 *
 * Snapshots the simulated fleet on a timer and emits structured data to all
 * connected clients. New clients get an immediate snapshot, and can ask for
 * one with `requestRefresh`.
 *
 * Emitted events:
 *  - services: service list with status and auto-restart policy
 *  - hygiene:  current hygiene score
 *  - remediation: engine status
 */

import type { Namespace } from 'socket.io';
import { config } from '../config.js';
import type { MonitorRuntime } from '../monitor/index.js';
import { computeFleetHygiene } from '../services/fleet-summary.js';

// ---------------------------------------------------------------------------
// Module state
// ---------------------------------------------------------------------------

let fleetNamespace: Namespace | null = null;
let emitterRuntime: MonitorRuntime | null = null;
const intervals: ReturnType<typeof setInterval>[] = [];

// ---------------------------------------------------------------------------
// Emit functions
// ---------------------------------------------------------------------------

function emitServices(ns: Namespace, runtime: MonitorRuntime): void {
  ns.emit('services', {
    services: runtime.fleet.listServices(),
    policies: runtime.engine.listPolicies(),
    timestamp: Date.now(),
  });
}

function emitHygiene(ns: Namespace, runtime: MonitorRuntime): void {
  ns.emit('hygiene', computeFleetHygiene({ fleet: runtime.fleet, engine: runtime.engine }));
}

function emitRemediation(ns: Namespace, runtime: MonitorRuntime): void {
  ns.emit('remediation', runtime.engine.getStatus());
}

/**
 * Emit every data category now. Failures are logged, never thrown, since
 * this runs from timers and socket handlers.
 */
export function emitFleetNow(): void {
  if (!fleetNamespace || !emitterRuntime) return;
  try {
    emitServices(fleetNamespace, emitterRuntime);
    emitHygiene(fleetNamespace, emitterRuntime);
    emitRemediation(fleetNamespace, emitterRuntime);
  } catch (err) {
    console.warn('[Emitter] Fleet emit failed:', err instanceof Error ? err.message : err);
  }
}

// ---------------------------------------------------------------------------
// Start / stop
// ---------------------------------------------------------------------------

/**
 * Start the real-time emitter on the /fleet namespace.
 */
export function startEmitter(ns: Namespace, runtime: MonitorRuntime): void {
  fleetNamespace = ns;
  emitterRuntime = runtime;

  ns.on('connection', (socket) => {
    emitFleetNow();
    socket.on('requestRefresh', () => emitFleetNow());
  });

  intervals.push(setInterval(emitFleetNow, config.fleetEmitIntervalMs));

  console.log(`[Emitter] Fleet emitter started (every ${Math.round(config.fleetEmitIntervalMs / 1000)}s)`);
}

/**
 * Stop the emitter. Called during graceful shutdown.
 */
export function stopEmitter(): void {
  for (const id of intervals) {
    clearInterval(id);
  }
  intervals.length = 0;
  fleetNamespace = null;
  emitterRuntime = null;
  console.log('[Emitter] Fleet emitter stopped');
}
