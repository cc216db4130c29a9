/**
 * Compute backends that carry out service restarts.
 *
 *  - simulation: the in-process SimulatedFleet
 *  - http: POST {endpoint}/services/restart with a bearer key
 *
 * Executors throw on transport errors; the engine turns a throw into an
 * escalation.
 */

import { z } from 'zod';
import { config } from '../config.js';
import type { RestartExecutor, RestartResult } from '../monitor/types.js';
import type { SimulatedFleet } from './infra-sim.js';

// ---------------------------------------------------------------------------
// Simulation backend
// ---------------------------------------------------------------------------

export class SimulatedRestartExecutor implements RestartExecutor {
  constructor(private readonly fleet: SimulatedFleet) {}

  restart(serviceId: string): Promise<RestartResult> {
    return this.fleet.restart(serviceId);
  }
}

// ---------------------------------------------------------------------------
// HTTP backend
// ---------------------------------------------------------------------------

export interface HttpRestartExecutorOptions {
  endpoint: string;
  apiKey?: string;
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
  now?: () => number;
}

const restartResponseSchema = z.object({
  status: z.enum(['success', 'failed']).optional(),
  success: z.boolean().optional(),
  duration_ms: z.number().nonnegative().optional(),
  error: z.string().optional(),
});

export class HttpRestartExecutor implements RestartExecutor {
  private readonly endpoint: string;
  private readonly apiKey: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;
  private readonly now: () => number;

  constructor(options: HttpRestartExecutorOptions) {
    if (!options.endpoint) {
      throw new Error('HTTP compute backend requires an endpoint');
    }
    this.endpoint = options.endpoint.replace(/\/+$/, '');
    this.apiKey = options.apiKey ?? '';
    this.timeoutMs = options.timeoutMs ?? 30_000;
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
    this.now = options.now ?? Date.now;
  }

  async restart(serviceId: string): Promise<RestartResult> {
    const start = this.now();
    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    if (this.apiKey) headers.Authorization = `Bearer ${this.apiKey}`;

    const res = await this.fetchImpl(`${this.endpoint}/services/restart`, {
      method: 'POST',
      headers,
      body: JSON.stringify({ service_id: serviceId }),
      signal: AbortSignal.timeout(this.timeoutMs),
    });

    if (!res.ok) {
      throw new Error(`Compute backend returned HTTP ${res.status}`);
    }

    const parsed = restartResponseSchema.safeParse(await res.json());
    if (!parsed.success) {
      throw new Error(`Compute backend returned an unexpected body: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
    }

    const body = parsed.data;
    const ok = body.status ? body.status === 'success' : body.success !== false;
    return {
      status: ok ? 'success' : 'failed',
      durationMs: body.duration_ms ?? this.now() - start,
      via: 'http',
      ...(body.error ? { error: body.error } : {}),
    };
  }
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

/** Pick the restart backend from config; http needs COMPUTE_ENDPOINT. */
export function createRestartExecutor(fleet: SimulatedFleet): RestartExecutor {
  if (config.computeBackend === 'http') {
    if (config.computeEndpoint) {
      console.log(`[Compute] Using HTTP restart backend at ${config.computeEndpoint}`);
      return new HttpRestartExecutor({
        endpoint: config.computeEndpoint,
        apiKey: config.computeApiKey,
        timeoutMs: config.restartTimeoutMs,
      });
    }
    console.warn('[Compute] COMPUTE_BACKEND=http but COMPUTE_ENDPOINT is empty -- falling back to simulation');
  }
  return new SimulatedRestartExecutor(fleet);
}
