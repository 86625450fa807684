import { z } from 'zod';
import { ConnectivityError, MalformedResponseError, RequestError, TimeoutError } from './errors.js';
import type { Clock, RequestPayload } from './types.js';

export const DEFAULT_ENDPOINT = 'http://cuopt-service:8000';

const HEALTH_TIMEOUT_MS = 30_000;
const ERROR_BODY_LIMIT = 200;

const healthSchema = z.object({
  status: z.string(),
  version: z.string().optional(),
});

export type HealthStatus = z.infer<typeof healthSchema>;

export interface OptimizeResult {
  statusCode: number;
  responseTimeMs: number;
  body: unknown;
}

export interface CuOptClientOptions {
  endpoint?: string;
  clock?: Clock;
}

export class CuOptClient {
  readonly endpoint: string;
  private clock: Clock;

  constructor(options: CuOptClientOptions = {}) {
    this.endpoint = (options.endpoint || DEFAULT_ENDPOINT).replace(/\/+$/, '');
    this.clock = options.clock ?? (() => performance.now());
  }

  /** Preflight. Any failure, including a service that is up but not RUNNING, is a ConnectivityError. */
  async health(): Promise<HealthStatus> {
    const url = `${this.endpoint}/cuopt/health`;
    const start = this.clock();
    let response: Response;
    try {
      response = await fetch(url, { signal: AbortSignal.timeout(HEALTH_TIMEOUT_MS) });
    } catch (error) {
      throw new ConnectivityError(`Cannot reach ${url}: ${describeError(error)}`, this.clock() - start);
    }
    const elapsed = this.clock() - start;

    if (!response.ok) {
      throw new ConnectivityError(`Health check returned HTTP ${response.status}`, elapsed, response.status);
    }

    let parsed: unknown;
    try {
      parsed = await response.json();
    } catch {
      throw new ConnectivityError('Health check returned a non-JSON body', elapsed, response.status);
    }

    const health = healthSchema.safeParse(parsed);
    if (!health.success) {
      throw new ConnectivityError('Health check response has no status field', elapsed, response.status);
    }
    if (health.data.status !== 'RUNNING') {
      throw new ConnectivityError(`Service status is ${health.data.status}, expected RUNNING`, elapsed, response.status);
    }
    return health.data;
  }

  /**
   * Submits one optimization request and times it. Resolves only on a 2xx
   * with a JSON body; every other outcome rejects with a CuOptError carrying
   * the elapsed time.
   */
  async optimize(payload: RequestPayload, options: { timeoutMs: number }): Promise<OptimizeResult> {
    const signal = AbortSignal.timeout(options.timeoutMs);
    const start = this.clock();
    let response: Response;
    let text: string;

    try {
      response = await fetch(`${this.endpoint}/cuopt/cuopt`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(payload),
        signal,
      });
      text = await response.text();
    } catch (error) {
      const elapsed = this.clock() - start;
      if (signal.aborted || isTimeout(error)) {
        throw new TimeoutError(options.timeoutMs, elapsed);
      }
      throw new RequestError(describeError(error), elapsed);
    }
    const responseTimeMs = this.clock() - start;

    if (!response.ok) {
      const excerpt = text.slice(0, ERROR_BODY_LIMIT).trim();
      throw new RequestError(
        excerpt ? `HTTP ${response.status}: ${excerpt}` : `HTTP ${response.status}`,
        responseTimeMs,
        response.status,
      );
    }

    let body: unknown;
    try {
      body = JSON.parse(text);
    } catch {
      throw new MalformedResponseError(`HTTP ${response.status} with a non-JSON body`, responseTimeMs, response.status);
    }

    return { statusCode: response.status, responseTimeMs, body };
  }
}

function isTimeout(error: unknown): boolean {
  return error instanceof Error && error.name === 'TimeoutError';
}

function describeError(error: unknown): string {
  if (error instanceof Error) {
    // undici hides the socket error behind "fetch failed"
    const cause: unknown = error.cause;
    if (cause instanceof Error && cause.message) {
      return `${error.message} (${cause.message})`;
    }
    return error.message;
  }
  return String(error);
}

const solverResponseSchema = z
  .object({
    response: z.object({
      solver_response: z
        .object({
          status: z.union([z.number(), z.string()]).optional(),
          solution_cost: z.number().optional(),
          vehicle_data: z.record(z.string(), z.object({ route: z.array(z.number()).optional() }).passthrough()).optional(),
        })
        .passthrough(),
    }),
  })
  .passthrough();

export interface SolutionSummary {
  status?: number | string;
  cost?: number;
  /** Vehicle id → stops, depot visits excluded. Idle vehicles are left out. */
  routes: Record<string, number>;
}

/** Reads the parts of a solver response the CLI prints. `null` when the body has no solver_response. */
export function summarizeSolution(body: unknown): SolutionSummary | null {
  const parsed = solverResponseSchema.safeParse(body);
  if (!parsed.success) return null;

  const solver = parsed.data.response.solver_response;
  const routes: Record<string, number> = {};
  for (const [vehicleId, data] of Object.entries(solver.vehicle_data ?? {})) {
    const route = data.route ?? [];
    if (route.length > 2) {
      routes[vehicleId] = route.length - 2;
    }
  }
  return { status: solver.status, cost: solver.solution_cost, routes };
}

/** Error message from a solver body such as `{"error": "..."}`. */
export function solverErrorMessage(body: unknown): string | undefined {
  const parsed = z.object({ error: z.unknown() }).safeParse(body);
  if (!parsed.success || parsed.data.error === undefined) return undefined;
  return typeof parsed.data.error === 'string' ? parsed.data.error : JSON.stringify(parsed.data.error);
}
