import type { CuOptClient, HealthStatus } from './cuopt-client.js';
import { CuOptError } from './errors.js';
import { runPool, SampleCollector, summarizeScenario } from './metrics.js';
import { buildPayload } from './payload.js';
import type { Clock, ResultSample, RunReport, RunTotals, Scenario, ScenarioSummary } from './types.js';

/** Added to the solver time limit to cover network and queueing overhead. */
export const DEFAULT_GRACE_MS = 30_000;

export interface BenchmarkOptions {
  scenarios: Scenario[];
  client: CuOptClient;
  /** Calls in flight per scenario. 1 runs attempts one after another. */
  concurrency?: number;
  graceMs?: number;
  /** Stop dispatching new attempts once this much time has passed since preflight. */
  runTimeoutMs?: number;
  clock?: Clock;
  onPreflight?: (health: HealthStatus) => void;
  onScenarioStart?: (scenario: Scenario) => void;
  onSample?: (sample: ResultSample, scenario: Scenario) => void;
  onScenarioComplete?: (summary: ScenarioSummary) => void;
}

export function requestTimeoutMs(scenario: Scenario, graceMs: number = DEFAULT_GRACE_MS): number {
  return scenario.timeLimitSeconds * 1000 + graceMs;
}

/**
 * Runs every scenario in order against the client's endpoint. A failed
 * preflight rejects with a ConnectivityError before any request is sent;
 * after that, failed calls only show up as failed samples.
 */
export async function runBenchmark(options: BenchmarkOptions): Promise<RunReport> {
  const { scenarios, client, onPreflight, onScenarioStart, onSample, onScenarioComplete } = options;
  const clock = options.clock ?? (() => performance.now());
  const concurrency = Math.max(1, options.concurrency ?? 1);
  const graceMs = options.graceMs ?? DEFAULT_GRACE_MS;

  const health = await client.health();
  onPreflight?.(health);

  const startTime = clock();
  const deadline = options.runTimeoutMs !== undefined ? startTime + options.runTimeoutMs : Infinity;
  const withinDeadline = () => clock() < deadline;

  const collector = new SampleCollector();
  const summaries: ScenarioSummary[] = [];

  for (const scenario of scenarios) {
    if (!withinDeadline()) {
      summaries.push(summarizeScenario(scenario, [], 0));
      continue;
    }

    onScenarioStart?.(scenario);
    const scenarioStart = clock();
    const offset = collector.size;
    const timeoutMs = requestTimeoutMs(scenario, graceMs);
    const attempts = Array.from({ length: scenario.repetitions }, (_, i) => i + 1);

    await runPool(
      attempts,
      concurrency,
      async attempt => {
        const sample = await executeAttempt(client, scenario, attempt, timeoutMs);
        collector.record(sample);
        onSample?.(sample, scenario);
      },
      withinDeadline,
    );

    const summary = summarizeScenario(scenario, collector.since(offset), clock() - scenarioStart);
    summaries.push(summary);
    onScenarioComplete?.(summary);
  }

  return {
    generatedAt: new Date().toISOString(),
    endpoint: client.endpoint,
    solverVersion: health.version,
    concurrency,
    durationMs: clock() - startTime,
    deadlineExceeded: summaries.some(s => s.truncated),
    totals: computeTotals(summaries),
    scenarios: summaries,
    samples: collector.all(),
  };
}

export async function executeAttempt(
  client: CuOptClient,
  scenario: Scenario,
  attempt: number,
  timeoutMs: number,
): Promise<ResultSample> {
  try {
    const result = await client.optimize(buildPayload(scenario), { timeoutMs });
    return {
      scenario: scenario.name,
      attempt,
      responseTimeMs: result.responseTimeMs,
      success: true,
      statusCode: result.statusCode,
    };
  } catch (error) {
    if (error instanceof CuOptError) {
      return {
        scenario: scenario.name,
        attempt,
        responseTimeMs: error.responseTimeMs,
        success: false,
        statusCode: error.statusCode,
        error: error.message,
        errorCode: error.code,
      };
    }
    return {
      scenario: scenario.name,
      attempt,
      responseTimeMs: 0,
      success: false,
      error: error instanceof Error ? error.message : String(error),
      errorCode: 'UNKNOWN',
    };
  }
}

export function computeTotals(summaries: ScenarioSummary[]): RunTotals {
  const requests = summaries.reduce((n, s) => n + s.requests, 0);
  const succeeded = summaries.reduce((n, s) => n + s.succeeded, 0);
  return {
    scenarios: summaries.length,
    requests,
    succeeded,
    failed: requests - succeeded,
    successRate: requests > 0 ? succeeded / requests : null,
  };
}
