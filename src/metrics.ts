import type { LatencyStats, ResultSample, Scenario, ScenarioSummary } from './types.js';

export function calculateLatencyStats(latencies: number[]): LatencyStats | null {
  if (latencies.length === 0) {
    return null;
  }

  const sorted = [...latencies].sort((a, b) => a - b);
  const sum = sorted.reduce((a, b) => a + b, 0);

  return {
    min: sorted[0],
    max: sorted[sorted.length - 1],
    avg: sum / sorted.length,
    p50: percentile(sorted, 50),
    p95: percentile(sorted, 95),
    p99: percentile(sorted, 99),
  };
}

/** Nearest-rank percentile over an ascending array. */
export function percentile(sorted: number[], p: number): number {
  if (sorted.length === 0) {
    throw new RangeError('percentile of an empty sample');
  }
  const index = Math.ceil((p / 100) * sorted.length) - 1;
  return sorted[Math.min(sorted.length - 1, Math.max(0, index))];
}

export function summarizeScenario(scenario: Scenario, samples: ResultSample[], durationMs: number): ScenarioSummary {
  const succeeded = samples.filter(s => s.success).length;
  const failed = samples.length - succeeded;
  const errors: Record<string, number> = {};
  for (const sample of samples) {
    if (!sample.success) {
      const code = sample.errorCode ?? 'UNKNOWN';
      errors[code] = (errors[code] ?? 0) + 1;
    }
  }

  return {
    scenario: scenario.name,
    group: scenario.group ?? 'fleet_scaling',
    vehicles: scenario.vehicleCount,
    locations: scenario.locationCount,
    iterationLimit: scenario.iterationLimit,
    timeLimitSeconds: scenario.timeLimitSeconds,
    repetitions: scenario.repetitions,
    requests: samples.length,
    succeeded,
    failed,
    successRate: samples.length > 0 ? succeeded / samples.length : null,
    latency: calculateLatencyStats(samples.filter(s => s.success).map(s => s.responseTimeMs)),
    throughputPerMinute: durationMs > 0 ? (samples.length * 60_000) / durationMs : 0,
    durationMs,
    errors,
    truncated: samples.length < scenario.repetitions,
  };
}

/**
 * Append-only sample sequence. Workers hand samples over through `record`;
 * nothing else writes to it.
 */
export class SampleCollector {
  private samples: ResultSample[] = [];

  record(sample: ResultSample): void {
    this.samples.push(sample);
  }

  /** Samples recorded from position `offset` on. */
  since(offset: number): ResultSample[] {
    return this.samples.slice(offset);
  }

  all(): ResultSample[] {
    return [...this.samples];
  }

  get size(): number {
    return this.samples.length;
  }
}

/**
 * Drains `items` with at most `concurrency` workers in flight. A worker
 * takes the next item only after its current one settles, and stops taking
 * items once `shouldContinue` returns false. Resolves when every started
 * item has settled; rejects with the first worker error after that.
 */
export async function runPool<T>(
  items: readonly T[],
  concurrency: number,
  worker: (item: T) => Promise<void>,
  shouldContinue: () => boolean = () => true,
): Promise<void> {
  let next = 0;
  const size = Math.max(1, Math.min(Math.floor(concurrency), items.length));

  const drain = async (): Promise<void> => {
    while (next < items.length && shouldContinue()) {
      const item = items[next++];
      await worker(item);
    }
  };

  const results = await Promise.allSettled(Array.from({ length: size }, () => drain()));
  for (const result of results) {
    if (result.status === 'rejected') {
      throw result.reason;
    }
  }
}
