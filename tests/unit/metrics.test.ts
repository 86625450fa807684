/**
 * Unit Tests: latency statistics, scenario summaries and the worker pool.
 */
import { describe, it, expect } from 'vitest';
import { calculateLatencyStats, percentile, runPool, SampleCollector, summarizeScenario } from '../../src/metrics.js';
import type { ResultSample } from '../../src/types.js';
import { mockScenario } from '../helpers/mock-fetch.js';

function sample(attempt: number, responseTimeMs: number, success = true): ResultSample {
  return success
    ? { scenario: 'EV-Fleet-10v', attempt, responseTimeMs, success, statusCode: 200 }
    : { scenario: 'EV-Fleet-10v', attempt, responseTimeMs, success, error: 'timeout', errorCode: 'TIMEOUT' };
}

describe('percentile (nearest-rank)', () => {
  it('picks the value at rank ceil(p/100 * n)', () => {
    const sorted = [10, 10, 10, 10, 100];
    expect(percentile(sorted, 50)).toBe(10);
    expect(percentile(sorted, 80)).toBe(10);
    expect(percentile(sorted, 95)).toBe(100);
  });

  it('returns the smallest value for p=0 and the largest for p=100', () => {
    expect(percentile([1, 2, 3], 0)).toBe(1);
    expect(percentile([1, 2, 3], 100)).toBe(3);
  });

  it('works on a single value', () => {
    expect(percentile([42], 95)).toBe(42);
  });

  it('computes p99 over 200 values', () => {
    const sorted = Array.from({ length: 200 }, (_, i) => i + 1);
    expect(percentile(sorted, 99)).toBe(198);
  });

  it('throws on an empty sample', () => {
    expect(() => percentile([], 50)).toThrow(RangeError);
  });
});

describe('calculateLatencyStats', () => {
  it('returns null for no latencies', () => {
    expect(calculateLatencyStats([])).toBeNull();
  });

  it('does not require sorted input', () => {
    expect(calculateLatencyStats([100, 10, 10, 10, 10])).toEqual({
      min: 10,
      max: 100,
      avg: 28,
      p50: 10,
      p95: 100,
      p99: 100,
    });
  });

  it('keeps p95 between the median and the maximum', () => {
    const inputs = [
      [10, 10, 10, 10, 100],
      [1, 2, 3, 4, 5, 6, 7, 8, 9, 10],
      [500, 20, 20, 3000, 45, 45, 45],
      [7],
    ];
    for (const latencies of inputs) {
      const stats = calculateLatencyStats(latencies);
      expect(stats).not.toBeNull();
      if (stats) {
        expect(stats.p95).toBeGreaterThanOrEqual(stats.p50);
        expect(stats.p95).toBeLessThanOrEqual(stats.max);
      }
    }
  });

  it('does not mutate the input', () => {
    const latencies = [3, 1, 2];
    calculateLatencyStats(latencies);
    expect(latencies).toEqual([3, 1, 2]);
  });
});

describe('summarizeScenario', () => {
  it('summarizes all-successful samples', () => {
    const summary = summarizeScenario(
      mockScenario(),
      [sample(1, 1000), sample(2, 1000), sample(3, 1000)],
      3000,
    );

    expect(summary).toEqual({
      scenario: 'EV-Fleet-10v',
      group: 'fleet_scaling',
      vehicles: 10,
      locations: 15,
      iterationLimit: 1000,
      timeLimitSeconds: 30,
      repetitions: 3,
      requests: 3,
      succeeded: 3,
      failed: 0,
      successRate: 1,
      latency: { min: 1000, max: 1000, avg: 1000, p50: 1000, p95: 1000, p99: 1000 },
      throughputPerMinute: 60,
      durationMs: 3000,
      errors: {},
      truncated: false,
    });
  });

  it('computes success rate exactly and counts errors by code', () => {
    const summary = summarizeScenario(
      mockScenario({ repetitions: 5 }),
      [sample(1, 100), sample(2, 200), sample(3, 30_000, false), sample(4, 300), sample(5, 400)],
      31_000,
    );

    expect(summary.requests).toBe(5);
    expect(summary.succeeded).toBe(4);
    expect(summary.failed).toBe(1);
    expect(summary.successRate).toBe(0.8);
    expect(summary.errors).toEqual({ TIMEOUT: 1 });
    expect(summary.latency?.avg).toBe(250);
    expect(summary.latency?.max).toBe(400);
  });

  it('leaves latency empty when every sample failed', () => {
    const summary = summarizeScenario(mockScenario({ repetitions: 2 }), [sample(1, 5, false), sample(2, 5, false)], 10);
    expect(summary.successRate).toBe(0);
    expect(summary.latency).toBeNull();
  });

  it('handles zero repetitions without dividing by zero', () => {
    const summary = summarizeScenario(mockScenario({ repetitions: 0 }), [], 0);
    expect(summary.requests).toBe(0);
    expect(summary.successRate).toBeNull();
    expect(summary.latency).toBeNull();
    expect(summary.throughputPerMinute).toBe(0);
    expect(summary.truncated).toBe(false);
  });

  it('marks a scenario with missing repetitions as truncated', () => {
    const summary = summarizeScenario(mockScenario({ repetitions: 5 }), [sample(1, 10)], 10);
    expect(summary.truncated).toBe(true);
  });
});

describe('SampleCollector', () => {
  it('keeps samples in the order they were recorded', () => {
    const collector = new SampleCollector();
    collector.record(sample(2, 20));
    collector.record(sample(1, 10));
    expect(collector.all().map(s => s.attempt)).toEqual([2, 1]);
    expect(collector.size).toBe(2);
  });

  it('returns the samples recorded after an offset', () => {
    const collector = new SampleCollector();
    collector.record(sample(1, 10));
    const offset = collector.size;
    collector.record(sample(2, 20));
    collector.record(sample(3, 30));
    expect(collector.since(offset).map(s => s.attempt)).toEqual([2, 3]);
  });

  it('hands out copies', () => {
    const collector = new SampleCollector();
    collector.record(sample(1, 10));
    collector.all().pop();
    expect(collector.size).toBe(1);
  });
});

describe('runPool', () => {
  const tick = () => new Promise<void>(resolve => setTimeout(resolve, 5));

  it('never exceeds the concurrency limit', async () => {
    let inFlight = 0;
    let peak = 0;
    const done: number[] = [];

    await runPool(Array.from({ length: 10 }, (_, i) => i), 3, async item => {
      inFlight++;
      peak = Math.max(peak, inFlight);
      await tick();
      inFlight--;
      done.push(item);
    });

    expect(peak).toBe(3);
    expect(done.sort((a, b) => a - b)).toEqual([0, 1, 2, 3, 4, 5, 6, 7, 8, 9]);
  });

  it('runs one item at a time with concurrency 1', async () => {
    const order: string[] = [];
    await runPool([1, 2, 3], 1, async item => {
      order.push(`start ${item}`);
      await tick();
      order.push(`end ${item}`);
    });
    expect(order).toEqual(['start 1', 'end 1', 'start 2', 'end 2', 'start 3', 'end 3']);
  });

  it('stops taking items once told to', async () => {
    const seen: number[] = [];
    await runPool([1, 2, 3, 4, 5], 1, async item => {
      seen.push(item);
    }, () => seen.length < 2);
    expect(seen).toEqual([1, 2]);
  });

  it('does nothing for an empty list', async () => {
    let calls = 0;
    await runPool([], 4, async () => {
      calls++;
    });
    expect(calls).toBe(0);
  });

  it('lets other workers finish before rejecting', async () => {
    const finished: number[] = [];
    const pool = runPool([1, 2, 3, 4], 2, async item => {
      await tick();
      if (item === 1) throw new Error('worker failed');
      finished.push(item);
    });

    await expect(pool).rejects.toThrow('worker failed');
    expect(finished).toContain(2);
  });
});
