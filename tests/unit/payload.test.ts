/**
 * Unit Tests: payload construction from scenarios.
 */
import { describe, it, expect } from 'vitest';
import { buildCostMatrix, buildEvFleetPayload, buildPayload, uniformDemand } from '../../src/payload.js';
import { XorShift32 } from '../../src/rng.js';
import { mockScenario } from '../helpers/mock-fetch.js';

function expectValidCostMatrix(matrix: number[][], size: number) {
  expect(matrix).toHaveLength(size);
  for (let i = 0; i < size; i++) {
    expect(matrix[i]).toHaveLength(size);
    expect(matrix[i][i]).toBe(0);
    for (let j = 0; j < size; j++) {
      expect(matrix[i][j]).toBeGreaterThanOrEqual(0);
      expect(matrix[i][j]).toBe(matrix[j][i]);
    }
  }
}

describe('buildCostMatrix', () => {
  it('places locations on a ring without a seed', () => {
    expect(buildCostMatrix(4)).toEqual([
      [0, 250, 500, 250],
      [250, 0, 250, 500],
      [500, 250, 0, 250],
      [250, 500, 250, 0],
    ]);
  });

  it('never drops spacing below one unit', () => {
    const matrix = buildCostMatrix(2001);
    expect(matrix[0][1]).toBe(1);
    expect(matrix[0][1000]).toBe(1000);
  });

  it.each([2, 3, 15, 40, 101])('is square, symmetric, non-negative with zero diagonal (n=%i)', (n) => {
    expectValidCostMatrix(buildCostMatrix(n), n);
  });

  it.each([2, 15, 64])('keeps the same shape when seeded (n=%i)', (n) => {
    expectValidCostMatrix(buildCostMatrix(n, { seed: 7 }), n);
  });

  it('draws seeded costs from the requested range', () => {
    const matrix = buildCostMatrix(30, { seed: 99, min: 3, max: 15 });
    for (let i = 0; i < 30; i++) {
      for (let j = 0; j < 30; j++) {
        if (i !== j) {
          expect(matrix[i][j]).toBeGreaterThanOrEqual(3);
          expect(matrix[i][j]).toBeLessThanOrEqual(15);
        }
      }
    }
  });

  it('repeats a seeded matrix exactly', () => {
    expect(buildCostMatrix(20, { seed: 1234 })).toEqual(buildCostMatrix(20, { seed: 1234 }));
  });

  it('gives different matrices for different seeds', () => {
    expect(buildCostMatrix(20, { seed: 1 })).not.toEqual(buildCostMatrix(20, { seed: 2 }));
  });
});

describe('uniformDemand', () => {
  it('spreads 80% of fleet capacity over the tasks', () => {
    expect(uniformDemand(10, 100, 14)).toBe(57);
  });

  it('is at least 1', () => {
    expect(uniformDemand(1, 100, 200)).toBe(1);
  });

  it('never exceeds a single vehicle capacity', () => {
    expect(uniformDemand(50, 100, 10)).toBe(100);
  });
});

describe('buildPayload', () => {
  it('builds the request for a scenario', () => {
    const payload = buildPayload(mockScenario());

    expect(Object.keys(payload)).toEqual(['cost_matrix_data', 'fleet_data', 'task_data', 'solver_config']);
    expect(Object.keys(payload.cost_matrix_data.data)).toEqual(['0']);
    expectValidCostMatrix(payload.cost_matrix_data.data['0'], 15);

    expect(payload.fleet_data.vehicle_locations).toHaveLength(10);
    expect(payload.fleet_data.vehicle_locations[0]).toEqual([0, 0]);
    expect(payload.fleet_data.capacities).toEqual([new Array(10).fill(100)]);

    expect(payload.task_data.task_locations).toEqual([1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11, 12, 13, 14]);
    expect(payload.task_data.demand).toEqual([new Array(14).fill(57)]);

    expect(payload.solver_config).toEqual({ time_limit: 30 });
  });

  it('omits time windows unless asked for', () => {
    const payload = buildPayload(mockScenario());
    expect(payload.fleet_data.vehicle_time_windows).toBeUndefined();
    expect(payload.task_data.task_time_windows).toBeUndefined();
    expect(payload.task_data.service_times).toBeUndefined();
  });

  it('adds shift time windows and service times', () => {
    const payload = buildPayload(mockScenario({ vehicleCount: 2, locationCount: 4, timeWindows: true }));
    expect(payload.fleet_data.vehicle_time_windows).toEqual([[0, 480], [0, 480]]);
    expect(payload.task_data.task_time_windows).toEqual([[0, 480], [0, 480], [0, 480]]);
    expect(payload.task_data.service_times).toEqual([10, 10, 10]);
  });

  it('uses the scenario vehicle capacity', () => {
    const payload = buildPayload(mockScenario({ vehicleCount: 3, locationCount: 5, vehicleCapacity: 40 }));
    expect(payload.fleet_data.capacities).toEqual([[40, 40, 40]]);
    // floor(0.8 * 3 * 40 / 4) = 24
    expect(payload.task_data.demand).toEqual([[24, 24, 24, 24]]);
  });

  it('is deterministic without a seed', () => {
    expect(buildPayload(mockScenario())).toEqual(buildPayload(mockScenario()));
  });

  it('is deterministic for a given seed', () => {
    const scenario = mockScenario({ seed: 42, timeWindows: true });
    expect(buildPayload(scenario)).toEqual(buildPayload(scenario));
  });

  it('draws seeded demands from [5, 20]', () => {
    const [demand] = buildPayload(mockScenario({ locationCount: 50, seed: 5 })).task_data.demand;
    expect(demand).toHaveLength(49);
    for (const d of demand) {
      expect(d).toBeGreaterThanOrEqual(5);
      expect(d).toBeLessThanOrEqual(20);
    }
  });

  it('returns a fresh object each call', () => {
    const scenario = mockScenario();
    const first = buildPayload(scenario);
    first.task_data.demand[0][0] = -1;
    expect(buildPayload(scenario).task_data.demand[0][0]).toBe(57);
  });

  it('handles a depot-only-plus-one scenario', () => {
    const payload = buildPayload(mockScenario({ vehicleCount: 1, locationCount: 2 }));
    expect(payload.cost_matrix_data.data['0']).toEqual([[0, 500], [500, 0]]);
    expect(payload.task_data.task_locations).toEqual([1]);
    expect(payload.task_data.demand).toEqual([[80]]);
  });

  it('rejects a scenario without a task location', () => {
    expect(() => buildPayload(mockScenario({ name: 'depot-only', locationCount: 1 }))).toThrow(
      new RangeError('depot-only: locationCount must be an integer >= 2 (depot and one task), got 1'),
    );
    expect(() => buildPayload(mockScenario({ locationCount: 0 }))).toThrow(RangeError);
  });

  it('rejects a fleet without vehicles', () => {
    expect(() => buildPayload(mockScenario({ name: 'empty-fleet', vehicleCount: 0 }))).toThrow(
      'empty-fleet: vehicleCount must be an integer >= 1, got 0',
    );
  });
});

describe('buildEvFleetPayload', () => {
  const payload = buildEvFleetPayload({ vehicles: 20, deliveries: 50, chargingStations: 5, seed: 2024 });

  it('includes depot, deliveries and charging stations in the cost matrix', () => {
    expectValidCostMatrix(payload.cost_matrix_data.data['0'], 56);
  });

  it('only schedules deliveries as tasks', () => {
    expect(payload.task_data.task_locations).toHaveLength(50);
    expect(payload.task_data.task_locations[0]).toBe(1);
    expect(payload.task_data.task_locations[49]).toBe(50);
  });

  it('keeps delivery windows inside the working day', () => {
    const windows = payload.task_data.task_time_windows ?? [];
    expect(windows).toHaveLength(50);
    for (const [start, end] of windows) {
      expect(start).toBeGreaterThanOrEqual(480);
      expect(start).toBeLessThanOrEqual(900);
      expect(end).toBeGreaterThan(start);
      expect(end).toBeLessThanOrEqual(1080);
    }
  });

  it('configures the fleet for EV deliveries', () => {
    expect(payload.fleet_data.capacities).toEqual([new Array(20).fill(50)]);
    expect(payload.fleet_data.vehicle_time_windows?.[0]).toEqual([480, 1080]);
    expect(payload.solver_config.time_limit).toBe(30);
  });

  it('defaults to five charging stations', () => {
    const p = buildEvFleetPayload({ vehicles: 2, deliveries: 4, seed: 1 });
    expect(p.cost_matrix_data.data['0']).toHaveLength(10);
  });
});

describe('XorShift32', () => {
  it('keeps integers within bounds', () => {
    const rng = new XorShift32(17);
    for (let i = 0; i < 1000; i++) {
      const n = rng.nextInt(5, 20);
      expect(n).toBeGreaterThanOrEqual(5);
      expect(n).toBeLessThanOrEqual(20);
      expect(Number.isInteger(n)).toBe(true);
    }
  });

  it('does not get stuck on a zero seed', () => {
    const rng = new XorShift32(0);
    expect(rng.next()).not.toBe(0);
  });
});
