import { XorShift32 } from './rng.js';
import type { RequestPayload, Scenario } from './types.js';

export const DEFAULT_VEHICLE_CAPACITY = 100;

// Locations are spread over a ring this many cost units around.
const RING_CIRCUMFERENCE = 1000;

// Minutes from the start of the shift (8 hours).
const SHIFT_WINDOW: [number, number] = [0, 480];
const DEFAULT_SERVICE_TIME = 10;

// Planned load as a share of total fleet capacity.
const FLEET_LOAD_FACTOR = 0.8;

/**
 * Symmetric cost matrix with a zero diagonal.
 *
 * Without a seed, location `i` sits at position `i` on a ring and the cost is
 * the hop distance times a spacing that shrinks as locations are added. With a
 * seed, costs are drawn from [min, max] and mirrored.
 */
export function buildCostMatrix(
  locationCount: number,
  options: { seed?: number; min?: number; max?: number } = {},
): number[][] {
  const matrix: number[][] = Array.from({ length: locationCount }, () => new Array<number>(locationCount).fill(0));

  if (options.seed !== undefined) {
    const rng = new XorShift32(options.seed);
    const min = options.min ?? 5;
    const max = options.max ?? 100;
    for (let i = 0; i < locationCount; i++) {
      for (let j = i + 1; j < locationCount; j++) {
        const cost = rng.nextInt(min, max);
        matrix[i][j] = cost;
        matrix[j][i] = cost;
      }
    }
    return matrix;
  }

  const spacing = Math.max(1, Math.round(RING_CIRCUMFERENCE / locationCount));
  for (let i = 0; i < locationCount; i++) {
    for (let j = 0; j < locationCount; j++) {
      const hops = Math.abs(i - j);
      matrix[i][j] = Math.min(hops, locationCount - hops) * spacing;
    }
  }
  return matrix;
}

export function uniformDemand(vehicleCount: number, capacity: number, taskCount: number): number {
  if (taskCount <= 0) return 0;
  const share = Math.floor((FLEET_LOAD_FACTOR * vehicleCount * capacity) / taskCount);
  return Math.min(capacity, Math.max(1, share));
}

/**
 * Builds the optimization request for a scenario. Depot is location 0; every
 * other location is a task. Pure: the same scenario always gives an equal
 * payload.
 */
export function buildPayload(scenario: Scenario): RequestPayload {
  const { vehicleCount, locationCount, seed } = scenario;
  if (!Number.isInteger(locationCount) || locationCount < 2) {
    throw new RangeError(`${scenario.name}: locationCount must be an integer >= 2 (depot and one task), got ${locationCount}`);
  }
  if (!Number.isInteger(vehicleCount) || vehicleCount < 1) {
    throw new RangeError(`${scenario.name}: vehicleCount must be an integer >= 1, got ${vehicleCount}`);
  }
  const capacity = scenario.vehicleCapacity ?? DEFAULT_VEHICLE_CAPACITY;
  const taskCount = locationCount - 1;
  // Demands and service times; the cost matrix draws from its own stream.
  const rng = seed !== undefined ? new XorShift32(seed ^ 0x5bd1e995) : undefined;

  const demand = rng
    ? Array.from({ length: taskCount }, () => rng.nextInt(5, 20))
    : new Array<number>(taskCount).fill(uniformDemand(vehicleCount, capacity, taskCount));

  const payload: RequestPayload = {
    cost_matrix_data: {
      data: { '0': buildCostMatrix(locationCount, { seed }) },
    },
    fleet_data: {
      vehicle_locations: Array.from({ length: vehicleCount }, (): [number, number] => [0, 0]),
      capacities: [new Array<number>(vehicleCount).fill(capacity)],
    },
    task_data: {
      task_locations: Array.from({ length: taskCount }, (_, i) => i + 1),
      demand: [demand],
    },
    solver_config: {
      time_limit: scenario.timeLimitSeconds,
    },
  };

  if (scenario.timeWindows) {
    payload.fleet_data.vehicle_time_windows = Array.from({ length: vehicleCount }, (): [number, number] => [...SHIFT_WINDOW]);
    payload.task_data.task_time_windows = Array.from({ length: taskCount }, (): [number, number] => [...SHIFT_WINDOW]);
    payload.task_data.service_times = rng
      ? Array.from({ length: taskCount }, () => rng.nextInt(5, 15))
      : new Array<number>(taskCount).fill(DEFAULT_SERVICE_TIME);
  }

  return payload;
}

export interface EvFleetOptions {
  vehicles: number;
  deliveries: number;
  chargingStations?: number;
  seed: number;
}

/**
 * Electric delivery fleet: a depot, delivery stops and charging stations
 * across a metro area. Only deliveries are tasks; charging stations are
 * locations the solver may route through. Times are minutes from midnight.
 */
export function buildEvFleetPayload(options: EvFleetOptions): RequestPayload {
  const chargingStations = options.chargingStations ?? 5;
  const totalLocations = 1 + options.deliveries + chargingStations;
  const rng = new XorShift32(options.seed ^ 0x27d4eb2f);

  const demand = Array.from({ length: options.deliveries }, () => rng.nextInt(1, 10));
  const serviceTimes = Array.from({ length: options.deliveries }, () => rng.nextInt(5, 15));
  const taskWindows = Array.from({ length: options.deliveries }, (): [number, number] => {
    const start = rng.nextInt(480, 900);
    const end = start + rng.nextInt(60, 180);
    return [start, Math.min(end, 1080)];
  });

  return {
    cost_matrix_data: {
      data: { '0': buildCostMatrix(totalLocations, { seed: options.seed, min: 3, max: 15 }) },
    },
    fleet_data: {
      vehicle_locations: Array.from({ length: options.vehicles }, (): [number, number] => [0, 0]),
      capacities: [new Array<number>(options.vehicles).fill(50)],
      vehicle_time_windows: Array.from({ length: options.vehicles }, (): [number, number] => [480, 1080]),
    },
    task_data: {
      task_locations: Array.from({ length: options.deliveries }, (_, i) => i + 1),
      demand: [demand],
      task_time_windows: taskWindows,
      service_times: serviceTimes,
    },
    solver_config: {
      time_limit: 30,
    },
  };
}
