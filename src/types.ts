/** Report section a scenario belongs to. */
export type ScenarioGroup = 'fleet_scaling' | 'use_case';

export interface Scenario {
  name: string;
  vehicleCount: number;
  locationCount: number;
  iterationLimit: number;
  timeLimitSeconds: number;
  repetitions: number;
  vehicleCapacity?: number;
  timeWindows?: boolean;
  seed?: number;
  /** Defaults to `fleet_scaling`. */
  group?: ScenarioGroup;
}

// Wire format of POST /cuopt/cuopt. Keys are fixed by the service.
export interface RequestPayload {
  cost_matrix_data: {
    data: Record<string, number[][]>;
  };
  fleet_data: {
    vehicle_locations: [number, number][];
    capacities: number[][];
    vehicle_time_windows?: [number, number][];
  };
  task_data: {
    task_locations: number[];
    demand: number[][];
    task_time_windows?: [number, number][];
    service_times?: number[];
  };
  solver_config: {
    time_limit: number;
  };
}

export interface ResultSample {
  scenario: string;
  attempt: number;
  responseTimeMs: number;
  success: boolean;
  statusCode?: number;
  error?: string;
  errorCode?: string;
}

export interface LatencyStats {
  min: number;
  max: number;
  avg: number;
  p50: number;
  p95: number;
  p99: number;
}

export interface ScenarioSummary {
  scenario: string;
  group: ScenarioGroup;
  vehicles: number;
  locations: number;
  iterationLimit: number;
  timeLimitSeconds: number;
  repetitions: number;
  requests: number;
  succeeded: number;
  failed: number;
  /** `null` when no sample was recorded. */
  successRate: number | null;
  /** Over successful samples only; `null` when none succeeded. */
  latency: LatencyStats | null;
  throughputPerMinute: number;
  durationMs: number;
  errors: Record<string, number>;
  /** Set when the run deadline stopped dispatch before all repetitions. */
  truncated: boolean;
}

export interface RunTotals {
  scenarios: number;
  requests: number;
  succeeded: number;
  failed: number;
  successRate: number | null;
}

export interface RunReport {
  generatedAt: string;
  endpoint: string;
  solverVersion?: string;
  concurrency: number;
  durationMs: number;
  deadlineExceeded: boolean;
  totals: RunTotals;
  scenarios: ScenarioSummary[];
  samples: ResultSample[];
}

export type ReportFormat = 'pretty' | 'json' | 'csv';

export type Clock = () => number;
