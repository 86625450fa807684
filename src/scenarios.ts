import { readFile } from 'node:fs/promises';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import type { Scenario, ScenarioGroup } from './types.js';

export const DEFAULT_SCENARIOS_PATH = fileURLToPath(new URL('../scenarios/fleet-scaling.json', import.meta.url));
export const USE_CASES_PATH = fileURLToPath(new URL('../scenarios/use-cases.json', import.meta.url));

export const BUILT_IN_SUITES: Record<string, string[]> = {
  'fleet-scaling': [DEFAULT_SCENARIOS_PATH],
  'use-cases': [USE_CASES_PATH],
  all: [DEFAULT_SCENARIOS_PATH, USE_CASES_PATH],
};

export const DEFAULT_REPETITIONS = 5;
export const DEFAULT_TIME_LIMIT_SECONDS = 30;

// Older scenario files use the client's keyword names.
const KEY_ALIASES: Record<string, string> = {
  num_vehicles: 'vehicle_count',
  num_locations: 'location_count',
  time_limit: 'time_limit_seconds',
  iterations: 'repetitions',
};

const groupSchema = z.enum(['fleet_scaling', 'use_case']);

const scenarioSchema = z
  .object({
    name: z.string().trim().min(1),
    vehicle_count: z.number().int().min(1),
    location_count: z.number().int().min(2),
    iteration_limit: z.number().int().min(0).default(0),
    time_limit_seconds: z.number().int().min(1).default(DEFAULT_TIME_LIMIT_SECONDS),
    repetitions: z.number().int().min(0).optional(),
    vehicle_capacity: z.number().int().min(1).optional(),
    time_windows: z.boolean().optional(),
    seed: z.number().int().optional(),
    group: groupSchema.optional(),
  })
  .strict();

const scenarioFileSchema = z.union([
  z.array(z.unknown()),
  z
    .object({
      repetitions: z.number().int().min(0).optional(),
      group: groupSchema.optional(),
      scenarios: z.array(z.unknown()),
    })
    .strict(),
]);

function toSnakeCase(key: string): string {
  const snake = key.replace(/[A-Z]/g, c => `_${c.toLowerCase()}`);
  return KEY_ALIASES[snake] ?? snake;
}

function normalizeKeys(value: unknown): unknown {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return value;
  }
  return Object.fromEntries(Object.entries(value).map(([key, v]) => [toSnakeCase(key), v]));
}

function formatIssue(issue: z.ZodIssue, prefix: string): string {
  const path = issue.path.reduce<string>(
    (acc, segment) => (typeof segment === 'number' ? `${acc}[${segment}]` : `${acc}.${segment}`),
    prefix,
  );
  return `${path}: ${issue.message}`;
}

/**
 * Validates scenario definitions: an array of scenarios, or an object with a
 * `scenarios` array and file-wide `repetitions` and `group` defaults. Keys
 * may be snake_case or camelCase.
 */
export function parseScenarios(raw: unknown, source: string = 'scenarios'): Scenario[] {
  const file = scenarioFileSchema.safeParse(normalizeKeys(raw));
  if (!file.success) {
    throw new Error(`Invalid ${source}: ${formatIssue(file.error.issues[0], 'root')}`);
  }

  const entries = Array.isArray(file.data) ? file.data : file.data.scenarios;
  const fallbackRepetitions = Array.isArray(file.data) ? undefined : file.data.repetitions;
  const fallbackGroup: ScenarioGroup | undefined = Array.isArray(file.data) ? undefined : file.data.group;

  const scenarios: Scenario[] = [];
  const seen = new Set<string>();

  entries.forEach((entry, index) => {
    const parsed = scenarioSchema.safeParse(normalizeKeys(entry));
    if (!parsed.success) {
      throw new Error(`Invalid ${source}: ${formatIssue(parsed.error.issues[0], `scenarios[${index}]`)}`);
    }
    const s = parsed.data;
    const group = s.group ?? fallbackGroup;
    if (seen.has(s.name)) {
      throw new Error(`Invalid ${source}: duplicate scenario name "${s.name}"`);
    }
    seen.add(s.name);

    scenarios.push({
      name: s.name,
      vehicleCount: s.vehicle_count,
      locationCount: s.location_count,
      iterationLimit: s.iteration_limit,
      timeLimitSeconds: s.time_limit_seconds,
      repetitions: s.repetitions ?? fallbackRepetitions ?? DEFAULT_REPETITIONS,
      ...(s.vehicle_capacity !== undefined && { vehicleCapacity: s.vehicle_capacity }),
      ...(s.time_windows !== undefined && { timeWindows: s.time_windows }),
      ...(s.seed !== undefined && { seed: s.seed }),
      ...(group !== undefined && { group }),
    });
  });

  return scenarios;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export async function loadScenarioFile(path: string = DEFAULT_SCENARIOS_PATH): Promise<Scenario[]> {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (error) {
    throw new Error(`Cannot read scenario file ${path}: ${errorMessage(error)}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new Error(`Scenario file ${path} is not valid JSON: ${errorMessage(error)}`);
  }
  return parseScenarios(raw, `scenario file ${path}`);
}

/**
 * Loads a built-in suite by name. `all` runs fleet scaling first, then the
 * use cases.
 */
export async function loadSuite(name: string): Promise<Scenario[]> {
  if (!Object.hasOwn(BUILT_IN_SUITES, name)) {
    throw new Error(`Unknown suite "${name}" (expected ${Object.keys(BUILT_IN_SUITES).join(', ')})`);
  }
  const paths = BUILT_IN_SUITES[name];
  const scenarios: Scenario[] = [];
  for (const path of paths) {
    scenarios.push(...(await loadScenarioFile(path)));
  }
  const names = new Set<string>();
  for (const s of scenarios) {
    if (names.has(s.name)) {
      throw new Error(`Suite "${name}" has duplicate scenario name "${s.name}"`);
    }
    names.add(s.name);
  }
  return scenarios;
}

export interface AdHocScenarioOptions {
  vehicles: number;
  locations: number;
  timeLimitSeconds?: number;
  repetitions?: number;
  iterationLimit?: number;
  seed?: number;
}

/** Single scenario built from command-line flags, named like the built-in set. */
export function adHocScenario(options: AdHocScenarioOptions): Scenario {
  return parseScenarios([
    {
      name: `Fleet-${options.vehicles}v-${options.locations}l`,
      vehicleCount: options.vehicles,
      locationCount: options.locations,
      iterationLimit: options.iterationLimit,
      timeLimitSeconds: options.timeLimitSeconds,
      repetitions: options.repetitions,
      seed: options.seed,
    },
  ], 'command-line scenario')[0];
}
