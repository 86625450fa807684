import { config } from 'dotenv';
import { DEFAULT_ENDPOINT } from './cuopt-client.js';
import { DEFAULT_GRACE_MS } from './driver.js';

config();

export interface BenchConfig {
  endpoint: string;
  concurrency: number;
  graceMs: number;
  runTimeoutMs?: number;
  outputPath?: string;
  scenariosPath?: string;
}

function readInt(env: NodeJS.ProcessEnv, name: string, min: number): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') {
    return undefined;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new Error(`${name} must be an integer >= ${min}, got "${raw}"`);
  }
  return value;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): BenchConfig {
  return {
    endpoint: env.CUOPT_ENDPOINT || DEFAULT_ENDPOINT,
    concurrency: readInt(env, 'BENCH_CONCURRENCY', 1) ?? 1,
    graceMs: readInt(env, 'BENCH_GRACE_MS', 0) ?? DEFAULT_GRACE_MS,
    runTimeoutMs: readInt(env, 'BENCH_RUN_TIMEOUT_MS', 1),
    outputPath: env.BENCH_OUTPUT || undefined,
    scenariosPath: env.BENCH_SCENARIOS || undefined,
  };
}

/** Parses a numeric command-line flag. */
export function parseIntOption(name: string, value: string, min: number = 0): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < min) {
    throw new Error(`--${name} must be an integer >= ${min}, got "${value}"`);
  }
  return parsed;
}
