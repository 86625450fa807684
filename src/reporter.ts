import { mkdir, writeFile } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';
import chalk from 'chalk';
import type { HealthStatus } from './cuopt-client.js';
import type { ReportFormat, ResultSample, RunReport, Scenario, ScenarioGroup, ScenarioSummary } from './types.js';

function formatDuration(ms: number): string {
  if (ms < 1000) return `${Math.round(ms)}ms`;
  return `${(ms / 1000).toFixed(1)}s`;
}

function formatRate(rate: number | null): string {
  return rate === null ? 'n/a' : `${(rate * 100).toFixed(1)}%`;
}

function round(value: number, digits: number = 0): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

function roundOrNull(value: number | undefined): number | null {
  return value === undefined ? null : round(value, 1);
}

// ============================================================================
// JSON
// ============================================================================

function scenarioToJson(summary: ScenarioSummary) {
  return {
    vehicles: summary.vehicles,
    locations: summary.locations,
    iteration_limit: summary.iterationLimit,
    time_limit_seconds: summary.timeLimitSeconds,
    repetitions: summary.repetitions,
    requests: summary.requests,
    succeeded: summary.succeeded,
    failed: summary.failed,
    success_rate: summary.successRate,
    avg_response_ms: roundOrNull(summary.latency?.avg),
    p50_response_ms: roundOrNull(summary.latency?.p50),
    p95_response_ms: roundOrNull(summary.latency?.p95),
    p99_response_ms: roundOrNull(summary.latency?.p99),
    min_response_ms: roundOrNull(summary.latency?.min),
    max_response_ms: roundOrNull(summary.latency?.max),
    throughput_per_minute: round(summary.throughputPerMinute, 2),
    duration_ms: Math.round(summary.durationMs),
    errors: summary.errors,
    truncated: summary.truncated,
  };
}

function sampleToJson(sample: ResultSample) {
  return {
    scenario: sample.scenario,
    attempt: sample.attempt,
    response_time_ms: round(sample.responseTimeMs, 1),
    success: sample.success,
    ...(sample.statusCode !== undefined && { status_code: sample.statusCode }),
    ...(sample.error !== undefined && { error: sample.error }),
    ...(sample.errorCode !== undefined && { error_code: sample.errorCode }),
  };
}

function groupToJson(scenarios: ScenarioSummary[], group: ScenarioGroup) {
  return Object.fromEntries(scenarios.filter(s => s.group === group).map(s => [s.scenario, scenarioToJson(s)]));
}

/**
 * Stable report artifact. Chart generation reads `fleet_scaling_results` and
 * `use_case_results` keyed by scenario name, so those keys must not change.
 * Both sections are always present. Latency fields are `null` for a scenario
 * with no successful sample.
 */
export function toJsonReport(report: RunReport) {
  return {
    generated_at: report.generatedAt,
    endpoint: report.endpoint,
    solver_version: report.solverVersion ?? null,
    concurrency: report.concurrency,
    duration_ms: Math.round(report.durationMs),
    deadline_exceeded: report.deadlineExceeded,
    totals: {
      scenarios: report.totals.scenarios,
      requests: report.totals.requests,
      succeeded: report.totals.succeeded,
      failed: report.totals.failed,
      success_rate: report.totals.successRate,
    },
    fleet_scaling_results: groupToJson(report.scenarios, 'fleet_scaling'),
    use_case_results: groupToJson(report.scenarios, 'use_case'),
    samples: report.samples.map(sampleToJson),
  };
}

// ============================================================================
// CSV
// ============================================================================

export const CSV_HEADER =
  'scenario,vehicles,locations,requests,succeeded,failed,success_rate,avg_response_ms,p95_response_ms,throughput_per_minute,truncated';

function csvField(value: string | number | boolean | null): string {
  if (value === null) return '';
  const text = String(value);
  return /[",\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

export function toCsvReport(report: RunReport): string {
  const rows = report.scenarios.map(s => [
    s.scenario,
    s.vehicles,
    s.locations,
    s.requests,
    s.succeeded,
    s.failed,
    s.successRate,
    roundOrNull(s.latency?.avg),
    roundOrNull(s.latency?.p95),
    round(s.throughputPerMinute, 2),
    s.truncated,
  ]);
  rows.push([
    'TOTAL',
    null,
    null,
    report.totals.requests,
    report.totals.succeeded,
    report.totals.failed,
    report.totals.successRate,
    null,
    null,
    null,
    report.deadlineExceeded,
  ]);

  return [CSV_HEADER, ...rows.map(row => row.map(csvField).join(','))].join('\n') + '\n';
}

// ============================================================================
// Pretty
// ============================================================================

export function formatPretty(report: RunReport): string {
  const lines: string[] = [];
  const rule = chalk.gray('══════════════════════════════════════════════════════════════');

  lines.push('');
  lines.push(chalk.bold('Fleet Benchmark Results'));
  lines.push(rule);
  lines.push(`${chalk.cyan('Endpoint:')}      ${report.endpoint}`);
  if (report.solverVersion) {
    lines.push(`${chalk.cyan('Solver:')}        ${report.solverVersion}`);
  }
  lines.push(`${chalk.cyan('Concurrency:')}   ${report.concurrency}`);
  lines.push(`${chalk.cyan('Duration:')}      ${formatDuration(report.durationMs)}`);
  lines.push('');

  lines.push(chalk.bold(`  ${'Scenario'.padEnd(18)}${'Fleet'.padStart(8)}${'Locs'.padStart(7)}${'OK'.padStart(9)}${'Avg'.padStart(9)}${'P95'.padStart(9)}${'Req/min'.padStart(10)}`));
  for (const s of report.scenarios) {
    const ok = `${s.succeeded}/${s.requests}`;
    const okColored = s.failed > 0 ? chalk.red(ok.padStart(9)) : chalk.green(ok.padStart(9));
    const avg = s.latency ? formatDuration(s.latency.avg) : '-';
    const p95 = s.latency ? formatDuration(s.latency.p95) : '-';
    const flag = s.truncated ? chalk.yellow('  (cut short)') : '';
    lines.push(
      `  ${s.scenario.padEnd(18)}${String(s.vehicles).padStart(8)}${String(s.locations).padStart(7)}${okColored}${avg.padStart(9)}${p95.padStart(9)}${s.throughputPerMinute.toFixed(1).padStart(10)}${flag}`,
    );
    for (const [code, count] of Object.entries(s.errors)) {
      lines.push(`      ${chalk.red(code)}: ${count}`);
    }
  }
  lines.push('');

  const { totals } = report;
  lines.push(chalk.bold('Requests:'));
  lines.push(`  Total:        ${totals.requests}`);
  lines.push(`  Succeeded:    ${chalk.green(totals.succeeded)} (${formatRate(totals.successRate)})`);
  lines.push(`  Failed:       ${chalk.red(totals.failed)}`);
  if (report.deadlineExceeded) {
    lines.push(chalk.yellow('  Run deadline reached; remaining attempts were not dispatched.'));
  }
  lines.push(rule);
  lines.push('');

  return lines.join('\n');
}

export function renderReport(report: RunReport, format: ReportFormat): string {
  switch (format) {
    case 'json':
      return `${JSON.stringify(toJsonReport(report), null, 2)}\n`;
    case 'csv':
      return toCsvReport(report);
    default:
      return formatPretty(report);
  }
}

export interface WriteReportOptions {
  format: ReportFormat;
  /** Written to stdout when unset. */
  outputPath?: string;
}

export async function writeReport(report: RunReport, options: WriteReportOptions): Promise<void> {
  const content = renderReport(report, options.format);
  if (!options.outputPath) {
    process.stdout.write(content);
    return;
  }
  const path = resolve(options.outputPath);
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, content, 'utf8');
}

export function parseFormat(value: string): ReportFormat {
  if (value === 'pretty' || value === 'json' || value === 'csv') {
    return value;
  }
  throw new Error(`Unknown output format "${value}" (expected pretty, json or csv)`);
}

// ============================================================================
// Progress
// ============================================================================

export interface ProgressReporterOptions {
  silent?: boolean;
}

const CHECK_ICON = chalk.green('✓');
const FAIL_ICON = chalk.red('✗');

export class ProgressReporter {
  private options: ProgressReporterOptions;

  constructor(options: ProgressReporterOptions = {}) {
    this.options = options;
  }

  private log(line: string): void {
    if (!this.options.silent) {
      console.log(line);
    }
  }

  start(endpoint: string, scenarioCount: number): void {
    this.log(chalk.bold(`\nFleet Benchmark`) + chalk.gray(` → ${endpoint}`));
    this.log(chalk.gray(`${scenarioCount} scenario(s)`));
  }

  onPreflight(health: HealthStatus): void {
    const version = health.version ? ` (version ${health.version})` : '';
    this.log(`${CHECK_ICON} Service ${health.status}${version}`);
  }

  onScenarioStart(scenario: Scenario): void {
    this.log('');
    this.log(chalk.bold(`Running: ${scenario.name}`));
    this.log(chalk.gray(`  Vehicles: ${scenario.vehicleCount}, Locations: ${scenario.locationCount}, Time limit: ${scenario.timeLimitSeconds}s`));
  }

  onSample(sample: ResultSample, scenario: Scenario): void {
    const icon = sample.success ? CHECK_ICON : FAIL_ICON;
    const detail = sample.success ? '' : chalk.red(`  ${sample.error ?? sample.errorCode ?? 'failed'}`);
    this.log(`  ${icon} [${sample.attempt}/${scenario.repetitions}] ${formatDuration(sample.responseTimeMs)}${detail}`);
  }

  onScenarioComplete(summary: ScenarioSummary): void {
    const avg = summary.latency ? formatDuration(summary.latency.avg) : '-';
    const p95 = summary.latency ? formatDuration(summary.latency.p95) : '-';
    const rate = formatRate(summary.successRate);
    const colored = summary.failed > 0 ? chalk.yellow(rate) : chalk.green(rate);
    this.log(`  ${colored} success, avg ${avg}, p95 ${p95}`);
  }
}
