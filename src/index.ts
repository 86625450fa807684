#!/usr/bin/env node

import chalk from 'chalk';
import { Command } from 'commander';
import { loadConfig, parseIntOption } from './config.js';
import { CuOptClient, solverErrorMessage, summarizeSolution } from './cuopt-client.js';
import { runBenchmark } from './driver.js';
import { ConnectivityError, CuOptError } from './errors.js';
import { buildEvFleetPayload, buildPayload } from './payload.js';
import { parseFormat, ProgressReporter, writeReport } from './reporter.js';
import { adHocScenario, DEFAULT_SCENARIOS_PATH, loadScenarioFile, loadSuite } from './scenarios.js';
import type { RequestPayload, Scenario } from './types.js';

const program = new Command();

program
  .name('fleet-bench')
  .description('Benchmark a cuOpt vehicle-routing service across fleet sizes')
  .version('1.0.0')
  .option('--endpoint <url>', 'cuOpt service URL (default: CUOPT_ENDPOINT)');

function createClient(): CuOptClient {
  const cfg = loadConfig();
  const endpoint: string = program.opts().endpoint ?? cfg.endpoint;
  return new CuOptClient({ endpoint });
}

function fail(error: unknown): never {
  if (error instanceof ConnectivityError) {
    console.error(chalk.red(`Preflight failed: ${error.message}`));
  } else if (error instanceof Error) {
    console.error(`Error: ${error.message}`);
  } else {
    console.error('An unknown error occurred');
  }
  process.exit(2);
}

async function resolveScenarios(options: {
  scenarios?: string;
  suite?: string;
  vehicles?: string;
  locations?: string;
  timeLimit?: string;
  repetitions?: string;
  seed?: string;
}): Promise<Scenario[]> {
  if (options.vehicles || options.locations) {
    if (!options.vehicles || !options.locations) {
      throw new Error('--vehicles and --locations must be given together');
    }
    return [
      adHocScenario({
        vehicles: parseIntOption('vehicles', options.vehicles, 1),
        locations: parseIntOption('locations', options.locations, 2),
        timeLimitSeconds: options.timeLimit ? parseIntOption('time-limit', options.timeLimit, 1) : undefined,
        repetitions: options.repetitions ? parseIntOption('repetitions', options.repetitions) : undefined,
        seed: options.seed ? parseIntOption('seed', options.seed) : undefined,
      }),
    ];
  }
  if (options.suite) {
    if (options.scenarios) {
      throw new Error('--suite and --scenarios cannot be combined');
    }
    return loadSuite(options.suite);
  }
  return loadScenarioFile(options.scenarios ?? loadConfig().scenariosPath ?? DEFAULT_SCENARIOS_PATH);
}

program
  .command('run')
  .description('Run benchmark scenarios and write the report')
  .option('-s, --scenarios <path>', 'Scenario file (default: BENCH_SCENARIOS or the built-in fleet-scaling set)')
  .option('--suite <name>', 'Built-in scenario set: fleet-scaling, use-cases or all')
  .option('--vehicles <number>', 'Run a single ad-hoc scenario with this many vehicles')
  .option('--locations <number>', 'Locations for the ad-hoc scenario, depot included')
  .option('--time-limit <seconds>', 'Solver time limit for the ad-hoc scenario')
  .option('-r, --repetitions <number>', 'Repetitions for the ad-hoc scenario')
  .option('--seed <number>', 'Randomize the ad-hoc payload with this seed')
  .option('-c, --concurrency <number>', 'Requests in flight per scenario (default: BENCH_CONCURRENCY or 1)')
  .option('--grace <ms>', 'Grace period added to each solver time limit (default: BENCH_GRACE_MS or 30000)')
  .option('--run-timeout <ms>', 'Stop dispatching requests after this long (default: BENCH_RUN_TIMEOUT_MS)')
  .option('-o, --output <format>', 'Output format: pretty, json, csv', 'pretty')
  .option('--out-file <path>', 'Write the report to a file instead of stdout (default: BENCH_OUTPUT)')
  .action(async (options) => {
    try {
      const cfg = loadConfig();
      const format = parseFormat(options.output);
      const outputPath: string | undefined = options.outFile ?? cfg.outputPath;
      const scenarios = await resolveScenarios(options);
      const client = createClient();

      const reporter = new ProgressReporter({ silent: !outputPath && format !== 'pretty' });
      reporter.start(client.endpoint, scenarios.length);

      const report = await runBenchmark({
        scenarios,
        client,
        concurrency: options.concurrency ? parseIntOption('concurrency', options.concurrency, 1) : cfg.concurrency,
        graceMs: options.grace ? parseIntOption('grace', options.grace) : cfg.graceMs,
        runTimeoutMs: options.runTimeout ? parseIntOption('run-timeout', options.runTimeout, 1) : cfg.runTimeoutMs,
        onPreflight: health => reporter.onPreflight(health),
        onScenarioStart: scenario => reporter.onScenarioStart(scenario),
        onSample: (sample, scenario) => reporter.onSample(sample, scenario),
        onScenarioComplete: summary => reporter.onScenarioComplete(summary),
      });

      await writeReport(report, { format, outputPath });
      if (outputPath) {
        console.log(chalk.gray(`Report written to ${outputPath}`));
      }

      process.exit(report.totals.failed > 0 ? 1 : 0);
    } catch (error) {
      fail(error);
    }
  });

program
  .command('health')
  .description('Check that the service is up (GET /cuopt/health)')
  .action(async () => {
    try {
      const client = createClient();
      const health = await client.health();
      console.log(`${chalk.green('✓')} ${client.endpoint} is ${health.status}${health.version ? ` (version ${health.version})` : ''}`);
    } catch (error) {
      fail(error);
    }
  });

program
  .command('scenarios')
  .description('List the scenarios a run would execute')
  .option('-s, --scenarios <path>', 'Scenario file')
  .option('--suite <name>', 'Built-in scenario set: fleet-scaling, use-cases or all')
  .action(async (options) => {
    try {
      const scenarios = await resolveScenarios(options);
      for (const s of scenarios) {
        console.log(
          `${s.name.padEnd(18)} vehicles=${s.vehicleCount} locations=${s.locationCount} time_limit=${s.timeLimitSeconds}s repetitions=${s.repetitions}`,
        );
      }
    } catch (error) {
      fail(error);
    }
  });

async function solveOnce(client: CuOptClient, payload: RequestPayload): Promise<void> {
  await client.health();
  console.log(`Solving (time limit: ${payload.solver_config.time_limit}s)...`);

  try {
    const result = await client.optimize(payload, { timeoutMs: payload.solver_config.time_limit * 1000 + 120_000 });
    console.log(`${chalk.cyan('Response time:')} ${(result.responseTimeMs / 1000).toFixed(2)}s`);

    const solution = summarizeSolution(result.body);
    if (!solution) {
      console.log(chalk.red(`Error: ${solverErrorMessage(result.body) ?? 'response has no solver_response'}`));
      process.exit(1);
    }
    console.log(`${chalk.cyan('Status:')}        ${solution.status ?? 'unknown'}`);
    console.log(`${chalk.cyan('Cost:')}          ${solution.cost ?? 'unknown'}`);
    const routes = Object.entries(solution.routes);
    if (routes.length > 0) {
      console.log(chalk.bold('\nRoutes:'));
      for (const [vehicleId, stops] of routes) {
        console.log(`  Vehicle ${vehicleId}: ${stops} stops`);
      }
    }
  } catch (error) {
    if (error instanceof CuOptError) {
      console.log(chalk.red(`Error: ${error.message} (${error.code})`));
      process.exit(1);
    }
    throw error;
  }
}

program
  .command('solve')
  .description('Send one fleet optimization request and print the solution summary')
  .option('--vehicles <number>', 'Number of vehicles', '10')
  .option('--locations <number>', 'Locations, depot included', '20')
  .option('--time-limit <seconds>', 'Solver time limit', '30')
  .option('--seed <number>', 'Randomize costs and demands with this seed')
  .action(async (options) => {
    try {
      const scenario = adHocScenario({
        vehicles: parseIntOption('vehicles', options.vehicles, 1),
        locations: parseIntOption('locations', options.locations, 2),
        timeLimitSeconds: parseIntOption('time-limit', options.timeLimit, 1),
        repetitions: 1,
        seed: options.seed ? parseIntOption('seed', options.seed) : undefined,
      });
      console.log(`Optimizing ${scenario.vehicleCount} vehicles, ${scenario.locationCount} locations...`);
      await solveOnce(createClient(), buildPayload(scenario));
    } catch (error) {
      fail(error);
    }
  });

program
  .command('ev-fleet')
  .description('Solve an electric delivery fleet problem with charging stations')
  .option('--vehicles <number>', 'Number of EVs', '20')
  .option('--deliveries <number>', 'Number of deliveries', '50')
  .option('--charging-stations <number>', 'Number of charging stations', '5')
  .option('--seed <number>', 'Seed for the generated problem (default: current time)')
  .action(async (options) => {
    try {
      const payload = buildEvFleetPayload({
        vehicles: parseIntOption('vehicles', options.vehicles, 1),
        deliveries: parseIntOption('deliveries', options.deliveries, 1),
        chargingStations: parseIntOption('charging-stations', options.chargingStations),
        seed: options.seed ? parseIntOption('seed', options.seed) : Date.now() % 2 ** 32,
      });
      console.log(chalk.bold('EV Fleet Optimization'));
      console.log(chalk.gray(`  Vehicles: ${options.vehicles}, Deliveries: ${options.deliveries}, Charging stations: ${options.chargingStations}`));
      await solveOnce(createClient(), payload);
    } catch (error) {
      fail(error);
    }
  });

program.parseAsync().catch(fail);
