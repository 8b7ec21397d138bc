import path from 'path';
import { z } from 'zod';
import { ConfigurationError } from './errors.js';
import { getScenario } from './scenarios/catalog.js';
import { ScenarioDefinition, WaitTimeRange } from './types.js';
import { optionalEnv, parseFloatStrict, parseIntStrict, parseOptionalFloat, parseOptionalInt } from './utils/env.js';
import { LOG_LEVELS } from './utils/logger.js';
import type { LevelWithSilent } from 'pino';

const DEFAULT_SCENARIO = 'light_load';
const DEFAULT_SPAWN_RATE = 1;
const DEFAULT_DB_PATH = 'data/metrics.db';
const DEFAULT_PROM_PORT = 0;
const DEFAULT_WRITE_RETRIES = 2;
const DEFAULT_SIM_LATENCY_MIN_MS = 20;
const DEFAULT_SIM_LATENCY_MAX_MS = 120;
const DEFAULT_SIM_SEED = 1_337;

export interface SimulationConfig {
  readonly failureRate: number;
  readonly latency: WaitTimeRange;
  readonly seed: number;
}

export interface RunConfig {
  readonly scenario: ScenarioDefinition;
  readonly users: number;
  readonly spawnRate: number;
  readonly runTimeMs?: number;
  readonly dbPath: string;
  readonly promPort: number;
  readonly logLevel: LevelWithSilent;
  readonly runId?: string;
  readonly writeRetries: number;
  readonly simulation: SimulationConfig;
  readonly listScenarios: boolean;
}

interface CliOptions {
  scenario?: string;
  users?: number;
  spawnRate?: number;
  runTimeSec?: number;
  dbPath?: string;
  promPort?: number;
  logLevel?: string;
  runId?: string;
  listScenarios?: boolean;
}

const RUN_CONFIG_SCHEMA = z
  .object({
    users: z.number().int().positive().optional(),
    spawnRate: z.number().positive(),
    runTimeSec: z.number().int().positive().optional(),
    dbPath: z.string().min(1),
    promPort: z.number().int().min(0).max(65_535),
    logLevel: z.enum(LOG_LEVELS),
    runId: z
      .string()
      .regex(/^[A-Za-z0-9._-]+$/, 'may only contain letters, digits, dot, dash and underscore')
      .optional(),
    writeRetries: z.number().int().min(0).max(10),
    failureRate: z.number().min(0).max(1),
    latencyMinMs: z.number().min(0),
    latencyMaxMs: z.number().min(0),
    seed: z.number().int()
  })
  .refine((value) => value.latencyMaxMs >= value.latencyMinMs, {
    message: 'SIM_LATENCY_MAX_MS must not be below SIM_LATENCY_MIN_MS',
    path: ['latencyMaxMs']
  });

export function parseCliOptions(argv: readonly string[]): CliOptions {
  const options: CliOptions = {};
  let index = 0;
  while (index < argv.length) {
    const arg = argv[index];
    if (!arg.startsWith('--')) {
      index += 1;
      continue;
    }
    const [flag, ...rest] = arg.split('=');
    const key = flag.slice(2);
    let value: string | undefined = rest.length > 0 ? rest.join('=') : undefined;
    if (value === undefined && index + 1 < argv.length && !argv[index + 1].startsWith('--')) {
      value = argv[index + 1];
      index += 1;
    }
    switch (key) {
      case 'scenario':
        options.scenario = requireValue(key, value);
        break;
      case 'users':
        options.users = parseIntStrict(requireValue(key, value), key);
        break;
      case 'spawn-rate':
        options.spawnRate = parseFloatStrict(requireValue(key, value), key);
        break;
      case 'run-time':
        options.runTimeSec = parseIntStrict(requireValue(key, value), key);
        break;
      case 'db':
        options.dbPath = requireValue(key, value);
        break;
      case 'prom-port':
        options.promPort = parseIntStrict(requireValue(key, value), key);
        break;
      case 'log-level':
        options.logLevel = requireValue(key, value);
        break;
      case 'run-id':
        options.runId = requireValue(key, value);
        break;
      case 'list-scenarios':
        options.listScenarios = true;
        break;
      default:
        throw new ConfigurationError(`Unknown option --${key}`);
    }
    index += 1;
  }
  return options;
}

function requireValue(flag: string, value: string | undefined): string {
  if (value === undefined || value.trim().length === 0) {
    throw new ConfigurationError(`Option --${flag} requires a value`);
  }
  return value.trim();
}

/** CLI flags win over environment variables, which win over defaults. */
export function loadRunConfig(
  argv: readonly string[] = process.argv.slice(2),
  env: NodeJS.ProcessEnv = process.env
): RunConfig {
  const cli = parseCliOptions(argv);
  const scenario = getScenario(cli.scenario ?? optionalEnv(env, 'SCENARIO') ?? DEFAULT_SCENARIO);

  const parsed = RUN_CONFIG_SCHEMA.safeParse({
    users: cli.users ?? parseOptionalInt(env, 'USERS'),
    spawnRate: cli.spawnRate ?? parseOptionalFloat(env, 'SPAWN_RATE') ?? DEFAULT_SPAWN_RATE,
    runTimeSec: cli.runTimeSec ?? parseOptionalInt(env, 'RUN_TIME_SEC'),
    dbPath: cli.dbPath ?? optionalEnv(env, 'METRICS_DB_PATH') ?? DEFAULT_DB_PATH,
    promPort: cli.promPort ?? parseOptionalInt(env, 'PROM_PORT') ?? DEFAULT_PROM_PORT,
    logLevel: (cli.logLevel ?? optionalEnv(env, 'LOG_LEVEL') ?? 'info').toLowerCase(),
    runId: cli.runId ?? optionalEnv(env, 'RUN_ID'),
    writeRetries: parseOptionalInt(env, 'STORE_WRITE_RETRIES') ?? DEFAULT_WRITE_RETRIES,
    failureRate: parseOptionalFloat(env, 'SIM_FAILURE_RATE') ?? 0,
    latencyMinMs: parseOptionalInt(env, 'SIM_LATENCY_MIN_MS') ?? DEFAULT_SIM_LATENCY_MIN_MS,
    latencyMaxMs: parseOptionalInt(env, 'SIM_LATENCY_MAX_MS') ?? DEFAULT_SIM_LATENCY_MAX_MS,
    seed: parseOptionalInt(env, 'SIM_SEED') ?? DEFAULT_SIM_SEED
  });
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || 'config'}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid run configuration: ${details}`);
  }
  const value = parsed.data;

  return {
    scenario,
    users: value.users ?? defaultUsers(scenario),
    spawnRate: value.spawnRate,
    runTimeMs: value.runTimeSec !== undefined ? value.runTimeSec * 1_000 : undefined,
    dbPath: value.dbPath === ':memory:' ? value.dbPath : path.resolve(value.dbPath),
    promPort: value.promPort,
    logLevel: value.logLevel,
    runId: value.runId,
    writeRetries: value.writeRetries,
    simulation: {
      failureRate: value.failureRate,
      latency: { minMs: value.latencyMinMs, maxMs: value.latencyMaxMs },
      seed: value.seed
    },
    listScenarios: cli.listScenarios ?? false
  };
}

/** Pool scenarios need exactly one worker per pooled device. */
function defaultUsers(scenario: ScenarioDefinition): number {
  if (scenario.identityMode === 'pool') {
    return scenario.devicePool?.length ?? 1;
  }
  return 1;
}
