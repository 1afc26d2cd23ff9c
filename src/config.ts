import path from 'path';
import dayjs from 'dayjs';
import { z } from 'zod';
import { ConfigurationError } from './errors.js';
import { RunConfig } from './types.js';

const DEFAULT_HOSTFILE = 'hostfile';
const DEFAULT_LOG_PARENT = 'allpair-logs';
const DEFAULT_RANKS_PER_NODE = 8;
const DEFAULT_BASE_PORT = 45_566;
const DEFAULT_JOB_TIMEOUT_SEC = 600;
const DEFAULT_KILL_GRACE_SEC = 10;
const DEFAULT_COLLECT_INTERVAL_SEC = 30;
const DEFAULT_WORKLOAD = ['python', 'npairs.py'];
const DEFAULT_NET_IFACE = 'eth0';
const DEFAULT_NCCL_DEBUG = 'INFO';
// setTimeout fires immediately for delays above a signed 32-bit millisecond count
const MAX_TIMER_MS = 2_147_483_647;

const RUN_CONFIG_SCHEMA = z.object({
  runId: z.string().min(1),
  hostfile: z.string().min(1),
  ranksPerNode: z.number().int().positive(),
  logRoot: z.string().min(1),
  logPrefix: z.string().regex(/^[\w.-]*$/, 'may only contain letters, digits, "_", "-" and "."'),
  basePort: z.number().int().min(1).max(65_535),
  jobTimeoutMs: z.number().positive().max(MAX_TIMER_MS),
  killGraceMs: z.number().nonnegative().max(MAX_TIMER_MS),
  extraLaunchArgs: z.array(z.string()),
  startRound: z.number().int().nonnegative(),
  workloadCommand: z.array(z.string().min(1)).min(1, 'must name a command'),
  launcher: z.enum(['mpirun', 'direct']),
  netIface: z.string().min(1),
  ncclDebug: z.string().min(1),
  aliasFile: z.string().min(1).optional(),
  scheduleFile: z.string().min(1).optional(),
  collectIntervalMs: z.number().nonnegative(),
  metricsPort: z.number().int().min(0).max(65_535),
  logLevel: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal'])
});

export type CliFlags = ReadonlyMap<string, string | true>;

export interface ParsedArgs {
  readonly positionals: string[];
  readonly flags: CliFlags;
}

/** `--key value`, `--key=value` and bare `--switch` forms. */
export function parseArgs(argv: readonly string[]): ParsedArgs {
  const positionals: string[] = [];
  const flags = new Map<string, string | true>();
  let index = 0;
  while (index < argv.length) {
    const arg = argv[index];
    if (!arg.startsWith('--')) {
      positionals.push(arg);
      index += 1;
      continue;
    }
    const equalsIndex = arg.indexOf('=');
    if (equalsIndex !== -1) {
      flags.set(arg.slice(2, equalsIndex), arg.slice(equalsIndex + 1));
    } else if (index + 1 < argv.length && !argv[index + 1].startsWith('--')) {
      flags.set(arg.slice(2), argv[index + 1]);
      index += 1;
    } else {
      flags.set(arg.slice(2), true);
    }
    index += 1;
  }
  return { positionals, flags };
}

export function flagString(flags: CliFlags, key: string): string | undefined {
  const value = flags.get(key);
  if (value === undefined) return undefined;
  if (value === true) {
    throw new ConfigurationError(`--${key} requires a value`);
  }
  return value;
}

export function flagBoolean(flags: CliFlags, key: string): boolean {
  const value = flags.get(key);
  if (value === undefined) return false;
  if (value === true) return true;
  return parseBoolean(value, `--${key}`);
}

function parseBoolean(value: string, label: string): boolean {
  switch (value.trim().toLowerCase()) {
    case '1':
    case 'true':
    case 'yes':
    case 'on':
      return true;
    case '0':
    case 'false':
    case 'no':
    case 'off':
      return false;
    default:
      throw new ConfigurationError(`${label} must be a boolean, got "${value}"`);
  }
}

function optional(value: string | undefined): string | undefined {
  if (value === undefined) return undefined;
  const trimmed = value.trim();
  return trimmed.length === 0 ? undefined : trimmed;
}

function parseNumber(value: string | undefined, label: string): number | undefined {
  const trimmed = optional(value);
  if (trimmed === undefined) return undefined;
  const parsed = Number(trimmed);
  if (!Number.isFinite(parsed)) {
    throw new ConfigurationError(`${label} must be numeric, got "${trimmed}"`);
  }
  return parsed;
}

function secondsToMs(seconds: number): number {
  return Math.round(seconds * 1_000);
}

export function splitCommand(value: string): string[] {
  return value.split(/\s+/).filter(Boolean);
}

export function defaultRunId(now = dayjs()): string {
  return now.format('YYYYMMDD_HHmmss');
}

/**
 * Builds the one configuration value a run uses. Flags win over environment
 * variables, which win over defaults; `.env` is folded into the environment
 * by the CLI entrypoint before this runs.
 */
export function loadRunConfig(
  argv: readonly string[] = process.argv.slice(2),
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd()
): RunConfig {
  const { flags } = parseArgs(argv);
  const pick = (flag: string, envName: string): string | undefined =>
    optional(flagString(flags, flag)) ?? optional(env[envName]);

  const runId = pick('run-id', 'RUN_ID') ?? defaultRunId();
  const logRoot = path.resolve(cwd, pick('log-dir', 'LOGDIR') ?? path.join(DEFAULT_LOG_PARENT, runId));
  const workload = pick('workload', 'APP_CMD_OVERRIDE');
  const extraArgs = pick('extra-args', 'EXTRA_MPI_ARGS');
  const aliasFile = pick('node-map', 'NODE_MAP_FILE');
  const scheduleFile = pick('schedule-file', 'SCHEDULE_FILE');
  const timeoutSec = parseNumber(pick('timeout-sec', 'JOB_TIMEOUT_SEC'), 'job timeout') ?? DEFAULT_JOB_TIMEOUT_SEC;
  const graceSec = parseNumber(pick('grace-sec', 'KILL_GRACE_SEC'), 'kill grace') ?? DEFAULT_KILL_GRACE_SEC;
  const collectSec =
    parseNumber(pick('collect-interval-sec', 'COLLECT_INTERVAL_SEC'), 'collect interval') ??
    DEFAULT_COLLECT_INTERVAL_SEC;

  const raw = {
    runId,
    hostfile: path.resolve(cwd, pick('hostfile', 'HOSTFILE') ?? DEFAULT_HOSTFILE),
    ranksPerNode: parseNumber(pick('npernode', 'NPERNODE'), 'processes per node') ?? DEFAULT_RANKS_PER_NODE,
    logRoot,
    logPrefix: pick('log-prefix', 'LOG_PREFIX') ?? '',
    basePort: parseNumber(pick('base-port', 'MASTER_PORT_BASE'), 'base port') ?? DEFAULT_BASE_PORT,
    jobTimeoutMs: secondsToMs(timeoutSec),
    killGraceMs: secondsToMs(graceSec),
    extraLaunchArgs: extraArgs ? splitCommand(extraArgs) : [],
    startRound: parseNumber(pick('start-round', 'START_ROUND'), 'start round') ?? 0,
    workloadCommand: workload ? splitCommand(workload) : DEFAULT_WORKLOAD,
    launcher: (pick('launcher', 'LAUNCHER') ?? 'mpirun').toLowerCase(),
    netIface: pick('net-iface', 'NET_IFACE') ?? DEFAULT_NET_IFACE,
    ncclDebug: optional(env.NCCL_DEBUG) ?? DEFAULT_NCCL_DEBUG,
    aliasFile: aliasFile ? path.resolve(cwd, aliasFile) : undefined,
    scheduleFile: scheduleFile ? path.resolve(cwd, scheduleFile) : undefined,
    collectIntervalMs: secondsToMs(collectSec),
    metricsPort: parseNumber(pick('prom-port', 'PROM_PORT'), 'metrics port') ?? 0,
    logLevel: (pick('log-level', 'LOG_LEVEL') ?? 'info').toLowerCase()
  };

  const result = RUN_CONFIG_SCHEMA.safeParse(raw);
  if (!result.success) {
    const detail = result.error.issues
      .map((issue) => `${issue.path.join('.') || 'config'}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid configuration: ${detail}`);
  }
  return Object.freeze(result.data);
}

/** Every job of a round needs `basePort + jobIndex` to be a valid port. */
export function assertPortRange(config: RunConfig, jobsPerRound: number): void {
  const lastPort = config.basePort + Math.max(jobsPerRound, 1) - 1;
  if (lastPort > 65_535) {
    throw new ConfigurationError(
      `basePort: ${config.basePort} leaves no room for ${jobsPerRound} concurrent jobs (last port ${lastPort})`
    );
  }
}
