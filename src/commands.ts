import fs from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import { assertPortRange, flagBoolean, flagString, loadRunConfig, parseArgs } from './config.js';
import { ConfigurationError } from './errors.js';
import { JobMetrics } from './metrics/jobMetrics.js';
import { loadAliasMap, loadNodes, parseHostfile } from './nodes.js';
import { DEFAULT_TAIL_LINES, summarizeLogs } from './reports/logSummary.js';
import { describeRounds, writeRunReport } from './reports/runReport.js';
import { ResultCollector } from './results/collector.js';
import { ScheduleController } from './runner/scheduleController.js';
import { describeVerification, formatSchedule, readScheduleFile } from './schedule/format.js';
import { generateSchedule, verifySchedule } from './schedule/pairing.js';
import { RoundPlan } from './types.js';
import { componentLogger, setLogLevel } from './utils/logger.js';

export interface CommandContext {
  readonly env: NodeJS.ProcessEnv;
  readonly cwd: string;
  readonly signal?: AbortSignal;
}

export interface CommandResult {
  readonly exitCode: number;
  readonly stdout: string;
  readonly stderr: string;
}

export const EXIT_ABORTED = 130;

export const USAGE = `Usage: allpair <command> [options]

Commands:
  run        run every round of the all-pair schedule (default) [--schedule-file PATH]
  schedule   print the pairing schedule (--nitems N | --nodes-file PATH) [--format text|csv|jsonl] [--verify]
  collect    turn job logs into result tables (--log-dir DIR) [--nodes N] [--output-dir DIR] [--watch] [--final]
  summary    print the tail of every job log (--log-dir DIR) [--tail N]

Options taking values that start with "--" must use the --flag=value form.
`;

const FORMAT_SCHEMA = z.enum(['text', 'csv', 'jsonl']);
const COUNT_SCHEMA = z.coerce.number().int().min(1);

function parseCount(value: string, label: string, minimum = 1): number {
  const result = COUNT_SCHEMA.safeParse(value);
  if (!result.success || result.data < minimum) {
    throw new ConfigurationError(`${label} must be an integer >= ${minimum}, got "${value}"`);
  }
  return result.data;
}

function requireLogDir(argv: readonly string[], context: CommandContext): void {
  const { flags } = parseArgs(argv);
  if (flagString(flags, 'log-dir') === undefined && !context.env.LOGDIR?.trim()) {
    throw new ConfigurationError('logRoot: --log-dir (or LOGDIR) is required');
  }
}

function waitForAbort(signal: AbortSignal | undefined): Promise<void> {
  if (!signal) return Promise.resolve();
  return new Promise((resolve) => {
    if (signal.aborted) {
      resolve();
      return;
    }
    signal.addEventListener('abort', () => resolve(), { once: true });
  });
}

export async function scheduleCommand(argv: readonly string[], context: CommandContext): Promise<CommandResult> {
  const { flags } = parseArgs(argv);
  const nitems = flagString(flags, 'nitems');
  const nodesFile = flagString(flags, 'nodes-file');

  let nodeCount: number;
  if (nitems !== undefined) {
    nodeCount = parseCount(nitems, '--nitems', 2);
  } else if (nodesFile !== undefined) {
    const target = path.resolve(context.cwd, nodesFile);
    let contents: string;
    try {
      contents = await fs.readFile(target, 'utf8');
    } catch (error) {
      throw new ConfigurationError(`Nodes file not found or unreadable at: ${target}`, { cause: error });
    }
    nodeCount = parseHostfile(contents, 1).length;
  } else {
    throw new ConfigurationError('Provide --nitems N or --nodes-file PATH');
  }

  const format = FORMAT_SCHEMA.safeParse(flagString(flags, 'format') ?? 'text');
  if (!format.success) {
    throw new ConfigurationError(`--format must be one of text, csv, jsonl`);
  }

  const schedule = generateSchedule(nodeCount);
  const stdout = formatSchedule(schedule, format.data);
  if (!flagBoolean(flags, 'verify')) {
    return { exitCode: 0, stdout, stderr: '' };
  }
  const report = verifySchedule(schedule);
  return {
    exitCode: report.ok ? 0 : 1,
    stdout,
    stderr: `${describeVerification(report).join('\n')}\n`
  };
}

export async function runCommand(argv: readonly string[], context: CommandContext): Promise<CommandResult> {
  const config = loadRunConfig(argv, context.env, context.cwd);
  setLogLevel(config.logLevel);
  const log = componentLogger('run');

  const nodes = await loadNodes(config.hostfile, config.ranksPerNode);
  const aliases = await loadAliasMap(config.aliasFile);
  const plan: RoundPlan = config.scheduleFile
    ? { rounds: await readScheduleFile(config.scheduleFile) }
    : generateSchedule(nodes.length);
  assertPortRange(config, Math.max(0, ...plan.rounds.map((round) => round.pairs.length)));

  log.info(
    {
      runId: config.runId,
      nodes: nodes.length,
      hostfile: config.hostfile,
      logRoot: config.logRoot,
      launcher: config.launcher,
      scheduleFile: config.scheduleFile,
      startRound: config.startRound
    },
    'run.starting'
  );

  const metrics = new JobMetrics({ runId: config.runId, port: config.metricsPort });
  const collector = new ResultCollector({ logRoot: config.logRoot, aliases });
  await metrics.start();
  try {
    if (config.collectIntervalMs > 0) {
      collector.start(config.collectIntervalMs);
    }
    const controller = new ScheduleController(config, nodes, plan, { metrics });
    const report = await controller.runSchedule(context.signal);

    await collector.stop();
    // an aborted run leaves partial logs that a resumed run will rewrite
    await collector.scan({ includeIncomplete: !report.aborted });
    await collector.aggregate(nodes.length);
    const reportPath = await writeRunReport(config.logRoot, report);
    log.info({ reportPath, ...report.totals }, 'run.completed');

    const stdout = [await summarizeLogs(config.logRoot), ...describeRounds(report).map((line) => `${line}\n`)].join('');
    return { exitCode: report.aborted ? EXIT_ABORTED : 0, stdout, stderr: '' };
  } finally {
    await collector.stop();
    await metrics.stop();
  }
}

export async function collectCommand(argv: readonly string[], context: CommandContext): Promise<CommandResult> {
  requireLogDir(argv, context);
  const config = loadRunConfig(argv, context.env, context.cwd);
  setLogLevel(config.logLevel);
  const { flags } = parseArgs(argv);
  const log = componentLogger('collect');

  const outputDir = flagString(flags, 'output-dir');
  const nodesFlag = flagString(flags, 'nodes');
  const nodeCount = nodesFlag === undefined ? undefined : parseCount(nodesFlag, '--nodes', 2);
  const collector = new ResultCollector({
    logRoot: config.logRoot,
    outputDir: outputDir === undefined ? undefined : path.resolve(context.cwd, outputDir),
    aliases: await loadAliasMap(config.aliasFile)
  });

  if (flagBoolean(flags, 'watch')) {
    if (config.collectIntervalMs <= 0) {
      throw new ConfigurationError('collectIntervalMs: --watch needs a positive --collect-interval-sec');
    }
    log.info({ logRoot: config.logRoot, intervalMs: config.collectIntervalMs }, 'collector.watching');
    collector.start(config.collectIntervalMs);
    await waitForAbort(context.signal);
    await collector.stop();
  }

  const result = await collector.scan({ includeIncomplete: flagBoolean(flags, 'final') });
  const lines = [`Recorded ${result.recorded.length} of ${result.scanned} new logs (${result.pending} pending)`];
  if (nodeCount !== undefined) {
    const aggregate = await collector.aggregate(nodeCount);
    lines.push(`Aggregated ${aggregate.rows} rows into ${aggregate.path}`);
  }
  return { exitCode: 0, stdout: `${lines.join('\n')}\n`, stderr: '' };
}

export async function summaryCommand(argv: readonly string[], context: CommandContext): Promise<CommandResult> {
  requireLogDir(argv, context);
  const config = loadRunConfig(argv, context.env, context.cwd);
  const tail = flagString(parseArgs(argv).flags, 'tail');
  const count = tail === undefined ? DEFAULT_TAIL_LINES : parseCount(tail, '--tail');
  return { exitCode: 0, stdout: await summarizeLogs(config.logRoot, count), stderr: '' };
}

export async function dispatch(argv: readonly string[], context: CommandContext): Promise<CommandResult> {
  const [first, ...rest] = argv;
  if (first === undefined || first.startsWith('--')) {
    if (first === '--help') return { exitCode: 0, stdout: USAGE, stderr: '' };
    return runCommand(argv, context);
  }
  switch (first) {
    case 'run':
      return runCommand(rest, context);
    case 'schedule':
      return scheduleCommand(rest, context);
    case 'collect':
      return collectCommand(rest, context);
    case 'summary':
      return summaryCommand(rest, context);
    case 'help':
      return { exitCode: 0, stdout: USAGE, stderr: '' };
    default:
      return { exitCode: 2, stdout: '', stderr: `Unknown command: ${first}\n\n${USAGE}` };
  }
}
