import fs from 'fs/promises';
import { JobFailureError, JobLaunchError, JobTimeoutError, describeError } from '../errors.js';
import { JobMetrics } from '../metrics/jobMetrics.js';
import { ClusterNode, Job, JobStatus, Pair, RoundInput, RoundSummary, RunConfig } from '../types.js';
import { componentLogger, Logger } from '../utils/logger.js';
import { buildLaunchSpec, renderCommand } from './launch.js';
import { ProcessOutcome, ProcessSupervisor } from './jobProcess.js';
import { buildLogPath, hasSuccessMarker, roundDirectory } from './logPaths.js';

export interface RoundExecutorOptions {
  readonly supervisor?: ProcessSupervisor;
  readonly metrics?: JobMetrics;
  readonly logger?: Logger;
}

interface PreparedJob {
  readonly job: Job;
  readonly cached: boolean;
}

export class RoundExecutor {
  private readonly supervisor: ProcessSupervisor;
  private readonly metrics?: JobMetrics;
  private readonly logger: Logger;

  constructor(
    private readonly config: RunConfig,
    private readonly nodes: readonly ClusterNode[],
    options: RoundExecutorOptions = {}
  ) {
    this.logger = options.logger ?? componentLogger('round');
    this.supervisor = options.supervisor ?? new ProcessSupervisor({ logger: this.logger });
    this.metrics = options.metrics;
  }

  get runningProcesses(): number {
    return this.supervisor.activeCount;
  }

  /**
   * Launches every pair of the round at once and resolves when all launched
   * jobs are terminal. A failing job never cancels its siblings.
   */
  async executeRound(round: RoundInput, signal?: AbortSignal): Promise<RoundSummary> {
    const log = this.logger.child({ round: round.index });
    await fs.mkdir(roundDirectory(this.config.logRoot, round.index), { recursive: true });

    const prepared: PreparedJob[] = [];
    let skippedMalformed = 0;
    for (const token of round.malformed ?? []) {
      const error = new JobLaunchError(`unreadable pair "${token}"`, round.index, [token]);
      skippedMalformed += 1;
      log.warn({ pair: error.rawPair, detail: error.message }, 'job.skipped.malformed');
    }
    for (const pair of round.pairs) {
      try {
        prepared.push(await this.prepareJob(round.index, prepared.length, pair));
      } catch (error) {
        if (!(error instanceof JobLaunchError)) throw error;
        skippedMalformed += 1;
        log.warn({ pair: error.rawPair, detail: error.message }, 'job.skipped.malformed');
      }
    }

    const pending = prepared.map(({ job, cached }) => {
      if (cached) {
        log.info({ job: job.jobIndex, hostA: job.hostA, hostB: job.hostB }, 'job.skipped.cached');
        this.metrics?.recordJob(job);
        return Promise.resolve(job);
      }
      return this.launch(job, log, signal);
    });
    const jobs = await Promise.all(pending);

    const summary = summarizeRound(round.index, jobs, skippedMalformed);
    if (summary.failed > 0) {
      log.warn({ failed: summary.failed, timedOut: summary.timedOut }, `Round ${round.index}: one or more jobs failed/timed out`);
    } else {
      log.info({ succeeded: summary.succeeded, skippedCached: summary.skippedCached }, `Round ${round.index}: all jobs completed`);
    }
    if (summary.logPaths.length > 0) {
      log.info({ logPaths: summary.logPaths }, `Round ${round.index} logs`);
    }
    return summary;
  }

  private async prepareJob(roundIndex: number, jobIndex: number, rawPair: readonly number[]): Promise<PreparedJob> {
    if (rawPair.length !== 2) {
      throw new JobLaunchError(`malformed pair of arity ${rawPair.length}`, roundIndex, rawPair);
    }
    const pair: Pair = [rawPair[0], rawPair[1]];
    const [a, b] = pair;
    const nodeA = this.nodeAt(a);
    const nodeB = this.nodeAt(b);
    if (!nodeA || !nodeB) {
      throw new JobLaunchError(`index out of range in pair (${a}, ${b})`, roundIndex, pair);
    }
    if (a === b) {
      throw new JobLaunchError(`pair repeats node ${a}`, roundIndex, pair);
    }

    const logPath = buildLogPath(
      this.config.logRoot,
      this.config.logPrefix,
      roundIndex,
      jobIndex,
      nodeA.hostname,
      nodeB.hostname
    );
    const cached = await hasSuccessMarker(logPath);
    const job: Job = {
      roundIndex,
      jobIndex,
      pair,
      hostA: nodeA.hostname,
      hostB: nodeB.hostname,
      port: this.config.basePort + jobIndex,
      logPath,
      status: cached ? 'skipped_cached' : 'pending'
    };
    return { job, cached };
  }

  private nodeAt(index: number): ClusterNode | undefined {
    if (!Number.isInteger(index) || index < 0 || index >= this.nodes.length) return undefined;
    return this.nodes[index];
  }

  private async launch(job: Job, log: Logger, signal?: AbortSignal): Promise<Job> {
    const spec = buildLaunchSpec(this.config, job);
    log.info(
      {
        job: job.jobIndex,
        pair: job.pair,
        hostA: job.hostA,
        hostB: job.hostB,
        port: job.port,
        logPath: job.logPath,
        command: renderCommand(spec)
      },
      `Launching Job${job.jobIndex}: ${job.hostA} & ${job.hostB}`
    );

    const running: Job = { ...job, status: 'running' };
    let outcome: ProcessOutcome;
    try {
      outcome = await this.supervisor.run({
        spec,
        logPath: job.logPath,
        timeoutMs: this.config.jobTimeoutMs,
        killGraceMs: this.config.killGraceMs,
        signal
      });
    } catch (error) {
      const failed: Job = { ...running, status: 'failed', failureReason: describeError(error) };
      log.error({ job: job.jobIndex, detail: failed.failureReason }, 'job.launch.failed');
      this.metrics?.recordJob(failed);
      return failed;
    }

    const finished = settleJob(running, outcome, this.config.jobTimeoutMs);
    const fields = {
      job: finished.jobIndex,
      status: finished.status,
      exitCode: finished.exitCode,
      signal: finished.signal,
      durationMs: finished.durationMs
    };
    if (finished.status === 'succeeded') {
      log.info(fields, 'job.completed');
    } else {
      log.warn({ ...fields, detail: finished.failureReason }, 'job.failed');
    }
    this.metrics?.recordJob(finished);
    return finished;
  }
}

export function settleJob(job: Job, outcome: ProcessOutcome, timeoutMs: number): Job {
  const base = {
    ...job,
    exitCode: outcome.exitCode,
    signal: outcome.signal,
    durationMs: outcome.durationMs
  };
  switch (outcome.kind) {
    case 'timed_out':
      return { ...base, status: 'timed_out', failureReason: new JobTimeoutError(job.logPath, timeoutMs).message };
    case 'aborted':
      return { ...base, status: 'failed', failureReason: 'aborted by operator' };
    case 'spawn_error':
      return { ...base, status: 'failed', failureReason: outcome.error?.message ?? 'spawn failed' };
    case 'exited': {
      if (outcome.exitCode === 0) {
        return { ...base, status: 'succeeded' };
      }
      return {
        ...base,
        status: 'failed',
        failureReason: new JobFailureError(job.logPath, outcome.exitCode, outcome.signal).message
      };
    }
    default: {
      const unknownKind: never = outcome.kind;
      throw new Error(`Unhandled process outcome: ${String(unknownKind)}`);
    }
  }
}

const FAILED_STATUSES: ReadonlySet<JobStatus> = new Set<JobStatus>(['failed', 'timed_out']);

export function summarizeRound(roundIndex: number, jobs: readonly Job[], skippedMalformed = 0): RoundSummary {
  const count = (status: JobStatus): number => jobs.filter((job) => job.status === status).length;
  return {
    roundIndex,
    total: jobs.length,
    succeeded: count('succeeded'),
    failed: jobs.filter((job) => FAILED_STATUSES.has(job.status)).length,
    timedOut: count('timed_out'),
    skippedCached: count('skipped_cached'),
    skippedMalformed,
    logPaths: jobs.filter((job) => job.status !== 'skipped_cached').map((job) => job.logPath),
    jobs
  };
}
