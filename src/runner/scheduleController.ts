import dayjs from 'dayjs';
import { ConfigurationError } from '../errors.js';
import { JobMetrics } from '../metrics/jobMetrics.js';
import { ClusterNode, RoundPlan, RoundSummary, RunConfig, RunReport, RunTotals } from '../types.js';
import { componentLogger, Logger } from '../utils/logger.js';
import { RoundExecutor } from './roundExecutor.js';

export interface ScheduleControllerOptions {
  readonly executor?: RoundExecutor;
  readonly metrics?: JobMetrics;
  readonly logger?: Logger;
  /** Called after each round's barrier releases. */
  readonly onRoundComplete?: (summary: RoundSummary) => Promise<void> | void;
}

/**
 * Walks the schedule one round at a time. Rounds below the resume offset are
 * consumed without running so round and port numbering match the first run.
 */
export class ScheduleController {
  private readonly executor: RoundExecutor;
  private readonly logger: Logger;

  constructor(
    private readonly config: RunConfig,
    private readonly nodes: readonly ClusterNode[],
    private readonly schedule: RoundPlan,
    private readonly options: ScheduleControllerOptions = {}
  ) {
    this.logger = options.logger ?? componentLogger('controller');
    this.executor =
      options.executor ?? new RoundExecutor(config, nodes, { metrics: options.metrics, logger: this.logger });
  }

  async runSchedule(signal?: AbortSignal): Promise<RunReport> {
    const { startRound } = this.config;
    if (!Number.isInteger(startRound) || startRound < 0) {
      throw new ConfigurationError(`start round must be a non-negative integer, got ${startRound}`);
    }
    if (startRound >= this.schedule.rounds.length) {
      this.logger.warn(
        { startRound, rounds: this.schedule.rounds.length },
        'start round is past the end of the schedule; nothing to run'
      );
    }

    const startedAt = dayjs().toISOString();
    const summaries: RoundSummary[] = [];
    let aborted = false;

    this.logger.info(
      { nodes: this.nodes.length, rounds: this.schedule.rounds.length, startRound },
      `Schedule has ${this.schedule.rounds.length} rounds; ~${Math.floor(this.nodes.length / 2)} pairs per round`
    );

    for (const round of this.schedule.rounds) {
      if (round.index < startRound) {
        this.logger.debug({ round: round.index }, 'round.skipped.resume');
        continue;
      }
      if (signal?.aborted) {
        aborted = true;
        break;
      }

      this.logger.info({ round: round.index, pairs: round.pairs.length }, `=== Round ${round.index} ===`);
      this.options.metrics?.recordRoundStart(round.index);
      const summary = await this.executor.executeRound(round, signal);
      summaries.push(summary);
      this.options.metrics?.recordRoundComplete();
      await this.options.onRoundComplete?.(summary);

      if (signal?.aborted) {
        aborted = true;
        break;
      }
    }

    const totals = totalize(summaries);
    if (aborted) {
      this.logger.warn({ executedRounds: summaries.length }, 'run aborted');
    } else {
      this.logger.info({ ...totals, logRoot: this.config.logRoot }, `All rounds complete. Logs in: ${this.config.logRoot}`);
    }

    return {
      runId: this.config.runId,
      startedAt,
      finishedAt: dayjs().toISOString(),
      nodeCount: this.nodes.length,
      scheduledRounds: this.schedule.rounds.length,
      startRound,
      aborted,
      rounds: summaries,
      totals
    };
  }
}

export function totalize(summaries: readonly RoundSummary[]): RunTotals {
  return summaries.reduce<RunTotals>(
    (acc, summary) => ({
      jobs: acc.jobs + summary.total,
      succeeded: acc.succeeded + summary.succeeded,
      failed: acc.failed + summary.failed,
      timedOut: acc.timedOut + summary.timedOut,
      skippedCached: acc.skippedCached + summary.skippedCached
    }),
    { jobs: 0, succeeded: 0, failed: 0, timedOut: 0, skippedCached: 0 }
  );
}
