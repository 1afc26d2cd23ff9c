import { describe, expect, test } from 'vitest';
import { ConfigurationError } from '../errors.js';
import { JobMetrics } from '../metrics/jobMetrics.js';
import { RoundExecutor, summarizeRound } from '../runner/roundExecutor.js';
import { ScheduleController, totalize } from '../runner/scheduleController.js';
import { generateSchedule } from '../schedule/pairing.js';
import { RoundInput, RoundSummary } from '../types.js';
import { makeConfig, makeNodes } from './helpers.js';

class RecordingExecutor extends RoundExecutor {
  readonly executed: number[] = [];
  onRound?: (index: number) => void;

  override async executeRound(round: RoundInput): Promise<RoundSummary> {
    this.executed.push(round.index);
    this.onRound?.(round.index);
    return summarizeRound(round.index, []);
  }
}

function setup(startRound: number, nodeCount = 6) {
  const config = makeConfig({ startRound });
  const nodes = makeNodes(nodeCount);
  const executor = new RecordingExecutor(config, nodes);
  return { config, nodes, executor, schedule: generateSchedule(nodeCount) };
}

describe('ScheduleController', () => {
  test('runs every round in ascending order', async () => {
    const { config, nodes, executor, schedule } = setup(0);
    const completed: number[] = [];
    const report = await new ScheduleController(config, nodes, schedule, {
      executor,
      onRoundComplete: (summary) => {
        completed.push(summary.roundIndex);
      }
    }).runSchedule();

    expect(executor.executed).toEqual([0, 1, 2, 3, 4]);
    expect(completed).toEqual([0, 1, 2, 3, 4]);
    expect(report.aborted).toBe(false);
    expect(report.scheduledRounds).toBe(5);
    expect(report.nodeCount).toBe(6);
    expect(report.runId).toBe('test-run');
  });

  test('resume offset skips earlier rounds', async () => {
    const { config, nodes, executor, schedule } = setup(2);
    const report = await new ScheduleController(config, nodes, schedule, { executor }).runSchedule();

    expect(executor.executed).toEqual([2, 3, 4]);
    expect(report.rounds.map((round) => round.roundIndex)).toEqual([2, 3, 4]);
    expect(report.startRound).toBe(2);
  });

  test('resume offset past the end runs nothing', async () => {
    const { config, nodes, executor, schedule } = setup(10);
    const report = await new ScheduleController(config, nodes, schedule, { executor }).runSchedule();

    expect(executor.executed).toEqual([]);
    expect(report.rounds).toEqual([]);
    expect(report.aborted).toBe(false);
  });

  test('negative resume offset is rejected', async () => {
    const { config, nodes, executor, schedule } = setup(-1);
    await expect(
      new ScheduleController(config, nodes, schedule, { executor }).runSchedule()
    ).rejects.toBeInstanceOf(ConfigurationError);
  });

  test('abort stops before the next round', async () => {
    const { config, nodes, executor, schedule } = setup(0);
    const controller = new AbortController();
    executor.onRound = (index) => {
      if (index === 1) controller.abort();
    };
    const report = await new ScheduleController(config, nodes, schedule, { executor }).runSchedule(
      controller.signal
    );

    expect(executor.executed).toEqual([0, 1]);
    expect(report.aborted).toBe(true);
    expect(report.rounds).toHaveLength(2);
  });

  test('records round progress in metrics', async () => {
    const { config, nodes, executor, schedule } = setup(1, 4);
    const metrics = new JobMetrics({ runId: 'test-run', port: 0, collectDefaults: false });
    await new ScheduleController(config, nodes, schedule, { executor, metrics }).runSchedule();

    const completed = await metrics.registry.getSingleMetric('allpair_rounds_completed_total')?.get();
    expect(completed?.values[0]?.value).toBe(2);
    const current = await metrics.registry.getSingleMetric('allpair_current_round')?.get();
    expect(current?.values[0]?.value).toBe(2);
  });
});

describe('totalize', () => {
  test('sums round summaries', () => {
    const first = summarizeRound(0, [
      {
        roundIndex: 0,
        jobIndex: 0,
        pair: [0, 1],
        hostA: 'node-0',
        hostB: 'node-1',
        port: 1,
        logPath: '/a.log',
        status: 'succeeded'
      }
    ]);
    const second = summarizeRound(1, [
      {
        roundIndex: 1,
        jobIndex: 0,
        pair: [0, 2],
        hostA: 'node-0',
        hostB: 'node-2',
        port: 1,
        logPath: '/b.log',
        status: 'timed_out'
      }
    ]);
    expect(totalize([first, second])).toEqual({ jobs: 2, succeeded: 1, failed: 1, timedOut: 1, skippedCached: 0 });
  });
});
