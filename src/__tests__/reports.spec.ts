import { afterEach, beforeEach, describe, expect, test } from 'vitest';
import path from 'path';
import { mkdir, readFile, rm, writeFile } from 'fs/promises';
import { summarizeLogs, tailLines } from '../reports/logSummary.js';
import { describeRounds, RUN_REPORT_FILE, writeRunReport } from '../reports/runReport.js';
import { summarizeRound } from '../runner/roundExecutor.js';
import { RunReport } from '../types.js';
import { makeTempDir } from './helpers.js';

describe('log summary', () => {
  let root: string;

  beforeEach(async () => {
    root = await makeTempDir('allpair-summary-');
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  test('tail keeps the last lines', () => {
    expect(tailLines('a\nb\nc\n', 2)).toEqual(['b', 'c']);
    expect(tailLines('', 5)).toEqual([]);
  });

  test('reports a log tree without job logs', async () => {
    expect(await summarizeLogs(root)).toBe(`No per-pair logs were generated in ${root}.\n`);
  });

  test('prints the tail of every job log in order', async () => {
    await mkdir(path.join(root, 'round0'), { recursive: true });
    const first = path.join(root, 'round0', 'round0_job0_a--b.log');
    const second = path.join(root, 'round0', 'round0_job1_c--d.log');
    await writeFile(first, 'line1\nline2\nline3\n', 'utf8');
    await writeFile(second, '', 'utf8');

    expect(await summarizeLogs(root, 2)).toBe(
      [
        `=== AllReduce log summary (${root}) ===`,
        `--- ${first} ---`,
        'line2',
        'line3',
        `--- ${second} ---`,
        '(empty log)',
        '=== End of log summary ===',
        ''
      ].join('\n')
    );
  });
});

describe('run report', () => {
  const round = summarizeRound(0, [
    {
      roundIndex: 0,
      jobIndex: 0,
      pair: [0, 1],
      hostA: 'node-0',
      hostB: 'node-1',
      port: 45_566,
      logPath: '/logs/round0/round0_job0_node-0--node-1.log',
      status: 'succeeded',
      exitCode: 0,
      signal: null,
      durationMs: 1_200
    }
  ]);
  const report: RunReport = {
    runId: 'run-a',
    startedAt: '2026-01-01T00:00:00.000Z',
    finishedAt: '2026-01-01T00:05:00.000Z',
    nodeCount: 2,
    scheduledRounds: 1,
    startRound: 0,
    aborted: false,
    rounds: [round],
    totals: { jobs: 1, succeeded: 1, failed: 0, timedOut: 0, skippedCached: 0 }
  };

  test('writes sorted JSON into the log root', async () => {
    const root = await makeTempDir('allpair-report-');
    const target = await writeRunReport(root, report);

    expect(target).toBe(path.join(root, RUN_REPORT_FILE));
    const contents = await readFile(target, 'utf8');
    expect(contents.startsWith('{"aborted":false,"finishedAt":')).toBe(true);
    expect(JSON.parse(contents)).toEqual(report);
    await rm(root, { recursive: true, force: true });
  });

  test('describes each executed round', () => {
    expect(describeRounds(report)).toEqual([
      'Round 0: all jobs completed (jobs=1 ok=1 failed=0 timed_out=0 cached=0)'
    ]);
  });
});
