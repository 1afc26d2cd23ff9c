import { describe, expect, test } from 'vitest';
import path from 'path';
import { mkdir, rm, writeFile } from 'fs/promises';
import {
  buildLogFileName,
  buildLogPath,
  hasSuccessMarker,
  listJobLogs,
  parseLogFileName
} from '../runner/logPaths.js';
import { makeTempDir } from './helpers.js';

describe('log names', () => {
  test('builds the per-job file name under its round directory', () => {
    expect(buildLogFileName('pre_', 2, 1, 'node-a', 'node-b')).toBe('pre_round2_job1_node-a--node-b.log');
    expect(buildLogPath('/logs', '', 3, 0, 'a', 'b')).toBe('/logs/round3/round3_job0_a--b.log');
  });

  test('parses prefix, round, job and hosts', () => {
    expect(parseLogFileName('/logs/round2/pre_round2_job1_node-a--node-b.log')).toEqual({
      prefix: 'pre_',
      round: 2,
      job: 1,
      hostA: 'node-a',
      hostB: 'node-b'
    });
  });

  test('host B follows the last double dash', () => {
    const parsed = parseLogFileName('round3_job0_gpu--01--gpu02.log');
    expect(parsed?.hostA).toBe('gpu--01');
    expect(parsed?.hostB).toBe('gpu02');
  });

  test('other files do not parse', () => {
    expect(parseLogFileName('round_3_results.csv')).toBeUndefined();
    expect(parseLogFileName('notes.log')).toBeUndefined();
  });
});

describe('log discovery', () => {
  test('lists logs in numeric round then job order', async () => {
    const root = await makeTempDir('allpair-logs-');
    const files = [
      'round10/round10_job0_a--b.log',
      'round2/round2_job1_c--d.log',
      'round2/round2_job0_a--c.log',
      'round2/notes.txt'
    ];
    for (const file of files) {
      await mkdir(path.dirname(path.join(root, file)), { recursive: true });
      await writeFile(path.join(root, file), '', 'utf8');
    }

    const logs = await listJobLogs(root);
    expect(logs.map((log) => log.relativePath)).toEqual([
      'round2/round2_job0_a--c.log',
      'round2/round2_job1_c--d.log',
      'round10/round10_job0_a--b.log'
    ]);
    await rm(root, { recursive: true, force: true });
  });

  test('missing log root has no logs', async () => {
    expect(await listJobLogs('/nonexistent/allpair-logs')).toEqual([]);
  });

  test('success marker detection', async () => {
    const root = await makeTempDir('allpair-marker-');
    const done = path.join(root, 'done.log');
    const partial = path.join(root, 'partial.log');
    await writeFile(done, 'latency: 1\nbusbw: 2\n', 'utf8');
    await writeFile(partial, 'latency: 1\n', 'utf8');

    expect(await hasSuccessMarker(done)).toBe(true);
    expect(await hasSuccessMarker(partial)).toBe(false);
    expect(await hasSuccessMarker(path.join(root, 'missing.log'))).toBe(false);
    await rm(root, { recursive: true, force: true });
  });
});
