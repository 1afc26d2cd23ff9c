import { describe, expect, test } from 'vitest';
import { assertPortRange, loadRunConfig, parseArgs } from '../config.js';
import { ConfigurationError } from '../errors.js';
import { makeConfig } from './helpers.js';

describe('loadRunConfig', () => {
  test('falls back to defaults', () => {
    const config = loadRunConfig([], {}, '/work');
    expect(config.runId).toMatch(/^\d{8}_\d{6}$/);
    expect(config.logRoot).toBe(`/work/allpair-logs/${config.runId}`);
    expect(config).toMatchObject({
      hostfile: '/work/hostfile',
      ranksPerNode: 8,
      logPrefix: '',
      basePort: 45_566,
      jobTimeoutMs: 600_000,
      killGraceMs: 10_000,
      extraLaunchArgs: [],
      startRound: 0,
      workloadCommand: ['python', 'npairs.py'],
      launcher: 'mpirun',
      netIface: 'eth0',
      ncclDebug: 'INFO',
      collectIntervalMs: 30_000,
      metricsPort: 0,
      logLevel: 'info'
    });
    expect(config.aliasFile).toBeUndefined();
  });

  test('flags win over environment variables', () => {
    const config = loadRunConfig(
      ['--npernode', '2', '--timeout-sec=1.5', '--workload', 'node bench.js --iters 3', '--node-map', 'map.csv'],
      {
        NPERNODE: '4',
        MASTER_PORT_BASE: '50000',
        EXTRA_MPI_ARGS: '--mca foo 1',
        LOG_LEVEL: 'DEBUG',
        LOGDIR: 'logs/run-a',
        RUN_ID: 'run-a'
      },
      '/work'
    );
    expect(config).toMatchObject({
      runId: 'run-a',
      ranksPerNode: 2,
      basePort: 50_000,
      jobTimeoutMs: 1_500,
      extraLaunchArgs: ['--mca', 'foo', '1'],
      workloadCommand: ['node', 'bench.js', '--iters', '3'],
      logLevel: 'debug',
      logRoot: '/work/logs/run-a',
      aliasFile: '/work/map.csv'
    });
  });

  test('rejects values that do not fit', () => {
    expect(() => loadRunConfig([], { NPERNODE: 'abc' }, '/work')).toThrow('processes per node must be numeric');
    expect(() => loadRunConfig([], { LAUNCHER: 'ssh' }, '/work')).toThrow(/launcher/);
    expect(() => loadRunConfig([], { START_ROUND: '-1' }, '/work')).toThrow(/startRound/);
    expect(() => loadRunConfig(['--base-port', '70000'], {}, '/work')).toThrow(/basePort/);
    expect(() => loadRunConfig(['--log-prefix', 'a/b'], {}, '/work')).toThrow(/logPrefix/);
    expect(() => loadRunConfig(['--npernode', '1.5'], {}, '/work')).toThrow(ConfigurationError);
  });

  test('timer durations must fit a single timeout', () => {
    expect(loadRunConfig(['--timeout-sec', '2147483'], {}, '/work').jobTimeoutMs).toBe(2_147_483_000);
    expect(() => loadRunConfig(['--timeout-sec', '3000000'], {}, '/work')).toThrow(/jobTimeoutMs/);
    expect(() => loadRunConfig([], { KILL_GRACE_SEC: '3000000' }, '/work')).toThrow(/killGraceMs/);
  });

  test('schedule file resolves against the working directory', () => {
    expect(loadRunConfig(['--schedule-file', 'rounds.txt'], {}, '/work').scheduleFile).toBe('/work/rounds.txt');
    expect(loadRunConfig([], {}, '/work').scheduleFile).toBeUndefined();
  });

  test('value flags require a value', () => {
    expect(() => loadRunConfig(['--hostfile'], {}, '/work')).toThrow('--hostfile requires a value');
  });

  test('zero collect interval disables polling', () => {
    expect(loadRunConfig(['--collect-interval-sec', '0'], {}, '/work').collectIntervalMs).toBe(0);
  });
});

describe('parseArgs', () => {
  test('splits positionals and flag forms', () => {
    const parsed = parseArgs(['run', '--a', '1', '--b=2', '--c']);
    expect(parsed.positionals).toEqual(['run']);
    expect(Array.from(parsed.flags.entries())).toEqual([
      ['a', '1'],
      ['b', '2'],
      ['c', true]
    ]);
  });
});

describe('assertPortRange', () => {
  test('every job of a round needs a valid port', () => {
    expect(() => assertPortRange(makeConfig({ basePort: 65_535 }), 1)).not.toThrow();
    expect(() => assertPortRange(makeConfig({ basePort: 65_535 }), 2)).toThrow(ConfigurationError);
  });
});
