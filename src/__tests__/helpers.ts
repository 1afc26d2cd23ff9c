import os from 'os';
import path from 'path';
import { mkdtemp } from 'fs/promises';
import { ClusterNode, RunConfig } from '../types.js';

export function makeConfig(overrides: Partial<RunConfig> = {}): RunConfig {
  return {
    runId: 'test-run',
    hostfile: '/nonexistent/hostfile',
    ranksPerNode: 1,
    logRoot: path.join(os.tmpdir(), 'allpair-unused'),
    logPrefix: '',
    basePort: 45_566,
    jobTimeoutMs: 10_000,
    killGraceMs: 500,
    extraLaunchArgs: [],
    startRound: 0,
    workloadCommand: ['python', 'npairs.py'],
    launcher: 'mpirun',
    netIface: 'eth0',
    ncclDebug: 'INFO',
    collectIntervalMs: 0,
    metricsPort: 0,
    logLevel: 'error',
    ...overrides
  };
}

export function makeNodes(count: number, ranksPerNode = 1): ClusterNode[] {
  return Array.from({ length: count }, (_value, index) => ({ index, hostname: `node-${index}`, ranksPerNode }));
}

export function makeTempDir(prefix: string): Promise<string> {
  return mkdtemp(path.join(os.tmpdir(), prefix));
}
