import { describe, expect, test } from 'vitest';
import { ConfigurationError } from '../errors.js';
import { buildLaunchSpec, renderCommand } from '../runner/launch.js';
import { makeConfig } from './helpers.js';

const TARGET = { hostA: 'node-a', hostB: 'node-b', port: 45_566 };

describe('buildLaunchSpec', () => {
  test('composes the mpirun command line', () => {
    const config = makeConfig({ ranksPerNode: 2, netIface: 'ib0', extraLaunchArgs: ['--mca', 'foo', '1'] });
    const spec = buildLaunchSpec(config, TARGET);
    expect(spec.command).toBe('mpirun');
    expect(spec.args).toEqual([
      '--tag-output',
      '--display-map',
      '--allow-run-as-root',
      '--bind-to',
      'none',
      '--mca',
      'btl_tcp_if_include',
      'ib0',
      '--mca',
      'oob_tcp_if_include',
      'ib0',
      '-np',
      '4',
      '-H',
      'node-a:2,node-b:2',
      '-x',
      'LOCAL_WORLD',
      '-x',
      'NCCL_DEBUG',
      '-x',
      'NCCL_SOCKET_IFNAME',
      '-x',
      'MASTER_ADDR=node-a',
      '-x',
      'MASTER_PORT=45566',
      '--mca',
      'foo',
      '1',
      'python',
      'npairs.py'
    ]);
    expect(spec.env).toEqual({
      MASTER_ADDR: 'node-a',
      MASTER_PORT: '45566',
      WORLD_SIZE: '4',
      LOCAL_WORLD: '2',
      NCCL_DEBUG: 'INFO',
      NCCL_SOCKET_IFNAME: 'ib0'
    });
  });

  test('direct launcher runs the workload alone', () => {
    const config = makeConfig({ launcher: 'direct', extraLaunchArgs: ['--iters', '5'] });
    const spec = buildLaunchSpec(config, TARGET);
    expect(spec.command).toBe('python');
    expect(spec.args).toEqual(['npairs.py', '--iters', '5']);
    expect(spec.env.MASTER_PORT).toBe('45566');
  });

  test('empty workload is rejected', () => {
    expect(() => buildLaunchSpec(makeConfig({ workloadCommand: [] }), TARGET)).toThrow(ConfigurationError);
  });
});

describe('renderCommand', () => {
  test('quotes arguments that need it', () => {
    expect(renderCommand({ command: 'echo', args: ['plain', 'a b', "it's"], env: {} })).toBe(
      "echo plain 'a b' 'it'\\''s'"
    );
  });
});
