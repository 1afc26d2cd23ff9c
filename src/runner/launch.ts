import { ConfigurationError } from '../errors.js';
import { LaunchSpec, RunConfig } from '../types.js';

export interface LaunchTarget {
  readonly hostA: string;
  readonly hostB: string;
  readonly port: number;
}

/** Environment every workload process sees, whichever launcher starts it. */
export function buildWorkloadEnv(config: RunConfig, target: LaunchTarget): Record<string, string> {
  return {
    MASTER_ADDR: target.hostA,
    MASTER_PORT: String(target.port),
    WORLD_SIZE: String(config.ranksPerNode * 2),
    LOCAL_WORLD: String(config.ranksPerNode),
    NCCL_DEBUG: config.ncclDebug,
    NCCL_SOCKET_IFNAME: config.netIface
  };
}

export function buildLaunchSpec(config: RunConfig, target: LaunchTarget): LaunchSpec {
  if (config.workloadCommand.length === 0) {
    throw new ConfigurationError('workload command is empty');
  }
  const env = buildWorkloadEnv(config, target);

  if (config.launcher === 'direct') {
    const [command, ...args] = config.workloadCommand;
    return { command, args: [...args, ...config.extraLaunchArgs], env };
  }

  const totalRanks = config.ranksPerNode * 2;
  const args = [
    '--tag-output',
    '--display-map',
    '--allow-run-as-root',
    '--bind-to',
    'none',
    '--mca',
    'btl_tcp_if_include',
    config.netIface,
    '--mca',
    'oob_tcp_if_include',
    config.netIface,
    '-np',
    String(totalRanks),
    '-H',
    `${target.hostA}:${config.ranksPerNode},${target.hostB}:${config.ranksPerNode}`,
    '-x',
    'LOCAL_WORLD',
    '-x',
    'NCCL_DEBUG',
    '-x',
    'NCCL_SOCKET_IFNAME',
    '-x',
    `MASTER_ADDR=${target.hostA}`,
    '-x',
    `MASTER_PORT=${target.port}`,
    ...config.extraLaunchArgs,
    ...config.workloadCommand
  ];
  return { command: 'mpirun', args, env };
}

export function renderCommand(spec: LaunchSpec): string {
  return [spec.command, ...spec.args].map(quoteArg).join(' ');
}

function quoteArg(arg: string): string {
  return /^[\w@%+=:,./-]+$/.test(arg) ? arg : `'${arg.replace(/'/g, `'\\''`)}'`;
}
