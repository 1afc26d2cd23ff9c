import { ChildProcess, spawn, SpawnOptions } from 'child_process';
import fs from 'fs/promises';
import path from 'path';
import { describeError } from '../errors.js';
import { LaunchSpec } from '../types.js';
import { componentLogger, Logger } from '../utils/logger.js';

export type SpawnFn = (command: string, args: readonly string[], options: SpawnOptions) => ChildProcess;

export type ProcessOutcomeKind = 'exited' | 'timed_out' | 'aborted' | 'spawn_error';

export interface ProcessOutcome {
  readonly kind: ProcessOutcomeKind;
  readonly exitCode: number | null;
  readonly signal: NodeJS.Signals | null;
  readonly durationMs: number;
  readonly error?: Error;
}

export interface RunProcessOptions {
  readonly spec: LaunchSpec;
  readonly logPath: string;
  readonly timeoutMs: number;
  readonly killGraceMs: number;
  readonly signal?: AbortSignal;
}

export interface ProcessSupervisorOptions {
  readonly spawn?: SpawnFn;
  readonly logger?: Logger;
}

/**
 * Runs workload processes with their output redirected into a log file.
 *
 * Each child leads its own process group so that a timeout or an abort can
 * signal the whole tree (launcher plus remote-shell helpers) at once: SIGTERM
 * first, SIGKILL once the grace window has passed.
 */
export class ProcessSupervisor {
  private readonly active = new Set<ChildProcess>();
  private readonly spawnProcess: SpawnFn;
  private readonly logger: Logger;

  constructor(options: ProcessSupervisorOptions = {}) {
    this.spawnProcess = options.spawn ?? spawn;
    this.logger = options.logger ?? componentLogger('process');
  }

  get activeCount(): number {
    return this.active.size;
  }

  async run(options: RunProcessOptions): Promise<ProcessOutcome> {
    await fs.mkdir(path.dirname(options.logPath), { recursive: true });
    const handle = await fs.open(options.logPath, 'w');
    try {
      return await this.supervise(options, handle.fd);
    } finally {
      await handle.close();
    }
  }

  private supervise(options: RunProcessOptions, logFd: number): Promise<ProcessOutcome> {
    const { spec, timeoutMs, killGraceMs, signal } = options;
    const startedAt = Date.now();

    return new Promise<ProcessOutcome>((resolve) => {
      let child: ChildProcess;
      try {
        child = this.spawnProcess(spec.command, spec.args, {
          env: { ...process.env, ...spec.env },
          stdio: ['ignore', logFd, logFd],
          detached: true
        });
      } catch (error) {
        resolve({
          kind: 'spawn_error',
          exitCode: null,
          signal: null,
          durationMs: 0,
          error: error instanceof Error ? error : new Error(String(error))
        });
        return;
      }

      this.active.add(child);
      let timedOut = false;
      let aborted = false;
      let settled = false;
      let killTimer: NodeJS.Timeout | undefined;

      const terminate = (): void => {
        if (killTimer) return;
        this.signalGroup(child, 'SIGTERM');
        killTimer = setTimeout(() => this.signalGroup(child, 'SIGKILL'), killGraceMs);
      };

      const timeoutTimer = setTimeout(() => {
        timedOut = true;
        this.logger.warn({ logPath: options.logPath, timeoutMs }, 'job.timeout');
        terminate();
      }, timeoutMs);

      const onAbort = (): void => {
        if (!timedOut) aborted = true;
        terminate();
      };

      const finish = (outcome: ProcessOutcome): void => {
        if (settled) return;
        settled = true;
        clearTimeout(timeoutTimer);
        if (killTimer) clearTimeout(killTimer);
        signal?.removeEventListener('abort', onAbort);
        this.active.delete(child);
        resolve(outcome);
      };

      child.once('error', (error) => {
        finish({ kind: 'spawn_error', exitCode: null, signal: null, durationMs: Date.now() - startedAt, error });
      });

      child.once('exit', (exitCode, exitSignal) => {
        if (timedOut || aborted) {
          // the group leader is gone; sweep whatever it left behind
          this.signalGroup(child, 'SIGKILL');
        }
        const kind: ProcessOutcomeKind = timedOut ? 'timed_out' : aborted ? 'aborted' : 'exited';
        finish({ kind, exitCode, signal: exitSignal, durationMs: Date.now() - startedAt });
      });

      if (signal?.aborted) {
        onAbort();
      } else {
        signal?.addEventListener('abort', onAbort, { once: true });
      }
    });
  }

  private signalGroup(child: ChildProcess, signal: NodeJS.Signals): void {
    if (child.pid === undefined) return;
    try {
      process.kill(-child.pid, signal);
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ESRCH') return;
      this.logger.warn({ pid: child.pid, signal, detail: describeError(error) }, 'job.signal.failed');
    }
  }
}
