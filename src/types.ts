export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';

export type LauncherKind = 'mpirun' | 'direct';

export type ScheduleFormat = 'text' | 'csv' | 'jsonl';

export interface ClusterNode {
  readonly index: number;
  readonly hostname: string;
  readonly ranksPerNode: number;
}

export type Pair = readonly [number, number];

export interface Round {
  readonly index: number;
  readonly pairs: readonly Pair[];
}

/** A round as read from an external generator, before pair validation. */
export interface RoundInput {
  readonly index: number;
  readonly pairs: readonly (readonly number[])[];
  /** Tokens that could not be read as node indices at all. */
  readonly malformed?: readonly string[];
}

/** The rounds a run walks: a generated schedule or one read from a file. */
export interface RoundPlan {
  readonly rounds: readonly RoundInput[];
}

export interface Schedule {
  readonly nodeCount: number;
  readonly rounds: readonly Round[];
}

export interface ScheduleVerification {
  readonly ok: boolean;
  readonly expectedPairs: number;
  readonly coveredPairs: number;
  readonly repeatedInRound: readonly { readonly round: number; readonly pair: Pair }[];
  readonly missing: readonly Pair[];
  readonly extra: readonly Pair[];
}

export type JobStatus =
  | 'pending'
  | 'running'
  | 'succeeded'
  | 'failed'
  | 'timed_out'
  | 'skipped_cached';

export interface Job {
  readonly roundIndex: number;
  readonly jobIndex: number;
  readonly pair: Pair;
  readonly hostA: string;
  readonly hostB: string;
  readonly port: number;
  readonly logPath: string;
  readonly status: JobStatus;
  readonly exitCode?: number | null;
  readonly signal?: NodeJS.Signals | null;
  readonly durationMs?: number;
  readonly failureReason?: string;
}

export interface RoundSummary {
  readonly roundIndex: number;
  readonly total: number;
  readonly succeeded: number;
  readonly failed: number;
  readonly timedOut: number;
  readonly skippedCached: number;
  readonly skippedMalformed: number;
  readonly logPaths: readonly string[];
  readonly jobs: readonly Job[];
}

export interface RunTotals {
  readonly jobs: number;
  readonly succeeded: number;
  readonly failed: number;
  readonly timedOut: number;
  readonly skippedCached: number;
}

export interface RunReport {
  readonly runId: string;
  readonly startedAt: string;
  readonly finishedAt: string;
  readonly nodeCount: number;
  readonly scheduledRounds: number;
  readonly startRound: number;
  readonly aborted: boolean;
  readonly rounds: readonly RoundSummary[];
  readonly totals: RunTotals;
}

export interface LaunchSpec {
  readonly command: string;
  readonly args: readonly string[];
  readonly env: Readonly<Record<string, string>>;
}

export interface JobMetricsSample {
  readonly latencyAvg: number;
  readonly busbwAvg: number;
  readonly latencySamples: number;
  readonly busbwSamples: number;
}

export interface ResultRecord {
  readonly round: number;
  readonly nodeA: string;
  readonly aliasA: string;
  readonly nodeB: string;
  readonly aliasB: string;
  readonly avgLatency: number;
  readonly avgBusbw: number;
}

export interface ParsedLogName {
  readonly prefix: string;
  readonly round: number;
  readonly job: number;
  readonly hostA: string;
  readonly hostB: string;
}

export interface RunConfig {
  readonly runId: string;
  readonly hostfile: string;
  readonly ranksPerNode: number;
  readonly logRoot: string;
  readonly logPrefix: string;
  readonly basePort: number;
  readonly jobTimeoutMs: number;
  readonly killGraceMs: number;
  readonly extraLaunchArgs: readonly string[];
  readonly startRound: number;
  readonly workloadCommand: readonly string[];
  readonly launcher: LauncherKind;
  readonly netIface: string;
  readonly ncclDebug: string;
  readonly aliasFile?: string;
  /** Text-format schedule to run instead of the generated one. */
  readonly scheduleFile?: string;
  readonly collectIntervalMs: number;
  readonly metricsPort: number;
  readonly logLevel: LogLevel;
}
