import fs from 'fs/promises';
import path from 'path';
import { ParsedLogName } from '../types.js';

/** Printed by the workload once a measurement completed. */
export const SUCCESS_MARKER = 'busbw:';
export const LATENCY_LABEL = 'latency:';

const LOG_NAME_PATTERN = /^(.*?)round(\d+)_job(\d+)_(.+)--(.+)\.log$/;

export function roundDirectory(logRoot: string, roundIndex: number): string {
  return path.join(logRoot, `round${roundIndex}`);
}

export function buildLogFileName(
  prefix: string,
  roundIndex: number,
  jobIndex: number,
  hostA: string,
  hostB: string
): string {
  return `${prefix}round${roundIndex}_job${jobIndex}_${hostA}--${hostB}.log`;
}

export function buildLogPath(
  logRoot: string,
  prefix: string,
  roundIndex: number,
  jobIndex: number,
  hostA: string,
  hostB: string
): string {
  return path.join(roundDirectory(logRoot, roundIndex), buildLogFileName(prefix, roundIndex, jobIndex, hostA, hostB));
}

/** Host B is whatever follows the last `--`, host A everything before it. */
export function parseLogFileName(fileName: string): ParsedLogName | undefined {
  const match = LOG_NAME_PATTERN.exec(path.basename(fileName));
  if (!match) return undefined;
  const [, prefix, round, job, hostA, hostB] = match;
  return {
    prefix,
    round: Number.parseInt(round, 10),
    job: Number.parseInt(job, 10),
    hostA,
    hostB
  };
}

export function containsSuccessMarker(contents: string): boolean {
  return contents.includes(SUCCESS_MARKER);
}

export async function hasSuccessMarker(logPath: string): Promise<boolean> {
  try {
    return containsSuccessMarker(await fs.readFile(logPath, 'utf8'));
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      return false;
    }
    throw error;
  }
}

export interface JobLogEntry {
  readonly path: string;
  readonly relativePath: string;
  readonly name: ParsedLogName;
}

/** Every job log under `logRoot`, ordered by round then job index. */
export async function listJobLogs(logRoot: string): Promise<JobLogEntry[]> {
  let entries: string[];
  try {
    entries = await fs.readdir(logRoot, { recursive: true });
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      return [];
    }
    throw error;
  }

  const logs: JobLogEntry[] = [];
  for (const relativePath of entries) {
    const name = parseLogFileName(relativePath);
    if (!name) continue;
    logs.push({ path: path.join(logRoot, relativePath), relativePath, name });
  }
  return logs.sort(
    (left, right) =>
      left.name.round - right.name.round ||
      left.name.job - right.name.job ||
      left.relativePath.localeCompare(right.relativePath)
  );
}
