import fs from 'fs/promises';
import { listJobLogs } from '../runner/logPaths.js';

export const DEFAULT_TAIL_LINES = 20;

export function tailLines(contents: string, count: number): string[] {
  const lines = contents.split(/\r?\n/);
  if (lines.length > 0 && lines[lines.length - 1] === '') lines.pop();
  return count > 0 ? lines.slice(-count) : [];
}

/** Operator-facing dump of the end of every job log under `logRoot`. */
export async function summarizeLogs(logRoot: string, count = DEFAULT_TAIL_LINES): Promise<string> {
  const logs = await listJobLogs(logRoot);
  if (logs.length === 0) {
    return `No per-pair logs were generated in ${logRoot}.\n`;
  }

  const out: string[] = [`=== AllReduce log summary (${logRoot}) ===`];
  for (const log of logs) {
    out.push(`--- ${log.path} ---`);
    const contents = await fs.readFile(log.path, 'utf8');
    if (contents.length === 0) {
      out.push('(empty log)');
    } else {
      out.push(...tailLines(contents, count));
    }
  }
  out.push('=== End of log summary ===');
  return `${out.join('\n')}\n`;
}
