import fs from 'fs/promises';
import path from 'path';
import stringifyStable from 'fast-json-stable-stringify';
import { RunReport } from '../types.js';

export const RUN_REPORT_FILE = 'run_report.json';

export function renderRunReport(report: RunReport): string {
  return `${stringifyStable(report)}\n`;
}

export async function writeRunReport(logRoot: string, report: RunReport): Promise<string> {
  const target = path.join(logRoot, RUN_REPORT_FILE);
  await fs.mkdir(logRoot, { recursive: true });
  await fs.writeFile(target, renderRunReport(report), 'utf8');
  return target;
}

/** One line per executed round, as printed at the end of a run. */
export function describeRounds(report: RunReport): string[] {
  return report.rounds.map((round) => {
    const state = round.failed > 0 ? 'one or more jobs failed/timed out' : 'all jobs completed';
    return (
      `Round ${round.roundIndex}: ${state} ` +
      `(jobs=${round.total} ok=${round.succeeded} failed=${round.failed} ` +
      `timed_out=${round.timedOut} cached=${round.skippedCached})`
    );
  });
}
