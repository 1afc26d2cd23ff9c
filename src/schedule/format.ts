import fs from 'fs/promises';
import { stringify } from 'csv-stringify/sync';
import stringifyStable from 'fast-json-stable-stringify';
import { ConfigurationError, InvalidInputError } from '../errors.js';
import { Pair, Round, RoundInput, Schedule, ScheduleFormat, ScheduleVerification } from '../types.js';

export const PAIR_DELIMITER = ' | ';

export function formatSchedule(schedule: Schedule, format: ScheduleFormat): string {
  switch (format) {
    case 'text':
      return schedule.rounds.map(formatRoundLine).join('\n') + '\n';
    case 'csv':
      return stringify(
        schedule.rounds.flatMap((round) => round.pairs.map(([a, b]) => [round.index, a, b])),
        { header: true, columns: ['round', 'a', 'b'] }
      );
    case 'jsonl':
      return (
        schedule.rounds
          .map((round) => stringifyStable({ round: round.index, pairs: round.pairs }))
          .join('\n') + '\n'
      );
    default: {
      const unknownFormat: never = format;
      throw new Error(`Unsupported schedule format: ${String(unknownFormat)}`);
    }
  }
}

export function formatRoundLine(round: Round): string {
  return round.pairs.map(([a, b]) => `${a} ${b}`).join(PAIR_DELIMITER);
}

/**
 * Reads one line of the text format back into a round. Tokens of integers are
 * kept whatever their count, so the executor can reject a bad arity; any other
 * token is returned in `malformed` instead of being dropped.
 */
export function parseRoundLine(line: string, index: number): RoundInput {
  const pairs: number[][] = [];
  const malformed: string[] = [];
  const cleaned = line.trim().replace(/^"/, '').replace(/"$/, '');
  if (cleaned.length === 0) return { index, pairs, malformed };

  for (const token of cleaned.split('|')) {
    const parts = token.trim().split(/\s+/).filter(Boolean);
    if (parts.length === 0 || !parts.every((part) => /^\d+$/.test(part))) {
      malformed.push(token.trim());
      continue;
    }
    pairs.push(parts.map((part) => Number.parseInt(part, 10)));
  }
  return { index, pairs, malformed };
}

export function parseScheduleText(contents: string): RoundInput[] {
  return contents
    .split(/\r?\n/)
    .filter((line) => line.trim().length > 0)
    .map((line, index) => parseRoundLine(line, index));
}

export async function readScheduleFile(filePath: string): Promise<RoundInput[]> {
  let contents: string;
  try {
    contents = await fs.readFile(filePath, 'utf8');
  } catch (error) {
    throw new ConfigurationError(`Schedule file not found or unreadable at: ${filePath}`, { cause: error });
  }
  const rounds = parseScheduleText(contents);
  if (rounds.length === 0) {
    throw new InvalidInputError(`Schedule file has no rounds: ${filePath}`);
  }
  return rounds;
}

export function describeVerification(report: ScheduleVerification): string[] {
  const lines: string[] = [];
  for (const { round, pair } of report.repeatedInRound) {
    lines.push(`Round ${round} repeats node in pair (${pair[0]}, ${pair[1]})`);
  }
  if (report.missing.length > 0 || report.extra.length > 0) {
    lines.push(`Coverage mismatch: expected ${report.expectedPairs} pairs, got ${report.coveredPairs}`);
    if (report.missing.length > 0) {
      lines.push(`Missing ${report.missing.length} pairs (first 10): ${formatPairs(report.missing.slice(0, 10))}`);
    }
    if (report.extra.length > 0) {
      lines.push(`Extra ${report.extra.length} pairs (first 10): ${formatPairs(report.extra.slice(0, 10))}`);
    }
  } else {
    lines.push(`Coverage: ${report.coveredPairs}/${report.expectedPairs} unordered pairs -> OK`);
  }
  return lines;
}

function formatPairs(pairs: readonly Pair[]): string {
  return pairs.map(([a, b]) => `(${a}, ${b})`).join(', ');
}
