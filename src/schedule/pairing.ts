import { InvalidInputError, ScheduleGenerationError } from '../errors.js';
import { Pair, Round, Schedule, ScheduleVerification } from '../types.js';

/**
 * Builds a round-robin schedule over `nodeCount` nodes with the circle method.
 *
 * Index 0 stays fixed while the remaining positions rotate one step per round.
 * Position k meets position N'-1-k. For an odd node count a virtual bye index
 * (equal to `nodeCount`) pads the circle and any pair containing it is dropped,
 * which leaves exactly one node idle in that round.
 */
export function generateSchedule(nodeCount: number): Schedule {
  if (!Number.isInteger(nodeCount) || nodeCount < 2) {
    throw new InvalidInputError(`node count must be an integer >= 2, got ${nodeCount}`);
  }

  const bye = nodeCount % 2 === 1 ? nodeCount : undefined;
  let circle: number[] = Array.from({ length: nodeCount }, (_value, index) => index);
  if (bye !== undefined) circle.push(bye);

  const size = circle.length;
  const half = size / 2;
  const rounds: Round[] = [];

  for (let roundIndex = 0; roundIndex < size - 1; roundIndex += 1) {
    const pairs: Pair[] = [];
    for (let position = 0; position < half; position += 1) {
      const a = circle[position];
      const b = circle[size - 1 - position];
      if (a === bye || b === bye) continue;
      pairs.push([a, b]);
    }
    rounds.push({ index: roundIndex, pairs });
    circle = [circle[0], circle[size - 1], ...circle.slice(1, size - 1)];
  }

  if (rounds.length === 0 || rounds.every((round) => round.pairs.length === 0)) {
    throw new ScheduleGenerationError(`empty schedule generated for ${nodeCount} nodes`);
  }

  return { nodeCount, rounds };
}

export function expectedRoundCount(nodeCount: number): number {
  return nodeCount % 2 === 0 ? nodeCount - 1 : nodeCount;
}

function pairKey(a: number, b: number): string {
  return a < b ? `${a}:${b}` : `${b}:${a}`;
}

function keyToPair(key: string): Pair {
  const [a, b] = key.split(':').map((part) => Number.parseInt(part, 10));
  return [a, b];
}

export function verifySchedule(schedule: Schedule): ScheduleVerification {
  const repeatedInRound: { round: number; pair: Pair }[] = [];
  const seen = new Map<string, number>();
  const extra = new Set<string>();

  for (const round of schedule.rounds) {
    const used = new Set<number>();
    for (const pair of round.pairs) {
      const [a, b] = pair;
      if (used.has(a) || used.has(b)) {
        repeatedInRound.push({ round: round.index, pair });
      }
      used.add(a);
      used.add(b);

      const inRange = a !== b && a >= 0 && b >= 0 && a < schedule.nodeCount && b < schedule.nodeCount;
      const key = pairKey(a, b);
      if (!inRange) {
        extra.add(key);
        continue;
      }
      const count = (seen.get(key) ?? 0) + 1;
      seen.set(key, count);
      if (count > 1) extra.add(key);
    }
  }

  const missing: Pair[] = [];
  for (let a = 0; a < schedule.nodeCount; a += 1) {
    for (let b = a + 1; b < schedule.nodeCount; b += 1) {
      if (!seen.has(pairKey(a, b))) missing.push([a, b]);
    }
  }

  const expectedPairs = (schedule.nodeCount * (schedule.nodeCount - 1)) / 2;
  return {
    ok: repeatedInRound.length === 0 && missing.length === 0 && extra.size === 0,
    expectedPairs,
    coveredPairs: seen.size,
    repeatedInRound,
    missing,
    extra: Array.from(extra.values()).map(keyToPair)
  };
}
