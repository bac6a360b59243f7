import { RunResult } from './types';

/**
 * Returns the attempts that carry a usable time (positive seconds).
 */
export function validAttempts(result: Pick<RunResult, 'firstAttempt' | 'secondAttempt'>): number[] {
  return [result.firstAttempt, result.secondAttempt].filter(
    (time): time is number => time !== null && Number.isFinite(time) && time > 0
  );
}

/**
 * Average of the valid attempts, or null when there is none.
 */
export function computeAverage(result: Pick<RunResult, 'firstAttempt' | 'secondAttempt'>): number | null {
  const times = validAttempts(result);
  if (times.length === 0) return null;
  return times.reduce((sum, time) => sum + time, 0) / times.length;
}

/**
 * Gross prize minus the event discount percentage.
 */
export function computeNetPrize(prize: number | null, discountPercent: number): number | null {
  if (prize === null) return null;
  return prize * (1 - discountPercent / 100);
}

function bestAttempt(result: RunResult): number {
  return Math.min(...validAttempts(result), Infinity);
}

function isTimed(result: RunResult): boolean {
  return !result.noTime && !result.disqualified && result.averageTime !== null;
}

/**
 * Ranks the results of one event/category and assigns placements.
 *
 * Ranking criteria for timed entries:
 *   1. Average time (ascending)
 *   2. Best single attempt (ascending)
 *   3. Original entry order
 *
 * Entries flagged no-time, or without any valid time, follow in entry order;
 * disqualified entries come last, also in entry order. The input is not
 * mutated: copies are returned in placement order.
 *
 * @param results - All results of a single event/category
 * @returns Results with `placement` set to 1..N
 *
 * @example
 * ```typescript
 * const ranked = rankResults(results);
 * ranked[0].placement; // 1
 * ```
 */
export function rankResults(results: RunResult[]): RunResult[] {
  const indexed = results.map((result, index) => ({ result, index }));

  const timed = indexed
    .filter(({ result }) => isTimed(result))
    .sort((a, b) => {
      const averageA = a.result.averageTime ?? Infinity;
      const averageB = b.result.averageTime ?? Infinity;
      if (averageA !== averageB) return averageA - averageB;
      const bestA = bestAttempt(a.result);
      const bestB = bestAttempt(b.result);
      if (bestA !== bestB) return bestA - bestB;
      return a.index - b.index;
    });
  const noTime = indexed.filter(({ result }) => !isTimed(result) && !result.disqualified);
  const disqualified = indexed.filter(({ result }) => result.disqualified);

  return [...timed, ...noTime, ...disqualified].map(({ result }, position) => ({
    ...result,
    placement: position + 1,
  }));
}

