import { ConsistencyReport, RunResult, Trio } from './types';
import { computeAverage } from './placement';

const AVERAGE_TOLERANCE = 0.01;

/**
 * Audits the stored results of one event without changing them.
 *
 * Reported issues:
 * - two results of the same category sharing a placement
 * - attempt times that are zero or negative
 * - a stored average that differs from the valid attempts
 * - a no-time entry that still carries an average
 * - a result whose trio is missing or was deleted
 *
 * @param eventId - Event the results belong to
 * @param results - Every result of the event
 * @param trios - Live (non-deleted) trios of the event
 */
export function checkResultConsistency(eventId: number, results: RunResult[], trios: Trio[]): ConsistencyReport {
  const issues: string[] = [];
  const trioIds = new Set(trios.map(trio => trio.id));
  const placements = new Map<string, number>();

  for (const result of results) {
    if (!trioIds.has(result.trioId)) {
      issues.push(`Result ${result.id} references trio ${result.trioId}, which does not exist`);
    }

    if (result.placement !== null) {
      const key = `${result.categoryId}:${result.placement}`;
      const holder = placements.get(key);
      if (holder !== undefined) {
        issues.push(
          `Results ${holder} and ${result.id} share placement ${result.placement} in category ${result.categoryId}`
        );
      } else {
        placements.set(key, result.id);
      }
    }

    for (const [label, time] of [['first', result.firstAttempt], ['second', result.secondAttempt]] as const) {
      if (time !== null && !(time > 0)) {
        issues.push(`Result ${result.id} has an invalid ${label} attempt time (${time})`);
      }
    }

    if (result.noTime && result.averageTime !== null) {
      issues.push(`Result ${result.id} is marked no-time but has an average of ${result.averageTime}`);
    } else if (!result.noTime && !result.disqualified) {
      const expected = computeAverage(result);
      const mismatch = expected === null
        ? result.averageTime !== null
        : result.averageTime === null || Math.abs(result.averageTime - expected) > AVERAGE_TOLERANCE;
      if (mismatch) {
        issues.push(`Result ${result.id} has average ${result.averageTime}, expected ${expected}`);
      }
    }
  }

  return { eventId, totalResults: results.length, issues, valid: issues.length === 0 };
}
