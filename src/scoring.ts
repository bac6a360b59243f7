/**
 * CONTEP championship scoring: placement points from a configurable point
 * table plus prize points (net prize / point base).
 *
 * Standard table (1st to 10th):
 *   10, 9, 8, 7, 6, 5, 4, 3, 2, 1; placements beyond the table score 0
 */

import { CategoryType, RunResult, ScoreRecord } from './types';
import { InvalidPlacementError, ValidationError, ConsistencyError } from './errors';

/**
 * A point curve applies to the categories it names (all when omitted) and to
 * fields no larger than `maxFieldSize` (any size when omitted).
 */
export interface PointCurve {
  name: string;
  points: readonly number[];
  categoryTypes?: readonly CategoryType[];
  maxFieldSize?: number;
}

export interface PointTable {
  season: string;
  /** Checked in order; the first matching curve is used. */
  curves: readonly PointCurve[];
  defaultCurve: readonly number[];
}

export const STANDARD_CONTEP_POINTS: readonly number[] = [10, 9, 8, 7, 6, 5, 4, 3, 2, 1];

export const DEFAULT_POINT_TABLE: PointTable = {
  season: 'standard',
  curves: [],
  defaultCurve: STANDARD_CONTEP_POINTS,
};

export interface ScoringOptions {
  prizePointBase: number;
}

/**
 * Validates that a curve never increases and never goes negative.
 */
function assertCurve(name: string, points: readonly number[]): void {
  points.forEach((value, index) => {
    if (!Number.isFinite(value) || value < 0) {
      throw new ValidationError(`Point curve '${name}' has an invalid value at placement ${index + 1}`);
    }
    if (index > 0 && value > points[index - 1]) {
      throw new ValidationError(`Point curve '${name}' must not increase (placement ${index + 1})`);
    }
  });
}

export class ScoringEngine {
  constructor(
    private readonly table: PointTable = DEFAULT_POINT_TABLE,
    private readonly options: ScoringOptions = { prizePointBase: 100 }
  ) {
    assertCurve('default', table.defaultCurve);
    table.curves.forEach(curve => assertCurve(curve.name, curve.points));
    if (!(options.prizePointBase > 0)) {
      throw new ValidationError('Prize point base must be positive');
    }
  }

  get season(): string {
    return this.table.season;
  }

  curveFor(fieldSize: number, categoryType: CategoryType): readonly number[] {
    const curve = this.table.curves.find(candidate =>
      (candidate.categoryTypes === undefined || candidate.categoryTypes.includes(categoryType)) &&
      (candidate.maxFieldSize === undefined || fieldSize <= candidate.maxFieldSize)
    );
    return curve ? curve.points : this.table.defaultCurve;
  }

  /**
   * Championship points for a final placement.
   *
   * @param placement - Final placement (1 = winner)
   * @param fieldSize - Number of ranked entries in the category
   * @throws InvalidPlacementError if placement is outside 1..fieldSize
   */
  score(placement: number, fieldSize: number, categoryType: CategoryType): number {
    if (!Number.isInteger(placement) || placement < 1 || placement > fieldSize) {
      throw new InvalidPlacementError(placement, fieldSize);
    }
    return this.curveFor(fieldSize, categoryType)[placement - 1] ?? 0;
  }

  prizePoints(prize: number): number {
    return prize / this.options.prizePointBase;
  }

  /**
   * Scores every ranked result of one event/category at trio level.
   * The field size is the number of results given.
   *
   * @throws ConsistencyError if a result has no placement yet
   */
  scoreAll(ranked: RunResult[], categoryType: CategoryType): ScoreRecord[] {
    const fieldSize = ranked.length;
    return ranked.map(result => {
      if (result.placement === null) {
        throw new ConsistencyError(`Result ${result.id} has no placement; recompute placements first`);
      }
      const placementPoints = this.score(result.placement, fieldSize, categoryType);
      const prize = result.netPrize ?? 0;
      const prizePoints = this.prizePoints(prize);
      return {
        trioId: result.trioId,
        competitorId: null,
        eventId: result.eventId,
        categoryId: result.categoryId,
        placement: result.placement,
        placementPoints,
        prize,
        prizePoints,
        totalPoints: placementPoints + prizePoints,
      };
    });
  }

  /**
   * Individual records for the members of a trio: each keeps the trio's
   * placement points and a third of the prize.
   */
  splitAmongMembers(record: ScoreRecord, memberIds: readonly number[]): ScoreRecord[] {
    const share = record.prize / memberIds.length;
    const prizePoints = this.prizePoints(share);
    return memberIds.map(competitorId => ({
      ...record,
      competitorId,
      prize: share,
      prizePoints,
      totalPoints: record.placementPoints + prizePoints,
    }));
  }
}

export function createScoringEngine(
  table: PointTable = DEFAULT_POINT_TABLE,
  options: ScoringOptions = { prizePointBase: 100 }
): ScoringEngine {
  return new ScoringEngine(table, options);
}
