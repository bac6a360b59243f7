import { DrawRules, TRIO_SIZE } from './categoryRules';
import { ValidationError } from './errors';

export interface DrawPlan {
  /** Groups of three competitor ids, in draw order. */
  groups: Array<[number, number, number]>;
  /** Trios each competitor was placed in. */
  participation: Map<number, number>;
  /** Competitors who received fewer trios than their cap allowed. */
  shortfall: number[];
}

/** Trios a competitor may still join, keyed by competitor id. */
export type RunLimits = ReadonlyMap<number, number>;

function capFor(id: number, runsPerCompetitor: number, limits: RunLimits): number {
  return Math.max(0, Math.min(runsPerCompetitor, limits.get(id) ?? runsPerCompetitor));
}

/**
 * Fisher-Yates shuffle on a copy, driven by the given random source.
 */
export function shuffle<T>(items: readonly T[], random: () => number): T[] {
  const copy = [...items];
  for (let i = copy.length - 1; i > 0; i--) {
    const j = Math.floor(random() * (i + 1));
    [copy[i], copy[j]] = [copy[j], copy[i]];
  }
  return copy;
}

/**
 * Checks that a pool may be drawn under a category's draw rules.
 *
 * @throws ValidationError when the category forbids draws, the pool size is
 *   outside the allowed range, the pool repeats a competitor, or a full draw
 *   would leave competitors out
 */
export function assertDrawAllowed(
  draw: DrawRules,
  pool: readonly number[],
  runsPerCompetitor: number,
  limits: RunLimits = new Map()
): void {
  if (!draw.allowed) {
    throw new ValidationError('Category does not allow a random draw');
  }
  if (!Number.isInteger(runsPerCompetitor) || runsPerCompetitor < 1) {
    throw new ValidationError('Runs per competitor must be a positive integer');
  }
  if (new Set(pool).size !== pool.length) {
    throw new ValidationError('Draw pool lists a competitor more than once');
  }
  if (pool.length < draw.minCompetitors || pool.length > draw.maxCompetitors) {
    throw new ValidationError(
      `Draw pool must have between ${draw.minCompetitors} and ${draw.maxCompetitors} competitors, got ${pool.length}`
    );
  }
  const participations = pool.reduce((sum, id) => sum + capFor(id, runsPerCompetitor, limits), 0);
  if (draw.fullTrio && participations % TRIO_SIZE !== 0) {
    const requested = participations === pool.length * runsPerCompetitor
      ? `${pool.length} competitors x ${runsPerCompetitor} runs`
      : `${participations} participations after run limits`;
    throw new ValidationError(`Full draw needs the pool to fill complete trios: ${requested}`);
  }
}

/**
 * Forms trios so participation stays even: after an initial shuffle, each
 * trio takes the three competitors with the fewest trios so far, until fewer
 * than three competitors still have participations left. A competitor is
 * never placed in more trios than `runsPerCompetitor` or their entry in
 * `limits`, whichever is lower.
 *
 * @param pool - Competitor ids eligible for the draw
 * @param runsPerCompetitor - Trios each competitor should be placed in
 * @param random - Source of randomness in [0, 1)
 * @param limits - Runs each competitor has left, where lower than `runsPerCompetitor`
 */
export function planDraw(
  pool: readonly number[],
  runsPerCompetitor: number,
  random: () => number,
  limits: RunLimits = new Map()
): DrawPlan {
  const participation = new Map<number, number>(pool.map(id => [id, 0]));
  const caps = new Map<number, number>(pool.map(id => [id, capFor(id, runsPerCompetitor, limits)]));
  const queue = shuffle(pool, random);
  const groups: Array<[number, number, number]> = [];
  const totalParticipations = Array.from(caps.values()).reduce((sum, cap) => sum + cap, 0);
  const maxGroups = Math.floor(totalParticipations / TRIO_SIZE);

  while (groups.length < maxGroups) {
    const eligible = queue
      .filter(id => (participation.get(id) ?? 0) < (caps.get(id) ?? 0))
      .sort((a, b) => (participation.get(a) ?? 0) - (participation.get(b) ?? 0));
    if (eligible.length < TRIO_SIZE) break;

    const group: [number, number, number] = [eligible[0], eligible[1], eligible[2]];
    groups.push(group);
    for (const id of group) {
      participation.set(id, (participation.get(id) ?? 0) + 1);
    }
  }

  const shortfall = pool.filter(id => (participation.get(id) ?? 0) < (caps.get(id) ?? 0));
  return { groups, participation, shortfall };
}
