/**
 * Domain types shared by the rules engine, the store and the HTTP layer.
 */

export const CATEGORY_TYPES = ['BABY', 'KIDS', 'MIRIM', 'FEMININA', 'ABERTA', 'SOMA11'] as const;

export type CategoryType = typeof CATEGORY_TYPES[number];

export type Sex = 'M' | 'F';

export interface Competitor {
  id: number;
  name: string;
  birthDate: string; // YYYY-MM-DD
  handicap: number;  // 0-7
  sex: Sex;
  active: boolean;
  categoryId: number | null;
}

export interface Category {
  id: number;
  name: string;
  type: CategoryType;
  active: boolean;
}

/**
 * A competition day ("prova"). `categoryIds` lists the categories run at the event.
 */
export interface CompetitionEvent {
  id: number;
  name: string;
  date: string; // YYYY-MM-DD
  active: boolean;
  prizeDiscountPercent: number | null;
  categoryIds: number[];
}

/**
 * Per event/category run limits configured by the organizers.
 */
export interface RunConfiguration {
  eventId: number;
  categoryId: number;
  maxRunsPerCompetitor: number;
  active: boolean;
}

export interface Trio {
  id: number;
  eventId: number;
  categoryId: number;
  number: number;
  memberIds: [number, number, number];
  handicapTotal: number;
  ageTotal: number;
  drawn: boolean;
  deletedAt: string | null;
}

export interface RunResult {
  id: number;
  trioId: number;
  eventId: number;
  categoryId: number;
  firstAttempt: number | null;  // seconds
  secondAttempt: number | null; // seconds
  averageTime: number | null;
  noTime: boolean;
  disqualified: boolean;
  placement: number | null;
  prize: number | null;
  netPrize: number | null;
}

export interface QuotaKey {
  competitorId: number;
  eventId: number;
  categoryId: number;
}

/**
 * Participation control for one competitor in one event/category.
 * `version` backs the compare-and-set update used when registering runs.
 */
export interface ParticipationQuota extends QuotaKey {
  id: number;
  maxRunsAllowed: number;
  runsExecuted: number;
  runsRemaining: number;
  mayCompete: boolean;
  blockReason: string | null;
  lastRunAt: string | null;
  version: number;
}

export type QuotaState = 'ACTIVE' | 'EXHAUSTED' | 'BLOCKED';

export interface CanCompeteDecision {
  mayCompete: boolean;
  state: QuotaState | 'UNCONFIGURED';
  runsRemaining: number;
  runsExecuted: number;
  maxRunsAllowed: number;
  reasons: string[];
}

export interface EligibilityResult {
  valid: boolean;
  reason: string;
}

/**
 * Championship points for a trio (competitorId null) or for one trio member.
 */
export interface ScoreRecord {
  trioId: number;
  competitorId: number | null;
  eventId: number;
  categoryId: number;
  placement: number;
  placementPoints: number;
  prize: number;
  prizePoints: number;
  totalPoints: number;
}

export interface ConsistencyReport {
  eventId: number;
  totalResults: number;
  issues: string[];
  valid: boolean;
}
