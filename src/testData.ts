/**
 * Record builders shared by the test suites.
 */

import { Category, CategoryType, Competitor, CompetitionEvent, ParticipationQuota, RunResult } from './types';

export const TEST_NOW = new Date('2025-03-01T12:00:00Z');

/**
 * Birth date giving the requested age on TEST_NOW.
 */
export function bornAged(age: number): string {
  return `${TEST_NOW.getUTCFullYear() - age}-01-01`;
}

export function makeCompetitor(id: number, overrides: Partial<Competitor> = {}): Competitor {
  return {
    id,
    name: `Competitor ${id}`,
    birthDate: bornAged(30),
    handicap: 3,
    sex: 'M',
    active: true,
    categoryId: null,
    ...overrides,
  };
}

export function makeCategory(id: number, type: CategoryType, overrides: Partial<Category> = {}): Category {
  return { id, name: `${type} category`, type, active: true, ...overrides };
}

export function makeEvent(id: number, categoryIds: number[], overrides: Partial<CompetitionEvent> = {}): CompetitionEvent {
  return {
    id,
    name: `Event ${id}`,
    date: '2025-04-12',
    active: true,
    prizeDiscountPercent: null,
    categoryIds,
    ...overrides,
  };
}

export function makeQuota(overrides: Partial<ParticipationQuota> = {}): ParticipationQuota {
  return {
    id: 1,
    competitorId: 1,
    eventId: 1,
    categoryId: 1,
    maxRunsAllowed: 2,
    runsExecuted: 0,
    runsRemaining: 2,
    mayCompete: true,
    blockReason: null,
    lastRunAt: null,
    version: 1,
    ...overrides,
  };
}

export function makeResult(id: number, overrides: Partial<RunResult> = {}): RunResult {
  return {
    id,
    trioId: id,
    eventId: 1,
    categoryId: 1,
    firstAttempt: null,
    secondAttempt: null,
    averageTime: null,
    noTime: false,
    disqualified: false,
    placement: null,
    prize: null,
    netPrize: null,
    ...overrides,
  };
}
