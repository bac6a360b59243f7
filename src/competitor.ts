import { CategoryType, Competitor } from './types';
import { MAX_HANDICAP, MIN_HANDICAP } from './categoryRules';
import { ValidationError } from './errors';

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

/**
 * Parses a YYYY-MM-DD date into its numeric parts.
 *
 * @throws ValidationError if the string is not a calendar date
 */
export function parseIsoDate(value: string): { year: number; month: number; day: number } {
  const match = ISO_DATE.exec(value);
  if (!match) {
    throw new ValidationError(`Invalid date '${value}': expected YYYY-MM-DD`);
  }
  const year = parseInt(match[1], 10);
  const month = parseInt(match[2], 10);
  const day = parseInt(match[3], 10);
  const probe = new Date(Date.UTC(year, month - 1, day));
  if (probe.getUTCMonth() !== month - 1 || probe.getUTCDate() !== day) {
    throw new ValidationError(`Invalid date '${value}'`);
  }
  return { year, month, day };
}

/**
 * Age in whole years on the evaluation date (UTC). A birthday not yet
 * reached in the evaluation year does not count.
 *
 * @example
 * ```typescript
 * calculateAge('2010-06-15', new Date('2024-06-14')); // 13
 * calculateAge('2010-06-15', new Date('2024-06-15')); // 14
 * ```
 */
export function calculateAge(birthDate: string, asOf: Date): number {
  const birth = parseIsoDate(birthDate);
  const month = asOf.getUTCMonth() + 1;
  const day = asOf.getUTCDate();
  let age = asOf.getUTCFullYear() - birth.year;
  if (month < birth.month || (month === birth.month && day < birth.day)) {
    age -= 1;
  }
  return age;
}

export function toIsoDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

export function isValidHandicap(handicap: number): boolean {
  return Number.isInteger(handicap) && handicap >= MIN_HANDICAP && handicap <= MAX_HANDICAP;
}

/**
 * Category types a competitor may enter on their own, before any trio-wide rule.
 * ABERTA, MIRIM and SOMA11 bound only the trio totals, so every competitor qualifies.
 */
export function eligibleCategoryTypes(competitor: Competitor, asOf: Date): CategoryType[] {
  const age = calculateAge(competitor.birthDate, asOf);
  const types: CategoryType[] = ['ABERTA'];
  if (age <= 12) {
    types.push('BABY');
  } else if (age <= 17) {
    types.push('KIDS');
  }
  types.push('MIRIM', 'SOMA11');
  if (competitor.sex === 'F') {
    types.push('FEMININA');
  }
  return types;
}
