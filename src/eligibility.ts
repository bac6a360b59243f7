import { Category, Competitor, EligibilityResult } from './types';
import {
  CategoryRuleSet,
  individualAgeBounds,
  maxTrioAge,
  maxTrioHandicap,
  requiredSex,
  AgeBounds,
} from './categoryRules';
import { calculateAge } from './competitor';

export const ELIGIBLE_REASON = 'Trio is eligible for the category';

function describeBounds(bounds: AgeBounds): string {
  if (bounds.min !== null && bounds.max !== null) {
    return `${bounds.min}-${bounds.max}`;
  }
  if (bounds.max !== null) {
    return `at most ${bounds.max}`;
  }
  return `at least ${bounds.min}`;
}

function withinBounds(age: number, bounds: AgeBounds): boolean {
  if (bounds.min !== null && age < bounds.min) return false;
  if (bounds.max !== null && age > bounds.max) return false;
  return true;
}

/**
 * Validates whether three competitors may form a trio in a category.
 *
 * Rules are checked in a fixed order and the first failure is reported:
 *   1. the three competitors are distinct
 *   2. every member's age is inside the category's individual bounds
 *   3. the combined age does not exceed the category limit
 *   4. the combined handicap does not exceed the category limit
 *   5. every member matches a sex-restricted category
 *
 * Pure: the same validator backs both the dry-run check and trio creation.
 */
export class TrioEligibilityValidator {
  constructor(private readonly rules: CategoryRuleSet) {}

  validate(
    category: Category,
    a: Competitor,
    b: Competitor,
    c: Competitor,
    asOf: Date = new Date()
  ): EligibilityResult {
    const members = [a, b, c];
    const rules = this.rules.rulesFor(category.type);

    if (new Set(members.map(m => m.id)).size !== members.length) {
      return { valid: false, reason: 'Trio members must be three distinct competitors' };
    }

    // Reasons name the lowest-id offender so argument order never changes the answer
    const byId = [...members].sort((x, y) => x.id - y.id);
    const ages = byId.map(m => calculateAge(m.birthDate, asOf));

    const bounds = individualAgeBounds(rules);
    if (bounds) {
      const index = ages.findIndex(age => !withinBounds(age, bounds));
      if (index >= 0) {
        return {
          valid: false,
          reason: `Competitor ${byId[index].name} (age ${ages[index]}) is outside the ${category.type} age range (${describeBounds(bounds)})`,
        };
      }
    }

    const ageLimit = maxTrioAge(rules);
    if (ageLimit !== null) {
      const ageTotal = ages.reduce((sum, age) => sum + age, 0);
      if (ageTotal > ageLimit) {
        return { valid: false, reason: `Combined age ${ageTotal} exceeds limit ${ageLimit}` };
      }
    }

    const handicapLimit = maxTrioHandicap(rules);
    if (handicapLimit !== null) {
      const handicapTotal = members.reduce((sum, m) => sum + m.handicap, 0);
      if (handicapTotal > handicapLimit) {
        return { valid: false, reason: `Combined handicap ${handicapTotal} exceeds limit ${handicapLimit}` };
      }
    }

    const sex = requiredSex(rules);
    if (sex !== null) {
      const outsider = byId.find(m => m.sex !== sex);
      if (outsider) {
        return {
          valid: false,
          reason: `Category ${category.type} only accepts sex ${sex}; ${outsider.name} is ${outsider.sex}`,
        };
      }
    }

    return { valid: true, reason: ELIGIBLE_REASON };
  }

  /**
   * Whether a single competitor meets the per-member rules of a category
   * (individual age bounds and required sex). Used to filter draw pools.
   */
  admitsMember(category: Category, competitor: Competitor, asOf: Date = new Date()): boolean {
    const rules = this.rules.rulesFor(category.type);
    const bounds = individualAgeBounds(rules);
    if (bounds && !withinBounds(calculateAge(competitor.birthDate, asOf), bounds)) {
      return false;
    }
    const sex = requiredSex(rules);
    return sex === null || competitor.sex === sex;
  }
}
