import { CATEGORY_TYPES, CategoryType } from './types';
import { UnknownCategoryTypeError, ValidationError } from './errors';

/**
 * Random draw ("sorteio") permissions for a category.
 * A full draw must place the whole pool into complete trios.
 */
export interface DrawRules {
  allowed: boolean;
  fullTrio: boolean;
  minCompetitors: number;
  maxCompetitors: number;
}

/**
 * Rule parameters for one category type. One case per type, so a new type
 * has to be handled everywhere the rules are read.
 */
export type RuleSet =
  | { type: 'BABY'; maxIndividualAge: number; draw: DrawRules }
  | { type: 'KIDS'; minIndividualAge: number; maxIndividualAge: number; draw: DrawRules }
  | { type: 'MIRIM'; maxTrioAge: number; draw: DrawRules }
  | { type: 'FEMININA'; requiredSex: 'F'; draw: DrawRules }
  | { type: 'ABERTA'; draw: DrawRules }
  | { type: 'SOMA11'; maxTrioHandicap: number; draw: DrawRules };

export type RuleTable = { readonly [T in CategoryType]: Extract<RuleSet, { type: T }> };

export interface AgeBounds {
  min: number | null;
  max: number | null;
}

export const MIN_HANDICAP = 0;
export const MAX_HANDICAP = 7;
export const TRIO_SIZE = 3;

const NO_DRAW: DrawRules = { allowed: false, fullTrio: false, minCompetitors: 3, maxCompetitors: 9 };

export const DEFAULT_RULE_TABLE: RuleTable = {
  BABY: {
    type: 'BABY',
    maxIndividualAge: 12,
    draw: { allowed: true, fullTrio: true, minCompetitors: 3, maxCompetitors: 9 },
  },
  KIDS: {
    type: 'KIDS',
    minIndividualAge: 13,
    maxIndividualAge: 17,
    draw: { allowed: true, fullTrio: false, minCompetitors: 3, maxCompetitors: 9 },
  },
  MIRIM: {
    type: 'MIRIM',
    maxTrioAge: 36,
    draw: { allowed: true, fullTrio: false, minCompetitors: 3, maxCompetitors: 9 },
  },
  FEMININA: {
    type: 'FEMININA',
    requiredSex: 'F',
    draw: { allowed: true, fullTrio: false, minCompetitors: 3, maxCompetitors: 9 },
  },
  ABERTA: { type: 'ABERTA', draw: NO_DRAW },
  SOMA11: { type: 'SOMA11', maxTrioHandicap: 11, draw: NO_DRAW },
};

export function isCategoryType(value: string): value is CategoryType {
  return CATEGORY_TYPES.some(type => type === value);
}

function assertNever(value: never): never {
  throw new UnknownCategoryTypeError(String(value));
}

/**
 * Individual age bounds of a category, or null when ages are not bounded per member.
 */
export function individualAgeBounds(rules: RuleSet): AgeBounds | null {
  switch (rules.type) {
    case 'BABY':
      return { min: null, max: rules.maxIndividualAge };
    case 'KIDS':
      return { min: rules.minIndividualAge, max: rules.maxIndividualAge };
    case 'MIRIM':
    case 'FEMININA':
    case 'ABERTA':
    case 'SOMA11':
      return null;
    default:
      return assertNever(rules);
  }
}

export function maxTrioAge(rules: RuleSet): number | null {
  switch (rules.type) {
    case 'MIRIM':
      return rules.maxTrioAge;
    case 'BABY':
    case 'KIDS':
    case 'FEMININA':
    case 'ABERTA':
    case 'SOMA11':
      return null;
    default:
      return assertNever(rules);
  }
}

export function maxTrioHandicap(rules: RuleSet): number | null {
  switch (rules.type) {
    case 'SOMA11':
      return rules.maxTrioHandicap;
    case 'BABY':
    case 'KIDS':
    case 'MIRIM':
    case 'FEMININA':
    case 'ABERTA':
      return null;
    default:
      return assertNever(rules);
  }
}

export function requiredSex(rules: RuleSet): 'F' | null {
  switch (rules.type) {
    case 'FEMININA':
      return rules.requiredSex;
    case 'BABY':
    case 'KIDS':
    case 'MIRIM':
    case 'ABERTA':
    case 'SOMA11':
      return null;
    default:
      return assertNever(rules);
  }
}

/**
 * Checks the internal sanity of a rule set.
 *
 * @throws ValidationError when draw limits are inconsistent or a bound is negative
 */
export function validateRuleSet(rules: RuleSet): void {
  const { draw } = rules;
  if (draw.allowed) {
    if (draw.minCompetitors < TRIO_SIZE) {
      throw new ValidationError(`${rules.type}: draw minimum must be at least ${TRIO_SIZE} competitors`);
    }
    if (draw.minCompetitors > draw.maxCompetitors) {
      throw new ValidationError(`${rules.type}: draw minimum cannot exceed the draw maximum`);
    }
  }
  if (rules.type === 'BABY' && !(draw.allowed && draw.fullTrio)) {
    throw new ValidationError('BABY: category must use a full draw');
  }

  const ages = individualAgeBounds(rules);
  if (ages && ages.min !== null && ages.max !== null && ages.min > ages.max) {
    throw new ValidationError(`${rules.type}: minimum individual age exceeds maximum`);
  }
  const trioAge = maxTrioAge(rules);
  if (trioAge !== null && trioAge < 0) {
    throw new ValidationError(`${rules.type}: combined age limit cannot be negative`);
  }
  const trioHandicap = maxTrioHandicap(rules);
  if (trioHandicap !== null && trioHandicap < 0) {
    throw new ValidationError(`${rules.type}: combined handicap limit cannot be negative`);
  }
}

/**
 * Immutable lookup table of category rules, built once at start-up and
 * passed to every component that needs rule parameters.
 */
export class CategoryRuleSet {
  private readonly table: RuleTable;

  constructor(table: RuleTable = DEFAULT_RULE_TABLE) {
    for (const type of CATEGORY_TYPES) {
      validateRuleSet(table[type]);
    }
    this.table = deepFreeze(structuredClone(table));
  }

  /**
   * @throws UnknownCategoryTypeError if the type is not one of the fixed category types
   */
  rulesFor(categoryType: string): RuleSet {
    if (!isCategoryType(categoryType)) {
      throw new UnknownCategoryTypeError(categoryType);
    }
    return this.table[categoryType];
  }

  types(): readonly CategoryType[] {
    return CATEGORY_TYPES;
  }
}

function deepFreeze<T extends object>(value: T): T {
  for (const nested of Object.values(value)) {
    if (nested !== null && typeof nested === 'object' && !Object.isFrozen(nested)) {
      deepFreeze(nested);
    }
  }
  return Object.freeze(value);
}

export function createCategoryRuleSet(overrides: Partial<RuleTable> = {}): CategoryRuleSet {
  return new CategoryRuleSet({ ...DEFAULT_RULE_TABLE, ...overrides });
}
