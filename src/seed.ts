import fs from 'fs';
import { Category, Competitor, CompetitionEvent, RunConfiguration } from './types';
import { isCategoryType } from './categoryRules';
import { isValidHandicap, parseIsoDate } from './competitor';
import { MemoryStore } from './memoryStore';
import { ValidationError } from './errors';

/**
 * Reference data loaded into the in-memory store at start-up. In a full
 * deployment these records are owned by the CRUD layer.
 */
export interface SeedData {
  competitors: Competitor[];
  categories: Category[];
  events: CompetitionEvent[];
  runConfigurations: RunConfiguration[];
}

type Json = Record<string, unknown>;

function isRecord(value: unknown): value is Json {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function field<T>(record: Json, key: string, check: (value: unknown) => value is T, where: string): T {
  const value = record[key];
  if (!check(value)) {
    throw new ValidationError(`Seed ${where}: invalid '${key}'`);
  }
  return value;
}

const isId = (value: unknown): value is number => Number.isInteger(value) && typeof value === 'number' && value > 0;
const isString = (value: unknown): value is string => typeof value === 'string' && value.length > 0;
const isBoolean = (value: unknown): value is boolean => typeof value === 'boolean';
const isDate = (value: unknown): value is string => {
  if (typeof value !== 'string') return false;
  try {
    parseIsoDate(value);
    return true;
  } catch {
    return false;
  }
};
const isIdOrNull = (value: unknown): value is number | null => value === null || isId(value);
const isPercentOrNull = (value: unknown): value is number | null =>
  value === null || (typeof value === 'number' && value >= 0 && value <= 100);
const isIdList = (value: unknown): value is number[] => Array.isArray(value) && value.every(isId);
const isSex = (value: unknown): value is 'M' | 'F' => value === 'M' || value === 'F';
const isHandicap = (value: unknown): value is number => typeof value === 'number' && isValidHandicap(value);
const isTypeName = (value: unknown): value is Category['type'] => typeof value === 'string' && isCategoryType(value);

function list(raw: Json, key: string): Json[] {
  const value = raw[key] ?? [];
  if (!Array.isArray(value) || !value.every(isRecord)) {
    throw new ValidationError(`Seed: '${key}' must be a list of objects`);
  }
  return value;
}

/**
 * Validates parsed JSON into seed records.
 *
 * @throws ValidationError naming the first invalid record and field
 */
export function parseSeed(raw: unknown): SeedData {
  if (!isRecord(raw)) {
    throw new ValidationError('Seed must be a JSON object');
  }

  const competitors = list(raw, 'competitors').map((record, index): Competitor => {
    const where = `competitor #${index + 1}`;
    return {
      id: field(record, 'id', isId, where),
      name: field(record, 'name', isString, where),
      birthDate: field(record, 'birthDate', isDate, where),
      handicap: field(record, 'handicap', isHandicap, where),
      sex: field(record, 'sex', isSex, where),
      active: record.active === undefined ? true : field(record, 'active', isBoolean, where),
      categoryId: record.categoryId === undefined ? null : field(record, 'categoryId', isIdOrNull, where),
    };
  });

  const categories = list(raw, 'categories').map((record, index): Category => {
    const where = `category #${index + 1}`;
    return {
      id: field(record, 'id', isId, where),
      name: field(record, 'name', isString, where),
      type: field(record, 'type', isTypeName, where),
      active: record.active === undefined ? true : field(record, 'active', isBoolean, where),
    };
  });

  const events = list(raw, 'events').map((record, index): CompetitionEvent => {
    const where = `event #${index + 1}`;
    return {
      id: field(record, 'id', isId, where),
      name: field(record, 'name', isString, where),
      date: field(record, 'date', isDate, where),
      active: record.active === undefined ? true : field(record, 'active', isBoolean, where),
      prizeDiscountPercent: record.prizeDiscountPercent === undefined
        ? null
        : field(record, 'prizeDiscountPercent', isPercentOrNull, where),
      categoryIds: field(record, 'categoryIds', isIdList, where),
    };
  });

  const runConfigurations = list(raw, 'runConfigurations').map((record, index): RunConfiguration => {
    const where = `run configuration #${index + 1}`;
    return {
      eventId: field(record, 'eventId', isId, where),
      categoryId: field(record, 'categoryId', isId, where),
      maxRunsPerCompetitor: field(record, 'maxRunsPerCompetitor', isId, where),
      active: record.active === undefined ? true : field(record, 'active', isBoolean, where),
    };
  });

  return { competitors, categories, events, runConfigurations };
}

export function loadSeedFile(filePath: string): SeedData {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (error) {
    throw new ValidationError(`Could not read seed file ${filePath}`, error);
  }
  return parseSeed(raw);
}

export function applySeed(store: MemoryStore, seed: SeedData): void {
  seed.categories.forEach(category => store.putCategory(category));
  seed.competitors.forEach(competitor => store.putCompetitor(competitor));
  seed.events.forEach(event => store.putEvent(event));
  seed.runConfigurations.forEach(configuration => store.putRunConfiguration(configuration));
  console.log(
    `[Seed] Loaded ${seed.competitors.length} competitors, ${seed.categories.length} categories, ${seed.events.length} events`
  );
}
