import {
  CanCompeteDecision,
  Category,
  Competitor,
  CompetitionEvent,
  ConsistencyReport,
  EligibilityResult,
  ParticipationQuota,
  QuotaKey,
  RunResult,
  ScoreRecord,
  Trio,
} from './types';
import { CategoryRuleSet, TRIO_SIZE } from './categoryRules';
import { TrioEligibilityValidator } from './eligibility';
import { calculateAge, eligibleCategoryTypes, toIsoDate } from './competitor';
import {
  assertCanRegisterRun,
  blockQuota,
  canCompete,
  newQuota,
  registerRun,
  setMaxRuns,
  unblockQuota,
} from './quota';
import { computeAverage, computeNetPrize, rankResults } from './placement';
import { ScoringEngine } from './scoring';
import { assertDrawAllowed, planDraw } from './draw';
import { checkResultConsistency } from './consistency';
import { CompetitionStore } from './store';
import { KeyedLock } from './lock';
import { ConcurrencyError, ConsistencyError, NotFoundError, ValidationError } from './errors';

// ============================================================================
// Inputs and outcomes
// ============================================================================

export interface CompetitionServiceOptions {
  store: CompetitionStore;
  rules: CategoryRuleSet;
  scoring: ScoringEngine;
  /** Run quota used when an event/category has no active run configuration */
  defaultMaxRuns: number;
  /** Prize discount used when an event does not set its own */
  prizeDiscountPercent: number;
  transactionTimeoutMs: number;
  clock?: () => Date;
  random?: () => number;
  /** Re-reads allowed when an administrative quota update loses a race */
  maxQuotaUpdateAttempts?: number;
}

export interface CreateTrioInput {
  eventId: number;
  categoryId: number;
  competitorIds: number[];
  number?: number;
}

export interface CreateQuotaInput extends QuotaKey {
  maxRunsAllowed?: number;
}

/**
 * Administrative changes to a quota. `mayCompete: false` needs a `blockReason`,
 * which is refused on any other change; `mayCompete: true` clears any block.
 */
export interface UpdateQuotaInput {
  maxRunsAllowed?: number;
  override?: boolean;
  mayCompete?: boolean;
  blockReason?: string;
}

export interface CreateResultInput {
  trioId: number;
  prize?: number | null;
}

export interface RecordRunInput {
  /** Up to two attempt times in seconds; null for an attempt without time */
  attempts: Array<number | null>;
  noTime?: boolean;
  disqualified?: boolean;
  /** Gross prize; omitted keeps the stored one */
  prize?: number | null;
}

export interface DrawInput {
  eventId: number;
  categoryId: number;
  competitorIds: number[];
  runsPerCompetitor?: number;
}

export interface DrawOutcome {
  trios: Trio[];
  /** Drawn groups that failed the category's trio rules and were not created */
  rejected: Array<{ memberIds: number[]; reason: string }>;
  /** Competitors left out of the pool before drawing */
  excluded: Array<{ competitorId: number; reason: string }>;
  /** Competitors who got fewer trios than their run limit allowed */
  shortfall: number[];
}

const MAX_ATTEMPTS = 2;

const lockKey = (eventId: number, categoryId: number): string => `${eventId}:${categoryId}`;

// ============================================================================
// Service
// ============================================================================

/**
 * Operations of the competition engine over a store. Trio composition and
 * quota checks are validated before anything is written; placement and score
 * recomputation run per event/category under a lock and inside one
 * transaction each.
 */
export class CompetitionService {
  private readonly store: CompetitionStore;
  private readonly rules: CategoryRuleSet;
  private readonly validator: TrioEligibilityValidator;
  private readonly scoring: ScoringEngine;
  private readonly defaultMaxRuns: number;
  private readonly prizeDiscountPercent: number;
  private readonly transactionTimeoutMs: number;
  private readonly clock: () => Date;
  private readonly random: () => number;
  private readonly maxQuotaUpdateAttempts: number;
  private readonly lock = new KeyedLock();

  constructor(options: CompetitionServiceOptions) {
    this.store = options.store;
    this.rules = options.rules;
    this.validator = new TrioEligibilityValidator(options.rules);
    this.scoring = options.scoring;
    this.defaultMaxRuns = options.defaultMaxRuns;
    this.prizeDiscountPercent = options.prizeDiscountPercent;
    this.transactionTimeoutMs = options.transactionTimeoutMs;
    this.clock = options.clock ?? (() => new Date());
    this.random = options.random ?? Math.random;
    this.maxQuotaUpdateAttempts = options.maxQuotaUpdateAttempts ?? 3;
  }

  // ==========================================================================
  // Trios
  // ==========================================================================

  /**
   * Dry-run composition check. Missing records are reported as a failed
   * validation, not an error.
   *
   * @example
   * ```typescript
   * await service.validateTrio(6, [1, 2, 3]);
   * // { valid: false, reason: 'Combined handicap 12 exceeds limit 11' }
   * ```
   */
  async validateTrio(categoryId: number, competitorIds: number[]): Promise<EligibilityResult> {
    if (competitorIds.length !== TRIO_SIZE) {
      return { valid: false, reason: `A trio needs exactly ${TRIO_SIZE} competitors, got ${competitorIds.length}` };
    }
    const category = await this.store.getCategory(categoryId);
    if (!category) {
      return { valid: false, reason: `Category ${categoryId} not found` };
    }
    const members: Competitor[] = [];
    for (const id of competitorIds) {
      const competitor = await this.store.getCompetitor(id);
      if (!competitor) {
        return { valid: false, reason: `Competitor ${id} not found` };
      }
      members.push(competitor);
    }
    const [a, b, c] = members;
    return this.validator.validate(category, a, b, c, this.clock());
  }

  /**
   * Creates a trio after the same check `validateTrio` runs.
   *
   * @throws ValidationError if the composition is rejected or the number is taken
   * @throws NotFoundError if the event, category or a competitor does not exist
   */
  async createTrio(input: CreateTrioInput): Promise<Trio> {
    const { event, category } = await this.loadEventCategory(this.store, input.eventId, input.categoryId);
    const members = await this.loadTrioMembers(this.store, input.competitorIds);
    const result = this.validator.validate(category, members[0], members[1], members[2], this.clock());
    if (!result.valid) {
      throw new ValidationError(result.reason);
    }

    return this.lock.run(lockKey(event.id, category.id), () =>
      this.store.transaction(
        tx => this.insertTrio(tx, event.id, category.id, members, input.number, false),
        { timeoutMs: this.transactionTimeoutMs }
      )
    );
  }

  async deleteTrio(trioId: number): Promise<Trio> {
    const deleted = await this.store.softDeleteTrio(trioId);
    console.log(`[Trio] Deleted trio ${trioId} (event ${deleted.eventId}, category ${deleted.categoryId})`);
    return deleted;
  }

  /**
   * Random draw ("sorteio") of trios from a pool of competitors. Competitors
   * the category does not admit, or whose quota is blocked or exhausted, are
   * left out before drawing. Trios per competitor default to the run limit of
   * the event/category. Nobody joins more trios than their quota has runs left
   * once the trios they already wait to run in are counted.
   *
   * @throws ValidationError if the category forbids draws or the pool does not fit its draw rules
   */
  async drawTrios(input: DrawInput): Promise<DrawOutcome> {
    const { event, category } = await this.loadEventCategory(this.store, input.eventId, input.categoryId);
    const runsPerCompetitor = input.runsPerCompetitor ?? await this.resolveMaxRuns(this.store, event.id, category.id);
    const asOf = this.clock();

    const pool: number[] = [];
    const limits = new Map<number, number>();
    const waiting = await this.waitingTrioCounts(event.id, category.id);
    const excluded: DrawOutcome['excluded'] = [];
    const competitors = new Map<number, Competitor>();
    for (const id of input.competitorIds) {
      const competitor = await this.store.getCompetitor(id);
      if (!competitor) {
        throw new NotFoundError('Competitor', id);
      }
      competitors.set(id, competitor);
      if (!competitor.active) {
        excluded.push({ competitorId: id, reason: 'Competitor is inactive' });
        continue;
      }
      if (!this.validator.admitsMember(category, competitor, asOf)) {
        excluded.push({ competitorId: id, reason: `Competitor does not meet the ${category.type} member rules` });
        continue;
      }
      const decision = canCompete(await this.store.findQuota({ competitorId: id, eventId: event.id, categoryId: category.id }));
      if (decision.state === 'BLOCKED' || decision.state === 'EXHAUSTED') {
        excluded.push({ competitorId: id, reason: decision.reasons.join('; ') });
        continue;
      }
      if (decision.state === 'ACTIVE') {
        const left = decision.runsRemaining - (waiting.get(id) ?? 0);
        if (left <= 0) {
          excluded.push({ competitorId: id, reason: 'Remaining runs are already taken by trios waiting to run' });
          continue;
        }
        limits.set(id, left);
      }
      pool.push(id);
    }

    assertDrawAllowed(this.rules.rulesFor(category.type).draw, pool, runsPerCompetitor, limits);
    const plan = planDraw(pool, runsPerCompetitor, this.random, limits);

    const outcome = await this.lock.run(lockKey(event.id, category.id), () =>
      this.store.transaction(async tx => {
        const trios: Trio[] = [];
        const rejected: DrawOutcome['rejected'] = [];
        for (const group of plan.groups) {
          const members: [Competitor, Competitor, Competitor] = [
            this.requireMember(competitors, group[0]),
            this.requireMember(competitors, group[1]),
            this.requireMember(competitors, group[2]),
          ];
          const check = this.validator.validate(category, members[0], members[1], members[2], asOf);
          if (!check.valid) {
            rejected.push({ memberIds: [...group], reason: check.reason });
            continue;
          }
          trios.push(await this.insertTrio(tx, event.id, category.id, members, undefined, true));
        }
        return { trios, rejected };
      }, { timeoutMs: this.transactionTimeoutMs })
    );

    console.log(
      `[Draw] Event ${event.id}, category ${category.id}: ${outcome.trios.length} trios drawn from ${pool.length} competitors (${outcome.rejected.length} groups rejected)`
    );
    return { ...outcome, excluded, shortfall: plan.shortfall };
  }

  // ==========================================================================
  // Participation quotas
  // ==========================================================================

  /**
   * @throws DuplicateQuotaError if the competitor already has a quota for the event/category
   */
  async createQuota(input: CreateQuotaInput): Promise<ParticipationQuota> {
    const key: QuotaKey = { competitorId: input.competitorId, eventId: input.eventId, categoryId: input.categoryId };
    await this.requireCompetitor(this.store, key.competitorId);
    await this.loadEventCategory(this.store, key.eventId, key.categoryId);
    const maxRuns = input.maxRunsAllowed ?? await this.resolveMaxRuns(this.store, key.eventId, key.categoryId);
    const quota = await this.store.insertQuota(newQuota(key, maxRuns));
    console.log(`[Quota] Created quota ${quota.id} for competitor ${key.competitorId} (event ${key.eventId}, category ${key.categoryId}, ${maxRuns} runs)`);
    return quota;
  }

  /**
   * Applies administrative changes with a compare-and-set on the quota
   * version, re-reading the quota when another writer got there first.
   *
   * @throws ValidationError if no change is given, a block has no reason, a
   *   reason comes without a block, or the limit goes below the executed runs
   *   without `override`
   * @throws ConcurrencyError if every attempt lost against a concurrent writer
   */
  async updateQuota(quotaId: number, changes: UpdateQuotaInput): Promise<ParticipationQuota> {
    if (changes.maxRunsAllowed === undefined && changes.mayCompete === undefined) {
      throw new ValidationError('No quota changes given');
    }
    if (changes.blockReason !== undefined && changes.mayCompete !== false) {
      throw new ValidationError('A block reason is only accepted together with mayCompete: false');
    }

    for (let attempt = 1; attempt <= this.maxQuotaUpdateAttempts; attempt++) {
      const current = await this.store.getQuota(quotaId);
      if (!current) {
        throw new NotFoundError('Quota', quotaId);
      }

      let next = current;
      if (changes.maxRunsAllowed !== undefined) {
        next = setMaxRuns(next, changes.maxRunsAllowed, changes.override ?? false);
      }
      if (changes.mayCompete === false) {
        next = blockQuota(next, changes.blockReason ?? '');
      } else if (changes.mayCompete === true) {
        next = unblockQuota(next);
      }

      const stored = await this.store.compareAndSetQuota(next);
      if (stored) {
        console.log(`[Quota] Updated quota ${quotaId} (version ${stored.version})`);
        return stored;
      }
      console.warn(`[Quota] Quota ${quotaId} changed concurrently, retrying (attempt ${attempt}/${this.maxQuotaUpdateAttempts})`);
    }
    throw new ConcurrencyError(`Quota ${quotaId} kept changing concurrently; update abandoned`);
  }

  /**
   * Creates the missing quotas of a competitor for every active, future
   * event that runs their assigned category. Running it again creates nothing.
   */
  async autoProvisionQuotas(competitorId: number): Promise<ParticipationQuota[]> {
    const competitor = await this.requireCompetitor(this.store, competitorId);
    if (competitor.categoryId === null) {
      console.log(`[Quota] Competitor ${competitorId} has no category; nothing to provision`);
      return [];
    }
    const category = await this.store.getCategory(competitor.categoryId);
    if (!category) {
      throw new NotFoundError('Category', competitor.categoryId);
    }
    const now = this.clock();
    if (!category.active || !eligibleCategoryTypes(competitor, now).includes(category.type)) {
      console.log(`[Quota] Competitor ${competitorId} is not eligible for category ${category.id}; nothing to provision`);
      return [];
    }

    const today = toIsoDate(now);
    const events = (await this.store.listEvents()).filter(
      event => event.active && event.date >= today && event.categoryIds.includes(category.id)
    );

    const created = await this.store.transaction(async tx => {
      const quotas: ParticipationQuota[] = [];
      for (const event of events) {
        const key: QuotaKey = { competitorId, eventId: event.id, categoryId: category.id };
        if (await tx.findQuota(key)) continue;
        const maxRuns = await this.resolveMaxRuns(tx, event.id, category.id);
        quotas.push(await tx.insertQuota(newQuota(key, maxRuns)));
      }
      return quotas;
    }, { timeoutMs: this.transactionTimeoutMs });

    console.log(`[Quota] Provisioned ${created.length} quotas for competitor ${competitorId} across ${events.length} events`);
    return created;
  }

  async checkCanCompete(key: QuotaKey): Promise<CanCompeteDecision> {
    return canCompete(await this.store.findQuota(key));
  }

  // ==========================================================================
  // Results
  // ==========================================================================

  /**
   * @throws ValidationError if the trio already has a result
   */
  async createResult(input: CreateResultInput): Promise<RunResult> {
    const trio = await this.store.getTrio(input.trioId);
    if (!trio) {
      throw new NotFoundError('Trio', input.trioId);
    }
    if (await this.store.getResultByTrio(trio.id)) {
      throw new ValidationError(`Trio ${trio.id} already has a result`);
    }
    const event = await this.requireEvent(this.store, trio.eventId);
    const prize = input.prize ?? null;
    assertPrize(prize);

    return this.store.insertResult({
      trioId: trio.id,
      eventId: trio.eventId,
      categoryId: trio.categoryId,
      firstAttempt: null,
      secondAttempt: null,
      averageTime: null,
      noTime: false,
      disqualified: false,
      placement: null,
      prize,
      netPrize: computeNetPrize(prize, this.discountFor(event)),
    });
  }

  /**
   * Records a run for a trio and counts it against every member's quota.
   * All three quotas are checked before any is touched: one blocked or
   * exhausted member rejects the whole run.
   *
   * @throws QuotaExhaustedError if a member has no runs left
   * @throws QuotaBlockedError if a member is blocked
   * @throws ValidationError if a member has no quota or the times are invalid
   * @throws ConcurrencyError if a quota changed while the run was recorded
   */
  async recordRun(resultId: number, input: RecordRunInput): Promise<RunResult> {
    if (input.attempts.length > MAX_ATTEMPTS) {
      throw new ValidationError(`At most ${MAX_ATTEMPTS} attempts can be recorded, got ${input.attempts.length}`);
    }
    for (const time of input.attempts) {
      if (time !== null && !(Number.isFinite(time) && time > 0)) {
        throw new ValidationError(`Attempt times must be positive numbers of seconds, got ${time}`);
      }
    }
    const prize = input.prize;
    if (prize !== undefined) {
      assertPrize(prize);
    }

    const existing = await this.store.getResult(resultId);
    if (!existing) {
      throw new NotFoundError('Result', resultId);
    }

    return this.lock.run(lockKey(existing.eventId, existing.categoryId), () =>
      this.store.transaction(async tx => {
        const result = await tx.getResult(resultId);
        if (!result) {
          throw new NotFoundError('Result', resultId);
        }
        const trio = await tx.getTrio(result.trioId);
        if (!trio) {
          throw new ConsistencyError(`Result ${result.id} references trio ${result.trioId}, which is missing or deleted`);
        }
        const event = await this.requireEvent(tx, result.eventId);

        const quotas: ParticipationQuota[] = [];
        for (const competitorId of trio.memberIds) {
          const quota = await tx.findQuota({ competitorId, eventId: result.eventId, categoryId: result.categoryId });
          if (!quota) {
            throw new ValidationError(
              `Competitor ${competitorId} has no participation quota for event ${result.eventId}, category ${result.categoryId}`
            );
          }
          quotas.push(quota);
        }
        quotas.forEach(assertCanRegisterRun);

        const at = this.clock();
        for (const quota of quotas) {
          const stored = await tx.compareAndSetQuota(registerRun(quota, at));
          if (!stored) {
            throw new ConcurrencyError(`Quota ${quota.id} changed while the run was being recorded`);
          }
        }

        const firstAttempt = input.attempts[0] ?? null;
        const secondAttempt = input.attempts[1] ?? null;
        const disqualified = input.disqualified ?? false;
        const average = computeAverage({ firstAttempt, secondAttempt });
        const noTime = (input.noTime ?? false) || average === null;
        const grossPrize = prize === undefined ? result.prize : prize;

        const updated: RunResult = {
          ...result,
          firstAttempt,
          secondAttempt,
          averageTime: noTime ? null : average,
          noTime,
          disqualified,
          prize: grossPrize,
          netPrize: computeNetPrize(grossPrize, this.discountFor(event)),
        };
        await tx.saveResults([updated]);
        console.log(
          `[Run] Result ${result.id} (trio ${trio.id}): ${noTime ? 'no time' : `average ${average}s`}${disqualified ? ', disqualified' : ''}`
        );
        return updated;
      }, { timeoutMs: this.transactionTimeoutMs })
    );
  }

  // ==========================================================================
  // Placements and scores
  // ==========================================================================

  /**
   * Ranks the results of an event, per category, and stores the placements.
   * Each category is ranked from one snapshot and written in one batch; a
   * result pointing at a missing trio aborts that category's batch.
   *
   * @param categoryId - Limit to one category; all categories with results when omitted
   * @throws ConsistencyError if a result references a deleted trio
   */
  async recomputePlacements(eventId: number, categoryId?: number): Promise<RunResult[]> {
    await this.requireEvent(this.store, eventId);
    const ranked: RunResult[] = [];

    for (const category of await this.categoriesToProcess(eventId, categoryId)) {
      const startTime = Date.now();
      const batch = await this.withCategoryBatch(eventId, category, '[Placement]', async tx => {
        const results = await tx.listResults(eventId, category);
        for (const result of results) {
          if (!(await tx.getTrio(result.trioId))) {
            throw new ConsistencyError(
              `Result ${result.id} references trio ${result.trioId}, which is missing or deleted`
            );
          }
        }
        const placed = rankResults(results);
        await tx.saveResults(placed);
        return placed;
      });
      console.log(`[Placement] Event ${eventId}, category ${category}: ranked ${batch.length} results in ${Date.now() - startTime}ms`);
      ranked.push(...batch);
    }
    return ranked;
  }

  /**
   * Computes CONTEP points from the stored placements: one trio-level record
   * followed by one record per member, then replaces the stored scores of
   * each category.
   *
   * @throws ConsistencyError if a result has no placement or its trio is gone
   */
  async computeScores(eventId: number, categoryId?: number): Promise<ScoreRecord[]> {
    await this.requireEvent(this.store, eventId);
    const records: ScoreRecord[] = [];

    for (const category of await this.categoriesToProcess(eventId, categoryId)) {
      const startTime = Date.now();
      const batch = await this.withCategoryBatch(eventId, category, '[Scoring]', async tx => {
        const type = (await this.requireCategory(tx, category)).type;
        const results = (await tx.listResults(eventId, category))
          .sort((a, b) => (a.placement ?? Infinity) - (b.placement ?? Infinity));
        const scored: ScoreRecord[] = [];
        for (const record of this.scoring.scoreAll(results, type)) {
          const trio = await tx.getTrio(record.trioId);
          if (!trio) {
            throw new ConsistencyError(`Score for trio ${record.trioId} cannot be split: trio is missing or deleted`);
          }
          scored.push(record, ...this.scoring.splitAmongMembers(record, trio.memberIds));
        }
        await tx.saveScores(eventId, category, scored);
        return scored;
      });
      console.log(`[Scoring] Event ${eventId}, category ${category}: ${batch.length} score records in ${Date.now() - startTime}ms`);
      records.push(...batch);
    }
    return records;
  }

  async consistencyReport(eventId: number): Promise<ConsistencyReport> {
    await this.requireEvent(this.store, eventId);
    const results = await this.store.listResults(eventId);
    const trios = await this.store.listTrios(eventId);
    const report = checkResultConsistency(eventId, results, trios);
    if (!report.valid) {
      console.warn(`[Consistency] Event ${eventId}: ${report.issues.length} issues found`);
    }
    return report;
  }

  // ==========================================================================
  // Helpers
  // ==========================================================================

  private async withCategoryBatch<T>(
    eventId: number,
    categoryId: number,
    prefix: string,
    work: (tx: CompetitionStore) => Promise<T>
  ): Promise<T> {
    try {
      return await this.lock.run(lockKey(eventId, categoryId), () =>
        this.store.transaction(work, { timeoutMs: this.transactionTimeoutMs })
      );
    } catch (error) {
      if (error instanceof ConsistencyError) {
        console.error(`${prefix} Event ${eventId}, category ${categoryId}: batch rolled back: ${error.message}`);
      }
      throw error;
    }
  }

  private async categoriesToProcess(eventId: number, categoryId?: number): Promise<number[]> {
    if (categoryId !== undefined) {
      await this.requireCategory(this.store, categoryId);
      return [categoryId];
    }
    const results = await this.store.listResults(eventId);
    return Array.from(new Set(results.map(result => result.categoryId))).sort((a, b) => a - b);
  }

  private async insertTrio(
    tx: CompetitionStore,
    eventId: number,
    categoryId: number,
    members: [Competitor, Competitor, Competitor],
    requestedNumber: number | undefined,
    drawn: boolean
  ): Promise<Trio> {
    const existing = await tx.listTrios(eventId, categoryId);
    let number: number;
    if (requestedNumber !== undefined) {
      if (!Number.isInteger(requestedNumber) || requestedNumber < 1) {
        throw new ValidationError(`Trio number must be a positive integer, got ${requestedNumber}`);
      }
      if (existing.some(trio => trio.number === requestedNumber)) {
        throw new ValidationError(`Trio number ${requestedNumber} is already used in this event and category`);
      }
      number = requestedNumber;
    } else {
      number = existing.reduce((max, trio) => Math.max(max, trio.number), 0) + 1;
    }

    const asOf = this.clock();
    const trio = await tx.insertTrio({
      eventId,
      categoryId,
      number,
      memberIds: [members[0].id, members[1].id, members[2].id],
      handicapTotal: members.reduce((sum, m) => sum + m.handicap, 0),
      ageTotal: members.reduce((sum, m) => sum + calculateAge(m.birthDate, asOf), 0),
      drawn,
    });
    console.log(`[Trio] Created trio ${trio.number} (id ${trio.id}) for event ${eventId}, category ${categoryId}${drawn ? ' by draw' : ''}`);
    return trio;
  }

  private async loadTrioMembers(
    store: CompetitionStore,
    competitorIds: number[]
  ): Promise<[Competitor, Competitor, Competitor]> {
    if (competitorIds.length !== TRIO_SIZE) {
      throw new ValidationError(`A trio needs exactly ${TRIO_SIZE} competitors, got ${competitorIds.length}`);
    }
    const [a, b, c] = competitorIds;
    return [
      await this.requireCompetitor(store, a),
      await this.requireCompetitor(store, b),
      await this.requireCompetitor(store, c),
    ];
  }

  private requireMember(competitors: Map<number, Competitor>, id: number): Competitor {
    const competitor = competitors.get(id);
    if (!competitor) {
      throw new NotFoundError('Competitor', id);
    }
    return competitor;
  }

  private async loadEventCategory(
    store: CompetitionStore,
    eventId: number,
    categoryId: number
  ): Promise<{ event: CompetitionEvent; category: Category }> {
    const event = await this.requireEvent(store, eventId);
    const category = await this.requireCategory(store, categoryId);
    if (!event.categoryIds.includes(category.id)) {
      throw new ValidationError(`Category ${category.id} is not run at event ${event.id}`);
    }
    return { event, category };
  }

  private async requireCompetitor(store: CompetitionStore, id: number): Promise<Competitor> {
    const competitor = await store.getCompetitor(id);
    if (!competitor) {
      throw new NotFoundError('Competitor', id);
    }
    return competitor;
  }

  private async requireCategory(store: CompetitionStore, id: number): Promise<Category> {
    const category = await store.getCategory(id);
    if (!category) {
      throw new NotFoundError('Category', id);
    }
    return category;
  }

  private async requireEvent(store: CompetitionStore, id: number): Promise<CompetitionEvent> {
    const event = await store.getEvent(id);
    if (!event) {
      throw new NotFoundError('Event', id);
    }
    return event;
  }

  /**
   * Live trios per competitor that have not run yet: no result, or a result
   * with nothing recorded on it.
   */
  private async waitingTrioCounts(eventId: number, categoryId: number): Promise<Map<number, number>> {
    const [trios, results] = await Promise.all([
      this.store.listTrios(eventId, categoryId),
      this.store.listResults(eventId, categoryId),
    ]);
    const ran = new Set(
      results
        .filter(r => r.firstAttempt !== null || r.secondAttempt !== null || r.noTime || r.disqualified)
        .map(r => r.trioId)
    );
    const counts = new Map<number, number>();
    for (const trio of trios) {
      if (ran.has(trio.id)) continue;
      for (const id of trio.memberIds) {
        counts.set(id, (counts.get(id) ?? 0) + 1);
      }
    }
    return counts;
  }

  private async resolveMaxRuns(store: CompetitionStore, eventId: number, categoryId: number): Promise<number> {
    const configuration = await store.getRunConfiguration(eventId, categoryId);
    return configuration && configuration.active ? configuration.maxRunsPerCompetitor : this.defaultMaxRuns;
  }

  private discountFor(event: CompetitionEvent): number {
    return event.prizeDiscountPercent ?? this.prizeDiscountPercent;
  }
}

function assertPrize(prize: number | null): void {
  if (prize !== null && !(Number.isFinite(prize) && prize >= 0)) {
    throw new ValidationError(`Prize must be a non-negative amount, got ${prize}`);
  }
}
