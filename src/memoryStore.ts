import {
  Category,
  Competitor,
  CompetitionEvent,
  ParticipationQuota,
  QuotaKey,
  RunConfiguration,
  RunResult,
  ScoreRecord,
  Trio,
} from './types';
import { CompetitionStore, QuotaFilter, ResultDraft, TransactionOptions, TrioDraft } from './store';
import { QuotaDraft, quotaKeyOf } from './quota';
import {
  ConcurrencyError,
  ConsistencyError,
  DuplicateQuotaError,
  NotFoundError,
  TransactionTimeoutError,
} from './errors';

interface Tables {
  competitors: Map<number, Competitor>;
  categories: Map<number, Category>;
  events: Map<number, CompetitionEvent>;
  runConfigurations: Map<string, RunConfiguration>;
  trios: Map<number, Trio>;
  results: Map<number, RunResult>;
  quotas: Map<number, ParticipationQuota>;
  scores: Map<string, ScoreRecord[]>;
}

/**
 * Writes made inside a transaction. For quotas the value is the version the
 * transaction started from, or null for a quota it inserted.
 */
interface WriteSet {
  trios: Set<number>;
  results: Set<number>;
  quotas: Map<number, number | null>;
  scores: Set<string>;
}

function emptyTables(): Tables {
  return {
    competitors: new Map(),
    categories: new Map(),
    events: new Map(),
    runConfigurations: new Map(),
    trios: new Map(),
    results: new Map(),
    quotas: new Map(),
    scores: new Map(),
  };
}

function emptyWriteSet(): WriteSet {
  return { trios: new Set(), results: new Set(), quotas: new Map(), scores: new Set() };
}

class IdSequence {
  private next = 1;

  take(): number {
    return this.next++;
  }
}

const pairKey = (eventId: number, categoryId: number): string => `${eventId}:${categoryId}`;

const copy = <T>(value: T): T => structuredClone(value);

/**
 * In-process implementation of the store. Transactions work on a cloned copy
 * of the tables; on commit their writes are applied to the parent in one
 * synchronous step, after checking that no quota they touched changed version
 * in the meantime.
 */
export class MemoryStore implements CompetitionStore {
  private closed = false;
  /** Only transaction forks track writes; the root store has nothing to commit into. */
  private readonly writes: WriteSet | null;

  constructor(
    private readonly defaultTimeoutMs: number = 10000,
    private readonly tables: Tables = emptyTables(),
    private readonly ids: IdSequence = new IdSequence(),
    private readonly parent: MemoryStore | null = null
  ) {
    this.writes = parent === null ? null : emptyWriteSet();
  }

  // ==========================================================================
  // Reference data (owned by the CRUD layer; loaded directly)
  // ==========================================================================

  putCompetitor(competitor: Competitor): void {
    this.tables.competitors.set(competitor.id, copy(competitor));
  }

  putCategory(category: Category): void {
    this.tables.categories.set(category.id, copy(category));
  }

  putEvent(event: CompetitionEvent): void {
    this.tables.events.set(event.id, copy(event));
  }

  putRunConfiguration(configuration: RunConfiguration): void {
    this.tables.runConfigurations.set(pairKey(configuration.eventId, configuration.categoryId), copy(configuration));
  }

  stats(): Record<keyof Tables, number> {
    return {
      competitors: this.tables.competitors.size,
      categories: this.tables.categories.size,
      events: this.tables.events.size,
      runConfigurations: this.tables.runConfigurations.size,
      trios: this.tables.trios.size,
      results: this.tables.results.size,
      quotas: this.tables.quotas.size,
      scores: this.tables.scores.size,
    };
  }

  /** Writes this transaction will apply on commit; always 0 on the root store. */
  pendingWrites(): number {
    if (!this.writes) return 0;
    return this.writes.trios.size + this.writes.results.size + this.writes.quotas.size + this.writes.scores.size;
  }

  // ==========================================================================
  // Lookups
  // ==========================================================================

  async getCompetitor(id: number): Promise<Competitor | null> {
    const competitor = this.tables.competitors.get(id);
    return competitor ? copy(competitor) : null;
  }

  async getCategory(id: number): Promise<Category | null> {
    const category = this.tables.categories.get(id);
    return category ? copy(category) : null;
  }

  async getEvent(id: number): Promise<CompetitionEvent | null> {
    const event = this.tables.events.get(id);
    return event ? copy(event) : null;
  }

  async listEvents(): Promise<CompetitionEvent[]> {
    return Array.from(this.tables.events.values(), copy).sort((a, b) => a.id - b.id);
  }

  async getRunConfiguration(eventId: number, categoryId: number): Promise<RunConfiguration | null> {
    const configuration = this.tables.runConfigurations.get(pairKey(eventId, categoryId));
    return configuration ? copy(configuration) : null;
  }

  // ==========================================================================
  // Trios
  // ==========================================================================

  async getTrio(id: number): Promise<Trio | null> {
    const trio = this.tables.trios.get(id);
    return trio && trio.deletedAt === null ? copy(trio) : null;
  }

  async listTrios(eventId: number, categoryId?: number): Promise<Trio[]> {
    return Array.from(this.tables.trios.values())
      .filter(t => t.deletedAt === null && t.eventId === eventId)
      .filter(t => categoryId === undefined || t.categoryId === categoryId)
      .sort((a, b) => a.number - b.number || a.id - b.id)
      .map(copy);
  }

  async insertTrio(draft: TrioDraft): Promise<Trio> {
    this.assertOpen();
    const trio: Trio = { ...copy(draft), id: this.ids.take(), deletedAt: null };
    this.tables.trios.set(trio.id, trio);
    this.writes?.trios.add(trio.id);
    return copy(trio);
  }

  async softDeleteTrio(id: number): Promise<Trio> {
    this.assertOpen();
    const trio = this.tables.trios.get(id);
    if (!trio || trio.deletedAt !== null) {
      throw new NotFoundError('Trio', id);
    }
    const deleted: Trio = { ...trio, deletedAt: new Date().toISOString() };
    this.tables.trios.set(id, deleted);
    this.writes?.trios.add(id);
    return copy(deleted);
  }

  // ==========================================================================
  // Results
  // ==========================================================================

  async getResult(id: number): Promise<RunResult | null> {
    const result = this.tables.results.get(id);
    return result ? copy(result) : null;
  }

  async getResultByTrio(trioId: number): Promise<RunResult | null> {
    for (const result of this.tables.results.values()) {
      if (result.trioId === trioId) return copy(result);
    }
    return null;
  }

  async listResults(eventId: number, categoryId?: number): Promise<RunResult[]> {
    return Array.from(this.tables.results.values())
      .filter(r => r.eventId === eventId)
      .filter(r => categoryId === undefined || r.categoryId === categoryId)
      .sort((a, b) => a.id - b.id)
      .map(copy);
  }

  async insertResult(draft: ResultDraft): Promise<RunResult> {
    this.assertOpen();
    const result: RunResult = { ...copy(draft), id: this.ids.take() };
    this.tables.results.set(result.id, result);
    this.writes?.results.add(result.id);
    return copy(result);
  }

  async saveResults(results: RunResult[]): Promise<void> {
    this.assertOpen();
    for (const result of results) {
      if (!this.tables.results.has(result.id)) {
        throw new NotFoundError('Result', result.id);
      }
    }
    for (const result of results) {
      this.tables.results.set(result.id, copy(result));
      this.writes?.results.add(result.id);
    }
  }

  // ==========================================================================
  // Participation quotas
  // ==========================================================================

  async getQuota(id: number): Promise<ParticipationQuota | null> {
    const quota = this.tables.quotas.get(id);
    return quota ? copy(quota) : null;
  }

  async findQuota(key: QuotaKey): Promise<ParticipationQuota | null> {
    const quota = this.findQuotaRecord(key);
    return quota ? copy(quota) : null;
  }

  async listQuotas(filter: QuotaFilter): Promise<ParticipationQuota[]> {
    return Array.from(this.tables.quotas.values())
      .filter(q => filter.competitorId === undefined || q.competitorId === filter.competitorId)
      .filter(q => filter.eventId === undefined || q.eventId === filter.eventId)
      .filter(q => filter.categoryId === undefined || q.categoryId === filter.categoryId)
      .sort((a, b) => a.id - b.id)
      .map(copy);
  }

  async insertQuota(draft: QuotaDraft): Promise<ParticipationQuota> {
    this.assertOpen();
    if (this.findQuotaRecord(draft)) {
      throw new DuplicateQuotaError(draft.competitorId, draft.eventId, draft.categoryId);
    }
    const quota: ParticipationQuota = { ...copy(draft), id: this.ids.take(), version: 1 };
    this.tables.quotas.set(quota.id, quota);
    this.writes?.quotas.set(quota.id, null);
    return copy(quota);
  }

  async compareAndSetQuota(next: ParticipationQuota): Promise<ParticipationQuota | null> {
    this.assertOpen();
    const current = this.tables.quotas.get(next.id);
    if (!current || current.version !== next.version) {
      return null;
    }
    const stored: ParticipationQuota = { ...copy(next), version: current.version + 1 };
    this.tables.quotas.set(stored.id, stored);
    if (this.writes && !this.writes.quotas.has(stored.id)) {
      this.writes.quotas.set(stored.id, current.version);
    }
    return copy(stored);
  }

  // ==========================================================================
  // Scores
  // ==========================================================================

  async saveScores(eventId: number, categoryId: number, records: ScoreRecord[]): Promise<void> {
    this.assertOpen();
    const key = pairKey(eventId, categoryId);
    this.tables.scores.set(key, copy(records));
    this.writes?.scores.add(key);
  }

  async listScores(eventId: number, categoryId?: number): Promise<ScoreRecord[]> {
    const records: ScoreRecord[] = [];
    for (const [key, bucket] of this.tables.scores.entries()) {
      const [bucketEvent, bucketCategory] = key.split(':').map(Number);
      if (bucketEvent === eventId && (categoryId === undefined || bucketCategory === categoryId)) {
        records.push(...bucket.map(copy));
      }
    }
    return records;
  }

  // ==========================================================================
  // Transactions
  // ==========================================================================

  async transaction<T>(work: (store: CompetitionStore) => Promise<T>, options: TransactionOptions = {}): Promise<T> {
    const timeoutMs = options.timeoutMs ?? this.defaultTimeoutMs;
    const tx = new MemoryStore(this.defaultTimeoutMs, structuredClone(this.tables), this.ids, this);

    let timer: NodeJS.Timeout | undefined;
    const timeoutPromise = new Promise<never>((_, reject) => {
      timer = setTimeout(() => reject(new TransactionTimeoutError(timeoutMs)), timeoutMs);
    });

    try {
      const result = await Promise.race([work(tx), timeoutPromise]);
      this.commit(tx);
      return result;
    } catch (error) {
      console.error(`[Store] Transaction rolled back: ${error instanceof Error ? error.message : String(error)}`);
      throw error;
    } finally {
      tx.closed = true;
      clearTimeout(timer);
    }
  }

  private commit(tx: MemoryStore): void {
    const writes = tx.writes;
    if (!writes) return;

    // Validate every quota write before applying anything
    for (const [id, baseVersion] of writes.quotas) {
      const written = tx.tables.quotas.get(id);
      if (!written) continue;
      if (baseVersion === null) {
        const existing = this.findQuotaRecord(written);
        if (existing && existing.id !== id) {
          throw new DuplicateQuotaError(written.competitorId, written.eventId, written.categoryId);
        }
      } else if (this.tables.quotas.get(id)?.version !== baseVersion) {
        throw new ConcurrencyError(`Quota ${id} was changed by a concurrent update`);
      }
    }

    for (const id of writes.trios) {
      this.applyWrite(this.tables.trios, tx.tables.trios, id);
      this.writes?.trios.add(id);
    }
    for (const id of writes.results) {
      this.applyWrite(this.tables.results, tx.tables.results, id);
      this.writes?.results.add(id);
    }
    for (const [id, baseVersion] of writes.quotas) {
      this.applyWrite(this.tables.quotas, tx.tables.quotas, id);
      if (this.writes && !this.writes.quotas.has(id)) {
        this.writes.quotas.set(id, baseVersion);
      }
    }
    for (const key of writes.scores) {
      this.applyWrite(this.tables.scores, tx.tables.scores, key);
      this.writes?.scores.add(key);
    }
  }

  private applyWrite<K, V>(target: Map<K, V>, source: Map<K, V>, key: K): void {
    const value = source.get(key);
    if (value !== undefined) {
      target.set(key, value);
    }
  }

  private findQuotaRecord(key: QuotaKey): ParticipationQuota | undefined {
    const wanted = quotaKeyOf(key);
    for (const quota of this.tables.quotas.values()) {
      if (quotaKeyOf(quota) === wanted) return quota;
    }
    return undefined;
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new ConsistencyError('Write attempted on a closed transaction');
    }
  }
}
