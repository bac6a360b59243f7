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
import { QuotaDraft } from './quota';

export type TrioDraft = Omit<Trio, 'id' | 'deletedAt'>;
export type ResultDraft = Omit<RunResult, 'id'>;

export interface QuotaFilter {
  competitorId?: number;
  eventId?: number;
  categoryId?: number;
}

export interface TransactionOptions {
  timeoutMs?: number;
}

/**
 * Persistence collaborator used by the competition service. Records are
 * keyed by numeric ids; every read returns a copy.
 */
export interface CompetitionStore {
  getCompetitor(id: number): Promise<Competitor | null>;
  getCategory(id: number): Promise<Category | null>;
  getEvent(id: number): Promise<CompetitionEvent | null>;
  listEvents(): Promise<CompetitionEvent[]>;
  getRunConfiguration(eventId: number, categoryId: number): Promise<RunConfiguration | null>;

  getTrio(id: number): Promise<Trio | null>;
  listTrios(eventId: number, categoryId?: number): Promise<Trio[]>;
  insertTrio(draft: TrioDraft): Promise<Trio>;
  softDeleteTrio(id: number): Promise<Trio>;

  getResult(id: number): Promise<RunResult | null>;
  getResultByTrio(trioId: number): Promise<RunResult | null>;
  listResults(eventId: number, categoryId?: number): Promise<RunResult[]>;
  insertResult(draft: ResultDraft): Promise<RunResult>;
  /** Replaces the given results in one write. */
  saveResults(results: RunResult[]): Promise<void>;

  getQuota(id: number): Promise<ParticipationQuota | null>;
  findQuota(key: QuotaKey): Promise<ParticipationQuota | null>;
  listQuotas(filter: QuotaFilter): Promise<ParticipationQuota[]>;
  /** @throws DuplicateQuotaError if a quota already exists for the key */
  insertQuota(draft: QuotaDraft): Promise<ParticipationQuota>;
  /**
   * Writes `next` only if the stored version still equals `next.version`,
   * bumping the version. Returns null when another writer got there first.
   */
  compareAndSetQuota(next: ParticipationQuota): Promise<ParticipationQuota | null>;

  /** Replaces all score records of an event/category. */
  saveScores(eventId: number, categoryId: number, records: ScoreRecord[]): Promise<void>;
  listScores(eventId: number, categoryId?: number): Promise<ScoreRecord[]>;

  /**
   * Runs `work` against an isolated view of the store and commits its writes
   * at once. An error or timeout discards every write made inside.
   */
  transaction<T>(work: (store: CompetitionStore) => Promise<T>, options?: TransactionOptions): Promise<T>;
}
