import { CanCompeteDecision, ParticipationQuota, QuotaKey, QuotaState } from './types';
import { QuotaBlockedError, QuotaExhaustedError, ValidationError } from './errors';

/**
 * A quota before the store assigns its id and version.
 */
export type QuotaDraft = Omit<ParticipationQuota, 'id' | 'version'>;

export function runsRemaining(maxRunsAllowed: number, runsExecuted: number): number {
  return Math.max(0, maxRunsAllowed - runsExecuted);
}

/**
 * ACTIVE, EXHAUSTED or BLOCKED. An administrative block wins over exhaustion.
 */
export function quotaState(quota: ParticipationQuota): QuotaState {
  if (!quota.mayCompete) return 'BLOCKED';
  if (quota.runsRemaining === 0) return 'EXHAUSTED';
  return 'ACTIVE';
}

function assertMaxRuns(maxRuns: number): void {
  if (!Number.isInteger(maxRuns) || maxRuns < 1) {
    throw new ValidationError(`Maximum runs must be a positive integer, got ${maxRuns}`);
  }
}

export function newQuota(key: QuotaKey, maxRuns: number): QuotaDraft {
  assertMaxRuns(maxRuns);
  return {
    ...key,
    maxRunsAllowed: maxRuns,
    runsExecuted: 0,
    runsRemaining: maxRuns,
    mayCompete: true,
    blockReason: null,
    lastRunAt: null,
  };
}

export function quotaKeyOf(key: QuotaKey): string {
  return `${key.competitorId}:${key.eventId}:${key.categoryId}`;
}

/**
 * Throws the refusal `registerRun` would raise, without changing anything.
 *
 * @throws QuotaBlockedError if the competitor is administratively blocked
 * @throws QuotaExhaustedError if no runs remain
 */
export function assertCanRegisterRun(quota: ParticipationQuota): void {
  if (!quota.mayCompete) {
    throw new QuotaBlockedError(quota.competitorId, quota.blockReason ?? 'blocked');
  }
  if (quota.runsRemaining === 0) {
    throw new QuotaExhaustedError(quota.competitorId, quota.maxRunsAllowed);
  }
}

/**
 * Counts one executed run. Returns the next state of the quota; the caller
 * persists it with a compare-and-set on `version`.
 */
export function registerRun(quota: ParticipationQuota, at: Date = new Date()): ParticipationQuota {
  assertCanRegisterRun(quota);
  const runsExecuted = quota.runsExecuted + 1;
  return {
    ...quota,
    runsExecuted,
    runsRemaining: runsRemaining(quota.maxRunsAllowed, runsExecuted),
    lastRunAt: at.toISOString(),
  };
}

export function blockQuota(quota: ParticipationQuota, reason: string): ParticipationQuota {
  const trimmed = reason.trim();
  if (!trimmed) {
    throw new ValidationError('A reason is required to block a competitor');
  }
  return { ...quota, mayCompete: false, blockReason: trimmed };
}

export function unblockQuota(quota: ParticipationQuota): ParticipationQuota {
  return { ...quota, mayCompete: true, blockReason: null };
}

/**
 * Changes the run limit. Going below the runs already executed is an
 * administrative override and must be requested explicitly.
 */
export function setMaxRuns(quota: ParticipationQuota, maxRuns: number, override = false): ParticipationQuota {
  assertMaxRuns(maxRuns);
  if (maxRuns < quota.runsExecuted && !override) {
    throw new ValidationError(
      `Competitor ${quota.competitorId} already executed ${quota.runsExecuted} runs; lowering the limit to ${maxRuns} requires an override`
    );
  }
  return {
    ...quota,
    maxRunsAllowed: maxRuns,
    runsRemaining: runsRemaining(maxRuns, quota.runsExecuted),
  };
}

export function canCompete(quota: ParticipationQuota | null): CanCompeteDecision {
  if (!quota) {
    return {
      mayCompete: false,
      state: 'UNCONFIGURED',
      runsRemaining: 0,
      runsExecuted: 0,
      maxRunsAllowed: 0,
      reasons: ['No participation quota configured for this event and category'],
    };
  }

  const reasons: string[] = [];
  if (!quota.mayCompete) {
    reasons.push(quota.blockReason ?? 'Competitor blocked');
  }
  if (quota.runsRemaining === 0) {
    reasons.push('Run limit reached');
  }

  return {
    mayCompete: reasons.length === 0,
    state: quotaState(quota),
    runsRemaining: quota.runsRemaining,
    runsExecuted: quota.runsExecuted,
    maxRunsAllowed: quota.maxRunsAllowed,
    reasons,
  };
}
