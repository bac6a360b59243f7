import {
  assertCanRegisterRun,
  blockQuota,
  canCompete,
  newQuota,
  quotaKeyOf,
  quotaState,
  registerRun,
  runsRemaining,
  setMaxRuns,
  unblockQuota,
} from './quota';
import { QuotaBlockedError, QuotaExhaustedError, ValidationError } from './errors';
import { makeQuota, TEST_NOW } from './testData';

describe('ParticipationQuota', () => {
  it('should never report negative remaining runs', () => {
    expect(runsRemaining(5, 2)).toBe(3);
    expect(runsRemaining(2, 3)).toBe(0);
  });

  it('should create an active quota with every run available', () => {
    expect(newQuota({ competitorId: 4, eventId: 2, categoryId: 6 }, 5)).toEqual({
      competitorId: 4,
      eventId: 2,
      categoryId: 6,
      maxRunsAllowed: 5,
      runsExecuted: 0,
      runsRemaining: 5,
      mayCompete: true,
      blockReason: null,
      lastRunAt: null,
    });
  });

  it('should reject a non-positive run limit', () => {
    expect(() => newQuota({ competitorId: 1, eventId: 1, categoryId: 1 }, 0)).toThrow(ValidationError);
    expect(() => newQuota({ competitorId: 1, eventId: 1, categoryId: 1 }, 1.5)).toThrow(ValidationError);
  });

  it('should key quotas by competitor, event and category', () => {
    expect(quotaKeyOf({ competitorId: 4, eventId: 2, categoryId: 6 })).toBe('4:2:6');
  });

  describe('registerRun', () => {
    it('should allow two runs on a limit of 2 and refuse the third', () => {
      const first = registerRun(makeQuota({ maxRunsAllowed: 2, runsRemaining: 2 }), TEST_NOW);
      expect(first.runsExecuted).toBe(1);
      expect(first.runsRemaining).toBe(1);
      expect(quotaState(first)).toBe('ACTIVE');

      const second = registerRun(first, TEST_NOW);
      expect(second.runsExecuted).toBe(2);
      expect(second.runsRemaining).toBe(0);
      expect(quotaState(second)).toBe('EXHAUSTED');

      expect(() => registerRun(second, TEST_NOW)).toThrow(QuotaExhaustedError);
      expect(() => registerRun(second, TEST_NOW)).toThrow('Competitor 1 has used all 2 allowed runs');
    });

    it('should keep remaining equal to limit minus executed after every run', () => {
      let quota = makeQuota({ maxRunsAllowed: 4, runsRemaining: 4 });
      while (quota.runsRemaining > 0) {
        quota = registerRun(quota, TEST_NOW);
        expect(quota.runsRemaining).toBe(quota.maxRunsAllowed - quota.runsExecuted);
      }
      expect(quota.runsExecuted).toBe(4);
    });

    it('should stamp the time of the run', () => {
      expect(registerRun(makeQuota(), TEST_NOW).lastRunAt).toBe('2025-03-01T12:00:00.000Z');
    });

    it('should not mutate the given quota', () => {
      const quota = makeQuota();
      registerRun(quota, TEST_NOW);
      expect(quota.runsExecuted).toBe(0);
    });

    it('should refuse a blocked competitor before checking the limit', () => {
      const quota = makeQuota({ runsExecuted: 2, runsRemaining: 0, mayCompete: false, blockReason: 'Unpaid entry' });
      expect(() => assertCanRegisterRun(quota)).toThrow(QuotaBlockedError);
      expect(() => assertCanRegisterRun(quota)).toThrow('Competitor 1 is blocked: Unpaid entry');
    });
  });

  describe('block and unblock', () => {
    it('should require a reason to block', () => {
      expect(() => blockQuota(makeQuota(), '   ')).toThrow('A reason is required to block a competitor');
    });

    it('should move between BLOCKED and ACTIVE', () => {
      const blocked = blockQuota(makeQuota(), '  Injured horse ');
      expect(blocked.mayCompete).toBe(false);
      expect(blocked.blockReason).toBe('Injured horse');
      expect(quotaState(blocked)).toBe('BLOCKED');

      const unblocked = unblockQuota(blocked);
      expect(unblocked.mayCompete).toBe(true);
      expect(unblocked.blockReason).toBeNull();
      expect(quotaState(unblocked)).toBe('ACTIVE');
    });
  });

  describe('setMaxRuns', () => {
    const used = makeQuota({ maxRunsAllowed: 5, runsExecuted: 3, runsRemaining: 2 });

    it('should recompute remaining runs when raising the limit', () => {
      expect(setMaxRuns(used, 6).runsRemaining).toBe(3);
    });

    it('should need an override to go below the executed runs', () => {
      expect(() => setMaxRuns(used, 2)).toThrow(
        'Competitor 1 already executed 3 runs; lowering the limit to 2 requires an override'
      );
      const overridden = setMaxRuns(used, 2, true);
      expect(overridden.maxRunsAllowed).toBe(2);
      expect(overridden.runsRemaining).toBe(0);
      expect(quotaState(overridden)).toBe('EXHAUSTED');
    });
  });

  describe('canCompete', () => {
    it('should answer UNCONFIGURED without a quota', () => {
      expect(canCompete(null)).toEqual({
        mayCompete: false,
        state: 'UNCONFIGURED',
        runsRemaining: 0,
        runsExecuted: 0,
        maxRunsAllowed: 0,
        reasons: ['No participation quota configured for this event and category'],
      });
    });

    it('should allow an active quota', () => {
      expect(canCompete(makeQuota({ runsExecuted: 1, runsRemaining: 1 }))).toEqual({
        mayCompete: true,
        state: 'ACTIVE',
        runsRemaining: 1,
        runsExecuted: 1,
        maxRunsAllowed: 2,
        reasons: [],
      });
    });

    it('should list every reason a competitor is held back', () => {
      const decision = canCompete(makeQuota({ runsExecuted: 2, runsRemaining: 0, mayCompete: false, blockReason: 'Late' }));
      expect(decision.mayCompete).toBe(false);
      expect(decision.state).toBe('BLOCKED');
      expect(decision.reasons).toEqual(['Late', 'Run limit reached']);
    });
  });
});
