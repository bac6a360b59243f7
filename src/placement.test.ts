import { computeAverage, computeNetPrize, rankResults, validAttempts } from './placement';
import { makeResult } from './testData';

describe('Placement', () => {
  describe('computeAverage', () => {
    it('should average both attempts', () => {
      expect(computeAverage({ firstAttempt: 8, secondAttempt: 10 })).toBe(9);
    });

    it('should ignore attempts without a valid time', () => {
      expect(validAttempts({ firstAttempt: 0, secondAttempt: 9.5 })).toEqual([9.5]);
      expect(computeAverage({ firstAttempt: null, secondAttempt: 9.5 })).toBe(9.5);
      expect(computeAverage({ firstAttempt: -3, secondAttempt: null })).toBeNull();
    });
  });

  describe('computeNetPrize', () => {
    it('should apply the discount percentage', () => {
      expect(computeNetPrize(1000, 5)).toBe(950);
      expect(computeNetPrize(1000, 0)).toBe(1000);
      expect(computeNetPrize(null, 5)).toBeNull();
    });
  });

  describe('rankResults', () => {
    it('should place timed entries by average and no-time entries after them', () => {
      const results = [
        makeResult(1, { firstAttempt: 42.1, secondAttempt: 42.1, averageTime: 42.1 }),
        makeResult(2, { firstAttempt: 39.8, secondAttempt: 39.8, averageTime: 39.8 }),
        makeResult(3, { noTime: true }),
      ];
      const ranked = rankResults(results);
      expect(ranked.map(r => [r.id, r.placement])).toEqual([[2, 1], [1, 2], [3, 3]]);
    });

    it('should break an average tie with the best single attempt', () => {
      const results = [
        makeResult(1, { firstAttempt: 9, secondAttempt: 11, averageTime: 10 }),
        makeResult(2, { firstAttempt: 8, secondAttempt: 12, averageTime: 10 }),
      ];
      expect(rankResults(results).map(r => r.id)).toEqual([2, 1]);
    });

    it('should keep entry order when average and best attempt are equal', () => {
      const results = [
        makeResult(5, { firstAttempt: 8, secondAttempt: 12, averageTime: 10 }),
        makeResult(3, { firstAttempt: 12, secondAttempt: 8, averageTime: 10 }),
      ];
      expect(rankResults(results).map(r => r.id)).toEqual([5, 3]);
    });

    it('should put disqualified entries after no-time entries, each in entry order', () => {
      const results = [
        makeResult(1, { disqualified: true, firstAttempt: 5, averageTime: 5 }),
        makeResult(2, { noTime: true }),
        makeResult(3, { firstAttempt: 20, averageTime: 20 }),
        makeResult(4, { disqualified: true }),
        makeResult(5, { noTime: true }),
      ];
      expect(rankResults(results).map(r => [r.id, r.placement])).toEqual([[3, 1], [2, 2], [5, 3], [1, 4], [4, 5]]);
    });

    it('should treat an entry without an average as no-time', () => {
      const results = [makeResult(1), makeResult(2, { firstAttempt: 12, averageTime: 12 })];
      expect(rankResults(results).map(r => r.id)).toEqual([2, 1]);
    });

    it('should place a field of only excluded entries from 1', () => {
      const results = [makeResult(1, { disqualified: true }), makeResult(2, { noTime: true })];
      expect(rankResults(results).map(r => [r.id, r.placement])).toEqual([[2, 1], [1, 2]]);
    });

    it('should return an empty list for no results', () => {
      expect(rankResults([])).toEqual([]);
    });

    it('should be idempotent and leave the input untouched', () => {
      const results = [
        makeResult(1, { firstAttempt: 12, averageTime: 12 }),
        makeResult(2, { firstAttempt: 11, averageTime: 11 }),
      ];
      const once = rankResults(results);
      const twice = rankResults(once);
      expect(twice.map(r => [r.id, r.placement])).toEqual(once.map(r => [r.id, r.placement]));
      expect(results[0].placement).toBeNull();
    });
  });
});
