import { createScoringEngine, DEFAULT_POINT_TABLE, PointTable, ScoringEngine } from './scoring';
import { ConsistencyError, InvalidPlacementError, ValidationError } from './errors';
import { makeResult } from './testData';

describe('ScoringEngine', () => {
  const engine = createScoringEngine();

  describe('score', () => {
    it('should follow the standard CONTEP table', () => {
      expect(engine.score(1, 12, 'ABERTA')).toBe(10);
      expect(engine.score(2, 12, 'ABERTA')).toBe(9);
      expect(engine.score(10, 12, 'ABERTA')).toBe(1);
    });

    it('should give 0 points beyond the table', () => {
      expect(engine.score(11, 12, 'ABERTA')).toBe(0);
    });

    it('should reject placements outside the field', () => {
      expect(() => engine.score(0, 5, 'ABERTA')).toThrow(InvalidPlacementError);
      expect(() => engine.score(6, 5, 'ABERTA')).toThrow('Placement 6 is outside the field of 5 entries');
      expect(() => engine.score(1.5, 5, 'ABERTA')).toThrow(InvalidPlacementError);
    });
  });

  describe('point curves', () => {
    const table: PointTable = {
      season: 'test-season',
      curves: [
        { name: 'small fields', points: [5, 3, 1], maxFieldSize: 4 },
        { name: 'youth', points: [8, 6, 4, 2], categoryTypes: ['BABY', 'KIDS'] },
      ],
      defaultCurve: [12, 10, 8],
    };
    const custom = new ScoringEngine(table);

    it('should use the first matching curve', () => {
      expect(custom.season).toBe('test-season');
      expect(custom.score(1, 3, 'KIDS')).toBe(5);
      expect(custom.score(1, 8, 'KIDS')).toBe(8);
      expect(custom.score(1, 8, 'ABERTA')).toBe(12);
    });

    it('should reject a curve that increases', () => {
      expect(() => new ScoringEngine({ ...table, curves: [{ name: 'broken', points: [3, 4] }] }))
        .toThrow("Point curve 'broken' must not increase (placement 2)");
    });

    it('should reject a non-positive prize point base', () => {
      expect(() => new ScoringEngine(DEFAULT_POINT_TABLE, { prizePointBase: 0 })).toThrow(ValidationError);
    });
  });

  describe('scoreAll', () => {
    const ranked = [
      makeResult(1, { trioId: 11, placement: 1, netPrize: 1500 }),
      makeResult(2, { trioId: 12, placement: 2, netPrize: null }),
      makeResult(3, { trioId: 13, placement: 3, noTime: true }),
    ];

    it('should score every ranked trio', () => {
      expect(engine.scoreAll(ranked, 'SOMA11')).toEqual([
        { trioId: 11, competitorId: null, eventId: 1, categoryId: 1, placement: 1, placementPoints: 10, prize: 1500, prizePoints: 15, totalPoints: 25 },
        { trioId: 12, competitorId: null, eventId: 1, categoryId: 1, placement: 2, placementPoints: 9, prize: 0, prizePoints: 0, totalPoints: 9 },
        { trioId: 13, competitorId: null, eventId: 1, categoryId: 1, placement: 3, placementPoints: 8, prize: 0, prizePoints: 0, totalPoints: 8 },
      ]);
    });

    it('should be idempotent', () => {
      expect(engine.scoreAll(ranked, 'SOMA11')).toEqual(engine.scoreAll(ranked, 'SOMA11'));
    });

    it('should refuse results without a placement', () => {
      expect(() => engine.scoreAll([makeResult(1)], 'SOMA11')).toThrow(ConsistencyError);
    });
  });

  describe('splitAmongMembers', () => {
    it('should give each member a third of the prize and the trio placement points', () => {
      const [record] = engine.scoreAll([makeResult(1, { trioId: 11, placement: 1, netPrize: 1500 })], 'ABERTA');
      const members = engine.splitAmongMembers(record, [4, 5, 6]);
      expect(members).toHaveLength(3);
      expect(members.map(m => m.competitorId)).toEqual([4, 5, 6]);
      expect(members[0]).toEqual({
        trioId: 11,
        competitorId: 4,
        eventId: 1,
        categoryId: 1,
        placement: 1,
        placementPoints: 10,
        prize: 500,
        prizePoints: 5,
        totalPoints: 15,
      });
    });
  });
});
