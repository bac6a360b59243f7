import { calculateAge, eligibleCategoryTypes, isValidHandicap, parseIsoDate, toIsoDate } from './competitor';
import { ValidationError } from './errors';
import { Competitor } from './types';

describe('Competitor helpers', () => {
  describe('parseIsoDate', () => {
    it('should split a calendar date', () => {
      expect(parseIsoDate('2012-02-29')).toEqual({ year: 2012, month: 2, day: 29 });
    });

    it('should reject malformed and impossible dates', () => {
      expect(() => parseIsoDate('29/02/2012')).toThrow(ValidationError);
      expect(() => parseIsoDate('2013-02-29')).toThrow("Invalid date '2013-02-29'");
    });
  });

  describe('calculateAge', () => {
    it('should not count a birthday not yet reached', () => {
      expect(calculateAge('2010-06-15', new Date('2024-06-14T12:00:00Z'))).toBe(13);
      expect(calculateAge('2010-06-15', new Date('2024-06-15T12:00:00Z'))).toBe(14);
    });

    it('should handle a birthday later in the same month', () => {
      expect(calculateAge('2000-03-20', new Date('2025-03-01T00:00:00Z'))).toBe(24);
    });
  });

  it('should format dates as YYYY-MM-DD', () => {
    expect(toIsoDate(new Date('2025-03-01T23:59:00Z'))).toBe('2025-03-01');
  });

  it('should accept handicaps from 0 to 7 only', () => {
    expect(isValidHandicap(0)).toBe(true);
    expect(isValidHandicap(7)).toBe(true);
    expect(isValidHandicap(8)).toBe(false);
    expect(isValidHandicap(-1)).toBe(false);
    expect(isValidHandicap(2.5)).toBe(false);
  });

  describe('eligibleCategoryTypes', () => {
    const asOf = new Date('2025-03-01T12:00:00Z');
    const base: Competitor = {
      id: 1,
      name: 'Competitor 1',
      birthDate: '1990-01-01',
      handicap: 3,
      sex: 'M',
      active: true,
      categoryId: null,
    };

    it('should list open categories for an adult man', () => {
      expect(eligibleCategoryTypes(base, asOf)).toEqual(['ABERTA', 'MIRIM', 'SOMA11']);
    });

    it('should add BABY for a child of 12 or younger', () => {
      expect(eligibleCategoryTypes({ ...base, birthDate: '2013-01-01' }, asOf))
        .toEqual(['ABERTA', 'BABY', 'MIRIM', 'SOMA11']);
    });

    it('should add KIDS and FEMININA for a 15 year old girl', () => {
      expect(eligibleCategoryTypes({ ...base, birthDate: '2010-01-01', sex: 'F' }, asOf))
        .toEqual(['ABERTA', 'KIDS', 'MIRIM', 'SOMA11', 'FEMININA']);
    });
  });
});
