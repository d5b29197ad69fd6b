import { parseRatingText, parseVotes, parseYear, toNumber } from './parse';

describe('parse utils', () => {
  it('reads numbers from numbers and numeric strings only', () => {
    expect(toNumber('7.9')).toBe(7.9);
    expect(toNumber(8)).toBe(8);
    expect(toNumber('  ')).toBeNull();
    expect(toNumber('N/A')).toBeNull();
    expect(toNumber(null)).toBeNull();
  });

  it('reads the leading year', () => {
    expect(parseYear('1995-12-15')).toBe(1995);
    expect(parseYear('2010–2014')).toBe(2010);
    expect(parseYear(1999)).toBe(1999);
    expect(parseYear('')).toBeNull();
    expect(parseYear(undefined)).toBeNull();
  });

  it('reads comma-grouped vote counts', () => {
    expect(parseVotes('1,234,567')).toBe(1234567);
    expect(parseVotes('N/A')).toBeNull();
  });

  describe('parseRatingText', () => {
    it('reads percentages on a 100 scale', () => {
      expect(parseRatingText('89%')).toEqual({ value: 89, max: 100 });
    });

    it('reads x/y with its own scale', () => {
      expect(parseRatingText('7.9/10')).toEqual({ value: 7.9, max: 10 });
      expect(parseRatingText('94/100')).toEqual({ value: 94, max: 100 });
    });

    it('drops N/A and unrecognised text instead of coercing to zero', () => {
      expect(parseRatingText('N/A')).toBeNull();
      expect(parseRatingText('')).toBeNull();
      expect(parseRatingText('great')).toBeNull();
      expect(parseRatingText('N/A/10')).toBeNull();
    });
  });
});
