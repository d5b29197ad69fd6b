import { RawRating } from '../providers/dto/provider-record.dto';
import {
  computeComposite,
  computeWeighted,
  getRatingSourceStats,
  normalize,
  roundHalfUp,
} from './rating-normalizer';
import { DomainError } from './rating.errors';

const raw = (source: RawRating['source'], value: number, max: number, votes: number | null = null): RawRating => ({
  source,
  value,
  max,
  votes,
});

describe('normalize', () => {
  it.each([
    [7.5, 10, 7.5],
    [89, 100, 8.9],
    [0, 5, 0],
    [5, 5, 10],
    [3.5, 5, 7],
  ])('maps %p out of %p to %p on the 0-10 scale', (value, max, expected) => {
    const rating = normalize(raw('imdb', value, max));
    expect(rating.normalizedValue).toBeCloseTo(expected, 10);
    expect(rating.normalizedValue).toBeGreaterThanOrEqual(0);
    expect(rating.normalizedValue).toBeLessThanOrEqual(10);
  });

  it('equals value / max * 10 and is stable across calls', () => {
    const input = raw('metacritic', 94, 100, 51);
    const first = normalize(input);
    expect(first).toEqual({ source: 'metacritic', value: 94, max: 100, votes: 51, normalizedValue: (94 / 100) * 10 });
    expect(normalize(input)).toEqual(first);
  });

  it.each([0, -10])('rejects a scale maximum of %p', (max) => {
    expect(() => normalize(raw('tmdb', 0, max))).toThrow(DomainError);
  });

  it('rejects values outside the scale', () => {
    expect(() => normalize(raw('tmdb', 11, 10))).toThrow(DomainError);
    expect(() => normalize(raw('tmdb', -1, 10))).toThrow(DomainError);
  });
});

describe('roundHalfUp', () => {
  it('rounds halves away from zero where binary floats would round down', () => {
    expect(roundHalfUp(1.005)).toBe(1.01);
    expect(roundHalfUp(8.125)).toBe(8.13);
    expect(roundHalfUp(8.124)).toBe(8.12);
    expect(roundHalfUp(7)).toBe(7);
  });
});

describe('computeComposite', () => {
  it('is null for an empty set', () => {
    expect(computeComposite([])).toBeNull();
  });

  it('averages normalized values to two decimals', () => {
    const ratings = [raw('tmdb', 7.5, 10), raw('rotten_tomatoes', 89, 100), raw('metacritic', 94, 100)].map(normalize);
    expect(computeComposite(ratings)).toBe(8.6);
    expect(computeComposite(ratings)).toBe(computeComposite(ratings));
  });

  it('rounds the mean half-up', () => {
    // (8.25 + 8) / 2 = 8.125
    const ratings = [raw('imdb', 8.25, 10), raw('kinopoisk', 4, 5)].map(normalize);
    expect(computeComposite(ratings)).toBe(8.13);
  });
});

describe('computeWeighted', () => {
  it('excludes sources without a weight from numerator and denominator', () => {
    const ratings = [raw('imdb', 8, 10), raw('kinopoisk', 6, 10), raw('tmdb', 1, 10)].map(normalize);
    const result = computeWeighted(ratings, { imdb: 3, kinopoisk: 1 });

    expect(result).toEqual({ rating: 7.5, included: ['imdb', 'kinopoisk'], excluded: ['tmdb'] });
  });

  it('is null when no rating carries a weight', () => {
    expect(computeWeighted([normalize(raw('tmdb', 7, 10))], { imdb: 1 }).rating).toBeNull();
  });

  it('treats an explicit zero weight as included with no influence', () => {
    const ratings = [raw('imdb', 8, 10), raw('tmdb', 2, 10)].map(normalize);
    expect(computeWeighted(ratings, { imdb: 1, tmdb: 0 })).toEqual({
      rating: 8,
      included: ['imdb', 'tmdb'],
      excluded: [],
    });
  });
});

describe('getRatingSourceStats', () => {
  it('reports nulls for an empty set', () => {
    expect(getRatingSourceStats([])).toEqual({
      sourcesCount: 0,
      minRating: null,
      maxRating: null,
      avgRating: null,
      sources: {},
    });
  });

  it('summarises normalized values per source', () => {
    const stats = getRatingSourceStats([normalize(raw('imdb', 8, 10, 1200)), normalize(raw('rotten_tomatoes', 60, 100))]);

    expect(stats.sourcesCount).toBe(2);
    expect(stats.minRating).toBe(6);
    expect(stats.maxRating).toBe(8);
    expect(stats.avgRating).toBe(7);
    expect(stats.sources.imdb).toEqual({ value: 8, max: 10, normalizedValue: 8, votes: 1200 });
  });
});
