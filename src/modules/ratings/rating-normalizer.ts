import { RatingSource, RawRating } from '../providers/dto/provider-record.dto';
import { assertValidScale } from './raw-rating';

export interface NormalizedRating extends RawRating {
  /** `value / max * 10`, always within [0, 10]. */
  readonly normalizedValue: number;
}

export interface WeightedResult {
  rating: number | null;
  included: RatingSource[];
  /** Sources present in the set with no configured weight. */
  excluded: RatingSource[];
}

export interface RatingSourceStats {
  sourcesCount: number;
  minRating: number | null;
  maxRating: number | null;
  avgRating: number | null;
  sources: Partial<
    Record<RatingSource, { value: number; max: number; normalizedValue: number; votes: number | null }>
  >;
}

export function roundHalfUp(value: number, digits = 2): number {
  const shifted = Number(`${value}e${digits}`);
  if (!Number.isFinite(shifted)) {
    const factor = 10 ** digits;
    return Math.round(value * factor) / factor;
  }
  return Number(`${Math.round(shifted)}e-${digits}`);
}

export function normalize(rating: RawRating): NormalizedRating {
  assertValidScale(rating.source, rating.value, rating.max);
  return {
    source: rating.source,
    value: rating.value,
    max: rating.max,
    votes: rating.votes,
    normalizedValue: (rating.value / rating.max) * 10,
  };
}

export function computeComposite(ratings: Iterable<NormalizedRating>): number | null {
  const values = [...ratings].map((rating) => rating.normalizedValue);
  if (!values.length) return null;
  const mean = values.reduce((sum, value) => sum + value, 0) / values.length;
  return roundHalfUp(mean, 2);
}

export function computeWeighted(
  ratings: Iterable<NormalizedRating>,
  weights: Readonly<Record<string, number>>,
): WeightedResult {
  const included: RatingSource[] = [];
  const excluded: RatingSource[] = [];
  let weightedSum = 0;
  let totalWeight = 0;

  for (const rating of ratings) {
    const weight = weights[rating.source];
    if (weight === undefined) {
      excluded.push(rating.source);
      continue;
    }
    included.push(rating.source);
    weightedSum += rating.normalizedValue * weight;
    totalWeight += weight;
  }

  return {
    rating: totalWeight > 0 ? roundHalfUp(weightedSum / totalWeight, 2) : null,
    included,
    excluded,
  };
}

export function getRatingSourceStats(ratings: Iterable<NormalizedRating>): RatingSourceStats {
  const list = [...ratings];
  const stats: RatingSourceStats = {
    sourcesCount: list.length,
    minRating: null,
    maxRating: null,
    avgRating: null,
    sources: {},
  };
  if (!list.length) return stats;

  const values = list.map((rating) => rating.normalizedValue);
  stats.minRating = Math.min(...values);
  stats.maxRating = Math.max(...values);
  stats.avgRating = values.reduce((sum, value) => sum + value, 0) / values.length;

  for (const rating of list) {
    stats.sources[rating.source] = {
      value: rating.value,
      max: rating.max,
      normalizedValue: rating.normalizedValue,
      votes: rating.votes,
    };
  }
  return stats;
}
