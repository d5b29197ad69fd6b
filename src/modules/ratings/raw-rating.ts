import { RatingSource, RawRating } from '../providers/dto/provider-record.dto';
import { DomainError } from './rating.errors';

export function assertValidScale(source: string, value: number, max: number): void {
  if (!Number.isFinite(max) || max <= 0) {
    throw new DomainError(`Rating scale for ${source} must be positive, got max=${max}`);
  }
  if (!Number.isFinite(value) || value < 0 || value > max) {
    throw new DomainError(`Rating value for ${source} must be within [0, ${max}], got ${value}`);
  }
}

export function createRawRating(
  source: RatingSource,
  value: number,
  max: number,
  votes: number | null = null,
): RawRating {
  assertValidScale(source, value, max);
  const count = votes !== null && Number.isFinite(votes) && votes >= 0 ? Math.trunc(votes) : null;
  return Object.freeze({ source, value, max, votes: count });
}
