import { Logger } from '@nestjs/common';
import { DomainError } from '../../ratings/rating.errors';
import { createRawRating } from '../../ratings/raw-rating';
import { RatingSource, RawRating } from '../dto/provider-record.dto';

export interface RatingCandidate {
  source: RatingSource;
  value: number | null;
  max: number;
  votes?: number | null;
}

/**
 * Builds RawRatings from parsed candidates. Absent values are skipped; values
 * off their scale are logged and skipped without failing the record.
 */
export function buildRatings(
  candidates: RatingCandidate[],
  context: { provider: string; id: string },
  logger: Logger,
): RawRating[] {
  const ratings: RawRating[] = [];
  for (const candidate of candidates) {
    if (candidate.value === null) continue;
    try {
      ratings.push(createRawRating(candidate.source, candidate.value, candidate.max, candidate.votes ?? null));
    } catch (error) {
      if (!(error instanceof DomainError)) throw error;
      logger.warn(
        `[ADAPTER] skipped rating provider=${context.provider} id=${context.id} source=${candidate.source} reason=${error.message}`,
      );
    }
  }
  return ratings;
}
