import { ProviderTag, RatingSource, RawRating } from '../providers/dto/provider-record.dto';

/**
 * Order in which providers claim a rating source. The first provider in this
 * list that reports a source keeps it; later reports of the same source are
 * ignored. Kinopoisk's own IMDb figure beats OMDb's for the same film.
 */
export const PROVIDER_PRECEDENCE: readonly ProviderTag[] = ['primary', 'regional', 'ratings'];

export interface ClaimedRating {
  provider: ProviderTag;
  rating: RawRating;
}

export function mergeByPrecedence(
  byProvider: Partial<Record<ProviderTag, readonly RawRating[]>>,
  precedence: readonly ProviderTag[] = PROVIDER_PRECEDENCE,
): Map<RatingSource, ClaimedRating> {
  const merged = new Map<RatingSource, ClaimedRating>();
  for (const provider of precedence) {
    for (const rating of byProvider[provider] ?? []) {
      if (!merged.has(rating.source)) {
        merged.set(rating.source, { provider, rating });
      }
    }
  }
  return merged;
}
