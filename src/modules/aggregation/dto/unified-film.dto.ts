import { MatchStrategy } from '../../identity/identity-resolver.service';
import { ProviderRecord, ProviderTag, SecondaryProviderTag } from '../../providers/dto/provider-record.dto';
import { NormalizedRating, RatingSourceStats } from '../../ratings/rating-normalizer';

export type AggregationState =
  | 'FETCHING_PRIMARY'
  | 'RESOLVING_SECONDARY'
  | 'COLLECTING_RATINGS'
  | 'NORMALIZING'
  | 'DONE'
  | 'FAILED';

export interface UnifiedRating extends NormalizedRating {
  /** Provider whose report of this source was kept. */
  readonly provider: ProviderTag;
}

export interface DegradedProvider {
  provider: SecondaryProviderTag;
  step: AggregationState;
  message: string;
}

export interface UnifiedFilm {
  primaryId: string;
  crossRefId: string | null;
  title: string;
  originalTitle: string | null;
  year: number | null;
  records: Partial<Record<ProviderTag, ProviderRecord>>;
  /** One entry per rating source. */
  ratings: UnifiedRating[];
  ratingsCount: number;
  compositeRating: number | null;
  weightedRating: number | null;
  /** Spread of normalized values across sources. */
  ratingStats: RatingSourceStats;
  resolution: Record<SecondaryProviderTag, MatchStrategy | null>;
  degraded: DegradedProvider[];
  aggregatedAt: string;
}
