export type ProviderTag = 'primary' | 'ratings' | 'regional';
export type SecondaryProviderTag = Exclude<ProviderTag, 'primary'>;

export const PROVIDER_TAGS: readonly ProviderTag[] = ['primary', 'ratings', 'regional'];

export const RATING_SOURCES = ['tmdb', 'imdb', 'rotten_tomatoes', 'metacritic', 'kinopoisk', 'film_critics'] as const;

export type RatingSource = (typeof RATING_SOURCES)[number];

export function isRatingSource(value: string): value is RatingSource {
  return (RATING_SOURCES as readonly string[]).includes(value);
}

export interface RawRating {
  readonly source: RatingSource;
  readonly value: number;
  readonly max: number;
  readonly votes: number | null;
}

export interface ProviderRecord {
  readonly provider: ProviderTag;
  readonly nativeId: string;
  readonly title: string;
  readonly originalTitle: string | null;
  readonly year: number | null;
  readonly crossRefId: string | null;
  readonly ratings: readonly RawRating[];
}
