import { Logger } from '@nestjs/common';
import { ProviderRecord, RatingSource, RawRating } from '../dto/provider-record.dto';
import { OmdbEnvelopeDto, OmdbMovieDto } from '../dto/omdb.dto';
import { parseRatingText, parseVotes, parseYear, toNumber } from '../utils/parse';
import { parseEach, parsePayload } from '../utils/payload';
import { RatingCandidate, buildRatings } from '../utils/ratings';
import { createProviderRecord } from '../utils/record';
import { BaseCatalogAdapter } from './base-catalog.adapter';
import { LookupOptions } from './catalog-adapter.interface';

function text(value: string | undefined): string | null {
  if (value === undefined) return null;
  const trimmed = value.trim();
  return trimmed && trimmed.toUpperCase() !== 'N/A' ? trimmed : null;
}

/**
 * Rating candidates in the order OMDb publishes them. Later candidates for
 * the same source replace earlier ones; `Internet Movie Database` only fills
 * in when `imdbRating` is absent.
 */
export function parseOmdbRatings(movie: OmdbMovieDto): RatingCandidate[] {
  const bySource = new Map<RatingSource, RatingCandidate>();
  const imdb = toNumber(text(movie.imdbRating));
  if (imdb !== null) {
    bySource.set('imdb', { source: 'imdb', value: imdb, max: 10, votes: parseVotes(text(movie.imdbVotes)) });
  }
  const metascore = toNumber(text(movie.Metascore));
  if (metascore !== null) {
    bySource.set('metacritic', { source: 'metacritic', value: metascore, max: 100 });
  }

  for (const entry of movie.Ratings ?? []) {
    const parsed = parseRatingText(entry.Value ?? '');
    if (!parsed) continue;
    switch (entry.Source) {
      case 'Rotten Tomatoes':
        bySource.set('rotten_tomatoes', { source: 'rotten_tomatoes', ...parsed });
        break;
      case 'Metacritic':
        bySource.set('metacritic', { source: 'metacritic', ...parsed });
        break;
      case 'Internet Movie Database':
        if (imdb === null) bySource.set('imdb', { source: 'imdb', ...parsed });
        break;
      default:
        break;
    }
  }
  return [...bySource.values()];
}

/** Ratings aggregator. Native IDs are IMDb IDs, so native and cross-reference lookups coincide. */
export class OmdbAdapter extends BaseCatalogAdapter {
  readonly tag = 'ratings' as const;
  protected readonly logger = new Logger(OmdbAdapter.name);

  async searchByTitle(
    title: string,
    year: number | null = null,
    page = 1,
    options: LookupOptions = {},
  ): Promise<ProviderRecord[]> {
    const body = await this.fetch('/', { s: title, type: 'movie', y: year ?? undefined, page }, options);
    const envelope = parsePayload(OmdbEnvelopeDto, body);
    if (!envelope || envelope.Response === 'False') return [];
    return parseEach(OmdbMovieDto, envelope.Search).map((movie) => this.toRecord(movie));
  }

  async getByNativeId(id: string, options: LookupOptions = {}): Promise<ProviderRecord | null> {
    const body = await this.fetch('/', { i: id, plot: 'short' }, options);
    const envelope = parsePayload(OmdbEnvelopeDto, body);
    if (!envelope || envelope.Response === 'False') return null;

    const movie = parsePayload(OmdbMovieDto, body);
    if (!movie) return null;
    if (movie.imdbID !== id) {
      this.logger.warn(`[ADAPTER] id mismatch provider=${this.tag} requested=${id} received=${movie.imdbID}`);
      return null;
    }
    return this.toRecord(movie);
  }

  getByCrossRefId(id: string, options: LookupOptions = {}): Promise<ProviderRecord | null> {
    return this.getByNativeId(id, options);
  }

  async getRatingsByCrossRefId(id: string, options: LookupOptions = {}): Promise<Map<RatingSource, RawRating>> {
    const record = await this.getByNativeId(id, options);
    return new Map((record?.ratings ?? []).map((rating) => [rating.source, rating]));
  }

  private toRecord(movie: OmdbMovieDto): ProviderRecord {
    return createProviderRecord(this.tag, {
      nativeId: movie.imdbID,
      title: movie.Title,
      year: parseYear(movie.Year),
      crossRefId: movie.imdbID,
      ratings: buildRatings(parseOmdbRatings(movie), { provider: this.tag, id: movie.imdbID }, this.logger),
    });
  }
}
