import { Logger } from '@nestjs/common';
import { RequestGateway } from '../../gateway/request-gateway';
import { RequestError } from '../../gateway/request.errors';
import { ProviderRecord } from '../dto/provider-record.dto';
import { TmdbFindResponseDto, TmdbMovieDto, TmdbSearchResponseDto } from '../dto/tmdb.dto';
import { parseYear } from '../utils/parse';
import { parseEach, parsePayload } from '../utils/payload';
import { buildRatings } from '../utils/ratings';
import { createProviderRecord } from '../utils/record';
import { BaseCatalogAdapter } from './base-catalog.adapter';
import { LookupOptions } from './catalog-adapter.interface';

/** Primary catalog. Native IDs are TMDB movie IDs; detail records carry the IMDb ID. */
export class TmdbAdapter extends BaseCatalogAdapter {
  readonly tag = 'primary' as const;
  protected readonly logger = new Logger(TmdbAdapter.name);

  constructor(gateway: RequestGateway, private readonly language: string) {
    super(gateway);
  }

  async searchByTitle(
    title: string,
    year: number | null = null,
    page = 1,
    options: LookupOptions = {},
  ): Promise<ProviderRecord[]> {
    const body = await this.fetch(
      'search/movie',
      { query: title, year: year ?? undefined, page, language: this.language, include_adult: false },
      options,
    );
    const response = parsePayload(TmdbSearchResponseDto, body);
    if (!response) {
      this.logger.warn(`[ADAPTER] unexpected search payload provider=${this.tag} title=${title}`);
      return [];
    }
    return parseEach(TmdbMovieDto, response.results).map((movie) => this.toRecord(movie));
  }

  async getByNativeId(id: string, options: LookupOptions = {}): Promise<ProviderRecord | null> {
    let body: unknown;
    try {
      body = await this.fetch(`movie/${encodeURIComponent(id)}`, { language: this.language }, options);
    } catch (error) {
      if (error instanceof RequestError && error.status === 404) return null;
      throw error;
    }

    const movie = parsePayload(TmdbMovieDto, body);
    if (!movie) return null;
    if (String(movie.id) !== id) {
      this.logger.warn(`[ADAPTER] id mismatch provider=${this.tag} requested=${id} received=${movie.id}`);
      return null;
    }
    return this.toRecord(movie);
  }

  async getByCrossRefId(imdbId: string, options: LookupOptions = {}): Promise<ProviderRecord | null> {
    const body = await this.fetch(
      `find/${encodeURIComponent(imdbId)}`,
      { external_source: 'imdb_id', language: this.language },
      options,
    );
    const response = parsePayload(TmdbFindResponseDto, body);
    const [movie] = response ? parseEach(TmdbMovieDto, response.movie_results) : [];
    if (!movie) return null;
    // find results omit imdb_id; the detail call supplies and confirms it
    const detail = await this.getByNativeId(String(movie.id), options);
    return detail && detail.crossRefId === imdbId ? detail : null;
  }

  private toRecord(movie: TmdbMovieDto): ProviderRecord {
    const nativeId = String(movie.id);
    // vote_average 0 with no votes means "unrated"
    const average = movie.vote_average && movie.vote_average > 0 ? movie.vote_average : null;
    return createProviderRecord(this.tag, {
      nativeId,
      title: movie.title,
      originalTitle: movie.original_title,
      year: parseYear(movie.release_date),
      crossRefId: movie.imdb_id,
      ratings: buildRatings(
        [{ source: 'tmdb', value: average, max: 10, votes: movie.vote_count }],
        { provider: this.tag, id: nativeId },
        this.logger,
      ),
    });
  }
}
