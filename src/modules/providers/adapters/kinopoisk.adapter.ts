import { Logger } from '@nestjs/common';
import { RequestError } from '../../gateway/request.errors';
import { ProviderRecord, RawRating } from '../dto/provider-record.dto';
import { KinopoiskFilmDto, KinopoiskListDto } from '../dto/kinopoisk.dto';
import { parseEach, parsePayload } from '../utils/payload';
import { RatingCandidate, buildRatings } from '../utils/ratings';
import { createProviderRecord } from '../utils/record';
import { sanitizeTitle } from '../utils/title';
import { BaseCatalogAdapter } from './base-catalog.adapter';
import { CrossRefLookupOptions, LookupOptions } from './catalog-adapter.interface';

// null and 0 both mean "not rated yet"
function rated(value: number | null | undefined): number | null {
  return value ? value : null;
}

/** Regional catalog with its own ID space; films optionally carry an IMDb ID. */
export class KinopoiskAdapter extends BaseCatalogAdapter {
  readonly tag = 'regional' as const;
  protected readonly logger = new Logger(KinopoiskAdapter.name);

  async searchByTitle(
    title: string,
    year: number | null = null,
    page = 1,
    options: LookupOptions = {},
  ): Promise<ProviderRecord[]> {
    const body = await this.fetch(
      'films',
      { keyword: title, page, yearFrom: year ?? undefined, yearTo: year ?? undefined },
      options,
    );
    return this.parseList(body);
  }

  async getByNativeId(id: string, options: LookupOptions = {}): Promise<ProviderRecord | null> {
    let body: unknown;
    try {
      body = await this.fetch(`films/${encodeURIComponent(id)}`, {}, options);
    } catch (error) {
      if (error instanceof RequestError && error.status === 404) return null;
      throw error;
    }

    const film = parsePayload(KinopoiskFilmDto, body);
    if (!film) return null;
    if (String(film.kinopoiskId) !== id) {
      this.logger.warn(`[ADAPTER] id mismatch provider=${this.tag} requested=${id} received=${film.kinopoiskId}`);
      return null;
    }
    return this.toRecord(film);
  }

  /**
   * Direct `imdbId` filter first. When that is rejected or empty, searches by
   * the sanitized title and year and keeps only a film carrying the same IMDb ID.
   */
  async getByCrossRefId(imdbId: string, options: CrossRefLookupOptions = {}): Promise<ProviderRecord | null> {
    const direct = await this.lookupByImdbId(imdbId, options);
    if (direct) return direct;
    if (!options.title) return null;

    const query = this.sanitizeTitle(options.title);
    if (!query) return null;
    this.logger.log(`[ADAPTER] cross-ref fallback provider=${this.tag} imdbId=${imdbId} query="${query}"`);
    const candidates = await this.searchByTitle(query, options.year ?? null, 1, options);
    return candidates.find((record) => record.crossRefId === imdbId) ?? null;
  }

  /** List items lack critics' ratings and vote counts, so ratings come from `films/{id}`. */
  async collectRatings(record: ProviderRecord, options: LookupOptions = {}): Promise<RawRating[]> {
    const detail = await this.getByNativeId(record.nativeId, options);
    if (detail) return [...detail.ratings];
    this.logger.warn(`[ADAPTER] detail unavailable, using list ratings provider=${this.tag} id=${record.nativeId}`);
    return [...record.ratings];
  }

  sanitizeTitle(title: string): string {
    return sanitizeTitle(title);
  }

  private async lookupByImdbId(imdbId: string, options: LookupOptions): Promise<ProviderRecord | null> {
    let body: unknown;
    try {
      body = await this.fetch('films', { imdbId }, options);
    } catch (error) {
      if (!(error instanceof RequestError) || error.outcome.kind !== 'client_error') throw error;
      this.logger.warn(`[ADAPTER] imdbId lookup rejected provider=${this.tag} imdbId=${imdbId} status=${error.status}`);
      return null;
    }
    return this.parseList(body).find((record) => record.crossRefId === imdbId) ?? null;
  }

  private parseList(body: unknown): ProviderRecord[] {
    const list = parsePayload(KinopoiskListDto, body);
    if (!list) {
      this.logger.warn(`[ADAPTER] unexpected list payload provider=${this.tag}`);
      return [];
    }
    return parseEach(KinopoiskFilmDto, list.items).map((film) => this.toRecord(film));
  }

  private toRecord(film: KinopoiskFilmDto): ProviderRecord {
    const nativeId = String(film.kinopoiskId);
    const candidates: RatingCandidate[] = [
      { source: 'kinopoisk', value: rated(film.ratingKinopoisk), max: 10, votes: film.ratingKinopoiskVoteCount },
      { source: 'imdb', value: rated(film.ratingImdb), max: 10, votes: film.ratingImdbVoteCount },
      { source: 'film_critics', value: rated(film.ratingFilmCritics), max: 10, votes: film.ratingFilmCriticsVoteCount },
    ];
    return createProviderRecord(this.tag, {
      nativeId,
      title: film.nameRu || film.nameEn || film.nameOriginal || '',
      originalTitle: film.nameOriginal || film.nameEn,
      year: film.year,
      crossRefId: film.imdbId,
      ratings: buildRatings(candidates, { provider: this.tag, id: nativeId }, this.logger),
    });
  }
}
