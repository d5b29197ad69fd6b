import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { InjectDataSource } from '@nestjs/typeorm';
import { DataSource, QueryRunner } from 'typeorm';
import { DEFAULT_WEIGHTS } from '../../config/aggregation.config';
import { UnifiedFilm } from '../aggregation/dto/unified-film.dto';
import { isRatingSource } from '../providers/dto/provider-record.dto';
import { DomainError } from '../ratings/rating.errors';
import { NormalizedRating, computeComposite, computeWeighted, normalize } from '../ratings/rating-normalizer';

export interface StoredFilm {
  id: number;
  tmdbId: string;
  imdbId: string | null;
  kinopoiskId: string | null;
  title: string;
  originalTitle: string | null;
  year: number | null;
}

interface FilmRow {
  id: number;
  tmdb_id: string;
  imdb_id: string | null;
  kinopoisk_id: string | null;
  title: string;
  original_title: string | null;
  year: number | null;
}

interface RatingRow {
  film_id: number;
  source: string;
  value: string | number;
  max: string | number;
  votes: string | number | null;
}

/** Persists aggregation results; composites are always derived from the stored rating rows. */
@Injectable()
export class FilmStoreService {
  private readonly logger = new Logger(FilmStoreService.name);
  private readonly weights: Readonly<Record<string, number>>;

  constructor(
    @InjectDataSource() private readonly dataSource: DataSource,
    config: ConfigService,
  ) {
    this.weights = config.get<Record<string, number>>('aggregation.weights') ?? DEFAULT_WEIGHTS;
  }

  /**
   * Upserts the film by TMDB ID and its ratings by source, in one transaction.
   * Sources missing from a complete run are removed; a degraded run leaves
   * previously stored sources in place.
   */
  async saveUnifiedFilm(film: UnifiedFilm): Promise<{ filmId: number; compositeRating: number | null; ratingsCount: number }> {
    const queryRunner = this.dataSource.createQueryRunner();
    await queryRunner.connect();
    await queryRunner.startTransaction();

    try {
      const filmId = await this.upsertFilm(queryRunner, film);

      for (const rating of film.ratings) {
        await queryRunner.query(
          `
          INSERT INTO film_ratings (film_id, source, provider, value, max, normalized_value, votes)
          VALUES ($1, $2, $3, $4, $5, $6, $7)
          ON CONFLICT (film_id, source)
          DO UPDATE SET
            provider = EXCLUDED.provider,
            value = EXCLUDED.value,
            max = EXCLUDED.max,
            normalized_value = EXCLUDED.normalized_value,
            votes = EXCLUDED.votes,
            updated_at = now();
          `,
          [filmId, rating.source, rating.provider, rating.value, rating.max, rating.normalizedValue, rating.votes],
        );
      }

      if (!film.degraded.length) {
        await queryRunner.query('DELETE FROM film_ratings WHERE film_id = $1 AND NOT (source = ANY($2::text[]))', [
          filmId,
          film.ratings.map((rating) => rating.source),
        ]);
      }

      const [result] = await this.recalculate(queryRunner, [filmId]);
      await queryRunner.commitTransaction();

      this.logger.log(
        `[STORE] saved filmId=${filmId} tmdbId=${film.primaryId} ratings=${result.ratingsCount} composite=${result.compositeRating ?? 'null'}`,
      );
      return result;
    } catch (error) {
      await queryRunner.rollbackTransaction();
      throw error;
    } finally {
      await queryRunner.release();
    }
  }

  async listStaleFilms(days: number): Promise<StoredFilm[]> {
    const rows: FilmRow[] = await this.dataSource.query(
      `
      SELECT id, tmdb_id, imdb_id, kinopoisk_id, title, original_title, year
      FROM films
      WHERE ratings_updated_at IS NULL
         OR ratings_updated_at < now() - make_interval(days => $1)
      ORDER BY ratings_updated_at NULLS FIRST, id
      `,
      [days],
    );
    return rows.map((row) => ({
      id: row.id,
      tmdbId: row.tmdb_id,
      imdbId: row.imdb_id,
      kinopoiskId: row.kinopoisk_id,
      title: row.title,
      originalTitle: row.original_title,
      year: row.year,
    }));
  }

  /** Recomputes stored composites from stored ratings; every film when no IDs are given. */
  async recalculateComposites(filmIds?: number[]): Promise<number> {
    const queryRunner = this.dataSource.createQueryRunner();
    await queryRunner.connect();
    await queryRunner.startTransaction();
    try {
      const results = await this.recalculate(queryRunner, filmIds);
      await queryRunner.commitTransaction();
      this.logger.log(`[STORE] recalculated composites films=${results.length}`);
      return results.length;
    } catch (error) {
      await queryRunner.rollbackTransaction();
      throw error;
    } finally {
      await queryRunner.release();
    }
  }

  private async upsertFilm(queryRunner: QueryRunner, film: UnifiedFilm): Promise<number> {
    const rows: Array<{ id: number }> = await queryRunner.query(
      `
      INSERT INTO films (tmdb_id, imdb_id, kinopoisk_id, title, original_title, year, resolution, ratings_updated_at)
      VALUES ($1, $2, $3, $4, $5, $6, $7::jsonb, now())
      ON CONFLICT (tmdb_id)
      DO UPDATE SET
        imdb_id = COALESCE(EXCLUDED.imdb_id, films.imdb_id),
        kinopoisk_id = COALESCE(EXCLUDED.kinopoisk_id, films.kinopoisk_id),
        title = EXCLUDED.title,
        original_title = EXCLUDED.original_title,
        year = EXCLUDED.year,
        resolution = EXCLUDED.resolution,
        ratings_updated_at = now(),
        updated_at = now()
      RETURNING id;
      `,
      [
        film.primaryId,
        film.crossRefId,
        film.records.regional?.nativeId ?? null,
        film.title,
        film.originalTitle,
        film.year,
        JSON.stringify(film.resolution),
      ],
    );
    return rows[0].id;
  }

  private async recalculate(
    queryRunner: QueryRunner,
    filmIds?: number[],
  ): Promise<Array<{ filmId: number; compositeRating: number | null; ratingsCount: number }>> {
    const films: Array<{ id: number }> = filmIds
      ? await queryRunner.query('SELECT id FROM films WHERE id = ANY($1::int[]) ORDER BY id', [filmIds])
      : await queryRunner.query('SELECT id FROM films ORDER BY id');
    if (!films.length) return [];

    const rows: RatingRow[] = await queryRunner.query(
      'SELECT film_id, source, value, max, votes FROM film_ratings WHERE film_id = ANY($1::int[])',
      [films.map((film) => film.id)],
    );

    const byFilm = new Map<number, NormalizedRating[]>();
    for (const row of rows) {
      const rating = this.toNormalized(row);
      if (!rating) continue;
      const list = byFilm.get(row.film_id) ?? [];
      list.push(rating);
      byFilm.set(row.film_id, list);
    }

    const results: Array<{ filmId: number; compositeRating: number | null; ratingsCount: number }> = [];
    for (const { id } of films) {
      const ratings = byFilm.get(id) ?? [];
      const compositeRating = computeComposite(ratings);
      await queryRunner.query(
        `
        UPDATE films
        SET composite_rating = $2, weighted_rating = $3, ratings_count = $4, updated_at = now()
        WHERE id = $1
        `,
        [id, compositeRating, computeWeighted(ratings, this.weights).rating, ratings.length],
      );
      results.push({ filmId: id, compositeRating, ratingsCount: ratings.length });
    }
    return results;
  }

  private toNormalized(row: RatingRow): NormalizedRating | null {
    if (!isRatingSource(row.source)) {
      this.logger.warn(`[STORE] unknown rating source filmId=${row.film_id} source=${row.source}`);
      return null;
    }
    const votes = row.votes === null ? null : Number(row.votes);
    try {
      return normalize({ source: row.source, value: Number(row.value), max: Number(row.max), votes });
    } catch (error) {
      if (!(error instanceof DomainError)) throw error;
      this.logger.warn(`[STORE] skipped stored rating filmId=${row.film_id} source=${row.source} reason=${error.message}`);
      return null;
    }
  }
}
