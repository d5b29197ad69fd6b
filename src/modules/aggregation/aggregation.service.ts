import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { DEFAULT_WEIGHTS } from '../../config/aggregation.config';
import { errorMessage } from '../../common/error-message';
import { CACHE_STORE, CacheStore } from '../gateway/cache/cache-store.interface';
import { DeadlineExceededError, RequestError } from '../gateway/request.errors';
import {
  FilmReference,
  InvalidReferenceError,
  createFilmReference,
} from '../identity/dto/film-reference.dto';
import { IdentityResolverService, MatchStrategy } from '../identity/identity-resolver.service';
import { LookupOptions } from '../providers/adapters/catalog-adapter.interface';
import { ProviderRecord, ProviderTag, RawRating, SecondaryProviderTag } from '../providers/dto/provider-record.dto';
import { ProviderRegistry } from '../providers/provider-registry';
import { DomainError } from '../ratings/rating.errors';
import { computeComposite, computeWeighted, getRatingSourceStats, normalize } from '../ratings/rating-normalizer';
import { PROVIDER_PRECEDENCE, mergeByPrecedence } from '../ratings/rating-precedence';
import { AggregationError } from './aggregation.errors';
import { AggregationState, DegradedProvider, UnifiedFilm, UnifiedRating } from './dto/unified-film.dto';

export const TITLE_HINT_PREFIX = 'title_hint:';
const TITLE_HINT_TTL_SEC = 30 * 24 * 3600;

export interface AggregateOptions {
  /** Overrides the configured deadline. */
  signal?: AbortSignal;
}

interface Run {
  reference: FilmReference;
  state: AggregationState;
  signal?: AbortSignal;
  degraded: DegradedProvider[];
}

@Injectable()
export class AggregationService {
  private readonly logger = new Logger(AggregationService.name);
  private readonly deadlineMs: number;
  private readonly weights: Readonly<Record<string, number>>;

  constructor(
    private readonly providers: ProviderRegistry,
    private readonly resolver: IdentityResolverService,
    @Inject(CACHE_STORE) private readonly cache: CacheStore,
    config: ConfigService,
  ) {
    this.deadlineMs = config.get<number>('aggregation.deadlineMs') ?? 0;
    this.weights = config.get<Record<string, number>>('aggregation.weights') ?? DEFAULT_WEIGHTS;
  }

  async aggregate(reference: FilmReference, options: AggregateOptions = {}): Promise<UnifiedFilm> {
    const run: Run = {
      reference,
      state: 'FETCHING_PRIMARY',
      signal: options.signal ?? (this.deadlineMs > 0 ? AbortSignal.timeout(this.deadlineMs) : undefined),
      degraded: [],
    };

    try {
      this.enter(run, 'FETCHING_PRIMARY');
      const primary = await this.fetchPrimary(run);

      this.enter(run, 'RESOLVING_SECONDARY');
      const resolved = await this.resolveSecondary(run, primary);

      this.enter(run, 'COLLECTING_RATINGS');
      const byProvider = await this.collectRatings(run, primary, resolved);

      this.enter(run, 'NORMALIZING');
      const film = this.buildFilm(run, primary, resolved, byProvider);

      run.state = 'DONE';
      this.logger.log(
        `[AGGREGATE] done primaryId=${film.primaryId} ratings=${film.ratingsCount} composite=${film.compositeRating ?? 'null'} degraded=${run.degraded.length}`,
      );
      return film;
    } catch (error) {
      this.logger.error(
        `[AGGREGATE] failed state=${run.state} primaryId=${reference.primaryId ?? '-'} error=${errorMessage(error)}`,
      );
      run.state = 'FAILED';
      throw error;
    }
  }

  /** Builds a reference from loose input; an unusable one fails as `invalid_reference`. */
  referenceFrom(input: Parameters<typeof createFilmReference>[0]): FilmReference {
    try {
      return createFilmReference(input);
    } catch (error) {
      if (error instanceof InvalidReferenceError) {
        throw new AggregationError('invalid_reference', null, error.message);
      }
      throw error;
    }
  }

  searchFilms(title: string, year: number | null = null): Promise<ProviderRecord[]> {
    return this.providers.primary.searchByTitle(title, year);
  }

  private enter(run: Run, state: AggregationState): void {
    if (run.signal?.aborted) throw new DeadlineExceededError('aggregation', state);
    run.state = state;
    this.logger.debug(`[AGGREGATE] state=${state} primaryId=${run.reference.primaryId ?? '-'}`);
  }

  private async fetchPrimary(run: Run): Promise<ProviderRecord> {
    const { reference } = run;
    const adapter = this.providers.primary;
    const options: LookupOptions = { signal: run.signal };

    try {
      if (reference.primaryId) {
        const record = await adapter.getByNativeId(reference.primaryId, options);
        if (record) return await this.remember(record);
      }

      if (reference.crossRefId) {
        const record = await adapter.getByCrossRefId(reference.crossRefId, options);
        if (record) return await this.remember(record);
      }

      const hint = await this.titleHint(reference);
      if (hint) {
        this.logger.warn(`[AGGREGATE] primary recovery primaryId=${reference.primaryId ?? '-'} hint="${hint}"`);
        const [candidate] = await adapter.searchByTitle(hint, reference.year ?? null, 1, options);
        const record = candidate ? await adapter.getByNativeId(candidate.nativeId, options) : null;
        if (record) return await this.remember(record);
      }
    } catch (error) {
      if (error instanceof RequestError) {
        throw new AggregationError('primary_unreachable', reference, `Primary provider unreachable: ${error.message}`);
      }
      throw error;
    }

    throw new AggregationError(
      'primary_not_found',
      reference,
      `No primary record for ${describeReference(reference)}`,
    );
  }

  private async resolveSecondary(
    run: Run,
    primary: ProviderRecord,
  ): Promise<Map<SecondaryProviderTag, { record: ProviderRecord; matchedBy: MatchStrategy }>> {
    let reference: FilmReference;
    try {
      reference = createFilmReference({
        crossRefId: primary.crossRefId ?? run.reference.crossRefId,
        title: primary.title || run.reference.title,
        originalTitle: primary.originalTitle ?? run.reference.originalTitle,
        year: primary.year ?? run.reference.year,
        nativeIds: run.reference.nativeIds,
      });
    } catch (error) {
      if (!(error instanceof InvalidReferenceError)) throw error;
      this.logger.warn(`[AGGREGATE] nothing to resolve secondaries by primaryId=${primary.nativeId} reason=${error.message}`);
      return new Map();
    }

    const resolved = new Map<SecondaryProviderTag, { record: ProviderRecord; matchedBy: MatchStrategy }>();
    for (const [tag, adapter] of this.providers.secondaries()) {
      try {
        const resolution = await this.resolver.resolve(reference, tag, adapter, { signal: run.signal });
        if (resolution) resolved.set(tag, resolution);
      } catch (error) {
        this.degrade(run, tag, error);
      }
    }
    return resolved;
  }

  private async collectRatings(
    run: Run,
    primary: ProviderRecord,
    resolved: Map<SecondaryProviderTag, { record: ProviderRecord }>,
  ): Promise<Partial<Record<ProviderTag, readonly RawRating[]>>> {
    const byProvider: Partial<Record<ProviderTag, readonly RawRating[]>> = { primary: primary.ratings };
    for (const [tag, { record }] of resolved) {
      try {
        byProvider[tag] = await this.providers.get(tag).collectRatings(record, { signal: run.signal });
      } catch (error) {
        this.degrade(run, tag, error);
      }
    }
    return byProvider;
  }

  private buildFilm(
    run: Run,
    primary: ProviderRecord,
    resolved: Map<SecondaryProviderTag, { record: ProviderRecord; matchedBy: MatchStrategy }>,
    byProvider: Partial<Record<ProviderTag, readonly RawRating[]>>,
  ): UnifiedFilm {
    const ratings: UnifiedRating[] = [];
    for (const [source, claimed] of mergeByPrecedence(byProvider, PROVIDER_PRECEDENCE)) {
      try {
        ratings.push({ ...normalize(claimed.rating), provider: claimed.provider });
      } catch (error) {
        if (!(error instanceof DomainError)) throw error;
        this.logger.warn(`[AGGREGATE] skipped rating provider=${claimed.provider} source=${source} reason=${error.message}`);
      }
    }

    const records: Partial<Record<ProviderTag, ProviderRecord>> = { primary };
    for (const [tag, { record }] of resolved) records[tag] = record;
    const others = [...resolved.values()].map(({ record }) => record);

    return {
      primaryId: primary.nativeId,
      crossRefId: primary.crossRefId ?? others.find((record) => record.crossRefId)?.crossRefId ?? null,
      title: primary.title || others.find((record) => record.title)?.title || '',
      originalTitle: primary.originalTitle ?? others.find((record) => record.originalTitle)?.originalTitle ?? null,
      year: primary.year ?? others.find((record) => record.year !== null)?.year ?? null,
      records,
      ratings,
      ratingsCount: ratings.length,
      compositeRating: computeComposite(ratings),
      weightedRating: computeWeighted(ratings, this.weights).rating,
      ratingStats: getRatingSourceStats(ratings),
      resolution: {
        ratings: resolved.get('ratings')?.matchedBy ?? null,
        regional: resolved.get('regional')?.matchedBy ?? null,
      },
      degraded: run.degraded,
      aggregatedAt: new Date().toISOString(),
    };
  }

  private degrade(run: Run, provider: SecondaryProviderTag, error: unknown): void {
    if (error instanceof DeadlineExceededError) throw error;
    const message = errorMessage(error);
    run.degraded.push({ provider, step: run.state, message });
    this.logger.warn(
      `[AGGREGATE] provider degraded provider=${provider} step=${run.state} primaryId=${run.reference.primaryId ?? '-'} error=${message}`,
    );
  }

  private async titleHint(reference: FilmReference): Promise<string | null> {
    const given = reference.originalTitle ?? reference.title;
    if (given) return given;
    if (!reference.primaryId) return null;
    try {
      return await this.cache.get(`${TITLE_HINT_PREFIX}${reference.primaryId}`);
    } catch (error) {
      this.logger.warn(`[AGGREGATE] title hint read failed primaryId=${reference.primaryId} error=${errorMessage(error)}`);
      return null;
    }
  }

  private async remember(record: ProviderRecord): Promise<ProviderRecord> {
    const hint = record.originalTitle || record.title;
    if (!hint) return record;
    try {
      await this.cache.set(`${TITLE_HINT_PREFIX}${record.nativeId}`, hint, TITLE_HINT_TTL_SEC);
    } catch (error) {
      this.logger.warn(`[AGGREGATE] title hint write failed primaryId=${record.nativeId} error=${errorMessage(error)}`);
    }
    return record;
  }
}

function describeReference(reference: FilmReference): string {
  const parts = [
    reference.primaryId && `primaryId=${reference.primaryId}`,
    reference.crossRefId && `crossRefId=${reference.crossRefId}`,
    reference.title && `title="${reference.title}"`,
    reference.year !== undefined && `year=${reference.year}`,
  ].filter((part): part is string => typeof part === 'string' && part.length > 0);
  return parts.join(' ');
}
