import { Injectable, Logger, Optional } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { CatalogAdapter, LookupOptions } from '../providers/adapters/catalog-adapter.interface';
import { ProviderRecord, SecondaryProviderTag } from '../providers/dto/provider-record.dto';
import { normalizeTitle } from '../providers/utils/title';
import { FilmReference } from './dto/film-reference.dto';

export type MatchStrategy = 'cross_ref' | 'native_id' | 'title_year' | 'sanitized_title';

export interface Resolution {
  readonly record: ProviderRecord;
  readonly matchedBy: MatchStrategy;
}

export const DEFAULT_YEAR_TOLERANCE = 2;

/** A requested year rules out candidates without one; tolerance 0 means an exact match. */
export function yearMatches(requested: number | undefined, candidate: number | null, tolerance: number): boolean {
  if (requested === undefined) return true;
  if (candidate === null) return false;
  return Math.abs(requested - candidate) <= tolerance;
}

export function titleMatches(
  requested: readonly string[],
  record: ProviderRecord,
  transform: (title: string) => string = (title) => title,
): boolean {
  const wanted = new Set(requested.map((title) => normalizeTitle(transform(title))).filter(Boolean));
  return [record.title, record.originalTitle].some(
    (title) => title !== null && wanted.has(normalizeTitle(transform(title))),
  );
}

/**
 * Locates a reference in one secondary provider. Strategies run in a fixed
 * order and the first hit wins: cross-reference ID, known native ID, title
 * and year, then a sanitized-title search where the provider offers one.
 * Null means the provider does not carry the film.
 */
@Injectable()
export class IdentityResolverService {
  private readonly logger = new Logger(IdentityResolverService.name);
  private readonly yearTolerance: number;

  constructor(@Optional() config?: ConfigService) {
    this.yearTolerance = config?.get<number>('aggregation.yearTolerance') ?? DEFAULT_YEAR_TOLERANCE;
  }

  async resolve(
    reference: FilmReference,
    tag: SecondaryProviderTag,
    adapter: CatalogAdapter,
    options: LookupOptions = {},
  ): Promise<Resolution | null> {
    const resolution =
      (await this.byCrossRef(reference, adapter, options)) ??
      (await this.byNativeId(reference, tag, adapter, options)) ??
      (await this.byTitleAndYear(reference, adapter, options)) ??
      (await this.bySanitizedTitle(reference, adapter, options));

    if (resolution) {
      this.logger.log(
        `[RESOLVE] matched provider=${tag} strategy=${resolution.matchedBy} nativeId=${resolution.record.nativeId}`,
      );
    } else {
      this.logger.log(
        `[RESOLVE] no match provider=${tag} crossRefId=${reference.crossRefId ?? '-'} title=${reference.title ?? '-'} year=${reference.year ?? '-'}`,
      );
    }
    return resolution;
  }

  private async byCrossRef(
    reference: FilmReference,
    adapter: CatalogAdapter,
    options: LookupOptions,
  ): Promise<Resolution | null> {
    if (!reference.crossRefId || !adapter.getByCrossRefId) return null;
    const record = await adapter.getByCrossRefId(reference.crossRefId, {
      ...options,
      title: reference.originalTitle ?? reference.title,
      year: reference.year,
    });
    return record ? { record, matchedBy: 'cross_ref' } : null;
  }

  private async byNativeId(
    reference: FilmReference,
    tag: SecondaryProviderTag,
    adapter: CatalogAdapter,
    options: LookupOptions,
  ): Promise<Resolution | null> {
    const nativeId = reference.nativeIds?.[tag];
    if (!nativeId) return null;
    const record = await adapter.getByNativeId(nativeId, options);
    return record ? { record, matchedBy: 'native_id' } : null;
  }

  private async byTitleAndYear(
    reference: FilmReference,
    adapter: CatalogAdapter,
    options: LookupOptions,
  ): Promise<Resolution | null> {
    const titles = requestedTitles(reference);
    for (const query of titles) {
      const candidates = await adapter.searchByTitle(query, null, 1, options);
      const record = this.pick(candidates, reference, titles);
      if (record) return { record, matchedBy: 'title_year' };
    }
    return null;
  }

  private async bySanitizedTitle(
    reference: FilmReference,
    adapter: CatalogAdapter,
    options: LookupOptions,
  ): Promise<Resolution | null> {
    const sanitize = adapter.sanitizeTitle?.bind(adapter);
    if (!sanitize) return null;

    const titles = requestedTitles(reference);
    const queries = [...new Set(titles.map(sanitize).filter(Boolean))];
    for (const query of queries) {
      // a sanitized query identical to the raw one was already tried
      if (titles.includes(query)) continue;
      const candidates = await adapter.searchByTitle(query, reference.year ?? null, 1, options);
      const record = this.pick(candidates, reference, titles, sanitize);
      if (record) return { record, matchedBy: 'sanitized_title' };
    }
    return null;
  }

  private pick(
    candidates: readonly ProviderRecord[],
    reference: FilmReference,
    titles: readonly string[],
    transform?: (title: string) => string,
  ): ProviderRecord | null {
    return (
      candidates.find(
        (record) =>
          yearMatches(reference.year, record.year, this.yearTolerance) && titleMatches(titles, record, transform),
      ) ?? null
    );
  }
}

function requestedTitles(reference: FilmReference): string[] {
  const titles = [reference.title, reference.originalTitle].filter((title): title is string => Boolean(title));
  return [...new Set(titles)];
}
