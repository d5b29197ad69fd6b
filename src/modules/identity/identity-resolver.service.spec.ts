import { ConfigService } from '@nestjs/config';
import { CatalogAdapter, CrossRefLookupOptions } from '../providers/adapters/catalog-adapter.interface';
import { ProviderRecord, ProviderTag } from '../providers/dto/provider-record.dto';
import { createProviderRecord } from '../providers/utils/record';
import { sanitizeTitle } from '../providers/utils/title';
import { createFilmReference } from './dto/film-reference.dto';
import { IdentityResolverService, titleMatches, yearMatches } from './identity-resolver.service';

type Call = [string, ...unknown[]];

class FakeAdapter implements CatalogAdapter {
  readonly calls: Call[] = [];
  byCrossRef = new Map<string, ProviderRecord>();
  byNativeId = new Map<string, ProviderRecord>();
  searchResults = new Map<string, ProviderRecord[]>();
  getByCrossRefId?: (id: string, options?: CrossRefLookupOptions) => Promise<ProviderRecord | null>;
  sanitizeTitle?: (title: string) => string;

  constructor(
    readonly tag: ProviderTag,
    features: { crossRef?: boolean; sanitize?: boolean } = {},
  ) {
    if (features.crossRef) {
      this.getByCrossRefId = async (id, options) => {
        this.calls.push(['getByCrossRefId', id, options?.title, options?.year]);
        return this.byCrossRef.get(id) ?? null;
      };
    }
    if (features.sanitize) this.sanitizeTitle = sanitizeTitle;
  }

  async searchByTitle(title: string, year?: number | null): Promise<ProviderRecord[]> {
    this.calls.push(['searchByTitle', title, year]);
    return this.searchResults.get(title) ?? [];
  }

  async getByNativeId(id: string): Promise<ProviderRecord | null> {
    this.calls.push(['getByNativeId', id]);
    return this.byNativeId.get(id) ?? null;
  }

  async collectRatings(): Promise<never[]> {
    return [];
  }
}

const record = (tag: ProviderTag, nativeId: string, title: string, year: number | null, originalTitle: string | null = null) =>
  createProviderRecord(tag, { nativeId, title, originalTitle, year });

describe('IdentityResolverService', () => {
  const resolver = new IdentityResolverService(new ConfigService({ aggregation: { yearTolerance: 2 } }));

  it('tries the cross-reference ID before any title search', async () => {
    const adapter = new FakeAdapter('ratings', { crossRef: true });
    const hit = record('ratings', 'tt0113277', 'Heat', 1995);
    adapter.byCrossRef.set('tt0113277', hit);
    adapter.searchResults.set('Heat', [hit]);

    const reference = createFilmReference({ crossRefId: 'tt0113277', title: 'Heat', year: 1995 });
    const resolution = await resolver.resolve(reference, 'ratings', adapter);

    expect(resolution).toEqual({ record: hit, matchedBy: 'cross_ref' });
    expect(adapter.calls).toEqual([['getByCrossRefId', 'tt0113277', 'Heat', 1995]]);
  });

  it('falls through cross-ref and native ID to the title search', async () => {
    const adapter = new FakeAdapter('regional', { crossRef: true });
    const hit = record('regional', '1', 'Схватка', 1996, 'Heat');
    adapter.searchResults.set('Heat', [hit]);

    const reference = createFilmReference({
      crossRefId: 'tt0113277',
      title: 'Heat',
      year: 1995,
      nativeIds: { regional: '999' },
    });
    const resolution = await resolver.resolve(reference, 'regional', adapter);

    expect(resolution?.matchedBy).toBe('title_year');
    expect(adapter.calls.map(([name]) => name)).toEqual(['getByCrossRefId', 'getByNativeId', 'searchByTitle']);
  });

  it('uses a known native ID for that provider', async () => {
    const adapter = new FakeAdapter('regional');
    const hit = record('regional', '8124', 'Схватка', 1995);
    adapter.byNativeId.set('8124', hit);

    const resolution = await resolver.resolve(
      createFilmReference({ title: 'Heat', nativeIds: { regional: '8124', ratings: 'tt0113277' } }),
      'regional',
      adapter,
    );
    expect(resolution).toEqual({ record: hit, matchedBy: 'native_id' });
  });

  it('skips candidates outside the year tolerance and accepts the first within it', async () => {
    const adapter = new FakeAdapter('ratings');
    adapter.searchResults.set('Heat', [
      record('ratings', 'tt0097499', 'Heat', 1986),
      record('ratings', 'tt0113277', 'Heat', 1997),
      record('ratings', 'tt0000003', 'Heat', 1995),
    ]);

    const resolution = await resolver.resolve(createFilmReference({ title: 'Heat', year: 1995 }), 'ratings', adapter);
    expect(resolution?.record.nativeId).toBe('tt0113277');
  });

  it('matches exactly when the tolerance is zero', async () => {
    const strict = new IdentityResolverService(new ConfigService({ aggregation: { yearTolerance: 0 } }));
    const adapter = new FakeAdapter('ratings');
    adapter.searchResults.set('Heat', [record('ratings', 'a', 'Heat', 1996), record('ratings', 'b', 'Heat', 1995)]);

    const resolution = await strict.resolve(createFilmReference({ title: 'Heat', year: 1995 }), 'ratings', adapter);
    expect(resolution?.record.nativeId).toBe('b');
  });

  it('searches the original title when the localized one finds nothing', async () => {
    const adapter = new FakeAdapter('ratings');
    adapter.searchResults.set('Heat', [record('ratings', 'tt0113277', 'Heat', 1995)]);

    const resolution = await resolver.resolve(
      createFilmReference({ title: 'Схватка', originalTitle: 'Heat', year: 1995 }),
      'ratings',
      adapter,
    );
    expect(resolution?.record.nativeId).toBe('tt0113277');
    expect(adapter.calls).toEqual([
      ['searchByTitle', 'Схватка', null],
      ['searchByTitle', 'Heat', null],
    ]);
  });

  it('uses the sanitized-title search only on providers that offer it', async () => {
    const reference = createFilmReference({ title: 'Heat (1995)', year: 1995 });
    const hit = record('regional', '8124', 'Heat', 1995);

    const plain = new FakeAdapter('ratings');
    plain.searchResults.set('Heat', [hit]);
    await expect(resolver.resolve(reference, 'ratings', plain)).resolves.toBeNull();

    const regional = new FakeAdapter('regional', { sanitize: true });
    regional.searchResults.set('Heat', [hit]);
    await expect(resolver.resolve(reference, 'regional', regional)).resolves.toEqual({
      record: hit,
      matchedBy: 'sanitized_title',
    });
    expect(regional.calls).toEqual([
      ['searchByTitle', 'Heat (1995)', null],
      ['searchByTitle', 'Heat', 1995],
    ]);
  });

  it('resolves to null when nothing matches', async () => {
    const adapter = new FakeAdapter('regional', { crossRef: true, sanitize: true });
    adapter.searchResults.set('Heat', [record('regional', '1', 'Heat Wave', 1995)]);

    await expect(
      resolver.resolve(createFilmReference({ title: 'Heat', originalTitle: 'Heat', year: 1995 }), 'regional', adapter),
    ).resolves.toBeNull();
  });
});

describe('matching helpers', () => {
  it('rejects a candidate without a year when a year was requested', () => {
    expect(yearMatches(1995, null, 2)).toBe(false);
    expect(yearMatches(undefined, null, 2)).toBe(true);
    expect(yearMatches(1995, 1993, 2)).toBe(true);
    expect(yearMatches(1995, 1992, 2)).toBe(false);
  });

  it('compares titles and original titles loosely', () => {
    const candidate = record('regional', '1', 'Амели', 2001, 'Le Fabuleux Destin d’Amélie Poulain');
    expect(titleMatches(['le fabuleux destin d amelie poulain'], candidate)).toBe(true);
    expect(titleMatches(['Amelie'], candidate)).toBe(false);
  });
});
