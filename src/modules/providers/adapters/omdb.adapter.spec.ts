import { json, param, routes, sequence, stubClient } from '../../../testing/http-stub';
import { testSettings } from '../../../testing/provider-fixtures';
import { MemoryCacheStore } from '../../gateway/cache/memory-cache.store';
import { OmdbMovieDto } from '../dto/omdb.dto';
import { parsePayload } from '../utils/payload';
import { createProviderGateway } from '../provider-clients';
import { OmdbAdapter, parseOmdbRatings } from './omdb.adapter';

const heat = {
  Title: 'Heat',
  Year: '1995',
  imdbID: 'tt0113277',
  imdbRating: '8.3',
  imdbVotes: '700,123',
  Metascore: 'N/A',
  Ratings: [
    { Source: 'Internet Movie Database', Value: '8.3/10' },
    { Source: 'Rotten Tomatoes', Value: '88%' },
    { Source: 'Metacritic', Value: 'N/A' },
  ],
  Response: 'True',
};

function setup(handler: Parameters<typeof stubClient>[0]) {
  const stub = stubClient(handler);
  const adapter = new OmdbAdapter(
    createProviderGateway('ratings', testSettings('ratings'), new MemoryCacheStore(), stub.client),
  );
  return { adapter, calls: stub.calls };
}

function movie(payload: object): OmdbMovieDto {
  const parsed = parsePayload(OmdbMovieDto, payload);
  if (!parsed) throw new Error('fixture does not validate');
  return parsed;
}

describe('OmdbAdapter', () => {
  it('drops N/A scores instead of reporting zero', async () => {
    const { adapter, calls } = setup(sequence(json(heat)));

    const record = await adapter.getByNativeId('tt0113277');
    expect(record?.ratings).toEqual([
      { source: 'imdb', value: 8.3, max: 10, votes: 700123 },
      { source: 'rotten_tomatoes', value: 88, max: 100, votes: null },
    ]);
    expect(record?.ratings.some((rating) => rating.source === 'metacritic')).toBe(false);
    expect(param(calls[0], 'i')).toBe('tt0113277');
    expect(param(calls[0], 'apikey')).toBe('test-secret');
  });

  it('returns null for Response False', async () => {
    const { adapter } = setup(sequence(json({ Response: 'False', Error: 'Incorrect IMDb ID.' })));
    await expect(adapter.getByNativeId('tt0000000')).resolves.toBeNull();
  });

  it('returns null when OMDb answers with another film', async () => {
    const { adapter } = setup(sequence(json({ ...heat, imdbID: 'tt0000001' })));
    await expect(adapter.getByNativeId('tt0113277')).resolves.toBeNull();
  });

  it('exposes ratings keyed by source for a cross-reference ID', async () => {
    const { adapter } = setup(sequence(json(heat)));
    const ratings = await adapter.getRatingsByCrossRefId('tt0113277');
    expect([...ratings.keys()]).toEqual(['imdb', 'rotten_tomatoes']);
    expect(ratings.get('rotten_tomatoes')?.value).toBe(88);
  });

  it('searches movies and treats Response False as no results', async () => {
    const { adapter, calls } = setup(
      sequence(
        json({ Search: [{ Title: 'Heat', Year: '1995', imdbID: 'tt0113277', Type: 'movie' }, { Title: 'broken' }] }),
        json({ Response: 'False', Error: 'Movie not found!' }),
      ),
    );

    const first = await adapter.searchByTitle('Heat', 1995);
    expect(first.map((record) => [record.nativeId, record.crossRefId, record.year])).toEqual([
      ['tt0113277', 'tt0113277', 1995],
    ]);
    expect(param(calls[0], 's')).toBe('Heat');
    expect(param(calls[0], 'type')).toBe('movie');
    expect(param(calls[0], 'y')).toBe(1995);

    await expect(adapter.searchByTitle('Nothing')).resolves.toEqual([]);
  });

  it('fetches detail ratings for a record found by search', async () => {
    const { adapter, calls } = setup(
      routes({
        '/': (config) =>
          param(config, 's') ? json({ Search: [{ Title: 'Heat', Year: '1995', imdbID: 'tt0113277' }] }) : json(heat),
      }),
    );
    const [record] = await adapter.searchByTitle('Heat');

    const ratings = await adapter.collectRatings(record);
    expect(ratings.map((rating) => rating.source)).toEqual(['imdb', 'rotten_tomatoes']);
    expect(calls).toHaveLength(2);
  });
});

describe('parseOmdbRatings', () => {
  it('falls back to the Ratings entry for IMDb when imdbRating is missing', () => {
    const candidates = parseOmdbRatings(
      movie({
        Title: 'X',
        imdbID: 'tt1',
        imdbRating: 'N/A',
        Metascore: '93',
        Ratings: [
          { Source: 'Internet Movie Database', Value: '7.1/10' },
          { Source: 'Metacritic', Value: '94/100' },
        ],
      }),
    );

    expect(candidates).toEqual([
      { source: 'metacritic', value: 94, max: 100 },
      { source: 'imdb', value: 7.1, max: 10 },
    ]);
  });

  it('prefers imdbRating over the Ratings entry', () => {
    const candidates = parseOmdbRatings(
      movie({
        Title: 'X',
        imdbID: 'tt1',
        imdbRating: '8.0',
        imdbVotes: 'N/A',
        Ratings: [{ Source: 'Internet Movie Database', Value: '7.1/10' }],
      }),
    );
    expect(candidates).toEqual([{ source: 'imdb', value: 8, max: 10, votes: null }]);
  });
});
