import { buildProvidersConfig } from './providers.config';

describe('providers config', () => {
  it('binds each provider to its default endpoint and cache lifetime', () => {
    const config = buildProvidersConfig({});

    expect(config.primary).toEqual({
      baseUrl: 'https://api.themoviedb.org/3',
      apiKey: '',
      cacheTtlSec: 86400,
      language: 'ru-RU',
      timeoutMs: 10000,
      maxRetries: 3,
      backoffBaseMs: 1000,
    });
    expect(config.ratings.baseUrl).toBe('https://www.omdbapi.com');
    expect(config.ratings.cacheTtlSec).toBe(43200);
    expect(config.regional.baseUrl).toBe('https://kinopoiskapiunofficial.tech/api/v2.2');
    expect(config.regional.cacheTtlSec).toBe(21600);
  });

  it('applies shared request settings and credentials from the environment', () => {
    const config = buildProvidersConfig({
      PROVIDER_MAX_RETRIES: '5',
      PROVIDER_BACKOFF_MS: '250',
      OMDB_API_KEY: 'test-secret',
      TMDB_LANGUAGE: 'en-US',
    });

    expect(config.ratings).toMatchObject({ apiKey: 'test-secret', maxRetries: 5, backoffBaseMs: 250 });
    expect(config.regional.maxRetries).toBe(5);
    expect(config.primary.language).toBe('en-US');
  });
});
