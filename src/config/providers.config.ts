import { registerAs } from '@nestjs/config';
import { envNumber, envString } from './env';

export interface ProviderSettings {
  baseUrl: string;
  apiKey: string;
  cacheTtlSec: number;
  timeoutMs: number;
  maxRetries: number;
  backoffBaseMs: number;
}

export interface ProvidersConfig {
  primary: ProviderSettings & { language: string };
  ratings: ProviderSettings;
  regional: ProviderSettings;
}

const HOUR = 3600;

export function buildProvidersConfig(env: Record<string, string | undefined>): ProvidersConfig {
  const timeoutMs = envNumber(env.PROVIDER_TIMEOUT_MS, 10000);
  const maxRetries = envNumber(env.PROVIDER_MAX_RETRIES, 3);
  const backoffBaseMs = envNumber(env.PROVIDER_BACKOFF_MS, 1000);

  return {
    primary: {
      baseUrl: envString(env.TMDB_BASE_URL, 'https://api.themoviedb.org/3'),
      apiKey: env.TMDB_API_KEY ?? '',
      cacheTtlSec: envNumber(env.TMDB_CACHE_TTL, 24 * HOUR),
      language: envString(env.TMDB_LANGUAGE, 'ru-RU'),
      timeoutMs,
      maxRetries,
      backoffBaseMs,
    },
    ratings: {
      baseUrl: envString(env.OMDB_BASE_URL, 'https://www.omdbapi.com'),
      apiKey: env.OMDB_API_KEY ?? '',
      cacheTtlSec: envNumber(env.OMDB_CACHE_TTL, 12 * HOUR),
      timeoutMs,
      maxRetries,
      backoffBaseMs,
    },
    regional: {
      baseUrl: envString(env.KINOPOISK_BASE_URL, 'https://kinopoiskapiunofficial.tech/api/v2.2'),
      apiKey: env.KINOPOISK_API_KEY ?? '',
      cacheTtlSec: envNumber(env.KINOPOISK_CACHE_TTL, 6 * HOUR),
      timeoutMs,
      maxRetries,
      backoffBaseMs,
    },
  };
}

export default registerAs('providers', () => buildProvidersConfig(process.env));
