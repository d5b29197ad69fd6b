import { registerAs } from '@nestjs/config';
import { envNumber } from './env';

export type CacheBackend = 'redis' | 'memory';

export interface AggregationConfig {
  yearTolerance: number;
  deadlineMs: number;
  staleAfterDays: number;
  weights: Record<string, number>;
  cacheBackend: CacheBackend;
}

export const DEFAULT_WEIGHTS: Readonly<Record<string, number>> = {
  imdb: 0.25,
  kinopoisk: 0.25,
  rotten_tomatoes: 0.25,
  metacritic: 0.25,
};

// Malformed JSON or non-numeric entries fall back to the defaults as a whole.
export function parseWeights(raw: string | undefined): Record<string, number> {
  if (!raw) return { ...DEFAULT_WEIGHTS };
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return { ...DEFAULT_WEIGHTS };
  }
  if (!parsed || typeof parsed !== 'object' || Array.isArray(parsed)) {
    return { ...DEFAULT_WEIGHTS };
  }
  const weights: Record<string, number> = {};
  for (const [source, value] of Object.entries(parsed)) {
    if (typeof value !== 'number' || !Number.isFinite(value) || value < 0) {
      return { ...DEFAULT_WEIGHTS };
    }
    weights[source] = value;
  }
  return weights;
}

export function buildAggregationConfig(env: Record<string, string | undefined>): AggregationConfig {
  return {
    yearTolerance: envNumber(env.AGGREGATION_YEAR_TOLERANCE, 2),
    deadlineMs: envNumber(env.AGGREGATION_DEADLINE_MS, 60000),
    staleAfterDays: envNumber(env.AGGREGATION_STALE_DAYS, 7),
    weights: parseWeights(env.AGGREGATION_WEIGHTS),
    cacheBackend: env.CACHE_BACKEND === 'memory' ? 'memory' : 'redis',
  };
}

export default registerAs('aggregation', () => buildAggregationConfig(process.env));
