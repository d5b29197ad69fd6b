import { InjectQueue } from '@nestjs/bullmq';
import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Queue } from 'bullmq';
import { AggregationService } from '../aggregation/aggregation.service';
import { UnifiedFilm } from '../aggregation/dto/unified-film.dto';
import { FilmReference } from '../identity/dto/film-reference.dto';
import { AggregateJobData, AggregateJobResult } from './dto/aggregate-job.dto';
import { FilmStoreService } from './film-store.service';

export const QUEUE_AGGREGATE_FILM = 'aggregate-film';

/** Job-layer entry points around the aggregation engine. */
@Injectable()
export class FilmJobsService {
  private readonly logger = new Logger(FilmJobsService.name);
  private readonly staleAfterDays: number;

  constructor(
    @InjectQueue(QUEUE_AGGREGATE_FILM) private readonly queue: Queue<AggregateJobData, AggregateJobResult>,
    private readonly aggregation: AggregationService,
    private readonly store: FilmStoreService,
    config: ConfigService,
  ) {
    this.staleAfterDays = config.get<number>('aggregation.staleAfterDays') ?? 7;
  }

  async enqueue(reference: FilmReference) {
    const job = await this.queue.add('aggregate', { reference: toJobReference(reference) });
    this.logger.log(`[JOBS] queued jobId=${job.id} primaryId=${reference.primaryId ?? '-'}`);
    return { queued: true, jobId: job.id ?? null };
  }

  async aggregateAndStore(reference: FilmReference): Promise<{ film: UnifiedFilm; result: AggregateJobResult }> {
    const film = await this.aggregation.aggregate(reference);
    const result = await this.store.saveUnifiedFilm(film);
    return { film, result };
  }

  async enqueueStale(): Promise<number> {
    const films = await this.store.listStaleFilms(this.staleAfterDays);
    for (const film of films) {
      await this.queue.add(
        'aggregate',
        {
          reference: toJobReference(
            this.aggregation.referenceFrom({
              primaryId: film.tmdbId,
              crossRefId: film.imdbId,
              title: film.title,
              originalTitle: film.originalTitle,
              year: film.year,
              nativeIds: { ratings: film.imdbId, regional: film.kinopoiskId },
            }),
          ),
        },
        { jobId: `refresh:${film.tmdbId}` },
      );
    }
    this.logger.log(`[JOBS] queued stale films count=${films.length} staleAfterDays=${this.staleAfterDays}`);
    return films.length;
  }
}

function toJobReference(reference: FilmReference): AggregateJobData['reference'] {
  return {
    primaryId: reference.primaryId,
    crossRefId: reference.crossRefId,
    title: reference.title,
    originalTitle: reference.originalTitle,
    year: reference.year,
    nativeIds: reference.nativeIds ? { ...reference.nativeIds } : undefined,
  };
}
