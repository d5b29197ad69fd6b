import { BullModule } from '@nestjs/bullmq';
import { Module } from '@nestjs/common';
import { AggregationModule } from '../aggregation/aggregation.module';
import { AggregateController } from './aggregate.controller';
import { AggregateProcessor } from './aggregate.processor';
import { FilmJobsService, QUEUE_AGGREGATE_FILM } from './film-jobs.service';
import { FilmStoreService } from './film-store.service';
import { FilmsController } from './films.controller';
import { RefreshScheduler } from './refresh.scheduler';

@Module({
  imports: [
    AggregationModule,
    BullModule.registerQueue({
      name: QUEUE_AGGREGATE_FILM,
      defaultJobOptions: {
        attempts: 3,
        backoff: { type: 'exponential', delay: 5000 },
        removeOnComplete: true,
      },
    }),
  ],
  controllers: [AggregateController, FilmsController],
  providers: [FilmStoreService, FilmJobsService, AggregateProcessor, RefreshScheduler],
  exports: [FilmStoreService, FilmJobsService],
})
export class FilmsModule {}
