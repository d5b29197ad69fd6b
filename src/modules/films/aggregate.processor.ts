import { Processor, WorkerHost } from '@nestjs/bullmq';
import { Logger } from '@nestjs/common';
import { Job, UnrecoverableError } from 'bullmq';
import { AggregationError } from '../aggregation/aggregation.errors';
import { AggregationService } from '../aggregation/aggregation.service';
import { AggregateJobData, AggregateJobResult } from './dto/aggregate-job.dto';
import { FilmJobsService, QUEUE_AGGREGATE_FILM } from './film-jobs.service';

@Processor(QUEUE_AGGREGATE_FILM)
export class AggregateProcessor extends WorkerHost {
  private readonly logger = new Logger(AggregateProcessor.name);

  constructor(
    private readonly jobs: FilmJobsService,
    private readonly aggregation: AggregationService,
  ) {
    super();
  }

  async process(job: Pick<Job<AggregateJobData, AggregateJobResult>, 'id' | 'data'>): Promise<AggregateJobResult> {
    try {
      const reference = this.aggregation.referenceFrom(job.data?.reference ?? {});
      const { result } = await this.jobs.aggregateAndStore(reference);
      return result;
    } catch (error) {
      // job-level retries cannot fix a missing film or a bad reference
      if (error instanceof AggregationError && error.permanent) {
        this.logger.warn(`[JOBS] giving up jobId=${job.id} reason=${error.reason} message=${error.message}`);
        throw new UnrecoverableError(error.message);
      }
      throw error;
    }
  }
}
