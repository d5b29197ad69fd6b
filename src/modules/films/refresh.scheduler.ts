import { Injectable, Logger } from '@nestjs/common';
import { Cron } from '@nestjs/schedule';
import { errorMessage } from '../../common/error-message';
import { FilmJobsService } from './film-jobs.service';

@Injectable()
export class RefreshScheduler {
  private readonly logger = new Logger(RefreshScheduler.name);

  constructor(private readonly jobs: FilmJobsService) {}

  @Cron('0 3 * * *')
  async refreshStaleFilms(): Promise<void> {
    try {
      await this.jobs.enqueueStale();
    } catch (error) {
      this.logger.error(`[REFRESH] enqueue failed error=${errorMessage(error)}`);
    }
  }
}
