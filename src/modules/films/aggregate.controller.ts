import {
  BadGatewayException,
  BadRequestException,
  Body,
  Controller,
  NotFoundException,
  Param,
  Post,
  Query,
} from '@nestjs/common';
import { AggregationError } from '../aggregation/aggregation.errors';
import { AggregationService } from '../aggregation/aggregation.service';
import { FilmReference, FilmReferenceDto } from '../identity/dto/film-reference.dto';
import { FilmJobsService } from './film-jobs.service';

function isInline(value?: string): boolean {
  return value === '1' || value === 'true';
}

@Controller('aggregate')
export class AggregateController {
  constructor(
    private readonly jobs: FilmJobsService,
    private readonly aggregation: AggregationService,
  ) {}

  @Post(':primaryId')
  async aggregateById(@Param('primaryId') primaryId: string, @Query('inline') inline?: string) {
    return this.run(() => this.aggregation.referenceFrom({ primaryId }), inline);
  }

  @Post()
  async aggregateReference(@Body() body: FilmReferenceDto, @Query('inline') inline?: string) {
    return this.run(() => this.aggregation.referenceFrom(body), inline);
  }

  private async run(build: () => FilmReference, inline?: string) {
    try {
      const reference = build();
      if (!isInline(inline)) return await this.jobs.enqueue(reference);
      const { film } = await this.jobs.aggregateAndStore(reference);
      return film;
    } catch (error) {
      if (!(error instanceof AggregationError)) throw error;
      switch (error.reason) {
        case 'primary_not_found':
          throw new NotFoundException(error.message);
        case 'invalid_reference':
          throw new BadRequestException(error.message);
        case 'primary_unreachable':
          throw new BadGatewayException(error.message);
      }
      throw error;
    }
  }
}
