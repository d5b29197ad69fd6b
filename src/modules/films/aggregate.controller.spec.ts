import { BadGatewayException, BadRequestException, NotFoundException } from '@nestjs/common';
import { Test } from '@nestjs/testing';
import { AggregationError } from '../aggregation/aggregation.errors';
import { AggregationService } from '../aggregation/aggregation.service';
import { createFilmReference } from '../identity/dto/film-reference.dto';
import { AggregateController } from './aggregate.controller';
import { FilmJobsService } from './film-jobs.service';

describe('AggregateController', () => {
  const jobs = { enqueue: jest.fn(), aggregateAndStore: jest.fn() };
  const aggregation = {
    referenceFrom: jest.fn((input: Parameters<typeof createFilmReference>[0]) => {
      try {
        return createFilmReference(input);
      } catch (error) {
        throw new AggregationError('invalid_reference', null, error instanceof Error ? error.message : 'invalid');
      }
    }),
  };
  let controller: AggregateController;

  beforeEach(async () => {
    jest.clearAllMocks();
    const moduleRef = await Test.createTestingModule({
      controllers: [AggregateController],
      providers: [
        { provide: FilmJobsService, useValue: jobs },
        { provide: AggregationService, useValue: aggregation },
      ],
    }).compile();
    controller = moduleRef.get(AggregateController);
  });

  it('queues by default', async () => {
    jobs.enqueue.mockResolvedValue({ queued: true, jobId: '7' });

    await expect(controller.aggregateById('949')).resolves.toEqual({ queued: true, jobId: '7' });
    expect(jobs.aggregateAndStore).not.toHaveBeenCalled();
  });

  it('runs inline and returns the unified film', async () => {
    jobs.aggregateAndStore.mockResolvedValue({ film: { primaryId: '949' }, result: { filmId: 1 } });

    await expect(controller.aggregateById('949', '1')).resolves.toEqual({ primaryId: '949' });
  });

  it('maps aggregation failures to HTTP errors', async () => {
    jobs.aggregateAndStore.mockRejectedValueOnce(new AggregationError('primary_not_found', null, 'missing'));
    await expect(controller.aggregateById('1', 'true')).rejects.toBeInstanceOf(NotFoundException);

    jobs.aggregateAndStore.mockRejectedValueOnce(new AggregationError('primary_unreachable', null, 'down'));
    await expect(controller.aggregateById('1', '1')).rejects.toBeInstanceOf(BadGatewayException);

    await expect(controller.aggregateReference({ title: ' ' })).rejects.toBeInstanceOf(BadRequestException);
  });
});
