import { Controller, Get, Query } from '@nestjs/common';
import { AggregationService } from '../aggregation/aggregation.service';
import { SearchFilmsQueryDto } from './dto/search-films.query.dto';

@Controller('films')
export class FilmsController {
  constructor(private readonly aggregation: AggregationService) {}

  @Get('search')
  async search(@Query() query: SearchFilmsQueryDto) {
    const items = await this.aggregation.searchFilms(query.q, query.year ?? null);
    return { items, total: items.length };
  }
}
