import { Module } from '@nestjs/common';
import { IdentityModule } from '../identity/identity.module';
import { ProvidersModule } from '../providers/providers.module';
import { AggregationService } from './aggregation.service';

@Module({
  imports: [ProvidersModule, IdentityModule],
  providers: [AggregationService],
  exports: [AggregationService],
})
export class AggregationModule {}
