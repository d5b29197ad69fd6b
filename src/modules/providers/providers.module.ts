import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ProvidersConfig } from '../../config/providers.config';
import { CACHE_STORE, CacheStore } from '../gateway/cache/cache-store.interface';
import { GatewayModule } from '../gateway/gateway.module';
import { KinopoiskAdapter } from './adapters/kinopoisk.adapter';
import { OmdbAdapter } from './adapters/omdb.adapter';
import { TmdbAdapter } from './adapters/tmdb.adapter';
import { createProviderGateway } from './provider-clients';
import { ProviderRegistry } from './provider-registry';

function settings(config: ConfigService): ProvidersConfig {
  return config.getOrThrow<ProvidersConfig>('providers');
}

@Module({
  imports: [GatewayModule],
  providers: [
    {
      provide: TmdbAdapter,
      inject: [ConfigService, CACHE_STORE],
      useFactory: (config: ConfigService, cache: CacheStore) => {
        const { primary } = settings(config);
        return new TmdbAdapter(createProviderGateway('primary', primary, cache), primary.language);
      },
    },
    {
      provide: OmdbAdapter,
      inject: [ConfigService, CACHE_STORE],
      useFactory: (config: ConfigService, cache: CacheStore) =>
        new OmdbAdapter(createProviderGateway('ratings', settings(config).ratings, cache)),
    },
    {
      provide: KinopoiskAdapter,
      inject: [ConfigService, CACHE_STORE],
      useFactory: (config: ConfigService, cache: CacheStore) =>
        new KinopoiskAdapter(createProviderGateway('regional', settings(config).regional, cache)),
    },
    ProviderRegistry,
  ],
  exports: [ProviderRegistry, GatewayModule],
})
export class ProvidersModule {}
