import { Logger, Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import Redis from 'ioredis';
import { CacheBackend } from '../../config/aggregation.config';
import { CACHE_STORE, CacheStore } from './cache/cache-store.interface';
import { MemoryCacheStore } from './cache/memory-cache.store';
import { RedisCacheStore } from './cache/redis-cache.store';

@Module({
  providers: [
    {
      provide: CACHE_STORE,
      inject: [ConfigService],
      useFactory: (config: ConfigService): CacheStore => {
        const logger = new Logger('GatewayModule');
        const backend = config.get<CacheBackend>('aggregation.cacheBackend') ?? 'redis';
        if (backend === 'memory') {
          logger.log('[GATEWAY] response cache backend=memory');
          return new MemoryCacheStore();
        }

        const host = config.get<string>('redis.host');
        const port = config.get<number>('redis.port');
        logger.log(`[GATEWAY] response cache backend=redis host=${host}:${port}`);
        return new RedisCacheStore(new Redis({ host, port }));
      },
    },
  ],
  exports: [CACHE_STORE],
})
export class GatewayModule {}
