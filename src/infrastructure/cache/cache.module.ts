import { Module, Global } from '@nestjs/common';
import { RedisModule, getRedisConnectionToken } from '@nestjs-modules/ioredis';
import Redis from 'ioredis';
import { EnvConfigService } from '@infrastructure/config';
import { MemoryCacheService } from './memory-cache.service';
import { RedisCacheService } from './redis-cache.service';

/**
 * Provides the request cache selected by CACHE_DRIVER.
 * The Redis connection is lazy, so the memory driver never opens it.
 */
@Global()
@Module({
  imports: [
    RedisModule.forRootAsync({
      useFactory: (envConfig: EnvConfigService) => ({
        type: 'single',
        url: envConfig.redisUrl,
        options: { lazyConnect: true },
      }),
      inject: [EnvConfigService],
    }),
  ],
  providers: [
    {
      provide: 'ICacheService',
      useFactory: (envConfig: EnvConfigService, redis: Redis) =>
        envConfig.cacheDriver === 'redis'
          ? new RedisCacheService(redis)
          : new MemoryCacheService({ sizeLimit: envConfig.cacheSizeLimit }),
      inject: [EnvConfigService, getRedisConnectionToken()],
    },
  ],
  exports: ['ICacheService', RedisModule],
})
export class CacheModule {}
