export { CacheModule } from './cache.module';
export { MemoryCacheService, MemoryCacheOptions } from './memory-cache.service';
export { RedisCacheService, REDIS_CACHE_KEYS } from './redis-cache.service';
