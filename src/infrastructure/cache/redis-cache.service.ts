import { Injectable, Logger } from '@nestjs/common';
import { InjectRedis } from '@nestjs-modules/ioredis';
import Redis from 'ioredis';
import { CacheEntryOptions, ICacheServicePort, extractCachePrefix } from '@application/ports';

/**
 * Redis key layout
 */
export const REDIS_CACHE_KEYS = {
  entry: (key: string) => `cache:entry:${key}`,
  prefix: (prefix: string) => `cache:prefix:${prefix}`,
  prefixes: () => 'cache:prefixes',
} as const;

interface CacheEnvelope<T> {
  value: T;
  /** Epoch ms, or null when only sliding expiration applies */
  absoluteExpiresAt: number | null;
  slidingSeconds: number | null;
}

/**
 * Shared cache for multi-instance deployments. Priority and size are not
 * enforced: Redis applies its own eviction policy.
 */
@Injectable()
export class RedisCacheService implements ICacheServicePort {
  private readonly logger = new Logger(RedisCacheService.name);
  private readonly inFlight = new Map<string, Promise<unknown>>();

  constructor(
    @InjectRedis()
    private readonly redis: Redis,
  ) {}

  async get<T>(key: string): Promise<T | null> {
    try {
      const raw = await this.redis.get(REDIS_CACHE_KEYS.entry(key));
      if (!raw) {
        this.logger.debug(`Cache MISS: ${key}`);
        return null;
      }

      const envelope = JSON.parse(raw) as CacheEnvelope<T>;
      await this.refreshSliding(key, envelope);
      this.logger.debug(`Cache HIT: ${key}`);
      return envelope.value;
    } catch (error) {
      // Unreachable cache behaves as a miss
      this.logger.error(`Cache GET error for ${key}:`, error);
      return null;
    }
  }

  async set<T>(key: string, value: T, options: CacheEntryOptions = {}): Promise<void> {
    const envelope: CacheEnvelope<T> = {
      value,
      absoluteExpiresAt:
        options.absoluteExpirationSeconds !== undefined
          ? Date.now() + options.absoluteExpirationSeconds * 1000
          : null,
      slidingSeconds: options.slidingExpirationSeconds ?? null,
    };
    const ttlMs = this.ttlMs(envelope);

    try {
      const prefix = extractCachePrefix(key);
      const pipeline = this.redis
        .multi()
        .sadd(REDIS_CACHE_KEYS.prefixes(), prefix)
        .sadd(REDIS_CACHE_KEYS.prefix(prefix), key);

      if (ttlMs === null) {
        pipeline.set(REDIS_CACHE_KEYS.entry(key), JSON.stringify(envelope));
      } else {
        pipeline.set(REDIS_CACHE_KEYS.entry(key), JSON.stringify(envelope), 'PX', ttlMs);
      }
      await pipeline.exec();
      this.logger.debug(`Cache SET: ${key} (TTL: ${ttlMs ?? 'none'}ms)`);
    } catch (error) {
      this.logger.error(`Cache SET error for ${key}:`, error);
    }
  }

  async getOrCreate<T>(
    key: string,
    factory: () => Promise<T>,
    options: CacheEntryOptions = {},
  ): Promise<T> {
    const cached = await this.get<T>(key);
    if (cached !== null) {
      return cached;
    }

    const pending = this.inFlight.get(key);
    if (pending) {
      return pending as Promise<T>;
    }

    const creation = factory()
      .then(async (value) => {
        await this.set(key, value, options);
        return value;
      })
      .finally(() => {
        this.inFlight.delete(key);
      });

    this.inFlight.set(key, creation);
    return creation;
  }

  // Invalidation errors are logged like read errors; the write that triggered them has already succeeded

  async remove(key: string): Promise<void> {
    try {
      const prefix = extractCachePrefix(key);
      await this.redis
        .multi()
        .del(REDIS_CACHE_KEYS.entry(key))
        .srem(REDIS_CACHE_KEYS.prefix(prefix), key)
        .exec();
      await this.dropPrefixIfEmpty(prefix);
      this.logger.debug(`Removed cache entry for key ${key}`);
    } catch (error) {
      this.logger.warn(`Cache REMOVE error for ${key}: ${this.describe(error)}`);
    }
  }

  async removeByPrefix(prefix: string): Promise<number> {
    try {
      return await this.deletePrefix(prefix);
    } catch (error) {
      this.logger.warn(`Cache REMOVE error for prefix ${prefix}: ${this.describe(error)}`);
      return 0;
    }
  }

  async clear(): Promise<void> {
    try {
      const prefixes = await this.redis.smembers(REDIS_CACHE_KEYS.prefixes());
      for (const prefix of prefixes) {
        await this.deletePrefix(prefix);
      }
      await this.redis.del(REDIS_CACHE_KEYS.prefixes());
      this.logger.debug('Cleared all cache entries');
    } catch (error) {
      this.logger.warn(`Cache CLEAR error: ${this.describe(error)}`);
    }
  }

  private async deletePrefix(prefix: string): Promise<number> {
    const keys = await this.redis.smembers(REDIS_CACHE_KEYS.prefix(prefix));
    if (keys.length === 0) {
      this.logger.debug(`No cache entries found with prefix ${prefix}`);
      return 0;
    }

    await this.redis
      .multi()
      .del(...keys.map((key) => REDIS_CACHE_KEYS.entry(key)))
      .del(REDIS_CACHE_KEYS.prefix(prefix))
      .srem(REDIS_CACHE_KEYS.prefixes(), prefix)
      .exec();

    this.logger.debug(`Removed ${keys.length} cache entries with prefix ${prefix}`);
    return keys.length;
  }

  private describe(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
  }

  private ttlMs(envelope: CacheEnvelope<unknown>, now: number = Date.now()): number | null {
    const candidates: number[] = [];
    if (envelope.absoluteExpiresAt !== null) {
      candidates.push(Math.max(envelope.absoluteExpiresAt - now, 1));
    }
    if (envelope.slidingSeconds !== null) {
      candidates.push(envelope.slidingSeconds * 1000);
    }
    return candidates.length > 0 ? Math.min(...candidates) : null;
  }

  private async refreshSliding(key: string, envelope: CacheEnvelope<unknown>): Promise<void> {
    if (envelope.slidingSeconds === null) {
      return;
    }
    const ttlMs = this.ttlMs(envelope);
    if (ttlMs !== null) {
      await this.redis.pexpire(REDIS_CACHE_KEYS.entry(key), ttlMs);
    }
  }

  private async dropPrefixIfEmpty(prefix: string): Promise<void> {
    const remaining = await this.redis.scard(REDIS_CACHE_KEYS.prefix(prefix));
    if (remaining === 0) {
      await this.redis.srem(REDIS_CACHE_KEYS.prefixes(), prefix);
    }
  }
}
