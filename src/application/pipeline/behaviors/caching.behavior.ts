import { createHash } from 'crypto';
import { Inject, Injectable, Logger } from '@nestjs/common';
import { ICacheServicePort, IRequestMetricsPort, extractCachePrefix } from '../../ports';
import { NextHandler, PipelineBehavior } from '../pipeline-behavior';
import { CacheableRequest, Request, isCacheable, requestName } from '../request';

/**
 * Serves cacheable queries from the cache service.
 * Misses go through getOrCreate so concurrent identical queries run the handler once.
 */
@Injectable()
export class CachingBehavior implements PipelineBehavior {
  static readonly SLIDING_EXPIRATION_SECONDS = 300;

  private readonly logger = new Logger(CachingBehavior.name);

  constructor(
    @Inject('ICacheService')
    private readonly cache: ICacheServicePort,
    @Inject('IRequestMetrics')
    private readonly metrics: IRequestMetricsPort,
  ) {}

  async handle<TResponse>(
    request: Request<TResponse>,
    next: NextHandler<TResponse>,
  ): Promise<TResponse> {
    const name = requestName(request);
    if (!isCacheable(request)) {
      this.logger.debug(`${name} is not cacheable, skipping cache`);
      return next();
    }

    const key = CachingBehavior.cacheKey(request);
    const prefix = extractCachePrefix(key);

    const cached = await this.cache.get<TResponse>(key);
    if (cached !== null) {
      this.logger.debug(`Cache hit for ${name} with key ${key}`);
      this.metrics.recordCacheLookup(prefix, true);
      return cached;
    }

    this.logger.debug(`Cache miss for ${name} with key ${key}, executing handler`);
    this.metrics.recordCacheLookup(prefix, false);

    return this.cache.getOrCreate(key, next, {
      absoluteExpirationSeconds: request.cacheDurationSeconds,
      slidingExpirationSeconds: CachingBehavior.SLIDING_EXPIRATION_SECONDS,
    });
  }

  /**
   * `getCacheKey()` when it yields something, otherwise
   * `<prefix>_<upper-case SHA-256 of the request JSON>`.
   */
  static cacheKey(request: CacheableRequest & object): string {
    const custom = request.getCacheKey?.();
    if (custom) {
      return custom;
    }

    const prefix = request.cachePrefix ?? requestName(request);
    const hash = createHash('sha256').update(JSON.stringify(request)).digest('hex').toUpperCase();
    return `${prefix}_${hash}`;
  }
}
