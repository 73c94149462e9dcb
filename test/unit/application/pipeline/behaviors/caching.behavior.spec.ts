import { success } from '@application/common';
import { IRequestMetricsPort } from '@application/ports';
import { CacheableRequest, CachingBehavior, ResultQuery } from '@application/pipeline';
import { GetCourseByIdQuery } from '@application/use-cases';
import { FakeCache, createMetricsMock } from './test-doubles';

class DashboardQuery extends ResultQuery<string> implements CacheableRequest {
  readonly cacheDurationSeconds = 60;

  getCacheKey(): string {
    return 'Dashboard_main';
  }
}

class UncachedQuery extends ResultQuery<string> {}

describe('CachingBehavior', () => {
  let cache: FakeCache;
  let metrics: jest.Mocked<IRequestMetricsPort>;
  let behavior: CachingBehavior;

  beforeEach(() => {
    cache = new FakeCache();
    metrics = createMetricsMock();
    behavior = new CachingBehavior(cache, metrics);
  });

  describe('cacheKey', () => {
    it('should join the prefix and an upper-case hash of the request', () => {
      const key = CachingBehavior.cacheKey(new GetCourseByIdQuery('course-1'));

      expect(key).toMatch(/^GetCourseById_[0-9A-F]{64}$/);
    });

    it('should give equal requests the same key', () => {
      expect(CachingBehavior.cacheKey(new GetCourseByIdQuery('course-1'))).toBe(
        CachingBehavior.cacheKey(new GetCourseByIdQuery('course-1')),
      );
      expect(CachingBehavior.cacheKey(new GetCourseByIdQuery('course-1'))).not.toBe(
        CachingBehavior.cacheKey(new GetCourseByIdQuery('course-2')),
      );
    });

    it('should prefer a custom key', () => {
      expect(CachingBehavior.cacheKey(new DashboardQuery())).toBe('Dashboard_main');
    });
  });

  it('should run the handler and store the response on a miss', async () => {
    // Arrange
    const next = jest.fn().mockResolvedValue(success('fresh'));

    // Act
    const response = await behavior.handle(new DashboardQuery(), next);

    // Assert
    expect(response).toEqual(success('fresh'));
    expect(cache.entries.get('Dashboard_main')).toEqual(success('fresh'));
    expect(cache.options.get('Dashboard_main')).toEqual({
      absoluteExpirationSeconds: 60,
      slidingExpirationSeconds: CachingBehavior.SLIDING_EXPIRATION_SECONDS,
    });
    expect(metrics.recordCacheLookup).toHaveBeenCalledWith('Dashboard', false);
  });

  it('should serve a hit without running the handler', async () => {
    await cache.set('Dashboard_main', success('cached'));
    const next = jest.fn();

    const response = await behavior.handle(new DashboardQuery(), next);

    expect(response).toEqual(success('cached'));
    expect(next).not.toHaveBeenCalled();
    expect(metrics.recordCacheLookup).toHaveBeenCalledWith('Dashboard', true);
  });

  it('should pass requests that are not cacheable straight through', async () => {
    const next = jest.fn().mockResolvedValue(success('live'));

    await behavior.handle(new UncachedQuery(), next);
    await behavior.handle(new UncachedQuery(), next);

    expect(next).toHaveBeenCalledTimes(2);
    expect(cache.entries.size).toBe(0);
    expect(metrics.recordCacheLookup).not.toHaveBeenCalled();
  });
});
