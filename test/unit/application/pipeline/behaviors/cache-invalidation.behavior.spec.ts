import { InvalidatesCache } from '@application/caching';
import { success } from '@application/common';
import { MissingCacheInvalidationError } from '@application/errors';
import { IRequestMetricsPort } from '@application/ports';
import {
  CacheInvalidationBehavior,
  CacheInvalidationOptions,
  ResultCommand,
  ResultQuery,
} from '@application/pipeline';
import { FakeCache, createMetricsMock } from './test-doubles';

@InvalidatesCache(['GetAllCourses', 'GetCourseById'], 'Course changed')
@InvalidatesCache('GetCoursesByInstructor')
class EditCourseCommand extends ResultCommand<string> {}

class UndeclaredCommand extends ResultCommand<string> {}

class ListCoursesQuery extends ResultQuery<string[]> {}

const lenientOptions: CacheInvalidationOptions = {
  requireExplicitRules: false,
  throwOnMissingRulesInStrictEnvironment: true,
  strictValidationEnvironment: 'development',
  environment: 'production',
};

describe('CacheInvalidationBehavior', () => {
  let cache: FakeCache;
  let metrics: jest.Mocked<IRequestMetricsPort>;

  const createBehavior = (options: CacheInvalidationOptions = lenientOptions) =>
    new CacheInvalidationBehavior(cache, metrics, options);

  beforeEach(async () => {
    cache = new FakeCache();
    metrics = createMetricsMock();
    await cache.set('GetAllCourses_A1', 'page 1');
    await cache.set('GetAllCourses_B2', 'page 2');
    await cache.set('GetCourseById_C3', 'course');
    await cache.set('GetUserById_D4', 'user');
  });

  it('should remove every declared prefix after the command ran', async () => {
    // Act
    const response = await createBehavior().handle(new EditCourseCommand(), async () =>
      success('saved'),
    );

    // Assert
    expect(response).toEqual(success('saved'));
    expect([...cache.entries.keys()]).toEqual(['GetUserById_D4']);
    expect(metrics.recordCacheInvalidation.mock.calls).toEqual([
      ['GetAllCourses', 2],
      ['GetCourseById', 1],
      ['GetCoursesByInstructor', 0],
    ]);
  });

  it('should leave the cache alone for queries', async () => {
    await createBehavior().handle(new ListCoursesQuery(), async () => success([]));

    expect(cache.entries.size).toBe(4);
    expect(cache.cleared).toBe(0);
  });

  it('should clear the whole cache for a command without rules', async () => {
    await createBehavior().handle(new UndeclaredCommand(), async () => success('done'));

    expect(cache.cleared).toBe(1);
    expect(cache.entries.size).toBe(0);
  });

  it('should fail a command without rules when rules are required', async () => {
    const behavior = createBehavior({ ...lenientOptions, requireExplicitRules: true });

    await expect(
      behavior.handle(new UndeclaredCommand(), async () => success('done')),
    ).rejects.toThrow(MissingCacheInvalidationError);
    expect(cache.cleared).toBe(0);
  });

  it('should fail a command without rules in the strict environment', async () => {
    const behavior = createBehavior({ ...lenientOptions, environment: 'development' });

    await expect(
      behavior.handle(new UndeclaredCommand(), async () => success('done')),
    ).rejects.toThrow('Command UndeclaredCommand has no @InvalidatesCache rules.');
  });
});
