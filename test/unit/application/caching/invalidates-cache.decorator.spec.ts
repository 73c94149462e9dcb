import {
  CachePrefixes,
  InvalidatesCache,
  getCacheInvalidationRules,
} from '@application/caching';
import { InvalidCacheRuleError } from '@application/errors';
import { CreateCourseCommand, PublishCourseCommand } from '@application/use-cases';

describe('InvalidatesCache', () => {
  it('should keep rules in declaration order', () => {
    const rules = getCacheInvalidationRules(CreateCourseCommand);

    expect(rules).toEqual([
      {
        prefixes: [CachePrefixes.GetAllCourses, CachePrefixes.GetCoursesByCategory],
        reason: 'New course appears in listings',
      },
      { prefixes: [CachePrefixes.GetCoursesByInstructor], reason: 'Instructor has a new course' },
    ]);
  });

  it('should accept a single prefix', () => {
    @InvalidatesCache('Reports')
    class RebuildReportsCommand {}

    expect(getCacheInvalidationRules(RebuildReportsCommand)).toEqual([
      { prefixes: ['Reports'], reason: '' },
    ]);
  });

  it('should not inherit rules from a base class', () => {
    @InvalidatesCache('Base')
    class BaseCommand {}
    class DerivedCommand extends BaseCommand {}

    expect(getCacheInvalidationRules(DerivedCommand)).toEqual([]);
  });

  it('should give every course state command its own rules', () => {
    expect(getCacheInvalidationRules(PublishCourseCommand).length).toBeGreaterThan(0);
  });

  it('should reject an empty prefix list', () => {
    expect(() => InvalidatesCache([])).toThrow(InvalidCacheRuleError);
  });

  it('should reject blank prefixes', () => {
    expect(() => InvalidatesCache(['GetAllCourses', '  '])).toThrow(
      'Invalid cache invalidation rule: cache prefixes cannot be empty',
    );
  });
});
