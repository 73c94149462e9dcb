import { InvalidCacheRuleError } from '../errors';

export interface CacheInvalidationRule {
  readonly prefixes: readonly string[];
  readonly reason: string;
}

// eslint-disable-next-line @typescript-eslint/ban-types
const rulesByType = new Map<Function, CacheInvalidationRule[]>();

/**
 * Declares the cache prefixes a command makes stale. Can be applied several
 * times; rules keep their declaration order.
 *
 * @example
 * ```typescript
 * @InvalidatesCache([CachePrefixes.GetAllCourses, CachePrefixes.GetCourseById], 'Course changed')
 * @InvalidatesCache(CachePrefixes.GetCoursesByInstructor)
 * export class UpdateCourseCommand extends ResultCommand<CourseOutputDto> {}
 * ```
 */
export function InvalidatesCache(prefixOrPrefixes: string | string[], reason = ''): ClassDecorator {
  const prefixes = typeof prefixOrPrefixes === 'string' ? [prefixOrPrefixes] : [...prefixOrPrefixes];

  if (prefixes.length === 0) {
    throw new InvalidCacheRuleError('at least one cache prefix must be specified');
  }
  if (prefixes.some((prefix) => prefix.trim().length === 0)) {
    throw new InvalidCacheRuleError('cache prefixes cannot be empty');
  }

  const rule: CacheInvalidationRule = { prefixes, reason };

  return (target) => {
    const existing = rulesByType.get(target) ?? [];
    // Decorators run bottom-up
    rulesByType.set(target, [rule, ...existing]);
  };
}

/**
 * @returns the rules declared on exactly this class (not inherited ones)
 */
// eslint-disable-next-line @typescript-eslint/ban-types
export function getCacheInvalidationRules(type: Function): readonly CacheInvalidationRule[] {
  return [...(rulesByType.get(type) ?? [])];
}
