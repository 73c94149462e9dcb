export type CacheItemPriority = 'low' | 'normal' | 'high' | 'never_remove';

export interface CacheEntryOptions {
  /** Entry expires this many seconds after it was written */
  absoluteExpirationSeconds?: number;
  /** Entry expires when not read for this many seconds */
  slidingExpirationSeconds?: number;
  priority?: CacheItemPriority;
  /** Units counted against the cache size limit */
  size?: number;
}

/**
 * Outbound port for the request cache.
 *
 * Keys are grouped by prefix: the text before the last underscore
 * (`GetCourseById_4F2A...` belongs to `GetCourseById`). A key with no
 * underscore, or only a leading one, is its own prefix.
 *
 * @example
 * ```typescript
 * const courses = await cache.getOrCreate('GetAllCourses_ABC', () => load(), {
 *   absoluteExpirationSeconds: 600,
 * });
 * await cache.removeByPrefix('GetAllCourses');
 * ```
 */
export interface ICacheServicePort {
  /**
   * @returns the cached value, or null when absent or expired
   */
  get<T>(key: string): Promise<T | null>;

  set<T>(key: string, value: T, options?: CacheEntryOptions): Promise<void>;

  /**
   * Returns the cached value or runs the factory and caches its result.
   * Concurrent callers for the same key share a single factory run.
   */
  getOrCreate<T>(key: string, factory: () => Promise<T>, options?: CacheEntryOptions): Promise<T>;

  remove(key: string): Promise<void>;

  /**
   * Removes every key registered under the prefix.
   *
   * @returns number of removed entries
   */
  removeByPrefix(prefix: string): Promise<number>;

  clear(): Promise<void>;
}

// Prefix a key is registered under
export const extractCachePrefix = (key: string): string => {
  const index = key.lastIndexOf('_');
  return index > 0 ? key.slice(0, index) : key;
};
