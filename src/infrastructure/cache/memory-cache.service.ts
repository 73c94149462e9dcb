import { Logger } from '@nestjs/common';
import {
  CacheEntryOptions,
  CacheItemPriority,
  ICacheServicePort,
  extractCachePrefix,
} from '@application/ports';

export interface MemoryCacheOptions {
  /** Total size units the cache may hold; entries without a size count as 1 */
  sizeLimit: number;
}

interface CacheEntry {
  value: unknown;
  size: number;
  priority: CacheItemPriority;
  lastAccessedAt: number;
  absoluteExpiresAt: number | null;
  slidingMs: number | null;
}

// Eviction order when the size limit is reached
const EVICTION_ORDER: readonly CacheItemPriority[] = ['low', 'normal', 'high'];

/**
 * In-process cache with a prefix registry for invalidation.
 * Expired entries are dropped when read or when space is needed.
 */
export class MemoryCacheService implements ICacheServicePort {
  private readonly logger = new Logger(MemoryCacheService.name);
  private readonly entries = new Map<string, CacheEntry>();
  private readonly prefixRegistry = new Map<string, Set<string>>();
  private readonly inFlight = new Map<string, Promise<unknown>>();
  // Bumped on invalidation; a factory result from an older generation is not stored
  private readonly prefixGenerations = new Map<string, number>();
  private clearGeneration = 0;
  private currentSize = 0;

  constructor(private readonly options: MemoryCacheOptions) {}

  get entryCount(): number {
    return this.entries.size;
  }

  async get<T>(key: string): Promise<T | null> {
    const entry = this.readEntry(key);
    return entry ? (entry.value as T) : null;
  }

  async set<T>(key: string, value: T, options: CacheEntryOptions = {}): Promise<void> {
    this.writeEntry(key, value, options);
  }

  async getOrCreate<T>(
    key: string,
    factory: () => Promise<T>,
    options: CacheEntryOptions = {},
  ): Promise<T> {
    const entry = this.readEntry(key);
    if (entry) {
      return entry.value as T;
    }

    const pending = this.inFlight.get(key);
    if (pending) {
      return pending as Promise<T>;
    }

    const generation = this.generationOf(key);
    const creation = factory()
      .then((value) => {
        if (this.generationOf(key) === generation) {
          this.writeEntry(key, value, options);
        } else {
          this.logger.debug(`Discarded result for ${key}, invalidated while loading`);
        }
        return value;
      })
      .finally(() => {
        if (this.inFlight.get(key) === creation) {
          this.inFlight.delete(key);
        }
      });

    this.inFlight.set(key, creation);
    return creation;
  }

  async remove(key: string): Promise<void> {
    this.deleteEntry(key);
    this.unregisterKey(key);
    this.logger.debug(`Removed cache entry for key ${key}`);
  }

  async removeByPrefix(prefix: string): Promise<number> {
    this.prefixGenerations.set(prefix, (this.prefixGenerations.get(prefix) ?? 0) + 1);
    for (const key of [...this.inFlight.keys()]) {
      if (extractCachePrefix(key) === prefix) {
        this.inFlight.delete(key);
      }
    }

    const keys = this.prefixRegistry.get(prefix);
    if (!keys) {
      this.logger.debug(`No cache entries found with prefix ${prefix}`);
      return 0;
    }

    const keysToRemove = [...keys];
    for (const key of keysToRemove) {
      this.deleteEntry(key);
      this.unregisterKey(key);
    }

    this.logger.debug(`Removed ${keysToRemove.length} cache entries with prefix ${prefix}`);
    return keysToRemove.length;
  }

  async clear(): Promise<void> {
    this.clearGeneration++;
    this.inFlight.clear();
    for (const keys of this.prefixRegistry.values()) {
      for (const key of keys) {
        this.deleteEntry(key);
      }
    }
    this.prefixRegistry.clear();
    this.logger.debug('Cleared all cache entries');
  }

  private readEntry(key: string): CacheEntry | null {
    const entry = this.entries.get(key);
    if (!entry) {
      return null;
    }

    const now = Date.now();
    if (this.isExpired(entry, now)) {
      this.deleteEntry(key);
      this.unregisterKey(key);
      return null;
    }

    entry.lastAccessedAt = now;
    return entry;
  }

  private writeEntry(key: string, value: unknown, options: CacheEntryOptions): void {
    const now = Date.now();
    const size = options.size ?? 1;

    this.deleteEntry(key);
    if (!this.makeRoom(size, now)) {
      this.unregisterKey(key);
      this.logger.warn(`Cache size limit reached, ${key} was not cached`);
      return;
    }

    this.entries.set(key, {
      value,
      size,
      priority: options.priority ?? 'normal',
      lastAccessedAt: now,
      absoluteExpiresAt:
        options.absoluteExpirationSeconds !== undefined
          ? now + options.absoluteExpirationSeconds * 1000
          : null,
      slidingMs:
        options.slidingExpirationSeconds !== undefined
          ? options.slidingExpirationSeconds * 1000
          : null,
    });
    this.currentSize += size;
    this.registerKey(key);
    this.logger.debug(`Cached value for key ${key}`);
  }

  private generationOf(key: string): string {
    return `${this.clearGeneration}:${this.prefixGenerations.get(extractCachePrefix(key)) ?? 0}`;
  }

  private isExpired(entry: CacheEntry, now: number): boolean {
    if (entry.absoluteExpiresAt !== null && now >= entry.absoluteExpiresAt) {
      return true;
    }
    return entry.slidingMs !== null && now - entry.lastAccessedAt >= entry.slidingMs;
  }

  /**
   * Frees space for an entry of the given size: expired entries first,
   * then least recently used entries by priority. `never_remove` entries stay.
   */
  private makeRoom(size: number, now: number): boolean {
    if (size > this.options.sizeLimit) {
      return false;
    }
    if (this.currentSize + size <= this.options.sizeLimit) {
      return true;
    }

    for (const [key, entry] of [...this.entries]) {
      if (this.isExpired(entry, now)) {
        this.deleteEntry(key);
        this.unregisterKey(key);
      }
    }

    for (const priority of EVICTION_ORDER) {
      const candidates = [...this.entries]
        .filter(([, entry]) => entry.priority === priority)
        .sort(([, a], [, b]) => a.lastAccessedAt - b.lastAccessedAt);

      for (const [key] of candidates) {
        if (this.currentSize + size <= this.options.sizeLimit) {
          return true;
        }
        this.deleteEntry(key);
        this.unregisterKey(key);
        this.logger.debug(`Evicted cache entry ${key}`);
      }
    }

    return this.currentSize + size <= this.options.sizeLimit;
  }

  private deleteEntry(key: string): void {
    const entry = this.entries.get(key);
    if (entry) {
      this.currentSize -= entry.size;
      this.entries.delete(key);
    }
  }

  private registerKey(key: string): void {
    const prefix = extractCachePrefix(key);
    const keys = this.prefixRegistry.get(prefix);
    if (keys) {
      keys.add(key);
    } else {
      this.prefixRegistry.set(prefix, new Set([key]));
    }
  }

  private unregisterKey(key: string): void {
    const prefix = extractCachePrefix(key);
    const keys = this.prefixRegistry.get(prefix);
    if (!keys) {
      return;
    }

    keys.delete(key);
    if (keys.size === 0) {
      this.prefixRegistry.delete(prefix);
    }
  }
}
