import { CacheEntryOptions, ICacheServicePort, IRequestMetricsPort, IUnitOfWorkPort } from '@application/ports';

export const createMetricsMock = (): jest.Mocked<IRequestMetricsPort> => ({
  recordRequest: jest.fn(),
  recordCacheLookup: jest.fn(),
  recordCacheInvalidation: jest.fn(),
  recordTransaction: jest.fn(),
});

/**
 * Map-backed cache that records the options it was given.
 */
export class FakeCache implements ICacheServicePort {
  readonly entries = new Map<string, unknown>();
  readonly options = new Map<string, CacheEntryOptions | undefined>();
  cleared = 0;

  async get<T>(key: string): Promise<T | null> {
    return this.entries.has(key) ? (this.entries.get(key) as T) : null;
  }

  async set<T>(key: string, value: T, options?: CacheEntryOptions): Promise<void> {
    this.entries.set(key, value);
    this.options.set(key, options);
  }

  async getOrCreate<T>(
    key: string,
    factory: () => Promise<T>,
    options?: CacheEntryOptions,
  ): Promise<T> {
    const value = await factory();
    await this.set(key, value, options);
    return value;
  }

  async remove(key: string): Promise<void> {
    this.entries.delete(key);
  }

  async removeByPrefix(prefix: string): Promise<number> {
    const keys = [...this.entries.keys()].filter((key) => key.startsWith(`${prefix}_`));
    keys.forEach((key) => this.entries.delete(key));
    return keys.length;
  }

  async clear(): Promise<void> {
    this.entries.clear();
    this.cleared += 1;
  }
}

export class FakeUnitOfWork implements IUnitOfWorkPort {
  commits = 0;
  rollbacks = 0;

  async execute<T>(work: () => Promise<T>): Promise<T> {
    try {
      const result = await work();
      this.commits += 1;
      return result;
    } catch (error) {
      this.rollbacks += 1;
      throw error;
    }
  }
}
