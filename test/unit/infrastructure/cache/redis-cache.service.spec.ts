import { Logger } from '@nestjs/common';
import Redis from 'ioredis';
import { RedisCacheService } from '@infrastructure/cache/redis-cache.service';

describe('RedisCacheService', () => {
  let transaction: {
    del: jest.Mock;
    srem: jest.Mock;
    sadd: jest.Mock;
    set: jest.Mock;
    exec: jest.Mock;
  };
  let mockRedis: {
    get: jest.Mock;
    smembers: jest.Mock;
    scard: jest.Mock;
    srem: jest.Mock;
    del: jest.Mock;
    multi: jest.Mock;
  };
  let warnSpy: jest.SpyInstance;
  let cache: RedisCacheService;

  beforeEach(() => {
    transaction = {
      del: jest.fn(),
      srem: jest.fn(),
      sadd: jest.fn(),
      set: jest.fn(),
      exec: jest.fn().mockResolvedValue([]),
    };
    transaction.del.mockReturnValue(transaction);
    transaction.srem.mockReturnValue(transaction);
    transaction.sadd.mockReturnValue(transaction);
    transaction.set.mockReturnValue(transaction);

    mockRedis = {
      get: jest.fn().mockResolvedValue(null),
      smembers: jest.fn().mockResolvedValue([]),
      scard: jest.fn().mockResolvedValue(0),
      srem: jest.fn().mockResolvedValue(1),
      del: jest.fn().mockResolvedValue(1),
      multi: jest.fn().mockReturnValue(transaction),
    };

    jest.spyOn(Logger.prototype, 'debug').mockImplementation(() => undefined);
    jest.spyOn(Logger.prototype, 'error').mockImplementation(() => undefined);
    warnSpy = jest.spyOn(Logger.prototype, 'warn').mockImplementation(() => undefined);

    cache = new RedisCacheService(mockRedis as unknown as Redis);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('removeByPrefix', () => {
    it('should delete every entry indexed under the prefix', async () => {
      // Arrange
      mockRedis.smembers.mockResolvedValue(['GetAllCourses_A', 'GetAllCourses_B']);

      // Act
      const removed = await cache.removeByPrefix('GetAllCourses');

      // Assert
      expect(removed).toBe(2);
      expect(mockRedis.smembers).toHaveBeenCalledWith('cache:prefix:GetAllCourses');
      expect(transaction.del).toHaveBeenCalledWith(
        'cache:entry:GetAllCourses_A',
        'cache:entry:GetAllCourses_B',
      );
      expect(transaction.del).toHaveBeenCalledWith('cache:prefix:GetAllCourses');
      expect(transaction.srem).toHaveBeenCalledWith('cache:prefixes', 'GetAllCourses');
    });

    it('should report nothing removed when Redis is unreachable', async () => {
      // Arrange
      mockRedis.smembers.mockRejectedValue(new Error('ECONNREFUSED'));

      // Act
      const removed = await cache.removeByPrefix('GetAllCourses');

      // Assert
      expect(removed).toBe(0);
      expect(warnSpy).toHaveBeenCalledWith(
        'Cache REMOVE error for prefix GetAllCourses: ECONNREFUSED',
      );
    });

    it('should not fail when the delete transaction is rejected', async () => {
      mockRedis.smembers.mockResolvedValue(['GetUsers_A']);
      transaction.exec.mockRejectedValue(new Error('Connection is closed.'));

      await expect(cache.removeByPrefix('GetUsers')).resolves.toBe(0);
      expect(warnSpy).toHaveBeenCalledWith(
        'Cache REMOVE error for prefix GetUsers: Connection is closed.',
      );
    });
  });

  describe('remove', () => {
    it('should drop the prefix from the index once its last key is gone', async () => {
      await cache.remove('GetCourseById_A');

      expect(transaction.del).toHaveBeenCalledWith('cache:entry:GetCourseById_A');
      expect(transaction.srem).toHaveBeenCalledWith('cache:prefix:GetCourseById', 'GetCourseById_A');
      expect(mockRedis.srem).toHaveBeenCalledWith('cache:prefixes', 'GetCourseById');
    });

    it('should log instead of throwing when Redis is unreachable', async () => {
      transaction.exec.mockRejectedValue(new Error('ECONNREFUSED'));

      await expect(cache.remove('GetCourseById_A')).resolves.toBeUndefined();
      expect(warnSpy).toHaveBeenCalledWith('Cache REMOVE error for GetCourseById_A: ECONNREFUSED');
    });
  });

  describe('clear', () => {
    it('should remove every indexed prefix', async () => {
      mockRedis.smembers.mockImplementation(async (key: string) =>
        key === 'cache:prefixes' ? ['GetUsers'] : ['GetUsers_A'],
      );

      await cache.clear();

      expect(transaction.del).toHaveBeenCalledWith('cache:entry:GetUsers_A');
      expect(mockRedis.del).toHaveBeenCalledWith('cache:prefixes');
    });

    it('should log instead of throwing when Redis is unreachable', async () => {
      mockRedis.smembers.mockRejectedValue(new Error('ECONNREFUSED'));

      await expect(cache.clear()).resolves.toBeUndefined();
      expect(warnSpy).toHaveBeenCalledWith('Cache CLEAR error: ECONNREFUSED');
    });
  });

  describe('get', () => {
    it('should treat an unreachable Redis as a miss', async () => {
      mockRedis.get.mockRejectedValue(new Error('ECONNREFUSED'));

      expect(await cache.get('GetCourseById_A')).toBeNull();
    });
  });
});
