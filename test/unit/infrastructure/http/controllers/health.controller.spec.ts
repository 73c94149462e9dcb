import { Test, TestingModule } from '@nestjs/testing';
import { getConnectionToken } from '@nestjs/mongoose';
import { getRedisConnectionToken } from '@nestjs-modules/ioredis';
import { HealthController } from '@infrastructure/http/controllers/health.controller';
import { EnvConfigService } from '@infrastructure/config/env-config.service';

describe('HealthController', () => {
  let controller: HealthController;
  let mockEnvConfigService: { nodeEnv: string; cacheDriver: 'memory' | 'redis' };
  let mongoPing: jest.Mock;
  let mockMongoConnection: {
    readyState: number;
    db: { admin: () => { ping: jest.Mock } };
  };
  let mockRedis: { ping: jest.Mock };

  beforeEach(async () => {
    mockEnvConfigService = {
      nodeEnv: 'development',
      cacheDriver: 'memory',
    };

    mongoPing = jest.fn().mockResolvedValue({ ok: 1 });
    mockMongoConnection = {
      readyState: 1,
      db: { admin: () => ({ ping: mongoPing }) },
    };
    mockRedis = { ping: jest.fn().mockResolvedValue('PONG') };

    const module: TestingModule = await Test.createTestingModule({
      controllers: [HealthController],
      providers: [
        { provide: EnvConfigService, useValue: mockEnvConfigService },
        { provide: getConnectionToken(), useValue: mockMongoConnection },
        { provide: getRedisConnectionToken(), useValue: mockRedis },
      ],
    }).compile();

    controller = module.get<HealthController>(HealthController);
  });

  describe('healthCheck', () => {
    it('should return healthy status when all services are up', async () => {
      // Act
      const result = await controller.healthCheck();

      // Assert
      expect(result.status).toBe('healthy');
      expect(result.services.mongodb.status).toBe('healthy');
      expect(result.services.cache).toEqual({ driver: 'memory', status: 'healthy' });
      expect(result.environment).toBe('development');
      expect(result.uptime).toBeGreaterThanOrEqual(0);
    });

    it('should not ping Redis with the memory cache driver', async () => {
      // Act
      await controller.healthCheck();

      // Assert
      expect(mockRedis.ping).not.toHaveBeenCalled();
    });

    it('should return unhealthy status when MongoDB is disconnected', async () => {
      // Arrange
      mockMongoConnection.readyState = 0;

      // Act
      const result = await controller.healthCheck();

      // Assert
      expect(result.status).toBe('unhealthy');
      expect(result.services.mongodb).toEqual({ status: 'unhealthy' });
    });

    it('should return unhealthy status when the MongoDB ping fails', async () => {
      // Arrange
      mongoPing.mockRejectedValue(new Error('Connection refused'));

      // Act
      const result = await controller.healthCheck();

      // Assert
      expect(result.status).toBe('unhealthy');
    });

    it('should return degraded status when Redis is configured but unreachable', async () => {
      // Arrange
      mockEnvConfigService.cacheDriver = 'redis';
      mockRedis.ping.mockRejectedValue(new Error('ECONNREFUSED'));

      // Act
      const result = await controller.healthCheck();

      // Assert
      expect(result.status).toBe('degraded');
      expect(result.services.cache).toEqual({ driver: 'redis', status: 'unhealthy' });
    });

    it('should report the Redis response time when Redis answers', async () => {
      // Arrange
      mockEnvConfigService.cacheDriver = 'redis';

      // Act
      const result = await controller.healthCheck();

      // Assert
      expect(result.status).toBe('healthy');
      expect(result.services.cache.status).toBe('healthy');
      expect(result.services.cache.responseTimeMs).toBeGreaterThanOrEqual(0);
    });
  });

  describe('live', () => {
    it('should always report alive', () => {
      expect(controller.live()).toEqual({ status: 'alive' });
    });
  });

  describe('ready', () => {
    it('should be ready when MongoDB is connected', async () => {
      expect(await controller.ready()).toEqual({ status: 'ready' });
    });

    it('should not be ready when MongoDB is disconnected', async () => {
      // Arrange
      mockMongoConnection.readyState = 2;

      // Act & Assert
      expect(await controller.ready()).toEqual({
        status: 'not_ready',
        reason: 'MongoDB is not available',
      });
    });
  });
});
