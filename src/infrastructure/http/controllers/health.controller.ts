import { Controller, Get, Logger } from '@nestjs/common';
import { ApiOkResponse, ApiOperation, ApiTags } from '@nestjs/swagger';
import { SkipThrottle } from '@nestjs/throttler';
import { InjectConnection } from '@nestjs/mongoose';
import { InjectRedis } from '@nestjs-modules/ioredis';
import Redis from 'ioredis';
import { Connection } from 'mongoose';
import { EnvConfigService } from '@infrastructure/config/env-config.service';

const MONGO_CONNECTED = 1;

export interface DependencyHealth {
  status: 'healthy' | 'unhealthy';
  responseTimeMs?: number;
}

export interface HealthReport {
  status: 'healthy' | 'unhealthy' | 'degraded';
  timestamp: string;
  version: string;
  uptime: number;
  environment: string;
  services: {
    mongodb: DependencyHealth;
    cache: DependencyHealth & { driver: string };
  };
}

/**
 * Health probes. MongoDB is required; a Redis outage only degrades the service,
 * since requests still reach the database.
 */
@ApiTags('Health')
@SkipThrottle()
@Controller('api/v1/health')
export class HealthController {
  private readonly logger = new Logger(HealthController.name);
  private readonly startedAt = Date.now();

  constructor(
    private readonly envConfig: EnvConfigService,
    @InjectConnection() private readonly mongoConnection: Connection,
    @InjectRedis() private readonly redis: Redis,
  ) {}

  @Get()
  @ApiOperation({ summary: 'Health of the API and its datastores' })
  @ApiOkResponse({ description: 'Overall status with per-dependency detail and uptime in seconds' })
  async healthCheck(): Promise<HealthReport> {
    const [mongodb, cache] = await Promise.all([this.checkMongoDB(), this.checkCache()]);

    return {
      status: this.overallStatus(mongodb, cache),
      timestamp: new Date().toISOString(),
      version: process.env.npm_package_version || '1.0.0',
      uptime: Math.floor((Date.now() - this.startedAt) / 1000),
      environment: this.envConfig.nodeEnv,
      services: {
        mongodb,
        cache: { driver: this.envConfig.cacheDriver, ...cache },
      },
    };
  }

  @Get('live')
  @ApiOperation({ summary: 'Liveness probe' })
  @ApiOkResponse({ description: 'The process is running' })
  live(): { status: string } {
    return { status: 'alive' };
  }

  @Get('ready')
  @ApiOperation({ summary: 'Readiness probe' })
  @ApiOkResponse({ description: '`ready`, or `not_ready` with a reason' })
  async ready(): Promise<{ status: string; reason?: string }> {
    const mongodb = await this.checkMongoDB();
    return mongodb.status === 'healthy'
      ? { status: 'ready' }
      : { status: 'not_ready', reason: 'MongoDB is not available' };
  }

  private overallStatus(mongodb: DependencyHealth, cache: DependencyHealth): HealthReport['status'] {
    if (mongodb.status === 'unhealthy') {
      return 'unhealthy';
    }
    return cache.status === 'unhealthy' ? 'degraded' : 'healthy';
  }

  private checkMongoDB(): Promise<DependencyHealth> {
    if (this.mongoConnection.readyState !== MONGO_CONNECTED) {
      return Promise.resolve({ status: 'unhealthy' });
    }
    return this.probe('MongoDB', async () => {
      await this.mongoConnection.db?.admin().ping();
    });
  }

  // The memory cache lives in this process
  private checkCache(): Promise<DependencyHealth> {
    if (this.envConfig.cacheDriver !== 'redis') {
      return Promise.resolve({ status: 'healthy' });
    }
    return this.probe('Redis', async () => {
      await this.redis.ping();
    });
  }

  private async probe(name: string, ping: () => Promise<void>): Promise<DependencyHealth> {
    const started = Date.now();
    try {
      await ping();
      return { status: 'healthy', responseTimeMs: Date.now() - started };
    } catch (error) {
      this.logger.warn(`${name} ping failed: ${error instanceof Error ? error.message : String(error)}`);
      return { status: 'unhealthy' };
    }
  }
}
