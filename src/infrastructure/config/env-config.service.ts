import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { CacheInvalidationOptions, PerformanceThresholds } from '@application/pipeline';
import { AuthOptions } from '@application/use-cases';
import { EnvConfig } from './env.validation';

/**
 * Typed configuration service for environment variables.
 *
 * Values are guaranteed to exist because they are validated
 * at application startup by the Zod schema.
 */
@Injectable()
export class EnvConfigService {
  constructor(private readonly configService: ConfigService<EnvConfig, true>) {}

  get nodeEnv(): EnvConfig['NODE_ENV'] {
    return this.configService.get('NODE_ENV', { infer: true });
  }

  get port(): EnvConfig['PORT'] {
    return this.configService.get('PORT', { infer: true });
  }

  get logLevel(): NonNullable<EnvConfig['LOG_LEVEL']> {
    return (
      this.configService.get('LOG_LEVEL', { infer: true }) ?? (this.isProduction ? 'info' : 'debug')
    );
  }

  get mongoUri(): EnvConfig['MONGO_URI'] {
    return this.configService.get('MONGO_URI', { infer: true });
  }

  get mongoTransactions(): boolean {
    return this.configService.get('MONGO_TRANSACTIONS', { infer: true });
  }

  get cacheDriver(): EnvConfig['CACHE_DRIVER'] {
    return this.configService.get('CACHE_DRIVER', { infer: true });
  }

  get redisUrl(): EnvConfig['REDIS_URL'] {
    return this.configService.get('REDIS_URL', { infer: true });
  }

  get cacheSizeLimit(): number {
    return this.configService.get('CACHE_SIZE_LIMIT', { infer: true });
  }

  get throttleTtlMs(): number {
    return this.configService.get('THROTTLE_TTL_MS', { infer: true });
  }

  get throttleLimit(): number {
    return this.configService.get('THROTTLE_LIMIT', { infer: true });
  }

  get bcryptRounds(): number {
    return this.configService.get('BCRYPT_ROUNDS', { infer: true });
  }

  get cacheInvalidation(): CacheInvalidationOptions {
    return {
      requireExplicitRules: this.configService.get('CACHE_REQUIRE_EXPLICIT_INVALIDATION', {
        infer: true,
      }),
      throwOnMissingRulesInStrictEnvironment: this.configService.get(
        'CACHE_THROW_ON_MISSING_INVALIDATION',
        { infer: true },
      ),
      strictValidationEnvironment: this.configService.get('CACHE_STRICT_ENVIRONMENT', {
        infer: true,
      }),
      environment: this.nodeEnv,
    };
  }

  get performanceThresholds(): PerformanceThresholds {
    return {
      slowRequestMs: this.configService.get('SLOW_REQUEST_THRESHOLD_MS', { infer: true }),
      moderateRequestMs: this.configService.get('MODERATE_REQUEST_THRESHOLD_MS', { infer: true }),
    };
  }

  get auth(): AuthOptions {
    return {
      maxFailedLogins: this.configService.get('AUTH_MAX_FAILED_LOGINS', { infer: true }),
      lockoutMinutes: this.configService.get('AUTH_LOCKOUT_MINUTES', { infer: true }),
      emailTokenTtlHours: this.configService.get('EMAIL_TOKEN_TTL_HOURS', { infer: true }),
      passwordResetTtlMinutes: this.configService.get('PASSWORD_RESET_TTL_MINUTES', {
        infer: true,
      }),
    };
  }

  get isDevelopment(): boolean {
    return this.nodeEnv === 'development';
  }

  get isProduction(): boolean {
    return this.nodeEnv === 'production';
  }

  get isTest(): boolean {
    return this.nodeEnv === 'test';
  }
}
