import { validateEnv, envSchema } from '@infrastructure/config/env.validation';

describe('Environment Validation', () => {
  const validEnv = {
    NODE_ENV: 'development',
    PORT: '3000',
    MONGO_URI: 'mongodb://localhost:27017/test',
  };

  describe('validateEnv', () => {
    it('should validate valid environment variables', () => {
      const result = validateEnv(validEnv);

      expect(result.NODE_ENV).toBe('development');
      expect(result.PORT).toBe(3000);
      expect(result.MONGO_URI).toBe('mongodb://localhost:27017/test');
    });

    it('should transform PORT from string to number', () => {
      const result = validateEnv({ ...validEnv, PORT: '8080' });

      expect(result.PORT).toBe(8080);
      expect(typeof result.PORT).toBe('number');
    });

    it('should use default values for optional fields', () => {
      const result = validateEnv({ MONGO_URI: 'mongodb://localhost:27017/test' });

      expect(result.NODE_ENV).toBe('development');
      expect(result.PORT).toBe(3000);
      expect(result.LOG_LEVEL).toBeUndefined();
      expect(result.MONGO_TRANSACTIONS).toBe(true);
      expect(result.CACHE_DRIVER).toBe('memory');
      expect(result.REDIS_URL).toBe('redis://localhost:6379');
      expect(result.CACHE_SIZE_LIMIT).toBe(10000);
      expect(result.CACHE_REQUIRE_EXPLICIT_INVALIDATION).toBe(false);
      expect(result.CACHE_THROW_ON_MISSING_INVALIDATION).toBe(true);
      expect(result.CACHE_STRICT_ENVIRONMENT).toBe('development');
      expect(result.SLOW_REQUEST_THRESHOLD_MS).toBe(1000);
      expect(result.MODERATE_REQUEST_THRESHOLD_MS).toBe(500);
      expect(result.THROTTLE_TTL_MS).toBe(60000);
      expect(result.THROTTLE_LIMIT).toBe(100);
      expect(result.AUTH_MAX_FAILED_LOGINS).toBe(5);
      expect(result.AUTH_LOCKOUT_MINUTES).toBe(15);
      expect(result.BCRYPT_ROUNDS).toBe(10);
      expect(result.EMAIL_TOKEN_TTL_HOURS).toBe(24);
      expect(result.PASSWORD_RESET_TTL_MINUTES).toBe(60);
    });

    it('should parse boolean flags', () => {
      const result = validateEnv({
        ...validEnv,
        MONGO_TRANSACTIONS: 'false',
        CACHE_REQUIRE_EXPLICIT_INVALIDATION: 'true',
      });

      expect(result.MONGO_TRANSACTIONS).toBe(false);
      expect(result.CACHE_REQUIRE_EXPLICIT_INVALIDATION).toBe(true);
    });

    it('should throw error for a flag that is not true or false', () => {
      expect(() => validateEnv({ ...validEnv, MONGO_TRANSACTIONS: 'yes' })).toThrow(
        'MONGO_TRANSACTIONS',
      );
    });

    it('should throw error for missing MONGO_URI', () => {
      const { MONGO_URI: _omitted, ...invalidEnv } = validEnv;

      expect(() => validateEnv(invalidEnv)).toThrow('Environment validation failed');
      expect(() => validateEnv(invalidEnv)).toThrow('MONGO_URI');
    });

    it('should throw error for invalid NODE_ENV', () => {
      const invalidEnv = { ...validEnv, NODE_ENV: 'invalid' };

      expect(() => validateEnv(invalidEnv)).toThrow('Environment validation failed');
    });

    it('should throw error for invalid MONGO_URI format', () => {
      const invalidEnv = { ...validEnv, MONGO_URI: 'not-a-url' };

      expect(() => validateEnv(invalidEnv)).toThrow('Environment validation failed');
      expect(() => validateEnv(invalidEnv)).toThrow('MONGO_URI must be a valid URL');
    });

    it('should throw error for an unknown cache driver', () => {
      expect(() => validateEnv({ ...validEnv, CACHE_DRIVER: 'memcached' })).toThrow(
        'CACHE_DRIVER',
      );
    });

    it('should throw error for invalid REDIS_URL format', () => {
      expect(() => validateEnv({ ...validEnv, REDIS_URL: 'localhost' })).toThrow(
        'REDIS_URL must be a valid URL',
      );
    });

    it('should throw error for PORT out of range', () => {
      const invalidEnv = { ...validEnv, PORT: '70000' };

      expect(() => validateEnv(invalidEnv)).toThrow('Environment validation failed');
    });

    it('should throw error for negative PORT', () => {
      const invalidEnv = { ...validEnv, PORT: '-1' };

      expect(() => validateEnv(invalidEnv)).toThrow('Environment validation failed');
    });

    it('should throw error for too many bcrypt rounds', () => {
      expect(() => validateEnv({ ...validEnv, BCRYPT_ROUNDS: '20' })).toThrow('BCRYPT_ROUNDS');
    });

    it('should throw error when the moderate threshold is not below the slow one', () => {
      const invalidEnv = {
        ...validEnv,
        SLOW_REQUEST_THRESHOLD_MS: '400',
        MODERATE_REQUEST_THRESHOLD_MS: '400',
      };

      expect(() => validateEnv(invalidEnv)).toThrow(
        'MODERATE_REQUEST_THRESHOLD_MS: must be lower than SLOW_REQUEST_THRESHOLD_MS',
      );
    });
  });

  describe('envSchema', () => {
    it('should accept production NODE_ENV', () => {
      const result = envSchema.safeParse({ ...validEnv, NODE_ENV: 'production' });

      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.data.NODE_ENV).toBe('production');
      }
    });

    it('should accept test NODE_ENV', () => {
      const result = envSchema.safeParse({ ...validEnv, NODE_ENV: 'test' });

      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.data.NODE_ENV).toBe('test');
      }
    });

    it('should accept valid port numbers', () => {
      const ports = ['80', '443', '3000', '8080', '65535'];

      for (const port of ports) {
        const result = envSchema.safeParse({ ...validEnv, PORT: port });
        expect(result.success).toBe(true);
      }
    });

    it('should accept the redis cache driver', () => {
      const result = envSchema.safeParse({
        ...validEnv,
        CACHE_DRIVER: 'redis',
        REDIS_URL: 'redis://cache:6379',
      });

      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.data.CACHE_DRIVER).toBe('redis');
        expect(result.data.REDIS_URL).toBe('redis://cache:6379');
      }
    });
  });
});
