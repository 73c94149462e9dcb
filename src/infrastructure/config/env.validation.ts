import { z } from 'zod';

const positiveInt = (fallback: number, max?: number) =>
  z
    .string()
    .default(String(fallback))
    .transform((val) => parseInt(val, 10))
    .pipe(max === undefined ? z.number().int().positive() : z.number().int().positive().max(max));

const flag = (fallback: boolean) =>
  z
    .enum(['true', 'false'])
    .default(fallback ? 'true' : 'false')
    .transform((val) => val === 'true');

/**
 * Environment variables schema using Zod.
 *
 * This schema validates and transforms environment variables at startup,
 * ensuring all required values are present and correctly typed.
 */
export const envSchema = z.object({
  // Application
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: positiveInt(3000, 65535),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace']).optional(),

  // MongoDB
  MONGO_URI: z.url({ message: 'MONGO_URI must be a valid URL' }),
  // Standalone servers have no transactions
  MONGO_TRANSACTIONS: flag(true),

  // Cache
  CACHE_DRIVER: z.enum(['memory', 'redis']).default('memory'),
  REDIS_URL: z.url({ message: 'REDIS_URL must be a valid URL' }).default('redis://localhost:6379'),
  CACHE_SIZE_LIMIT: positiveInt(10_000),
  CACHE_REQUIRE_EXPLICIT_INVALIDATION: flag(false),
  CACHE_THROW_ON_MISSING_INVALIDATION: flag(true),
  CACHE_STRICT_ENVIRONMENT: z.string().min(1).default('development'),

  // Request pipeline
  SLOW_REQUEST_THRESHOLD_MS: positiveInt(1000),
  MODERATE_REQUEST_THRESHOLD_MS: positiveInt(500),

  // Rate limiting
  THROTTLE_TTL_MS: positiveInt(60_000),
  THROTTLE_LIMIT: positiveInt(100),

  // Authentication
  AUTH_MAX_FAILED_LOGINS: positiveInt(5),
  AUTH_LOCKOUT_MINUTES: positiveInt(15),
  BCRYPT_ROUNDS: positiveInt(10, 15),
  EMAIL_TOKEN_TTL_HOURS: positiveInt(24),
  PASSWORD_RESET_TTL_MINUTES: positiveInt(60),
});

/**
 * Inferred TypeScript type from the env schema.
 * Use this for type-safe access to environment variables.
 */
export type EnvConfig = z.infer<typeof envSchema>;

/**
 * Validates environment variables using Zod schema.
 *
 * Used by NestJS ConfigModule.forRoot() at application startup.
 *
 * @param config - Raw environment variables from process.env
 * @returns Validated and transformed configuration
 * @throws Error listing every invalid variable
 */
export function validateEnv(config: Record<string, unknown>): EnvConfig {
  const result = envSchema.safeParse(config);

  if (!result.success) {
    const errors = result.error.issues
      .map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`)
      .join('\n');

    throw new Error(
      `\nEnvironment validation failed:\n${errors}\n\nPlease check your .env file or environment variables.`,
    );
  }

  if (result.data.MODERATE_REQUEST_THRESHOLD_MS >= result.data.SLOW_REQUEST_THRESHOLD_MS) {
    throw new Error(
      '\nEnvironment validation failed:\n  - MODERATE_REQUEST_THRESHOLD_MS: must be lower than SLOW_REQUEST_THRESHOLD_MS',
    );
  }

  return result.data;
}
