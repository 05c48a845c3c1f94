import { z } from 'zod';
import type { HasherOptions } from './domain/auth/password.js';
import type { TokenAlgorithm } from './application/auth/tokenCodec.js';
import type { LogLevel } from './infra/logger.js';

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().positive().default(3000),
  APP_NAME: z.string().min(1).default('Password Auth Service'),
  APP_VERSION: z.string().min(1).default('0.1.0'),

  // Unset: users live in memory for the life of the process
  DATABASE_URL: z.string().min(1).optional(),

  JWT_SECRET: z.string().min(16, 'JWT_SECRET must be at least 16 characters'),
  JWT_ALGORITHM: z.enum(['HS256', 'HS384', 'HS512']).default('HS256'),
  ACCESS_TOKEN_EXPIRE_MINUTES: z.coerce.number().int().positive().default(30),

  ARGON2_MEMORY_COST: z.coerce.number().int().min(1024).default(19456),
  ARGON2_TIME_COST: z.coerce.number().int().min(2).default(2),
  ARGON2_PARALLELISM: z.coerce.number().int().min(1).default(1),

  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'http', 'debug']).default('info'),

  RATE_LIMIT_PER_MINUTE: z.coerce.number().int().positive().default(60),
  LOGIN_RATE_LIMIT_PER_MINUTE: z.coerce.number().int().positive().default(10),
});

export interface AppConfig {
  readonly env: 'development' | 'production' | 'test';
  readonly port: number;
  readonly appName: string;
  readonly appVersion: string;
  readonly databaseUrl: string | undefined;
  readonly jwt: {
    readonly secret: string;
    readonly algorithm: TokenAlgorithm;
    readonly accessTokenExpiresInSeconds: number;
  };
  readonly hasher: HasherOptions;
  readonly logLevel: LogLevel;
  readonly rateLimit: {
    readonly apiPerMinute: number;
    readonly loginPerMinute: number;
  };
}

/**
 * Validate the environment once and freeze the result. Call after
 * dotenv.config() so values from .env are visible.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const issues = result.error.errors
      .map((e) => `${e.path.join('.')}: ${e.message}`)
      .join('; ');
    throw new Error(`Invalid environment configuration: ${issues}`);
  }
  const vars = result.data;

  return Object.freeze({
    env: vars.NODE_ENV,
    port: vars.PORT,
    appName: vars.APP_NAME,
    appVersion: vars.APP_VERSION,
    databaseUrl: vars.DATABASE_URL,
    jwt: Object.freeze({
      secret: vars.JWT_SECRET,
      algorithm: vars.JWT_ALGORITHM,
      accessTokenExpiresInSeconds: vars.ACCESS_TOKEN_EXPIRE_MINUTES * 60,
    }),
    hasher: Object.freeze({
      memoryCost: vars.ARGON2_MEMORY_COST,
      timeCost: vars.ARGON2_TIME_COST,
      parallelism: vars.ARGON2_PARALLELISM,
    }),
    logLevel: vars.LOG_LEVEL,
    rateLimit: Object.freeze({
      apiPerMinute: vars.RATE_LIMIT_PER_MINUTE,
      loginPerMinute: vars.LOGIN_RATE_LIMIT_PER_MINUTE,
    }),
  });
}
