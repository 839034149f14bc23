/**
 * @daybook/sync-server - Environment configuration
 */

import { z } from 'zod';

export class ConfigurationError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration:\n${issues.map((i) => `  - ${i}`).join('\n')}`);
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}

const intFromEnv = (
  fallback: number,
  min = 0,
  max = Number.MAX_SAFE_INTEGER
) => z.coerce.number().int().min(min).max(max).default(fallback);

const EnvSchema = z
  .object({
    HOST: z.string().min(1).default('0.0.0.0'),
    PORT: intFromEnv(8080, 1, 65535),
    ENVIRONMENT: z
      .enum(['development', 'test', 'production'])
      .default('development'),
    DATABASE_URL: z.string().min(1).optional(),
    DATABASE_HOST: z.string().min(1).default('localhost'),
    DATABASE_PORT: intFromEnv(5432, 1, 65535),
    DATABASE_NAME: z.string().min(1).default('daybook'),
    DATABASE_USER: z.string().min(1).default('postgres'),
    DATABASE_PASSWORD: z.string().optional(),
    DATABASE_POOL_SIZE: intFromEnv(10, 1),
    MAX_REQUEST_BODY_SIZE: intFromEnv(10 * 1024 * 1024, 1),
    SYNC_RATE_LIMIT_PER_MINUTE: intFromEnv(120),
    DELTA_LARGE_RESPONSE_THRESHOLD: intFromEnv(5000, 1),
    MAINTENANCE_INTERVAL_MINUTES: intFromEnv(60),
    USER_ID_HEADER: z.string().min(1).default('x-user-id'),
  })
  .superRefine((env, ctx) => {
    if (
      env.ENVIRONMENT === 'production' &&
      !env.DATABASE_URL &&
      !env.DATABASE_PASSWORD
    ) {
      ctx.addIssue({
        code: 'custom',
        path: ['DATABASE_PASSWORD'],
        message: 'required in production when DATABASE_URL is not set',
      });
    }
  });

export interface DatabaseConfig {
  connectionString?: string;
  host: string;
  port: number;
  database: string;
  user: string;
  password?: string;
  poolSize: number;
}

export interface ServerConfig {
  host: string;
  port: number;
  environment: 'development' | 'test' | 'production';
  database: DatabaseConfig;
  maxRequestBodySize: number;
  /** Requests per user per minute; 0 disables rate limiting */
  rateLimitPerMinute: number;
  largeResponseThreshold: number;
  /** 0 disables the maintenance timer */
  maintenanceIntervalMinutes: number;
  userIdHeader: string;
}

/**
 * Parse the process environment. Every invalid variable is reported at once.
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env
): ServerConfig {
  // Unset and empty variables both fall back to the default.
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== '')
  );
  const parsed = EnvSchema.safeParse(present);
  if (!parsed.success) {
    throw new ConfigurationError(
      parsed.error.issues.map(
        (issue) => `${issue.path.map(String).join('.')}: ${issue.message}`
      )
    );
  }

  const e = parsed.data;
  return {
    host: e.HOST,
    port: e.PORT,
    environment: e.ENVIRONMENT,
    database: {
      connectionString: e.DATABASE_URL,
      host: e.DATABASE_HOST,
      port: e.DATABASE_PORT,
      database: e.DATABASE_NAME,
      user: e.DATABASE_USER,
      password: e.DATABASE_PASSWORD,
      poolSize: e.DATABASE_POOL_SIZE,
    },
    maxRequestBodySize: e.MAX_REQUEST_BODY_SIZE,
    rateLimitPerMinute: e.SYNC_RATE_LIMIT_PER_MINUTE,
    largeResponseThreshold: e.DELTA_LARGE_RESPONSE_THRESHOLD,
    maintenanceIntervalMinutes: e.MAINTENANCE_INTERVAL_MINUTES,
    userIdHeader: e.USER_ID_HEADER.toLowerCase(),
  };
}
