import { z } from 'zod';

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const configSchema = z
  .object({
    PORT: positiveInt(3000),
    JWT_SECRET: z.string().min(8, 'JWT_SECRET must be at least 8 characters'),
    STORAGE: z.enum(['postgres', 'memory']).default('postgres'),
    DATABASE_URL: z.string().optional(),
    ACCESS_TOKEN_TTL_SECONDS: positiveInt(15 * 60),
    REFRESH_TOKEN_TTL_SECONDS: positiveInt(7 * 24 * 60 * 60),
    PAGE_SIZE: z.coerce.number().int().positive().max(100).default(20),
    LOGIN_RATE_LIMIT: positiveInt(10),
    API_RATE_LIMIT: positiveInt(60),
  })
  .refine((env) => env.STORAGE === 'memory' || Boolean(env.DATABASE_URL), {
    message: 'DATABASE_URL is required when STORAGE=postgres',
    path: ['DATABASE_URL'],
  });

export interface AppConfig {
  port: number;
  jwtSecret: string;
  storage: 'postgres' | 'memory';
  accessTokenTtlSeconds: number;
  refreshTokenTtlSeconds: number;
  pageSize: number;
  loginRateLimit: number;
  apiRateLimit: number;
}

/**
 * Read configuration from environment variables. Throws listing every
 * invalid variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = configSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.errors
      .map((e) => `${e.path.join('.')}: ${e.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${problems}`);
  }

  const values = parsed.data;
  return {
    port: values.PORT,
    jwtSecret: values.JWT_SECRET,
    storage: values.STORAGE,
    accessTokenTtlSeconds: values.ACCESS_TOKEN_TTL_SECONDS,
    refreshTokenTtlSeconds: values.REFRESH_TOKEN_TTL_SECONDS,
    pageSize: values.PAGE_SIZE,
    loginRateLimit: values.LOGIN_RATE_LIMIT,
    apiRateLimit: values.API_RATE_LIMIT,
  };
}
