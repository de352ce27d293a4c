import { z } from 'zod';

/**
 * Used when JWT_SECRET is not set. Local development only: anyone who
 * knows it can mint valid tokens.
 */
export const DEV_JWT_SECRET = 'dev-secret';

const EnvSchema = z
  .object({
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
    LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
    PORT: z.coerce.number().int().positive().default(3000),
    JWT_SECRET: z.string().optional(),
    TOKEN_TTL_SECONDS: z.coerce.number().int().positive().default(24 * 60 * 60),
    STORE_BACKEND: z.enum(['memory', 'postgres']).default('memory'),
    DATABASE_URL: z.string().min(1).optional(),
    RATE_LIMIT_PER_MINUTE: z.coerce.number().int().positive().default(60),
    LOGIN_RATE_LIMIT_PER_MINUTE: z.coerce.number().int().positive().default(10),
  })
  .superRefine((env, ctx) => {
    if (env.STORE_BACKEND === 'postgres' && !env.DATABASE_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['DATABASE_URL'],
        message: 'required when STORE_BACKEND=postgres',
      });
    }
  });

export interface AppConfig {
  readonly nodeEnv: 'development' | 'production' | 'test';
  readonly logLevel: string;
  readonly port: number;
  readonly jwtSecret: string;
  /** True when JWT_SECRET was missing and DEV_JWT_SECRET is in use. */
  readonly usingDevSecret: boolean;
  readonly tokenTtlSeconds: number;
  readonly store: { backend: 'memory' } | { backend: 'postgres'; databaseUrl: string };
  readonly rateLimit: {
    readonly perMinute: number;
    readonly loginPerMinute: number;
  };
}

export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  const result = EnvSchema.safeParse(env);
  if (!result.success) {
    const formatted = result.error.issues
      .map((issue) => `  ${issue.path.join('.')}: ${issue.message}`)
      .join('\n');
    throw new Error(`Config validation failed:\n${formatted}`);
  }

  const parsed = result.data;
  const secret = parsed.JWT_SECRET?.trim();

  return Object.freeze({
    nodeEnv: parsed.NODE_ENV,
    logLevel: parsed.LOG_LEVEL,
    port: parsed.PORT,
    jwtSecret: secret ? secret : DEV_JWT_SECRET,
    usingDevSecret: !secret,
    tokenTtlSeconds: parsed.TOKEN_TTL_SECONDS,
    store:
      parsed.STORE_BACKEND === 'postgres' && parsed.DATABASE_URL
        ? { backend: 'postgres' as const, databaseUrl: parsed.DATABASE_URL }
        : { backend: 'memory' as const },
    rateLimit: {
      perMinute: parsed.RATE_LIMIT_PER_MINUTE,
      loginPerMinute: parsed.LOGIN_RATE_LIMIT_PER_MINUTE,
    },
  });
}
