// Environment-based configuration.
// - Validated once at startup; any invalid variable is a ConfigurationError.
// - Password hashing cost is fixed in code (see domain/auth/password.ts), not here.
import { z } from 'zod';
import { ConfigurationError } from '../application/errors.js';
import type { LogLevel } from '../infra/logger.js';

export type NodeEnv = 'development' | 'test' | 'production';

export interface AppConfig {
  nodeEnv: NodeEnv;
  http: {
    host: string;
    port: number;
  };
  db: {
    connectionString: string;
    poolMax: number;
  };
  logLevel: LogLevel;
}

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('production'),
  HOST: z.string().min(1).default('127.0.0.1'),
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  DATABASE_URL: z
    .string({ required_error: 'DATABASE_URL is required' })
    .min(1, 'DATABASE_URL is required'),
  DB_POOL_MAX: z.coerce.number().int().min(1).max(100).default(5),
  LOG_LEVEL: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    .default('info'),
});

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const detail = parsed.error.errors
      .map((e) => `${e.path.join('.')}: ${e.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid environment configuration (${detail})`);
  }

  const vars = parsed.data;
  return {
    nodeEnv: vars.NODE_ENV,
    http: {
      host: vars.HOST,
      port: vars.PORT,
    },
    db: {
      connectionString: vars.DATABASE_URL,
      poolMax: vars.DB_POOL_MAX,
    },
    logLevel: vars.LOG_LEVEL,
  };
}
