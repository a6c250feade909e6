import dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigurationError } from '../application/errors.js';
import type { AuthConfig } from '../application/auth/config.js';
import { LOG_LEVELS, LogLevel, logger } from './logger.js';

export const INSECURE_DEFAULT_SECRET = 'insecure-dev-secret';

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  PORT: z.coerce.number().int().positive().default(3000),
  DATABASE_URL: z.string().optional(),
  JWT_SECRET: z.string().min(1).default(INSECURE_DEFAULT_SECRET),
  JWT_EXPIRY_HOURS: z.coerce.number().int().positive().default(24),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
});

export interface AppConfig {
  nodeEnv: 'development' | 'test' | 'production';
  port: number;
  databaseUrl?: string;
  logLevel: LogLevel;
  auth: AuthConfig;
}

/**
 * Build the application config from an environment map.
 * The insecure default secret is tolerated outside production, with a warning.
 */
export function parseConfig(env: NodeJS.ProcessEnv): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.errors
      .map((e) => `${e.path.join('.')}: ${e.message}`)
      .join('; ');
    throw new ConfigurationError(issues);
  }

  const vars = parsed.data;
  if (vars.JWT_SECRET === INSECURE_DEFAULT_SECRET) {
    if (vars.NODE_ENV === 'production') {
      throw new ConfigurationError('JWT_SECRET must be set in production');
    }
    logger.warn('JWT_SECRET is not set; using the insecure development default');
  }

  return Object.freeze({
    nodeEnv: vars.NODE_ENV,
    port: vars.PORT,
    databaseUrl: vars.DATABASE_URL,
    logLevel: vars.LOG_LEVEL,
    auth: Object.freeze({
      jwtSecret: vars.JWT_SECRET,
      sessionTtlHours: vars.JWT_EXPIRY_HOURS,
    }),
  });
}

export function loadConfig(): AppConfig {
  dotenv.config();
  return parseConfig(process.env);
}
