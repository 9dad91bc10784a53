import { z } from 'zod';

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

const EnvSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(8000),
  HOST: z.string().min(1).default('0.0.0.0'),
  DATABASE_PATH: z.string().min(1).default('contacts.db'),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
  CORS_ORIGINS: z.string().default('http://localhost:5173,http://localhost:3000'),
  STORE_TRACING: z.enum(['0', '1']).default('0'),
});

export interface AppConfig {
  port: number;
  host: string;
  /** SQLite file path, or ":memory:" */
  databasePath: string;
  logLevel: LogLevel;
  corsOrigins: string[];
  storeTracing: boolean;
}

/**
 * ConfigError
 * Thrown when environment variables fail validation
 */
export class ConfigError extends Error {
  constructor(readonly problems: string[]) {
    super(`Invalid configuration: ${problems.join('; ')}`);
    Object.setPrototypeOf(this, ConfigError.prototype);
    this.name = 'ConfigError';
  }
}

/**
 * Read configuration from environment variables
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.map(String).join('.')}: ${issue.message}`)
    );
  }

  const vars = parsed.data;
  return {
    port: vars.PORT,
    host: vars.HOST,
    databasePath: vars.DATABASE_PATH,
    logLevel: vars.LOG_LEVEL,
    corsOrigins: vars.CORS_ORIGINS.split(',')
      .map((origin) => origin.trim())
      .filter((origin) => origin.length > 0),
    storeTracing: vars.STORE_TRACING === '1',
  };
}
