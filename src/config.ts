import { z } from 'zod';

const logLevelSchema = z
  .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
  .default('info');

export type LogLevel = z.infer<typeof logLevelSchema>;

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  PORT: z.coerce.number().int().positive().default(3000),
  DATABASE_URL: z.string().min(1),
  SECRET_KEY: z.string().min(16),
  // Falls back to SECRET_KEY when unset
  JWT_SECRET_KEY: z.string().min(16).optional(),
  JWT_EXPIRES_IN: z.coerce.number().int().positive().default(3600),
  LOG_LEVEL: logLevelSchema,
});

export type Environment = 'development' | 'test' | 'production';

export interface AppConfig {
  readonly env: Environment;
  readonly port: number;
  readonly databaseUrl: string;
  readonly secretKey: string;
  readonly jwtSecret: string;
  readonly jwtExpiresInSeconds: number;
}

export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid environment variables: ${issues.join('; ')}`);
    this.name = 'ConfigError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Build the process-wide configuration from an environment map.
 * The result is frozen; callers pass it down explicitly.
 */
export function parseConfig(env: NodeJS.ProcessEnv): AppConfig {
  const parsed = envSchema.safeParse(env);

  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`)
    );
  }

  const data = parsed.data;
  return Object.freeze({
    env: data.NODE_ENV,
    port: data.PORT,
    databaseUrl: data.DATABASE_URL,
    secretKey: data.SECRET_KEY,
    jwtSecret: data.JWT_SECRET_KEY ?? data.SECRET_KEY,
    jwtExpiresInSeconds: data.JWT_EXPIRES_IN,
  });
}

/**
 * The logger is created at import time, before `loadConfig` runs, so it
 * resolves its level on its own with the same rules.
 */
export function parseLogLevel(env: NodeJS.ProcessEnv): LogLevel {
  if (env.NODE_ENV === 'test') {
    return 'silent';
  }
  const parsed = logLevelSchema.safeParse(env.LOG_LEVEL);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.errors.map((e) => `LOG_LEVEL: ${e.message}`));
  }
  return parsed.data;
}

export function loadConfig(): AppConfig {
  return parseConfig(process.env);
}

/**
 * Scripts that only touch the database (migrate, seed) need nothing else.
 */
export function loadDatabaseUrl(): string {
  const parsed = envSchema.pick({ DATABASE_URL: true }).safeParse(process.env);
  if (!parsed.success) {
    throw new ConfigError(['DATABASE_URL: Required']);
  }
  return parsed.data.DATABASE_URL;
}
