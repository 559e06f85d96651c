import { z } from 'zod';

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3000),
  DATABASE_URL: z.string().min(1).optional(),
  JWT_SECRET: z.string().min(1, 'JWT_SECRET environment variable is required'),
  JWT_ALGORITHM: z.enum(['HS256', 'HS384', 'HS512']).default('HS256'),
  ACCESS_TOKEN_EXPIRE_MINUTES: z.coerce.number().int().positive().default(30),
  APP_NAME: z.string().min(1).default('Todo API'),
});

export type JwtAlgorithm = z.infer<typeof envSchema>['JWT_ALGORITHM'];

/**
 * Process-wide settings. Built once at startup and handed to each component
 * by constructor; never mutated afterwards.
 */
export interface AppConfig {
  readonly port: number;
  readonly databaseUrl: string | undefined;
  readonly appName: string;
  readonly auth: {
    readonly jwtSecret: string;
    readonly jwtAlgorithm: JwtAlgorithm;
    readonly accessTokenExpireMinutes: number;
  };
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.errors
      .map((e) => `${e.path.join('.')}: ${e.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration - ${problems}`);
  }

  const vars = parsed.data;
  return Object.freeze({
    port: vars.PORT,
    databaseUrl: vars.DATABASE_URL,
    appName: vars.APP_NAME,
    auth: Object.freeze({
      jwtSecret: vars.JWT_SECRET,
      jwtAlgorithm: vars.JWT_ALGORITHM,
      accessTokenExpireMinutes: vars.ACCESS_TOKEN_EXPIRE_MINUTES,
    }),
  });
}

/**
 * Resolve the database URL or fail loudly; only the server and the
 * migration runner need a database.
 */
export function requireDatabaseUrl(config: AppConfig): string {
  if (!config.databaseUrl) {
    throw new ConfigError('DATABASE_URL environment variable is required');
  }
  return config.databaseUrl;
}
