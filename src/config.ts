import { z } from 'zod';

/**
 * Used only when NODE_ENV is explicitly development or test and no
 * JWT_SECRET is configured.
 */
export const DEVELOPMENT_JWT_SECRET = 'development-only-insecure-secret';

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

const envSchema = z.object({
  // Unset means production: the development fallbacks must be opted into
  NODE_ENV: z.enum(['development', 'test', 'production']).default('production'),
  PORT: z.coerce.number().int().positive().default(3000),
  STORE: z.enum(['postgres', 'memory']).default('postgres'),
  DATABASE_URL: z.string().min(1).optional(),
  JWT_SECRET: z.string().min(1).optional(),
  ACCESS_TOKEN_EXPIRE_MINUTES: z.coerce.number().int().positive().default(60),
  PASSWORD_HASH_TIME_COST: z.coerce.number().int().min(2).default(3),
  PASSWORD_HASH_MEMORY_COST: z.coerce.number().int().min(1024).default(65536),
});

export type StoreConfig =
  | { readonly kind: 'postgres'; readonly databaseUrl: string }
  | { readonly kind: 'memory' };

export interface AppConfig {
  readonly env: 'development' | 'test' | 'production';
  readonly port: number;
  readonly store: StoreConfig;
  readonly auth: {
    readonly jwtSecret: string;
    readonly accessTokenTtlMinutes: number;
    readonly usingDevelopmentSecret: boolean;
  };
  readonly passwordHashing: {
    readonly timeCost: number;
    readonly memoryCost: number;
  };
}

/**
 * Build the immutable application config from environment variables.
 * Throws ConfigError when the environment is unusable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
    throw new ConfigError(`Invalid configuration: ${issues.join('; ')}`);
  }
  const vars = parsed.data;

  let jwtSecret = vars.JWT_SECRET;
  let usingDevelopmentSecret = false;
  if (!jwtSecret) {
    if (vars.NODE_ENV === 'production') {
      throw new ConfigError('JWT_SECRET environment variable is required');
    }
    console.warn(`JWT_SECRET is not set; using the development secret (NODE_ENV=${vars.NODE_ENV})`);
    jwtSecret = DEVELOPMENT_JWT_SECRET;
    usingDevelopmentSecret = true;
  }

  let store: StoreConfig;
  if (vars.STORE === 'postgres') {
    if (!vars.DATABASE_URL) {
      throw new ConfigError('DATABASE_URL environment variable is required when STORE=postgres');
    }
    store = { kind: 'postgres', databaseUrl: vars.DATABASE_URL };
  } else {
    store = { kind: 'memory' };
  }

  return Object.freeze({
    env: vars.NODE_ENV,
    port: vars.PORT,
    store: Object.freeze(store),
    auth: Object.freeze({
      jwtSecret,
      accessTokenTtlMinutes: vars.ACCESS_TOKEN_EXPIRE_MINUTES,
      usingDevelopmentSecret,
    }),
    passwordHashing: Object.freeze({
      timeCost: vars.PASSWORD_HASH_TIME_COST,
      memoryCost: vars.PASSWORD_HASH_MEMORY_COST,
    }),
  });
}
