export const APP_CONFIG = Symbol('APP_CONFIG');

export type StorageBackend = 'postgres' | 'memory';

export type SslMode = 'disable' | 'require' | 'verify-full';

export interface DatabaseConfig {
  host: string;
  port: number;
  user: string;
  password: string;
  database: string;
  sslMode: SslMode;
  /** Maximum number of pooled connections */
  poolMax: number;
  /** How long an idle connection is kept before it is closed */
  idleTimeoutMs: number;
  /** Connections older than this are retired once released */
  maxLifetimeSeconds: number;
  connectionTimeoutMs: number;
  statementTimeoutMs: number;
}

export interface AppConfig {
  env: string;
  port: number;
  requestTimeoutMs: number;
  storageBackend: StorageBackend;
  database: DatabaseConfig;
  generatorSeed?: number;
}

type Env = Record<string, string | undefined>;

function readString(env: Env, key: string, fallback: string): string {
  const value = env[key];
  return value === undefined || value === '' ? fallback : value;
}

function readInt(env: Env, key: string, fallback: number): number {
  const parsed = parseInt(env[key] ?? '', 10);
  return Number.isNaN(parsed) || parsed < 0 ? fallback : parsed;
}

function readStorageBackend(env: Env): StorageBackend {
  const value = readString(env, 'STORAGE_BACKEND', 'postgres').toLowerCase();
  if (value === 'postgres' || value === 'memory') {
    return value;
  }
  throw new Error(`Unknown STORAGE_BACKEND '${value}', expected 'postgres' or 'memory'`);
}

function readSslMode(env: Env): SslMode {
  const value = readString(env, 'DB_SSLMODE', 'disable').toLowerCase();
  if (value === 'require' || value === 'verify-full') {
    return value;
  }
  return 'disable';
}

/**
 * Build the application configuration from environment variables.
 * Called once at startup; the result is provided under {@link APP_CONFIG}.
 */
export function loadConfiguration(env: Env = process.env): AppConfig {
  const seed = parseInt(env.PRODUCT_GENERATOR_SEED ?? '', 10);

  return {
    env: readString(env, 'APP_ENV', 'development'),
    port: readInt(env, 'PORT', 4000),
    requestTimeoutMs: readInt(env, 'REQUEST_TIMEOUT_MS', 30_000),
    storageBackend: readStorageBackend(env),
    database: {
      host: readString(env, 'DB_HOST', 'localhost'),
      port: readInt(env, 'DB_PORT', 5432),
      user: readString(env, 'DB_USER', 'productuser'),
      password: readString(env, 'DB_PASSWORD', 'productpass'),
      database: readString(env, 'DB_NAME', 'productdb'),
      sslMode: readSslMode(env),
      poolMax: readInt(env, 'DB_POOL_MAX', 25),
      idleTimeoutMs: readInt(env, 'DB_IDLE_TIMEOUT_MS', 30_000),
      maxLifetimeSeconds: readInt(env, 'DB_MAX_LIFETIME_SECONDS', 1800),
      connectionTimeoutMs: readInt(env, 'DB_CONNECTION_TIMEOUT_MS', 5000),
      statementTimeoutMs: readInt(env, 'DB_STATEMENT_TIMEOUT_MS', 30_000),
    },
    generatorSeed: Number.isNaN(seed) ? undefined : seed,
  };
}
