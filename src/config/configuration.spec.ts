import { loadConfiguration } from './configuration';

describe('loadConfiguration', () => {
  it('uses defaults for an empty environment', () => {
    const config = loadConfiguration({});

    expect(config.env).toBe('development');
    expect(config.port).toBe(4000);
    expect(config.requestTimeoutMs).toBe(30_000);
    expect(config.storageBackend).toBe('postgres');
    expect(config.generatorSeed).toBeUndefined();
    expect(config.database).toEqual({
      host: 'localhost',
      port: 5432,
      user: 'productuser',
      password: 'productpass',
      database: 'productdb',
      sslMode: 'disable',
      poolMax: 25,
      idleTimeoutMs: 30_000,
      maxLifetimeSeconds: 1800,
      connectionTimeoutMs: 5000,
      statementTimeoutMs: 30_000,
    });
  });

  it('reads overrides', () => {
    const config = loadConfiguration({
      APP_ENV: 'production',
      PORT: '8080',
      STORAGE_BACKEND: 'Memory',
      DB_HOST: 'db.internal',
      DB_SSLMODE: 'require',
      DB_POOL_MAX: '5',
      PRODUCT_GENERATOR_SEED: '42',
    });

    expect(config.env).toBe('production');
    expect(config.port).toBe(8080);
    expect(config.storageBackend).toBe('memory');
    expect(config.database.host).toBe('db.internal');
    expect(config.database.sslMode).toBe('require');
    expect(config.database.poolMax).toBe(5);
    expect(config.generatorSeed).toBe(42);
  });

  it('falls back to defaults for invalid numbers', () => {
    const config = loadConfiguration({ PORT: 'abc', DB_POOL_MAX: '-3' });
    expect(config.port).toBe(4000);
    expect(config.database.poolMax).toBe(25);
  });

  it('rejects an unknown storage backend', () => {
    expect(() => loadConfiguration({ STORAGE_BACKEND: 'redis' })).toThrow(
      "Unknown STORAGE_BACKEND 'redis', expected 'postgres' or 'memory'",
    );
  });
});
