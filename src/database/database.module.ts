import { Global, Logger, Module } from '@nestjs/common';
import { Pool, PoolConfig } from 'pg';
import { APP_CONFIG, AppConfig, DatabaseConfig } from '../config/configuration';
import { DatabaseService } from './database.service';
import { PG_POOL, SQL_DATABASE } from './database.types';

function sslOption(config: DatabaseConfig): PoolConfig['ssl'] {
  switch (config.sslMode) {
    case 'require':
      return { rejectUnauthorized: false };
    case 'verify-full':
      return true;
    default:
      return false;
  }
}

export function createPool(config: DatabaseConfig): Pool {
  const logger = new Logger('DatabasePool');
  const pool = new Pool({
    host: config.host,
    port: config.port,
    user: config.user,
    password: config.password,
    database: config.database,
    ssl: sslOption(config),
    max: config.poolMax,
    idleTimeoutMillis: config.idleTimeoutMs,
    maxLifetimeSeconds: config.maxLifetimeSeconds,
    connectionTimeoutMillis: config.connectionTimeoutMs,
    statement_timeout: config.statementTimeoutMs,
  });

  pool.on('error', (error) => {
    logger.error('Idle database client error:', error.stack);
  });

  return pool;
}

@Global()
@Module({
  providers: [
    {
      provide: PG_POOL,
      inject: [APP_CONFIG],
      useFactory: (config: AppConfig) => createPool(config.database),
    },
    DatabaseService,
    { provide: SQL_DATABASE, useExisting: DatabaseService },
  ],
  exports: [DatabaseService, SQL_DATABASE],
})
export class DatabaseModule {}
