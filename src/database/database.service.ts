import { Inject, Injectable, Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import * as fs from 'fs';
import * as path from 'path';
import { Pool, PoolClient, QueryResultRow } from 'pg';
import { abortable, throwIfAborted } from '../common/concurrency/abort';
import { errorMessage, errorStack } from '../common/errors';
import { APP_CONFIG, AppConfig } from '../config/configuration';
import { PG_POOL, SqlDatabase, SqlExecutor, SqlResult } from './database.types';

@Injectable()
export class DatabaseService implements SqlDatabase, OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(DatabaseService.name);

  constructor(
    @Inject(PG_POOL) private readonly pool: Pool,
    @Inject(APP_CONFIG) private readonly config: AppConfig,
  ) {}

  async onModuleInit(): Promise<void> {
    if (this.config.storageBackend !== 'postgres') {
      this.logger.log(`Storage backend is '${this.config.storageBackend}', skipping schema initialisation`);
      return;
    }
    await this.initSchema();
  }

  async onModuleDestroy(): Promise<void> {
    await this.pool.end();
    this.logger.log('Database pool closed');
  }

  /**
   * Create the products table and its indexes if they do not exist yet
   */
  async initSchema(schemaPath = path.join(process.cwd(), 'db', 'schema.sql')): Promise<void> {
    const schema = fs.readFileSync(schemaPath, 'utf-8');
    try {
      await this.pool.query(schema);
    } catch (error) {
      throw new Error(`Error creating schema: ${errorMessage(error)}`, { cause: error });
    }
    this.logger.log('Database schema initialised');
  }

  async query<R extends QueryResultRow = QueryResultRow>(
    text: string,
    values: unknown[] = [],
    signal?: AbortSignal,
  ): Promise<SqlResult<R>> {
    throwIfAborted(signal);
    return abortable(this.pool.query<R>(text, values), signal);
  }

  async transaction<T>(work: (tx: SqlExecutor) => Promise<T>, signal?: AbortSignal): Promise<T> {
    throwIfAborted(signal);
    const client = await this.pool.connect();

    try {
      await client.query('BEGIN');
      const result = await work(this.executorFor(client, signal));
      throwIfAborted(signal);
      await client.query('COMMIT');
      return result;
    } catch (error) {
      await this.rollback(client);
      throw error;
    } finally {
      client.release();
    }
  }

  async ping(): Promise<boolean> {
    try {
      await this.pool.query('SELECT 1');
      return true;
    } catch (error) {
      this.logger.warn(`Database ping failed: ${errorMessage(error)}`);
      return false;
    }
  }

  /**
   * Statements inside a transaction are never abandoned once sent: an abort
   * is honoured before the next statement and before COMMIT, so a write the
   * caller sees as failed is always rolled back.
   */
  private executorFor(client: PoolClient, transactionSignal?: AbortSignal): SqlExecutor {
    return {
      query: <R extends QueryResultRow = QueryResultRow>(
        text: string,
        values: unknown[] = [],
        signal: AbortSignal | undefined = transactionSignal,
      ): Promise<SqlResult<R>> => {
        throwIfAborted(signal);
        return client.query<R>(text, values);
      },
    };
  }

  private async rollback(client: PoolClient): Promise<void> {
    try {
      await client.query('ROLLBACK');
    } catch (error) {
      this.logger.error('Error rolling back transaction:', errorStack(error));
    }
  }
}
