import { QueryResultRow } from 'pg';

export const PG_POOL = Symbol('PG_POOL');
export const SQL_DATABASE = Symbol('SQL_DATABASE');

export interface SqlResult<R> {
  rows: R[];
  rowCount: number | null;
}

export interface SqlExecutor {
  query<R extends QueryResultRow = QueryResultRow>(
    text: string,
    values?: unknown[],
    signal?: AbortSignal,
  ): Promise<SqlResult<R>>;
}

export interface SqlDatabase extends SqlExecutor {
  /**
   * Run `work` inside BEGIN/COMMIT on one pooled connection. Any rejection,
   * or an abort before COMMIT, rolls the transaction back and is rethrown.
   */
  transaction<T>(work: (tx: SqlExecutor) => Promise<T>, signal?: AbortSignal): Promise<T>;
  ping(): Promise<boolean>;
}
