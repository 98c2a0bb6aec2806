import type { QueryResultRow } from 'pg';

export interface QueryResult<R> {
  rows: R[];
  rowCount: number | null;
}

/**
 * Executes statements against one connection inside an open transaction
 */
export interface TransactionClient {
  query<R extends QueryResultRow = QueryResultRow>(sql: string, params?: unknown[]): Promise<QueryResult<R>>;
}

/**
 * Database adapter interface
 * Allows switching between PostgreSQL and in-memory storage
 */
export interface DatabaseAdapter {
  connect(): Promise<void>;
  disconnect(): Promise<void>;
  query<R extends QueryResultRow = QueryResultRow>(sql: string, params?: unknown[]): Promise<QueryResult<R>>;
  /**
   * Run `work` inside BEGIN/COMMIT on a single connection; ROLLBACK when it throws.
   */
  transaction<T>(work: (client: TransactionClient) => Promise<T>): Promise<T>;
  isConnected(): boolean;
}
