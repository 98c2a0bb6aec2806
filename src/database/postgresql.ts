import { Pool, QueryResultRow } from 'pg';
import { DatabaseAdapter, QueryResult, TransactionClient } from './adapter';
import { Logger } from '../utils/logger';

export interface PostgreSQLConfig {
  host: string;
  port: number;
  database: string;
  user: string;
  password: string;
  statementTimeoutMs?: number;
}

export class PostgreSQLAdapter implements DatabaseAdapter {
  private pool: Pool | null = null;
  private config: PostgreSQLConfig;

  constructor(config: PostgreSQLConfig) {
    this.config = config;
  }

  async connect(): Promise<void> {
    try {
      this.pool = new Pool({
        host: this.config.host,
        port: this.config.port,
        database: this.config.database,
        user: this.config.user,
        password: this.config.password,
        max: 20,
        idleTimeoutMillis: 30000,
        connectionTimeoutMillis: 2000,
        statement_timeout: this.config.statementTimeoutMs,
      });

      // Test connection
      const client = await this.pool.connect();
      await client.query('SELECT NOW()');
      client.release();

      Logger.info('PostgreSQL connected successfully', { database: this.config.database });
    } catch (error) {
      Logger.error('PostgreSQL connection error', error);
      throw error;
    }
  }

  async disconnect(): Promise<void> {
    if (this.pool) {
      await this.pool.end();
      this.pool = null;
      Logger.info('PostgreSQL disconnected');
    }
  }

  async query<R extends QueryResultRow = QueryResultRow>(sql: string, params?: unknown[]): Promise<QueryResult<R>> {
    const pool = this.requirePool();
    const result = await pool.query<R>(sql, params);
    return { rows: result.rows, rowCount: result.rowCount };
  }

  async transaction<T>(work: (client: TransactionClient) => Promise<T>): Promise<T> {
    const pool = this.requirePool();
    const client = await pool.connect();
    const tx: TransactionClient = {
      async query<R extends QueryResultRow = QueryResultRow>(sql: string, params?: unknown[]): Promise<QueryResult<R>> {
        const result = await client.query<R>(sql, params);
        return { rows: result.rows, rowCount: result.rowCount };
      },
    };

    try {
      await client.query('BEGIN');
      const value = await work(tx);
      await client.query('COMMIT');
      return value;
    } catch (error) {
      await client.query('ROLLBACK').catch((rollbackError: unknown) => {
        Logger.error('Transaction rollback failed', rollbackError);
      });
      throw error;
    } finally {
      client.release();
    }
  }

  isConnected(): boolean {
    return this.pool !== null;
  }

  private requirePool(): Pool {
    if (!this.pool) {
      throw new Error('Database not connected');
    }
    return this.pool;
  }
}
