import { DatabaseAdapter } from './adapter';
import { PostgreSQLAdapter } from './postgresql';
import { Logger } from '../utils/logger';
import { env, parseInteger } from '../config/env';

let dbAdapter: DatabaseAdapter | null = null;

export function usesPostgres(): boolean {
  return env.DB_TYPE === 'postgres';
}

export async function initializeDatabase(): Promise<void> {
  if (!usesPostgres()) {
    Logger.info('Using in-memory repositories');
    return;
  }

  Logger.info('Initializing PostgreSQL database...');
  const adapter = new PostgreSQLAdapter({
    host: process.env.DB_HOST || 'localhost',
    port: parseInt(process.env.DB_PORT || '5432', 10),
    database: process.env.DB_NAME || 'workforce',
    user: process.env.DB_USER || 'postgres',
    password: process.env.DB_PASSWORD || 'postgres',
    statementTimeoutMs: parseInteger(process.env.PERSISTENCE_TIMEOUT_MS, 5000),
  });

  await adapter.connect();
  dbAdapter = adapter;

  await createUsersTable(adapter);
  await createRolesTables(adapter);
  await createRefreshTokensTable(adapter);
}

export function getDatabase(): DatabaseAdapter {
  if (!dbAdapter) {
    throw new Error('Database not initialized');
  }
  return dbAdapter;
}

export function isDatabaseConnected(): boolean {
  return usesPostgres() ? dbAdapter?.isConnected() ?? false : true;
}

export async function closeDatabase(): Promise<void> {
  if (dbAdapter) {
    await dbAdapter.disconnect();
    dbAdapter = null;
  }
}

async function createUsersTable(db: DatabaseAdapter): Promise<void> {
  await db.query(`
    CREATE TABLE IF NOT EXISTS users (
      users_id UUID PRIMARY KEY,
      email VARCHAR(255) NOT NULL UNIQUE,
      username VARCHAR(100) NOT NULL UNIQUE,
      first_name VARCHAR(100) NOT NULL,
      last_name VARCHAR(100) NOT NULL,
      department VARCHAR(100),
      employee_id VARCHAR(50) UNIQUE,
      password_hash VARCHAR(255) NOT NULL,
      is_active BOOLEAN NOT NULL DEFAULT TRUE,
      last_login TIMESTAMPTZ,
      password_changed_at TIMESTAMPTZ,
      created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
      updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    );

    ALTER TABLE users ADD COLUMN IF NOT EXISTS password_changed_at TIMESTAMPTZ;

    CREATE UNIQUE INDEX IF NOT EXISTS idx_users_email_lower ON users(LOWER(email));
    CREATE UNIQUE INDEX IF NOT EXISTS idx_users_username_lower ON users(LOWER(username));
  `);
  Logger.info('Users table ready');
}

async function createRolesTables(db: DatabaseAdapter): Promise<void> {
  await db.query(`
    CREATE TABLE IF NOT EXISTS roles (
      roles_id UUID PRIMARY KEY,
      name VARCHAR(100) NOT NULL UNIQUE,
      description TEXT,
      permissions JSONB NOT NULL DEFAULT '{}'::jsonb,
      is_active BOOLEAN NOT NULL DEFAULT TRUE,
      created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
      updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    );

    CREATE TABLE IF NOT EXISTS user_roles (
      user_roles_id UUID PRIMARY KEY,
      users_id UUID NOT NULL REFERENCES users(users_id) ON DELETE CASCADE,
      roles_id UUID NOT NULL REFERENCES roles(roles_id) ON DELETE CASCADE,
      assigned_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
      is_active BOOLEAN NOT NULL DEFAULT TRUE,
      UNIQUE (users_id, roles_id)
    );

    CREATE INDEX IF NOT EXISTS idx_user_roles_user ON user_roles(users_id);
  `);
  Logger.info('Roles and user_roles tables ready');
}

async function createRefreshTokensTable(db: DatabaseAdapter): Promise<void> {
  await db.query(`
    CREATE TABLE IF NOT EXISTS refresh_tokens (
      id UUID PRIMARY KEY,
      user_id UUID NOT NULL REFERENCES users(users_id) ON DELETE CASCADE,
      family_id UUID NOT NULL,
      token_hash VARCHAR(255) NOT NULL UNIQUE,
      expires_at TIMESTAMPTZ NOT NULL,
      revoked_at TIMESTAMPTZ,
      created_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    );

    CREATE INDEX IF NOT EXISTS idx_refresh_tokens_user ON refresh_tokens(user_id);
    CREATE INDEX IF NOT EXISTS idx_refresh_tokens_family ON refresh_tokens(family_id);
    CREATE INDEX IF NOT EXISTS idx_refresh_tokens_expires ON refresh_tokens(expires_at);
  `);
  Logger.info('Refresh tokens table ready');
}
