import { v4 as uuidv4 } from 'uuid';
import { DatabaseAdapter } from '../database/adapter';
import { RefreshTokenRecord, CreateRefreshTokenDTO } from '../models/user';
import { RefreshTokenRepository } from './refresh-token.repository';

type RefreshTokenRow = {
  id: string;
  user_id: string;
  family_id: string;
  token_hash: string;
  expires_at: Date;
  revoked_at: Date | null;
  created_at: Date;
};

const INSERT_QUERY = `
  INSERT INTO refresh_tokens (id, user_id, family_id, token_hash, expires_at, created_at)
  VALUES ($1, $2, $3, $4, $5, NOW())
  RETURNING *
`;

function toRecord(row: RefreshTokenRow): RefreshTokenRecord {
  const { user_id, ...rest } = row;
  return { principal_id: user_id, ...rest };
}

function insertParams(token: CreateRefreshTokenDTO): unknown[] {
  return [uuidv4(), token.principal_id, token.family_id, token.token_hash, token.expires_at];
}

export class PostgreSQLRefreshTokenRepository implements RefreshTokenRepository {
  constructor(private db: DatabaseAdapter) {}

  async create(token: CreateRefreshTokenDTO): Promise<RefreshTokenRecord> {
    const result = await this.db.query<RefreshTokenRow>(INSERT_QUERY, insertParams(token));
    return toRecord(result.rows[0]);
  }

  async findByHash(tokenHash: string): Promise<RefreshTokenRecord | null> {
    const result = await this.db.query<RefreshTokenRow>('SELECT * FROM refresh_tokens WHERE token_hash = $1', [tokenHash]);
    return result.rows[0] ? toRecord(result.rows[0]) : null;
  }

  async rotate(currentId: string, successor: CreateRefreshTokenDTO): Promise<RefreshTokenRecord | null> {
    return this.db.transaction(async (tx) => {
      // Conditional update: only one concurrent caller can flip revoked_at
      const revoked = await tx.query(
        'UPDATE refresh_tokens SET revoked_at = NOW() WHERE id = $1 AND revoked_at IS NULL AND expires_at > NOW()',
        [currentId]
      );
      if (revoked.rowCount !== 1) {
        return null;
      }

      const inserted = await tx.query<RefreshTokenRow>(INSERT_QUERY, insertParams(successor));
      return toRecord(inserted.rows[0]);
    });
  }

  async revokeByHash(tokenHash: string): Promise<number> {
    const result = await this.db.query(
      'UPDATE refresh_tokens SET revoked_at = NOW() WHERE token_hash = $1 AND revoked_at IS NULL',
      [tokenHash]
    );
    return result.rowCount ?? 0;
  }

  async revokeFamily(familyId: string): Promise<number> {
    const result = await this.db.query(
      'UPDATE refresh_tokens SET revoked_at = NOW() WHERE family_id = $1 AND revoked_at IS NULL',
      [familyId]
    );
    return result.rowCount ?? 0;
  }

  async revokeAllForPrincipal(principalId: string): Promise<number> {
    const result = await this.db.query(
      'UPDATE refresh_tokens SET revoked_at = NOW() WHERE user_id = $1 AND revoked_at IS NULL',
      [principalId]
    );
    return result.rowCount ?? 0;
  }

  async deleteExpired(): Promise<number> {
    const result = await this.db.query('DELETE FROM refresh_tokens WHERE expires_at < NOW()');
    return result.rowCount ?? 0;
  }
}
