import { v4 as uuidv4 } from 'uuid';
import { RefreshTokenRecord, CreateRefreshTokenDTO } from '../models/user';
import { RefreshTokenRepository } from './refresh-token.repository';

/**
 * Map-backed store. Every mutation runs synchronously between awaits, so a
 * check-and-set inside one method cannot interleave with another caller.
 */
export class InMemoryRefreshTokenRepository implements RefreshTokenRepository {
  private tokens = new Map<string, RefreshTokenRecord>();
  private hashIndex = new Map<string, string>(); // token_hash -> id

  constructor(private readonly now: () => number = Date.now) {}

  async create(token: CreateRefreshTokenDTO): Promise<RefreshTokenRecord> {
    return this.insert(token);
  }

  async findByHash(tokenHash: string): Promise<RefreshTokenRecord | null> {
    const id = this.hashIndex.get(tokenHash);
    if (!id) return null;
    const record = this.tokens.get(id);
    return record ? { ...record } : null;
  }

  async rotate(currentId: string, successor: CreateRefreshTokenDTO): Promise<RefreshTokenRecord | null> {
    const current = this.tokens.get(currentId);
    if (!current || current.revoked_at || current.expires_at.getTime() <= this.now()) {
      return null;
    }

    this.tokens.set(currentId, { ...current, revoked_at: new Date(this.now()) });
    return this.insert(successor);
  }

  async revokeByHash(tokenHash: string): Promise<number> {
    const id = this.hashIndex.get(tokenHash);
    return id ? this.revokeWhere((record) => record.id === id) : 0;
  }

  async revokeFamily(familyId: string): Promise<number> {
    return this.revokeWhere((record) => record.family_id === familyId);
  }

  async revokeAllForPrincipal(principalId: string): Promise<number> {
    return this.revokeWhere((record) => record.principal_id === principalId);
  }

  async deleteExpired(): Promise<number> {
    let deleted = 0;
    for (const [id, record] of this.tokens) {
      if (record.expires_at.getTime() < this.now()) {
        this.tokens.delete(id);
        this.hashIndex.delete(record.token_hash);
        deleted++;
      }
    }
    return deleted;
  }

  private insert(token: CreateRefreshTokenDTO): RefreshTokenRecord {
    if (this.hashIndex.has(token.token_hash)) {
      throw new Error('Duplicate refresh token hash');
    }

    const record: RefreshTokenRecord = {
      id: uuidv4(),
      principal_id: token.principal_id,
      family_id: token.family_id,
      token_hash: token.token_hash,
      expires_at: token.expires_at,
      revoked_at: null,
      created_at: new Date(this.now()),
    };
    this.tokens.set(record.id, record);
    this.hashIndex.set(record.token_hash, record.id);
    return { ...record };
  }

  private revokeWhere(predicate: (record: RefreshTokenRecord) => boolean): number {
    let revoked = 0;
    const revokedAt = new Date(this.now());
    for (const [id, record] of this.tokens) {
      if (!record.revoked_at && predicate(record)) {
        this.tokens.set(id, { ...record, revoked_at: revokedAt });
        revoked++;
      }
    }
    return revoked;
  }
}
