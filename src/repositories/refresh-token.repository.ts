import { RefreshTokenRecord, CreateRefreshTokenDTO } from '../models/user';

export interface RefreshTokenRepository {
  create(token: CreateRefreshTokenDTO): Promise<RefreshTokenRecord>;
  /**
   * Returns the record whatever its state; callers decide on revocation and expiry.
   */
  findByHash(tokenHash: string): Promise<RefreshTokenRecord | null>;
  /**
   * Atomically revoke `currentId` and insert `successor`, but only if `currentId`
   * is still unrevoked and unexpired. Returns null when the condition failed.
   */
  rotate(currentId: string, successor: CreateRefreshTokenDTO): Promise<RefreshTokenRecord | null>;
  revokeByHash(tokenHash: string): Promise<number>;
  revokeFamily(familyId: string): Promise<number>;
  revokeAllForPrincipal(principalId: string): Promise<number>;
  deleteExpired(): Promise<number>;
}
