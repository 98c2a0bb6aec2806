import { v4 as uuidv4 } from 'uuid';
import { AuthConfig } from '../config/env';
import { RefreshTokenRecord } from '../models/user';
import { RefreshFailure } from '../models/session';
import { RefreshTokenRepository } from '../repositories/refresh-token.repository';
import { hashToken, generateToken } from '../utils/crypto';
import { Logger } from '../utils/logger';
import { Result, ok, err } from '../utils/result';

export interface IssuedRefreshToken {
  rawToken: string;
  record: RefreshTokenRecord;
}

export interface RotatedRefreshToken extends IssuedRefreshToken {
  principalId: string;
  // The token that was presented and consumed
  previous: RefreshTokenRecord;
}

/**
 * Opaque refresh tokens. Only an HMAC of the raw value is persisted; the raw
 * value leaves this class exactly once, at issue time.
 *
 * Every successful use rotates the token within its family. Presenting a
 * token that was already rotated revokes the whole family.
 */
export class RefreshTokenStore {
  private readonly ttlSeconds: number;
  private readonly pepper: string;

  constructor(
    private readonly repository: RefreshTokenRepository,
    config: Pick<AuthConfig, 'refreshTokenTtl' | 'refreshTokenPepper'>,
    private readonly now: () => number = Date.now
  ) {
    this.ttlSeconds = config.refreshTokenTtl;
    this.pepper = config.refreshTokenPepper;
  }

  async issue(principalId: string, familyId: string = uuidv4()): Promise<IssuedRefreshToken> {
    const rawToken = generateToken(32);
    const record = await this.repository.create({
      principal_id: principalId,
      family_id: familyId,
      token_hash: hashToken(rawToken, this.pepper),
      expires_at: this.expiresAt(),
    });
    return { rawToken, record };
  }

  async validateAndRotate(rawToken: string): Promise<Result<RotatedRefreshToken, RefreshFailure>> {
    const current = await this.repository.findByHash(hashToken(rawToken, this.pepper));
    if (!current) {
      return err({ reason: 'not_found' });
    }

    const chain = { principalId: current.principal_id, familyId: current.family_id };

    if (current.revoked_at) {
      await this.revokeFamilyOnReuse(current, 'revoked');
      return err({ ...chain, reason: 'revoked' });
    }

    if (current.expires_at.getTime() <= this.now()) {
      return err({ ...chain, reason: 'expired' });
    }

    const nextRawToken = generateToken(32);
    const successor = await this.repository.rotate(current.id, {
      principal_id: current.principal_id,
      family_id: current.family_id,
      token_hash: hashToken(nextRawToken, this.pepper),
      expires_at: this.expiresAt(),
    });

    if (!successor) {
      // Another caller rotated this token between our read and our write
      await this.revokeFamilyOnReuse(current, 'concurrent');
      return err({ ...chain, reason: 'reused' });
    }

    return ok({ principalId: current.principal_id, rawToken: nextRawToken, record: successor, previous: current });
  }

  /**
   * Idempotent: unknown or already revoked tokens are not an error.
   */
  async revoke(rawToken: string): Promise<void> {
    await this.repository.revokeByHash(hashToken(rawToken, this.pepper));
  }

  async revokeFamily(familyId: string): Promise<number> {
    return this.repository.revokeFamily(familyId);
  }

  async revokeAllForPrincipal(principalId: string): Promise<number> {
    return this.repository.revokeAllForPrincipal(principalId);
  }

  async purgeExpired(): Promise<number> {
    return this.repository.deleteExpired();
  }

  private expiresAt(): Date {
    return new Date(this.now() + this.ttlSeconds * 1000);
  }

  private async revokeFamilyOnReuse(record: RefreshTokenRecord, trigger: 'revoked' | 'concurrent'): Promise<void> {
    const revoked = await this.repository.revokeFamily(record.family_id);
    Logger.audit('Refresh token reuse detected, rotation chain revoked', {
      trigger,
      principalId: record.principal_id,
      familyId: record.family_id,
      tokensRevoked: revoked,
    });
  }
}
