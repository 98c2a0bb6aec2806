import { Principal } from '../models/user';
import { PrincipalRepository } from '../repositories/principal.repository';
import { PasswordHasher } from './password-hasher.service';
import { Logger } from '../utils/logger';
import { generateToken } from '../utils/crypto';

export type CredentialCheck =
  | { valid: true; principal: Principal }
  | { valid: false; reason: 'unknown_identifier' | 'inactive' | 'secret_mismatch' };

/**
 * Verifies identifier + secret pairs against persisted hashes. Storage faults
 * propagate to the caller; only credential outcomes are returned.
 */
export class CredentialStore {
  // Verified against when the identifier is unknown, so both paths cost one hash verify
  private decoyHash: Promise<string> | null = null;

  constructor(
    private readonly principals: PrincipalRepository,
    private readonly hasher: PasswordHasher
  ) {}

  async verify(identifier: string, secret: string): Promise<CredentialCheck> {
    const principal = await this.principals.findByIdentifier(identifier);
    if (!principal) {
      await this.hasher.verify(secret, await this.getDecoyHash());
      return { valid: false, reason: 'unknown_identifier' };
    }

    const matches = await this.hasher.verify(secret, principal.password_hash);
    if (!matches) {
      return { valid: false, reason: 'secret_mismatch' };
    }

    if (!principal.is_active) {
      return { valid: false, reason: 'inactive' };
    }

    return { valid: true, principal };
  }

  async verifyById(principalId: string, secret: string): Promise<CredentialCheck> {
    const principal = await this.principals.findById(principalId);
    if (!principal) {
      return { valid: false, reason: 'unknown_identifier' };
    }
    if (!principal.is_active) {
      return { valid: false, reason: 'inactive' };
    }
    const matches = await this.hasher.verify(secret, principal.password_hash);
    return matches ? { valid: true, principal } : { valid: false, reason: 'secret_mismatch' };
  }

  async updateSecret(principalId: string, newSecret: string): Promise<boolean> {
    const passwordHash = await this.hasher.hash(newSecret);
    const updated = await this.principals.updatePassword(principalId, passwordHash);
    if (updated) {
      Logger.info('Password hash updated', { principalId });
    }
    return updated;
  }

  private getDecoyHash(): Promise<string> {
    if (!this.decoyHash) {
      this.decoyHash = this.hasher.hash(generateToken(16)).catch((error: unknown) => {
        this.decoyHash = null;
        throw error;
      });
    }
    return this.decoyHash;
  }

  async recordLogin(principalId: string): Promise<void> {
    await this.principals.touchLastLogin(principalId);
  }
}
