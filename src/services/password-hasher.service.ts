import argon2 from 'argon2';
import { AuthConfig } from '../config/env';
import { Logger } from '../utils/logger';

/**
 * argon2id hashing. The encoded hash carries its own salt and parameters, so
 * hashes made under an older work factor still verify.
 */
export class PasswordHasher {
  private readonly timeCost: number;
  private readonly memoryCost: number;

  constructor(config: Pick<AuthConfig, 'argon2TimeCost' | 'argon2MemoryCost'>) {
    this.timeCost = config.argon2TimeCost;
    this.memoryCost = config.argon2MemoryCost;
  }

  async hash(secret: string): Promise<string> {
    return argon2.hash(secret, {
      type: argon2.argon2id,
      timeCost: this.timeCost,
      memoryCost: this.memoryCost,
    });
  }

  /**
   * Fails closed: a malformed hash or library error yields false.
   */
  async verify(secret: string, hash: string): Promise<boolean> {
    try {
      return await argon2.verify(hash, secret);
    } catch (error) {
      Logger.warn('Password hash could not be verified', {
        error: error instanceof Error ? error.message : String(error),
      });
      return false;
    }
  }
}
