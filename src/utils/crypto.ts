import crypto from 'crypto';

/**
 * Hash a token using HMAC-SHA-256 keyed with the given pepper
 */
export function hashToken(token: string, pepper: string): string {
  return crypto.createHmac('sha256', pepper).update(token).digest('hex');
}

/**
 * Generate a cryptographically secure random token
 */
export function generateToken(length: number = 32): string {
  return crypto.randomBytes(length).toString('hex');
}

