import jwt, { Algorithm, JwtPayload } from 'jsonwebtoken';
import { AuthConfig } from '../config/env';
import { TokenClaims, TokenKind } from '../models/session';
import { AuthError, AuthErrorCode, authError } from '../utils/errors';
import { Logger } from '../utils/logger';
import { Result, ok, err } from '../utils/result';

const TOKEN_KINDS: readonly TokenKind[] = ['access', 'refresh'];

function toClaims(decoded: string | JwtPayload): TokenClaims | null {
  if (typeof decoded === 'string') {
    return null;
  }
  const kind = TOKEN_KINDS.find((k) => k === decoded.kind);
  if (!kind || typeof decoded.sub !== 'string' || typeof decoded.iat !== 'number' || typeof decoded.exp !== 'number') {
    return null;
  }
  return { sub: decoded.sub, kind, iat: decoded.iat, exp: decoded.exp };
}

/**
 * Signed, self-contained JWTs. Verification is signature + kind + expiry only;
 * nothing is looked up in storage, so an issued token stays valid until it expires.
 */
export class TokenCodec {
  private readonly secret: string;
  private readonly algorithm: Algorithm;
  private readonly leewaySeconds: number;

  constructor(
    config: Pick<AuthConfig, 'jwtSecret' | 'jwtAlgorithm' | 'clockLeewaySeconds'>,
    private readonly now: () => number = Date.now
  ) {
    this.secret = config.jwtSecret;
    this.algorithm = config.jwtAlgorithm;
    this.leewaySeconds = config.clockLeewaySeconds;
  }

  issue(principalId: string, kind: TokenKind, ttlSeconds: number): string {
    const iat = Math.floor(this.now() / 1000);
    const claims: TokenClaims = {
      sub: principalId,
      kind,
      iat,
      exp: iat + ttlSeconds,
    };
    return jwt.sign(claims, this.secret, { algorithm: this.algorithm });
  }

  /**
   * Every failure collapses into TOKEN_INVALID; the reason is only logged.
   */
  verify(token: string, expectedKind: TokenKind): Result<TokenClaims, AuthError> {
    let decoded: string | JwtPayload;
    try {
      decoded = jwt.verify(token, this.secret, {
        algorithms: [this.algorithm],
        clockTolerance: this.leewaySeconds,
        clockTimestamp: Math.floor(this.now() / 1000),
      });
    } catch (error) {
      Logger.audit('Token verification failed', {
        reason: error instanceof Error ? error.name : 'UnknownError',
        detail: error instanceof Error ? error.message : String(error),
      });
      return err(authError(AuthErrorCode.TOKEN_INVALID));
    }

    const claims = toClaims(decoded);
    if (!claims) {
      Logger.audit('Token verification failed', { reason: 'MalformedClaims' });
      return err(authError(AuthErrorCode.TOKEN_INVALID));
    }

    if (claims.kind !== expectedKind) {
      Logger.audit('Token verification failed', {
        reason: 'KindMismatch',
        expected: expectedKind,
        actual: claims.kind,
      });
      return err(authError(AuthErrorCode.TOKEN_INVALID));
    }

    return ok(claims);
  }
}
