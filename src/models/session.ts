export type TokenKind = 'access' | 'refresh';

export interface TokenClaims {
  sub: string;
  kind: TokenKind;
  iat: number;
  exp: number;
}

export interface TokenPair {
  accessToken: string;
  refreshToken: string;
  tokenType: 'bearer';
  // Access-token lifetime in seconds
  expiresIn: number;
}

/**
 * Per-call bounds supplied by the request-serving layer.
 */
export interface RequestContext {
  timeoutMs?: number;
  signal?: AbortSignal;
}

export type RefreshFailureReason = 'not_found' | 'expired' | 'revoked' | 'reused';

export interface RefreshFailure {
  reason: RefreshFailureReason;
  principalId?: string;
  familyId?: string;
}
