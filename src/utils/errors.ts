export enum AuthErrorCode {
  INVALID_CREDENTIALS = 'INVALID_CREDENTIALS',
  TOKEN_INVALID = 'TOKEN_INVALID',
  REFRESH_DENIED = 'REFRESH_DENIED',
  FORBIDDEN = 'FORBIDDEN',
  TRANSIENT = 'TRANSIENT',
  PASSWORD_POLICY_VIOLATION = 'PASSWORD_POLICY_VIOLATION',
}

export interface AuthError {
  code: AuthErrorCode;
  message: string;
}

const MESSAGES: Record<AuthErrorCode, string> = {
  [AuthErrorCode.INVALID_CREDENTIALS]: 'Incorrect username or password',
  [AuthErrorCode.TOKEN_INVALID]: 'Could not validate credentials',
  [AuthErrorCode.REFRESH_DENIED]: 'Invalid refresh token',
  [AuthErrorCode.FORBIDDEN]: 'Insufficient permissions',
  [AuthErrorCode.TRANSIENT]: 'Service temporarily unavailable, retry later',
  [AuthErrorCode.PASSWORD_POLICY_VIOLATION]: 'Password must be between 8 and 100 characters',
};

const HTTP_STATUS: Record<AuthErrorCode, number> = {
  [AuthErrorCode.INVALID_CREDENTIALS]: 401,
  [AuthErrorCode.TOKEN_INVALID]: 401,
  [AuthErrorCode.REFRESH_DENIED]: 401,
  [AuthErrorCode.FORBIDDEN]: 403,
  [AuthErrorCode.TRANSIENT]: 503,
  [AuthErrorCode.PASSWORD_POLICY_VIOLATION]: 400,
};

/**
 * Build the caller-facing error for a category. Messages are fixed per category
 * so no internal cause leaks across the boundary.
 */
export function authError(code: AuthErrorCode): AuthError {
  return { code, message: MESSAGES[code] };
}

export function httpStatusFor(code: AuthErrorCode): number {
  return HTTP_STATUS[code];
}

/**
 * Raised when a persistence call does not settle within its deadline or the
 * caller abandons it.
 */
export class PersistenceTimeoutError extends Error {
  constructor(
    public readonly operation: string,
    public readonly reason: 'timeout' | 'aborted'
  ) {
    super(`Persistence operation "${operation}" ${reason === 'timeout' ? 'timed out' : 'was aborted'}`);
    this.name = 'PersistenceTimeoutError';
  }
}
