import { AuthConfig } from '../config/env';
import { PermissionMap, PrincipalSummary, toPrincipalSummary } from '../models/user';
import { RequestContext, TokenPair } from '../models/session';
import { PrincipalRepository } from '../repositories/principal.repository';
import { CredentialStore } from './credential.service';
import { TokenCodec } from './token-codec.service';
import { RefreshTokenStore } from './refresh-token.service';
import { PermissionEvaluator } from './permission.service';
import { AuthError, AuthErrorCode, authError } from '../utils/errors';
import { isPasswordWithinPolicy } from '../utils/auth-validation';
import { withDeadline } from '../utils/timeout';
import { Logger } from '../utils/logger';
import { Result, ok, err } from '../utils/result';

export interface SessionServiceDeps {
  principals: PrincipalRepository;
  credentials: CredentialStore;
  tokens: TokenCodec;
  refreshTokens: RefreshTokenStore;
  permissions: PermissionEvaluator;
}

/**
 * Entry point for the REST layer: login, refresh, logout, profile lookup,
 * password change and authorization checks.
 *
 * Expected outcomes (wrong password, expired token, replayed refresh token)
 * come back as `{ ok: false }` with a generic category. Storage faults and
 * deadline overruns come back as TRANSIENT, never as a denial.
 */
export class SessionService {
  private readonly accessTokenTtl: number;
  private readonly timeoutMs: number;

  constructor(
    private readonly deps: SessionServiceDeps,
    config: Pick<AuthConfig, 'accessTokenTtl' | 'persistenceTimeoutMs'>
  ) {
    this.accessTokenTtl = config.accessTokenTtl;
    this.timeoutMs = config.persistenceTimeoutMs;
  }

  async login(identifier: string, secret: string, ctx?: RequestContext): Promise<Result<TokenPair, AuthError>> {
    return this.guarded('login', ctx, async () => {
      const check = await this.deps.credentials.verify(identifier, secret);
      if (!check.valid) {
        Logger.audit('Login denied', { reason: check.reason, identifier });
        return err(authError(AuthErrorCode.INVALID_CREDENTIALS));
      }

      const principalId = check.principal.id;
      const refresh = await this.deps.refreshTokens.issue(principalId);

      // The token is stored before this read, so a password change or
      // deactivation that finishes later revokes it, and one that finished
      // earlier is seen here.
      const current = await this.deps.principals.findById(principalId);
      if (!current || !current.is_active || current.password_hash !== check.principal.password_hash) {
        await this.deps.refreshTokens.revoke(refresh.rawToken);
        Logger.audit('Login denied', { reason: 'credentials_changed', principalId });
        return err(authError(AuthErrorCode.INVALID_CREDENTIALS));
      }

      try {
        await this.deps.credentials.recordLogin(principalId);
      } catch (error) {
        Logger.warn('Failed to update last login', {
          principalId,
          error: error instanceof Error ? error.message : String(error),
        });
      }

      Logger.info('Login succeeded', { principalId, familyId: refresh.record.family_id });
      return ok(this.pair(principalId, refresh.rawToken));
    });
  }

  async refresh(rawRefreshToken: string, ctx?: RequestContext): Promise<Result<TokenPair, AuthError>> {
    return this.guarded('refresh', ctx, async () => {
      const rotated = await this.deps.refreshTokens.validateAndRotate(rawRefreshToken);
      if (!rotated.ok) {
        Logger.audit('Refresh denied', {
          reason: rotated.error.reason,
          principalId: rotated.error.principalId,
          familyId: rotated.error.familyId,
        });
        return err(authError(AuthErrorCode.REFRESH_DENIED));
      }

      const { principalId, rawToken, previous } = rotated.value;
      const principal = await this.deps.principals.findById(principalId);
      if (!principal || !principal.is_active) {
        const revoked = await this.deps.refreshTokens.revokeAllForPrincipal(principalId);
        Logger.audit('Refresh denied', { reason: 'inactive_principal', principalId, tokensRevoked: revoked });
        return err(authError(AuthErrorCode.REFRESH_DENIED));
      }

      if (principal.password_changed_at && previous.created_at.getTime() < principal.password_changed_at.getTime()) {
        const revoked = await this.deps.refreshTokens.revokeFamily(previous.family_id);
        Logger.audit('Refresh denied', {
          reason: 'issued_before_password_change',
          principalId,
          familyId: previous.family_id,
          tokensRevoked: revoked,
        });
        return err(authError(AuthErrorCode.REFRESH_DENIED));
      }

      return ok(this.pair(principalId, rawToken));
    });
  }

  /**
   * Succeeds for unknown and already revoked tokens alike.
   */
  async logout(rawRefreshToken: string, ctx?: RequestContext): Promise<Result<void, AuthError>> {
    return this.guarded('logout', ctx, async () => {
      await this.deps.refreshTokens.revoke(rawRefreshToken);
      return ok(undefined);
    });
  }

  async logoutEverywhere(principalId: string, ctx?: RequestContext): Promise<Result<{ revoked: number }, AuthError>> {
    return this.guarded('logoutEverywhere', ctx, async () => {
      const revoked = await this.deps.refreshTokens.revokeAllForPrincipal(principalId);
      Logger.info('Revoked all refresh tokens', { principalId, revoked });
      return ok({ revoked });
    });
  }

  async currentPrincipal(accessToken: string, ctx?: RequestContext): Promise<Result<PrincipalSummary, AuthError>> {
    const claims = this.deps.tokens.verify(accessToken, 'access');
    if (!claims.ok) {
      return claims;
    }

    return this.guarded('currentPrincipal', ctx, async () => {
      const principalId = claims.value.sub;
      const principal = await this.deps.principals.findById(principalId);
      if (!principal || !principal.is_active) {
        Logger.audit('Access token rejected', { reason: principal ? 'inactive_principal' : 'unknown_principal', principalId });
        return err(authError(AuthErrorCode.TOKEN_INVALID));
      }

      const roles = await this.deps.permissions.roleNames(principalId);
      return ok(toPrincipalSummary(principal, roles));
    });
  }

  async changePassword(
    principalId: string,
    oldSecret: string,
    newSecret: string,
    ctx?: RequestContext
  ): Promise<Result<void, AuthError>> {
    return this.guarded('changePassword', ctx, async () => {
      const check = await this.deps.credentials.verifyById(principalId, oldSecret);
      if (!check.valid) {
        Logger.audit('Password change denied', { reason: check.reason, principalId });
        return err(authError(AuthErrorCode.INVALID_CREDENTIALS));
      }

      if (!isPasswordWithinPolicy(newSecret)) {
        return err(authError(AuthErrorCode.PASSWORD_POLICY_VIOLATION));
      }

      const updated = await this.deps.credentials.updateSecret(principalId, newSecret);
      if (!updated) {
        Logger.audit('Password change denied', { reason: 'principal_vanished', principalId });
        return err(authError(AuthErrorCode.INVALID_CREDENTIALS));
      }

      // Force re-login everywhere with the new secret
      const revoked = await this.deps.refreshTokens.revokeAllForPrincipal(principalId);
      Logger.info('Password changed', { principalId, refreshTokensRevoked: revoked });
      return ok(undefined);
    });
  }

  /**
   * True iff an active role reached through an active assignment grants the
   * permission. Unknown and inactive principals are never authorized.
   */
  async authorize(principalId: string, permission: string, ctx?: RequestContext): Promise<Result<boolean, AuthError>> {
    return this.guarded('authorize', ctx, async () => {
      if (!(await this.isActivePrincipal(principalId))) {
        return ok(false);
      }
      return ok(await this.deps.permissions.authorize(principalId, permission));
    });
  }

  async effectivePermissions(principalId: string, ctx?: RequestContext): Promise<Result<PermissionMap, AuthError>> {
    return this.guarded('effectivePermissions', ctx, async () => {
      if (!(await this.isActivePrincipal(principalId))) {
        return ok({});
      }
      return ok(await this.deps.permissions.effectivePermissions(principalId));
    });
  }

  private async isActivePrincipal(principalId: string): Promise<boolean> {
    const principal = await this.deps.principals.findById(principalId);
    return principal !== null && principal.is_active;
  }

  private pair(principalId: string, refreshToken: string): TokenPair {
    return {
      accessToken: this.deps.tokens.issue(principalId, 'access', this.accessTokenTtl),
      refreshToken,
      tokenType: 'bearer',
      expiresIn: this.accessTokenTtl,
    };
  }

  private async guarded<T>(
    operation: string,
    ctx: RequestContext | undefined,
    work: () => Promise<Result<T, AuthError>>
  ): Promise<Result<T, AuthError>> {
    try {
      return await withDeadline(operation, work, ctx?.timeoutMs ?? this.timeoutMs, ctx?.signal);
    } catch (error) {
      Logger.error(`Session operation "${operation}" failed`, error);
      return err(authError(AuthErrorCode.TRANSIENT));
    }
  }
}
