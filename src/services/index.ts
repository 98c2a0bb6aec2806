import { AuthConfig, loadAuthConfig } from '../config/env';
import { Repositories, getRepositories } from '../repositories';
import { PasswordHasher } from './password-hasher.service';
import { TokenCodec } from './token-codec.service';
import { CredentialStore } from './credential.service';
import { RefreshTokenStore } from './refresh-token.service';
import { PermissionEvaluator } from './permission.service';
import { SessionService } from './session.service';
import { RefreshTokenCleanupScheduler } from './refresh-token-cleanup.service';

export interface AuthServices {
  config: AuthConfig;
  hasher: PasswordHasher;
  tokens: TokenCodec;
  credentials: CredentialStore;
  refreshTokens: RefreshTokenStore;
  permissions: PermissionEvaluator;
  session: SessionService;
  cleanup: RefreshTokenCleanupScheduler;
}

/**
 * Wire the core from explicit configuration and repositories. `now` is the
 * clock shared by token issuance and expiry checks.
 */
export function createAuthServices(
  config: AuthConfig,
  repositories: Repositories,
  now: () => number = Date.now
): AuthServices {
  const hasher = new PasswordHasher(config);
  const tokens = new TokenCodec(config, now);
  const credentials = new CredentialStore(repositories.principals, hasher);
  const refreshTokens = new RefreshTokenStore(repositories.refreshTokens, config, now);
  const permissions = new PermissionEvaluator(repositories.roles);
  const session = new SessionService(
    { principals: repositories.principals, credentials, tokens, refreshTokens, permissions },
    config
  );
  const cleanup = new RefreshTokenCleanupScheduler(refreshTokens, config.cleanupIntervalMs);

  return { config, hasher, tokens, credentials, refreshTokens, permissions, session, cleanup };
}

let authServices: AuthServices | null = null;

export function getAuthServices(): AuthServices {
  if (!authServices) {
    authServices = createAuthServices(loadAuthConfig(), getRepositories());
  }
  return authServices;
}
