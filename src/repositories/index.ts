import { getDatabase, usesPostgres } from '../database';
import { PrincipalRepository } from './principal.repository';
import { InMemoryPrincipalRepository } from './in-memory-principal.repository';
import { PostgreSQLPrincipalRepository } from './postgresql-principal.repository';
import { RoleRepository } from './role.repository';
import { InMemoryRoleRepository } from './in-memory-role.repository';
import { PostgreSQLRoleRepository } from './postgresql-role.repository';
import { RefreshTokenRepository } from './refresh-token.repository';
import { InMemoryRefreshTokenRepository } from './in-memory-refresh-token.repository';
import { PostgreSQLRefreshTokenRepository } from './postgresql-refresh-token.repository';

export interface Repositories {
  principals: PrincipalRepository;
  roles: RoleRepository;
  refreshTokens: RefreshTokenRepository;
}

export interface InMemoryRepositories extends Repositories {
  principals: InMemoryPrincipalRepository;
  roles: InMemoryRoleRepository;
  refreshTokens: InMemoryRefreshTokenRepository;
}

let repositories: Repositories | null = null;

export function createInMemoryRepositories(now: () => number = Date.now): InMemoryRepositories {
  return {
    principals: new InMemoryPrincipalRepository(now),
    roles: new InMemoryRoleRepository(),
    refreshTokens: new InMemoryRefreshTokenRepository(now),
  };
}

export function getRepositories(): Repositories {
  if (!repositories) {
    if (usesPostgres()) {
      const db = getDatabase();
      repositories = {
        principals: new PostgreSQLPrincipalRepository(db),
        roles: new PostgreSQLRoleRepository(db),
        refreshTokens: new PostgreSQLRefreshTokenRepository(db),
      };
    } else {
      repositories = createInMemoryRepositories();
    }
  }
  return repositories;
}
