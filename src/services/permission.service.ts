import { PermissionMap } from '../models/user';
import { RoleRepository } from '../repositories/role.repository';

/**
 * Union of role permission maps, most permissive wins: a flag is granted when
 * any contributing role sets it to true. A false in one role never cancels a
 * true in another, and a flag absent from every role stays absent (denied).
 */
export function mergePermissionsMostPermissive(maps: readonly PermissionMap[]): PermissionMap {
  const merged: PermissionMap = {};
  for (const map of maps) {
    for (const [name, granted] of Object.entries(map)) {
      merged[name] = merged[name] === true || granted === true;
    }
  }
  return merged;
}

/**
 * Resolves effective permissions from active role assignments. Reads are fresh
 * on every call; nothing is cached.
 */
export class PermissionEvaluator {
  constructor(private readonly roles: RoleRepository) {}

  async effectivePermissions(principalId: string): Promise<PermissionMap> {
    const activeRoles = await this.roles.findActiveRolesForPrincipal(principalId);
    return mergePermissionsMostPermissive(activeRoles.map((role) => role.permissions));
  }

  async authorize(principalId: string, permission: string): Promise<boolean> {
    const permissions = await this.effectivePermissions(principalId);
    return permissions[permission] === true;
  }

  async roleNames(principalId: string): Promise<string[]> {
    const activeRoles = await this.roles.findActiveRolesForPrincipal(principalId);
    return activeRoles.map((role) => role.name);
  }
}
