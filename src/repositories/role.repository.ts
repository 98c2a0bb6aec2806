import { Role, RoleAssignment, CreateRoleDTO } from '../models/user';

export interface RoleRepository {
  create(role: CreateRoleDTO): Promise<Role>;
  findByName(name: string): Promise<Role | null>;
  setActive(roleId: string, isActive: boolean): Promise<void>;
  assign(principalId: string, roleId: string): Promise<RoleAssignment>;
  setAssignmentActive(principalId: string, roleId: string, isActive: boolean): Promise<void>;
  /**
   * Active roles reached through the principal's active assignments.
   */
  findActiveRolesForPrincipal(principalId: string): Promise<Role[]>;
}
