import { v4 as uuidv4 } from 'uuid';
import { Role, RoleAssignment, CreateRoleDTO } from '../models/user';
import { RoleRepository } from './role.repository';

export class InMemoryRoleRepository implements RoleRepository {
  private roles: Role[] = [];
  private assignments: RoleAssignment[] = [];

  async create(role: CreateRoleDTO): Promise<Role> {
    if (this.roles.some((r) => r.name === role.name)) {
      throw new Error(`Role ${role.name} already exists`);
    }

    const now = new Date();
    const created: Role = {
      id: uuidv4(),
      name: role.name,
      description: role.description ?? null,
      permissions: { ...role.permissions },
      is_active: role.is_active ?? true,
      created_at: now,
      updated_at: now,
    };
    this.roles.push(created);
    return { ...created, permissions: { ...created.permissions } };
  }

  async findByName(name: string): Promise<Role | null> {
    const found = this.roles.find((r) => r.name === name);
    return found ? { ...found, permissions: { ...found.permissions } } : null;
  }

  async setActive(roleId: string, isActive: boolean): Promise<void> {
    const found = this.roles.find((r) => r.id === roleId);
    if (found) {
      found.is_active = isActive;
      found.updated_at = new Date();
    }
  }

  async assign(principalId: string, roleId: string): Promise<RoleAssignment> {
    const existing = this.assignments.find((a) => a.principal_id === principalId && a.role_id === roleId);
    if (existing) {
      existing.is_active = true;
      return { ...existing };
    }

    const assignment: RoleAssignment = {
      id: uuidv4(),
      principal_id: principalId,
      role_id: roleId,
      assigned_at: new Date(),
      is_active: true,
    };
    this.assignments.push(assignment);
    return { ...assignment };
  }

  async setAssignmentActive(principalId: string, roleId: string, isActive: boolean): Promise<void> {
    const found = this.assignments.find((a) => a.principal_id === principalId && a.role_id === roleId);
    if (found) {
      found.is_active = isActive;
    }
  }

  async findActiveRolesForPrincipal(principalId: string): Promise<Role[]> {
    const roleIds = new Set(
      this.assignments.filter((a) => a.principal_id === principalId && a.is_active).map((a) => a.role_id)
    );
    return this.roles
      .filter((r) => r.is_active && roleIds.has(r.id))
      .sort((a, b) => a.name.localeCompare(b.name))
      .map((r) => ({ ...r, permissions: { ...r.permissions } }));
  }
}
