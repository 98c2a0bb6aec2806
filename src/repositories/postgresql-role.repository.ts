import { v4 as uuidv4 } from 'uuid';
import { DatabaseAdapter } from '../database/adapter';
import { Role, RoleAssignment, CreateRoleDTO, PermissionMap } from '../models/user';
import { RoleRepository } from './role.repository';

type RoleRow = {
  roles_id: string;
  name: string;
  description: string | null;
  permissions: unknown;
  is_active: boolean;
  created_at: Date;
  updated_at: Date;
};

type AssignmentRow = {
  user_roles_id: string;
  users_id: string;
  roles_id: string;
  assigned_at: Date;
  is_active: boolean;
};

/**
 * JSONB columns arrive as objects, JSON text columns as strings. Only boolean
 * flags are kept; anything else is dropped, which reads as "not granted".
 */
export function parsePermissions(value: unknown): PermissionMap {
  let raw = value;
  if (typeof raw === 'string') {
    try {
      raw = JSON.parse(raw);
    } catch (error) {
      throw new Error(`Failed to parse permissions JSON: ${error}`);
    }
  }

  const permissions: PermissionMap = {};
  if (raw && typeof raw === 'object' && !Array.isArray(raw)) {
    for (const [name, flag] of Object.entries(raw)) {
      if (typeof flag === 'boolean') {
        permissions[name] = flag;
      }
    }
  }
  return permissions;
}

function toRole(row: RoleRow): Role {
  return {
    id: row.roles_id,
    name: row.name,
    description: row.description,
    permissions: parsePermissions(row.permissions),
    is_active: row.is_active,
    created_at: row.created_at,
    updated_at: row.updated_at,
  };
}

export class PostgreSQLRoleRepository implements RoleRepository {
  constructor(private db: DatabaseAdapter) {}

  async create(role: CreateRoleDTO): Promise<Role> {
    const query = `
      INSERT INTO roles (roles_id, name, description, permissions, is_active, created_at, updated_at)
      VALUES ($1, $2, $3, $4, $5, NOW(), NOW())
      RETURNING *
    `;
    const result = await this.db.query<RoleRow>(query, [
      uuidv4(),
      role.name,
      role.description ?? null,
      JSON.stringify(role.permissions),
      role.is_active ?? true,
    ]);
    return toRole(result.rows[0]);
  }

  async findByName(name: string): Promise<Role | null> {
    const result = await this.db.query<RoleRow>('SELECT * FROM roles WHERE name = $1', [name]);
    return result.rows[0] ? toRole(result.rows[0]) : null;
  }

  async setActive(roleId: string, isActive: boolean): Promise<void> {
    await this.db.query('UPDATE roles SET is_active = $1, updated_at = NOW() WHERE roles_id = $2', [isActive, roleId]);
  }

  async assign(principalId: string, roleId: string): Promise<RoleAssignment> {
    const query = `
      INSERT INTO user_roles (user_roles_id, users_id, roles_id, assigned_at, is_active)
      VALUES ($1, $2, $3, NOW(), TRUE)
      ON CONFLICT (users_id, roles_id) DO UPDATE SET is_active = TRUE
      RETURNING *
    `;
    const result = await this.db.query<AssignmentRow>(query, [uuidv4(), principalId, roleId]);
    const row = result.rows[0];
    return {
      id: row.user_roles_id,
      principal_id: row.users_id,
      role_id: row.roles_id,
      assigned_at: row.assigned_at,
      is_active: row.is_active,
    };
  }

  async setAssignmentActive(principalId: string, roleId: string, isActive: boolean): Promise<void> {
    await this.db.query('UPDATE user_roles SET is_active = $1 WHERE users_id = $2 AND roles_id = $3', [
      isActive,
      principalId,
      roleId,
    ]);
  }

  async findActiveRolesForPrincipal(principalId: string): Promise<Role[]> {
    const query = `
      SELECT r.*
      FROM user_roles ur
      INNER JOIN roles r ON r.roles_id = ur.roles_id
      WHERE ur.users_id = $1 AND ur.is_active = TRUE AND r.is_active = TRUE
      ORDER BY r.name
    `;
    const result = await this.db.query<RoleRow>(query, [principalId]);
    return result.rows.map(toRole);
  }
}
