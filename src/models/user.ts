/**
 * Permission flags keyed by permission name, e.g. `approve_timesheet`.
 * Stored per role as a JSON object.
 */
export type PermissionMap = Record<string, boolean>;

export interface Principal {
  id: string;
  email: string;
  username: string;
  first_name: string;
  last_name: string;
  department: string | null;
  employee_id: string | null;
  password_hash: string;
  is_active: boolean;
  last_login: Date | null;
  // Refresh tokens issued before this instant are no longer honoured
  password_changed_at: Date | null;
  created_at: Date;
  updated_at: Date;
}

/**
 * Public profile of a principal. Never carries the secret hash.
 */
export interface PrincipalSummary {
  id: string;
  email: string;
  username: string;
  first_name: string;
  last_name: string;
  department: string | null;
  employee_id: string | null;
  is_active: boolean;
  roles: string[];
  last_login: Date | null;
  created_at: Date;
  updated_at: Date;
}

export interface Role {
  id: string;
  name: string;
  description: string | null;
  permissions: PermissionMap;
  is_active: boolean;
  created_at: Date;
  updated_at: Date;
}

export interface RoleAssignment {
  id: string;
  principal_id: string;
  role_id: string;
  assigned_at: Date;
  is_active: boolean;
}

export interface RefreshTokenRecord {
  id: string;
  principal_id: string;
  // Rotation chain: minted at login, inherited by every successor
  family_id: string;
  token_hash: string;
  expires_at: Date;
  revoked_at: Date | null;
  created_at: Date;
}

export interface CreateRefreshTokenDTO {
  principal_id: string;
  family_id: string;
  token_hash: string;
  expires_at: Date;
}

export interface CreatePrincipalDTO {
  email: string;
  username: string;
  first_name: string;
  last_name: string;
  department?: string | null;
  employee_id?: string | null;
  password_hash: string;
  is_active?: boolean;
}

export interface CreateRoleDTO {
  name: string;
  description?: string | null;
  permissions: PermissionMap;
  is_active?: boolean;
}

export function toPrincipalSummary(principal: Principal, roles: string[]): PrincipalSummary {
  const { password_hash: _passwordHash, password_changed_at: _passwordChangedAt, ...profile } = principal;
  return { ...profile, roles };
}
