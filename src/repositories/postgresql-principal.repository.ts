import { v4 as uuidv4 } from 'uuid';
import { DatabaseAdapter } from '../database/adapter';
import { Principal, CreatePrincipalDTO } from '../models/user';
import { PrincipalRepository } from './principal.repository';

type PrincipalRow = {
  users_id: string;
  email: string;
  username: string;
  first_name: string;
  last_name: string;
  department: string | null;
  employee_id: string | null;
  password_hash: string;
  is_active: boolean;
  last_login: Date | null;
  password_changed_at: Date | null;
  created_at: Date;
  updated_at: Date;
};

const PRINCIPAL_COLUMNS = `
  users_id, email, username, first_name, last_name, department, employee_id,
  password_hash, is_active, last_login, password_changed_at, created_at, updated_at
`;

function toPrincipal(row: PrincipalRow): Principal {
  const { users_id, ...rest } = row;
  return { id: users_id, ...rest };
}

export class PostgreSQLPrincipalRepository implements PrincipalRepository {
  constructor(private db: DatabaseAdapter) {}

  async create(principal: CreatePrincipalDTO): Promise<Principal> {
    const query = `
      INSERT INTO users (
        users_id, email, username, first_name, last_name, department,
        employee_id, password_hash, is_active, created_at, updated_at
      ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, NOW(), NOW())
      RETURNING ${PRINCIPAL_COLUMNS}
    `;
    const result = await this.db.query<PrincipalRow>(query, [
      uuidv4(),
      principal.email,
      principal.username,
      principal.first_name,
      principal.last_name,
      principal.department ?? null,
      principal.employee_id ?? null,
      principal.password_hash,
      principal.is_active ?? true,
    ]);
    return toPrincipal(result.rows[0]);
  }

  async findById(id: string): Promise<Principal | null> {
    const query = `SELECT ${PRINCIPAL_COLUMNS} FROM users WHERE users_id = $1`;
    const result = await this.db.query<PrincipalRow>(query, [id]);
    return result.rows[0] ? toPrincipal(result.rows[0]) : null;
  }

  async findByIdentifier(identifier: string): Promise<Principal | null> {
    const query = `SELECT ${PRINCIPAL_COLUMNS} FROM users WHERE LOWER(username) = LOWER($1) OR LOWER(email) = LOWER($1) LIMIT 1`;
    const result = await this.db.query<PrincipalRow>(query, [identifier]);
    return result.rows[0] ? toPrincipal(result.rows[0]) : null;
  }

  async updatePassword(id: string, passwordHash: string): Promise<boolean> {
    const query = 'UPDATE users SET password_hash = $1, password_changed_at = NOW(), updated_at = NOW() WHERE users_id = $2';
    const result = await this.db.query(query, [passwordHash, id]);
    return (result.rowCount ?? 0) > 0;
  }

  async touchLastLogin(id: string): Promise<void> {
    await this.db.query('UPDATE users SET last_login = NOW() WHERE users_id = $1', [id]);
  }
}
