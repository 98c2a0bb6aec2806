import { v4 as uuidv4 } from 'uuid';
import { Principal, CreatePrincipalDTO } from '../models/user';
import { PrincipalRepository } from './principal.repository';

// Usernames and emails match regardless of case, as the users table does
function sameIdentifier(a: string, b: string): boolean {
  return a.toLowerCase() === b.toLowerCase();
}

export class InMemoryPrincipalRepository implements PrincipalRepository {
  private principals: Principal[] = [];

  constructor(private readonly now: () => number = Date.now) {}

  async create(principal: CreatePrincipalDTO): Promise<Principal> {
    const duplicate = this.principals.find(
      (p) => sameIdentifier(p.email, principal.email) || sameIdentifier(p.username, principal.username)
    );
    if (duplicate) {
      throw new Error('User with this email or username already exists');
    }

    const now = new Date(this.now());
    const created: Principal = {
      id: uuidv4(),
      email: principal.email,
      username: principal.username,
      first_name: principal.first_name,
      last_name: principal.last_name,
      department: principal.department ?? null,
      employee_id: principal.employee_id ?? null,
      password_hash: principal.password_hash,
      is_active: principal.is_active ?? true,
      last_login: null,
      password_changed_at: null,
      created_at: now,
      updated_at: now,
    };
    this.principals.push(created);
    return { ...created };
  }

  async findById(id: string): Promise<Principal | null> {
    const found = this.principals.find((p) => p.id === id);
    return found ? { ...found } : null;
  }

  async findByIdentifier(identifier: string): Promise<Principal | null> {
    const found = this.principals.find(
      (p) => sameIdentifier(p.username, identifier) || sameIdentifier(p.email, identifier)
    );
    return found ? { ...found } : null;
  }

  async updatePassword(id: string, passwordHash: string): Promise<boolean> {
    const found = this.principals.find((p) => p.id === id);
    if (!found) {
      return false;
    }
    const changedAt = new Date(this.now());
    found.password_hash = passwordHash;
    found.password_changed_at = changedAt;
    found.updated_at = changedAt;
    return true;
  }

  async touchLastLogin(id: string): Promise<void> {
    const found = this.principals.find((p) => p.id === id);
    if (found) {
      found.last_login = new Date(this.now());
    }
  }

  /**
   * Deactivation belongs to user management; exposed here for seeding and tests.
   */
  async setActive(id: string, isActive: boolean): Promise<void> {
    const found = this.principals.find((p) => p.id === id);
    if (found) {
      found.is_active = isActive;
      found.updated_at = new Date(this.now());
    }
  }
}
