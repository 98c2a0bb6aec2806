import { Principal, CreatePrincipalDTO } from '../models/user';

export interface PrincipalRepository {
  create(principal: CreatePrincipalDTO): Promise<Principal>;
  findById(id: string): Promise<Principal | null>;
  /**
   * Identifier-of-record lookup: matches either email or username, ignoring case.
   */
  findByIdentifier(identifier: string): Promise<Principal | null>;
  /**
   * Stores the new hash and stamps `password_changed_at`.
   */
  updatePassword(id: string, passwordHash: string): Promise<boolean>;
  touchLastLogin(id: string): Promise<void>;
}
