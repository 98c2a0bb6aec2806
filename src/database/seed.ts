import defaultRoles from './default-roles.json';
import { Repositories } from '../repositories';
import { PasswordHasher } from '../services/password-hasher.service';
import { Logger } from '../utils/logger';

export interface SeedOptions {
  adminPassword: string;
}

/**
 * Idempotent development seed: the default roles and an `admin` principal
 * holding the Admin role.
 */
export async function seedDefaultData(
  repositories: Repositories,
  hasher: PasswordHasher,
  options: SeedOptions
): Promise<void> {
  for (const role of defaultRoles) {
    const existing = await repositories.roles.findByName(role.name);
    if (!existing) {
      await repositories.roles.create(role);
      Logger.info('Seeded role', { role: role.name });
    }
  }

  const existingAdmin = await repositories.principals.findByIdentifier('admin');
  if (existingAdmin) {
    return;
  }

  const admin = await repositories.principals.create({
    email: 'admin@company.com',
    username: 'admin',
    first_name: 'System',
    last_name: 'Administrator',
    department: 'IT',
    employee_id: 'EMP001',
    password_hash: await hasher.hash(options.adminPassword),
  });

  const adminRole = await repositories.roles.findByName('Admin');
  if (adminRole) {
    await repositories.roles.assign(admin.id, adminRole.id);
  }
  Logger.info('Seeded admin principal', { principalId: admin.id });
}
