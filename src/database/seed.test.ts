import { describe, it, expect } from 'vitest';
import { seedDefaultData } from './seed';
import { createInMemoryRepositories } from '../repositories';
import { PasswordHasher } from '../services/password-hasher.service';
import { testConfig } from '../testing/fixtures';

describe('seedDefaultData', () => {
  it('creates the default roles and an admin holding the Admin role', async () => {
    const repositories = createInMemoryRepositories();
    const hasher = new PasswordHasher(testConfig);

    await seedDefaultData(repositories, hasher, { adminPassword: 'admin123' });

    const admin = await repositories.principals.findByIdentifier('admin');
    expect(admin?.email).toBe('admin@company.com');
    expect(admin?.employee_id).toBe('EMP001');
    expect(await hasher.verify('admin123', admin?.password_hash ?? '')).toBe(true);

    const roles = await repositories.roles.findActiveRolesForPrincipal(admin?.id ?? '');
    expect(roles.map((role) => role.name)).toEqual(['Admin']);
    expect(roles[0].permissions.approve_timesheet).toBe(true);
    expect(await repositories.roles.findByName('Manager')).not.toBeNull();
    expect((await repositories.roles.findByName('Employee'))?.permissions).toEqual({
      create_timesheet_others: false,
      create_leave_others: false,
    });
  });

  it('can run again without duplicating anything', async () => {
    const repositories = createInMemoryRepositories();
    const hasher = new PasswordHasher(testConfig);

    await seedDefaultData(repositories, hasher, { adminPassword: 'admin123' });
    await seedDefaultData(repositories, hasher, { adminPassword: 'other-password' });

    const admin = await repositories.principals.findByIdentifier('admin');
    expect(await hasher.verify('admin123', admin?.password_hash ?? '')).toBe(true);
  });
});
