import { describe, it, expect } from 'vitest';
import { PostgreSQLRoleRepository, parsePermissions } from './postgresql-role.repository';
import { RecordingDatabase } from '../testing/recording-database';

describe('PostgreSQLRoleRepository', () => {
  it('only loads active roles through active assignments', async () => {
    const db = new RecordingDatabase();
    const repository = new PostgreSQLRoleRepository(db);

    expect(await repository.findActiveRolesForPrincipal('principal-1')).toEqual([]);
    expect(db.statements).toHaveLength(1);
    expect(db.statements[0].sql).toContain('WHERE ur.users_id = $1 AND ur.is_active = TRUE AND r.is_active = TRUE');
    expect(db.statements[0].params).toEqual(['principal-1']);
  });
});

describe('parsePermissions', () => {
  it('keeps boolean flags from JSONB objects', () => {
    expect(parsePermissions({ approve_timesheet: true, read_users: false, level: 3 })).toEqual({
      approve_timesheet: true,
      read_users: false,
    });
  });

  it('parses JSON text columns', () => {
    expect(parsePermissions('{"approve_leave": true}')).toEqual({ approve_leave: true });
  });

  it('reads non-object values as no permissions', () => {
    expect(parsePermissions(null)).toEqual({});
    expect(parsePermissions(['approve_leave'])).toEqual({});
  });

  it('rejects corrupt JSON text', () => {
    expect(() => parsePermissions('{approve_leave')).toThrow('Failed to parse permissions JSON');
  });
});
