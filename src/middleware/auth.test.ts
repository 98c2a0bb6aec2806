import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import express from 'express';
import { requireAuth, requirePermission, requireAnyPermission } from './auth';
import {
  RunningServer,
  TestContext,
  addPrincipal,
  createSeededContext,
  startTestServer,
} from '../testing/fixtures';

describe('permission guards', () => {
  let context: TestContext;
  let server: RunningServer;

  beforeEach(async () => {
    context = await createSeededContext();
    const { session } = context.services;
    const app = express();
    const reply = (req: express.Request, res: express.Response): void => {
      res.json({ username: req.principal?.username });
    };

    app.get('/approvals', requireAuth(session), requirePermission(session, 'approve_timesheet'), reply);
    app.get(
      '/approvals-and-proxy-entry',
      requireAuth(session),
      requirePermission(session, 'approve_timesheet', 'create_timesheet_others'),
      reply
    );
    app.get(
      '/leave-desk',
      requireAuth(session),
      requireAnyPermission(session, 'approve_leave', 'create_leave_others'),
      reply
    );
    server = await startTestServer(app);
  });

  afterEach(async () => {
    await server.close();
  });

  async function tokenFor(username: string, password: string): Promise<string> {
    const result = await context.services.session.login(username, password);
    if (!result.ok) {
      throw new Error(`login failed for ${username}`);
    }
    return result.value.accessToken;
  }

  function get(path: string, accessToken: string): Promise<Response> {
    return fetch(`${server.baseUrl}${path}`, { headers: { Authorization: `Bearer ${accessToken}` } });
  }

  it('lets a principal with the permission through', async () => {
    const response = await get('/approvals', await tokenFor('admin', 'admin123'));

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({ username: 'admin' });
  });

  it('forbids a principal lacking the permission', async () => {
    await addPrincipal(context, 'jdoe', 'employee-pass', ['Employee']);

    const response = await get('/approvals', await tokenFor('jdoe', 'employee-pass'));

    expect(response.status).toBe(403);
    expect(await response.json()).toEqual({ error: 'Insufficient permissions', code: 'FORBIDDEN' });
  });

  it('requires every listed permission', async () => {
    const response = await get('/approvals-and-proxy-entry', await tokenFor('admin', 'admin123'));

    expect(response.status).toBe(403);
  });

  it('accepts any one of the alternatives', async () => {
    await addPrincipal(context, 'pm', 'manager-pass', ['Manager']);
    await addPrincipal(context, 'jdoe', 'employee-pass', ['Employee']);

    expect((await get('/leave-desk', await tokenFor('pm', 'manager-pass'))).status).toBe(200);
    expect((await get('/leave-desk', await tokenFor('jdoe', 'employee-pass'))).status).toBe(403);
  });

  it('rejects requests without a valid token before checking permissions', async () => {
    const response = await get('/approvals', 'not-a-token');

    expect(response.status).toBe(401);
  });
});
