import { once } from 'events';
import { Server } from 'http';
import { Express } from 'express';
import { AuthConfig } from '../config/env';
import { createInMemoryRepositories, InMemoryRepositories } from '../repositories';
import { createAuthServices, AuthServices } from '../services';
import { seedDefaultData } from '../database/seed';

export const TEST_START_MS = Date.UTC(2024, 0, 15, 9, 0, 0);

export const testConfig: AuthConfig = {
  jwtSecret: 'test-secret',
  jwtAlgorithm: 'HS256',
  accessTokenTtl: 1800,
  refreshTokenTtl: 7 * 24 * 3600,
  clockLeewaySeconds: 30,
  refreshTokenPepper: 'test-pepper',
  argon2TimeCost: 2,
  argon2MemoryCost: 4096,
  persistenceTimeoutMs: 1000,
  cleanupIntervalMs: 3600 * 1000,
};

/**
 * Manually advanced clock shared by token issuance and expiry checks.
 */
export class TestClock {
  private current: number;

  constructor(startMs: number = TEST_START_MS) {
    this.current = startMs;
  }

  readonly now = (): number => this.current;

  advanceSeconds(seconds: number): void {
    this.current += seconds * 1000;
  }
}

export interface TestContext {
  clock: TestClock;
  repositories: InMemoryRepositories;
  services: AuthServices;
}

/**
 * In-memory services seeded with the default roles and `admin` / `admin123`.
 */
export async function createSeededContext(clock: TestClock = new TestClock()): Promise<TestContext> {
  const repositories = createInMemoryRepositories(clock.now);
  const services = createAuthServices(testConfig, repositories, clock.now);
  await seedDefaultData(repositories, services.hasher, { adminPassword: 'admin123' });
  return { clock, repositories, services };
}

/**
 * Adds an active principal holding the named roles and returns its id.
 */
export async function addPrincipal(
  context: TestContext,
  username: string,
  password: string,
  roleNames: string[] = []
): Promise<string> {
  const principal = await context.repositories.principals.create({
    email: `${username}@company.com`,
    username,
    first_name: username,
    last_name: 'Tester',
    password_hash: await context.services.hasher.hash(password),
  });
  for (const name of roleNames) {
    const role = await context.repositories.roles.findByName(name);
    if (!role) {
      throw new Error(`Unknown role ${name}`);
    }
    await context.repositories.roles.assign(principal.id, role.id);
  }
  return principal.id;
}

export interface RunningServer {
  baseUrl: string;
  close(): Promise<void>;
}

export async function startTestServer(app: Express): Promise<RunningServer> {
  const server: Server = app.listen(0, '127.0.0.1');
  await once(server, 'listening');
  const address = server.address();
  if (!address || typeof address === 'string') {
    throw new Error('Server did not bind to a TCP port');
  }

  return {
    baseUrl: `http://127.0.0.1:${address.port}`,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.close((error) => (error ? reject(error) : resolve()));
        server.closeAllConnections();
      }),
  };
}

export function readField(body: unknown, key: string): unknown {
  if (typeof body !== 'object' || body === null) {
    throw new Error(`Expected an object body, got ${JSON.stringify(body)}`);
  }
  const record: Record<string, unknown> = Object.fromEntries(Object.entries(body));
  return record[key];
}

export function readString(body: unknown, key: string): string {
  const value = readField(body, key);
  if (typeof value !== 'string') {
    throw new Error(`Expected string field ${key}, got ${JSON.stringify(value)}`);
  }
  return value;
}
