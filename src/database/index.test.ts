import { describe, it, expect, afterEach } from 'vitest';
import { usesPostgres, isDatabaseConnected } from '.';
import { env } from '../config/env';

describe('database selection', () => {
  const configured = env.DB_TYPE;

  afterEach(() => {
    env.DB_TYPE = configured;
  });

  it('follows the configured DB_TYPE', () => {
    env.DB_TYPE = 'postgres';
    expect(usesPostgres()).toBe(true);
    expect(isDatabaseConnected()).toBe(false);

    env.DB_TYPE = 'memory';
    expect(usesPostgres()).toBe(false);
    expect(isDatabaseConnected()).toBe(true);
  });
});
