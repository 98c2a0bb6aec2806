import { Algorithm } from 'jsonwebtoken';

function durationToSeconds(raw: string): number | null {
  const value = raw.trim().toLowerCase();

  const numMatch = value.match(/^(\d+)$/);
  if (numMatch) {
    return parseInt(numMatch[1], 10);
  }

  const unitMatch = value.match(/^(\d+)([smhd])$/);
  if (unitMatch) {
    const multipliers: Record<string, number> = {
      s: 1,
      m: 60,
      h: 3600,
      d: 86400,
    };
    return parseInt(unitMatch[1], 10) * multipliers[unitMatch[2]];
  }

  return null;
}

/**
 * Parse time string with optional unit suffix to seconds
 * Examples: "15m" -> 900, "1h" -> 3600, "900" -> 900, "7d" -> 604800
 * Unreadable values and values below `minimum` fall back to the default.
 */
export function parseTimeToSeconds(value: string | undefined, defaultValue: string, minimum: number = 1): number {
  const parsed = value ? durationToSeconds(value) : null;
  if (parsed !== null && parsed >= minimum) {
    return parsed;
  }

  const fallback = durationToSeconds(defaultValue);
  if (fallback === null) {
    throw new Error(`Invalid default duration: ${defaultValue}`);
  }
  return fallback;
}

// Non-positive and unreadable values fall back to the default
export function parseInteger(value: string | undefined, defaultValue: number): number {
  const parsed = value === undefined ? NaN : parseInt(value, 10);
  return Number.isNaN(parsed) || parsed <= 0 ? defaultValue : parsed;
}

const SUPPORTED_ALGORITHMS: readonly Algorithm[] = ['HS256', 'HS384', 'HS512'];

function parseAlgorithm(value: string | undefined): Algorithm {
  const match = SUPPORTED_ALGORITHMS.find((alg) => alg === value);
  return match ?? 'HS256';
}

/**
 * Process-wide authentication settings. Loaded once at startup and passed
 * into the services that need them.
 */
export interface AuthConfig {
  readonly jwtSecret: string;
  readonly jwtAlgorithm: Algorithm;
  // seconds
  readonly accessTokenTtl: number;
  // seconds
  readonly refreshTokenTtl: number;
  // seconds of tolerated clock drift on expiry checks
  readonly clockLeewaySeconds: number;
  readonly refreshTokenPepper: string;
  readonly argon2TimeCost: number;
  // KiB
  readonly argon2MemoryCost: number;
  readonly persistenceTimeoutMs: number;
  readonly cleanupIntervalMs: number;
}

export const DEFAULT_CLOCK_LEEWAY_SECONDS = 30;

export function loadAuthConfig(source: NodeJS.ProcessEnv = process.env): AuthConfig {
  const jwtSecret = source.JWT_SECRET_KEY || 'change-me-access-secret';
  if (source.NODE_ENV === 'production' && !source.JWT_SECRET_KEY) {
    throw new Error('JWT_SECRET_KEY must be set in production');
  }

  return Object.freeze({
    jwtSecret,
    jwtAlgorithm: parseAlgorithm(source.JWT_ALGORITHM),
    accessTokenTtl: parseTimeToSeconds(source.ACCESS_TOKEN_TTL, '30m'),
    refreshTokenTtl: parseTimeToSeconds(source.REFRESH_TOKEN_TTL, '7d'),
    clockLeewaySeconds: parseTimeToSeconds(source.TOKEN_CLOCK_LEEWAY, String(DEFAULT_CLOCK_LEEWAY_SECONDS), 0),
    refreshTokenPepper: source.REFRESH_TOKEN_PEPPER || jwtSecret,
    argon2TimeCost: parseInteger(source.ARGON2_TIME_COST, 3),
    argon2MemoryCost: parseInteger(source.ARGON2_MEMORY_COST, 19456),
    persistenceTimeoutMs: parseInteger(source.PERSISTENCE_TIMEOUT_MS, 5000),
    cleanupIntervalMs: parseTimeToSeconds(source.REFRESH_TOKEN_CLEANUP_INTERVAL, '1h') * 1000,
  });
}

export const env = {
  PORT: parseInteger(process.env.PORT, 3000),
  API_PREFIX: process.env.API_V1_PREFIX || '/api/v1',
  CORS_ORIGINS: (process.env.CORS_ORIGINS || '*').split(',').map((origin) => origin.trim()),
  DB_TYPE: process.env.DB_TYPE || 'memory',
  NODE_ENV: process.env.NODE_ENV || 'development',
  SEED_DEMO_DATA: process.env.SEED_DEMO_DATA !== 'false',
};
