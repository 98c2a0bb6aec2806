import { describe, it, expect } from 'vitest';
import { TokenCodec } from './token-codec.service';
import { AuthErrorCode } from '../utils/errors';
import { TestClock, TEST_START_MS, testConfig } from '../testing/fixtures';

const ISSUED_AT = Math.floor(TEST_START_MS / 1000);

describe('TokenCodec', () => {
  it('issues access tokens carrying subject, kind and lifetime', () => {
    const clock = new TestClock();
    const codec = new TokenCodec(testConfig, clock.now);

    const token = codec.issue('principal-1', 'access', 1800);
    const result = codec.verify(token, 'access');

    expect(result).toEqual({
      ok: true,
      value: { sub: 'principal-1', kind: 'access', iat: ISSUED_AT, exp: ISSUED_AT + 1800 },
    });
  });

  it('accepts a token one second before expiry', () => {
    const clock = new TestClock();
    const codec = new TokenCodec(testConfig, clock.now);
    const token = codec.issue('principal-1', 'access', 1800);

    clock.advanceSeconds(1799);

    expect(codec.verify(token, 'access').ok).toBe(true);
  });

  it('tolerates clock drift up to the configured leeway', () => {
    const clock = new TestClock();
    const codec = new TokenCodec(testConfig, clock.now);
    const token = codec.issue('principal-1', 'access', 1800);

    clock.advanceSeconds(1829);

    expect(codec.verify(token, 'access').ok).toBe(true);
  });

  it('rejects a token once lifetime plus leeway has elapsed', () => {
    const clock = new TestClock();
    const codec = new TokenCodec(testConfig, clock.now);
    const token = codec.issue('principal-1', 'access', 1800);

    clock.advanceSeconds(1830);

    const result = codec.verify(token, 'access');
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe(AuthErrorCode.TOKEN_INVALID);
    }
  });

  it('rejects a token of the wrong kind', () => {
    const codec = new TokenCodec(testConfig, new TestClock().now);
    const token = codec.issue('principal-1', 'refresh', 1800);

    expect(codec.verify(token, 'access')).toEqual({
      ok: false,
      error: { code: AuthErrorCode.TOKEN_INVALID, message: 'Could not validate credentials' },
    });
  });

  it('rejects a token signed with another key', () => {
    const clock = new TestClock();
    const issuer = new TokenCodec({ ...testConfig, jwtSecret: 'other-test-secret' }, clock.now);
    const codec = new TokenCodec(testConfig, clock.now);

    expect(codec.verify(issuer.issue('principal-1', 'access', 1800), 'access').ok).toBe(false);
  });

  it('rejects a token signed with an algorithm outside the allow-list', () => {
    const clock = new TestClock();
    const issuer = new TokenCodec({ ...testConfig, jwtAlgorithm: 'HS512' }, clock.now);
    const codec = new TokenCodec(testConfig, clock.now);

    expect(codec.verify(issuer.issue('principal-1', 'access', 1800), 'access').ok).toBe(false);
  });

  it('rejects malformed and tampered tokens', () => {
    const codec = new TokenCodec(testConfig, new TestClock().now);
    const token = codec.issue('principal-1', 'access', 1800);
    const [header, , signature] = token.split('.');
    const forgedPayload = Buffer.from(
      JSON.stringify({ sub: 'principal-2', kind: 'access', iat: ISSUED_AT, exp: ISSUED_AT + 1800 })
    ).toString('base64url');

    expect(codec.verify('not-a-token', 'access').ok).toBe(false);
    expect(codec.verify(`${header}.${forgedPayload}.${signature}`, 'access').ok).toBe(false);
  });
});
