import { describe, it, expect } from 'vitest';
import { decodeBearer, identityFromClaims, listClaim } from '../../src/pipeline/credentials.js';
import { makeToken } from '../utils/capture.js';

const NOW = Date.UTC(2024, 0, 1);
const NOW_SECONDS = NOW / 1000;

describe('decodeBearer', () => {
  describe('header checks', () => {
    it('should report a missing header', () => {
      expect(decodeBearer(undefined)).toEqual({
        ok: false,
        reason: 'MISSING_HEADER',
        error: 'No authorization header found',
        expired: false,
      });
      expect(decodeBearer('')).toMatchObject({ ok: false, reason: 'MISSING_HEADER' });
    });

    it('should reject a header without the prefix', () => {
      expect(decodeBearer('Basic dXNlcjpwYXNz')).toEqual({
        ok: false,
        reason: 'INVALID_HEADER_FORMAT',
        error: "Authorization header does not start with 'Bearer '",
        expired: false,
      });
    });

    it('should reject an empty token after the prefix', () => {
      expect(decodeBearer('Bearer    ')).toEqual({
        ok: false,
        reason: 'EMPTY_TOKEN',
        error: 'Empty token after removing prefix',
        expired: false,
      });
    });

    it('should honour a custom prefix', () => {
      const token = makeToken({ sub: 'user123' });

      expect(decodeBearer(`Token ${token}`, { prefix: 'Token ' })).toMatchObject({ ok: true });
      expect(decodeBearer(`Bearer ${token}`, { prefix: 'Token ' })).toMatchObject({
        ok: false,
        reason: 'INVALID_HEADER_FORMAT',
        error: "Authorization header does not start with 'Token '",
      });
    });
  });

  describe('token decoding', () => {
    it('should decode claims without checking the signature', () => {
      const token = makeToken({
        sub: 'user123',
        preferred_username: 'alice',
        email: 'alice@example.com',
        roles: ['admin', 'editor'],
        scope: 'read:users write:users',
        typ: 'Bearer',
        iat: NOW_SECONDS - 60,
        exp: NOW_SECONDS + 3600,
        tenant: 'acme',
      });

      const result = decodeBearer(`Bearer ${token}`, { now: NOW });

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.expired).toBe(false);
      expect(result.identity.subject).toBe('user123');
      expect(result.identity.displayName).toBe('alice');
      expect(result.identity.email).toBe('alice@example.com');
      expect([...result.identity.roles]).toEqual(['admin', 'editor']);
      expect([...result.identity.permissions]).toEqual(['read:users', 'write:users']);
      expect(result.identity.tokenType).toBe('Bearer');
      expect(result.identity.issuedAt).toBe(NOW_SECONDS - 60);
      expect(result.identity.expiresAt).toBe(NOW_SECONDS + 3600);
      expect(result.identity.extraClaims).toEqual({ tenant: 'acme' });
    });

    it('should report a token that is not a JWT', () => {
      expect(decodeBearer('Bearer not.a-jwt')).toEqual({
        ok: false,
        reason: 'MALFORMED_TOKEN',
        error: 'Failed to decode token: Invalid JWT',
        expired: false,
      });
    });

    it('should report a payload that is not JSON', () => {
      const result = decodeBearer('Bearer aGVhZGVy.bm90LWpzb24.c2ln');

      expect(result).toMatchObject({ ok: false, reason: 'MALFORMED_TOKEN' });
      if (result.ok) return;
      expect(result.error.startsWith('Failed to decode token: ')).toBe(true);
    });

    it('should require a subject claim', () => {
      const token = makeToken({ email: 'alice@example.com' });

      expect(decodeBearer(`Bearer ${token}`)).toEqual({
        ok: false,
        reason: 'MISSING_SUBJECT',
        error: 'Token has no subject claim',
        expired: false,
      });
    });

    it('should not accept a non-string subject', () => {
      const token = makeToken({ sub: 42 });

      expect(decodeBearer(`Bearer ${token}`)).toMatchObject({ ok: false, reason: 'MISSING_SUBJECT' });
    });
  });

  describe('expiry', () => {
    it('should decode an expired token and flag it', () => {
      const token = makeToken({ sub: 'user123', exp: NOW_SECONDS - 1 });

      const result = decodeBearer(`Bearer ${token}`, { now: NOW });

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.expired).toBe(true);
      expect(result.identity.subject).toBe('user123');
    });

    it('should not treat exp equal to now as expired', () => {
      const token = makeToken({ sub: 'user123', exp: NOW_SECONDS });

      expect(decodeBearer(`Bearer ${token}`, { now: NOW })).toMatchObject({ ok: true, expired: false });
    });

    it('should flag expiry on a token without subject', () => {
      const token = makeToken({ exp: NOW_SECONDS - 10 });

      expect(decodeBearer(`Bearer ${token}`, { now: NOW })).toEqual({
        ok: false,
        reason: 'MISSING_SUBJECT',
        error: 'Token has no subject claim',
        expired: true,
      });
    });
  });
});

describe('identityFromClaims', () => {
  it('should read roles from realm_access when there is no roles claim', () => {
    const identity = identityFromClaims(
      { sub: 'user123', realm_access: { roles: ['viewer'] } },
      'user123'
    );

    expect([...identity.roles]).toEqual(['viewer']);
    expect(identity.extraClaims).toEqual({});
  });

  it('should fall back to groups for roles', () => {
    const identity = identityFromClaims({ sub: 'user123', groups: 'ops,billing' }, 'user123');

    expect([...identity.roles]).toEqual(['ops', 'billing']);
    expect(identity.extraClaims).toEqual({});
  });

  it('should prefer permissions over scope', () => {
    const identity = identityFromClaims(
      { sub: 'user123', permissions: ['users:read'], scope: 'openid profile' },
      'user123'
    );

    expect([...identity.permissions]).toEqual(['users:read']);
  });

  it('should use username when preferred_username is absent', () => {
    const identity = identityFromClaims({ sub: 'user123', username: 'bob', token_type: 'access' }, 'user123');

    expect(identity.displayName).toBe('bob');
    expect(identity.tokenType).toBe('access');
    expect(identity.email).toBeNull();
    expect(identity.issuedAt).toBeNull();
  });
});

describe('listClaim', () => {
  it('should keep array items as strings and drop nulls', () => {
    expect(listClaim(['admin', null, 7])).toEqual(['admin', '7']);
  });

  it('should split comma separated strings', () => {
    expect(listClaim('admin, editor ,')).toEqual(['admin', 'editor']);
  });

  it('should split space separated strings', () => {
    expect(listClaim('admin editor')).toEqual(['admin', 'editor']);
  });

  it('should wrap a single scalar', () => {
    expect(listClaim(true)).toEqual(['true']);
  });

  it('should return nothing for null', () => {
    expect(listClaim(null)).toEqual([]);
    expect(listClaim(undefined)).toEqual([]);
  });
});
