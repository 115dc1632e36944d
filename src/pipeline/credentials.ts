import { decodeJwt, type JWTPayload } from 'jose';
import type { CallerIdentity } from './identity.js';

export type DecodeFailureReason =
  | 'MISSING_HEADER'
  | 'INVALID_HEADER_FORMAT'
  | 'EMPTY_TOKEN'
  | 'MALFORMED_TOKEN'
  | 'MISSING_SUBJECT';

export type DecodeResult =
  | { ok: true; identity: CallerIdentity; expired: boolean }
  | { ok: false; reason: DecodeFailureReason; error: string; expired: boolean };

export interface DecodeOptions {
  prefix?: string;
  /** Epoch milliseconds used for the expiry check */
  now?: number;
}

const KNOWN_CLAIMS = new Set([
  'sub',
  'preferred_username',
  'username',
  'email',
  'roles',
  'realm_access',
  'groups',
  'permissions',
  'scope',
  'typ',
  'token_type',
  'iat',
  'exp',
]);

function failure(reason: DecodeFailureReason, error: string, expired = false): DecodeResult {
  return { ok: false, reason, error, expired };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringClaim(value: unknown): string | null {
  return typeof value === 'string' && value !== '' ? value : null;
}

function numberClaim(value: unknown): number | null {
  return typeof value === 'number' && Number.isFinite(value) ? value : null;
}

/**
 * Arrays, comma or space separated strings, and single scalars all
 * count as list claims.
 */
export function listClaim(value: unknown): string[] {
  if (Array.isArray(value)) {
    return value.filter((item) => item !== null && item !== undefined).map((item) => String(item));
  }
  if (typeof value === 'string') {
    const separator = value.includes(',') ? ',' : ' ';
    return value
      .split(separator)
      .map((item) => item.trim())
      .filter((item) => item.length > 0);
  }
  if (value !== null && value !== undefined) {
    return [String(value)];
  }
  return [];
}

function rolesFrom(claims: JWTPayload): string[] {
  if ('roles' in claims) {
    return listClaim(claims.roles);
  }
  // Keycloak keeps realm roles one level down
  if (isRecord(claims.realm_access) && 'roles' in claims.realm_access) {
    return listClaim(claims.realm_access.roles);
  }
  if ('groups' in claims) {
    return listClaim(claims.groups);
  }
  return [];
}

function permissionsFrom(claims: JWTPayload): string[] {
  if ('permissions' in claims) {
    return listClaim(claims.permissions);
  }
  if ('scope' in claims) {
    return typeof claims.scope === 'string'
      ? claims.scope.split(/\s+/).filter((scope) => scope.length > 0)
      : listClaim(claims.scope);
  }
  return [];
}

export function identityFromClaims(claims: JWTPayload, subject: string): CallerIdentity {
  const extraClaims: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(claims)) {
    if (!KNOWN_CLAIMS.has(key)) {
      extraClaims[key] = value;
    }
  }

  return {
    subject,
    displayName: stringClaim(claims.preferred_username) ?? stringClaim(claims.username),
    email: stringClaim(claims.email),
    roles: new Set(rolesFrom(claims)),
    permissions: new Set(permissionsFrom(claims)),
    tokenType: stringClaim(claims.typ) ?? stringClaim(claims.token_type),
    issuedAt: numberClaim(claims.iat),
    expiresAt: numberClaim(claims.exp),
    extraClaims,
  };
}

/**
 * Decode the claims of a bearer credential without checking its signature.
 * Signature and expiry enforcement belong to the upstream gateway; an expired
 * token still decodes and is only flagged.
 */
export function decodeBearer(header: string | undefined, options: DecodeOptions = {}): DecodeResult {
  const prefix = options.prefix ?? 'Bearer ';
  const now = options.now ?? Date.now();

  if (header === undefined || header === '') {
    return failure('MISSING_HEADER', 'No authorization header found');
  }
  if (!header.startsWith(prefix)) {
    return failure('INVALID_HEADER_FORMAT', `Authorization header does not start with '${prefix}'`);
  }

  const token = header.slice(prefix.length).trim();
  if (token === '') {
    return failure('EMPTY_TOKEN', 'Empty token after removing prefix');
  }

  let claims: JWTPayload;
  try {
    claims = decodeJwt(token);
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown decode failure';
    return failure('MALFORMED_TOKEN', `Failed to decode token: ${message}`);
  }

  const expiresAt = numberClaim(claims.exp);
  const expired = expiresAt !== null && expiresAt * 1000 < now;

  const subject = stringClaim(claims.sub);
  if (subject === null) {
    return failure('MISSING_SUBJECT', 'Token has no subject claim', expired);
  }

  return { ok: true, identity: identityFromClaims(claims, subject), expired };
}
