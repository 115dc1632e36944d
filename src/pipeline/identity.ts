import { Errors } from '../utils/errors.js';

/**
 * Best-effort, unverified description of the caller taken from bearer claims.
 * Claims the parser does not recognise are kept in extraClaims.
 */
export interface CallerIdentity {
  subject: string | null;
  displayName: string | null;
  email: string | null;
  roles: ReadonlySet<string>;
  permissions: ReadonlySet<string>;
  tokenType: string | null;
  issuedAt: number | null;
  expiresAt: number | null;
  extraClaims: Readonly<Record<string, unknown>>;
}

export function emptyIdentity(): CallerIdentity {
  return {
    subject: null,
    displayName: null,
    email: null,
    roles: new Set(),
    permissions: new Set(),
    tokenType: null,
    issuedAt: null,
    expiresAt: null,
    extraClaims: {},
  };
}

export function isAuthenticated(identity: CallerIdentity): boolean {
  return identity.subject !== null && identity.subject !== '';
}

export function hasRole(identity: CallerIdentity, role: string): boolean {
  return identity.roles.has(role);
}

export function hasPermission(identity: CallerIdentity, permission: string): boolean {
  return identity.permissions.has(permission);
}

export function hasAnyRole(identity: CallerIdentity, roles: string[]): boolean {
  return roles.some((role) => identity.roles.has(role));
}

export function hasAllRoles(identity: CallerIdentity, roles: string[]): boolean {
  return roles.every((role) => identity.roles.has(role));
}

export function requireAuthentication(identity: CallerIdentity): CallerIdentity {
  if (!isAuthenticated(identity)) {
    throw Errors.unauthorized();
  }
  return identity;
}

export function requireRole(identity: CallerIdentity, role: string): CallerIdentity {
  requireAuthentication(identity);
  if (!hasRole(identity, role)) {
    throw Errors.forbidden(`Role '${role}' required`);
  }
  return identity;
}

export function requirePermission(identity: CallerIdentity, permission: string): CallerIdentity {
  requireAuthentication(identity);
  if (!hasPermission(identity, permission)) {
    throw Errors.forbidden(`Permission '${permission}' required`);
  }
  return identity;
}

/**
 * JSON-friendly view, used by the demo /api/me route
 */
export function toIdentityResponse(identity: CallerIdentity) {
  return {
    subject: identity.subject,
    displayName: identity.displayName,
    email: identity.email,
    roles: [...identity.roles],
    permissions: [...identity.permissions],
    authenticated: isAuthenticated(identity),
  };
}
