// =============================================================================
// BASTION — Permission Model
//
// Pure lookups over ROLE_PERMISSIONS. No defaults, no inference from role
// names: an unknown role is an error everywhere except parseRole, which is
// the input boundary.
// =============================================================================

import { InvalidRoleError } from '../errors';
import { Permission, Role, ROLE_PERMISSIONS, isRole } from '../types/roles';

/**
 * Get the permission set for a role. Returns a fresh set on every call so
 * callers cannot mutate the table through it.
 */
export function getPermissions(role: Role): ReadonlySet<Permission> {
  if (!isRole(role)) {
    throw new InvalidRoleError(role);
  }
  return new Set(ROLE_PERMISSIONS[role]);
}

export function hasPermission(role: Role, permission: Permission): boolean {
  return getPermissions(role).has(permission);
}

/**
 * Parse a role string from a token, session or config value.
 *
 * Unrecognised or missing values fall back to 'user' (least privilege).
 * The fallback is reported through `onFallback` so the caller can log it.
 */
export function parseRole(
  raw: string | null | undefined,
  onFallback?: (raw: string | null | undefined) => void,
): Role {
  const normalized = (raw ?? '').trim().toLowerCase();
  if (isRole(normalized)) {
    return normalized;
  }
  onFallback?.(raw);
  return 'user';
}
