// =============================================================================
// BASTION — Access Control Gate
//
// Answers permission questions for a principal. Does not log: callers audit
// both grants and denials, which keeps this module pure.
// =============================================================================

import { AccessDeniedError } from '../errors';
import { Principal } from '../types/auth';
import { Permission } from '../types/roles';
import { hasPermission } from './permissions';

/**
 * Check a single permission. With raiseOnDeny (the default) a denial
 * throws AccessDeniedError carrying the principal and missing permission.
 */
export function checkPermission(
  principal: Principal,
  permission: Permission,
  raiseOnDeny = true,
): boolean {
  return checkAnyPermission(principal, [permission], raiseOnDeny);
}

/**
 * OR semantics: granted if the principal holds at least one of the
 * permissions, each of which independently justifies access.
 */
export function checkAnyPermission(
  principal: Principal,
  permissions: readonly Permission[],
  raiseOnDeny = true,
): boolean {
  const granted = permissions.some((p) => hasPermission(principal.role, p));
  if (!granted && raiseOnDeny) {
    throw new AccessDeniedError(principal.id, principal.role, permissions);
  }
  return granted;
}

/**
 * Row-level rule for escalation tickets. Own tickets need
 * view_own_escalations; anyone else's (or an unspecified target) needs
 * view_all_escalations, which also covers one's own.
 */
export function canViewEscalations(principal: Principal, targetUserId?: string): boolean {
  if (hasPermission(principal.role, 'view_all_escalations')) {
    return true;
  }
  return targetUserId === principal.id && hasPermission(principal.role, 'view_own_escalations');
}

export function canResolveEscalations(principal: Principal): boolean {
  return hasPermission(principal.role, 'resolve_escalations');
}

/**
 * Visibility of another user's accounts. This is read access only; moving
 * funds has its own ownership rule in the transfer tool.
 */
export function canViewAccountsOf(principal: Principal, ownerId: string): boolean {
  if (hasPermission(principal.role, 'view_all_accounts')) {
    return true;
  }
  return ownerId === principal.id && hasPermission(principal.role, 'view_accounts');
}
