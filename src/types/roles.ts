// =============================================================================
// BASTION — Role & Permission Definitions
//
// Four roles, one closed permission set. Roles are unordered: nothing in the
// codebase may infer "admin > staff > user" from position. Every question of
// the form "can this principal do X" goes through ROLE_PERMISSIONS.
// =============================================================================

/** All roles in the system */
export const ROLES = ['user', 'staff', 'admin', 'system'] as const;

export type Role = (typeof ROLES)[number];

/** Atomic capability tokens. Closed set. */
export const PERMISSIONS = [
  // Agent interaction
  'use_agent',

  // Escalation queue
  'view_own_escalations',
  'view_all_escalations',
  'resolve_escalations',

  // Banking
  'view_accounts',
  'view_all_accounts',
  'view_transactions',
  'transfer_funds',

  // Configuration
  'view_config',
  'modify_config',

  // Administration
  'view_logs',
  'manage_users',
] as const;

export type Permission = (typeof PERMISSIONS)[number];

const USER_PERMISSIONS: readonly Permission[] = [
  'use_agent',
  'view_own_escalations',
  'view_accounts',
  'view_transactions',
  'transfer_funds',
];

// Staff read the queue and other customers' accounts but cannot resolve
// tickets. Granting resolve_escalations to staff is a policy change that
// needs sign-off, not a code default.
const STAFF_PERMISSIONS: readonly Permission[] = [
  ...USER_PERMISSIONS,
  'view_all_escalations',
  'view_all_accounts',
  'view_config',
  'view_logs',
];

const ADMIN_PERMISSIONS: readonly Permission[] = [
  ...STAFF_PERMISSIONS,
  'resolve_escalations',
  'modify_config',
  'manage_users',
];

/**
 * Static mapping of roles to permissions.
 *
 * Typed as a Record over the role union so adding a role fails to compile
 * until it is mapped here.
 */
export const ROLE_PERMISSIONS: Readonly<Record<Role, readonly Permission[]>> = {
  user: USER_PERMISSIONS,
  staff: STAFF_PERMISSIONS,
  admin: ADMIN_PERMISSIONS,
  system: PERMISSIONS,
};

/** Human-readable role summaries, surfaced by /api/auth/me */
export const ROLE_DESCRIPTIONS: Readonly<Record<Role, string>> = {
  user: 'Customer: own accounts, own transfers, own escalations',
  staff: 'Support staff: read access to the escalation queue, customer accounts and logs',
  admin: 'Administrator: staff access plus ticket resolution and configuration',
  system: 'Internal system principal: every permission',
};

export function isRole(value: unknown): value is Role {
  return typeof value === 'string' && (ROLES as readonly string[]).includes(value);
}
