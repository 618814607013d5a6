// =============================================================================
// BASTION — Error Taxonomy
//
//   AccessDenied       principal lacks a permission (always audited)
//   InvalidRole        role value outside the closed enumeration
//   InvalidInput       malformed request, draft or risk analysis
//   StorageUnavailable ledger / audit sink unreachable; never dropped
//                      (UnauditedWriteError: the write landed, its audit
//                      event did not)
//   ScorerUnavailable  risk scoring failed or timed out
// =============================================================================

import type { Permission, Role } from './types/roles';

export type ErrorKind =
  | 'AccessDenied'
  | 'InvalidRole'
  | 'InvalidInput'
  | 'StorageUnavailable'
  | 'ScorerUnavailable';

export abstract class GovernanceError extends Error {
  abstract readonly kind: ErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class AccessDeniedError extends GovernanceError {
  readonly kind = 'AccessDenied' as const;

  constructor(
    readonly principalId: string,
    readonly role: Role,
    readonly missing: readonly Permission[],
    message?: string,
  ) {
    super(
      message ??
        `User ${principalId} (role: ${role}) does not have permission: ${missing.join(' or ')}`,
    );
  }
}

export class InvalidRoleError extends GovernanceError {
  readonly kind = 'InvalidRole' as const;

  constructor(readonly value: unknown) {
    super(`Unknown role: ${String(value)}`);
  }
}

export class InvalidInputError extends GovernanceError {
  readonly kind = 'InvalidInput' as const;

  constructor(message: string, readonly issues: string[] = []) {
    super(message);
  }
}

export class StorageUnavailableError extends GovernanceError {
  readonly kind = 'StorageUnavailable' as const;

  constructor(readonly operation: string, cause?: unknown) {
    super(`Storage unavailable during ${operation}: ${describeError(cause)}`, { cause });
  }
}

/**
 * A ledger or banking write was stored but its audit event was not.
 * The write stands; `reference` names what was written (ticket id,
 * transaction id) so callers can still report it.
 */
export class UnauditedWriteError extends StorageUnavailableError {
  constructor(operation: string, readonly reference: string, cause?: unknown) {
    super(operation, cause);
  }
}

export class ScorerUnavailableError extends GovernanceError {
  readonly kind = 'ScorerUnavailable' as const;

  constructor(message: string, cause?: unknown) {
    super(message, { cause });
  }
}

export function isGovernanceError(err: unknown): err is GovernanceError {
  return err instanceof GovernanceError;
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (err === undefined) return 'unknown error';
  return String(err);
}
