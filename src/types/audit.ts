// =============================================================================
// BASTION — Audit Event Types
// =============================================================================

export const AUDIT_EVENT_TYPES = [
  'user_query',
  'risk_check',
  'policy_decision',
  'tool_call',
  'account_access',
  'transaction_query',
  'access_granted',
  'access_denied',
  'safety_block',
  'escalation_created',
  'escalation_resolved',
  'auth_success',
  'auth_failure',
  'config_change',
] as const;

export type AuditEventType = (typeof AUDIT_EVENT_TYPES)[number];

export type AuditDetails = Record<string, unknown>;

/** What callers pass to AuditTrail.record */
export interface AuditEventInput {
  eventType: AuditEventType;
  userId: string;
  action: string;
  success?: boolean;
  details?: AuditDetails;
  error?: string;
}

/** A stored audit event. Append-only. */
export interface AuditEvent {
  id: string;
  timestamp: Date;
  eventType: AuditEventType;
  userId: string;
  action: string;
  success: boolean;
  details: AuditDetails;
  error: string | null;
  /** SHA-512 over the canonical event, for integrity checks */
  eventHash: string;
}

export interface AuditQuery {
  eventType?: AuditEventType;
  userId?: string;
  limit?: number;
}
