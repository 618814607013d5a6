// =============================================================================
// BASTION — Audit Trail
//
// Append-only record of every decision point: risk checks, policy decisions,
// tool calls, access denials, escalation create/resolve, logins.
// The database trigger on audit_events rejects UPDATE and DELETE.
//
// A write that cannot be stored raises StorageUnavailableError. Audit
// writes are never dropped on the floor.
// =============================================================================

import { createHash } from 'crypto';
import { Pool } from 'pg';
import { v4 as uuidv4 } from 'uuid';
import { StorageUnavailableError } from '../errors';
import {
  AuditDetails,
  AuditEvent,
  AuditEventInput,
  AuditEventType,
  AuditQuery,
  AUDIT_EVENT_TYPES,
} from '../types/audit';

export const MAX_AUDIT_QUERY_LIMIT = 200;
const DEFAULT_AUDIT_QUERY_LIMIT = 10;
const MAX_DETAIL_TEXT = 200;

/** Detail keys allowed more than MAX_DETAIL_TEXT characters */
const LONG_DETAIL_TEXT: ReadonlyMap<string, number> = new Map([['full_response', 2000]]);

/**
 * Compliance controls cited in audit details: PCI-DSS requirements under
 * `requirement`, SOC2 criteria under `control`.
 */
export const CONTROLS = {
  dataAccess: 'PCI-DSS 10.2',
  privilegedAction: 'PCI-DSS 10.2.2',
  authentication: 'PCI-DSS 10.2.4',
  accessControl: 'SOC2 CC6.1',
  incidentResponse: 'SOC2 CC7.3',
} as const;

/** Append-only writer plus a read path for log review */
export interface AuditSink {
  append(event: AuditEvent): Promise<void>;
  query(filter: AuditQuery & { limit: number }): Promise<AuditEvent[]>;
}

export class AuditTrail {
  constructor(
    private readonly sink: AuditSink,
    private readonly clock: () => Date = () => new Date(),
  ) {}

  /**
   * Record an audit event. Returns the stored event (with id and hash).
   */
  async record(input: AuditEventInput): Promise<AuditEvent> {
    const event: AuditEvent = {
      id: uuidv4(),
      timestamp: this.clock(),
      eventType: input.eventType,
      userId: input.userId,
      action: input.action,
      success: input.success ?? true,
      details: truncateDetails(input.details ?? {}),
      error: input.error ?? null,
      eventHash: '',
    };
    event.eventHash = hashEvent(event);

    try {
      await this.sink.append(event);
    } catch (err) {
      throw new StorageUnavailableError(`audit:${input.action}`, err);
    }
    return event;
  }

  /**
   * Most recent events first. Limit defaults to 10 and is capped at 200.
   */
  async query(filter: AuditQuery = {}): Promise<AuditEvent[]> {
    const limit = Math.min(Math.max(filter.limit ?? DEFAULT_AUDIT_QUERY_LIMIT, 1), MAX_AUDIT_QUERY_LIMIT);
    try {
      return await this.sink.query({ ...filter, limit });
    } catch (err) {
      throw new StorageUnavailableError('audit:query', err);
    }
  }
}

/**
 * SHA-512 over the canonical event (everything but the hash itself).
 */
export function hashEvent(event: AuditEvent): string {
  const hashInput = JSON.stringify({
    id: event.id,
    timestamp: event.timestamp.toISOString(),
    eventType: event.eventType,
    userId: event.userId,
    action: event.action,
    success: event.success,
    details: event.details,
    error: event.error,
  });
  return createHash('sha512').update(hashInput).digest('hex');
}

/** Free text in details is cut to 200 characters (full_response: 2000) */
function truncateDetails(details: AuditDetails): AuditDetails {
  const out: AuditDetails = {};
  for (const [key, value] of Object.entries(details)) {
    const max = LONG_DETAIL_TEXT.get(key) ?? MAX_DETAIL_TEXT;
    out[key] = typeof value === 'string' && value.length > max ? value.slice(0, max) : value;
  }
  return out;
}

export function isAuditEventType(value: unknown): value is AuditEventType {
  return typeof value === 'string' && (AUDIT_EVENT_TYPES as readonly string[]).includes(value);
}

/**
 * Mask an account identifier for logs and audit details: keep the last
 * four characters.
 */
export function maskAccountId(accountId: string): string {
  if (accountId.length <= 4) return '****';
  return `****${accountId.slice(-4)}`;
}

// ── PostgreSQL sink ────────────────────────────────────────────────────

interface AuditRow {
  id: string;
  event_time: Date;
  event_type: string;
  user_id: string;
  action: string;
  success: boolean;
  details: AuditDetails | null;
  error: string | null;
  event_hash: string;
}

export class PgAuditSink implements AuditSink {
  constructor(private readonly pool: Pool) {}

  async append(event: AuditEvent): Promise<void> {
    await this.pool.query(
      `INSERT INTO audit_events
         (id, event_time, event_type, user_id, action, success, details, error, event_hash)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9)`,
      [
        event.id,
        event.timestamp,
        event.eventType,
        event.userId,
        event.action,
        event.success,
        JSON.stringify(event.details),
        event.error,
        event.eventHash,
      ]
    );
  }

  async query(filter: AuditQuery & { limit: number }): Promise<AuditEvent[]> {
    const conditions: string[] = [];
    const params: unknown[] = [];
    let paramIndex = 1;

    if (filter.eventType) {
      conditions.push(`event_type = $${paramIndex++}`);
      params.push(filter.eventType);
    }
    if (filter.userId) {
      conditions.push(`user_id = $${paramIndex++}`);
      params.push(filter.userId);
    }

    const where = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';
    params.push(filter.limit);

    const result = await this.pool.query<AuditRow>(
      `SELECT id, event_time, event_type, user_id, action, success,
              details, error, event_hash
       FROM audit_events
       ${where}
       ORDER BY event_time DESC
       LIMIT $${paramIndex}`,
      params
    );

    return result.rows.flatMap((row) => {
      if (!isAuditEventType(row.event_type)) return [];
      return [{
        id: row.id,
        timestamp: new Date(row.event_time),
        eventType: row.event_type,
        userId: row.user_id,
        action: row.action,
        success: row.success,
        details: row.details ?? {},
        error: row.error,
        eventHash: row.event_hash,
      }];
    });
  }
}
