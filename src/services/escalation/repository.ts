// =============================================================================
// BASTION — Escalation Repository
//
// Storage for escalation tickets, in the unified `escalations` table.
// One create = one INSERT. One resolve = one conditional UPDATE keyed by
// id and status = 'pending', so concurrent resolutions of the same ticket
// cannot both succeed.
// =============================================================================

import { Pool } from 'pg';
import {
  EscalationTicket,
  TICKET_STATUSES,
  TicketResolution,
  TicketStatus,
} from '../../types/escalation';

export interface TicketFilter {
  /** Restrict to one owner. Undefined = every owner. */
  userId?: string;
  status?: TicketStatus;
}

export interface EscalationRepository {
  insert(ticket: EscalationTicket): Promise<void>;
  /** Newest created_at first */
  find(filter: TicketFilter): Promise<EscalationTicket[]>;
  findById(id: string): Promise<EscalationTicket | null>;
  /**
   * Atomically move a pending ticket to a terminal status. Returns the
   * updated ticket, or null when the ticket is missing or already terminal.
   */
  resolveIfPending(id: string, resolution: TicketResolution): Promise<EscalationTicket | null>;
}

interface EscalationRow {
  id: string;
  user_id: string;
  input_text: string;
  agent_reasoning: string;
  confidence: number | string;
  status: string;
  resolved_by: string | null;
  resolution_note: string | null;
  created_at: Date;
  resolved_at: Date | null;
  metadata: Record<string, string> | null;
}

const COLUMNS = `id, user_id, input_text, agent_reasoning, confidence, status,
                 resolved_by, resolution_note, created_at, resolved_at, metadata`;

function toStatus(value: string): TicketStatus {
  const match = TICKET_STATUSES.find((s) => s === value);
  if (!match) {
    throw new Error(`Unknown ticket status in storage: ${value}`);
  }
  return match;
}

function toTicket(row: EscalationRow): EscalationTicket {
  return {
    id: row.id,
    userId: row.user_id,
    inputText: row.input_text,
    agentReasoning: row.agent_reasoning,
    confidence: Number(row.confidence),
    status: toStatus(row.status),
    resolvedBy: row.resolved_by,
    resolutionNote: row.resolution_note,
    createdAt: new Date(row.created_at),
    resolvedAt: row.resolved_at ? new Date(row.resolved_at) : null,
    metadata: row.metadata ?? {},
  };
}

export class PgEscalationRepository implements EscalationRepository {
  constructor(private readonly pool: Pool) {}

  async insert(ticket: EscalationTicket): Promise<void> {
    await this.pool.query(
      `INSERT INTO escalations
         (id, user_id, input_text, agent_reasoning, confidence, status, created_at, metadata)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8)`,
      [
        ticket.id,
        ticket.userId,
        ticket.inputText,
        ticket.agentReasoning,
        ticket.confidence,
        ticket.status,
        ticket.createdAt,
        JSON.stringify(ticket.metadata),
      ]
    );
  }

  async find(filter: TicketFilter): Promise<EscalationTicket[]> {
    const conditions: string[] = [];
    const params: unknown[] = [];
    let paramIndex = 1;

    if (filter.userId !== undefined) {
      conditions.push(`user_id = $${paramIndex++}`);
      params.push(filter.userId);
    }
    if (filter.status) {
      conditions.push(`status = $${paramIndex++}`);
      params.push(filter.status);
    }

    const where = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';
    const result = await this.pool.query<EscalationRow>(
      `SELECT ${COLUMNS} FROM escalations ${where} ORDER BY created_at DESC`,
      params
    );
    return result.rows.map(toTicket);
  }

  async findById(id: string): Promise<EscalationTicket | null> {
    const result = await this.pool.query<EscalationRow>(
      `SELECT ${COLUMNS} FROM escalations WHERE id = $1`,
      [id]
    );
    return result.rows.length > 0 ? toTicket(result.rows[0]) : null;
  }

  async resolveIfPending(id: string, resolution: TicketResolution): Promise<EscalationTicket | null> {
    const result = await this.pool.query<EscalationRow>(
      `UPDATE escalations
       SET status = $2, resolved_by = $3, resolution_note = $4, resolved_at = $5
       WHERE id = $1 AND status = 'pending'
       RETURNING ${COLUMNS}`,
      [id, resolution.status, resolution.resolvedBy, resolution.resolutionNote, resolution.resolvedAt]
    );
    return result.rows.length > 0 ? toTicket(result.rows[0]) : null;
  }
}
