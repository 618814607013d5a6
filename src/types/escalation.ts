// =============================================================================
// BASTION — Escalation Tickets
// =============================================================================

export const TICKET_STATUSES = ['pending', 'approved', 'rejected', 'resolved'] as const;

export type TicketStatus = (typeof TICKET_STATUSES)[number];

/** Statuses a pending ticket may move to. Each is final. */
export type TerminalStatus = Exclude<TicketStatus, 'pending'>;

export interface EscalationTicket {
  id: string;
  userId: string;
  inputText: string;
  agentReasoning: string;
  confidence: number;
  status: TicketStatus;
  resolvedBy: string | null;
  resolutionNote: string | null;
  createdAt: Date;
  resolvedAt: Date | null;
  metadata: Record<string, string>;
}

/** What callers hand to EscalationLedger.create */
export interface TicketDraft {
  id?: string;
  userId: string;
  inputText: string;
  agentReasoning: string;
  confidence: number;
  metadata?: Record<string, string>;
}

/** Written atomically with the pending → terminal transition */
export interface TicketResolution {
  status: TerminalStatus;
  resolvedBy: string;
  resolutionNote: string;
  resolvedAt: Date;
}

export interface EscalationStats {
  total: number;
  pending: number;
  /** Tickets in any terminal status */
  resolved: number;
  avgConfidence: number;
  byStatus: Record<TicketStatus, number>;
}
