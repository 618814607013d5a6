// =============================================================================
// BASTION — Escalation Ledger
//
// Durable queue of requests deferred to humans. Owns the tickets;
// principals reference them by id.
//
// Visibility:
//   view_all_escalations  → every ticket
//   view_own_escalations  → only tickets where user_id = principal.id,
//                           with no way to widen the scope
//   neither               → AccessDenied
//
// Resolution needs resolve_escalations and happens at most once per ticket.
// =============================================================================

import { v4 as uuidv4, validate as isUuid } from 'uuid';
import { canViewEscalations, checkAnyPermission } from '../../authorization/access-control';
import { hasPermission } from '../../authorization/permissions';
import {
  AccessDeniedError,
  InvalidInputError,
  StorageUnavailableError,
  UnauditedWriteError,
  describeError,
} from '../../errors';
import { AuditEventInput } from '../../types/audit';
import { Principal } from '../../types/auth';
import {
  EscalationStats,
  EscalationTicket,
  TerminalStatus,
  TicketDraft,
  TicketStatus,
} from '../../types/escalation';
import { Logger } from '../../types/logger';
import { Permission } from '../../types/roles';
import { AuditTrail, CONTROLS } from '../audit';
import { EscalationRepository } from './repository';

export const VIEW_ESCALATION_PERMISSIONS: readonly Permission[] = [
  'view_own_escalations',
  'view_all_escalations',
];

export interface EscalationLedgerDeps {
  repository: EscalationRepository;
  audit: AuditTrail;
  logger?: Logger;
  clock?: () => Date;
}

export class EscalationLedger {
  private readonly repository: EscalationRepository;
  private readonly audit: AuditTrail;
  private readonly logger: Logger;
  private readonly clock: () => Date;

  constructor(deps: EscalationLedgerDeps) {
    this.repository = deps.repository;
    this.audit = deps.audit;
    this.logger = deps.logger ?? console;
    this.clock = deps.clock ?? (() => new Date());
  }

  /**
   * Persist a new pending ticket. Returns the ticket id.
   * Throws StorageUnavailableError if the insert fails; callers turn that
   * into a "could not escalate, contact support" message. If only the
   * audit event fails the ticket exists and UnauditedWriteError carries
   * its id.
   */
  async create(draft: TicketDraft): Promise<string> {
    const issues = validateDraft(draft);
    if (issues.length > 0) {
      throw new InvalidInputError('Invalid escalation ticket', issues);
    }

    const ticket: EscalationTicket = {
      id: draft.id ?? uuidv4(),
      userId: draft.userId,
      inputText: draft.inputText,
      agentReasoning: draft.agentReasoning,
      confidence: draft.confidence,
      status: 'pending',
      resolvedBy: null,
      resolutionNote: null,
      createdAt: this.clock(),
      resolvedAt: null,
      metadata: { ...(draft.metadata ?? {}) },
    };

    try {
      await this.repository.insert(ticket);
    } catch (err) {
      this.logger.error(`[Ledger] Failed to create ticket for ${draft.userId}:`, err);
      throw new StorageUnavailableError('escalation:create', err);
    }

    await this.recordWrite('escalation:create', ticket.id, {
      eventType: 'escalation_created',
      userId: ticket.userId,
      action: 'create_escalation_ticket',
      details: {
        ticket_id: ticket.id,
        confidence: ticket.confidence,
        reasoning: ticket.agentReasoning,
        ...ticket.metadata,
      },
    });

    this.logger.info(`[Ledger] Escalation ticket created: ${ticket.id}`);
    return ticket.id;
  }

  /**
   * Tickets visible to the principal, newest first.
   */
  async list(principal: Principal, status?: TicketStatus): Promise<EscalationTicket[]> {
    await this.requireAny(principal, VIEW_ESCALATION_PERMISSIONS, 'list_escalations');

    const scopedToSelf = !hasPermission(principal.role, 'view_all_escalations');
    let tickets: EscalationTicket[];
    try {
      tickets = await this.repository.find({
        userId: scopedToSelf ? principal.id : undefined,
        status,
      });
    } catch (err) {
      throw new StorageUnavailableError('escalation:list', err);
    }

    // Row filter again on the way out; storage filtering is not trusted alone.
    return tickets.filter((t) => canViewEscalations(principal, t.userId));
  }

  /**
   * One ticket, or null when it does not exist or is not visible.
   */
  async get(principal: Principal, ticketId: string): Promise<EscalationTicket | null> {
    await this.requireAny(principal, VIEW_ESCALATION_PERMISSIONS, 'get_escalation');
    if (!isUuid(ticketId)) return null;

    let ticket: EscalationTicket | null;
    try {
      ticket = await this.repository.findById(ticketId);
    } catch (err) {
      throw new StorageUnavailableError('escalation:get', err);
    }
    return ticket && canViewEscalations(principal, ticket.userId) ? ticket : null;
  }

  /**
   * Move a pending ticket to a terminal status. Returns false (not an
   * error) when the ticket does not exist or was already resolved; the
   * first resolution is never overwritten.
   */
  async resolve(
    principal: Principal,
    ticketId: string,
    resolutionNote: string,
    outcome: TerminalStatus = 'resolved',
  ): Promise<boolean> {
    await this.requireAny(principal, ['resolve_escalations'], 'resolve_escalation', { ticket_id: ticketId });

    if (!isUuid(ticketId)) {
      this.logger.warn(`[Ledger] Resolve rejected, not a ticket id: ${ticketId}`);
      return false;
    }

    let updated: EscalationTicket | null;
    try {
      updated = await this.repository.resolveIfPending(ticketId, {
        status: outcome,
        resolvedBy: principal.id,
        resolutionNote,
        resolvedAt: this.clock(),
      });
    } catch (err) {
      throw new StorageUnavailableError('escalation:resolve', err);
    }

    if (!updated) {
      this.logger.warn(`[Ledger] Ticket ${ticketId} not resolved (missing or already terminal)`);
      return false;
    }

    await this.recordWrite('escalation:resolve', ticketId, {
      eventType: 'escalation_resolved',
      userId: principal.id,
      action: 'ticket_resolved',
      details: {
        ticket_id: ticketId,
        status: outcome,
        ticket_owner: updated.userId,
        resolution_note: resolutionNote,
        requirement: CONTROLS.privilegedAction,
      },
    });

    this.logger.info(`[Ledger] Ticket ${ticketId} ${outcome} by ${principal.id}`);
    return true;
  }

  /**
   * Statistics over exactly the tickets list() would return, so counts
   * never include rows the principal cannot see.
   */
  async stats(principal: Principal): Promise<EscalationStats> {
    const tickets = await this.list(principal);
    return summarize(tickets);
  }

  /**
   * Audit a write that has already been stored. If the audit event cannot
   * be written the ticket still exists, so the failure carries its id.
   */
  private async recordWrite(operation: string, ticketId: string, event: AuditEventInput): Promise<void> {
    try {
      await this.audit.record(event);
    } catch (err) {
      this.logger.error(`[Ledger] Ticket ${ticketId} stored but ${event.eventType} not recorded: ${describeError(err)}`);
      throw new UnauditedWriteError(operation, ticketId, err);
    }
  }

  /**
   * Permission check that audits its own denials. Callers that already
   * checked and audited (the tool gate) pass through without a second entry.
   */
  private async requireAny(
    principal: Principal,
    permissions: readonly Permission[],
    action: string,
    details: Record<string, unknown> = {},
  ): Promise<void> {
    try {
      checkAnyPermission(principal, permissions);
    } catch (err) {
      if (err instanceof AccessDeniedError) {
        await this.audit.record({
          eventType: 'access_denied',
          userId: principal.id,
          action: `${action}_unauthorized`,
          success: false,
          details: { role: principal.role, required: permissions.join('|'), ...details },
          error: err.message,
        });
      }
      throw err;
    }
  }
}

export function summarize(tickets: readonly EscalationTicket[]): EscalationStats {
  const byStatus: Record<TicketStatus, number> = { pending: 0, approved: 0, rejected: 0, resolved: 0 };
  let confidenceSum = 0;

  for (const ticket of tickets) {
    byStatus[ticket.status] += 1;
    confidenceSum += ticket.confidence;
  }

  return {
    total: tickets.length,
    pending: byStatus.pending,
    resolved: tickets.length - byStatus.pending,
    avgConfidence: tickets.length > 0 ? confidenceSum / tickets.length : 0,
    byStatus,
  };
}

function validateDraft(draft: TicketDraft): string[] {
  const issues: string[] = [];
  if (!draft.userId || draft.userId.trim().length === 0) issues.push('userId is required');
  if (!draft.inputText || draft.inputText.trim().length === 0) issues.push('inputText is required');
  if (typeof draft.agentReasoning !== 'string') issues.push('agentReasoning must be a string');
  if (!Number.isFinite(draft.confidence) || draft.confidence < 0 || draft.confidence > 1) {
    issues.push('confidence must be in [0, 1]');
  }
  if (draft.id !== undefined && !isUuid(draft.id)) issues.push('id must be a UUID');
  return issues;
}
