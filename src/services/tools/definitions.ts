// =============================================================================
// BASTION — Tool Definitions
//
// Each backend operation the agent can invoke, with the permissions that
// justify it (any one suffices) and a zod schema for its arguments.
// Handlers run only after ToolDispatcher has checked those permissions;
// checks that depend on the data (account visibility, transfer
// ownership) live in the handler itself.
// =============================================================================

import { z } from 'zod';
import { canViewAccountsOf } from '../../authorization/access-control';
import { Principal } from '../../types/auth';
import { AuditDetails, AuditEventType, AUDIT_EVENT_TYPES } from '../../types/audit';
import { UnauditedWriteError } from '../../errors';
import { Account } from '../../types/banking';
import { TICKET_STATUSES } from '../../types/escalation';
import { Permission } from '../../types/roles';
import { AuditTrail, CONTROLS, maskAccountId, MAX_AUDIT_QUERY_LIMIT } from '../audit';
import { BankingRepository } from '../banking/repository';
import { EscalationLedger, VIEW_ESCALATION_PERMISSIONS } from '../escalation/ledger';
import { messages } from '../messages';

export interface ToolContext {
  banking: BankingRepository;
  ledger: EscalationLedger;
  audit: AuditTrail;
  clock: () => Date;
}

export type ToolFailureReason =
  | 'access_denied'
  | 'invalid_input'
  | 'not_found'
  | 'rejected'
  | 'storage_unavailable';

interface AuditHint {
  /** Defaults to tool_call */
  auditEvent?: AuditEventType;
  /** Defaults to tool_call_<name> */
  auditAction?: string;
  auditDetails?: AuditDetails;
  /**
   * Recorded as the event's error instead of the customer-facing message.
   * Set it whenever that message names an account.
   */
  auditError?: string;
}

export type HandlerOutcome =
  | ({
      ok: true;
      message: string;
      data?: unknown;
      /** State changed; the result stands even if its audit event fails */
      committed?: boolean;
    } & AuditHint)
  | ({ ok: false; reason: Exclude<ToolFailureReason, 'storage_unavailable'>; message: string } & AuditHint);

export interface ToolDefinition<S extends z.ZodTypeAny = z.ZodTypeAny> {
  name: string;
  description: string;
  permissions: readonly Permission[];
  args: S;
  handler(ctx: ToolContext, principal: Principal, args: z.output<S>): Promise<HandlerOutcome>;
}

function defineTool<S extends z.ZodTypeAny>(tool: ToolDefinition<S>): ToolDefinition<S> {
  return tool;
}

function money(amount: number, currency = 'USD'): string {
  return `$${amount.toFixed(2)} ${currency}`;
}

/**
 * A ledger write that reached storage counts as done even when its audit
 * event did not; the ledger has already logged the gap.
 */
async function keepStoredWrite<T>(write: Promise<T>, stored: (reference: string) => T): Promise<T> {
  try {
    return await write;
  } catch (err) {
    if (err instanceof UnauditedWriteError) return stored(err.reference);
    throw err;
  }
}

/** Resolve an account the principal may read, or the failure outcome */
async function visibleAccount(
  ctx: ToolContext,
  principal: Principal,
  accountId: string,
): Promise<{ account: Account } | { failure: HandlerOutcome }> {
  const account = await ctx.banking.getAccount(accountId);
  if (!account) {
    return {
      failure: {
        ok: false,
        reason: 'not_found',
        message: `Account ${accountId} not found.`,
        auditError: `Account ${maskAccountId(accountId)} not found.`,
      },
    };
  }
  if (!canViewAccountsOf(principal, account.userId)) {
    return {
      failure: {
        ok: false,
        reason: 'access_denied',
        message: messages.accessDenied(`access account ${accountId}`),
        auditError: `Account ${maskAccountId(accountId)} belongs to another customer.`,
        auditEvent: 'access_denied',
        auditAction: 'account_access_unauthorized',
        auditDetails: { account: maskAccountId(accountId), role: principal.role },
      },
    };
  }
  return { account };
}

// ── Banking ────────────────────────────────────────────────────────────

const getAccountBalance = defineTool({
  name: 'get_account_balance',
  description: 'Get the current balance of an account',
  permissions: ['view_accounts'],
  args: z.object({ accountId: z.string().min(1) }),
  async handler(ctx, principal, { accountId }) {
    const lookup = await visibleAccount(ctx, principal, accountId);
    if ('failure' in lookup) return lookup.failure;
    const { account } = lookup;

    return {
      ok: true,
      message: `Account ${account.id} (${account.accountType}): ${money(account.balance, account.currency)}`,
      data: {
        accountId: account.id,
        accountType: account.accountType,
        balance: account.balance,
        currency: account.currency,
      },
      auditEvent: 'account_access',
      auditAction: 'account_view_balance',
      auditDetails: { account: maskAccountId(account.id), operation: 'view_balance', requirement: CONTROLS.dataAccess },
    };
  },
});

const TRANSACTIONS_SHOWN = 10;

const getTransactionHistory = defineTool({
  name: 'get_transaction_history',
  description: 'Recent transactions for an account (default 30 days)',
  permissions: ['view_transactions'],
  args: z.object({
    accountId: z.string().min(1),
    days: z.number().int().min(1).max(365).default(30),
  }),
  async handler(ctx, principal, { accountId, days }) {
    const lookup = await visibleAccount(ctx, principal, accountId);
    if ('failure' in lookup) return lookup.failure;

    const since = new Date(ctx.clock().getTime() - days * 24 * 60 * 60 * 1000);
    const transactions = await ctx.banking.listTransactions(accountId, since);
    const shown = transactions.slice(0, TRANSACTIONS_SHOWN);

    const lines = shown.map((t) =>
      `- ${t.timestamp.toISOString().slice(0, 16).replace('T', ' ')}: ` +
      `${t.transactionType.toUpperCase()} ${money(t.amount, t.currency)}` +
      (t.description ? ` (${t.description})` : '')
    );
    if (transactions.length > shown.length) {
      lines.push(`... and ${transactions.length - shown.length} more transactions`);
    }

    return {
      ok: true,
      message: transactions.length === 0
        ? `No transactions found for account ${accountId} in the last ${days} days.`
        : [`Recent transactions for account ${accountId} (last ${days} days):`, ...lines].join('\n'),
      data: { accountId, days, total: transactions.length, transactions: shown },
      auditEvent: 'transaction_query',
      auditAction: 'query_transactions',
      auditDetails: {
        account: maskAccountId(accountId),
        days,
        count: transactions.length,
        requirement: CONTROLS.dataAccess,
      },
    };
  },
});

const listAccounts = defineTool({
  name: 'list_accounts',
  description: "List a customer's accounts (defaults to the caller)",
  permissions: ['view_accounts'],
  args: z.object({ userId: z.string().min(1).optional() }),
  async handler(ctx, principal, { userId }) {
    const target = userId ?? principal.id;
    if (!canViewAccountsOf(principal, target)) {
      return {
        ok: false,
        reason: 'access_denied',
        message: messages.accessDenied(`view accounts of ${target}`),
        auditEvent: 'access_denied',
        auditAction: 'list_accounts_unauthorized',
        auditDetails: { target_user: target, role: principal.role },
      };
    }

    const accounts = await ctx.banking.listAccounts(target);
    const total = accounts.reduce((sum, a) => sum + a.balance, 0);
    const heading = target === principal.id ? 'Your accounts:' : `Accounts for user '${target}':`;

    return {
      ok: true,
      message: accounts.length === 0
        ? `No accounts found for user ${target}.`
        : [
            heading,
            ...accounts.map((a) => `- ${a.id} (${a.accountType}): ${money(a.balance, a.currency)}`),
            `Total balance across all accounts: ${money(total)}`,
          ].join('\n'),
      data: { userId: target, accounts, totalBalance: total },
      auditEvent: 'account_access',
      auditAction: 'list_accounts',
      auditDetails: { target_user: target, account_count: accounts.length },
    };
  },
});

const reportFraud = defineTool({
  name: 'report_fraud',
  description: 'Report suspicious activity on an account; opens an escalation ticket',
  permissions: ['use_agent'],
  args: z.object({
    accountId: z.string().min(1),
    description: z.string().trim().min(1).max(2000),
  }),
  async handler(ctx, principal, { accountId, description }) {
    const lookup = await visibleAccount(ctx, principal, accountId);
    if ('failure' in lookup) return lookup.failure;

    const ticketId = await keepStoredWrite(
      ctx.ledger.create({
        userId: principal.id,
        inputText: `Fraud report for account ${accountId}: ${description}`,
        agentReasoning: 'Fraud report - requires immediate human review',
        confidence: 1,
        metadata: { type: 'fraud_report', account: maskAccountId(accountId) },
      }),
      (id) => id
    );

    return {
      ok: true,
      message: messages.fraudReported(ticketId),
      data: { ticketId },
      committed: true,
      auditAction: 'fraud_report',
      auditDetails: {
        account: maskAccountId(accountId),
        ticket_id: ticketId,
        severity: 'high',
        description,
        control: CONTROLS.incidentResponse,
      },
    };
  },
});

const transferFunds = defineTool({
  name: 'transfer_funds',
  description: 'Transfer money between two of your own accounts',
  permissions: ['transfer_funds'],
  args: z.object({
    fromAccountId: z.string().min(1),
    toAccountId: z.string().min(1),
    amount: z.number().finite().positive(),
    description: z.string().max(200).optional(),
  }),
  async handler(ctx, principal, args) {
    const amount = Math.round(args.amount * 100) / 100;
    if (amount <= 0) {
      return { ok: false, reason: 'invalid_input', message: 'Transfer amount must be at least 0.01.' };
    }
    if (args.fromAccountId === args.toAccountId) {
      return { ok: false, reason: 'invalid_input', message: 'Source and destination accounts must differ.' };
    }

    const from = await ctx.banking.getAccount(args.fromAccountId);
    if (!from) {
      return {
        ok: false,
        reason: 'not_found',
        message: `Source account ${args.fromAccountId} not found.`,
        auditError: `Source account ${maskAccountId(args.fromAccountId)} not found.`,
      };
    }
    const to = await ctx.banking.getAccount(args.toAccountId);
    if (!to) {
      return {
        ok: false,
        reason: 'not_found',
        message: `Destination account ${args.toAccountId} not found.`,
        auditError: `Destination account ${maskAccountId(args.toAccountId)} not found.`,
      };
    }

    // Ownership is checked for every role. Visibility permissions never
    // extend to moving money out of, or into, someone else's account.
    for (const [side, account] of [['source', from], ['destination', to]] as const) {
      if (account.userId !== principal.id) {
        return {
          ok: false,
          reason: 'access_denied',
          message: `You can only transfer ${side === 'source' ? 'from' : 'to'} your own accounts.`,
          auditEvent: 'safety_block',
          auditAction: `transfer_unauthorized_${side}`,
          auditDetails: { account: maskAccountId(account.id), role: principal.role },
        };
      }
    }

    if (from.currency !== to.currency) {
      return { ok: false, reason: 'rejected', message: 'Transfers between currencies are not supported.' };
    }

    const description = args.description?.trim() || `Transfer from ${from.id} to ${to.id}`;
    const result = await ctx.banking.transfer({
      fromAccountId: from.id,
      toAccountId: to.id,
      amount,
      description,
    });

    if (!result.ok) {
      return result.reason === 'insufficient_funds'
        ? {
            ok: false,
            reason: 'rejected',
            message: `Insufficient funds. Account ${from.id} balance: ${money(from.balance, from.currency)}, ` +
              `requested transfer: ${money(amount, from.currency)}`,
            auditError: `Insufficient funds in account ${maskAccountId(from.id)}.`,
            auditAction: 'transfer_insufficient_funds',
            auditDetails: { from_account: maskAccountId(from.id), amount },
          }
        : { ok: false, reason: 'not_found', message: 'One of the accounts no longer exists.' };
    }

    return {
      ok: true,
      message: [
        'Transfer successful.',
        `Amount: ${money(amount, from.currency)}`,
        `From: ${from.id} - new balance ${money(result.fromBalance, from.currency)}`,
        `To: ${to.id} - new balance ${money(result.toBalance, to.currency)}`,
        `Transaction ID: ${result.transactionId}`,
      ].join('\n'),
      data: {
        transactionId: result.transactionId,
        amount,
        fromBalance: result.fromBalance,
        toBalance: result.toBalance,
      },
      committed: true,
      auditEvent: 'account_access',
      auditAction: 'transfer_completed',
      auditDetails: {
        from_account: maskAccountId(from.id),
        to_account: maskAccountId(to.id),
        amount,
        transaction_id: result.transactionId,
        requirement: CONTROLS.dataAccess,
      },
    };
  },
});

// ── Observability ──────────────────────────────────────────────────────

const viewAuditLogs = defineTool({
  name: 'view_audit_logs',
  description: 'Recent audit log entries, optionally filtered by event type',
  permissions: ['view_logs'],
  args: z.object({
    limit: z.number().int().min(1).max(MAX_AUDIT_QUERY_LIMIT).default(10),
    eventType: z.enum(AUDIT_EVENT_TYPES).optional(),
  }),
  async handler(ctx, _principal, { limit, eventType }) {
    const events = await ctx.audit.query({ limit, eventType });
    const lines = events.map((e, i) =>
      `${i + 1}. [${e.timestamp.toISOString()}] ${e.success ? 'OK' : 'FAILED'} ${e.action} ` +
      `(user: ${e.userId}, type: ${e.eventType})${e.error ? ` error: ${e.error}` : ''}`
    );

    return {
      ok: true,
      message: events.length === 0
        ? `No audit logs found${eventType ? ` for event type: ${eventType}` : ''}.`
        : [`Audit log entries (${events.length} most recent):`, ...lines].join('\n'),
      data: { events },
      auditAction: 'view_audit_logs',
      auditDetails: { limit, event_type: eventType ?? null, returned: events.length },
    };
  },
});

const RESPONSE_SUMMARY_MAX = 200;
const FULL_RESPONSE_MAX = 2000;

const logAgentResponse = defineTool({
  name: 'log_agent_response',
  description: "Record the agent's reply to the customer in the audit trail",
  permissions: ['use_agent'],
  args: z.object({
    summary: z.string().trim().min(1),
    fullResponse: z.string().optional(),
    model: z.string().trim().min(1).max(100).default('unspecified'),
  }),
  async handler(_ctx, _principal, { summary, fullResponse, model }) {
    return {
      ok: true,
      message: `Response logged for audit (model: ${model}).`,
      data: { model },
      auditEvent: 'user_query',
      auditAction: 'agent_response',
      auditDetails: {
        model,
        summary: summary.slice(0, RESPONSE_SUMMARY_MAX),
        full_response: fullResponse ? fullResponse.slice(0, FULL_RESPONSE_MAX) : null,
      },
    };
  },
});

// ── Escalations ────────────────────────────────────────────────────────

const listEscalations = defineTool({
  name: 'list_escalations',
  description: 'List escalation tickets visible to the caller',
  permissions: VIEW_ESCALATION_PERMISSIONS,
  args: z.object({ status: z.enum(TICKET_STATUSES).optional() }),
  async handler(ctx, principal, { status }) {
    const tickets = await ctx.ledger.list(principal, status);
    return {
      ok: true,
      message: tickets.length === 0 ? 'No tickets found.' : `${tickets.length} ticket(s) found.`,
      data: { tickets },
      auditAction: 'list_escalations',
      auditDetails: { status: status ?? null, count: tickets.length },
    };
  },
});

const escalationStats = defineTool({
  name: 'escalation_stats',
  description: 'Counts over the escalation tickets visible to the caller',
  permissions: VIEW_ESCALATION_PERMISSIONS,
  args: z.object({}),
  async handler(ctx, principal) {
    const stats = await ctx.ledger.stats(principal);
    return {
      ok: true,
      message: `${stats.total} ticket(s): ${stats.pending} pending, ${stats.resolved} resolved.`,
      data: stats,
      auditAction: 'escalation_stats',
      auditDetails: { total: stats.total },
    };
  },
});

const createEscalation = defineTool({
  name: 'create_escalation',
  description: 'Defer a request to human review',
  permissions: ['use_agent'],
  args: z.object({
    inputText: z.string().trim().min(1).max(4000),
    reasoning: z.string().max(2000).default(''),
    confidence: z.number().min(0).max(1).default(0),
  }),
  async handler(ctx, principal, { inputText, reasoning, confidence }) {
    const ticketId = await keepStoredWrite(
      ctx.ledger.create({
        userId: principal.id,
        inputText,
        agentReasoning: reasoning,
        confidence,
      }),
      (id) => id
    );
    return {
      ok: true,
      message: messages.escalated(ticketId),
      data: { ticketId },
      committed: true,
      auditAction: 'create_escalation_ticket',
      auditDetails: { ticket_id: ticketId },
    };
  },
});

const resolveEscalation = defineTool({
  name: 'resolve_escalation',
  description: 'Resolve a pending escalation ticket',
  permissions: ['resolve_escalations'],
  args: z.object({
    ticketId: z.string().min(1),
    resolutionNote: z.string().trim().min(1).max(2000),
    outcome: z.enum(['approved', 'rejected', 'resolved']).default('resolved'),
  }),
  async handler(ctx, principal, { ticketId, resolutionNote, outcome }) {
    const resolved = await keepStoredWrite(
      ctx.ledger.resolve(principal, ticketId, resolutionNote, outcome),
      () => true
    );
    if (!resolved) {
      return {
        ok: false,
        reason: 'not_found',
        message: `Ticket ${ticketId} could not be resolved. It may not exist or is already resolved.`,
        auditDetails: { ticket_id: ticketId },
      };
    }
    return {
      ok: true,
      message: `Ticket ${ticketId} marked ${outcome} by ${principal.id} (${principal.displayName}).`,
      data: { ticketId, status: outcome, resolvedBy: principal.id },
      committed: true,
      auditAction: 'resolve_escalation',
      auditDetails: { ticket_id: ticketId, status: outcome, requirement: CONTROLS.privilegedAction },
    };
  },
});

export const TOOLS: readonly ToolDefinition[] = [
  getAccountBalance,
  getTransactionHistory,
  listAccounts,
  reportFraud,
  transferFunds,
  viewAuditLogs,
  logAgentResponse,
  listEscalations,
  escalationStats,
  createEscalation,
  resolveEscalation,
];
