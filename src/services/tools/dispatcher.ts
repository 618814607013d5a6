// =============================================================================
// BASTION — Tool Dispatch Gate
//
// Every backend operation the agent can reach goes through invoke():
//
//   1. permission check (any listed permission suffices)
//        denied → audit access_denied, return a typed denial
//   2. argument validation (zod)
//   3. run the handler; data-dependent rules (visibility, ownership) live there
//   4. audit the outcome, with account ids masked; a read whose audit
//      event cannot be stored is not returned
//
// visibleTools() only decides what is shown. invoke() re-checks regardless.
// =============================================================================

import { checkAnyPermission } from '../../authorization/access-control';
import {
  AccessDeniedError,
  InvalidInputError,
  StorageUnavailableError,
  describeError,
  isGovernanceError,
} from '../../errors';
import { Principal } from '../../types/auth';
import { Logger } from '../../types/logger';
import { Permission } from '../../types/roles';
import { messages } from '../messages';
import {
  HandlerOutcome,
  ToolContext,
  ToolDefinition,
  ToolFailureReason,
  TOOLS,
} from './definitions';

export type ToolResult =
  | { ok: true; tool: string; message: string; data: unknown }
  | { ok: false; tool: string; reason: ToolFailureReason; message: string; issues?: string[] };

export interface ToolSummary {
  name: string;
  description: string;
  permissions: readonly Permission[];
}

export class ToolDispatcher {
  private readonly tools = new Map<string, ToolDefinition>();
  private readonly logger: Logger;

  constructor(
    private readonly ctx: ToolContext,
    tools: readonly ToolDefinition[] = TOOLS,
    logger?: Logger,
  ) {
    for (const tool of tools) {
      if (this.tools.has(tool.name)) {
        throw new Error(`Duplicate tool name: ${tool.name}`);
      }
      this.tools.set(tool.name, tool);
    }
    this.logger = logger ?? console;
  }

  listTools(): ToolSummary[] {
    return [...this.tools.values()].map(summarize);
  }

  /** Tools the principal's role may invoke. Presentation only. */
  visibleTools(principal: Principal): ToolSummary[] {
    return [...this.tools.values()]
      .filter((tool) => checkAnyPermission(principal, tool.permissions, false))
      .map(summarize);
  }

  async invoke(principal: Principal, name: string, rawArgs: unknown = {}): Promise<ToolResult> {
    const tool = this.tools.get(name);
    if (!tool) {
      await this.ctx.audit.record({
        eventType: 'tool_call',
        userId: principal.id,
        action: `tool_call_${name}`,
        success: false,
        details: { tool: name },
        error: 'unknown tool',
      });
      return { ok: false, tool: name, reason: 'not_found', message: `Unknown tool: ${name}` };
    }

    if (!checkAnyPermission(principal, tool.permissions, false)) {
      const denial = new AccessDeniedError(principal.id, principal.role, tool.permissions);
      await this.ctx.audit.record({
        eventType: 'access_denied',
        userId: principal.id,
        action: `${name}_unauthorized`,
        success: false,
        details: { tool: name, role: principal.role, required: tool.permissions.join('|') },
        error: denial.message,
      });
      this.logger.warn(`[Tools] ${denial.message} (tool: ${name})`);
      return { ok: false, tool: name, reason: 'access_denied', message: messages.accessDenied(`use ${name}`) };
    }

    const parsed = tool.args.safeParse(rawArgs ?? {});
    if (!parsed.success) {
      const issues = parsed.error.issues.map((i) =>
        i.path.length > 0 ? `${i.path.join('.')}: ${i.message}` : i.message
      );
      return this.reject(principal, name, 'invalid_input', `Invalid arguments for ${name}`, issues);
    }

    let outcome: HandlerOutcome;
    try {
      outcome = await tool.handler(this.ctx, principal, parsed.data);
    } catch (err: unknown) {
      return this.handleFailure(principal, name, err);
    }

    try {
      await this.ctx.audit.record({
        eventType: outcome.auditEvent ?? 'tool_call',
        userId: principal.id,
        action: outcome.auditAction ?? `tool_call_${name}`,
        success: outcome.ok,
        details: { tool: name, ...outcome.auditDetails },
        error: outcome.ok ? undefined : outcome.auditError ?? outcome.message,
      });
    } catch (err: unknown) {
      // Reads are withheld when they cannot be audited. A committed write
      // has already happened and is reported as such.
      if (!(outcome.ok && outcome.committed)) throw err;
      this.logger.error(
        `[Tools] ${name} completed for ${principal.id} but its audit event was not stored: ${describeError(err)}`
      );
    }

    return outcome.ok
      ? { ok: true, tool: name, message: outcome.message, data: outcome.data ?? null }
      : { ok: false, tool: name, reason: outcome.reason, message: outcome.message };
  }

  private async handleFailure(principal: Principal, name: string, err: unknown): Promise<ToolResult> {
    // The ledger audits its own denials.
    if (err instanceof AccessDeniedError) {
      return { ok: false, tool: name, reason: 'access_denied', message: messages.accessDenied(`use ${name}`) };
    }
    if (err instanceof InvalidInputError) {
      return this.reject(principal, name, 'invalid_input', err.message, err.issues);
    }

    if (isGovernanceError(err) && !(err instanceof StorageUnavailableError)) {
      throw err;
    }
    // Handlers only do I/O against the stores; anything else they throw
    // is a backend failure.
    const failure = err instanceof StorageUnavailableError
      ? err
      : new StorageUnavailableError(`tool:${name}`, err);

    this.logger.error(`[Tools] ${name} failed for ${principal.id}: ${failure.message}`);
    await this.ctx.audit.record({
      eventType: 'tool_call',
      userId: principal.id,
      action: `tool_call_${name}`,
      success: false,
      details: { tool: name },
      error: failure.message,
    });
    return { ok: false, tool: name, reason: 'storage_unavailable', message: messages.storageUnavailable() };
  }

  private async reject(
    principal: Principal,
    name: string,
    reason: ToolFailureReason,
    message: string,
    issues: string[],
  ): Promise<ToolResult> {
    await this.ctx.audit.record({
      eventType: 'tool_call',
      userId: principal.id,
      action: `tool_call_${name}`,
      success: false,
      details: { tool: name, issues: issues.join('; ') },
      error: message,
    });
    return { ok: false, tool: name, reason, message, issues };
  }
}

function summarize(tool: ToolDefinition): ToolSummary {
  return { name: tool.name, description: tool.description, permissions: tool.permissions };
}
