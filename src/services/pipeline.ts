// =============================================================================
// BASTION — Request Pipeline
//
// One utterance, one principal, one pass:
//
//   use_agent check → user_query → risk assessment → policy decision
//     approve / rewrite → optional tool dispatch (re-checked at the gate)
//     reject            → safety_block, refusal
//     escalate          → ledger ticket, or contact-support when no ticket
//                         could be stored
//
// Every stage leaves an audit event. Nothing here scores twice or
// dispatches a tool after reject or escalate.
// =============================================================================

import { z } from 'zod';
import { checkPermission } from '../authorization/access-control';
import {
  AccessDeniedError,
  InvalidInputError,
  StorageUnavailableError,
  UnauditedWriteError,
} from '../errors';
import { Principal } from '../types/auth';
import { Decision } from '../types/decision';
import { Logger } from '../types/logger';
import { RiskAssessment } from '../types/risk';
import { AuditTrail } from './audit';
import { EscalationLedger } from './escalation/ledger';
import { messages } from './messages';
import { PolicyEngine } from './policy/engine';
import { RiskAssessor } from './risk/assessor';
import { ToolDispatcher, ToolResult } from './tools/dispatcher';

export const agentRequestSchema = z.object({
  text: z.string().trim().min(1, 'text is required').max(4000),
  tool: z
    .object({
      name: z.string().min(1),
      args: z.record(z.unknown()).optional(),
    })
    .optional(),
});

export type AgentRequest = z.infer<typeof agentRequestSchema>;

export type PipelineOutcome =
  | {
      status: 'proceed';
      decision: Decision;
      /** The text the agent acts on: the rewrite when there is one */
      text: string;
      rewritten: boolean;
      degraded: boolean;
      tool: ToolResult | null;
    }
  | { status: 'refused'; decision: Decision; message: string }
  | { status: 'escalated'; decision: Decision; ticketId: string; message: string }
  | { status: 'escalation_failed'; decision: Decision; message: string };

export interface GovernancePipelineDeps {
  assessor: RiskAssessor;
  engine: PolicyEngine;
  ledger: EscalationLedger;
  dispatcher: ToolDispatcher;
  audit: AuditTrail;
  logger?: Logger;
}

export class GovernancePipeline {
  private readonly logger: Logger;

  constructor(private readonly deps: GovernancePipelineDeps) {
    this.logger = deps.logger ?? console;
  }

  async handle(principal: Principal, request: AgentRequest): Promise<PipelineOutcome> {
    const { audit } = this.deps;
    const text = request.text.trim();
    if (text.length === 0) {
      throw new InvalidInputError('Message text is required');
    }

    try {
      checkPermission(principal, 'use_agent');
    } catch (err) {
      if (err instanceof AccessDeniedError) {
        await audit.record({
          eventType: 'access_denied',
          userId: principal.id,
          action: 'use_agent_unauthorized',
          success: false,
          details: { role: principal.role },
          error: err.message,
        });
      }
      throw err;
    }

    await audit.record({
      eventType: 'user_query',
      userId: principal.id,
      action: 'agent_message',
      details: { role: principal.role, text, tool: request.tool?.name ?? null },
    });

    const assessment = await this.deps.assessor.assess(text, principal);
    await this.recordAssessment(principal, assessment);

    const decision = this.deps.engine.decide({ analysis: assessment.analysis, principal, text });
    await audit.record({
      eventType: 'policy_decision',
      userId: principal.id,
      action: `decision_${decision.action}`,
      details: { action: decision.action, reasoning: decision.reasoning, ...decision.params },
    });
    this.logger.info(`[Pipeline] ${principal.id} (${principal.role}): ${decision.action}`);

    switch (decision.action) {
      case 'approve':
      case 'rewrite': {
        const rewritten = decision.action === 'rewrite';
        const effective = rewritten ? decision.params.rewritten_text : text;
        const tool = request.tool
          ? await this.deps.dispatcher.invoke(principal, request.tool.name, request.tool.args ?? {})
          : null;
        return {
          status: 'proceed',
          decision,
          text: effective,
          rewritten,
          degraded: assessment.degraded,
          tool,
        };
      }

      case 'reject':
        await audit.record({
          eventType: 'safety_block',
          userId: principal.id,
          action: 'request_refused',
          success: false,
          details: { violated_rules: decision.params.violated_rules ?? '', tool: request.tool?.name ?? null },
        });
        return { status: 'refused', decision, message: messages.refused() };

      case 'escalate':
        return this.escalate(principal, text, decision, assessment);

      default: {
        const unreachable: never = decision.action;
        throw new Error(`Unhandled decision action: ${String(unreachable)}`);
      }
    }
  }

  private async escalate(
    principal: Principal,
    text: string,
    decision: Decision,
    assessment: RiskAssessment,
  ): Promise<PipelineOutcome> {
    const { analysis } = assessment;
    try {
      const ticketId = await this.deps.ledger.create({
        userId: principal.id,
        inputText: text,
        agentReasoning: decision.reasoning,
        confidence: analysis.confidence,
        metadata: {
          reason: decision.params.reason ?? 'unclassified',
          violated_rules: analysis.violatedRules.join(','),
          risk_factors: analysis.riskFactors.join(','),
        },
      });
      return { status: 'escalated', decision, ticketId, message: messages.escalated(ticketId) };
    } catch (err) {
      // The ticket is stored; only its audit event is missing. The ledger
      // has already logged that.
      if (err instanceof UnauditedWriteError) {
        return { status: 'escalated', decision, ticketId: err.reference, message: messages.escalated(err.reference) };
      }
      if (!(err instanceof StorageUnavailableError)) throw err;
      this.logger.error(`[Pipeline] Escalation failed for ${principal.id}: ${err.message}`);
      return { status: 'escalation_failed', decision, message: messages.escalationFailed() };
    }
  }

  private async recordAssessment(principal: Principal, assessment: RiskAssessment): Promise<void> {
    const { analysis } = assessment;
    await this.deps.audit.record({
      eventType: 'risk_check',
      userId: principal.id,
      action: assessment.degraded ? 'risk_check_degraded' : 'risk_check',
      success: !assessment.degraded,
      details: {
        safety_score: analysis.safetyScore,
        compliance_score: analysis.complianceScore,
        confidence: analysis.confidence,
        violated_rules: analysis.violatedRules.join(','),
        risk_factors: analysis.riskFactors.join(','),
        attempts: assessment.attempts,
      },
      error: assessment.error,
    });
  }
}
