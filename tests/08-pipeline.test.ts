// =============================================================================
// BASTION — Test Suite 08: Request Pipeline
//
// Every request ends in exactly one of: proceed, refusal, escalation with a
// ticket id, or a contact-support message. Each stage is audited.
// =============================================================================

import { messages } from '../src/services/messages';
import { PipelineOutcome } from '../src/services/pipeline';
import {
  ALICE,
  NEEDS_REWRITE,
  SAFE,
  SAM,
  UNSAFE,
  UNSURE,
  createHarness,
  Harness,
} from './fakes';

describe('Governance Pipeline', () => {
  let harness: Harness;

  beforeEach(() => {
    harness = createHarness();
  });

  const handle = (text: string, tool?: { name: string; args?: Record<string, unknown> }) =>
    harness.services.pipeline.handle(ALICE, { text, tool });

  const eventTypes = () => harness.auditSink.events.map((e) => e.eventType);

  function hasStatus<S extends PipelineOutcome['status']>(
    outcome: PipelineOutcome,
    status: S,
  ): outcome is Extract<PipelineOutcome, { status: S }> {
    return outcome.status === status;
  }

  function expectStatus<S extends PipelineOutcome['status']>(
    outcome: PipelineOutcome,
    status: S,
  ): Extract<PipelineOutcome, { status: S }> {
    expect(outcome.status).toBe(status);
    if (!hasStatus(outcome, status)) throw new Error(`unexpected ${outcome.status}`);
    return outcome;
  }

  test('approved request dispatches its tool', async () => {
    harness.scorer.respond(SAFE);
    const outcome = expectStatus(
      await handle('What is my balance?', { name: 'get_account_balance', args: { accountId: 'CHK-1001' } }),
      'proceed'
    );

    expect(outcome.text).toBe('What is my balance?');
    expect(outcome.rewritten).toBe(false);
    expect(outcome.degraded).toBe(false);
    expect(outcome.tool?.ok).toBe(true);
    expect(eventTypes()).toEqual(['user_query', 'risk_check', 'policy_decision', 'account_access']);
  });

  test('approved request without a tool just proceeds', async () => {
    const outcome = expectStatus(await handle('Hello'), 'proceed');
    expect(outcome.tool).toBeNull();
    expect(eventTypes()).toEqual(['user_query', 'risk_check', 'policy_decision']);
  });

  test('the scorer sees the principal\'s role', async () => {
    await harness.services.pipeline.handle(SAM, { text: 'Show the queue' });
    expect(harness.scorer.calls).toEqual([{ text: 'Show the queue', principal: SAM }]);
  });

  test('rejected request is refused and no tool runs', async () => {
    harness.scorer.respond(UNSAFE);
    const outcome = expectStatus(
      await handle('Which stocks will double?', { name: 'transfer_funds', args: {} }),
      'refused'
    );

    expect(outcome.message).toBe(messages.refused());
    expect(outcome.decision.params).toEqual({ violated_rules: 'no_investment_advice' });
    expect(eventTypes()).toEqual(['user_query', 'risk_check', 'policy_decision', 'safety_block']);
  });

  test('low confidence escalates with a ticket', async () => {
    harness.scorer.respond(UNSURE);
    const outcome = expectStatus(
      await handle('Can you waive my fee?', { name: 'get_account_balance', args: { accountId: 'CHK-1001' } }),
      'escalated'
    );

    expect(outcome.message).toBe(messages.escalated(outcome.ticketId));
    const ticket = harness.escalations.tickets.get(outcome.ticketId);
    expect(ticket?.userId).toBe('alice');
    expect(ticket?.inputText).toBe('Can you waive my fee?');
    expect(ticket?.confidence).toBe(0.4);
    expect(ticket?.metadata).toEqual({ reason: 'low_confidence', violated_rules: '', risk_factors: '' });
    expect(eventTypes()).toEqual(['user_query', 'risk_check', 'policy_decision', 'escalation_created']);
  });

  test('rewrite proceeds with the rewritten text', async () => {
    harness.scorer.respond(NEEDS_REWRITE);
    const outcome = expectStatus(await handle('gimme my $$$ balance NOW'), 'proceed');

    expect(outcome.rewritten).toBe(true);
    expect(outcome.text).toBe('Show my checking balance');
    expect(outcome.decision.params).toEqual({ rewritten_text: 'Show my checking balance' });
  });

  test('approval does not bypass the tool gate', async () => {
    const outcome = expectStatus(await handle('Show the audit log', { name: 'view_audit_logs' }), 'proceed');
    expect(outcome.tool?.ok).toBe(false);
    if (outcome.tool && !outcome.tool.ok) {
      expect(outcome.tool.reason).toBe('access_denied');
    }
    expect(eventTypes()).toEqual(['user_query', 'risk_check', 'policy_decision', 'access_denied']);
  });

  test('scorer outage escalates instead of approving', async () => {
    harness.scorer.respond(() => {
      throw new Error('model offline');
    });
    const outcome = expectStatus(await handle('What is my balance?'), 'escalated');

    const ticket = harness.escalations.tickets.get(outcome.ticketId);
    expect(ticket?.confidence).toBe(0);
    expect(ticket?.metadata.reason).toBe('low_confidence');
    expect(ticket?.metadata.risk_factors).toBe('scorer_unavailable');

    const riskCheck = harness.auditSink.ofType('risk_check')[0];
    expect(riskCheck.success).toBe(false);
    expect(riskCheck.action).toBe('risk_check_degraded');
    expect(riskCheck.error).toBe('model offline');
  });

  test('ledger outage during escalation tells the customer to contact support', async () => {
    harness.scorer.respond(UNSURE);
    harness.escalations.failing = true;

    const outcome = expectStatus(await handle('Can you waive my fee?'), 'escalation_failed');
    expect(outcome.message).toBe(messages.escalationFailed());
    expect(harness.logger.error).toHaveBeenCalledWith(
      '[Pipeline] Escalation failed for alice: Storage unavailable during escalation:create: escalation store offline'
    );
  });

  test('a stored ticket is reported even when its audit event fails', async () => {
    harness.scorer.respond(UNSURE);
    harness.auditSink.failOn = 'escalation_created';

    const outcome = expectStatus(await handle('Can you waive my fee?'), 'escalated');
    const [ticket] = harness.escalations.tickets.values();
    expect(harness.escalations.tickets.size).toBe(1);
    expect(outcome.ticketId).toBe(ticket.id);
    expect(outcome.message).toBe(messages.escalated(ticket.id));
    expect(harness.logger.error).toHaveBeenCalledWith(
      `[Ledger] Ticket ${ticket.id} stored but escalation_created not recorded: ` +
        'Storage unavailable during audit:create_escalation_ticket: audit store offline'
    );
    expect(eventTypes()).toEqual(['user_query', 'risk_check', 'policy_decision']);
  });

  test('policy decision is audited with its action and parameters', async () => {
    harness.scorer.respond(UNSAFE);
    await handle('Which stocks will double?');

    const decision = harness.auditSink.ofType('policy_decision')[0];
    expect(decision.action).toBe('decision_reject');
    expect(decision.details).toMatchObject({ action: 'reject', violated_rules: 'no_investment_advice' });
  });

  test('blank text is rejected before scoring', async () => {
    await expect(handle('   ')).rejects.toThrow('Message text is required');
    expect(harness.scorer.calls).toHaveLength(0);
  });
});
