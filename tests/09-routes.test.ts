// =============================================================================
// BASTION — Test Suite 09: HTTP Routes
//
// The Express surface over the governance core: guards, status codes and
// bodies, against the in-memory harness.
// =============================================================================

import { ADA, ALICE, BOB, SAM, UNSAFE, UNSURE, createHarness, Harness } from './fakes';
import { api, json, startTestApp, TestServer, tokenFor } from './helpers';

interface TicketBody {
  id: string;
  userId: string;
  status: string;
}

describe('HTTP Routes', () => {
  let harness: Harness;
  let server: TestServer;
  let tokens: Record<'alice' | 'bob' | 'sam' | 'ada', string>;

  beforeEach(async () => {
    harness = createHarness();
    server = await startTestApp(harness);
    tokens = {
      alice: tokenFor(harness, ALICE),
      bob: tokenFor(harness, BOB),
      sam: tokenFor(harness, SAM),
      ada: tokenFor(harness, ADA),
    };
  });

  afterEach(async () => {
    await server.close();
  });

  describe('Agent', () => {
    test('approved message with a tool returns 200 and the tool result', async () => {
      const res = await api(server, 'POST', '/api/agent/messages', {
        text: 'What is my balance?',
        tool: { name: 'get_account_balance', args: { accountId: 'CHK-1001' } },
      }, tokens.alice);
      expect(res.status).toBe(200);

      const body = await json<{ status: string; tool: { ok: boolean; message: string }; requestId: string }>(res);
      expect(body.status).toBe('proceed');
      expect(body.tool).toMatchObject({ ok: true, message: 'Account CHK-1001 (checking): $1000.00 USD' });
      expect(body.requestId).toBe(res.headers.get('x-request-id'));
    });

    test('refusal returns 200 with the refusal message', async () => {
      harness.scorer.respond(UNSAFE);
      const res = await api(server, 'POST', '/api/agent/messages', { text: 'Which stocks will double?' }, tokens.alice);
      expect(res.status).toBe(200);
      expect((await json<{ status: string }>(res)).status).toBe('refused');
    });

    test('escalation returns 202 with the ticket id', async () => {
      harness.scorer.respond(UNSURE);
      const res = await api(server, 'POST', '/api/agent/messages', { text: 'Can you waive my fee?' }, tokens.alice);
      expect(res.status).toBe(202);

      const body = await json<{ status: string; ticketId: string }>(res);
      expect(body.status).toBe('escalated');
      expect(harness.escalations.tickets.has(body.ticketId)).toBe(true);
    });

    test('escalation storage failure returns 503 with a contact-support message', async () => {
      harness.scorer.respond(UNSURE);
      harness.escalations.failing = true;
      const res = await api(server, 'POST', '/api/agent/messages', { text: 'Can you waive my fee?' }, tokens.alice);
      expect(res.status).toBe(503);
      expect((await json<{ status: string }>(res)).status).toBe('escalation_failed');
    });

    test('missing text returns 400', async () => {
      const res = await api(server, 'POST', '/api/agent/messages', { tool: { name: 'list_accounts' } }, tokens.alice);
      expect(res.status).toBe(400);
      expect((await json<{ issues: string[] }>(res)).issues).toEqual(['text: Required']);
    });

    test('null bytes are stripped before scoring', async () => {
      await api(server, 'POST', '/api/agent/messages', { text: 'hel\u0000lo' }, tokens.alice);
      expect(harness.scorer.calls[0].text).toBe('hello');
    });
  });

  describe('Tools', () => {
    test('GET /api/tools lists what the role may use', async () => {
      const res = await api(server, 'GET', '/api/tools', undefined, tokens.sam);
      const body = await json<{ tools: Array<{ name: string }> }>(res);
      expect(body.tools.map((t) => t.name)).toContain('view_audit_logs');
      expect(body.tools.map((t) => t.name)).not.toContain('resolve_escalation');
    });

    test('denied tool returns 403', async () => {
      const res = await api(server, 'POST', '/api/tools/view_audit_logs', {}, tokens.alice);
      expect(res.status).toBe(403);
      expect(await json<{ ok: boolean; reason: string }>(res)).toMatchObject({ ok: false, reason: 'access_denied' });
    });

    test('ownership failure on transfer returns 403', async () => {
      const res = await api(server, 'POST', '/api/tools/transfer_funds', {
        fromAccountId: 'CHK-1001',
        toAccountId: 'CHK-9001',
        amount: 5,
      }, tokens.ada);
      expect(res.status).toBe(403);
    });

    test('invalid arguments return 400; unknown tools 404', async () => {
      const bad = await api(server, 'POST', '/api/tools/get_account_balance', {}, tokens.alice);
      expect(bad.status).toBe(400);

      const unknown = await api(server, 'POST', '/api/tools/format_disk', {}, tokens.alice);
      expect(unknown.status).toBe(404);
    });

    test('transfer into another customer\'s account returns 403', async () => {
      const res = await api(server, 'POST', '/api/tools/transfer_funds', {
        fromAccountId: 'CHK-2001',
        toAccountId: 'CHK-1001',
        amount: 1,
      }, tokens.bob);
      expect(res.status).toBe(403);
      expect(harness.auditSink.last()?.action).toBe('transfer_unauthorized_destination');
    });

    test('insufficient funds returns 422', async () => {
      const res = await api(server, 'POST', '/api/tools/transfer_funds', {
        fromAccountId: 'CHK-1001',
        toAccountId: 'SAV-1002',
        amount: 2000,
      }, tokens.alice);
      expect(res.status).toBe(422);
      expect(await json<{ reason: string }>(res)).toMatchObject({ reason: 'rejected' });
    });
  });

  describe('Escalations', () => {
    let aliceTicket: string;
    let bobTicket: string;

    beforeEach(async () => {
      const draft = { inputText: 'please review', agentReasoning: 'low confidence', confidence: 0.5 };
      aliceTicket = await harness.services.ledger.create({ userId: 'alice', ...draft });
      bobTicket = await harness.services.ledger.create({ userId: 'bob', ...draft });
    });

    test('customers list their own tickets only', async () => {
      const res = await api(server, 'GET', '/api/escalations', undefined, tokens.alice);
      expect(res.status).toBe(200);
      const body = await json<{ tickets: TicketBody[]; count: number }>(res);
      expect(body.count).toBe(1);
      expect(body.tickets[0].id).toBe(aliceTicket);
    });

    test('staff list every ticket', async () => {
      const res = await api(server, 'GET', '/api/escalations?status=pending', undefined, tokens.sam);
      expect((await json<{ count: number }>(res)).count).toBe(2);
    });

    test('invalid status filter returns 400', async () => {
      const res = await api(server, 'GET', '/api/escalations?status=closed', undefined, tokens.sam);
      expect(res.status).toBe(400);
    });

    test('another customer\'s ticket is not found', async () => {
      const res = await api(server, 'GET', `/api/escalations/${bobTicket}`, undefined, tokens.alice);
      expect(res.status).toBe(404);

      const own = await api(server, 'GET', `/api/escalations/${aliceTicket}`, undefined, tokens.alice);
      expect((await json<TicketBody>(own)).userId).toBe('alice');
    });

    test('stats are scoped to the caller', async () => {
      const res = await api(server, 'GET', '/api/escalations/stats', undefined, tokens.bob);
      expect(await json<{ total: number; pending: number }>(res)).toMatchObject({ total: 1, pending: 1 });
    });

    test('staff cannot resolve; the denial is audited', async () => {
      const res = await api(server, 'POST', `/api/escalations/${aliceTicket}/resolve`, { note: 'done' }, tokens.sam);
      expect(res.status).toBe(403);
      expect((await json<{ kind: string }>(res)).kind).toBe('AccessDenied');

      const denial = harness.auditSink.last();
      expect(denial?.eventType).toBe('access_denied');
      expect(denial?.action).toBe(`POST /api/escalations/${aliceTicket}/resolve`);
    });

    test('admin resolves once; the second attempt conflicts', async () => {
      const first = await api(server, 'POST', `/api/escalations/${aliceTicket}/resolve`, {
        note: 'Refund issued',
        outcome: 'approved',
      }, tokens.ada);
      expect(first.status).toBe(200);
      expect(await json<{ status: string; resolvedBy: string }>(first)).toEqual({
        id: aliceTicket,
        status: 'approved',
        resolvedBy: 'ada',
      });

      const second = await api(server, 'POST', `/api/escalations/${aliceTicket}/resolve`, { note: 'again' }, tokens.ada);
      expect(second.status).toBe(409);
      expect(await json<{ error: string; status: string }>(second)).toEqual({
        error: 'Ticket already resolved',
        status: 'approved',
      });
    });

    test('the losing concurrent resolution reports the stored status', async () => {
      const [first, second] = await Promise.all([
        api(server, 'POST', `/api/escalations/${aliceTicket}/resolve`, { note: 'a', outcome: 'approved' }, tokens.ada),
        api(server, 'POST', `/api/escalations/${aliceTicket}/resolve`, { note: 'b', outcome: 'rejected' }, tokens.ada),
      ]);
      expect([first.status, second.status].sort()).toEqual([200, 409]);

      const conflict = first.status === 409 ? first : second;
      const stored = harness.escalations.tickets.get(aliceTicket)?.status;
      expect(stored === 'approved' || stored === 'rejected').toBe(true);
      expect(await json<{ status: string }>(conflict)).toEqual({ error: 'Ticket already resolved', status: stored });
    });

    test('a resolution stored without its audit event returns 200', async () => {
      harness.auditSink.failOn = 'escalation_resolved';
      const res = await api(server, 'POST', `/api/escalations/${aliceTicket}/resolve`, { note: 'done' }, tokens.ada);
      expect(res.status).toBe(200);
      expect(await json<{ id: string; status: string; resolvedBy: string }>(res)).toEqual({
        id: aliceTicket,
        status: 'resolved',
        resolvedBy: 'ada',
      });
      expect(harness.escalations.tickets.get(aliceTicket)?.status).toBe('resolved');
    });

    test('resolving an unknown ticket returns 404', async () => {
      const res = await api(
        server,
        'POST',
        '/api/escalations/3f1c0c1e-8a8b-4c55-9d7e-0d5b2f2b9a10/resolve',
        { note: 'n/a' },
        tokens.ada
      );
      expect(res.status).toBe(404);
    });

    test('resolution without a note returns 400', async () => {
      const res = await api(server, 'POST', `/api/escalations/${aliceTicket}/resolve`, {}, tokens.ada);
      expect(res.status).toBe(400);
    });
  });

  describe('Audit', () => {
    test('staff read audit events newest first', async () => {
      await api(server, 'GET', '/api/audit/events', undefined, tokens.alice);
      const res = await api(server, 'GET', '/api/audit/events?eventType=access_denied&limit=5', undefined, tokens.sam);
      expect(res.status).toBe(200);

      const body = await json<{ events: Array<{ userId: string; action: string }>; limit: number }>(res);
      expect(body.limit).toBe(5);
      expect(body.events).toHaveLength(1);
      expect(body.events[0]).toMatchObject({ userId: 'alice', action: 'GET /api/audit/events' });
    });

    test('customers cannot read the audit trail', async () => {
      const res = await api(server, 'GET', '/api/audit/events', undefined, tokens.alice);
      expect(res.status).toBe(403);
    });

    test('limit above 200 is rejected', async () => {
      const res = await api(server, 'GET', '/api/audit/events?limit=500', undefined, tokens.sam);
      expect(res.status).toBe(400);
    });
  });

  describe('Configuration', () => {
    test('staff read the thresholds but cannot change them', async () => {
      const read = await api(server, 'GET', '/api/config/policy', undefined, tokens.sam);
      expect(await json<{ thresholds: Record<string, number> }>(read)).toEqual({
        thresholds: { confidenceFloor: 0.7, rejectFloor: 0.3, approveCeiling: 0.8, rewriteLow: 0.6 },
      });

      const write = await api(server, 'PUT', '/api/config/policy', { confidenceFloor: 0.9 }, tokens.sam);
      expect(write.status).toBe(403);
    });

    test('customers cannot read the thresholds', async () => {
      const res = await api(server, 'GET', '/api/config/policy', undefined, tokens.alice);
      expect(res.status).toBe(403);
    });

    test('admin update applies to the next decision and is audited', async () => {
      const res = await api(server, 'PUT', '/api/config/policy', { confidenceFloor: 0.95 }, tokens.ada);
      expect(res.status).toBe(200);
      expect((await json<{ thresholds: { confidenceFloor: number } }>(res)).thresholds.confidenceFloor).toBe(0.95);

      const change = harness.auditSink.last();
      expect(change?.eventType).toBe('config_change');
      expect(change?.details).toEqual({
        previous: { confidenceFloor: 0.7, rejectFloor: 0.3, approveCeiling: 0.8, rewriteLow: 0.6 },
        current: { confidenceFloor: 0.95, rejectFloor: 0.3, approveCeiling: 0.8, rewriteLow: 0.6 },
        requirement: 'PCI-DSS 10.2.2',
      });

      const message = await api(server, 'POST', '/api/agent/messages', { text: 'What is my balance?' }, tokens.alice);
      expect((await json<{ status: string }>(message)).status).toBe('escalated');
    });

    test('inconsistent thresholds are rejected and the old set stays', async () => {
      const res = await api(server, 'PUT', '/api/config/policy', { rejectFloor: 0.9 }, tokens.ada);
      expect(res.status).toBe(400);
      expect(harness.services.engine.getThresholds().rejectFloor).toBe(0.3);
    });

    test('unknown threshold names are rejected', async () => {
      const res = await api(server, 'PUT', '/api/config/policy', { approveEverything: 1 }, tokens.ada);
      expect(res.status).toBe(400);
    });
  });

  describe('Users', () => {
    test('admin lists users without password hashes', async () => {
      const res = await api(server, 'GET', '/api/users', undefined, tokens.ada);
      expect(res.status).toBe(200);

      const body = await json<{ users: Array<Record<string, unknown>> }>(res);
      expect(body.users).toHaveLength(6);
      expect(body.users[0]).toEqual({
        id: 'alice',
        email: 'alice@example.com',
        displayName: 'Alice Customer',
        role: 'user',
        storedRole: 'user',
        isActive: true,
      });
      expect(body.users.find((u) => u.id === 'mallory')).toMatchObject({ role: 'user', storedRole: 'superuser' });
    });

    test('staff cannot list users', async () => {
      const res = await api(server, 'GET', '/api/users', undefined, tokens.sam);
      expect(res.status).toBe(403);
    });
  });

  describe('Recorded reads', () => {
    const VIEW_ESCALATIONS = 'view_own_escalations|view_all_escalations';

    test('each protected read records who was granted what', async () => {
      const ticketId = await harness.services.ledger.create({
        userId: 'alice',
        inputText: 'please review',
        agentReasoning: 'low confidence',
        confidence: 0.5,
      });
      const reads: Array<[string, string, string, string, string]> = [
        [tokens.sam, '/api/escalations', 'GET /api/escalations', 'escalations', VIEW_ESCALATIONS],
        [tokens.sam, '/api/escalations/stats', 'GET /api/escalations/stats', 'escalation_stats', VIEW_ESCALATIONS],
        [tokens.sam, `/api/escalations/${ticketId}`, `GET /api/escalations/${ticketId}`, 'escalation', VIEW_ESCALATIONS],
        [tokens.sam, '/api/audit/events', 'GET /api/audit/events', 'audit_events', 'view_logs'],
        [tokens.sam, '/api/config/policy', 'GET /api/config/policy', 'policy_thresholds', 'view_config'],
        [tokens.ada, '/api/users', 'GET /api/users', 'users', 'manage_users'],
      ];

      for (const [token, path, action, resource, required] of reads) {
        const res = await api(server, 'GET', path, undefined, token);
        expect(res.status).toBe(200);

        const grant = harness.auditSink.last();
        expect(grant?.eventType).toBe('access_granted');
        expect(grant?.action).toBe(action);
        expect(grant?.success).toBe(true);
        expect(grant?.details).toEqual({
          resource,
          role: token === tokens.ada ? 'admin' : 'staff',
          required,
          control: 'SOC2 CC6.1',
        });
      }
      expect(harness.auditSink.ofType('access_granted')).toHaveLength(reads.length);
    });

    test('a customer reading their own tickets is recorded too', async () => {
      await api(server, 'GET', '/api/escalations', undefined, tokens.alice);
      expect(harness.auditSink.last()).toMatchObject({ eventType: 'access_granted', userId: 'alice' });
    });

    test('a read whose grant cannot be recorded is refused with 503', async () => {
      harness.auditSink.failOn = 'access_granted';
      const res = await api(server, 'GET', '/api/escalations', undefined, tokens.sam);
      expect(res.status).toBe(503);
      expect(harness.auditSink.ofType('access_granted')).toHaveLength(0);
    });

    test('a denied read records no grant', async () => {
      await api(server, 'GET', '/api/users', undefined, tokens.sam);
      expect(harness.auditSink.ofType('access_granted')).toHaveLength(0);
      expect(harness.auditSink.last()?.eventType).toBe('access_denied');
    });
  });
});
