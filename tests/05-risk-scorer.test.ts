// =============================================================================
// BASTION — Test Suite 05: Risk Scoring
//
// The scorer is external. The assessor bounds each call in time, retries
// before any decision exists, and fails to the unsafe extreme.
// =============================================================================

import express from 'express';
import { DEFAULT_THRESHOLDS } from '../src/config';
import { ScorerUnavailableError } from '../src/errors';
import { PolicyEngine } from '../src/services/policy/engine';
import { RiskAssessor, SCORER_UNAVAILABLE_FACTOR } from '../src/services/risk/assessor';
import { HttpRiskScorer } from '../src/services/risk/http-scorer';
import { RiskScorer, UnconfiguredRiskScorer } from '../src/services/risk/scorer';
import { Principal } from '../src/types/auth';
import { RiskAnalysis } from '../src/types/risk';
import { ALICE, SAM, SAFE, StubScorer, silentLogger } from './fakes';
import { listen, TestServer } from './helpers';

function assessor(scorer: RiskScorer, timeoutMs = 50) {
  const logger = silentLogger();
  return { logger, assessor: new RiskAssessor(scorer, { timeoutMs, maxAttempts: 2, logger }) };
}

describe('Risk Assessor', () => {
  test('successful scoring is passed through', async () => {
    const { assessor: subject } = assessor(new StubScorer(SAFE));
    const result = await subject.assess('balance please', ALICE);
    expect(result).toEqual({ analysis: SAFE, degraded: false, attempts: 1 });
  });

  test('every call carries the principal', async () => {
    const scorer = new StubScorer(SAFE);
    const { assessor: subject } = assessor(scorer);
    await subject.assess('show all tickets', SAM);
    await subject.assess('show all tickets', ALICE);
    expect(scorer.calls.map((c) => c.principal.role)).toEqual(['staff', 'user']);
  });

  test('a transient failure is retried', async () => {
    let calls = 0;
    const scorer = new StubScorer(() => {
      calls += 1;
      if (calls === 1) throw new Error('connection reset');
      return SAFE;
    });
    const { assessor: subject, logger } = assessor(scorer);

    const result = await subject.assess('hello', ALICE);
    expect(result.degraded).toBe(false);
    expect(result.attempts).toBe(2);
    expect(logger.warn).toHaveBeenCalledWith("[Risk] Scorer 'stub' attempt 1/2 failed: connection reset");
  });

  test('persistent failure degrades to the unsafe extreme', async () => {
    const scorer = new StubScorer(() => {
      throw new Error('model offline');
    });
    const { assessor: subject } = assessor(scorer);

    const result = await subject.assess('hello', ALICE);
    expect(result.degraded).toBe(true);
    expect(result.attempts).toBe(2);
    expect(result.error).toBe('model offline');
    expect(result.analysis).toEqual({
      safetyScore: 0,
      complianceScore: 0,
      confidence: 0,
      violatedRules: [],
      riskFactors: [SCORER_UNAVAILABLE_FACTOR],
      analysis: 'Risk scoring unavailable: model offline',
    });
    expect(scorer.calls).toHaveLength(2);
  });

  test('a scorer that never answers times out and degrades', async () => {
    const scorer = new StubScorer(() => new Promise<RiskAnalysis>(() => undefined));
    const { assessor: subject } = assessor(scorer, 20);

    const result = await subject.assess('hello', ALICE);
    expect(result.degraded).toBe(true);
    expect(result.error).toBe('Risk scorer timed out after 20ms');
  });

  test('a timed-out attempt is aborted before the next one starts', async () => {
    const signals: AbortSignal[] = [];
    let active = 0;
    let peak = 0;
    const hanging: RiskScorer = {
      name: 'hanging',
      score(_text, _principal, signal) {
        if (!signal) return Promise.reject(new Error('no abort signal'));
        const attempt: AbortSignal = signal;
        signals.push(attempt);
        active += 1;
        peak = Math.max(peak, active);
        return new Promise<RiskAnalysis>((_resolve, reject) => {
          attempt.addEventListener('abort', () => {
            active -= 1;
            reject(new Error('aborted'));
          });
        });
      },
    };
    const { assessor: subject } = assessor(hanging, 20);

    const result = await subject.assess('hello', ALICE);
    expect(result.degraded).toBe(true);
    expect(result.error).toBe('Risk scorer timed out after 20ms');
    expect(signals).toHaveLength(2);
    expect(signals.every((s) => s.aborted)).toBe(true);
    expect(peak).toBe(1);
    expect(active).toBe(0);
  });

  test('a degraded analysis escalates', async () => {
    const { assessor: subject } = assessor(new UnconfiguredRiskScorer());
    const result = await subject.assess('hello', ALICE);

    const decision = new PolicyEngine(DEFAULT_THRESHOLDS).decide({
      analysis: result.analysis,
      principal: ALICE,
      text: 'hello',
    });
    expect(decision.action).toBe('escalate');
    expect(decision.params.reason).toBe('low_confidence');
  });
});

describe('HTTP Risk Scorer', () => {
  let server: TestServer;
  const received: Array<{ text: string; principal: { id: string; role: string; display_name: string } }> = [];
  let reply: { status: number; body: unknown } = { status: 200, body: {} };

  beforeAll(async () => {
    const app = express();
    app.use(express.json());
    app.post('/score', (req, res) => {
      received.push(req.body);
      res.status(reply.status).json(reply.body);
    });
    app.post('/slow', (_req, res) => {
      setTimeout(() => res.status(200).json({}), 200);
    });
    server = await listen(app);
  });

  afterAll(async () => {
    await server.close();
  });

  beforeEach(() => {
    received.length = 0;
  });

  const principal: Principal = { id: 'alice', role: 'user', displayName: 'Alice Customer' };

  test('posts text and principal, maps the snake_case reply', async () => {
    reply = {
      status: 200,
      body: {
        safety_score: 0.9,
        compliance_score: 0.8,
        confidence: 0.95,
        violated_rules: [],
        risk_factors: ['account_data'],
        analysis: 'balance inquiry',
        suggested_rewrite: 'Show my balance',
      },
    };
    const scorer = new HttpRiskScorer(`${server.baseUrl}/score`, 1000);

    const result = await scorer.score('what is my balance', principal);
    expect(result).toEqual({
      safetyScore: 0.9,
      complianceScore: 0.8,
      confidence: 0.95,
      violatedRules: [],
      riskFactors: ['account_data'],
      analysis: 'balance inquiry',
      suggestedRewrite: 'Show my balance',
    });
    expect(received).toEqual([
      { text: 'what is my balance', principal: { id: 'alice', role: 'user', display_name: 'Alice Customer' } },
    ]);
  });

  test('optional reply fields default', async () => {
    reply = { status: 200, body: { safety_score: 0.5, compliance_score: 0.5, confidence: 0.5 } };
    const scorer = new HttpRiskScorer(`${server.baseUrl}/score`, 1000);

    const result = await scorer.score('hi', principal);
    expect(result.violatedRules).toEqual([]);
    expect(result.riskFactors).toEqual([]);
    expect(result.analysis).toBe('');
  });

  test('HTTP error status is ScorerUnavailable', async () => {
    reply = { status: 500, body: { error: 'boom' } };
    const scorer = new HttpRiskScorer(`${server.baseUrl}/score`, 1000);
    await expect(scorer.score('hi', principal)).rejects.toThrow('Risk scorer returned HTTP 500');
  });

  test('out-of-range scores are ScorerUnavailable', async () => {
    reply = { status: 200, body: { safety_score: 2, compliance_score: 0.5, confidence: 0.5 } };
    const scorer = new HttpRiskScorer(`${server.baseUrl}/score`, 1000);
    await expect(scorer.score('hi', principal)).rejects.toBeInstanceOf(ScorerUnavailableError);
  });

  test('unreachable scorer is ScorerUnavailable', async () => {
    const scorer = new HttpRiskScorer('http://127.0.0.1:1/score', 1000);
    await expect(scorer.score('hi', principal)).rejects.toThrow(/^Risk scorer unreachable: /);
  });

  test('an aborted signal cancels the request', async () => {
    const scorer = new HttpRiskScorer(`${server.baseUrl}/slow`, 1000);
    const controller = new AbortController();
    setTimeout(() => controller.abort(), 20);

    await expect(scorer.score('hi', principal, controller.signal)).rejects.toThrow(
      'Risk scorer unreachable: The user aborted a request.'
    );
  });

  test('an HTTP scorer failing behind the assessor degrades', async () => {
    reply = { status: 503, body: {} };
    const { assessor: subject } = assessor(new HttpRiskScorer(`${server.baseUrl}/score`, 1000));
    const result = await subject.assess('hi', principal);
    expect(result.degraded).toBe(true);
    expect(received).toHaveLength(2);
  });
});
