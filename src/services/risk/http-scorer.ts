// =============================================================================
// BASTION — HTTP Risk Scorer Client
//
// POSTs the request text and principal context to a remote scoring service
// and validates the reply. Any failure surfaces as ScorerUnavailableError;
// deciding what to do about it is RiskAssessor's job.
// =============================================================================

import fetch from 'node-fetch';
import { ScorerUnavailableError, describeError } from '../../errors';
import { Principal } from '../../types/auth';
import { RiskAnalysis, scorerReplySchema } from '../../types/risk';
import { RiskScorer } from './scorer';

export class HttpRiskScorer implements RiskScorer {
  readonly name = 'http';

  constructor(
    private readonly url: string,
    private readonly requestTimeoutMs: number,
  ) {}

  async score(text: string, principal: Principal, signal?: AbortSignal): Promise<RiskAnalysis> {
    let body: unknown;

    try {
      const response = await fetch(this.url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({
          text,
          principal: {
            id: principal.id,
            role: principal.role,
            display_name: principal.displayName,
          },
        }),
        timeout: this.requestTimeoutMs,
        signal,
      });

      if (!response.ok) {
        throw new ScorerUnavailableError(`Risk scorer returned HTTP ${response.status}`);
      }

      body = await response.json();
    } catch (err: unknown) {
      if (err instanceof ScorerUnavailableError) throw err;
      throw new ScorerUnavailableError(`Risk scorer unreachable: ${describeError(err)}`, err);
    }

    const parsed = scorerReplySchema.safeParse(body);
    if (!parsed.success) {
      throw new ScorerUnavailableError(
        `Risk scorer reply malformed: ${parsed.error.issues.map((i) => i.path.join('.') || i.message).join(', ')}`
      );
    }
    return parsed.data;
  }
}
