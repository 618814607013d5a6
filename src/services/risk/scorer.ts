// =============================================================================
// BASTION — Risk Scorer Interface
//
// The scorer is an external oracle (ML classifier, LLM judge). The core
// only depends on this shape. Scores are role-aware: the same text may
// score differently for staff and for a customer, so the principal goes
// into every call and results are never cached across principals.
// =============================================================================

import { ScorerUnavailableError } from '../../errors';
import { Principal } from '../../types/auth';
import { RiskAnalysis } from '../../types/risk';

export interface RiskScorer {
  readonly name: string;
  /** `signal` aborts when the caller stops waiting; stop work when it does */
  score(text: string, principal: Principal, signal?: AbortSignal): Promise<RiskAnalysis>;
}

/**
 * Stand-in for deployments with no scorer configured. Every call fails,
 * so every request degrades to the unsafe defaults and escalates.
 */
export class UnconfiguredRiskScorer implements RiskScorer {
  readonly name = 'unconfigured';

  async score(): Promise<RiskAnalysis> {
    throw new ScorerUnavailableError('No risk scorer configured (set RISK_SCORER_URL)');
  }
}
