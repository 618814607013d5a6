// =============================================================================
// BASTION — Risk Assessor
//
// Wraps a RiskScorer with a time bound and a bounded number of attempts.
// A timed-out attempt is cancelled through its AbortSignal.
// On failure or timeout it returns the degraded analysis: every score at
// the unsafe extreme. It never reports a failed scoring call as safe.
//
// All attempts happen here, before any decision exists. Nothing re-scores
// after the policy engine has ruled.
// =============================================================================

import { ScorerUnavailableError, describeError } from '../../errors';
import { Principal } from '../../types/auth';
import { Logger } from '../../types/logger';
import { RiskAnalysis, RiskAssessment } from '../../types/risk';
import { RiskScorer } from './scorer';

export const SCORER_UNAVAILABLE_FACTOR = 'scorer_unavailable';

export function degradedAnalysis(reason: string): RiskAnalysis {
  return {
    safetyScore: 0,
    complianceScore: 0,
    confidence: 0,
    violatedRules: [],
    riskFactors: [SCORER_UNAVAILABLE_FACTOR],
    analysis: `Risk scoring unavailable: ${reason}`,
  };
}

export interface RiskAssessorOptions {
  timeoutMs: number;
  maxAttempts: number;
  logger?: Logger;
}

export class RiskAssessor {
  private readonly timeoutMs: number;
  private readonly maxAttempts: number;
  private readonly logger: Logger;

  constructor(private readonly scorer: RiskScorer, options: RiskAssessorOptions) {
    this.timeoutMs = options.timeoutMs;
    this.maxAttempts = Math.max(1, options.maxAttempts);
    this.logger = options.logger ?? console;
  }

  async assess(text: string, principal: Principal): Promise<RiskAssessment> {
    let lastError = 'no attempt made';

    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      try {
        const analysis = await this.withTimeout((signal) => this.scorer.score(text, principal, signal));
        return { analysis, degraded: false, attempts: attempt };
      } catch (err: unknown) {
        lastError = describeError(err);
        this.logger.warn(
          `[Risk] Scorer '${this.scorer.name}' attempt ${attempt}/${this.maxAttempts} failed: ${lastError}`
        );
      }
    }

    return {
      analysis: degradedAnalysis(lastError),
      degraded: true,
      attempts: this.maxAttempts,
      error: lastError,
    };
  }

  /**
   * Run one attempt. On timeout the attempt's signal is aborted before the
   * next attempt starts, so a slow scorer never has two calls in flight.
   */
  private withTimeout<T>(work: (signal: AbortSignal) => Promise<T>): Promise<T> {
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_resolve, reject) => {
      timer = setTimeout(() => {
        const err = new ScorerUnavailableError(`Risk scorer timed out after ${this.timeoutMs}ms`);
        controller.abort(err);
        reject(err);
      }, this.timeoutMs);
    });

    return Promise.race([work(controller.signal), timeout]).finally(() => clearTimeout(timer));
  }
}
