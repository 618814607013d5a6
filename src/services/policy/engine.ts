// =============================================================================
// BASTION — Policy Decision Engine
//
// Maps one RiskAnalysis (plus the principal it was scored for) to exactly
// one of approve / reject / rewrite / escalate. First matching rule wins:
//
//   1. confidence < confidenceFloor                      → escalate
//   2. safety < rejectFloor                              → reject
//   3. safety ≥ approveCeiling ∧ compliance ≥ ceiling    → approve
//   4. safety ∈ [rewriteLow, approveCeiling),
//      phrasing-only concerns, rewrite available         → rewrite
//   5. anything else                                     → escalate
//
// Fails closed: a malformed analysis or an internal error produces an
// escalate decision, never an approve. No I/O, no state between requests
// beyond the threshold set.
// =============================================================================

import { InvalidInputError, describeError } from '../../errors';
import { Principal } from '../../types/auth';
import { Decision, EscalationReason, PolicyThresholds } from '../../types/decision';
import { RiskAnalysis, riskAnalysisSchema } from '../../types/risk';

export interface DecisionInput {
  /** Validated here; anything malformed fails closed */
  analysis: unknown;
  principal: Principal;
  /** The request text, needed only to produce a rewrite */
  text: string;
}

/**
 * Produces the rewritten request for the rewrite branch. Returning
 * undefined or an empty string means no rewrite is possible, and the
 * request escalates instead.
 */
export type Rewriter = (text: string, analysis: RiskAnalysis) => string | undefined;

/** Default rewriter: the scorer's own suggested rephrasing */
export const suggestedRewrite: Rewriter = (_text, analysis) => analysis.suggestedRewrite;

export function validateThresholds(thresholds: PolicyThresholds): PolicyThresholds {
  const issues: string[] = [];
  for (const [name, value] of Object.entries(thresholds)) {
    if (typeof value !== 'number' || !Number.isFinite(value) || value < 0 || value > 1) {
      issues.push(`${name} must be a number in [0, 1]`);
    }
  }
  if (thresholds.rejectFloor > thresholds.rewriteLow) {
    issues.push('rejectFloor must not exceed rewriteLow');
  }
  if (thresholds.rewriteLow > thresholds.approveCeiling) {
    issues.push('rewriteLow must not exceed approveCeiling');
  }
  if (issues.length > 0) {
    throw new InvalidInputError('Invalid policy thresholds', issues);
  }
  return { ...thresholds };
}

export class PolicyEngine {
  private thresholds: PolicyThresholds;

  constructor(
    thresholds: PolicyThresholds,
    private readonly rewriter: Rewriter = suggestedRewrite,
  ) {
    this.thresholds = validateThresholds(thresholds);
  }

  getThresholds(): PolicyThresholds {
    return { ...this.thresholds };
  }

  /**
   * Replace the threshold set. Validated as a whole; on error the old set
   * stays in force.
   */
  updateThresholds(next: PolicyThresholds): PolicyThresholds {
    this.thresholds = validateThresholds(next);
    return this.getThresholds();
  }

  decide(input: DecisionInput): Decision {
    try {
      const parsed = riskAnalysisSchema.safeParse(input.analysis);
      if (!parsed.success) {
        const fields = parsed.error.issues.map((i) => i.path.join('.') || i.message);
        return escalate('internal_error', `Malformed risk analysis (${fields.join(', ')}). Escalating for human review.`);
      }
      return this.evaluate(parsed.data, input.principal, input.text);
    } catch (err: unknown) {
      return escalate(
        'internal_error',
        `Error during decision making: ${describeError(err)}. Escalating for human review.`
      );
    }
  }

  private evaluate(analysis: RiskAnalysis, principal: Principal, text: string): Decision {
    const t = this.thresholds;
    const { safetyScore, complianceScore, confidence } = analysis;
    const scores = `safety=${safetyScore.toFixed(2)}, compliance=${complianceScore.toFixed(2)}, confidence=${confidence.toFixed(2)}`;

    if (confidence < t.confidenceFloor) {
      return escalate(
        'low_confidence',
        `Confidence ${confidence.toFixed(2)} is below ${t.confidenceFloor} for ${principal.role} request (${scores}).`
      );
    }

    if (safetyScore < t.rejectFloor) {
      return {
        action: 'reject',
        params: { violated_rules: analysis.violatedRules.join(',') },
        reasoning: `Safety score below ${t.rejectFloor} (${scores}).${formatRules(analysis)}`,
      };
    }

    if (safetyScore >= t.approveCeiling && complianceScore >= t.approveCeiling) {
      return {
        action: 'approve',
        params: {},
        reasoning: `Safety and compliance at or above ${t.approveCeiling} (${scores}).`,
      };
    }

    if (safetyScore >= t.rewriteLow && safetyScore < t.approveCeiling && this.isPhrasingOnly(analysis)) {
      const rewritten = this.rewriter(text, analysis)?.trim();
      if (rewritten) {
        return {
          action: 'rewrite',
          params: { rewritten_text: rewritten },
          reasoning: `Valid intent with phrasing concerns (${scores}); proceeding with rewritten request.`,
        };
      }
    }

    return escalate(
      'unclassified',
      `Request not cleanly classified (${scores}).${formatRules(analysis)} Escalating for human review.`
    );
  }

  /** No rule violated and compliance only mildly reduced */
  private isPhrasingOnly(analysis: RiskAnalysis): boolean {
    return analysis.violatedRules.length === 0 && analysis.complianceScore >= this.thresholds.rewriteLow;
  }
}

function escalate(reason: EscalationReason, reasoning: string): Decision {
  return { action: 'escalate', params: { reason }, reasoning };
}

function formatRules(analysis: RiskAnalysis): string {
  return analysis.violatedRules.length > 0
    ? ` Violated rules: ${analysis.violatedRules.join(', ')}.`
    : '';
}
