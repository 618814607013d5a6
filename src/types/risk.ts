// =============================================================================
// BASTION — Risk Analysis
//
// Produced once per request by the external scorer, consumed once by the
// policy engine. Scores are in [0, 1]; higher is safer.
// =============================================================================

import { z } from 'zod';

const unitScore = z.number().finite().min(0).max(1);

export const riskAnalysisSchema = z.object({
  safetyScore: unitScore,
  complianceScore: unitScore,
  confidence: unitScore,
  violatedRules: z.array(z.string()),
  riskFactors: z.array(z.string()),
  analysis: z.string(),
  /** Optional rephrasing proposed by the scorer, used by the rewrite branch */
  suggestedRewrite: z.string().optional(),
});

export type RiskAnalysis = Readonly<z.infer<typeof riskAnalysisSchema>>;

/**
 * Wire shape returned by a remote scorer (snake_case).
 */
export const scorerReplySchema = z
  .object({
    safety_score: unitScore,
    compliance_score: unitScore,
    confidence: unitScore,
    violated_rules: z.array(z.string()).default([]),
    risk_factors: z.array(z.string()).default([]),
    analysis: z.string().default(''),
    suggested_rewrite: z.string().optional(),
  })
  .transform((reply): RiskAnalysis => ({
    safetyScore: reply.safety_score,
    complianceScore: reply.compliance_score,
    confidence: reply.confidence,
    violatedRules: reply.violated_rules,
    riskFactors: reply.risk_factors,
    analysis: reply.analysis,
    suggestedRewrite: reply.suggested_rewrite,
  }));

/** Result of a guarded scoring call */
export interface RiskAssessment {
  analysis: RiskAnalysis;
  /** True when the scorer failed and the unsafe defaults were substituted */
  degraded: boolean;
  attempts: number;
  error?: string;
}
