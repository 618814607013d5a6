// =============================================================================
// BASTION — Policy Decisions
// =============================================================================

export const DECISION_ACTIONS = ['approve', 'reject', 'rewrite', 'escalate'] as const;

export type DecisionAction = (typeof DECISION_ACTIONS)[number];

/** Why an escalate decision was produced */
export type EscalationReason = 'low_confidence' | 'unclassified' | 'internal_error';

export interface Decision {
  action: DecisionAction;
  /** Action parameters. rewrite always carries a non-empty rewritten_text. */
  params: Readonly<Record<string, string>>;
  reasoning: string;
}

export interface PolicyThresholds {
  /** Below this confidence the engine escalates regardless of scores */
  confidenceFloor: number;
  /** Below this safety score the engine rejects */
  rejectFloor: number;
  /** Safety and compliance at or above this are approved */
  approveCeiling: number;
  /** Lower bound of the rewrite band [rewriteLow, approveCeiling) */
  rewriteLow: number;
}
