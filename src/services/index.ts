// =============================================================================
// BASTION — Service Container
//
// Builds the governance core from its collaborators. server.ts passes pg
// repositories; tests pass in-memory ones through the same interfaces.
// =============================================================================

import { Pool } from 'pg';
import { AppConfig } from '../config';
import { Logger } from '../types/logger';
import { AuditSink, AuditTrail, PgAuditSink } from './audit';
import { BankingRepository, PgBankingRepository } from './banking/repository';
import { EscalationLedger } from './escalation/ledger';
import { EscalationRepository, PgEscalationRepository } from './escalation/repository';
import { GovernancePipeline } from './pipeline';
import { PolicyEngine, Rewriter, suggestedRewrite } from './policy/engine';
import { RiskAssessor } from './risk/assessor';
import { HttpRiskScorer } from './risk/http-scorer';
import { RiskScorer, UnconfiguredRiskScorer } from './risk/scorer';
import { ToolDispatcher } from './tools/dispatcher';
import { PgUserRepository, UserRepository } from './users';

export interface ServiceDeps {
  config: AppConfig;
  auditSink: AuditSink;
  escalations: EscalationRepository;
  banking: BankingRepository;
  users: UserRepository;
  scorer: RiskScorer;
  rewriter?: Rewriter;
  logger?: Logger;
  clock?: () => Date;
}

export interface Services {
  config: AppConfig;
  audit: AuditTrail;
  ledger: EscalationLedger;
  engine: PolicyEngine;
  assessor: RiskAssessor;
  dispatcher: ToolDispatcher;
  pipeline: GovernancePipeline;
  users: UserRepository;
  logger: Logger;
}

export function createServices(deps: ServiceDeps): Services {
  const logger = deps.logger ?? console;
  const clock = deps.clock ?? (() => new Date());

  const audit = new AuditTrail(deps.auditSink, clock);
  const ledger = new EscalationLedger({ repository: deps.escalations, audit, logger, clock });
  const engine = new PolicyEngine(deps.config.policy, deps.rewriter ?? suggestedRewrite);
  const assessor = new RiskAssessor(deps.scorer, {
    timeoutMs: deps.config.scorer.timeoutMs,
    maxAttempts: deps.config.scorer.maxAttempts,
    logger,
  });
  const dispatcher = new ToolDispatcher({ banking: deps.banking, ledger, audit, clock }, undefined, logger);
  const pipeline = new GovernancePipeline({ assessor, engine, ledger, dispatcher, audit, logger });

  return {
    config: deps.config,
    audit,
    ledger,
    engine,
    assessor,
    dispatcher,
    pipeline,
    users: deps.users,
    logger,
  };
}

/** Production wiring: PostgreSQL stores and the configured scorer */
export function createPgServices(pool: Pool, config: AppConfig, logger: Logger = console): Services {
  const scorer: RiskScorer = config.scorer.url
    ? new HttpRiskScorer(config.scorer.url, config.scorer.timeoutMs)
    : new UnconfiguredRiskScorer();

  if (!config.scorer.url) {
    logger.warn('[Risk] RISK_SCORER_URL not set; every request will escalate');
  }

  return createServices({
    config,
    auditSink: new PgAuditSink(pool),
    escalations: new PgEscalationRepository(pool),
    banking: new PgBankingRepository(pool, logger),
    users: new PgUserRepository(pool),
    scorer,
    logger,
  });
}
