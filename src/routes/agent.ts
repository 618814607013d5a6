/// <reference path="../types/express.d.ts" />
// =============================================================================
// BASTION — Agent Routes
//
// The governed entry point: one customer utterance (plus an optional tool
// intent) through risk scoring, policy decision and tool dispatch.
// =============================================================================

import { Router, Request, Response, NextFunction } from 'express';
import { authenticate, principalOf } from '../middleware/authenticate';
import { requirePermission } from '../middleware/permission-guard';
import { Services } from '../services';
import { PipelineOutcome, agentRequestSchema } from '../services/pipeline';
import { parseWith } from './validate';

const STATUS_BY_OUTCOME: Readonly<Record<PipelineOutcome['status'], number>> = {
  proceed: 200,
  refused: 200,
  escalated: 202,
  escalation_failed: 503,
};

export function agentRoutes(services: Services): Router {
  const router = Router();

  router.use(authenticate(services.config.jwt, services.logger));

  /**
   * POST /api/agent/messages
   * Body: { text, tool?: { name, args? } }
   */
  router.post(
    '/messages',
    requirePermission(services.audit, 'use_agent'),
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const request = parseWith(agentRequestSchema, req.body, 'agent message');
        const outcome = await services.pipeline.handle(principalOf(req), request);

        res.status(STATUS_BY_OUTCOME[outcome.status]).json({
          ...outcome,
          requestId: req.requestId,
        });
      } catch (err) {
        next(err);
      }
    }
  );

  return router;
}
