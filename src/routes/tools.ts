// =============================================================================
// BASTION — Tool Routes
//
// Direct tool invocation, for callers that already know what they want
// (listing their own escalations, a balance lookup). Each call goes
// through the same gate the pipeline uses.
// =============================================================================

import { Router, Request, Response, NextFunction } from 'express';
import { authenticate, principalOf } from '../middleware/authenticate';
import { Services } from '../services';
import { ToolFailureReason } from '../services/tools/definitions';

const STATUS_BY_REASON: Readonly<Record<ToolFailureReason, number>> = {
  access_denied: 403,
  invalid_input: 400,
  not_found: 404,
  rejected: 422,
  storage_unavailable: 503,
};

export function toolRoutes(services: Services): Router {
  const { dispatcher } = services;
  const router = Router();

  router.use(authenticate(services.config.jwt, services.logger));

  /**
   * GET /api/tools
   * Tools the caller's role may invoke.
   */
  router.get('/', (req: Request, res: Response) => {
    res.json({ tools: dispatcher.visibleTools(principalOf(req)) });
  });

  /**
   * POST /api/tools/:name
   * Body: the tool's arguments.
   */
  router.post('/:name', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const result = await dispatcher.invoke(principalOf(req), req.params.name, req.body ?? {});
      res.status(result.ok ? 200 : STATUS_BY_REASON[result.reason]).json(result);
    } catch (err) {
      next(err);
    }
  });

  return router;
}
