// =============================================================================
// BASTION — Configuration Routes
//
// Read and replace the policy thresholds in force. A change applies to
// decisions made after it returns and is recorded as config_change.
// =============================================================================

import { Router, Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { authenticate, principalOf } from '../middleware/authenticate';
import { requirePermission, requireRecordedAccess } from '../middleware/permission-guard';
import { Services } from '../services';
import { CONTROLS } from '../services/audit';
import { parseWith } from './validate';

const thresholdsPatchSchema = z
  .object({
    confidenceFloor: z.number(),
    rejectFloor: z.number(),
    approveCeiling: z.number(),
    rewriteLow: z.number(),
  })
  .partial()
  .strict();

export function configRoutes(services: Services): Router {
  const { engine, audit } = services;
  const router = Router();

  router.use(authenticate(services.config.jwt, services.logger));

  /**
   * GET /api/config/policy
   */
  router.get(
    '/policy',
    requireRecordedAccess(audit, 'policy_thresholds', 'view_config'),
    (_req: Request, res: Response) => {
      res.json({ thresholds: engine.getThresholds() });
    }
  );

  /**
   * PUT /api/config/policy
   * Body: any subset of the thresholds. The merged set is validated as a
   * whole; a rejected update leaves the current set in force.
   */
  router.put(
    '/policy',
    requirePermission(audit, 'modify_config'),
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const principal = principalOf(req);
        const patch = parseWith(thresholdsPatchSchema, req.body, 'policy thresholds');
        const previous = engine.getThresholds();
        const thresholds = engine.updateThresholds({ ...previous, ...patch });

        await audit.record({
          eventType: 'config_change',
          userId: principal.id,
          action: 'update_policy_thresholds',
          details: { previous, current: thresholds, requirement: CONTROLS.privilegedAction },
        });
        services.logger.info(`[Config] Policy thresholds updated by ${principal.id}`);

        res.json({ thresholds });
      } catch (err) {
        next(err);
      }
    }
  );

  return router;
}
