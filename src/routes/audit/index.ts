// =============================================================================
// BASTION — Audit Routes
//
// Read-only access to the audit trail for holders of view_logs.
// There is no write or delete route; events only enter through the
// services that produce them.
// =============================================================================

import { Router, Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { authenticate } from '../../middleware/authenticate';
import { requireRecordedAccess } from '../../middleware/permission-guard';
import { Services } from '../../services';
import { MAX_AUDIT_QUERY_LIMIT } from '../../services/audit';
import { AUDIT_EVENT_TYPES } from '../../types/audit';
import { parseWith } from '../validate';

const eventQuerySchema = z.object({
  eventType: z.enum(AUDIT_EVENT_TYPES).optional(),
  userId: z.string().min(1).optional(),
  limit: z.coerce.number().int().min(1).max(MAX_AUDIT_QUERY_LIMIT).default(50),
});

export function auditRoutes(services: Services): Router {
  const router = Router();

  router.use(authenticate(services.config.jwt, services.logger));

  /**
   * GET /api/audit/events
   * Query params:
   *   eventType   — e.g. 'access_denied', 'policy_decision'
   *   userId      — filter by principal
   *   limit       — max results (default 50, max 200)
   */
  router.get(
    '/events',
    requireRecordedAccess(services.audit, 'audit_events', 'view_logs'),
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const query = parseWith(eventQuerySchema, req.query, 'query');
        const events = await services.audit.query(query);
        res.json({ events, limit: query.limit });
      } catch (err) {
        next(err);
      }
    }
  );

  return router;
}
