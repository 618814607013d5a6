// =============================================================================
// BASTION — User Routes
// =============================================================================

import { Router, Request, Response, NextFunction } from 'express';
import { parseRole } from '../authorization/permissions';
import { authenticate } from '../middleware/authenticate';
import { requireRecordedAccess } from '../middleware/permission-guard';
import { Services } from '../services';

export function userRoutes(services: Services): Router {
  const router = Router();

  router.use(authenticate(services.config.jwt, services.logger));

  /**
   * GET /api/users
   * Every user with the role they are treated as. Password hashes never
   * leave the store layer.
   */
  router.get(
    '/',
    requireRecordedAccess(services.audit, 'users', 'manage_users'),
    async (_req: Request, res: Response, next: NextFunction) => {
      try {
        const users = await services.users.list();
        res.json({
          users: users.map((u) => ({
            id: u.id,
            email: u.email,
            displayName: u.displayName,
            role: parseRole(u.role),
            storedRole: u.role,
            isActive: u.isActive,
          })),
        });
      } catch (err) {
        next(err);
      }
    }
  );

  return router;
}
