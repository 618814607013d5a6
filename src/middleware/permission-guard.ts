/// <reference path="../types/express.d.ts" />
// =============================================================================
// BASTION — Permission Guard Middleware
//
// Verifies the authenticated principal holds at least one of the required
// permissions. Used on individual routes:
//   requirePermission(audit, 'view_own_escalations', 'view_all_escalations')
// Denials are audited before the 403 goes out. Read routes whose handler
// records nothing of its own use requireRecordedAccess, which audits the
// grant as well.
// =============================================================================

import { Request, Response, NextFunction, RequestHandler } from 'express';
import { checkAnyPermission } from '../authorization/access-control';
import { AccessDeniedError } from '../errors';
import { AuditTrail, CONTROLS } from '../services/audit';
import { Permission } from '../types/roles';

/**
 * Must be used AFTER authenticate middleware.
 */
export function requirePermission(audit: AuditTrail, ...permissions: Permission[]): RequestHandler {
  return guard(audit, permissions);
}

/**
 * requirePermission that also records an access_granted event naming the
 * resource. If the grant cannot be recorded the read does not happen.
 */
export function requireRecordedAccess(
  audit: AuditTrail,
  resource: string,
  ...permissions: Permission[]
): RequestHandler {
  return guard(audit, permissions, resource);
}

function guard(audit: AuditTrail, permissions: Permission[], resource?: string): RequestHandler {
  return async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    const principal = req.principal;
    if (!principal) {
      res.status(401).json({ error: 'Authentication required' });
      return;
    }

    const action = `${req.method} ${routePath(req)}`;

    if (checkAnyPermission(principal, permissions, false)) {
      if (resource === undefined) {
        next();
        return;
      }
      try {
        await audit.record({
          eventType: 'access_granted',
          userId: principal.id,
          action,
          details: {
            resource,
            role: principal.role,
            required: permissions.join('|'),
            control: CONTROLS.accessControl,
          },
        });
      } catch (err) {
        next(err);
        return;
      }
      next();
      return;
    }

    const denial = new AccessDeniedError(principal.id, principal.role, permissions);
    try {
      await audit.record({
        eventType: 'access_denied',
        userId: principal.id,
        action,
        success: false,
        details: { role: principal.role, required: permissions.join('|') },
        error: denial.message,
      });
    } catch (err) {
      next(err);
      return;
    }
    next(denial);
  };
}

/** Mount path plus route path, without the trailing slash of a router root */
function routePath(req: Request): string {
  const path = `${req.baseUrl}${req.path}`;
  return path.length > 1 ? path.replace(/\/$/, '') : path;
}
