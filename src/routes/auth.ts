/// <reference path="../types/express.d.ts" />
// =============================================================================
// BASTION — Authentication Routes
//
// Password login issuing a short-lived bearer token, and a whoami.
// Both outcomes of a login attempt are audited.
// =============================================================================

import { Router, Request, Response, NextFunction } from 'express';
import bcrypt from 'bcryptjs';
import { z } from 'zod';
import { getPermissions, parseRole } from '../authorization/permissions';
import { authenticate, issueToken, principalOf } from '../middleware/authenticate';
import { Services } from '../services';
import { CONTROLS } from '../services/audit';
import { Principal } from '../types/auth';
import { ROLE_DESCRIPTIONS } from '../types/roles';
import { parseWith } from './validate';

const loginSchema = z.object({
  email: z.string().trim().min(1, 'Email required'),
  password: z.string().min(1, 'Password required'),
});

export function authRoutes(services: Services): Router {
  const { audit, users, config, logger } = services;
  const router = Router();

  /**
   * POST /api/auth/login
   * Authenticate with email and password. Returns JWT.
   */
  router.post('/login', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { email, password } = parseWith(loginSchema, req.body, 'login request');

      const user = await users.findByEmail(email);
      const passwordValid = user !== null && user.isActive && (await bcrypt.compare(password, user.passwordHash));

      if (!user || !passwordValid) {
        await audit.record({
          eventType: 'auth_failure',
          userId: user?.id ?? 'anonymous',
          action: 'login',
          success: false,
          details: {
            email,
            reason: !user ? 'unknown_user' : user.isActive ? 'bad_password' : 'inactive',
            requirement: CONTROLS.authentication,
          },
        });
        res.status(401).json({ error: 'Invalid credentials' });
        return;
      }

      const principal: Principal = {
        id: user.id,
        role: parseRole(user.role, (raw) => {
          logger.warn(`[Auth] Stored role '${String(raw)}' for ${user.id} is not recognised; using 'user'`);
        }),
        displayName: user.displayName,
      };
      const token = issueToken(principal, config.jwt);

      await audit.record({
        eventType: 'auth_success',
        userId: principal.id,
        action: 'login',
        details: { role: principal.role, ip: req.ip ?? null, requirement: CONTROLS.authentication },
      });

      res.json({
        token,
        expiresIn: config.jwt.expirySeconds,
        user: { id: user.id, email: user.email, displayName: user.displayName, role: principal.role },
      });
    } catch (err) {
      next(err);
    }
  });

  /**
   * GET /api/auth/me
   * The authenticated principal and the permissions its role carries.
   */
  router.get('/me', authenticate(config.jwt, logger), (req: Request, res: Response) => {
    const principal = principalOf(req);
    res.json({
      principal,
      roleDescription: ROLE_DESCRIPTIONS[principal.role],
      permissions: [...getPermissions(principal.role)],
    });
  });

  return router;
}
