/// <reference path="../types/express.d.ts" />
// =============================================================================
// BASTION — Authentication Middleware
//
// Verifies the bearer JWT and attaches the Principal to the request.
// The role claim is parsed on every request; an unrecognised value falls
// back to 'user' and is logged, never rejected and never elevated.
// =============================================================================

import { Request, Response, NextFunction, RequestHandler } from 'express';
import jwt from 'jsonwebtoken';
import { AppConfig } from '../config';
import { parseRole } from '../authorization/permissions';
import { Principal, tokenPayloadSchema } from '../types/auth';
import { Logger } from '../types/logger';

/**
 * Sign a token for a principal. Lifetime comes from config
 * (JWT_EXPIRY_SECONDS, default 15 minutes).
 */
export function issueToken(principal: Principal, jwtConfig: AppConfig['jwt']): string {
  return jwt.sign(
    { sub: principal.id, role: principal.role, name: principal.displayName },
    jwtConfig.secret,
    { algorithm: 'HS256', expiresIn: jwtConfig.expirySeconds }
  );
}

/**
 * Authenticate incoming requests via JWT Bearer token.
 */
export function authenticate(jwtConfig: AppConfig['jwt'], logger: Logger = console): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    const authHeader = req.headers.authorization;
    if (!authHeader?.startsWith('Bearer ')) {
      res.status(401).json({ error: 'Authentication required' });
      return;
    }

    const token = authHeader.slice(7);

    let decoded: unknown;
    try {
      decoded = jwt.verify(token, jwtConfig.secret, { algorithms: ['HS256'] });
    } catch (err: unknown) {
      if (err instanceof Error && err.name === 'TokenExpiredError') {
        res.status(401).json({ error: 'Token expired' });
      } else {
        res.status(401).json({ error: 'Invalid token' });
      }
      return;
    }

    const payload = tokenPayloadSchema.safeParse(decoded);
    if (!payload.success) {
      res.status(401).json({ error: 'Invalid token' });
      return;
    }

    const { sub, role, name } = payload.data;
    req.principal = {
      id: sub,
      role: parseRole(role, (raw) => {
        logger.warn(`[Auth] Unrecognised role '${String(raw)}' for ${sub}; using 'user'`);
      }),
      displayName: name ?? sub,
    };

    next();
  };
}

/**
 * The authenticated principal. Only valid behind authenticate().
 */
export function principalOf(req: Request): Principal {
  if (!req.principal) {
    throw new Error('principalOf() called on an unauthenticated route');
  }
  return req.principal;
}
