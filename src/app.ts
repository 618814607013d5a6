// =============================================================================
// BASTION — Express Application
//
// Route architecture:
//
//   /api/health            — Health check (unauthenticated)
//   /api/auth/*            — Login and whoami
//   /api/agent/*           — Governed agent messages (use_agent)
//   /api/tools/*           — Direct tool invocation, gated per tool
//   /api/escalations/*     — Human review queue
//   /api/audit/*           — Audit trail (view_logs)
//   /api/config/*          — Policy thresholds (view_config / modify_config)
//   /api/users             — User listing (manage_users)
//
// Built from injected services so tests run it against in-memory stores.
// =============================================================================

import express from 'express';
import helmet from 'helmet';
import cors from 'cors';
import rateLimit from 'express-rate-limit';
import { describeError } from './errors';
import { Services } from './services';
import { errorHandler, notFound, requestId, requestSanitization } from './middleware/security';
import { agentRoutes } from './routes/agent';
import { auditRoutes } from './routes/audit';
import { authRoutes } from './routes/auth';
import { configRoutes } from './routes/config';
import { escalationRoutes } from './routes/escalations';
import { toolRoutes } from './routes/tools';
import { userRoutes } from './routes/users';

export const SERVICE_NAME = 'bastion';
export const SERVICE_VERSION = '0.3.0';

export interface AppOptions {
  services: Services;
  /** Throws when the backing store is unreachable */
  healthCheck?: () => Promise<void>;
}

export function createApp({ services, healthCheck }: AppOptions): express.Express {
  const { config, logger } = services;
  const app = express();

  // ── Security Middleware ──────────────────────────────────────────────

  app.use(helmet());
  app.use(cors({
    origin: config.corsOrigins.length > 0
      ? config.corsOrigins
      : config.nodeEnv === 'development',
    credentials: true,
  }));
  app.use(express.json({ limit: '1mb' }));
  app.use(requestId());
  app.use(requestSanitization());

  const authLimiter = rateLimit({
    windowMs: 15 * 60 * 1000,
    limit: config.rateLimit.authMax,
    message: { error: 'Too many authentication attempts. Try again later.' },
    standardHeaders: true,
    legacyHeaders: false,
  });

  const apiLimiter = rateLimit({
    windowMs: 60 * 1000,
    limit: config.rateLimit.apiMax,
    standardHeaders: true,
    legacyHeaders: false,
  });

  // ── Routes ───────────────────────────────────────────────────────────

  const startTime = Date.now();

  app.get('/api/health', async (_req, res) => {
    const checks: Record<string, { status: string; latencyMs?: number; error?: string }> = {};

    const dbStart = Date.now();
    if (healthCheck) {
      try {
        await healthCheck();
        checks.database = { status: 'healthy', latencyMs: Date.now() - dbStart };
      } catch (err) {
        checks.database = { status: 'unhealthy', latencyMs: Date.now() - dbStart, error: describeError(err) };
      }
    } else {
      checks.database = { status: 'unconfigured' };
    }

    checks.scorer = { status: config.scorer.url ? 'configured' : 'unconfigured' };

    const healthy = checks.database.status !== 'unhealthy';
    res.status(healthy ? 200 : 503).json({
      status: healthy ? 'healthy' : 'degraded',
      service: SERVICE_NAME,
      version: SERVICE_VERSION,
      uptime: Math.floor((Date.now() - startTime) / 1000),
      checks,
      timestamp: new Date().toISOString(),
    });
  });

  app.use('/api/auth', authLimiter, authRoutes(services));
  app.use('/api/agent', apiLimiter, agentRoutes(services));
  app.use('/api/tools', apiLimiter, toolRoutes(services));
  app.use('/api/escalations', apiLimiter, escalationRoutes(services));
  app.use('/api/audit', apiLimiter, auditRoutes(services));
  app.use('/api/config', apiLimiter, configRoutes(services));
  app.use('/api/users', apiLimiter, userRoutes(services));

  // ── Fallthrough ──────────────────────────────────────────────────────

  app.use(notFound());
  app.use(errorHandler(logger, config.nodeEnv));

  return app;
}
