/// <reference path="../types/express.d.ts" />
// =============================================================================
// BASTION — Security Middleware
//
// Covers what helmet, cors and express-rate-limit do not:
//   - Request IDs for tracing
//   - Request sanitization (null bytes)
//   - Error handling (typed kinds → HTTP status, no stacks in production)
// =============================================================================

import { Request, Response, NextFunction, RequestHandler, ErrorRequestHandler } from 'express';
import { v4 as uuidv4 } from 'uuid';
import { ErrorKind, isGovernanceError, InvalidInputError } from '../errors';
import { Logger } from '../types/logger';

// ── Input Validation ───────────────────────────────────────────────────

/**
 * Strip null bytes from every string in the JSON body.
 */
export function requestSanitization(): RequestHandler {
  return (req: Request, _res: Response, next: NextFunction) => {
    req.body = sanitize(req.body);
    next();
  };
}

function sanitize(value: unknown): unknown {
  if (typeof value === 'string') {
    return value.replace(/\0/g, '');
  }
  if (Array.isArray(value)) {
    return value.map(sanitize);
  }
  if (value !== null && typeof value === 'object') {
    const out: Record<string, unknown> = {};
    for (const [key, entry] of Object.entries(value)) {
      out[key] = sanitize(entry);
    }
    return out;
  }
  return value;
}

// ── Request ID ─────────────────────────────────────────────────────────

/**
 * Assign a unique request ID for tracing. A caller-supplied X-Request-ID
 * is kept when it is short and printable.
 */
export function requestId(): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    const supplied = req.get('X-Request-ID');
    const id = supplied && /^[\w.-]{1,64}$/.test(supplied) ? supplied : `bst-${uuidv4()}`;
    res.set('X-Request-ID', id);
    req.requestId = id;
    next();
  };
}

// ── Error Handler ──────────────────────────────────────────────────────

const STATUS_BY_KIND: Readonly<Record<ErrorKind, number>> = {
  AccessDenied: 403,
  InvalidRole: 400,
  InvalidInput: 400,
  StorageUnavailable: 503,
  ScorerUnavailable: 503,
};

/** express.json() rejects unparseable bodies with a SyntaxError carrying status 400 */
function isBodyParseError(err: unknown): boolean {
  return err instanceof SyntaxError && 'status' in err && err.status === 400;
}

export function notFound(): RequestHandler {
  return (_req: Request, res: Response) => {
    res.status(404).json({ error: 'Not found' });
  };
}

/**
 * Global error handler. Never leaks stack traces in production.
 */
export function errorHandler(logger: Logger = console, nodeEnv = 'development'): ErrorRequestHandler {
  const isProd = nodeEnv === 'production';

  return (err: unknown, req: Request, res: Response, _next: NextFunction) => {
    if (isBodyParseError(err)) {
      res.status(400).json({ error: 'Malformed JSON body' });
      return;
    }

    if (isGovernanceError(err)) {
      const status = STATUS_BY_KIND[err.kind];
      if (status >= 500) {
        logger.error(`[Error] ${req.requestId ?? '-'} ${err.kind}: ${err.message}`);
      }
      res.status(status).json({
        error: status >= 500 && isProd ? 'Service temporarily unavailable' : err.message,
        kind: err.kind,
        ...(err instanceof InvalidInputError && err.issues.length > 0 ? { issues: err.issues } : {}),
      });
      return;
    }

    const message = err instanceof Error ? err.message : String(err);
    const stack = err instanceof Error ? err.stack : undefined;
    logger.error(`[Error] ${req.requestId ?? '-'} ${message}`, isProd ? '' : stack);

    res.status(500).json({
      error: isProd ? 'Internal server error' : message,
      ...(isProd ? {} : { stack }),
    });
  };
}
