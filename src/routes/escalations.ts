// =============================================================================
// BASTION — Escalation Routes
//
// The human review queue. Visibility follows the ledger's rules: customers
// see their own tickets, staff and admins see every ticket, only holders
// of resolve_escalations close them.
// =============================================================================

import { Router, Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { authenticate, principalOf } from '../middleware/authenticate';
import { requirePermission, requireRecordedAccess } from '../middleware/permission-guard';
import { UnauditedWriteError } from '../errors';
import { Services } from '../services';
import { VIEW_ESCALATION_PERMISSIONS } from '../services/escalation/ledger';
import { TICKET_STATUSES } from '../types/escalation';
import { parseWith } from './validate';

const listQuerySchema = z.object({
  status: z.enum(TICKET_STATUSES).optional(),
});

const resolveSchema = z.object({
  note: z.string().trim().min(1, 'Resolution note required').max(2000),
  outcome: z.enum(['approved', 'rejected', 'resolved']).default('resolved'),
});

export function escalationRoutes(services: Services): Router {
  const { ledger, audit } = services;
  const router = Router();
  const canView = (resource: string) => requireRecordedAccess(audit, resource, ...VIEW_ESCALATION_PERMISSIONS);

  router.use(authenticate(services.config.jwt, services.logger));

  /**
   * GET /api/escalations?status=pending
   */
  router.get('/', canView('escalations'), async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { status } = parseWith(listQuerySchema, req.query, 'query');
      const tickets = await ledger.list(principalOf(req), status);
      res.json({ tickets, count: tickets.length });
    } catch (err) {
      next(err);
    }
  });

  /**
   * GET /api/escalations/stats
   * Counts over the tickets the caller can see.
   */
  router.get('/stats', canView('escalation_stats'), async (req: Request, res: Response, next: NextFunction) => {
    try {
      res.json(await ledger.stats(principalOf(req)));
    } catch (err) {
      next(err);
    }
  });

  /**
   * GET /api/escalations/:id
   * Invisible tickets are reported as not found.
   */
  router.get('/:id', canView('escalation'), async (req: Request, res: Response, next: NextFunction) => {
    try {
      const ticket = await ledger.get(principalOf(req), req.params.id);
      if (!ticket) {
        res.status(404).json({ error: 'Ticket not found' });
        return;
      }
      res.json(ticket);
    } catch (err) {
      next(err);
    }
  });

  /**
   * POST /api/escalations/:id/resolve
   * Body: { note, outcome? }. A ticket resolves at most once.
   */
  router.post(
    '/:id/resolve',
    requirePermission(audit, 'resolve_escalations'),
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const principal = principalOf(req);
        const { note, outcome } = parseWith(resolveSchema, req.body, 'resolution');

        const ticket = await ledger.get(principal, req.params.id);
        if (!ticket) {
          res.status(404).json({ error: 'Ticket not found' });
          return;
        }

        let resolved: boolean;
        try {
          resolved = await ledger.resolve(principal, ticket.id, note, outcome);
        } catch (err) {
          // Stored but not audited: the resolution stands.
          if (!(err instanceof UnauditedWriteError)) throw err;
          resolved = true;
        }
        if (!resolved) {
          // Re-read: another resolution may have landed since the lookup above.
          const current = await ledger.get(principal, ticket.id);
          res.status(409).json({ error: 'Ticket already resolved', status: current?.status ?? null });
          return;
        }

        res.json({ id: ticket.id, status: outcome, resolvedBy: principal.id });
      } catch (err) {
        next(err);
      }
    }
  );

  return router;
}
