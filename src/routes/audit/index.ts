// =============================================================================
// CASE EVALUATION — Audit Routes
//
// Read-only access to the audit trail. Admin only.
// =============================================================================

import { Router, Request, Response, NextFunction } from 'express';
import { authenticate, requireCaller } from '../../middleware/authenticate';
import { Services } from '../../services';
import { AuditTargetType } from '../../types/audit';
import { queryEnum, queryInt, queryString } from '../helpers';

const TARGET_TYPES: readonly AuditTargetType[] = ['profile', 'synthetic_case', 'evaluation_session'];

export function auditRoutes(services: Services): Router {
  const router = Router();

  router.use(authenticate);

  /**
   * GET /api/audit/events
   * Newest first.
   *
   * Query params:
   *   eventType  : e.g., 'session.completed', 'case.imported'
   *   actorId    : filter by actor
   *   targetType : profile | synthetic_case | evaluation_session
   *   targetId   : filter by target entity ID
   *   limit      : max results (default 50, max 500)
   *   offset     : pagination offset
   */
  router.get('/events', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const caller = requireCaller(req);
      const limit = queryInt(req, 'limit');
      const offset = queryInt(req, 'offset');

      const events = await services.audit.query(caller.id, {
        eventType: queryString(req, 'eventType'),
        actorId: queryString(req, 'actorId'),
        targetType: queryEnum(req, 'targetType', TARGET_TYPES),
        targetId: queryString(req, 'targetId'),
        limit,
        offset,
      });

      res.json({ events, limit: limit ?? 50, offset: offset ?? 0 });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
