// =============================================================================
// CASE EVALUATION — Session & Rating Routes
//
//   /api/sessions                               list / start
//   /api/sessions/:id                           detail / delete
//   /api/sessions/:id/overall-score             PUT
//   /api/sessions/:id/complete                  POST
//   /api/sessions/:id/ratings/:format           list
//   /api/sessions/:id/ratings/:format/:index    PUT / DELETE
//
// :format is format-1 (timeline), format-2 (tactic) or format-3 (boundary).
// =============================================================================

import { Router, Request, Response, NextFunction } from 'express';
import { authenticate, requireCaller } from '../../middleware/authenticate';
import { Services } from '../../services';
import { SessionStatus } from '../../types/evaluation';
import { indexParam, queryEnum, queryString, ratingFormatParam } from '../helpers';

const SESSION_STATUSES: readonly SessionStatus[] = ['in_progress', 'completed'];

export function sessionRoutes(services: Services): Router {
  const router = Router();

  router.use(authenticate);

  /**
   * GET /api/sessions
   * Query params:
   *   caseId, navigatorId, status (in_progress | completed)
   */
  router.get('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const caller = requireCaller(req);
      const sessions = await services.sessions.listSessions(caller.id, {
        caseId: queryString(req, 'caseId'),
        navigatorId: queryString(req, 'navigatorId'),
        status: queryEnum(req, 'status', SESSION_STATUSES),
      });
      res.json({ sessions });
    } catch (err) {
      next(err);
    }
  });

  /**
   * POST /api/sessions
   * Body: { caseId, navigatorId? }. 409 if the navigator already has a
   * session on the case.
   */
  router.post('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const caller = requireCaller(req);
      const session = await services.sessions.startSession(caller.id, req.body);
      res.status(201).json({ session });
    } catch (err) {
      next(err);
    }
  });

  router.get('/:id', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const caller = requireCaller(req);
      const detail = await services.sessions.getSessionDetail(caller.id, req.params.id);
      res.json(detail);
    } catch (err) {
      next(err);
    }
  });

  router.delete('/:id', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const caller = requireCaller(req);
      await services.sessions.deleteSession(caller.id, req.params.id);
      res.status(204).end();
    } catch (err) {
      next(err);
    }
  });

  /**
   * PUT /api/sessions/:id/overall-score
   * Body: { overallFieldAuthenticity } (integer 1–5)
   */
  router.put('/:id/overall-score', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const caller = requireCaller(req);
      const session = await services.sessions.submitOverallScore(
        caller.id,
        req.params.id,
        req.body?.overallFieldAuthenticity
      );
      res.json({ session });
    } catch (err) {
      next(err);
    }
  });

  /**
   * POST /api/sessions/:id/complete
   * Body: { overallFieldAuthenticity? }
   */
  router.post('/:id/complete', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const caller = requireCaller(req);
      const session = await services.sessions.completeSession(caller.id, req.params.id, {
        overallFieldAuthenticity: req.body?.overallFieldAuthenticity,
      });
      res.json({ session });
    } catch (err) {
      next(err);
    }
  });

  // ── Ratings ──────────────────────────────────────────────────────────

  router.get('/:id/ratings/:format', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const caller = requireCaller(req);
      const format = ratingFormatParam(req.params.format);
      const ratings = await services.ratings.listRatings(caller.id, req.params.id, format);
      res.json({ ratings });
    } catch (err) {
      next(err);
    }
  });

  /**
   * PUT /api/sessions/:id/ratings/:format/:index
   * Body: the rating fields for the format. Idempotent by index.
   */
  router.put('/:id/ratings/:format/:index', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const caller = requireCaller(req);
      const format = ratingFormatParam(req.params.format);
      const rating = await services.ratings.upsertRating(
        caller.id,
        req.params.id,
        format,
        indexParam(req.params.index),
        req.body
      );
      res.json({ rating });
    } catch (err) {
      next(err);
    }
  });

  router.delete('/:id/ratings/:format/:index', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const caller = requireCaller(req);
      const format = ratingFormatParam(req.params.format);
      await services.ratings.deleteRating(caller.id, req.params.id, format, indexParam(req.params.index));
      res.status(204).end();
    } catch (err) {
      next(err);
    }
  });

  return router;
}
