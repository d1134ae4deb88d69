// =============================================================================
// CASE EVALUATION — Progress Routes
// =============================================================================

import { Router, Request, Response, NextFunction } from 'express';
import { authenticate, requireCaller } from '../../middleware/authenticate';
import { Services } from '../../services';

export function progressRoutes(services: Services): Router {
  const router = Router();

  router.use(authenticate);

  /**
   * GET /api/progress/navigators
   * Completed, in-progress and remaining counts per navigator. Admin only.
   */
  router.get('/navigators', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const caller = requireCaller(req);
      const navigators = await services.progress.navigatorProgress(caller.id);
      res.json({ navigators });
    } catch (err) {
      next(err);
    }
  });

  /**
   * GET /api/progress/me
   * The caller's in-progress sessions, pending cases and completed sessions.
   */
  router.get('/me', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const caller = requireCaller(req);
      const queue = await services.progress.myQueue(caller.id);
      res.json(queue);
    } catch (err) {
      next(err);
    }
  });

  return router;
}
