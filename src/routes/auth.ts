// =============================================================================
// CASE EVALUATION — Authentication Routes
//
// Identity itself comes from the external provider's bearer token.
// These routes report who the caller is and offer the secondary PIN
// check used by the rating UI.
// =============================================================================

import { Router, Request, Response, NextFunction } from 'express';
import { authenticate, requireCaller } from '../middleware/authenticate';
import { isEvaluationError } from '../errors';
import { Services } from '../services';
import { publicProfile } from './helpers';

export function authRoutes(services: Services): Router {
  const router = Router();

  router.use(authenticate);

  /**
   * GET /api/auth/session
   * The caller's ID and profile, or a null profile when none exists yet.
   */
  router.get('/session', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const caller = requireCaller(req);
      try {
        const profile = await services.profiles.getProfile(caller.id, caller.id);
        res.json({ callerId: caller.id, profile: publicProfile(profile) });
      } catch (err: unknown) {
        if (!isEvaluationError(err, 'NOT_FOUND')) throw err;
        res.json({ callerId: caller.id, profile: null });
      }
    } catch (err) {
      next(err);
    }
  });

  /**
   * POST /api/auth/pin/verify
   * Body: { pin }
   */
  router.post('/pin/verify', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const caller = requireCaller(req);
      const verified = await services.profiles.verifyPin(caller.id, req.body?.pin);
      if (!verified) {
        console.warn(`[Auth] PIN verification failed for ${caller.id}`);
      }
      res.json({ verified });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
