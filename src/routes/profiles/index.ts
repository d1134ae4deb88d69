// =============================================================================
// CASE EVALUATION — Profile Routes
//
// Role Directory administration. Callers provision their own profile;
// everything else about other people's profiles is admin-only.
// =============================================================================

import { Router, Request, Response, NextFunction } from 'express';
import { authenticate, requireCaller } from '../../middleware/authenticate';
import { Services } from '../../services';
import { ROLES } from '../../types/roles';
import { publicProfile, queryEnum } from '../helpers';

export function profileRoutes(services: Services): Router {
  const router = Router();

  router.use(authenticate);

  /**
   * GET /api/profiles
   * Query params:
   *   role: admin | navigator
   */
  router.get('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const caller = requireCaller(req);
      const role = queryEnum(req, 'role', ROLES);
      const profiles = await services.profiles.listProfiles(caller.id, { role });
      res.json({ profiles: profiles.map(publicProfile) });
    } catch (err) {
      next(err);
    }
  });

  /**
   * POST /api/profiles
   * Body: { id, role, fullName, pin? }
   */
  router.post('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const caller = requireCaller(req);
      const profile = await services.profiles.createProfile(caller.id, req.body);
      res.status(201).json({ profile: publicProfile(profile) });
    } catch (err) {
      next(err);
    }
  });

  router.get('/:id', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const caller = requireCaller(req);
      const profile = await services.profiles.getProfile(caller.id, req.params.id);
      res.json({ profile: publicProfile(profile) });
    } catch (err) {
      next(err);
    }
  });

  /**
   * PATCH /api/profiles/:id
   * Body: any of { role, fullName, pin }. Admin only.
   */
  router.patch('/:id', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const caller = requireCaller(req);
      const profile = await services.profiles.updateProfile(caller.id, req.params.id, req.body);
      res.json({ profile: publicProfile(profile) });
    } catch (err) {
      next(err);
    }
  });

  router.delete('/:id', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const caller = requireCaller(req);
      await services.profiles.deleteProfile(caller.id, req.params.id);
      res.status(204).end();
    } catch (err) {
      next(err);
    }
  });

  return router;
}
