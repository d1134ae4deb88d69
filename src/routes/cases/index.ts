// =============================================================================
// CASE EVALUATION — Case Catalog Routes
// =============================================================================

import { Router, Request, Response, NextFunction } from 'express';
import { authenticate, requireCaller } from '../../middleware/authenticate';
import { Services } from '../../services';
import { queryString } from '../helpers';

export function caseRoutes(services: Services): Router {
  const router = Router();

  router.use(authenticate);

  /**
   * GET /api/cases
   * Ordered by the number in the case label.
   *
   * Query params:
   *   batchId: restrict to one import batch
   */
  router.get('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const caller = requireCaller(req);
      const cases = await services.cases.listCases(caller.id, { batchId: queryString(req, 'batchId') });
      res.json({ cases });
    } catch (err) {
      next(err);
    }
  });

  router.post('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const caller = requireCaller(req);
      const created = await services.cases.createCase(caller.id, req.body);
      res.status(201).json({ case: created });
    } catch (err) {
      next(err);
    }
  });

  /**
   * POST /api/cases/import
   * Body: { batchId, cases: [...] }. All or nothing.
   */
  router.post('/import', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const caller = requireCaller(req);
      const cases = await services.cases.importCases(caller.id, req.body);
      res.status(201).json({ imported: cases.length, cases });
    } catch (err) {
      next(err);
    }
  });

  router.get('/:id', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const caller = requireCaller(req);
      const found = await services.cases.getCase(caller.id, req.params.id);
      res.json({ case: found });
    } catch (err) {
      next(err);
    }
  });

  router.patch('/:id', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const caller = requireCaller(req);
      const updated = await services.cases.updateCase(caller.id, req.params.id, req.body);
      res.json({ case: updated });
    } catch (err) {
      next(err);
    }
  });

  router.delete('/:id', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const caller = requireCaller(req);
      await services.cases.deleteCase(caller.id, req.params.id);
      res.status(204).end();
    } catch (err) {
      next(err);
    }
  });

  return router;
}
