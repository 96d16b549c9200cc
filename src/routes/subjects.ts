import { Router, Request, Response, NextFunction } from 'express';
import { Services } from '../container';
import { groupSubjects } from '../services/subjectRepository';

/**
 * GET /api/subjects
 * Subject catalog grouped by category, in display order
 */
export function createSubjectsRouter(services: Services): Router {
  const router = Router();

  router.get('/', (req: Request, res: Response, next: NextFunction) => {
    try {
      res.json({
        ok: true,
        categories: groupSubjects(services.subjects.list()),
      });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
