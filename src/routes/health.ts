import { Router, Request, Response } from 'express';
import { Db } from '../services/database';

/**
 * GET /health
 * Health check endpoint, including a round trip to the database
 */
export function createHealthRouter(db: Db): Router {
  const router = Router();

  router.get('/', (req: Request, res: Response) => {
    let database: 'ok' | 'unavailable' = 'ok';
    try {
      db.prepare('SELECT 1').get();
    } catch {
      database = 'unavailable';
    }

    res.status(database === 'ok' ? 200 : 503).json({
      ok: database === 'ok',
      version: '1.0.0',
      database,
      timestamp: new Date().toISOString(),
    });
  });

  return router;
}
