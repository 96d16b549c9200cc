import { Router, Request, Response, NextFunction } from 'express';
import { Services } from '../container';
import { adminBookingsQuerySchema } from '../schemas/request';

export function createAdminRouter(services: Services): Router {
  const router = Router();

  /**
   * GET /api/admin/bookings?status=confirmed|cancelled
   * Ordered by session date and start time
   */
  router.get('/bookings', (req: Request, res: Response, next: NextFunction) => {
    try {
      const query = adminBookingsQuerySchema.parse(req.query);
      const bookings = services.bookingRepository.list(query.status);
      res.json({ ok: true, count: bookings.length, bookings });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
