import { Router, Request, Response, NextFunction } from 'express';
import { Services } from '../container';
import { availabilityQuerySchema } from '../schemas/request';
import { checkBookingWindow } from '../services/bookingWindow';
import { formatSlotToken, formatTimeLabel } from '../utils/time';

export const NO_SLOTS_MESSAGE = 'No sessions available on that date. Please choose another.';

/**
 * GET /api/availability?subject_id=...&date=YYYY-MM-DD
 *
 * Response: { ok, subject_id, date, slots: [{ value, label, tutor_count }], message? }
 * `value` is the slot token to send back when booking.
 */
export function createAvailabilityRouter(services: Services): Router {
  const router = Router();

  router.get('/', (req: Request, res: Response, next: NextFunction) => {
    try {
      const query = availabilityQuerySchema.parse(req.query);
      const subject = services.resolver.requireSubject(query.subject_id);

      const window = checkBookingWindow(query.date, services.clock.now(), services.bookingWindow);
      if (!window.allowed) {
        res.json({
          ok: true,
          subject_id: subject.id,
          date: query.date,
          slots: [],
          earliest_date: window.earliest,
          message: window.message,
        });
        return;
      }

      const slots = services.resolver.resolve(subject.id, query.date);
      res.json({
        ok: true,
        subject_id: subject.id,
        date: query.date,
        slots: slots.map((slot) => ({
          value: formatSlotToken(slot.startTime, slot.endTime),
          label: formatTimeLabel(slot.startTime),
          tutor_count: slot.eligibleTutors.length,
        })),
        ...(slots.length === 0 && { message: NO_SLOTS_MESSAGE }),
      });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
