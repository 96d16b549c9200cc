import { Router, Request, Response, NextFunction } from 'express';
import { Services } from '../container';
import { bookingRequestSchema, cancelRequestSchema } from '../schemas/request';
import { Booking, CancelActor } from '../types';
import { formatPhoneDisplay } from '../utils/phone';
import { formatSlotLabel } from '../utils/time';

/**
 * What the student sees after booking: who, when, and how to reach the tutor
 */
function presentConfirmation(services: Services, booking: Booking) {
  const tutor = services.tutorRepository.get(booking.tutorId);
  const subject = services.subjects.get(booking.subjectId);
  return {
    id: booking.id,
    subject_id: booking.subjectId,
    subject_name: subject?.name ?? booking.subjectId,
    date: booking.date,
    start_time: booking.startTime,
    end_time: booking.endTime,
    label: formatSlotLabel(booking.date, booking.startTime),
    tutor: tutor ? { name: tutor.name, phone: formatPhoneDisplay(tutor.phone) } : null,
    student_name: booking.studentName,
    status: booking.status,
  };
}

export function createBookingsRouter(services: Services): Router {
  const router = Router();

  /**
   * POST /api/bookings
   * Request: { subject_id, date, slot: "HH:MM-HH:MM", student_name, student_phone }
   * 201 on success; 400 VALIDATION_ERROR; 409 SLOT_UNAVAILABLE or TUTOR_CONFLICT
   */
  router.post('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = bookingRequestSchema.parse(req.body);
      const result = await services.coordinator.book({
        subjectId: body.subject_id,
        date: body.date,
        slot: body.slot,
        student: { name: body.student_name, phone: body.student_phone },
      });

      if (!result.ok) {
        res.status(result.error.code === 'VALIDATION_ERROR' ? 400 : 409).json(result);
        return;
      }

      res.status(201).json({
        ok: true,
        booking: presentConfirmation(services, result.booking),
        warnings: result.warnings,
      });
    } catch (error) {
      next(error);
    }
  });

  /**
   * POST /api/bookings/:id/cancel
   * Request: { actor: { role: "admin" } | { role: "tutor", tutor_id }, reason? }
   * Cancelling twice is a no-op that reports changed: false
   */
  router.post('/:id/cancel', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = cancelRequestSchema.parse(req.body);
      const actor: CancelActor =
        body.actor.role === 'admin' ? { role: 'admin' } : { role: 'tutor', tutorId: body.actor.tutor_id };

      const outcome = await services.coordinator.cancel(req.params.id, actor, body.reason);
      res.json({
        ok: true,
        booking: outcome.booking,
        changed: outcome.changed,
        warnings: outcome.warnings,
      });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
