import { Router, Request, Response, NextFunction } from 'express';
import { Services } from '../container';
import {
  availabilityWindowSchema,
  blackoutSchema,
  createTutorSchema,
  tutorActiveSchema,
  tutorSubjectsSchema,
} from '../schemas/request';
import { NewWindow } from '../services/tutorRepository';

/**
 * Tutor management: profile, subjects, recurring and one-off availability,
 * blackouts, and the tutor's own booking view.
 */
export function createTutorsRouter(services: Services): Router {
  const router = Router();
  const tutors = services.tutors;

  router.get('/', (req: Request, res: Response, next: NextFunction) => {
    try {
      res.json({ ok: true, tutors: tutors.list() });
    } catch (error) {
      next(error);
    }
  });

  /**
   * POST /api/tutors
   * Request: { name, phone, subject_ids: [] }
   */
  router.post('/', (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = createTutorSchema.parse(req.body);
      const tutor = tutors.create(
        { name: body.name, phone: body.phone, subjectIds: body.subject_ids },
        services.clock.now()
      );
      res.status(201).json({ ok: true, tutor });
    } catch (error) {
      next(error);
    }
  });

  router.put('/:id/subjects', (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = tutorSubjectsSchema.parse(req.body);
      res.json({ ok: true, tutor: tutors.setSubjects(req.params.id, body.subject_ids) });
    } catch (error) {
      next(error);
    }
  });

  router.post('/:id/active', (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = tutorActiveSchema.parse(req.body);
      res.json({ ok: true, tutor: tutors.setActive(req.params.id, body.active) });
    } catch (error) {
      next(error);
    }
  });

  router.delete('/:id', (req: Request, res: Response, next: NextFunction) => {
    try {
      tutors.delete(req.params.id);
      res.status(204).end();
    } catch (error) {
      next(error);
    }
  });

  /**
   * POST /api/tutors/:id/availability
   * Request: { kind: "weekly", weekday: 0-6 (Monday = 0), start_time, end_time }
   *       or { kind: "dated", date, start_time, end_time }
   */
  router.post('/:id/availability', (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = availabilityWindowSchema.parse(req.body);
      const window: NewWindow =
        body.kind === 'weekly'
          ? { kind: 'weekly', weekday: body.weekday, startTime: body.start_time, endTime: body.end_time }
          : { kind: 'dated', date: body.date, startTime: body.start_time, endTime: body.end_time };
      res.status(201).json({ ok: true, window: tutors.addWindow(req.params.id, window) });
    } catch (error) {
      next(error);
    }
  });

  router.delete('/:id/availability/:windowId', (req: Request, res: Response, next: NextFunction) => {
    try {
      tutors.removeWindow(req.params.id, req.params.windowId);
      res.status(204).end();
    } catch (error) {
      next(error);
    }
  });

  /**
   * POST /api/tutors/:id/blackouts
   * Request: { start_date, end_date?, start_time?, end_time?, note? }
   * Without times the blackout removes whole days.
   */
  router.post('/:id/blackouts', (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = blackoutSchema.parse(req.body);
      const blackout = tutors.addBlackout(req.params.id, {
        startDate: body.start_date,
        endDate: body.end_date ?? body.start_date,
        startTime: body.start_time ?? null,
        endTime: body.end_time ?? null,
        note: body.note || null,
      });
      res.status(201).json({ ok: true, blackout });
    } catch (error) {
      next(error);
    }
  });

  router.delete('/:id/blackouts/:blackoutId', (req: Request, res: Response, next: NextFunction) => {
    try {
      tutors.removeBlackout(req.params.id, req.params.blackoutId);
      res.status(204).end();
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /api/tutors/:id/bookings
   * Dashboard: upcoming sessions, recent cancellations, windows and blackouts
   */
  router.get('/:id/bookings', (req: Request, res: Response, next: NextFunction) => {
    try {
      res.json({ ok: true, ...tutors.dashboard(req.params.id, services.clock.now()) });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
