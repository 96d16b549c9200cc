/**
 * Booking transaction coordinator
 *
 * book(): inside one IMMEDIATE transaction, re-resolve the requested slot,
 * let the fairness selector pick a tutor, insert. The unique index on
 * (tutor, date, start) for confirmed rows is the authority; losing that race
 * retries the whole protocol once against the new state, then reports
 * TUTOR_CONFLICT. Waiting too long on another process's write lock counts as
 * losing the race. User-facing failures come back as a structured result.
 *
 * Texts go out after commit. The response waits at most notificationWaitMs
 * for them; anything slower finishes in the background and only gets logged.
 */

import { AvailabilityResolver } from './availabilityResolver';
import { BookingRepository } from './bookingRepository';
import { BookingWindowPolicy, checkBookingWindow } from './bookingWindow';
import { Db, isLockContention, isUniqueViolation } from './database';
import { FairnessSelector } from './fairnessSelector';
import { NotificationService } from './notificationService';
import { SubjectRepository } from './subjectRepository';
import { TutorRepository } from './tutorRepository';
import {
  Booking,
  BookingFailureCode,
  BookingId,
  BookingResult,
  CancelActor,
  IsoDate,
  StudentContact,
  Subject,
  SubjectId,
  TimeOfDay,
} from '../types';
import { Clock } from '../utils/clock';
import {
  SlotUnavailableError,
  TutorConflictError,
  ValidationError,
} from '../utils/errors';
import { logger } from '../utils/logger';
import { phoneDigits } from '../utils/phone';
import { isValidIsoDate, parseSlotToken, timeToMinutes } from '../utils/time';

const MAX_CANCEL_REASON = 255;

export const NOTIFICATIONS_PENDING_WARNING = 'Texts are still being sent and may arrive late';

export interface BookingRequest {
  subjectId: SubjectId;
  date: IsoDate;
  /** Slot token from the availability query, "HH:MM-HH:MM" */
  slot: string;
  student: StudentContact;
}

export interface CancelOutcome {
  booking: Booking;
  /** False when the booking was already cancelled */
  changed: boolean;
  warnings: string[];
}

export interface BookingCoordinatorDeps {
  db: Db;
  subjects: SubjectRepository;
  tutors: TutorRepository;
  bookings: BookingRepository;
  resolver: AvailabilityResolver;
  selector: FairnessSelector;
  notifications: NotificationService;
  clock: Clock;
  bookingWindow: BookingWindowPolicy;
  /** Total tries of the resolve-select-insert protocol */
  maxAttempts?: number;
  notificationWaitMs?: number;
}

interface ValidatedRequest {
  subject: Subject;
  date: IsoDate;
  startTime: TimeOfDay;
  endTime: TimeOfDay;
  student: StudentContact;
}

function failureCode(error: ValidationError | SlotUnavailableError | TutorConflictError): BookingFailureCode {
  if (error instanceof SlotUnavailableError) return 'SLOT_UNAVAILABLE';
  if (error instanceof TutorConflictError) return 'TUTOR_CONFLICT';
  return 'VALIDATION_ERROR';
}

export class BookingCoordinator {
  private readonly log = logger.child('booking');
  private readonly maxAttempts: number;
  private readonly notificationWaitMs: number;

  constructor(private readonly deps: BookingCoordinatorDeps) {
    this.maxAttempts = deps.maxAttempts ?? 2;
    this.notificationWaitMs = deps.notificationWaitMs ?? 2000;
  }

  async book(request: BookingRequest): Promise<BookingResult> {
    let booking: Booking;
    try {
      const validated = this.validate(request);
      booking = this.commit(validated);
    } catch (error) {
      if (
        error instanceof ValidationError ||
        error instanceof SlotUnavailableError ||
        error instanceof TutorConflictError
      ) {
        this.log.info('Booking rejected', {
          code: error.code,
          subjectId: request.subjectId,
          date: request.date,
          slot: request.slot,
        });
        return {
          ok: false,
          error: {
            code: failureCode(error),
            message: error.message,
            ...(error.details !== undefined && { details: error.details }),
          },
        };
      }
      throw error;
    }

    const warnings = await this.awaitNotifications(booking.id, this.notifyBooked(booking));
    return { ok: true, booking, warnings };
  }

  async cancel(bookingId: BookingId, actor: CancelActor, reason?: string | null): Promise<CancelOutcome> {
    const existing = this.deps.bookings.get(bookingId);
    if (!existing) {
      throw new ValidationError(`Unknown booking: ${bookingId}`);
    }
    if (actor.role === 'tutor' && existing.tutorId !== actor.tutorId) {
      throw new ValidationError("You cannot modify another tutor's booking.");
    }
    if (existing.status === 'cancelled') {
      return { booking: existing, changed: false, warnings: [] };
    }

    const trimmed = reason?.trim();
    const changed = this.deps.bookings.cancel(bookingId, {
      cancelledAt: this.deps.clock.now(),
      cancelledBy: actor.role,
      reason: trimmed ? trimmed.slice(0, MAX_CANCEL_REASON) : null,
    });

    const booking = this.deps.bookings.get(bookingId) ?? existing;
    if (!changed) {
      return { booking, changed: false, warnings: [] };
    }

    this.log.info('Booking cancelled', { bookingId, tutorId: booking.tutorId, actor: actor.role });
    const warnings = await this.awaitNotifications(bookingId, this.notifyCancelled(booking));
    return { booking, changed: true, warnings };
  }

  private validate(request: BookingRequest): ValidatedRequest {
    if (!isValidIsoDate(request.date)) {
      throw new ValidationError(`Invalid date: ${request.date}`);
    }
    const slot = parseSlotToken(request.slot);
    if (!slot) {
      throw new ValidationError(`Invalid slot token: ${request.slot}`);
    }
    const subject = this.deps.resolver.requireSubject(request.subjectId);

    const granularity = this.deps.resolver.granularityFor(subject);
    if (timeToMinutes(slot.endTime) - timeToMinutes(slot.startTime) !== granularity) {
      throw new ValidationError(`Slot ${request.slot} does not match the ${granularity}-minute session length`);
    }

    const name = request.student.name.trim();
    const phone = phoneDigits(request.student.phone);
    if (!name) {
      throw new ValidationError('Student name is required');
    }
    if (phone.length < 10) {
      throw new ValidationError('Student phone must have at least 10 digits');
    }

    const window = checkBookingWindow(request.date, this.deps.clock.now(), this.deps.bookingWindow);
    if (!window.allowed) {
      throw new ValidationError(window.message, { earliestDate: window.earliest });
    }

    return { subject, date: request.date, startTime: slot.startTime, endTime: slot.endTime, student: { name, phone } };
  }

  private commit(request: ValidatedRequest): Booking {
    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      try {
        return this.attempt(request);
      } catch (error) {
        const contended = isLockContention(error);
        if (!contended && !isUniqueViolation(error)) {
          throw error;
        }
        this.log.warn(contended ? 'Booking waited too long for the write lock' : 'Booking insert lost a race', {
          attempt,
          subjectId: request.subject.id,
          date: request.date,
          startTime: request.startTime,
        });
      }
    }
    throw new TutorConflictError();
  }

  private attempt(request: ValidatedRequest): Booking {
    const run = this.deps.db.transaction((): Booking => {
      const slot = this.deps.resolver.resolveSlot(request.subject.id, request.date, request.startTime, request.endTime);
      if (!slot || slot.eligibleTutors.length === 0) {
        throw new SlotUnavailableError();
      }

      const now = this.deps.clock.now();
      const tutorId = this.deps.selector.select(slot.eligibleTutors, now);
      return this.deps.bookings.insert({
        subjectId: request.subject.id,
        tutorId,
        studentName: request.student.name,
        studentPhone: request.student.phone,
        date: request.date,
        startTime: request.startTime,
        endTime: request.endTime,
        createdAt: now,
      });
    });

    const booking = run.immediate();
    this.log.info('Booking confirmed', {
      bookingId: booking.id,
      tutorId: booking.tutorId,
      subjectId: booking.subjectId,
      date: booking.date,
      startTime: booking.startTime,
    });
    return booking;
  }

  /**
   * Warnings from `delivery` if it settles within the wait, otherwise a
   * pending warning while delivery carries on detached
   */
  private async awaitNotifications(bookingId: BookingId, delivery: Promise<string[]>): Promise<string[]> {
    let timer: NodeJS.Timeout | undefined;
    const timedOut = new Promise<null>((resolve) => {
      timer = setTimeout(() => resolve(null), this.notificationWaitMs);
    });

    let warnings: string[] | null;
    try {
      warnings = await Promise.race([delivery, timedOut]);
    } finally {
      clearTimeout(timer);
    }
    if (warnings !== null) {
      return warnings;
    }

    this.log.warn('Answering before texts finished', { bookingId, waitedMs: this.notificationWaitMs });
    delivery.then(
      (late) => {
        if (late.length > 0) {
          this.log.warn('Late notification warnings', { bookingId, warnings: late });
        }
      },
      (error: unknown) => this.log.error('Late notification crashed', error, { bookingId })
    );
    return [NOTIFICATIONS_PENDING_WARNING];
  }

  private async notifyBooked(booking: Booking): Promise<string[]> {
    try {
      const tutor = this.deps.tutors.get(booking.tutorId);
      const subject = this.deps.subjects.get(booking.subjectId);
      if (!tutor || !subject) {
        return ['Booking saved, but confirmation texts could not be prepared'];
      }
      const report = await this.deps.notifications.bookingConfirmed(booking, tutor, subject);
      return report.warnings;
    } catch (error) {
      this.log.error('Confirmation notification crashed', error, { bookingId: booking.id });
      return ['Booking saved, but confirmation texts could not be sent'];
    }
  }

  private async notifyCancelled(booking: Booking): Promise<string[]> {
    try {
      const tutor = this.deps.tutors.get(booking.tutorId);
      if (!tutor) {
        return [];
      }
      const report = await this.deps.notifications.bookingCancelled(booking, tutor);
      return report.warnings;
    } catch (error) {
      this.log.error('Cancellation notification crashed', error, { bookingId: booking.id });
      return ['Booking cancelled, but the student could not be notified'];
    }
  }
}
