import { BookingRepository } from './bookingRepository';
import { isUniqueViolation } from './database';
import { SubjectRepository } from './subjectRepository';
import { NewBlackout, NewWindow, TutorRepository } from './tutorRepository';
import { AvailabilityWindow, Blackout, Booking, SubjectId, Tutor, TutorId } from '../types';
import { zonedKey } from '../utils/clock';
import { NotFoundError, ValidationError } from '../utils/errors';
import { logger } from '../utils/logger';
import { phoneDigits } from '../utils/phone';
import { BlackoutSpan, blackoutIntervalOn, intervalsOverlap, isValidTimeRange } from '../utils/time';

const RECENT_CANCELLATIONS = 5;
const DUPLICATE_PHONE = 'A tutor with that phone number already exists.';

export interface TutorDashboard {
  tutor: Tutor;
  windows: AvailabilityWindow[];
  blackouts: Blackout[];
  upcoming: Booking[];
  recentCancellations: Booking[];
}

/**
 * Two blackouts collide when their date ranges share a day and, on that day,
 * their removed time ranges intersect.
 */
export function blackoutsOverlap(a: BlackoutSpan, b: BlackoutSpan): boolean {
  const firstShared = a.startDate > b.startDate ? a.startDate : b.startDate;
  const lastShared = a.endDate < b.endDate ? a.endDate : b.endDate;
  if (firstShared > lastShared) {
    return false;
  }
  const cutA = blackoutIntervalOn(a, firstShared);
  const cutB = blackoutIntervalOn(b, firstShared);
  return cutA !== null && cutB !== null && intervalsOverlap(cutA, cutB);
}

/**
 * Tutor records and the availability they publish
 */
export class TutorService {
  private readonly log = logger.child('tutors');

  constructor(
    private readonly tutors: TutorRepository,
    private readonly subjects: SubjectRepository,
    private readonly bookings: BookingRepository,
    private readonly timezone: string
  ) {}

  list(): Tutor[] {
    return this.tutors.list();
  }

  require(id: TutorId): Tutor {
    const tutor = this.tutors.get(id);
    if (!tutor) {
      throw new NotFoundError(`Tutor ${id} not found`);
    }
    return tutor;
  }

  create(input: { name: string; phone: string; subjectIds: SubjectId[] }, now: Date): Tutor {
    const name = input.name.trim();
    const phone = phoneDigits(input.phone);
    if (!name || phone.length < 10) {
      throw new ValidationError('Name and a phone number of at least 10 digits are required.');
    }
    if (this.tutors.findByPhone(phone)) {
      throw new ValidationError(DUPLICATE_PHONE);
    }
    this.assertSubjectsExist(input.subjectIds);

    let tutor: Tutor;
    try {
      tutor = this.tutors.create({ name, phone, subjectIds: input.subjectIds }, now);
    } catch (error) {
      // Another signup with the same phone committed after the lookup
      if (isUniqueViolation(error)) {
        throw new ValidationError(DUPLICATE_PHONE);
      }
      throw error;
    }
    this.log.info('Tutor created', { tutorId: tutor.id, subjects: tutor.subjectIds.length });
    return tutor;
  }

  setSubjects(id: TutorId, subjectIds: SubjectId[]): Tutor {
    this.require(id);
    this.assertSubjectsExist(subjectIds);
    return this.tutors.setSubjects(id, subjectIds);
  }

  /**
   * Soft enable/disable; disabled tutors stop resolving but keep their bookings
   */
  setActive(id: TutorId, isActive: boolean): Tutor {
    this.require(id);
    const tutor = this.tutors.setActive(id, isActive);
    this.log.info(isActive ? 'Tutor activated' : 'Tutor deactivated', { tutorId: id });
    return tutor;
  }

  delete(id: TutorId): void {
    this.require(id);
    if (this.bookings.countForTutor(id) > 0) {
      throw new ValidationError('Cannot delete tutor with existing bookings. Deactivate instead.');
    }
    this.tutors.delete(id);
    this.log.info('Tutor removed', { tutorId: id });
  }

  addWindow(tutorId: TutorId, window: NewWindow): AvailabilityWindow {
    this.require(tutorId);
    if (!isValidTimeRange(window.startTime, window.endTime)) {
      throw new ValidationError('End time must be after start time.');
    }
    return this.tutors.addWindow(tutorId, window);
  }

  removeWindow(tutorId: TutorId, windowId: string): void {
    if (!this.tutors.removeWindow(tutorId, windowId)) {
      throw new NotFoundError(`Availability window ${windowId} not found`);
    }
  }

  addBlackout(tutorId: TutorId, blackout: NewBlackout): Blackout {
    this.require(tutorId);
    if (blackout.startDate > blackout.endDate) {
      throw new ValidationError('Blackout end date must not be before its start date.');
    }
    if ((blackout.startTime === null) !== (blackout.endTime === null)) {
      throw new ValidationError('Provide both a start and end time, or neither for a full-day blackout.');
    }
    if (blackout.startTime !== null && blackout.endTime !== null && !isValidTimeRange(blackout.startTime, blackout.endTime)) {
      throw new ValidationError('Blackout end time must be after the start time.');
    }

    const existing = this.tutors.listBlackouts([tutorId]);
    if (existing.some((other) => blackoutsOverlap(blackout, other))) {
      throw new ValidationError('That blackout overlaps with an existing one.');
    }
    return this.tutors.addBlackout(tutorId, blackout);
  }

  removeBlackout(tutorId: TutorId, blackoutId: string): void {
    if (!this.tutors.removeBlackout(tutorId, blackoutId)) {
      throw new NotFoundError(`Blackout ${blackoutId} not found`);
    }
  }

  dashboard(tutorId: TutorId, now: Date): TutorDashboard {
    const tutor = this.require(tutorId);
    return {
      tutor,
      windows: this.tutors.listWindows([tutorId]),
      blackouts: this.tutors.listBlackouts([tutorId]),
      upcoming: this.bookings.upcomingForTutor(tutorId, zonedKey(now, this.timezone)),
      recentCancellations: this.bookings.recentCancellationsForTutor(tutorId, RECENT_CANCELLATIONS),
    };
  }

  private assertSubjectsExist(subjectIds: SubjectId[]): void {
    const unknown = subjectIds.filter((id) => !this.subjects.get(id));
    if (unknown.length > 0) {
      throw new ValidationError('Unknown subject ids', { unknown });
    }
  }
}
