/**
 * Availability resolver
 *
 * For a subject and date: every active tutor who teaches the subject
 * contributes their post-blackout windows, quantized into fixed slots.
 * Identical slots across tutors merge into one entry with the union of
 * tutors; tutors who already hold a confirmed booking overlapping a slot
 * (in any subject) are removed from it, and slots left without tutors are
 * dropped.
 */

import {
  AvailabilityWindow,
  Blackout,
  Booking,
  Interval,
  IsoDate,
  Slot,
  Subject,
  SubjectId,
  TimeOfDay,
  TutorId,
} from '../types';
import {
  applyBlackouts,
  intervalsOverlap,
  isValidIsoDate,
  minutesToTime,
  quantize,
  timeToMinutes,
  windowsFor,
} from '../utils/time';
import { ValidationError } from '../utils/errors';
import { BookingRepository } from './bookingRepository';
import { SubjectRepository } from './subjectRepository';
import { TutorRepository } from './tutorRepository';

export interface ResolveInput {
  subjectId: SubjectId;
  date: IsoDate;
  granularity: number;
  tutorIds: TutorId[];
  windows: AvailabilityWindow[];
  blackouts: Blackout[];
  /** Confirmed bookings on `date` for the same tutors */
  bookings: Booking[];
}

function groupByTutor<T extends { tutorId: TutorId }>(items: T[]): Map<TutorId, T[]> {
  const grouped = new Map<TutorId, T[]>();
  for (const item of items) {
    const bucket = grouped.get(item.tutorId);
    if (bucket) {
      bucket.push(item);
    } else {
      grouped.set(item.tutorId, [item]);
    }
  }
  return grouped;
}

/**
 * Pure slot resolution over already-loaded data
 */
export function resolveSlots(input: ResolveInput): Slot[] {
  const windowsByTutor = groupByTutor(input.windows);
  const blackoutsByTutor = groupByTutor(input.blackouts);
  const bookingsByTutor = groupByTutor(input.bookings.filter((b) => b.status === 'confirmed' && b.date === input.date));

  const slots = new Map<string, { interval: Interval; tutors: Set<TutorId> }>();

  for (const tutorId of input.tutorIds) {
    const open = applyBlackouts(
      windowsFor(windowsByTutor.get(tutorId) ?? [], input.date),
      blackoutsByTutor.get(tutorId) ?? [],
      input.date
    );
    const busy: Interval[] = (bookingsByTutor.get(tutorId) ?? []).map((booking) => ({
      start: timeToMinutes(booking.startTime),
      end: timeToMinutes(booking.endTime),
    }));

    for (const window of open) {
      for (const piece of quantize(window, input.granularity)) {
        if (busy.some((held) => intervalsOverlap(held, piece))) {
          continue;
        }
        const key = `${piece.start}-${piece.end}`;
        const entry = slots.get(key);
        if (entry) {
          entry.tutors.add(tutorId);
        } else {
          slots.set(key, { interval: piece, tutors: new Set([tutorId]) });
        }
      }
    }
  }

  return [...slots.values()]
    .filter((entry) => entry.tutors.size > 0)
    .sort((a, b) => a.interval.start - b.interval.start || a.interval.end - b.interval.end)
    .map((entry) => ({
      subjectId: input.subjectId,
      date: input.date,
      startTime: minutesToTime(entry.interval.start),
      endTime: minutesToTime(entry.interval.end),
      eligibleTutors: [...entry.tutors].sort(),
    }));
}

export interface AvailabilityResolverDeps {
  subjects: SubjectRepository;
  tutors: TutorRepository;
  bookings: BookingRepository;
  defaultSlotMinutes: number;
}

export class AvailabilityResolver {
  constructor(private readonly deps: AvailabilityResolverDeps) {}

  granularityFor(subject: Subject): number {
    return subject.slotMinutes ?? this.deps.defaultSlotMinutes;
  }

  requireSubject(subjectId: SubjectId): Subject {
    const subject = this.deps.subjects.get(subjectId);
    if (!subject) {
      throw new ValidationError(`Unknown subject: ${subjectId}`);
    }
    return subject;
  }

  /**
   * Bookable slots for a subject on a date, ascending by start then end.
   * Read-only; reflects the confirmed bookings at the time of the call.
   */
  resolve(subjectId: SubjectId, date: IsoDate): Slot[] {
    if (!isValidIsoDate(date)) {
      throw new ValidationError(`Invalid date: ${date}`);
    }
    const subject = this.requireSubject(subjectId);
    const tutorIds = this.deps.tutors.listQualified(subject.id).map((tutor) => tutor.id);
    if (tutorIds.length === 0) {
      return [];
    }

    return resolveSlots({
      subjectId: subject.id,
      date,
      granularity: this.granularityFor(subject),
      tutorIds,
      windows: this.deps.tutors.listWindows(tutorIds),
      blackouts: this.deps.tutors.blackoutsOn(tutorIds, date),
      bookings: this.deps.bookings.confirmedOn(date, tutorIds),
    });
  }

  /**
   * The resolved slot matching exactly [startTime, endTime), or null
   */
  resolveSlot(subjectId: SubjectId, date: IsoDate, startTime: TimeOfDay, endTime: TimeOfDay): Slot | null {
    return this.resolve(subjectId, date).find(
      (slot) => slot.startTime === startTime && slot.endTime === endTime
    ) ?? null;
  }
}
