// Core domain types

/** Calendar date in the booking time zone, YYYY-MM-DD */
export type IsoDate = string;

/** Wall-clock time of day, HH:mm (24h) */
export type TimeOfDay = string;

/** 0 = Monday ... 6 = Sunday */
export type Weekday = 0 | 1 | 2 | 3 | 4 | 5 | 6;

export type TutorId = string;
export type SubjectId = string;
export type BookingId = string;

/** Half-open interval [start, end) in minutes since midnight */
export interface Interval {
  start: number;
  end: number;
}

export interface Subject {
  id: SubjectId;
  name: string;
  category: string;
  sortOrder: number;
  /** Overrides the global slot granularity when set */
  slotMinutes: number | null;
}

export interface Tutor {
  id: TutorId;
  name: string;
  phone: string;
  isActive: boolean;
  subjectIds: SubjectId[];
  createdAt: string;
}

interface AvailabilityWindowBase {
  id: string;
  tutorId: TutorId;
  startTime: TimeOfDay;
  endTime: TimeOfDay;
}

export interface RecurringWindow extends AvailabilityWindowBase {
  kind: 'weekly';
  weekday: Weekday;
}

export interface DatedWindow extends AvailabilityWindowBase {
  kind: 'dated';
  date: IsoDate;
}

export type AvailabilityWindow = RecurringWindow | DatedWindow;

export interface Blackout {
  id: string;
  tutorId: TutorId;
  startDate: IsoDate;
  endDate: IsoDate;
  /** Both null for a full-day blackout */
  startTime: TimeOfDay | null;
  endTime: TimeOfDay | null;
  note: string | null;
}

export type BookingStatus = 'confirmed' | 'cancelled';

export type ActorRole = 'tutor' | 'admin';

export interface Booking {
  id: BookingId;
  subjectId: SubjectId;
  tutorId: TutorId;
  studentName: string;
  studentPhone: string;
  date: IsoDate;
  startTime: TimeOfDay;
  endTime: TimeOfDay;
  status: BookingStatus;
  createdAt: string;
  reminderSentAt: string | null;
  cancelledAt: string | null;
  cancelReason: string | null;
  cancelledBy: ActorRole | null;
}

/** Derived, never persisted */
export interface Slot {
  subjectId: SubjectId;
  date: IsoDate;
  startTime: TimeOfDay;
  endTime: TimeOfDay;
  eligibleTutors: TutorId[];
}

export interface StudentContact {
  name: string;
  phone: string;
}

export type CancelActor =
  | { role: 'admin' }
  | { role: 'tutor'; tutorId: TutorId };

export type BookingFailureCode = 'SLOT_UNAVAILABLE' | 'TUTOR_CONFLICT' | 'VALIDATION_ERROR';

export type BookingResult =
  | { ok: true; booking: Booking; warnings: string[] }
  | { ok: false; error: { code: BookingFailureCode; message: string; details?: unknown } };
