import { randomUUID } from 'crypto';
import { Db } from './database';
import {
  ActorRole,
  Booking,
  BookingId,
  BookingStatus,
  IsoDate,
  SubjectId,
  TimeOfDay,
  TutorId,
} from '../types';

interface BookingRow {
  id: string;
  subject_id: string;
  tutor_id: string;
  student_name: string;
  student_phone: string;
  date: string;
  start_time: string;
  end_time: string;
  status: string;
  created_at: string;
  reminder_sent_at: string | null;
  cancelled_at: string | null;
  cancel_reason: string | null;
  cancelled_by: string | null;
}

interface CountRow {
  tutor_id: string;
  total: number;
}

export interface NewBooking {
  subjectId: SubjectId;
  tutorId: TutorId;
  studentName: string;
  studentPhone: string;
  date: IsoDate;
  startTime: TimeOfDay;
  endTime: TimeOfDay;
  createdAt: Date;
}

export interface CancelRecord {
  cancelledAt: Date;
  cancelledBy: ActorRole;
  reason: string | null;
}

function toStatus(value: string): BookingStatus {
  if (value === 'confirmed' || value === 'cancelled') return value;
  throw new Error(`Unknown booking status: ${value}`);
}

function toActorRole(value: string | null): ActorRole | null {
  if (value === null) return null;
  if (value === 'tutor' || value === 'admin') return value;
  throw new Error(`Unknown actor role: ${value}`);
}

function toBooking(row: BookingRow): Booking {
  return {
    id: row.id,
    subjectId: row.subject_id,
    tutorId: row.tutor_id,
    studentName: row.student_name,
    studentPhone: row.student_phone,
    date: row.date,
    startTime: row.start_time,
    endTime: row.end_time,
    status: toStatus(row.status),
    createdAt: row.created_at,
    reminderSentAt: row.reminder_sent_at,
    cancelledAt: row.cancelled_at,
    cancelReason: row.cancel_reason,
    cancelledBy: toActorRole(row.cancelled_by),
  };
}

/**
 * Booking rows. Rows are never deleted; cancellation is a status change.
 */
export class BookingRepository {
  constructor(private readonly db: Db) {}

  /**
   * Throws a SQLite UNIQUE violation when the tutor already holds a confirmed
   * booking starting at the same date and time.
   */
  insert(input: NewBooking): Booking {
    const id = randomUUID();
    this.db
      .prepare(`
        INSERT INTO bookings (
          id, subject_id, tutor_id, student_name, student_phone,
          date, start_time, end_time, status, created_at
        ) VALUES (
          @id, @subjectId, @tutorId, @studentName, @studentPhone,
          @date, @startTime, @endTime, 'confirmed', @createdAt
        )
      `)
      .run({
        id,
        subjectId: input.subjectId,
        tutorId: input.tutorId,
        studentName: input.studentName,
        studentPhone: input.studentPhone,
        date: input.date,
        startTime: input.startTime,
        endTime: input.endTime,
        createdAt: input.createdAt.toISOString(),
      });

    const booking = this.get(id);
    if (!booking) {
      throw new Error(`Booking ${id} vanished after insert`);
    }
    return booking;
  }

  get(id: BookingId): Booking | null {
    const row = this.db.prepare<[string], BookingRow>('SELECT * FROM bookings WHERE id = ?').get(id);
    return row ? toBooking(row) : null;
  }

  /**
   * Confirmed bookings on a date for any of the tutors, whatever the subject
   */
  confirmedOn(date: IsoDate, tutorIds: TutorId[]): Booking[] {
    if (tutorIds.length === 0) return [];
    const marks = tutorIds.map(() => '?').join(', ');
    return this.db
      .prepare<string[], BookingRow>(`
        SELECT * FROM bookings
        WHERE status = 'confirmed' AND date = ? AND tutor_id IN (${marks})
        ORDER BY start_time
      `)
      .all(date, ...tutorIds)
      .map(toBooking);
  }

  /**
   * Confirmed bookings per tutor created in (since, asOf]. A null `since`
   * counts everything up to `asOf`. Tutors without bookings map to 0.
   */
  countConfirmed(tutorIds: TutorId[], since: Date | null, asOf: Date): Map<TutorId, number> {
    const counts = new Map<TutorId, number>(tutorIds.map((id) => [id, 0]));
    if (tutorIds.length === 0) return counts;

    const marks = tutorIds.map(() => '?').join(', ');
    const rows = this.db
      .prepare<string[], CountRow>(`
        SELECT tutor_id, count(*) AS total FROM bookings
        WHERE status = 'confirmed'
          AND tutor_id IN (${marks})
          AND created_at > ?
          AND created_at <= ?
        GROUP BY tutor_id
      `)
      .all(...tutorIds, since ? since.toISOString() : '', asOf.toISOString());

    for (const row of rows) {
      counts.set(row.tutor_id, row.total);
    }
    return counts;
  }

  /**
   * Flip a confirmed booking to cancelled. Returns false when it was not confirmed.
   */
  cancel(id: BookingId, record: CancelRecord): boolean {
    const result = this.db
      .prepare<[string, string, string | null, string]>(`
        UPDATE bookings
        SET status = 'cancelled', cancelled_at = ?, cancelled_by = ?, cancel_reason = ?
        WHERE id = ? AND status = 'confirmed'
      `)
      .run(record.cancelledAt.toISOString(), record.cancelledBy, record.reason, id);
    return result.changes > 0;
  }

  /**
   * Confirmed, unreminded bookings whose "date start_time" key lies in [fromKey, toKey)
   */
  unremindedBetween(fromKey: string, toKey: string): Booking[] {
    return this.db
      .prepare<[string, string], BookingRow>(`
        SELECT * FROM bookings
        WHERE status = 'confirmed'
          AND reminder_sent_at IS NULL
          AND (date || ' ' || start_time) >= ?
          AND (date || ' ' || start_time) < ?
        ORDER BY date, start_time, id
      `)
      .all(fromKey, toKey)
      .map(toBooking);
  }

  /**
   * Set reminder_sent_at once; later calls leave the first timestamp alone
   */
  markReminderSent(id: BookingId, at: Date): boolean {
    return (
      this.db
        .prepare<[string, string]>(
          'UPDATE bookings SET reminder_sent_at = ? WHERE id = ? AND reminder_sent_at IS NULL'
        )
        .run(at.toISOString(), id).changes > 0
    );
  }

  list(status?: BookingStatus): Booking[] {
    if (status) {
      return this.db
        .prepare<[string], BookingRow>('SELECT * FROM bookings WHERE status = ? ORDER BY date, start_time, id')
        .all(status)
        .map(toBooking);
    }
    return this.db
      .prepare<[], BookingRow>('SELECT * FROM bookings ORDER BY date, start_time, id')
      .all()
      .map(toBooking);
  }

  upcomingForTutor(tutorId: TutorId, fromKey: string): Booking[] {
    return this.db
      .prepare<[string, string], BookingRow>(`
        SELECT * FROM bookings
        WHERE tutor_id = ? AND status = 'confirmed' AND (date || ' ' || start_time) >= ?
        ORDER BY date, start_time
      `)
      .all(tutorId, fromKey)
      .map(toBooking);
  }

  recentCancellationsForTutor(tutorId: TutorId, limit: number): Booking[] {
    return this.db
      .prepare<[string, number], BookingRow>(`
        SELECT * FROM bookings
        WHERE tutor_id = ? AND status = 'cancelled'
        ORDER BY cancelled_at DESC, id
        LIMIT ?
      `)
      .all(tutorId, limit)
      .map(toBooking);
  }

  countForTutor(tutorId: TutorId): number {
    const row = this.db
      .prepare<[string], { total: number }>('SELECT count(*) AS total FROM bookings WHERE tutor_id = ?')
      .get(tutorId);
    return row ? row.total : 0;
  }
}
