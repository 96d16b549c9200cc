import { randomUUID } from 'crypto';
import { Db } from './database';
import {
  AvailabilityWindow,
  Blackout,
  IsoDate,
  SubjectId,
  TimeOfDay,
  Tutor,
  TutorId,
  Weekday,
} from '../types';

interface TutorRow {
  id: string;
  name: string;
  phone: string;
  is_active: number;
  created_at: string;
  subject_ids: string | null;
}

interface WindowRow {
  id: string;
  tutor_id: string;
  weekday: number | null;
  date: string | null;
  start_time: string;
  end_time: string;
}

interface BlackoutRow {
  id: string;
  tutor_id: string;
  start_date: string;
  end_date: string;
  start_time: string | null;
  end_time: string | null;
  note: string | null;
}

export type NewWindow =
  | { kind: 'weekly'; weekday: Weekday; startTime: TimeOfDay; endTime: TimeOfDay }
  | { kind: 'dated'; date: IsoDate; startTime: TimeOfDay; endTime: TimeOfDay };

export interface NewBlackout {
  startDate: IsoDate;
  endDate: IsoDate;
  startTime: TimeOfDay | null;
  endTime: TimeOfDay | null;
  note: string | null;
}

const TUTOR_SELECT = `
  SELECT t.*, (
    SELECT group_concat(ts.subject_id, ',') FROM tutor_subjects ts WHERE ts.tutor_id = t.id
  ) AS subject_ids
  FROM tutors t
`;

function isWeekday(value: number): value is Weekday {
  return Number.isInteger(value) && value >= 0 && value <= 6;
}

function toTutor(row: TutorRow): Tutor {
  return {
    id: row.id,
    name: row.name,
    phone: row.phone,
    isActive: row.is_active === 1,
    subjectIds: row.subject_ids ? row.subject_ids.split(',').sort() : [],
    createdAt: row.created_at,
  };
}

function toWindow(row: WindowRow): AvailabilityWindow {
  const base = { id: row.id, tutorId: row.tutor_id, startTime: row.start_time, endTime: row.end_time };
  if (row.date !== null) {
    return { ...base, kind: 'dated', date: row.date };
  }
  if (row.weekday === null || !isWeekday(row.weekday)) {
    throw new Error(`Availability window ${row.id} has neither a weekday nor a date`);
  }
  return { ...base, kind: 'weekly', weekday: row.weekday };
}

function toBlackout(row: BlackoutRow): Blackout {
  return {
    id: row.id,
    tutorId: row.tutor_id,
    startDate: row.start_date,
    endDate: row.end_date,
    startTime: row.start_time,
    endTime: row.end_time,
    note: row.note,
  };
}

function placeholders(count: number): string {
  return Array.from({ length: count }, () => '?').join(', ');
}

/**
 * Tutors and the availability they own
 */
export class TutorRepository {
  constructor(private readonly db: Db) {}

  create(input: { name: string; phone: string; subjectIds: SubjectId[] }, createdAt: Date): Tutor {
    const id = randomUUID();
    const insert = this.db.transaction(() => {
      this.db
        .prepare<[string, string, string, string]>(
          'INSERT INTO tutors (id, name, phone, is_active, created_at) VALUES (?, ?, ?, 1, ?)'
        )
        .run(id, input.name, input.phone, createdAt.toISOString());
      this.replaceSubjects(id, input.subjectIds);
    });
    insert();
    return this.requireTutor(id);
  }

  get(id: TutorId): Tutor | null {
    const row = this.db.prepare<[string], TutorRow>(`${TUTOR_SELECT} WHERE t.id = ?`).get(id);
    return row ? toTutor(row) : null;
  }

  findByPhone(phone: string): Tutor | null {
    const row = this.db.prepare<[string], TutorRow>(`${TUTOR_SELECT} WHERE t.phone = ?`).get(phone);
    return row ? toTutor(row) : null;
  }

  list(): Tutor[] {
    return this.db.prepare<[], TutorRow>(`${TUTOR_SELECT} ORDER BY t.name, t.id`).all().map(toTutor);
  }

  /**
   * Active tutors who teach the subject
   */
  listQualified(subjectId: SubjectId): Tutor[] {
    return this.db
      .prepare<[string], TutorRow>(`
        ${TUTOR_SELECT}
        JOIN tutor_subjects q ON q.tutor_id = t.id
        WHERE q.subject_id = ? AND t.is_active = 1
        ORDER BY t.id
      `)
      .all(subjectId)
      .map(toTutor);
  }

  setSubjects(id: TutorId, subjectIds: SubjectId[]): Tutor {
    this.db.transaction(() => this.replaceSubjects(id, subjectIds))();
    return this.requireTutor(id);
  }

  setActive(id: TutorId, isActive: boolean): Tutor {
    this.db.prepare<[number, string]>('UPDATE tutors SET is_active = ? WHERE id = ?').run(isActive ? 1 : 0, id);
    return this.requireTutor(id);
  }

  delete(id: TutorId): boolean {
    return this.db.prepare<[string]>('DELETE FROM tutors WHERE id = ?').run(id).changes > 0;
  }

  listWindows(tutorIds: TutorId[]): AvailabilityWindow[] {
    if (tutorIds.length === 0) return [];
    return this.db
      .prepare<string[], WindowRow>(`
        SELECT * FROM availability_windows
        WHERE tutor_id IN (${placeholders(tutorIds.length)})
        ORDER BY tutor_id, coalesce(date, ''), coalesce(weekday, -1), start_time
      `)
      .all(...tutorIds)
      .map(toWindow);
  }

  addWindow(tutorId: TutorId, window: NewWindow): AvailabilityWindow {
    const id = randomUUID();
    this.db
      .prepare<[string, string, number | null, string | null, string, string]>(`
        INSERT INTO availability_windows (id, tutor_id, weekday, date, start_time, end_time)
        VALUES (?, ?, ?, ?, ?, ?)
      `)
      .run(
        id,
        tutorId,
        window.kind === 'weekly' ? window.weekday : null,
        window.kind === 'dated' ? window.date : null,
        window.startTime,
        window.endTime
      );
    return window.kind === 'weekly'
      ? { id, tutorId, kind: 'weekly', weekday: window.weekday, startTime: window.startTime, endTime: window.endTime }
      : { id, tutorId, kind: 'dated', date: window.date, startTime: window.startTime, endTime: window.endTime };
  }

  removeWindow(tutorId: TutorId, windowId: string): boolean {
    return (
      this.db
        .prepare<[string, string]>('DELETE FROM availability_windows WHERE id = ? AND tutor_id = ?')
        .run(windowId, tutorId).changes > 0
    );
  }

  listBlackouts(tutorIds: TutorId[]): Blackout[] {
    if (tutorIds.length === 0) return [];
    return this.db
      .prepare<string[], BlackoutRow>(`
        SELECT * FROM blackouts
        WHERE tutor_id IN (${placeholders(tutorIds.length)})
        ORDER BY tutor_id, start_date, coalesce(start_time, '')
      `)
      .all(...tutorIds)
      .map(toBlackout);
  }

  /**
   * Blackouts of the given tutors whose date range includes `date`
   */
  blackoutsOn(tutorIds: TutorId[], date: IsoDate): Blackout[] {
    if (tutorIds.length === 0) return [];
    return this.db
      .prepare<string[], BlackoutRow>(`
        SELECT * FROM blackouts
        WHERE tutor_id IN (${placeholders(tutorIds.length)})
          AND start_date <= ? AND end_date >= ?
        ORDER BY tutor_id, coalesce(start_time, '')
      `)
      .all(...tutorIds, date, date)
      .map(toBlackout);
  }

  addBlackout(tutorId: TutorId, blackout: NewBlackout): Blackout {
    const id = randomUUID();
    this.db
      .prepare<[string, string, string, string, string | null, string | null, string | null]>(`
        INSERT INTO blackouts (id, tutor_id, start_date, end_date, start_time, end_time, note)
        VALUES (?, ?, ?, ?, ?, ?, ?)
      `)
      .run(id, tutorId, blackout.startDate, blackout.endDate, blackout.startTime, blackout.endTime, blackout.note);
    return { id, tutorId, ...blackout };
  }

  removeBlackout(tutorId: TutorId, blackoutId: string): boolean {
    return (
      this.db
        .prepare<[string, string]>('DELETE FROM blackouts WHERE id = ? AND tutor_id = ?')
        .run(blackoutId, tutorId).changes > 0
    );
  }

  private replaceSubjects(tutorId: TutorId, subjectIds: SubjectId[]): void {
    this.db.prepare<[string]>('DELETE FROM tutor_subjects WHERE tutor_id = ?').run(tutorId);
    const link = this.db.prepare<[string, string]>(
      'INSERT OR IGNORE INTO tutor_subjects (tutor_id, subject_id) VALUES (?, ?)'
    );
    for (const subjectId of subjectIds) {
      link.run(tutorId, subjectId);
    }
  }

  private requireTutor(id: TutorId): Tutor {
    const tutor = this.get(id);
    if (!tutor) {
      throw new Error(`Tutor ${id} vanished after write`);
    }
    return tutor;
  }
}
