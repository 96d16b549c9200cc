/**
 * Reminder query and dispatch
 *
 * dueReminders() only selects. sendDue() texts each candidate and marks it;
 * a run interrupted halfway is safe to repeat because marked bookings drop
 * out of the next query.
 */

import { BookingRepository } from './bookingRepository';
import { NotificationService } from './notificationService';
import { SubjectRepository } from './subjectRepository';
import { TutorRepository } from './tutorRepository';
import { Booking } from '../types';
import { zonedKey } from '../utils/clock';
import { logger } from '../utils/logger';

const HOUR_MS = 60 * 60 * 1000;

export interface ReminderServiceDeps {
  bookings: BookingRepository;
  tutors: TutorRepository;
  subjects: SubjectRepository;
  notifications: NotificationService;
  timezone: string;
  horizonHours: number;
}

export interface ReminderRunReport {
  due: number;
  reminded: number;
  failed: number;
  warnings: string[];
}

export class ReminderService {
  private readonly log = logger.child('reminders');

  constructor(private readonly deps: ReminderServiceDeps) {}

  /**
   * Confirmed bookings starting in [now, now + horizon) with no reminder sent yet
   */
  dueReminders(now: Date): Booking[] {
    const horizonEnd = new Date(now.getTime() + this.deps.horizonHours * HOUR_MS);
    return this.deps.bookings.unremindedBetween(
      zonedKey(now, this.deps.timezone),
      zonedKey(horizonEnd, this.deps.timezone)
    );
  }

  markReminderSent(bookingId: string, at: Date): boolean {
    return this.deps.bookings.markReminderSent(bookingId, at);
  }

  async sendDue(now: Date): Promise<ReminderRunReport> {
    const due = this.dueReminders(now);
    const report: ReminderRunReport = { due: due.length, reminded: 0, failed: 0, warnings: [] };
    this.log.info('Found bookings in reminder window', { count: due.length });

    for (const booking of due) {
      const tutor = this.deps.tutors.get(booking.tutorId);
      const subject = this.deps.subjects.get(booking.subjectId);
      if (!tutor || !subject) {
        report.failed++;
        report.warnings.push(`Booking ${booking.id} references a missing tutor or subject`);
        continue;
      }

      const dispatch = await this.deps.notifications.reminder(booking, tutor, subject);
      if (dispatch.warnings.length > 0) {
        report.failed++;
        report.warnings.push(...dispatch.warnings);
        continue;
      }

      this.markReminderSent(booking.id, now);
      report.reminded++;
    }

    return report;
  }
}
