import { NotificationFailure } from '../../utils/errors';
import { MONDAY, TestContext, addTutor, createTestContext } from '../../__tests__/helpers';

const NOW = new Date('2026-03-01T18:00:00.000Z'); // Sunday 10:00 local

function seed() {
  const context = createTestContext();
  const { services } = context;
  const tutor = addTutor(services, 'Ana', ['biology']);
  const insert = (date: string, startTime: string, endTime: string) =>
    services.bookingRepository.insert({
      subjectId: 'biology',
      tutorId: tutor.id,
      studentName: 'Sam Student',
      studentPhone: '5559876543',
      date,
      startTime,
      endTime,
      createdAt: new Date('2026-02-20T12:00:00.000Z'),
    });

  const bookings = {
    startingNow: insert('2026-03-01', '10:00', '10:30'),
    alreadyStarted: insert('2026-03-01', '09:30', '10:00'),
    tomorrowMorning: insert(MONDAY, '09:00', '09:30'),
    cancelled: insert(MONDAY, '09:30', '10:00'),
    exactlyOneDayOut: insert(MONDAY, '10:00', '10:30'),
  };
  services.bookingRepository.cancel(bookings.cancelled.id, { cancelledAt: NOW, cancelledBy: 'admin', reason: null });
  return { ...context, tutor, bookings };
}

function ids(context: TestContext, now: Date): string[] {
  return context.services.reminders.dueReminders(now).map((booking) => booking.id);
}

describe('ReminderService', () => {
  describe('dueReminders', () => {
    it('should return confirmed bookings starting in the next 24 hours', () => {
      const context = seed();
      expect(ids(context, NOW)).toEqual([context.bookings.startingNow.id, context.bookings.tomorrowMorning.id]);
    });

    it('should return the same set when asked twice', () => {
      const context = seed();
      expect(ids(context, NOW)).toEqual(ids(context, NOW));
    });

    it('should exclude a booking once its reminder is marked sent', () => {
      const context = seed();
      expect(context.services.reminders.markReminderSent(context.bookings.startingNow.id, NOW)).toBe(true);
      expect(ids(context, NOW)).toEqual([context.bookings.tomorrowMorning.id]);
    });

    it('should keep the first reminder timestamp', () => {
      const context = seed();
      const { reminders, bookingRepository } = context.services;
      reminders.markReminderSent(context.bookings.startingNow.id, NOW);

      expect(reminders.markReminderSent(context.bookings.startingNow.id, new Date('2026-03-01T19:00:00.000Z'))).toBe(false);
      expect(bookingRepository.get(context.bookings.startingNow.id)?.reminderSentAt).toBe('2026-03-01T18:00:00.000Z');
    });
  });

  describe('sendDue', () => {
    it('should text both parties and mark each booking', async () => {
      const context = seed();

      const report = await context.services.reminders.sendDue(NOW);

      expect(report).toEqual({ due: 2, reminded: 2, failed: 0, warnings: [] });
      expect(context.transport.sent).toHaveLength(4);
      expect(context.transport.sent[2]).toEqual({
        phone: '+15559876543',
        message: 'Reminder: You have a tutoring session with Ana on Monday, March 2 at 9:00 AM.',
      });
      expect(context.transport.sent[3]).toEqual({
        phone: `+1${context.tutor.phone}`,
        message: 'Reminder: You have a tutoring session with Sam Student on Monday, March 2 at 9:00 AM for Biology.',
      });
      expect(ids(context, NOW)).toEqual([]);
    });

    it('should leave bookings unmarked when texting fails so the next run retries', async () => {
      const context = seed();
      context.transport.failure = new NotificationFailure('SMS provider rejected message');

      const report = await context.services.reminders.sendDue(NOW);

      expect(report.due).toBe(2);
      expect(report.reminded).toBe(0);
      expect(report.failed).toBe(2);
      expect(report.warnings).toHaveLength(4);
      expect(ids(context, NOW)).toHaveLength(2);
    });
  });
});
