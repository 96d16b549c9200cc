/**
 * Wires repositories and services around one database connection
 */

import { AppConfig } from './config';
import { AvailabilityResolver } from './services/availabilityResolver';
import { BookingCoordinator } from './services/bookingCoordinator';
import { BookingRepository } from './services/bookingRepository';
import { BookingWindowPolicy } from './services/bookingWindow';
import { Db } from './services/database';
import { FairnessSelector } from './services/fairnessSelector';
import { NotificationService, SmsTransport, TextbeltTransport } from './services/notificationService';
import { ReminderService } from './services/reminderService';
import { SubjectRepository } from './services/subjectRepository';
import { TutorRepository } from './services/tutorRepository';
import { TutorService } from './services/tutorService';
import { Clock, systemClock } from './utils/clock';

export interface Services {
  config: AppConfig;
  db: Db;
  clock: Clock;
  bookingWindow: BookingWindowPolicy;
  subjects: SubjectRepository;
  tutorRepository: TutorRepository;
  bookingRepository: BookingRepository;
  resolver: AvailabilityResolver;
  selector: FairnessSelector;
  notifications: NotificationService;
  coordinator: BookingCoordinator;
  reminders: ReminderService;
  tutors: TutorService;
}

export interface ServiceOverrides {
  clock?: Clock;
  transport?: SmsTransport;
}

export function createServices(config: AppConfig, db: Db, overrides: ServiceOverrides = {}): Services {
  const clock = overrides.clock ?? systemClock;
  const bookingWindow: BookingWindowPolicy = {
    timezone: config.timezone,
    cutoffHour: config.bookingCutoffHour,
  };

  const subjects = new SubjectRepository(db);
  const tutorRepository = new TutorRepository(db);
  const bookingRepository = new BookingRepository(db);

  const resolver = new AvailabilityResolver({
    subjects,
    tutors: tutorRepository,
    bookings: bookingRepository,
    defaultSlotMinutes: config.slotMinutes,
  });
  const selector = new FairnessSelector(bookingRepository, { windowDays: config.fairnessWindowDays });
  const notifications = new NotificationService(
    overrides.transport ?? new TextbeltTransport(config.textbelt),
    config.textbelt.sender
  );

  const coordinator = new BookingCoordinator({
    db,
    subjects,
    tutors: tutorRepository,
    bookings: bookingRepository,
    resolver,
    selector,
    notifications,
    clock,
    bookingWindow,
    notificationWaitMs: config.notificationWaitMs,
  });

  const reminders = new ReminderService({
    bookings: bookingRepository,
    tutors: tutorRepository,
    subjects,
    notifications,
    timezone: config.timezone,
    horizonHours: config.reminderHorizonHours,
  });

  const tutors = new TutorService(tutorRepository, subjects, bookingRepository, config.timezone);

  return {
    config,
    db,
    clock,
    bookingWindow,
    subjects,
    tutorRepository,
    bookingRepository,
    resolver,
    selector,
    notifications,
    coordinator,
    reminders,
    tutors,
  };
}
