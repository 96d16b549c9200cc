/**
 * Shared fixtures: an in-memory database with the subject catalog loaded,
 * a clock the test controls, and an SMS transport that records messages.
 */

import { AppConfig, loadConfig } from '../config';
import { createServices, Services } from '../container';
import { openDatabase } from '../services/database';
import { SmsOutcome, SmsTransport } from '../services/notificationService';
import { NewWindow } from '../services/tutorRepository';
import { SubjectId, Tutor } from '../types';
import { Clock } from '../utils/clock';

/** Sunday 2026-03-01, 10:00 in America/Los_Angeles (PST, UTC-8) */
export const TEST_NOW = '2026-03-01T18:00:00.000Z';

/** First bookable day at TEST_NOW; a Monday */
export const MONDAY = '2026-03-02';
export const TUESDAY = '2026-03-03';

export class ManualClock implements Clock {
  private instant: Date;

  constructor(instant: string | Date = TEST_NOW) {
    this.instant = new Date(instant);
  }

  now(): Date {
    return new Date(this.instant);
  }

  set(instant: string | Date): void {
    this.instant = new Date(instant);
  }

  advanceMinutes(minutes: number): void {
    this.instant = new Date(this.instant.getTime() + minutes * 60_000);
  }
}

export interface SentMessage {
  phone: string;
  message: string;
}

export class RecordingTransport implements SmsTransport {
  readonly sent: SentMessage[] = [];
  failure: Error | null = null;
  /** When set, sends never settle, like a provider that stopped answering */
  stalled = false;

  async send(phone: string, message: string): Promise<SmsOutcome> {
    if (this.stalled) {
      return new Promise<SmsOutcome>(() => undefined);
    }
    if (this.failure) {
      throw this.failure;
    }
    this.sent.push({ phone, message });
    return 'sent';
  }
}

export interface TestContext {
  services: Services;
  clock: ManualClock;
  transport: RecordingTransport;
  config: AppConfig;
}

export function createTestContext(env: NodeJS.ProcessEnv = {}): TestContext {
  const config = loadConfig({ NODE_ENV: 'test', DATABASE_PATH: ':memory:', ...env });
  const db = openDatabase(config.databasePath);
  const clock = new ManualClock();
  const transport = new RecordingTransport();
  const services = createServices(config, db, { clock, transport });
  services.subjects.ensureSeeded();
  return { services, clock, transport, config };
}

let phoneCounter = 0;

/**
 * Creates a tutor with the given subjects and availability windows
 */
export function addTutor(
  services: Services,
  name: string,
  subjectIds: SubjectId[],
  windows: NewWindow[] = []
): Tutor {
  phoneCounter++;
  const phone = `555${phoneCounter.toString().padStart(7, '0')}`;
  const tutor = services.tutors.create({ name, phone, subjectIds }, services.clock.now());
  for (const window of windows) {
    services.tutors.addWindow(tutor.id, window);
  }
  return tutor;
}

export function weekly(weekday: 0 | 1 | 2 | 3 | 4 | 5 | 6, startTime: string, endTime: string): NewWindow {
  return { kind: 'weekly', weekday, startTime, endTime };
}

export function dated(date: string, startTime: string, endTime: string): NewWindow {
  return { kind: 'dated', date, startTime, endTime };
}
