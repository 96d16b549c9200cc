/**
 * Outbound SMS notifications
 *
 * Delivery goes through Textbelt. Without an API key every send is a logged
 * no-op. Failures never escape: callers get a list of warning strings.
 */

import { z } from 'zod';
import { Booking, Subject, Tutor } from '../types';
import { NotificationFailure } from '../utils/errors';
import { logger } from '../utils/logger';
import { formatPhoneDisplay, toE164 } from '../utils/phone';
import { formatSlotLabel } from '../utils/time';

export type SmsOutcome = 'sent' | 'skipped';

export interface SmsTransport {
  /** Resolves 'sent' or 'skipped'; rejects with NotificationFailure */
  send(phone: string, message: string): Promise<SmsOutcome>;
}

export interface TextbeltConfig {
  apiKey: string;
  url: string;
  sender: string;
  timeoutMs?: number;
}

const textbeltResponseSchema = z.object({
  success: z.boolean(),
  error: z.string().optional(),
  textId: z.union([z.string(), z.number()]).optional(),
});

export class TextbeltTransport implements SmsTransport {
  private readonly log = logger.child('sms');

  constructor(
    private readonly config: TextbeltConfig,
    private readonly fetchImpl: typeof fetch = fetch
  ) {}

  async send(phone: string, message: string): Promise<SmsOutcome> {
    if (!this.config.apiKey) {
      this.log.info('Skipping SMS because TEXTBELT_API_KEY is not configured', { phone });
      return 'skipped';
    }

    const body = new URLSearchParams({
      phone,
      message,
      sender: this.config.sender,
      key: this.config.apiKey,
    });

    let response: Response;
    try {
      response = await this.fetchImpl(this.config.url, {
        method: 'POST',
        body,
        signal: AbortSignal.timeout(this.config.timeoutMs ?? 10_000),
      });
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new NotificationFailure(`SMS request to ${phone} failed: ${reason}`);
    }

    if (!response.ok) {
      throw new NotificationFailure(`SMS provider answered HTTP ${response.status} for ${phone}`);
    }

    let payload: unknown;
    try {
      payload = await response.json();
    } catch {
      payload = null;
    }

    const parsed = textbeltResponseSchema.safeParse(payload);
    if (!parsed.success) {
      throw new NotificationFailure(`SMS provider sent an unreadable response for ${phone}`);
    }
    if (!parsed.data.success) {
      throw new NotificationFailure(`SMS provider rejected message to ${phone}`, { reason: parsed.data.error });
    }

    this.log.info('SMS sent', { phone, textId: parsed.data.textId });
    return 'sent';
  }
}

export interface DispatchReport {
  sent: number;
  skipped: number;
  warnings: string[];
}

export class NotificationService {
  private readonly log = logger.child('notifications');

  constructor(
    private readonly transport: SmsTransport,
    private readonly sender: string
  ) {}

  async bookingConfirmed(booking: Booking, tutor: Tutor, subject: Subject): Promise<DispatchReport> {
    const slotLabel = formatSlotLabel(booking.date, booking.startTime);
    return this.dispatch(booking, [
      {
        phone: booking.studentPhone,
        message:
          `${this.sender}: You're booked for ${subject.name} on ${slotLabel} with ${tutor.name}. ` +
          `Tutor contact: ${formatPhoneDisplay(tutor.phone)}. If you need to cancel, please text your tutor.`,
      },
      {
        phone: tutor.phone,
        message:
          `${this.sender}: You have been booked for ${slotLabel} with ${booking.studentName} ` +
          `for ${subject.name}. Visit the tutor portal if you need to cancel.`,
      },
    ]);
  }

  async bookingCancelled(booking: Booking, tutor: Tutor): Promise<DispatchReport> {
    const slotLabel = formatSlotLabel(booking.date, booking.startTime);
    return this.dispatch(booking, [
      {
        phone: booking.studentPhone,
        message: `${this.sender}: Tutor ${tutor.name} has canceled your session on ${slotLabel}. Please book another time.`,
      },
    ]);
  }

  async reminder(booking: Booking, tutor: Tutor, subject: Subject): Promise<DispatchReport> {
    const slotLabel = formatSlotLabel(booking.date, booking.startTime);
    return this.dispatch(booking, [
      {
        phone: booking.studentPhone,
        message: `Reminder: You have a tutoring session with ${tutor.name} on ${slotLabel}.`,
      },
      {
        phone: tutor.phone,
        message: `Reminder: You have a tutoring session with ${booking.studentName} on ${slotLabel} for ${subject.name}.`,
      },
    ]);
  }

  private async dispatch(booking: Booking, messages: Array<{ phone: string; message: string }>): Promise<DispatchReport> {
    const report: DispatchReport = { sent: 0, skipped: 0, warnings: [] };

    for (const { phone, message } of messages) {
      try {
        const outcome = await this.transport.send(toE164(phone), message);
        if (outcome === 'sent') {
          report.sent++;
        } else {
          report.skipped++;
        }
      } catch (error) {
        const warning = error instanceof NotificationFailure
          ? error.message
          : `Unexpected notification error: ${error instanceof Error ? error.message : String(error)}`;
        this.log.warn('Notification failed', { bookingId: booking.id, warning });
        report.warnings.push(warning);
      }
    }

    return report;
  }
}
