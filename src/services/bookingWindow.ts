import { IsoDate } from '../types';
import { toZoned } from '../utils/clock';
import { addDays, formatLongDate, formatTimeLabel, minutesToTime } from '../utils/time';

export interface BookingWindowPolicy {
  timezone: string;
  /** Local hour after which next-day bookings close */
  cutoffHour: number;
}

export type BookingWindowStatus =
  | { allowed: true; earliest: IsoDate }
  | { allowed: false; earliest: IsoDate; message: string };

/**
 * Tomorrow in the booking zone, or the day after once the cut-off has passed
 */
export function earliestBookableDate(now: Date, policy: BookingWindowPolicy): IsoDate {
  const local = toZoned(now, policy.timezone);
  const tomorrow = addDays(local.date, 1);
  return local.hour >= policy.cutoffHour ? addDays(tomorrow, 1) : tomorrow;
}

export function checkBookingWindow(date: IsoDate, now: Date, policy: BookingWindowPolicy): BookingWindowStatus {
  const earliest = earliestBookableDate(now, policy);
  if (date >= earliest) {
    return { allowed: true, earliest };
  }

  const today = toZoned(now, policy.timezone).date;
  const reason = date <= today
    ? 'Same-day bookings are not available.'
    : `After ${formatTimeLabel(minutesToTime(policy.cutoffHour * 60))}, next-day sessions close.`;

  return {
    allowed: false,
    earliest,
    message: `${reason} Earliest available date is ${formatLongDate(earliest)}.`,
  };
}
