/**
 * Wall-clock helpers for the booking time zone
 */

import { IsoDate, TimeOfDay } from '../types';

export interface Clock {
  now(): Date;
}

export const systemClock: Clock = {
  now: () => new Date(),
};

export function fixedClock(instant: Date | string): Clock {
  const frozen = new Date(instant);
  return { now: () => new Date(frozen) };
}

export interface ZonedDateTime {
  date: IsoDate;
  time: TimeOfDay;
  hour: number;
}

const formatterCache = new Map<string, Intl.DateTimeFormat>();

function formatterFor(timeZone: string): Intl.DateTimeFormat {
  let formatter = formatterCache.get(timeZone);
  if (!formatter) {
    formatter = new Intl.DateTimeFormat('en-US', {
      timeZone,
      year: 'numeric',
      month: '2-digit',
      day: '2-digit',
      hour: '2-digit',
      minute: '2-digit',
      hourCycle: 'h23',
    });
    formatterCache.set(timeZone, formatter);
  }
  return formatter;
}

/**
 * Local calendar date and HH:mm of an instant in the given zone
 */
export function toZoned(instant: Date, timeZone: string): ZonedDateTime {
  const parts: Record<string, string> = {};
  for (const part of formatterFor(timeZone).formatToParts(instant)) {
    parts[part.type] = part.value;
  }
  const hour = Number(parts.hour) % 24;
  const time = `${hour.toString().padStart(2, '0')}:${parts.minute}`;
  return {
    date: `${parts.year}-${parts.month}-${parts.day}`,
    time,
    hour,
  };
}

/**
 * Sortable "YYYY-MM-DD HH:mm" key for comparing stored booking starts
 */
export function zonedKey(instant: Date, timeZone: string): string {
  const zoned = toZoned(instant, timeZone);
  return `${zoned.date} ${zoned.time}`;
}
