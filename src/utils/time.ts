/**
 * Time and window model
 *
 * Pure value logic for calendar dates, HH:mm times and half-open minute
 * intervals. Availability resolution is interval arithmetic over small
 * ordered lists: collect, merge, subtract, quantize.
 */

import {
  AvailabilityWindow,
  Blackout,
  Interval,
  IsoDate,
  TimeOfDay,
  Weekday,
} from '../types';

export const MINUTES_PER_DAY = 24 * 60;

const TIME_REGEX = /^([0-1][0-9]|2[0-3]):[0-5][0-9]$/;
const END_OF_DAY: TimeOfDay = '24:00';
const DATE_REGEX = /^(\d{4})-(\d{2})-(\d{2})$/;
const SLOT_TOKEN_REGEX = /^(\d{2}:\d{2})-(\d{2}:\d{2})$/;

// Date#getUTCDay() is Sunday-based
const WEEKDAY_BY_UTC_DAY: Weekday[] = [6, 0, 1, 2, 3, 4, 5];

const WEEKDAY_NAMES = ['Monday', 'Tuesday', 'Wednesday', 'Thursday', 'Friday', 'Saturday', 'Sunday'];
const MONTH_NAMES = [
  'January', 'February', 'March', 'April', 'May', 'June',
  'July', 'August', 'September', 'October', 'November', 'December',
];

/**
 * Validate time string format (HH:MM)
 */
export function isValidTimeFormat(time: string): boolean {
  return TIME_REGEX.test(time);
}

/**
 * Like isValidTimeFormat, but also takes "24:00" so a range can run to midnight
 */
export function isValidEndTime(time: string): boolean {
  return time === END_OF_DAY || isValidTimeFormat(time);
}

/**
 * Parse time string (HH:MM) to minutes since midnight; "24:00" is 1440
 */
export function timeToMinutes(time: TimeOfDay): number {
  if (!isValidEndTime(time)) {
    throw new Error(`Invalid time format: ${time}`);
  }
  const [hours, minutes] = time.split(':').map(Number);
  return hours * 60 + minutes;
}

/**
 * Convert minutes since midnight to HH:MM. 1440 renders as "24:00" (end of day).
 */
export function minutesToTime(minutes: number): TimeOfDay {
  const hours = Math.floor(minutes / 60);
  const mins = minutes % 60;
  return `${hours.toString().padStart(2, '0')}:${mins.toString().padStart(2, '0')}`;
}

/**
 * Validate that start time is before end time
 */
export function isValidTimeRange(startTime: TimeOfDay, endTime: TimeOfDay): boolean {
  if (!isValidTimeFormat(startTime) || !isValidEndTime(endTime)) return false;
  return timeToMinutes(startTime) < timeToMinutes(endTime);
}

/**
 * YYYY-MM-DD that names a real calendar day
 */
export function isValidIsoDate(date: string): boolean {
  const match = DATE_REGEX.exec(date);
  if (!match) return false;
  const [year, month, day] = [Number(match[1]), Number(match[2]), Number(match[3])];
  const probe = new Date(Date.UTC(year, month - 1, day));
  return probe.getUTCFullYear() === year && probe.getUTCMonth() === month - 1 && probe.getUTCDate() === day;
}

function toUtcDate(date: IsoDate): Date {
  if (!isValidIsoDate(date)) {
    throw new Error(`Invalid date: ${date}`);
  }
  const [year, month, day] = date.split('-').map(Number);
  return new Date(Date.UTC(year, month - 1, day));
}

/**
 * Day of week with Monday = 0
 */
export function weekdayOf(date: IsoDate): Weekday {
  return WEEKDAY_BY_UTC_DAY[toUtcDate(date).getUTCDay()];
}

export function addDays(date: IsoDate, days: number): IsoDate {
  const shifted = toUtcDate(date);
  shifted.setUTCDate(shifted.getUTCDate() + days);
  return shifted.toISOString().slice(0, 10);
}

export function intervalsOverlap(a: Interval, b: Interval): boolean {
  return a.start < b.end && b.start < a.end;
}

/**
 * Sort and collapse overlapping or touching intervals into their union
 */
export function mergeIntervals(intervals: Interval[]): Interval[] {
  const sorted = intervals
    .filter((interval) => interval.end > interval.start)
    .sort((a, b) => a.start - b.start || a.end - b.end);

  const merged: Interval[] = [];
  for (const interval of sorted) {
    const last = merged[merged.length - 1];
    if (last && interval.start <= last.end) {
      last.end = Math.max(last.end, interval.end);
    } else {
      merged.push({ ...interval });
    }
  }
  return merged;
}

/**
 * Remove `cut` from every interval. A cut strictly inside an interval splits
 * it in two; pieces that end up empty are dropped.
 */
export function subtractInterval(intervals: Interval[], cut: Interval): Interval[] {
  const result: Interval[] = [];
  for (const interval of intervals) {
    if (!intervalsOverlap(interval, cut)) {
      result.push({ ...interval });
      continue;
    }
    if (cut.start > interval.start) {
      result.push({ start: interval.start, end: cut.start });
    }
    if (cut.end < interval.end) {
      result.push({ start: cut.end, end: interval.end });
    }
  }
  return result.filter((interval) => interval.end > interval.start);
}

/**
 * Merged availability for one date: weekly windows for that weekday plus
 * windows dated for that exact day.
 */
export function windowsFor(windows: AvailabilityWindow[], date: IsoDate): Interval[] {
  const weekday = weekdayOf(date);
  const applicable = windows.filter((window) =>
    window.kind === 'weekly' ? window.weekday === weekday : window.date === date
  );

  return mergeIntervals(
    applicable.map((window) => ({
      start: timeToMinutes(window.startTime),
      end: timeToMinutes(window.endTime),
    }))
  );
}

export type BlackoutSpan = Pick<Blackout, 'startDate' | 'endDate' | 'startTime' | 'endTime'>;

/**
 * The part of `date` a blackout removes, or null when it does not cover that date
 */
export function blackoutIntervalOn(blackout: BlackoutSpan, date: IsoDate): Interval | null {
  if (date < blackout.startDate || date > blackout.endDate) {
    return null;
  }
  if (blackout.startTime === null || blackout.endTime === null) {
    return { start: 0, end: MINUTES_PER_DAY };
  }
  return { start: timeToMinutes(blackout.startTime), end: timeToMinutes(blackout.endTime) };
}

export function applyBlackouts(windows: Interval[], blackouts: Blackout[], date: IsoDate): Interval[] {
  let remaining = mergeIntervals(windows);
  for (const blackout of blackouts) {
    const cut = blackoutIntervalOn(blackout, date);
    if (cut) {
      remaining = subtractInterval(remaining, cut);
    }
  }
  return remaining;
}

/**
 * Cut an interval into consecutive fixed-length pieces anchored at its start.
 * A trailing remainder shorter than the granularity is dropped.
 */
export function quantize(interval: Interval, granularity: number): Interval[] {
  if (granularity <= 0) {
    throw new Error(`Slot granularity must be positive, got ${granularity}`);
  }
  const pieces: Interval[] = [];
  for (let cursor = interval.start; cursor + granularity <= interval.end; cursor += granularity) {
    pieces.push({ start: cursor, end: cursor + granularity });
  }
  return pieces;
}

/**
 * Slot reference handed to clients, e.g. "09:30-10:00"
 */
export function formatSlotToken(startTime: TimeOfDay, endTime: TimeOfDay): string {
  return `${startTime}-${endTime}`;
}

export function parseSlotToken(token: string): { startTime: TimeOfDay; endTime: TimeOfDay } | null {
  const match = SLOT_TOKEN_REGEX.exec(token.trim());
  if (!match) return null;
  const [, startTime, endTime] = match;
  if (!isValidTimeRange(startTime, endTime)) return null;
  return { startTime, endTime };
}

/**
 * "13:05" -> "1:05 PM"
 */
export function formatTimeLabel(time: TimeOfDay): string {
  const minutes = timeToMinutes(time);
  const hours24 = Math.floor(minutes / 60);
  const suffix = hours24 % 24 < 12 ? 'AM' : 'PM';
  const hours12 = hours24 % 12 === 0 ? 12 : hours24 % 12;
  return `${hours12}:${(minutes % 60).toString().padStart(2, '0')} ${suffix}`;
}

/**
 * "2026-03-02", "09:00" -> "Monday, March 2 at 9:00 AM"
 */
export function formatSlotLabel(date: IsoDate, time: TimeOfDay): string {
  const utc = toUtcDate(date);
  const weekday = WEEKDAY_NAMES[weekdayOf(date)];
  const month = MONTH_NAMES[utc.getUTCMonth()];
  return `${weekday}, ${month} ${utc.getUTCDate()} at ${formatTimeLabel(time)}`;
}

/**
 * "2026-03-02" -> "March 2, 2026"
 */
export function formatLongDate(date: IsoDate): string {
  const utc = toUtcDate(date);
  return `${MONTH_NAMES[utc.getUTCMonth()]} ${utc.getUTCDate()}, ${utc.getUTCFullYear()}`;
}
