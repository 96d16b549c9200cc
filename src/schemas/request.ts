/**
 * Zod schemas for request validation
 */

import { z } from 'zod';
import { isValidEndTime, isValidIsoDate, isValidTimeFormat, isValidTimeRange } from '../utils/time';

const dateSchema = z
  .string()
  .trim()
  .refine(isValidIsoDate, 'Date must be a real calendar day in YYYY-MM-DD format');

const timeSchema = z.string().trim().refine(isValidTimeFormat, 'Time must be in HH:MM format');

// "24:00" closes a range at midnight
const endTimeSchema = z.string().trim().refine(isValidEndTime, 'Time must be in HH:MM format or 24:00');

const idSchema = z.string().trim().min(1).max(64);

const phoneSchema = z
  .string()
  .trim()
  .refine((value) => value.replace(/\D/g, '').length >= 10, 'Phone number must have at least 10 digits');

export const availabilityQuerySchema = z.object({
  subject_id: idSchema,
  date: dateSchema,
});

export const bookingRequestSchema = z.object({
  subject_id: idSchema,
  date: dateSchema,
  slot: z.string().trim().regex(/^\d{2}:\d{2}-\d{2}:\d{2}$/, 'Slot must look like HH:MM-HH:MM'),
  student_name: z.string().trim().min(1).max(120),
  student_phone: phoneSchema,
});

const actorSchema = z.discriminatedUnion('role', [
  z.object({ role: z.literal('admin') }),
  z.object({ role: z.literal('tutor'), tutor_id: idSchema }),
]);

export const cancelRequestSchema = z.object({
  actor: actorSchema,
  reason: z.string().max(1000).optional(),
});

export const adminBookingsQuerySchema = z.object({
  status: z.enum(['confirmed', 'cancelled']).optional(),
});

export const createTutorSchema = z.object({
  name: z.string().trim().min(1).max(120),
  phone: phoneSchema,
  subject_ids: z.array(idSchema).default([]),
});

export const tutorSubjectsSchema = z.object({
  subject_ids: z.array(idSchema),
});

export const tutorActiveSchema = z.object({
  active: z.boolean(),
});

// Refinements still run when a field failed, so check the format first
const timeRange = <T extends { start_time: string; end_time: string }>(value: T) =>
  !isValidTimeFormat(value.start_time) ||
  !isValidEndTime(value.end_time) ||
  isValidTimeRange(value.start_time, value.end_time);

export const availabilityWindowSchema = z
  .discriminatedUnion('kind', [
    z.object({
      kind: z.literal('weekly'),
      weekday: z.union([
        z.literal(0), z.literal(1), z.literal(2), z.literal(3),
        z.literal(4), z.literal(5), z.literal(6),
      ]),
      start_time: timeSchema,
      end_time: endTimeSchema,
    }),
    z.object({
      kind: z.literal('dated'),
      date: dateSchema,
      start_time: timeSchema,
      end_time: endTimeSchema,
    }),
  ])
  .refine(timeRange, { message: 'End time must be after start time', path: ['end_time'] });

export const blackoutSchema = z
  .object({
    start_date: dateSchema,
    end_date: dateSchema.optional(),
    start_time: timeSchema.nullish(),
    end_time: endTimeSchema.nullish(),
    note: z.string().trim().max(255).optional(),
  })
  .refine((value) => (value.start_time == null) === (value.end_time == null), {
    message: 'Provide both start_time and end_time, or neither for a full-day blackout',
    path: ['end_time'],
  });
