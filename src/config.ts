/**
 * Environment configuration
 * Read from process.env (populated by dotenv in the entry points) and validated with zod
 */

import { z } from 'zod';

const fairnessWindowSchema = z
  .string()
  .trim()
  .regex(/^(all|\d+)$/i, 'FAIRNESS_WINDOW_DAYS must be "all" or a whole number of days')
  .transform((value): number | null => (value.toLowerCase() === 'all' ? null : parseInt(value, 10)));

const timezoneSchema = z.string().refine((zone) => {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: zone });
    return true;
  } catch {
    return false;
  }
}, 'BOOKING_TIMEZONE must be an IANA time zone');

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3000),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  DATABASE_PATH: z.string().min(1).default('peer_tutoring.db'),
  CORS_ORIGIN: z.string().default(''),
  BOOKING_SLOT_MINUTES: z.coerce.number().int().min(5).max(240).default(30),
  FAIRNESS_WINDOW_DAYS: fairnessWindowSchema.default('all'),
  BOOKING_TIMEZONE: timezoneSchema.default('America/Los_Angeles'),
  BOOKING_CUTOFF_HOUR: z.coerce.number().int().min(0).max(24).default(22),
  REMINDER_HORIZON_HOURS: z.coerce.number().positive().default(24),
  TEXTBELT_API_KEY: z.string().default(''),
  TEXTBELT_URL: z.string().url().default('https://textbelt.com/text'),
  TEXTBELT_SENDER: z.string().min(1).default('Peer Tutoring'),
  NOTIFICATION_WAIT_MS: z.coerce.number().int().min(0).max(60_000).default(2000),
  RATE_LIMIT_MAX: z.coerce.number().int().positive().default(100),
});

export interface AppConfig {
  port: number;
  nodeEnv: 'development' | 'production' | 'test';
  databasePath: string;
  corsOrigins: string[];
  slotMinutes: number;
  /** Trailing fairness window in days; null counts all-time bookings. */
  fairnessWindowDays: number | null;
  timezone: string;
  bookingCutoffHour: number;
  reminderHorizonHours: number;
  textbelt: {
    apiKey: string;
    url: string;
    sender: string;
  };
  /** How long booking and cancel responses wait on SMS before answering anyway */
  notificationWaitMs: number;
  rateLimitMax: number;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const problems = result.error.errors.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid environment configuration: ${problems.join('; ')}`);
  }

  const parsed = result.data;
  return {
    port: parsed.PORT,
    nodeEnv: parsed.NODE_ENV,
    databasePath: parsed.DATABASE_PATH,
    corsOrigins: parsed.CORS_ORIGIN.split(',').map((o) => o.trim()).filter(Boolean),
    slotMinutes: parsed.BOOKING_SLOT_MINUTES,
    fairnessWindowDays: parsed.FAIRNESS_WINDOW_DAYS,
    timezone: parsed.BOOKING_TIMEZONE,
    bookingCutoffHour: parsed.BOOKING_CUTOFF_HOUR,
    reminderHorizonHours: parsed.REMINDER_HORIZON_HOURS,
    textbelt: {
      apiKey: parsed.TEXTBELT_API_KEY,
      url: parsed.TEXTBELT_URL,
      sender: parsed.TEXTBELT_SENDER,
    },
    notificationWaitMs: parsed.NOTIFICATION_WAIT_MS,
    rateLimitMax: parsed.RATE_LIMIT_MAX,
  };
}
