// config/engineConfig.ts
import { z } from 'zod';
import { timeOfDaySchema } from '../schemas/attendance';
import { describeIssues } from '../schemas/employee';
import { AppError, ErrorCode } from '../types/attendance/error';

const booleanFlag = z
  .enum(['true', 'false', '1', '0', ''])
  .default('false')
  .transform((value) => value === 'true' || value === '1');

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim() !== '' ? value.trim() : undefined));

const isTimeZone = (zone: string): boolean => {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: zone });
    return true;
  } catch {
    return false;
  }
};

const EnvSchema = z.object({
  LINE_CHANNEL_ACCESS_TOKEN: z.string().default(''),
  STORE_DRIVER: z.enum(['mongo', 'memory']).default('mongo'),
  MONGODB_URI: z.string().default('mongodb://localhost:27017/presence'),
  REDIS_URL: optionalString,

  OFFICE_LATITUDE: z.coerce.number().min(-90).max(90).default(31.0417),
  OFFICE_LONGITUDE: z.coerce.number().min(-180).max(180).default(31.3778),
  OFFICE_RADIUS: z.coerce.number().positive().default(100),

  TIMEZONE: z
    .string()
    .default('Africa/Cairo')
    .refine(isTimeZone, 'TIMEZONE must be an IANA time zone'),
  DEFAULT_WORK_START: timeOfDaySchema.default('09:00'),
  DEFAULT_WORK_END: timeOfDaySchema.default('17:00'),

  LATE_THRESHOLD_MINUTES: z.coerce.number().int().min(0).default(30),
  MISSED_CHECKOUT_HOURS: z.coerce.number().positive().default(10),
  ADMIN_DAILY_SUMMARY_TIME: timeOfDaySchema.default('20:00'),
  ADMIN_MISSED_CHECKOUT_TIME: timeOfDaySchema.default('20:00'),
  CONVERSATION_TTL_MINUTES: z.coerce.number().int().positive().default(30),

  SCHEDULER_TICK_SECONDS: z.coerce.number().int().positive().default(60),
  // A daily window may run past midnight but never into the next opening
  SCHEDULER_CATCH_UP_MINUTES: z.coerce.number().int().positive().max(1439).default(120),
  DISPATCH_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),

  SERVER_URL: optionalString,
  ENABLE_SERVER_WAKEUP: booleanFlag,
  HEALTH_CHECK_INTERVAL_MINUTES: z.coerce.number().int().positive().default(14),

  BOOTSTRAP_ADMIN_IDS: z
    .string()
    .default('')
    .transform((value) =>
      value
        .split(',')
        .map((id) => id.trim())
        .filter((id) => id.length > 0),
    ),

  LOG_LEVEL: z
    .enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'])
    .default('info'),
  LOG_DIR: optionalString,
});

export interface EngineConfig {
  lineChannelAccessToken: string;
  storeDriver: 'mongo' | 'memory';
  mongoUri: string;
  redisUrl?: string;
  office: {
    latitude: number;
    longitude: number;
    radiusMeters: number;
  };
  timezone: string;
  defaultWorkHours: { start: string; end: string };
  lateThresholdMinutes: number;
  missedCheckoutHours: number;
  adminDailySummaryTime: string;
  adminMissedCheckoutTime: string;
  conversationTtlMinutes: number;
  scheduler: {
    tickSeconds: number;
    catchUpMinutes: number;
    dispatchTimeoutMs: number;
  };
  keepAlive: {
    enabled: boolean;
    serverUrl?: string;
    intervalMinutes: number;
  };
  bootstrapAdminIds: string[];
  logLevel: string;
  logDir?: string;
}

export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): EngineConfig {
  // Empty strings mean "unset" so that defaults apply
  const cleaned = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== ''),
  );
  const parsed = EnvSchema.safeParse(cleaned);

  if (!parsed.success) {
    throw new AppError({
      code: ErrorCode.VALIDATION_ERROR,
      message: `Configuration errors: ${describeIssues(parsed.error)}`,
      details: { issues: parsed.error.issues },
    });
  }

  const vars = parsed.data;
  if (vars.DEFAULT_WORK_START >= vars.DEFAULT_WORK_END) {
    throw new AppError({
      code: ErrorCode.VALIDATION_ERROR,
      message:
        'Configuration errors: DEFAULT_WORK_START must be before DEFAULT_WORK_END',
    });
  }

  return Object.freeze({
    lineChannelAccessToken: vars.LINE_CHANNEL_ACCESS_TOKEN,
    storeDriver: vars.STORE_DRIVER,
    mongoUri: vars.MONGODB_URI,
    redisUrl: vars.REDIS_URL,
    office: {
      latitude: vars.OFFICE_LATITUDE,
      longitude: vars.OFFICE_LONGITUDE,
      radiusMeters: vars.OFFICE_RADIUS,
    },
    timezone: vars.TIMEZONE,
    defaultWorkHours: {
      start: vars.DEFAULT_WORK_START,
      end: vars.DEFAULT_WORK_END,
    },
    lateThresholdMinutes: vars.LATE_THRESHOLD_MINUTES,
    missedCheckoutHours: vars.MISSED_CHECKOUT_HOURS,
    adminDailySummaryTime: vars.ADMIN_DAILY_SUMMARY_TIME,
    adminMissedCheckoutTime: vars.ADMIN_MISSED_CHECKOUT_TIME,
    conversationTtlMinutes: vars.CONVERSATION_TTL_MINUTES,
    scheduler: {
      tickSeconds: vars.SCHEDULER_TICK_SECONDS,
      catchUpMinutes: vars.SCHEDULER_CATCH_UP_MINUTES,
      dispatchTimeoutMs: vars.DISPATCH_TIMEOUT_MS,
    },
    keepAlive: {
      enabled: vars.ENABLE_SERVER_WAKEUP,
      serverUrl: vars.SERVER_URL,
      intervalMinutes: vars.HEALTH_CHECK_INTERVAL_MINUTES,
    },
    bootstrapAdminIds: vars.BOOTSTRAP_ADMIN_IDS,
    logLevel: vars.LOG_LEVEL,
    logDir: vars.LOG_DIR,
  });
}
