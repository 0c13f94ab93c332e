// __tests__/config/engineConfig.test.ts
import { loadConfig } from '@/config/engineConfig';
import { AppError, ErrorCode } from '@/types/attendance/error';

const expectConfigError = (env: Record<string, string>, fragment: string) => {
  let caught: unknown;
  try {
    loadConfig(env);
  } catch (error) {
    caught = error;
  }
  expect(caught).toBeInstanceOf(AppError);
  if (!(caught instanceof AppError)) return;
  expect(caught.code).toBe(ErrorCode.VALIDATION_ERROR);
  expect(caught.message).toContain(fragment);
};

describe('loadConfig', () => {
  it('should apply defaults to an empty environment', () => {
    const config = loadConfig({});

    expect(config.storeDriver).toBe('mongo');
    expect(config.timezone).toBe('Africa/Cairo');
    expect(config.office).toEqual({
      latitude: 31.0417,
      longitude: 31.3778,
      radiusMeters: 100,
    });
    expect(config.defaultWorkHours).toEqual({ start: '09:00', end: '17:00' });
    expect(config.lateThresholdMinutes).toBe(30);
    expect(config.missedCheckoutHours).toBe(10);
    expect(config.adminDailySummaryTime).toBe('20:00');
    expect(config.adminMissedCheckoutTime).toBe('20:00');
    expect(config.conversationTtlMinutes).toBe(30);
    expect(config.scheduler).toEqual({
      tickSeconds: 60,
      catchUpMinutes: 120,
      dispatchTimeoutMs: 10000,
    });
    expect(config.keepAlive).toEqual({
      enabled: false,
      serverUrl: undefined,
      intervalMinutes: 14,
    });
    expect(config.bootstrapAdminIds).toEqual([]);
    expect(config.redisUrl).toBeUndefined();
  });

  it('should treat empty strings as unset', () => {
    const config = loadConfig({ TIMEZONE: '', OFFICE_RADIUS: '' });
    expect(config.timezone).toBe('Africa/Cairo');
    expect(config.office.radiusMeters).toBe(100);
  });

  it('should coerce numbers, flags and lists', () => {
    const config = loadConfig({
      OFFICE_RADIUS: '250',
      ENABLE_SERVER_WAKEUP: 'true',
      SERVER_URL: ' https://attendance.example.com ',
      BOOTSTRAP_ADMIN_IDS: 'U-admin-1, ,U-admin-2',
    });

    expect(config.office.radiusMeters).toBe(250);
    expect(config.keepAlive.enabled).toBe(true);
    expect(config.keepAlive.serverUrl).toBe('https://attendance.example.com');
    expect(config.bootstrapAdminIds).toEqual(['U-admin-1', 'U-admin-2']);
  });

  it('should return a frozen object', () => {
    expect(Object.isFrozen(loadConfig({}))).toBe(true);
  });

  it('should reject an unknown time zone', () => {
    expectConfigError({ TIMEZONE: 'Mars/Olympus' }, 'TIMEZONE');
  });

  it('should reject malformed times', () => {
    expectConfigError({ DEFAULT_WORK_START: '9am' }, 'DEFAULT_WORK_START');
  });

  it('should reject a work day that ends before it starts', () => {
    expectConfigError(
      { DEFAULT_WORK_START: '17:00', DEFAULT_WORK_END: '09:00' },
      'DEFAULT_WORK_START must be before DEFAULT_WORK_END',
    );
  });

  it('should reject a non-positive radius', () => {
    expectConfigError({ OFFICE_RADIUS: '0' }, 'OFFICE_RADIUS');
  });

  it('should reject a catch-up window of a whole day or more', () => {
    expectConfigError({ SCHEDULER_CATCH_UP_MINUTES: '1440' }, 'SCHEDULER_CATCH_UP_MINUTES');
    expect(loadConfig({ SCHEDULER_CATCH_UP_MINUTES: '1439' }).scheduler.catchUpMinutes).toBe(1439);
  });
});
