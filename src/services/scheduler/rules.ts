// services/scheduler/rules.ts
import axios from 'axios';
import { EngineConfig } from '../../config/engineConfig';
import { AttendanceStore } from '../../lib/store/AttendanceStore';
import { LocalDate, NotificationRuleId } from '../../types/attendance';
import { AppError, ErrorCode, Result, ok } from '../../types/attendance/error';
import { previousLocalDate, timeToMinutes } from '../../utils/dateUtils';
import { describeError } from '../../utils/logger';
import {
  OverdueSession,
  checkinReminder,
  checkoutReminder,
  dailySummaryText,
  missedCheckout,
  missedCheckoutDigest,
} from '../../utils/messages';
import { AttendanceLedger } from '../Attendance/AttendanceLedger';
import { NotificationService } from '../NotificationService';
import { WorkScheduleResolver } from '../WorkScheduleResolver';

/** Fetches `${url}`; resolves on any 2xx. */
export type HealthPinger = (url: string, timeoutMs: number) => Promise<void>;

export const axiosHealthPinger: HealthPinger = async (url, timeoutMs) => {
  await axios.get(url, { timeout: timeoutMs });
};

export interface RuleContext {
  now: Date;
  date: LocalDate;
  // Minutes since local midnight
  minuteOfDay: number;
}

export interface RuleSubject {
  subjectId: string;
  // Date the idempotency record is filed under
  date: LocalDate;
  compose(): Promise<string>;
  deliver(message: string): Promise<Result<void>>;
}

export interface NotificationRule {
  id: NotificationRuleId;
  /** Window predicate; subjects are only listed while it holds. */
  isActive(context: RuleContext): boolean;
  subjects(context: RuleContext): Promise<RuleSubject[]>;
}

export interface RuleDependencies {
  config: EngineConfig;
  store: AttendanceStore;
  ledger: AttendanceLedger;
  resolver: WorkScheduleResolver;
  notifications: NotificationService;
  pinger?: HealthPinger;
}

const unwrap = <T>(result: Result<T>): T => {
  if (!result.success) throw result.error;
  return result.data;
};

const MINUTES_PER_DAY = 24 * 60;

export function inWindow(minute: number, start: number, endExclusive: number): boolean {
  return minute >= start && minute < endExclusive;
}

/**
 * Date on which a daily window of `length` minutes opening at `start` was
 * opened, or null outside it. Past midnight the window belongs to the day before.
 */
export function dailyWindowDate(
  { date, minuteOfDay }: RuleContext,
  start: number,
  length: number,
): LocalDate | null {
  if (inWindow(minuteOfDay, start, start + length)) return date;
  const overflow = start + length - MINUTES_PER_DAY;
  return overflow > 0 && minuteOfDay < overflow ? previousLocalDate(date) : null;
}

export function dailySummaryRule(deps: RuleDependencies): NotificationRule {
  const start = timeToMinutes(deps.config.adminDailySummaryTime);
  const window = (context: RuleContext) =>
    dailyWindowDate(context, start, deps.config.scheduler.catchUpMinutes);

  return {
    id: 'daily-summary',
    isActive: (context) => window(context) !== null,
    async subjects(context) {
      const date = window(context);
      if (!date) return [];
      const admins = await deps.notifications.recipients('dailySummary');
      let text: Promise<string> | null = null;
      // Built at most once per tick, and only if someone still needs it
      const compose = () => {
        text ??= deps.ledger
          .dailySummary(date)
          .then((result) => dailySummaryText(unwrap(result), deps.config.timezone));
        return text;
      };

      return admins.map((admin) => ({
        subjectId: admin.adminId,
        date,
        compose,
        deliver: (message: string) => deps.notifications.send(admin.adminId, message),
      }));
    },
  };
}

export function checkinReminderRule(deps: RuleDependencies): NotificationRule {
  return {
    id: 'checkin-reminder',
    // Windows differ per employee and are checked in subjects()
    isActive: () => true,
    async subjects({ date, minuteOfDay, now }) {
      const employees = await deps.store.listEmployees({ activeOnly: true });
      const due: RuleSubject[] = [];

      for (const employee of employees) {
        const hours = unwrap(
          await deps.resolver.effectiveHours(employee.employeeId, date),
        );
        const from = timeToMinutes(hours.start) + deps.config.lateThresholdMinutes;
        if (!inWindow(minuteOfDay, from, timeToMinutes(hours.end))) continue;

        const sessions = await deps.store.listSessionsForDay(employee.employeeId, date);
        if (sessions.length > 0) continue;
        const pending = unwrap(await deps.ledger.pending(employee.employeeId, now));
        if (pending) continue;

        due.push({
          subjectId: employee.employeeId,
          date,
          compose: async () => checkinReminder(employee, hours),
          deliver: (message) => deps.notifications.send(employee.employeeId, message),
        });
      }
      return due;
    },
  };
}

export function missedCheckoutRule(deps: RuleDependencies): NotificationRule {
  const thresholdMs = deps.config.missedCheckoutHours * 60 * 60 * 1000;

  return {
    id: 'missed-checkout',
    isActive: () => true,
    async subjects({ now }) {
      const open = await deps.store.listOpenSessions();
      return open
        .filter((session) => now.getTime() - session.checkIn.time.getTime() >= thresholdMs)
        .map((session) => ({
          subjectId: session.employeeId,
          date: session.date,
          compose: async () => missedCheckout(session, deps.config.timezone),
          deliver: (message: string) =>
            deps.notifications.send(session.employeeId, message),
        }));
    },
  };
}

export function checkoutReminderRule(deps: RuleDependencies): NotificationRule {
  return {
    id: 'checkout-reminder',
    // From each employee's end of day until midnight
    isActive: () => true,
    async subjects({ date, minuteOfDay, now }) {
      const open = await deps.store.listOpenSessions();
      const due: RuleSubject[] = [];

      for (const session of open) {
        if (session.date !== date) continue;
        const employee = await deps.store.findEmployee(session.employeeId);
        if (!employee?.active) continue;

        const hours = unwrap(await deps.resolver.effectiveHours(employee.employeeId, date));
        if (minuteOfDay < timeToMinutes(hours.end)) continue;
        // An early check-out is already waiting for its reason
        const pending = unwrap(await deps.ledger.pending(employee.employeeId, now));
        if (pending) continue;

        due.push({
          subjectId: employee.employeeId,
          date,
          compose: async () => checkoutReminder(employee, hours),
          deliver: (message) => deps.notifications.send(employee.employeeId, message),
        });
      }
      return due;
    },
  };
}

export function missedCheckoutDigestRule(deps: RuleDependencies): NotificationRule {
  const start = timeToMinutes(deps.config.adminMissedCheckoutTime);
  const thresholdMs = deps.config.missedCheckoutHours * 60 * 60 * 1000;
  const window = (context: RuleContext) =>
    dailyWindowDate(context, start, deps.config.scheduler.catchUpMinutes);

  return {
    id: 'missed-checkout-digest',
    isActive: (context) => window(context) !== null,
    async subjects(context) {
      const date = window(context);
      if (!date) return [];
      const { now } = context;

      const open = await deps.store.listOpenSessions();
      const sessions = open.filter(
        (session) =>
          session.date === date && now.getTime() - session.checkIn.time.getTime() >= thresholdMs,
      );
      if (sessions.length === 0) return [];

      const employees = await deps.store.listEmployees();
      const names = new Map(employees.map((employee) => [employee.employeeId, employee.name]));
      const overdue: OverdueSession[] = sessions.map((session) => ({
        name: names.get(session.employeeId) ?? session.employeeId,
        session,
      }));
      const text = missedCheckoutDigest(date, overdue, now, deps.config.timezone);

      const admins = await deps.notifications.recipients('alerts');
      return admins.map((admin) => ({
        subjectId: admin.adminId,
        date,
        compose: async () => text,
        deliver: (message: string) => deps.notifications.send(admin.adminId, message),
      }));
    },
  };
}

export function slotKey(minuteOfDay: number, intervalMinutes: number): string {
  const slot = Math.floor(minuteOfDay / intervalMinutes) * intervalMinutes;
  const hours = String(Math.floor(slot / 60)).padStart(2, '0');
  const minutes = String(slot % 60).padStart(2, '0');
  return `slot:${hours}${minutes}`;
}

export function keepAliveRule(deps: RuleDependencies): NotificationRule {
  const { enabled, serverUrl, intervalMinutes } = deps.config.keepAlive;
  const pinger = deps.pinger ?? axiosHealthPinger;

  return {
    id: 'keep-alive',
    isActive: () => enabled && serverUrl !== undefined,
    async subjects({ date, minuteOfDay }) {
      if (!serverUrl) return [];
      const url = `${serverUrl.replace(/\/+$/, '')}/health`;

      return [
        {
          subjectId: slotKey(minuteOfDay, intervalMinutes),
          date,
          compose: async () => `GET ${url}`,
          async deliver() {
            try {
              await pinger(url, deps.config.scheduler.dispatchTimeoutMs);
              return ok(undefined);
            } catch (error) {
              return {
                success: false,
                error: new AppError({
                  code: ErrorCode.DISPATCH_FAILURE,
                  message: `Health check failed: ${describeError(error)}`,
                  details: { url },
                  originalError: error,
                }),
              };
            }
          },
        },
      ];
    },
  };
}

export function createDefaultRules(deps: RuleDependencies): NotificationRule[] {
  return [
    dailySummaryRule(deps),
    checkinReminderRule(deps),
    checkoutReminderRule(deps),
    missedCheckoutRule(deps),
    missedCheckoutDigestRule(deps),
    keepAliveRule(deps),
  ];
}
