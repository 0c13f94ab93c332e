// services/Attendance/AttendanceLedger.ts
import { addMinutes } from 'date-fns';
import { AttendanceStore } from '../../lib/store/AttendanceStore';
import { localDateSchema } from '../../schemas/attendance';
import {
  AttendanceSession,
  CheckOutcome,
  CheckPoint,
  ConversationState,
  DailySummary,
  Employee,
  GeoPoint,
  LocalDate,
  PendingAttendance,
  PendingKind,
  SummaryEntry,
  modeForKind,
} from '../../types/attendance';
import {
  ErrorCode,
  Result,
  fail,
  ok,
  toAppError,
} from '../../types/attendance/error';
import {
  Clock,
  calculateTimeDifference,
  secondsOfDay,
  systemClock,
  timeToMinutes,
  toLocalDate,
} from '../../utils/dateUtils';
import { Logger, createSilentLogger } from '../../utils/logger';
import { WorkScheduleResolver } from '../WorkScheduleResolver';
import { EmployeeLock, MemoryEmployeeLock } from './EmployeeLock';

export interface AttendanceLedgerOptions {
  store: AttendanceStore;
  resolver: WorkScheduleResolver;
  timezone: string;
  conversationTtlMinutes: number;
  lock?: EmployeeLock;
  clock?: Clock;
  logger?: Logger;
}

const MAX_HISTORY = 100;

/** `late` when the event falls strictly after the start, to the second. */
export function isLateArrival(eventTime: Date, start: string, timezone: string): boolean {
  return secondsOfDay(eventTime, timezone) > timeToMinutes(start) * 60;
}

/** `early` when the event falls strictly before the end, to the second. */
export function isEarlyDeparture(eventTime: Date, end: string, timezone: string): boolean {
  return secondsOfDay(eventTime, timezone) < timeToMinutes(end) * 60;
}

export function workDurationMinutes(session: AttendanceSession): number | null {
  if (!session.checkOut) return null;
  return calculateTimeDifference(session.checkIn.time, session.checkOut.time);
}

/**
 * Owns attendance sessions. Late and early events are not written until a
 * reason arrives: they are parked as a pending transaction keyed by employee
 * and written by the matching finalize call.
 */
export class AttendanceLedger {
  private readonly store: AttendanceStore;
  private readonly resolver: WorkScheduleResolver;
  private readonly timezone: string;
  private readonly ttlMinutes: number;
  private readonly lock: EmployeeLock;
  private readonly clock: Clock;
  private readonly logger: Logger;

  constructor(options: AttendanceLedgerOptions) {
    this.store = options.store;
    this.resolver = options.resolver;
    this.timezone = options.timezone;
    this.ttlMinutes = options.conversationTtlMinutes;
    this.lock = options.lock ?? new MemoryEmployeeLock();
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? createSilentLogger('AttendanceLedger');
  }

  async checkIn(
    employeeId: string,
    eventTime: Date,
    location: GeoPoint,
    distance: number,
  ): Promise<Result<CheckOutcome>> {
    return this.guarded<CheckOutcome>('checkIn', employeeId, async () => {
      const employee = await this.store.findEmployee(employeeId);
      if (!employee || !employee.active) {
        return fail(
          ErrorCode.NOT_REGISTERED,
          `Employee ${employeeId} is not registered`,
        );
      }

      const date = toLocalDate(eventTime, this.timezone);
      if (await this.store.findOpenSession(employeeId, date)) {
        return fail(
          ErrorCode.ALREADY_OPEN_SESSION,
          `Employee ${employeeId} is already checked in on ${date}`,
          { date },
        );
      }

      const hours = await this.resolver.effectiveHours(employeeId, date);
      if (!hours.success) return hours;

      const event: CheckPoint = { time: eventTime, location, distance };

      if (isLateArrival(eventTime, hours.data.start, this.timezone)) {
        return ok(
          await this.beginPending({
            kind: 'check-in',
            employeeId,
            date,
            event,
            hours: hours.data,
          }),
        );
      }

      const session = await this.store.insertOpenSession({
        employeeId,
        date,
        checkIn: event,
        isLate: false,
        lateReason: null,
        scheduledStart: hours.data.start,
        scheduledEnd: hours.data.end,
      });
      if (!session) {
        return fail(
          ErrorCode.ALREADY_OPEN_SESSION,
          `Employee ${employeeId} is already checked in on ${date}`,
          { date },
        );
      }

      await this.dropSuperseded(employeeId);
      this.logger.info('Check-in recorded', { employeeId, date, sessionId: session.id });
      return ok<CheckOutcome>({ status: 'recorded', session });
    });
  }

  async checkOut(
    employeeId: string,
    eventTime: Date,
    location: GeoPoint,
    distance: number,
  ): Promise<Result<CheckOutcome>> {
    return this.guarded<CheckOutcome>('checkOut', employeeId, async () => {
      const date = toLocalDate(eventTime, this.timezone);
      const open = await this.store.findOpenSession(employeeId, date);
      if (!open) {
        return fail(
          ErrorCode.NO_OPEN_SESSION,
          `Employee ${employeeId} has no open session on ${date}`,
          { date },
        );
      }
      if (eventTime.getTime() <= open.checkIn.time.getTime()) {
        return fail(
          ErrorCode.INVALID_EVENT_TIME,
          'Check-out must be after check-in',
          { checkIn: open.checkIn.time.toISOString(), checkOut: eventTime.toISOString() },
        );
      }

      const hours = await this.resolver.effectiveHours(employeeId, date);
      if (!hours.success) return hours;

      const event: CheckPoint = { time: eventTime, location, distance };

      if (isEarlyDeparture(eventTime, hours.data.end, this.timezone)) {
        return ok(
          await this.beginPending({
            kind: 'check-out',
            employeeId,
            date,
            event,
            hours: hours.data,
            sessionId: open.id,
          }),
        );
      }

      const session = await this.store.closeSession(open.id, {
        checkOut: event,
        isEarly: false,
        earlyReason: null,
        scheduledEnd: hours.data.end,
      });
      if (!session) {
        return fail(
          ErrorCode.NO_OPEN_SESSION,
          `Session ${open.id} is no longer open`,
        );
      }

      await this.dropSuperseded(employeeId);
      this.logger.info('Check-out recorded', { employeeId, date, sessionId: session.id });
      return ok<CheckOutcome>({ status: 'recorded', session });
    });
  }

  async finalizeCheckIn(
    employeeId: string,
    payload: PendingAttendance,
    reason: string,
  ): Promise<Result<AttendanceSession>> {
    return this.finalize('check-in', employeeId, payload, reason, async (pending, text) => {
      const session = await this.store.insertOpenSession({
        employeeId,
        date: pending.date,
        checkIn: pending.event,
        isLate: true,
        lateReason: text,
        scheduledStart: pending.hours.start,
        scheduledEnd: pending.hours.end,
      });
      if (!session) {
        return fail(
          ErrorCode.ALREADY_OPEN_SESSION,
          `Employee ${employeeId} is already checked in on ${pending.date}`,
        );
      }
      return ok(session);
    });
  }

  async finalizeCheckOut(
    employeeId: string,
    payload: PendingAttendance,
    reason: string,
  ): Promise<Result<AttendanceSession>> {
    return this.finalize('check-out', employeeId, payload, reason, async (pending, text) => {
      const session = pending.sessionId
        ? await this.store.closeSession(pending.sessionId, {
            checkOut: pending.event,
            isEarly: true,
            earlyReason: text,
            scheduledEnd: pending.hours.end,
          })
        : null;
      if (!session) {
        return fail(
          ErrorCode.NO_OPEN_SESSION,
          `Employee ${employeeId} has no open session to close`,
        );
      }
      return ok(session);
    });
  }

  /** Live pending transaction for the employee; expired entries read as none. */
  async pending(
    employeeId: string,
    now: Date = this.clock.now(),
  ): Promise<Result<ConversationState | null>> {
    try {
      const state = await this.store.findConversation(employeeId);
      return ok(state && !this.isExpired(state, now) ? state : null);
    } catch (error) {
      return { success: false, error: toAppError(error) };
    }
  }

  /** Parks a pending transaction, replacing any older one for the employee. */
  async beginPending(
    pending: PendingAttendance,
  ): Promise<Extract<CheckOutcome, { status: 'justification-required' }>> {
    const now = this.clock.now();
    const expiresAt = addMinutes(now, this.ttlMinutes);
    await this.store.saveConversation({
      employeeId: pending.employeeId,
      mode: modeForKind(pending.kind),
      payload: pending,
      expiresAt,
      createdAt: now,
    });
    this.logger.info('Justification required', {
      employeeId: pending.employeeId,
      kind: pending.kind,
      date: pending.date,
      expiresAt: expiresAt.toISOString(),
    });
    return { status: 'justification-required', pending, expiresAt };
  }

  async abort(employeeId: string): Promise<Result<boolean>> {
    try {
      const removed = await this.store.deleteConversation(employeeId);
      if (removed) this.logger.info('Pending attendance aborted', { employeeId });
      return ok(removed);
    } catch (error) {
      return { success: false, error: toAppError(error) };
    }
  }

  async status(
    employeeId: string,
    date: LocalDate,
  ): Promise<Result<AttendanceSession | null>> {
    if (!localDateSchema.safeParse(date).success) {
      return fail(ErrorCode.INVALID_SCHEDULE, `Malformed date: ${date}`, { date });
    }
    try {
      const open = await this.store.findOpenSession(employeeId, date);
      if (open) return ok(open);

      const sessions = await this.store.listSessionsForDay(employeeId, date);
      const closed = sessions.filter((session) => session.status === 'closed');
      return ok(closed.length > 0 ? closed[closed.length - 1] : null);
    } catch (error) {
      return { success: false, error: toAppError(error) };
    }
  }

  async history(employeeId: string, limit = 10): Promise<Result<AttendanceSession[]>> {
    const bounded = Math.min(Math.max(Math.floor(limit), 1), MAX_HISTORY);
    try {
      return ok(await this.store.listHistory(employeeId, bounded));
    } catch (error) {
      return { success: false, error: toAppError(error) };
    }
  }

  async dailySummary(date: LocalDate): Promise<Result<DailySummary>> {
    if (!localDateSchema.safeParse(date).success) {
      return fail(ErrorCode.INVALID_SCHEDULE, `Malformed date: ${date}`, { date });
    }
    try {
      const [employees, sessions] = await Promise.all([
        this.store.listEmployees(),
        this.store.listSessionsByDate(date),
      ]);
      return ok(buildDailySummary(date, employees, sessions));
    } catch (error) {
      return { success: false, error: toAppError(error) };
    }
  }

  today(): LocalDate {
    return toLocalDate(this.clock.now(), this.timezone);
  }

  private async finalize(
    kind: PendingKind,
    employeeId: string,
    payload: PendingAttendance,
    reason: string,
    write: (pending: PendingAttendance, reason: string) => Promise<Result<AttendanceSession>>,
  ): Promise<Result<AttendanceSession>> {
    return this.guarded<AttendanceSession>(`finalize:${kind}`, employeeId, async () => {
      const state = await this.store.findConversation(employeeId);
      if (
        !state ||
        this.isExpired(state) ||
        state.payload.kind !== kind ||
        !samePending(state.payload, payload)
      ) {
        return fail(
          ErrorCode.NO_PENDING_ACTION,
          `No pending ${kind} for employee ${employeeId}`,
        );
      }

      const text = reason.trim();
      if (text === '') {
        return fail(ErrorCode.INVALID_REASON, 'A reason is required');
      }

      const written = await write(state.payload, text);
      // The pending entry is consumed either way; a failed write cannot succeed later
      await this.store.deleteConversation(employeeId);
      if (written.success) {
        this.logger.info('Pending attendance finalized', {
          employeeId,
          kind,
          sessionId: written.data.id,
        });
      }
      return written;
    });
  }

  // An event recorded without a reason replaces whatever was still waiting for one
  private async dropSuperseded(employeeId: string): Promise<void> {
    if (await this.store.deleteConversation(employeeId)) {
      this.logger.info('Pending attendance superseded', { employeeId });
    }
  }

  private isExpired(state: ConversationState, now: Date = this.clock.now()): boolean {
    return state.expiresAt.getTime() <= now.getTime();
  }

  private async guarded<T>(
    operation: string,
    employeeId: string,
    fn: () => Promise<Result<T>>,
  ): Promise<Result<T>> {
    try {
      return await this.lock.withLock(employeeId, fn);
    } catch (error) {
      const appError = toAppError(error);
      this.logger.error(`${operation} failed`, {
        employeeId,
        code: appError.code,
        error: appError.message,
      });
      return { success: false, error: appError };
    }
  }
}

function samePending(a: PendingAttendance, b: PendingAttendance): boolean {
  return (
    a.kind === b.kind &&
    a.employeeId === b.employeeId &&
    a.date === b.date &&
    a.event.time.getTime() === b.event.time.getTime()
  );
}

/** Counts cover active employees only; sessions of deactivated ones are left out. */
export function buildDailySummary(
  date: LocalDate,
  employees: Employee[],
  allSessions: AttendanceSession[],
): DailySummary {
  const active = employees.filter((employee) => employee.active);
  const names = new Map(active.map((employee) => [employee.employeeId, employee.name]));
  const nameOf = (employeeId: string) => names.get(employeeId) ?? employeeId;
  const sessions = allSessions.filter((session) => names.has(session.employeeId));

  const present = new Set(sessions.map((session) => session.employeeId));
  const working = new Set(
    sessions
      .filter((session) => session.status === 'open')
      .map((session) => session.employeeId),
  );
  const checkedOut = [...present].filter((employeeId) => !working.has(employeeId));

  const byCheckIn = [...sessions].sort(
    (a, b) => a.checkIn.time.getTime() - b.checkIn.time.getTime(),
  );
  const late: SummaryEntry[] = byCheckIn
    .filter((session) => session.isLate)
    .map((session) => ({
      employeeId: session.employeeId,
      name: nameOf(session.employeeId),
      time: session.checkIn.time,
      reason: session.lateReason,
    }));
  const early: SummaryEntry[] = byCheckIn.flatMap((session) =>
    session.isEarly && session.checkOut
      ? [
          {
            employeeId: session.employeeId,
            name: nameOf(session.employeeId),
            time: session.checkOut.time,
            reason: session.earlyReason,
          },
        ]
      : [],
  );
  const absent = active
    .filter((employee) => !present.has(employee.employeeId))
    .map((employee) => ({ employeeId: employee.employeeId, name: employee.name }));

  const attendanceRate =
    active.length === 0 ? 0 : Math.round((present.size / active.length) * 1000) / 10;

  return {
    date,
    totalEmployees: active.length,
    checkedIn: present.size,
    checkedOut: checkedOut.length,
    stillWorking: working.size,
    lateCount: late.length,
    earlyCount: early.length,
    late,
    early,
    absent,
    attendanceRate,
  };
}
