// utils/messages.ts
import {
  AttendanceSession,
  DailySummary,
  EffectiveHours,
  Employee,
  PendingAttendance,
} from '../types/attendance';
import { ErrorCode } from '../types/attendance/error';
import { formatDuration, toLocalTime as time } from './dateUtils';

export const HELP_TEXT = [
  'Share your location to check in or out.',
  'Send "status" for today\'s attendance or "history" for recent days.',
  'Send "cancel" to drop a pending check-in or check-out.',
].join('\n');

export const REGISTER_PROMPT =
  'You are not registered yet. Share your contact to register.';

export function registered(employee: Employee): string {
  return `Welcome ${employee.name}. Your hours are ${employee.standardStart}-${employee.standardEnd}.`;
}

export function outsideGeofence(distanceMeters: number, radiusMeters: number): string {
  return `You are ${Math.round(distanceMeters)}m from the office (limit ${radiusMeters}m). Move closer and share your location again.`;
}

export function checkInRecorded(session: AttendanceSession, timezone: string): string {
  const base = `Checked in at ${time(session.checkIn.time, timezone)}.`;
  return session.isLate ? `${base} Late reason: ${session.lateReason ?? '-'}` : base;
}

export function checkOutRecorded(
  session: AttendanceSession,
  timezone: string,
  durationMinutes: number | null,
): string {
  const out = session.checkOut ? time(session.checkOut.time, timezone) : '-';
  const worked = durationMinutes === null ? '' : ` Worked ${formatDuration(durationMinutes)}.`;
  const base = `Checked out at ${out}.${worked}`;
  return session.isEarly ? `${base} Early reason: ${session.earlyReason ?? '-'}` : base;
}

export function reasonPrompt(pending: PendingAttendance, timezone: string, ttlMinutes: number): string {
  const at = time(pending.event.time, timezone);
  return pending.kind === 'check-in'
    ? `You are checking in at ${at}, after your start time ${pending.hours.start}. Reply with the reason within ${ttlMinutes} minutes.`
    : `You are checking out at ${at}, before your end time ${pending.hours.end}. Reply with the reason within ${ttlMinutes} minutes.`;
}

export const PENDING_CANCELLED = 'Pending attendance cancelled. Share your location again to retry.';
export const NOTHING_PENDING = 'Nothing is pending.';

export function justificationExpired(pending: PendingAttendance, timezone: string): string {
  const what = pending.kind === 'check-in' ? 'check-in' : 'check-out';
  return `Your ${what} at ${time(pending.event.time, timezone)} on ${pending.date} was not recorded because no reason was given. Share your location again.`;
}

export function lateAlert(employee: Employee, session: AttendanceSession, timezone: string): string {
  return `${employee.name} (${employee.employeeId}) checked in late at ${time(session.checkIn.time, timezone)} (start ${session.scheduledStart}). Reason: ${session.lateReason ?? '-'}`;
}

export function earlyAlert(employee: Employee, session: AttendanceSession, timezone: string): string {
  const out = session.checkOut ? time(session.checkOut.time, timezone) : '-';
  return `${employee.name} (${employee.employeeId}) checked out early at ${out} (end ${session.scheduledEnd}). Reason: ${session.earlyReason ?? '-'}`;
}

export function statusText(
  session: AttendanceSession | null,
  hours: EffectiveHours,
  timezone: string,
): string {
  const schedule = `Today's hours: ${hours.start}-${hours.end}.`;
  if (!session) return `Not checked in today. ${schedule}`;
  const checkIn = time(session.checkIn.time, timezone);
  if (session.status === 'open') {
    return `Checked in at ${checkIn}${session.isLate ? ' (late)' : ''}. ${schedule}`;
  }
  const out = session.checkOut ? time(session.checkOut.time, timezone) : '-';
  return `Checked in at ${checkIn}, out at ${out}. ${schedule}`;
}

export function historyText(sessions: AttendanceSession[], timezone: string): string {
  if (sessions.length === 0) return 'No attendance recorded yet.';
  return sessions
    .map((session) => {
      const checkIn = time(session.checkIn.time, timezone);
      const out = session.checkOut ? time(session.checkOut.time, timezone) : 'open';
      const flags = [session.isLate ? 'late' : '', session.isEarly ? 'early' : '']
        .filter(Boolean)
        .join(', ');
      return `${session.date} ${checkIn}-${out}${flags ? ` (${flags})` : ''}`;
    })
    .join('\n');
}

export function dailySummaryText(summary: DailySummary, timezone: string): string {
  const lines = [
    `Attendance ${summary.date}`,
    `Present ${summary.checkedIn}/${summary.totalEmployees} (${summary.attendanceRate}%)`,
    `Checked out ${summary.checkedOut}, still working ${summary.stillWorking}`,
    `Late ${summary.lateCount}, early ${summary.earlyCount}`,
  ];
  for (const entry of summary.late) {
    lines.push(`Late: ${entry.name} ${time(entry.time, timezone)} (${entry.reason ?? '-'})`);
  }
  for (const entry of summary.early) {
    lines.push(`Early: ${entry.name} ${time(entry.time, timezone)} (${entry.reason ?? '-'})`);
  }
  if (summary.absent.length > 0) {
    lines.push(`Absent: ${summary.absent.map((entry) => entry.name).join(', ')}`);
  }
  return lines.join('\n');
}

export function checkinReminder(employee: Employee, hours: EffectiveHours): string {
  return `${employee.name}, you have not checked in yet today (start ${hours.start}).`;
}

export function missedCheckout(session: AttendanceSession, timezone: string): string {
  return `You checked in at ${time(session.checkIn.time, timezone)} on ${session.date} and have not checked out.`;
}

export function checkoutReminder(employee: Employee, hours: EffectiveHours): string {
  return `${employee.name}, your work day ended at ${hours.end}. Share your location to check out.`;
}

export interface OverdueSession {
  name: string;
  session: AttendanceSession;
}

export function missedCheckoutDigest(
  date: string,
  overdue: OverdueSession[],
  now: Date,
  timezone: string,
): string {
  const lines = [
    `Missed check-out ${date}`,
    `${overdue.length} employee(s) have not checked out:`,
  ];
  for (const { name, session } of overdue) {
    const hours = (now.getTime() - session.checkIn.time.getTime()) / 3_600_000;
    lines.push(`- ${name} checked in at ${time(session.checkIn.time, timezone)} (${hours.toFixed(1)}h ago)`);
  }
  return lines.join('\n');
}

export function employeeList(employees: Employee[]): string {
  if (employees.length === 0) return 'No employees registered.';
  return employees
    .map(
      (employee) =>
        `${employee.employeeId} ${employee.name} ${employee.standardStart}-${employee.standardEnd}${employee.active ? '' : ' (inactive)'}`,
    )
    .join('\n');
}

const ERROR_REPLIES: Record<ErrorCode, string> = {
  [ErrorCode.INVALID_COORDINATE]: 'That location could not be read. Please share it again.',
  [ErrorCode.INVALID_SCHEDULE]: 'That date or time is not valid.',
  [ErrorCode.INVALID_EVENT_TIME]: 'Check-out must come after check-in.',
  [ErrorCode.INVALID_REASON]: 'Please send a non-empty reason.',
  [ErrorCode.OUTSIDE_GEOFENCE]: 'You are outside the office area.',
  [ErrorCode.ALREADY_OPEN_SESSION]: 'You are already checked in today.',
  [ErrorCode.NO_OPEN_SESSION]: 'You are not checked in.',
  [ErrorCode.NOT_REGISTERED]: REGISTER_PROMPT,
  [ErrorCode.UNAUTHORIZED]: 'This command is for admins only.',
  [ErrorCode.NO_PENDING_ACTION]: 'Nothing is waiting for a reason. Share your location again.',
  [ErrorCode.DISPATCH_FAILURE]: 'The message could not be delivered.',
  [ErrorCode.STORE_UNAVAILABLE]: 'Something went wrong. Please try again.',
  [ErrorCode.VALIDATION_ERROR]: 'The request was not understood.',
};

export function errorReply(code: ErrorCode): string {
  return ERROR_REPLIES[code];
}
