// lib/store/MemoryAttendanceStore.ts
import {
  Admin,
  AttendanceSession,
  CloseSessionInput,
  ConversationState,
  Employee,
  ExceptionalSchedule,
  LocalDate,
  NewSessionInput,
  NotificationRecord,
  NotificationRuleId,
  WorkHours,
} from '../../types/attendance';
import { AttendanceStore } from './AttendanceStore';

/**
 * Process-local store. Every call completes synchronously before resolving,
 * which makes the conditional writes atomic within one process.
 */
export class MemoryAttendanceStore implements AttendanceStore {
  private employees = new Map<string, Employee>();
  private admins = new Map<string, Admin>();
  private schedules = new Map<string, ExceptionalSchedule>();
  private sessions = new Map<string, AttendanceSession>();
  private conversations = new Map<string, ConversationState>();
  private notifications = new Map<string, NotificationRecord>();
  private sequence = 0;

  async findEmployee(employeeId: string): Promise<Employee | null> {
    return this.copy(this.employees.get(employeeId));
  }

  async listEmployees(options: { activeOnly?: boolean } = {}): Promise<Employee[]> {
    return [...this.employees.values()]
      .filter((employee) => !options.activeOnly || employee.active)
      .sort((a, b) => a.employeeId.localeCompare(b.employeeId))
      .map((employee) => structuredClone(employee));
  }

  async saveEmployee(employee: Employee): Promise<Employee> {
    this.employees.set(employee.employeeId, structuredClone(employee));
    return structuredClone(employee);
  }

  async setEmployeeActive(employeeId: string, active: boolean): Promise<Employee | null> {
    const employee = this.employees.get(employeeId);
    if (!employee) return null;
    employee.active = active;
    return structuredClone(employee);
  }

  async setStandardHours(employeeId: string, hours: WorkHours): Promise<Employee | null> {
    const employee = this.employees.get(employeeId);
    if (!employee) return null;
    employee.standardStart = hours.start;
    employee.standardEnd = hours.end;
    return structuredClone(employee);
  }

  async findAdmin(adminId: string): Promise<Admin | null> {
    return this.copy(this.admins.get(adminId));
  }

  async listAdmins(): Promise<Admin[]> {
    return [...this.admins.values()].map((admin) => structuredClone(admin));
  }

  async saveAdmin(admin: Admin): Promise<Admin> {
    this.admins.set(admin.adminId, structuredClone(admin));
    return structuredClone(admin);
  }

  async findExceptionalSchedule(
    employeeId: string,
    date: LocalDate,
  ): Promise<ExceptionalSchedule | null> {
    return this.copy(this.schedules.get(`${employeeId}:${date}`));
  }

  async saveExceptionalSchedule(schedule: ExceptionalSchedule): Promise<ExceptionalSchedule> {
    this.schedules.set(
      `${schedule.employeeId}:${schedule.date}`,
      structuredClone(schedule),
    );
    return structuredClone(schedule);
  }

  async findOpenSession(employeeId: string, date: LocalDate): Promise<AttendanceSession | null> {
    return this.copy(this.findOpen(employeeId, date));
  }

  async listSessionsForDay(employeeId: string, date: LocalDate): Promise<AttendanceSession[]> {
    return this.querySessions(
      (session) => session.employeeId === employeeId && session.date === date,
    ).sort((a, b) => a.checkIn.time.getTime() - b.checkIn.time.getTime());
  }

  async listSessionsByDate(date: LocalDate): Promise<AttendanceSession[]> {
    return this.querySessions((session) => session.date === date);
  }

  async listOpenSessions(): Promise<AttendanceSession[]> {
    return this.querySessions((session) => session.status === 'open');
  }

  async listHistory(employeeId: string, limit: number): Promise<AttendanceSession[]> {
    return this.querySessions((session) => session.employeeId === employeeId)
      .sort((a, b) => b.checkIn.time.getTime() - a.checkIn.time.getTime())
      .slice(0, limit);
  }

  async insertOpenSession(input: NewSessionInput): Promise<AttendanceSession | null> {
    if (this.findOpen(input.employeeId, input.date)) return null;

    this.sequence += 1;
    const session: AttendanceSession = {
      id: `session-${this.sequence}`,
      employeeId: input.employeeId,
      date: input.date,
      checkIn: structuredClone(input.checkIn),
      checkOut: null,
      isLate: input.isLate,
      isEarly: false,
      lateReason: input.lateReason,
      earlyReason: null,
      status: 'open',
      scheduledStart: input.scheduledStart,
      scheduledEnd: input.scheduledEnd,
    };
    this.sessions.set(session.id, session);
    return structuredClone(session);
  }

  async closeSession(
    sessionId: string,
    input: CloseSessionInput,
  ): Promise<AttendanceSession | null> {
    const session = this.sessions.get(sessionId);
    if (!session || session.status !== 'open') return null;

    session.checkOut = structuredClone(input.checkOut);
    session.isEarly = input.isEarly;
    session.earlyReason = input.earlyReason;
    session.scheduledEnd = input.scheduledEnd;
    session.status = 'closed';
    return structuredClone(session);
  }

  async findConversation(employeeId: string): Promise<ConversationState | null> {
    return this.copy(this.conversations.get(employeeId));
  }

  async saveConversation(state: ConversationState): Promise<void> {
    this.conversations.set(state.employeeId, structuredClone(state));
  }

  async deleteConversation(employeeId: string): Promise<boolean> {
    return this.conversations.delete(employeeId);
  }

  async takeExpiredConversations(now: Date): Promise<ConversationState[]> {
    const expired: ConversationState[] = [];
    for (const [employeeId, state] of this.conversations.entries()) {
      if (state.expiresAt.getTime() <= now.getTime()) {
        this.conversations.delete(employeeId);
        expired.push(state);
      }
    }
    return expired;
  }

  async hasNotification(
    ruleId: NotificationRuleId,
    subjectId: string,
    date: LocalDate,
  ): Promise<boolean> {
    return this.notifications.has(`${ruleId}:${subjectId}:${date}`);
  }

  async saveNotification(record: NotificationRecord): Promise<boolean> {
    const key = `${record.ruleId}:${record.subjectId}:${record.date}`;
    if (this.notifications.has(key)) return false;
    this.notifications.set(key, structuredClone(record));
    return true;
  }

  listNotifications(): NotificationRecord[] {
    return [...this.notifications.values()].map((record) => structuredClone(record));
  }

  async close(): Promise<void> {
    // nothing to release
  }

  private findOpen(employeeId: string, date: LocalDate): AttendanceSession | undefined {
    for (const session of this.sessions.values()) {
      if (
        session.employeeId === employeeId &&
        session.date === date &&
        session.status === 'open'
      ) {
        return session;
      }
    }
    return undefined;
  }

  private querySessions(
    predicate: (session: AttendanceSession) => boolean,
  ): AttendanceSession[] {
    return [...this.sessions.values()]
      .filter(predicate)
      .map((session) => structuredClone(session));
  }

  private copy<T>(value: T | undefined): T | null {
    return value === undefined ? null : structuredClone(value);
  }
}
