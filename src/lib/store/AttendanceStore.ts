// lib/store/AttendanceStore.ts
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

export interface EmployeeRepository {
  findEmployee(employeeId: string): Promise<Employee | null>;
  listEmployees(options?: { activeOnly?: boolean }): Promise<Employee[]>;
  /** Inserts or replaces by employeeId. */
  saveEmployee(employee: Employee): Promise<Employee>;
  setEmployeeActive(employeeId: string, active: boolean): Promise<Employee | null>;
  setStandardHours(employeeId: string, hours: WorkHours): Promise<Employee | null>;
}

export interface AdminRepository {
  findAdmin(adminId: string): Promise<Admin | null>;
  listAdmins(): Promise<Admin[]>;
  saveAdmin(admin: Admin): Promise<Admin>;
}

export interface ScheduleRepository {
  findExceptionalSchedule(
    employeeId: string,
    date: LocalDate,
  ): Promise<ExceptionalSchedule | null>;
  /** Inserts or replaces by (employeeId, date). */
  saveExceptionalSchedule(schedule: ExceptionalSchedule): Promise<ExceptionalSchedule>;
}

export interface SessionRepository {
  findOpenSession(employeeId: string, date: LocalDate): Promise<AttendanceSession | null>;
  /** Sessions of one employee on one day, oldest check-in first. */
  listSessionsForDay(employeeId: string, date: LocalDate): Promise<AttendanceSession[]>;
  listSessionsByDate(date: LocalDate): Promise<AttendanceSession[]>;
  listOpenSessions(): Promise<AttendanceSession[]>;
  /** Most recent check-in first. */
  listHistory(employeeId: string, limit: number): Promise<AttendanceSession[]>;
  /**
   * Conditional insert: resolves null when an open session already exists for
   * (employeeId, date).
   */
  insertOpenSession(input: NewSessionInput): Promise<AttendanceSession | null>;
  /** Conditional update: resolves null when the session is not open. */
  closeSession(sessionId: string, input: CloseSessionInput): Promise<AttendanceSession | null>;
}

export interface ConversationRepository {
  findConversation(employeeId: string): Promise<ConversationState | null>;
  /** Replaces any existing entry for the employee. */
  saveConversation(state: ConversationState): Promise<void>;
  deleteConversation(employeeId: string): Promise<boolean>;
  /** Removes and returns every entry with expiresAt <= now. */
  takeExpiredConversations(now: Date): Promise<ConversationState[]>;
}

export interface NotificationRepository {
  hasNotification(
    ruleId: NotificationRuleId,
    subjectId: string,
    date: LocalDate,
  ): Promise<boolean>;
  /** Resolves false when a record for (ruleId, subjectId, date) already exists. */
  saveNotification(record: NotificationRecord): Promise<boolean>;
}

export interface AttendanceStore
  extends EmployeeRepository,
    AdminRepository,
    ScheduleRepository,
    SessionRepository,
    ConversationRepository,
    NotificationRepository {
  close(): Promise<void>;
}
