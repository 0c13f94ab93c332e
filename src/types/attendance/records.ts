// types/attendance/records.ts

/** Local wall-clock time, `HH:mm`. */
export type TimeOfDay = string;

/** Local calendar date, `yyyy-MM-dd`. */
export type LocalDate = string;

export interface GeoPoint {
  latitude: number;
  longitude: number;
}

export interface WorkHours {
  start: TimeOfDay;
  end: TimeOfDay;
}

export type WorkHoursSource = 'exceptional' | 'standard' | 'default';

export interface EffectiveHours extends WorkHours {
  source: WorkHoursSource;
}

export interface Employee {
  employeeId: string;
  name: string;
  phone?: string;
  standardStart: TimeOfDay;
  standardEnd: TimeOfDay;
  active: boolean;
  registeredAt: Date;
}

export interface Admin {
  adminId: string;
  createdBy?: string;
  createdAt: Date;
  dailySummary: boolean;
  alerts: boolean;
}

export interface ExceptionalSchedule {
  employeeId: string;
  date: LocalDate;
  start: TimeOfDay;
  end: TimeOfDay;
  reason: string;
  createdBy: string;
  createdAt: Date;
}

export interface CheckPoint {
  time: Date;
  location: GeoPoint;
  distance: number;
}

export type SessionStatus = 'open' | 'closed';

export interface AttendanceSession {
  id: string;
  employeeId: string;
  date: LocalDate;
  checkIn: CheckPoint;
  checkOut: CheckPoint | null;
  isLate: boolean;
  isEarly: boolean;
  lateReason: string | null;
  earlyReason: string | null;
  status: SessionStatus;
  // Hours in effect when the flags were computed
  scheduledStart: TimeOfDay;
  scheduledEnd: TimeOfDay;
}

export interface NewSessionInput {
  employeeId: string;
  date: LocalDate;
  checkIn: CheckPoint;
  isLate: boolean;
  lateReason: string | null;
  scheduledStart: TimeOfDay;
  scheduledEnd: TimeOfDay;
}

export interface CloseSessionInput {
  checkOut: CheckPoint;
  isEarly: boolean;
  earlyReason: string | null;
  // End of the hours in effect at check-out time
  scheduledEnd: TimeOfDay;
}
