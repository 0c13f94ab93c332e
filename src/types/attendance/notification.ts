// types/attendance/notification.ts

import { LocalDate } from './records';

export type NotificationRuleId =
  | 'daily-summary'
  | 'checkin-reminder'
  | 'checkout-reminder'
  | 'missed-checkout'
  | 'missed-checkout-digest'
  | 'keep-alive';

export interface NotificationRecord {
  ruleId: NotificationRuleId;
  subjectId: string;
  date: LocalDate;
  message: string;
  sentAt: Date;
}

export type DispatchResult =
  | { success: true }
  | { success: false; error: Error };

export interface SummaryEntry {
  employeeId: string;
  name: string;
  time: Date;
  reason: string | null;
}

export interface DailySummary {
  date: LocalDate;
  totalEmployees: number;
  checkedIn: number;
  checkedOut: number;
  stillWorking: number;
  lateCount: number;
  earlyCount: number;
  late: SummaryEntry[];
  early: SummaryEntry[];
  absent: { employeeId: string; name: string }[];
  attendanceRate: number;
}
