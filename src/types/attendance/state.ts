// types/attendance/state.ts

import { AttendanceSession, CheckPoint, EffectiveHours, LocalDate } from './records';

export type PendingKind = 'check-in' | 'check-out';

export enum ConversationMode {
  Idle = 'Idle',
  AwaitingLateReason = 'AwaitingLateReason',
  AwaitingEarlyReason = 'AwaitingEarlyReason',
}

/**
 * A late or early event that has been classified but not yet written to the
 * ledger. Everything needed to finalize the write travels with it.
 */
export interface PendingAttendance {
  kind: PendingKind;
  employeeId: string;
  date: LocalDate;
  event: CheckPoint;
  hours: EffectiveHours;
  // Only for check-out: the open session being closed
  sessionId?: string;
}

export interface ConversationState {
  employeeId: string;
  mode: ConversationMode.AwaitingLateReason | ConversationMode.AwaitingEarlyReason;
  payload: PendingAttendance;
  expiresAt: Date;
  createdAt: Date;
}

export type ConversationSnapshot =
  | { mode: ConversationMode.Idle }
  | {
      mode:
        | ConversationMode.AwaitingLateReason
        | ConversationMode.AwaitingEarlyReason;
      payload: PendingAttendance;
      expiresAt: Date;
    };

export type CheckOutcome =
  | { status: 'recorded'; session: AttendanceSession }
  | {
      status: 'justification-required';
      pending: PendingAttendance;
      expiresAt: Date;
    };

export function modeForKind(
  kind: PendingKind,
): ConversationState['mode'] {
  return kind === 'check-in'
    ? ConversationMode.AwaitingLateReason
    : ConversationMode.AwaitingEarlyReason;
}
