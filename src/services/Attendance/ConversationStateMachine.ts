// services/Attendance/ConversationStateMachine.ts
import { ConversationRepository } from '../../lib/store/AttendanceStore';
import {
  AttendanceSession,
  CheckOutcome,
  ConversationMode,
  ConversationSnapshot,
  ConversationState,
  PendingAttendance,
  PendingKind,
} from '../../types/attendance';
import { Result, ok, toAppError } from '../../types/attendance/error';
import { Clock, systemClock } from '../../utils/dateUtils';
import { Logger, createSilentLogger } from '../../utils/logger';
import { AttendanceLedger } from './AttendanceLedger';

export type TextHandling =
  | { handled: false }
  | { handled: true; kind: PendingKind; result: Result<AttendanceSession> };

export interface ConversationStateMachineOptions {
  ledger: AttendanceLedger;
  store: ConversationRepository;
  clock?: Clock;
  logger?: Logger;
}

/**
 * Idle -> AwaitingLateReason -> Idle, Idle -> AwaitingEarlyReason -> Idle.
 * Idle is the absence of a live pending entry; expired entries read as Idle.
 */
export class ConversationStateMachine {
  private readonly ledger: AttendanceLedger;
  private readonly store: ConversationRepository;
  private readonly clock: Clock;
  private readonly logger: Logger;

  constructor(options: ConversationStateMachineOptions) {
    this.ledger = options.ledger;
    this.store = options.store;
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? createSilentLogger('ConversationStateMachine');
  }

  async state(
    employeeId: string,
    now: Date = this.clock.now(),
  ): Promise<Result<ConversationSnapshot>> {
    const pending = await this.ledger.pending(employeeId, now);
    if (!pending.success) return pending;
    if (!pending.data) return ok<ConversationSnapshot>({ mode: ConversationMode.Idle });

    return ok<ConversationSnapshot>({
      mode: pending.data.mode,
      payload: pending.data.payload,
      expiresAt: pending.data.expiresAt,
    });
  }

  async begin(
    pending: PendingAttendance,
  ): Promise<Result<Extract<CheckOutcome, { status: 'justification-required' }>>> {
    try {
      return ok(await this.ledger.beginPending(pending));
    } catch (error) {
      return { success: false, error: toAppError(error) };
    }
  }

  /** Treats the text as the reason for whatever is pending. */
  async handleText(
    employeeId: string,
    text: string,
    now: Date = this.clock.now(),
  ): Promise<Result<TextHandling>> {
    const snapshot = await this.state(employeeId, now);
    if (!snapshot.success) return snapshot;

    const current = snapshot.data;
    if (current.mode === ConversationMode.Idle) {
      return ok<TextHandling>({ handled: false });
    }

    const kind = current.payload.kind;
    const result =
      kind === 'check-in'
        ? await this.ledger.finalizeCheckIn(employeeId, current.payload, text)
        : await this.ledger.finalizeCheckOut(employeeId, current.payload, text);

    return ok<TextHandling>({ handled: true, kind, result });
  }

  async abort(employeeId: string): Promise<Result<boolean>> {
    return this.ledger.abort(employeeId);
  }

  /** Removes and returns every expired pending entry. */
  async sweepExpired(now: Date = this.clock.now()): Promise<Result<ConversationState[]>> {
    try {
      const expired = await this.store.takeExpiredConversations(now);
      for (const state of expired) {
        this.logger.warn('Justification not received, attendance event discarded', {
          employeeId: state.employeeId,
          kind: state.payload.kind,
          date: state.payload.date,
          eventTime: state.payload.event.time.toISOString(),
          expiresAt: state.expiresAt.toISOString(),
        });
      }
      return ok(expired);
    } catch (error) {
      return { success: false, error: toAppError(error) };
    }
  }
}
