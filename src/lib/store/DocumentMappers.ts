// lib/store/DocumentMappers.ts

import { IAdmin } from '../../models/Admin';
import { IAttendanceSession, ICheckPoint } from '../../models/AttendanceSession';
import { IConversationState } from '../../models/ConversationState';
import { IEmployee } from '../../models/Employee';
import { IExceptionalSchedule } from '../../models/ExceptionalSchedule';
import {
  Admin,
  AttendanceSession,
  CheckPoint,
  ConversationMode,
  ConversationState,
  Employee,
  ExceptionalSchedule,
} from '../../types/attendance';

type WithId = { _id: { toString(): string } };

/**
 * Store documents are decoded here and nowhere else; the rest of the engine
 * only sees the typed records.
 */
export class DocumentMappers {
  static toEmployee(doc: IEmployee): Employee {
    return {
      employeeId: doc.employeeId,
      name: doc.name,
      phone: doc.phone ?? undefined,
      standardStart: doc.standardStart,
      standardEnd: doc.standardEnd,
      active: doc.active,
      registeredAt: new Date(doc.registeredAt),
    };
  }

  static toAdmin(doc: IAdmin): Admin {
    return {
      adminId: doc.adminId,
      createdBy: doc.createdBy ?? undefined,
      createdAt: new Date(doc.createdAt),
      dailySummary: doc.dailySummary,
      alerts: doc.alerts,
    };
  }

  static toExceptionalSchedule(doc: IExceptionalSchedule): ExceptionalSchedule {
    return {
      employeeId: doc.employeeId,
      date: doc.date,
      start: doc.start,
      end: doc.end,
      reason: doc.reason,
      createdBy: doc.createdBy,
      createdAt: new Date(doc.createdAt),
    };
  }

  static toCheckPoint(doc: ICheckPoint): CheckPoint {
    return {
      time: new Date(doc.time),
      location: { latitude: doc.latitude, longitude: doc.longitude },
      distance: doc.distance,
    };
  }

  static fromCheckPoint(point: CheckPoint): ICheckPoint {
    return {
      time: point.time,
      latitude: point.location.latitude,
      longitude: point.location.longitude,
      distance: point.distance,
    };
  }

  static toSession(doc: IAttendanceSession & WithId): AttendanceSession {
    return {
      id: doc._id.toString(),
      employeeId: doc.employeeId,
      date: doc.date,
      checkIn: DocumentMappers.toCheckPoint(doc.checkIn),
      checkOut: doc.checkOut ? DocumentMappers.toCheckPoint(doc.checkOut) : null,
      isLate: doc.isLate,
      isEarly: doc.isEarly,
      lateReason: doc.lateReason ?? null,
      earlyReason: doc.earlyReason ?? null,
      status: doc.status,
      scheduledStart: doc.scheduledStart,
      scheduledEnd: doc.scheduledEnd,
    };
  }

  static toConversation(doc: IConversationState): ConversationState {
    const { payload } = doc;
    return {
      employeeId: doc.employeeId,
      mode:
        doc.mode === 'AwaitingLateReason'
          ? ConversationMode.AwaitingLateReason
          : ConversationMode.AwaitingEarlyReason,
      payload: {
        kind: payload.kind,
        employeeId: doc.employeeId,
        date: payload.date,
        event: DocumentMappers.toCheckPoint(payload.event),
        hours: {
          start: payload.hoursStart,
          end: payload.hoursEnd,
          source: payload.hoursSource,
        },
        sessionId: payload.sessionId ?? undefined,
      },
      expiresAt: new Date(doc.expiresAt),
      createdAt: new Date(doc.createdAt),
    };
  }

  static fromConversation(state: ConversationState): IConversationState {
    const { payload } = state;
    return {
      employeeId: state.employeeId,
      mode:
        state.mode === ConversationMode.AwaitingLateReason
          ? 'AwaitingLateReason'
          : 'AwaitingEarlyReason',
      payload: {
        kind: payload.kind,
        date: payload.date,
        event: DocumentMappers.fromCheckPoint(payload.event),
        hoursStart: payload.hours.start,
        hoursEnd: payload.hours.end,
        hoursSource: payload.hours.source,
        ...(payload.sessionId ? { sessionId: payload.sessionId } : {}),
      },
      expiresAt: state.expiresAt,
      createdAt: state.createdAt,
    };
  }
}
