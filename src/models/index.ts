import { Connection } from 'mongoose';
import { createAdminModel } from './Admin';
import { createAttendanceSessionModel } from './AttendanceSession';
import { createConversationStateModel } from './ConversationState';
import { createEmployeeModel } from './Employee';
import { createExceptionalScheduleModel } from './ExceptionalSchedule';
import { createNotificationRecordModel } from './NotificationRecord';

export function registerModels(connection: Connection) {
  return {
    Employee: createEmployeeModel(connection),
    Admin: createAdminModel(connection),
    ExceptionalSchedule: createExceptionalScheduleModel(connection),
    AttendanceSession: createAttendanceSessionModel(connection),
    ConversationState: createConversationStateModel(connection),
    NotificationRecord: createNotificationRecordModel(connection),
  };
}

export type EngineModels = ReturnType<typeof registerModels>;
