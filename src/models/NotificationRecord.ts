import { Connection, Model, Schema } from 'mongoose';
import { NotificationRuleId } from '../types/attendance/notification';

export interface INotificationRecord {
  ruleId: NotificationRuleId;
  subjectId: string;
  date: string;
  message: string;
  sentAt: Date;
}

export const NotificationRecordSchema = new Schema<INotificationRecord>(
  {
    ruleId: { type: String, required: true },
    subjectId: { type: String, required: true },
    date: { type: String, required: true },
    message: { type: String, default: '' },
    sentAt: { type: Date, required: true },
  },
  { collection: 'notification_records' },
);

NotificationRecordSchema.index(
  { ruleId: 1, subjectId: 1, date: 1 },
  { unique: true },
);

export const createNotificationRecordModel = (
  connection: Connection,
): Model<INotificationRecord> =>
  connection.model<INotificationRecord>(
    'NotificationRecord',
    NotificationRecordSchema,
  );
