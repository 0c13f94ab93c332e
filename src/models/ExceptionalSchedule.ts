import { Connection, Model, Schema } from 'mongoose';

export interface IExceptionalSchedule {
  employeeId: string;
  date: string;
  start: string;
  end: string;
  reason: string;
  createdBy: string;
  createdAt: Date;
}

export const ExceptionalScheduleSchema = new Schema<IExceptionalSchedule>(
  {
    employeeId: { type: String, required: true },
    date: { type: String, required: true },
    start: { type: String, required: true },
    end: { type: String, required: true },
    reason: { type: String, default: '' },
    createdBy: { type: String, required: true },
    createdAt: { type: Date, required: true },
  },
  { collection: 'exceptional_schedules' },
);

ExceptionalScheduleSchema.index({ employeeId: 1, date: 1 }, { unique: true });

export const createExceptionalScheduleModel = (
  connection: Connection,
): Model<IExceptionalSchedule> =>
  connection.model<IExceptionalSchedule>(
    'ExceptionalSchedule',
    ExceptionalScheduleSchema,
  );
