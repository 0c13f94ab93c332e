import { Connection, Model, Schema } from 'mongoose';

export interface ICheckPoint {
  time: Date;
  latitude: number;
  longitude: number;
  distance: number;
}

export interface IAttendanceSession {
  employeeId: string;
  date: string;
  checkIn: ICheckPoint;
  checkOut: ICheckPoint | null;
  isLate: boolean;
  isEarly: boolean;
  lateReason: string | null;
  earlyReason: string | null;
  status: 'open' | 'closed';
  scheduledStart: string;
  scheduledEnd: string;
}

const CheckPointSchema = new Schema<ICheckPoint>(
  {
    time: { type: Date, required: true },
    latitude: { type: Number, required: true },
    longitude: { type: Number, required: true },
    distance: { type: Number, required: true },
  },
  { _id: false },
);

export const AttendanceSessionSchema = new Schema<IAttendanceSession>(
  {
    employeeId: { type: String, required: true },
    date: { type: String, required: true },
    checkIn: { type: CheckPointSchema, required: true },
    checkOut: { type: CheckPointSchema, default: null },
    isLate: { type: Boolean, default: false },
    isEarly: { type: Boolean, default: false },
    lateReason: { type: String, default: null },
    earlyReason: { type: String, default: null },
    status: { type: String, enum: ['open', 'closed'], required: true },
    scheduledStart: { type: String, required: true },
    scheduledEnd: { type: String, required: true },
  },
  { collection: 'attendance_sessions' },
);

// At most one open session per employee and day
AttendanceSessionSchema.index(
  { employeeId: 1, date: 1 },
  { unique: true, partialFilterExpression: { status: 'open' } },
);
AttendanceSessionSchema.index({ date: 1 });
AttendanceSessionSchema.index({ employeeId: 1, 'checkIn.time': -1 });

export const createAttendanceSessionModel = (
  connection: Connection,
): Model<IAttendanceSession> =>
  connection.model<IAttendanceSession>(
    'AttendanceSession',
    AttendanceSessionSchema,
  );
