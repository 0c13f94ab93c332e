import { Connection, Model, Schema } from 'mongoose';
import { ICheckPoint } from './AttendanceSession';

export interface IPendingPayload {
  kind: 'check-in' | 'check-out';
  date: string;
  event: ICheckPoint;
  hoursStart: string;
  hoursEnd: string;
  hoursSource: 'exceptional' | 'standard' | 'default';
  sessionId?: string;
}

export interface IConversationState {
  employeeId: string;
  mode: 'AwaitingLateReason' | 'AwaitingEarlyReason';
  payload: IPendingPayload;
  expiresAt: Date;
  createdAt: Date;
}

export const ConversationStateSchema = new Schema<IConversationState>(
  {
    employeeId: { type: String, required: true, unique: true },
    mode: {
      type: String,
      enum: ['AwaitingLateReason', 'AwaitingEarlyReason'],
      required: true,
    },
    payload: {
      kind: { type: String, enum: ['check-in', 'check-out'], required: true },
      date: { type: String, required: true },
      event: {
        time: { type: Date, required: true },
        latitude: { type: Number, required: true },
        longitude: { type: Number, required: true },
        distance: { type: Number, required: true },
      },
      hoursStart: { type: String, required: true },
      hoursEnd: { type: String, required: true },
      hoursSource: {
        type: String,
        enum: ['exceptional', 'standard', 'default'],
        required: true,
      },
      sessionId: { type: String },
    },
    expiresAt: { type: Date, required: true },
    createdAt: { type: Date, required: true },
  },
  { collection: 'conversation_states' },
);

ConversationStateSchema.index({ expiresAt: 1 });

export const createConversationStateModel = (
  connection: Connection,
): Model<IConversationState> =>
  connection.model<IConversationState>(
    'ConversationState',
    ConversationStateSchema,
  );
