import { Connection, Model, Schema } from 'mongoose';

export interface IAdmin {
  adminId: string;
  createdBy?: string;
  createdAt: Date;
  dailySummary: boolean;
  alerts: boolean;
}

export const AdminSchema = new Schema<IAdmin>(
  {
    adminId: { type: String, required: true, unique: true },
    createdBy: { type: String },
    createdAt: { type: Date, required: true },
    dailySummary: { type: Boolean, default: true },
    alerts: { type: Boolean, default: true },
  },
  { collection: 'admins' },
);

export const createAdminModel = (connection: Connection): Model<IAdmin> =>
  connection.model<IAdmin>('Admin', AdminSchema);
