import { Connection, Model, Schema } from 'mongoose';

export interface IEmployee {
  employeeId: string;
  name: string;
  phone?: string | null;
  standardStart: string;
  standardEnd: string;
  active: boolean;
  registeredAt: Date;
}

export const EmployeeSchema = new Schema<IEmployee>(
  {
    employeeId: { type: String, required: true, unique: true },
    name: { type: String, required: true },
    phone: { type: String },
    standardStart: { type: String, required: true },
    standardEnd: { type: String, required: true },
    active: { type: Boolean, default: true },
    registeredAt: { type: Date, required: true },
  },
  { collection: 'employees' },
);

export const createEmployeeModel = (connection: Connection): Model<IEmployee> =>
  connection.model<IEmployee>('Employee', EmployeeSchema);
