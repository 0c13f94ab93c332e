// lib/store/MongoAttendanceStore.ts
import { Connection, isValidObjectId } from 'mongoose';
import { EngineModels, registerModels } from '../../models';
import {
  Admin,
  AttendanceSession,
  CloseSessionInput,
  ConversationState,
  Employee,
  ExceptionalSchedule,
  LocalDate,
  NewSessionInput,
  NotificationRecord,
  NotificationRuleId,
  WorkHours,
} from '../../types/attendance';
import { AttendanceStore } from './AttendanceStore';
import { DocumentMappers } from './DocumentMappers';

const DUPLICATE_KEY = 11000;

export function isDuplicateKeyError(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    error.code === DUPLICATE_KEY
  );
}

export class MongoAttendanceStore implements AttendanceStore {
  private readonly models: EngineModels;

  constructor(private readonly connection: Connection) {
    this.models = registerModels(connection);
  }

  /** Builds the unique indexes the conditional writes rely on. */
  async init(): Promise<void> {
    await Promise.all(
      Object.values(this.models).map((model) => model.syncIndexes()),
    );
  }

  async findEmployee(employeeId: string): Promise<Employee | null> {
    const doc = await this.models.Employee.findOne({ employeeId }).lean();
    return doc ? DocumentMappers.toEmployee(doc) : null;
  }

  async listEmployees(options: { activeOnly?: boolean } = {}): Promise<Employee[]> {
    const filter = options.activeOnly ? { active: true } : {};
    const docs = await this.models.Employee.find(filter)
      .sort({ employeeId: 1 })
      .lean();
    return docs.map((doc) => DocumentMappers.toEmployee(doc));
  }

  async saveEmployee(employee: Employee): Promise<Employee> {
    await this.models.Employee.replaceOne(
      { employeeId: employee.employeeId },
      employee,
      { upsert: true },
    );
    return employee;
  }

  async setEmployeeActive(employeeId: string, active: boolean): Promise<Employee | null> {
    const doc = await this.models.Employee.findOneAndUpdate(
      { employeeId },
      { $set: { active } },
      { new: true },
    ).lean();
    return doc ? DocumentMappers.toEmployee(doc) : null;
  }

  async setStandardHours(employeeId: string, hours: WorkHours): Promise<Employee | null> {
    const doc = await this.models.Employee.findOneAndUpdate(
      { employeeId },
      { $set: { standardStart: hours.start, standardEnd: hours.end } },
      { new: true },
    ).lean();
    return doc ? DocumentMappers.toEmployee(doc) : null;
  }

  async findAdmin(adminId: string): Promise<Admin | null> {
    const doc = await this.models.Admin.findOne({ adminId }).lean();
    return doc ? DocumentMappers.toAdmin(doc) : null;
  }

  async listAdmins(): Promise<Admin[]> {
    const docs = await this.models.Admin.find().lean();
    return docs.map((doc) => DocumentMappers.toAdmin(doc));
  }

  async saveAdmin(admin: Admin): Promise<Admin> {
    await this.models.Admin.replaceOne({ adminId: admin.adminId }, admin, {
      upsert: true,
    });
    return admin;
  }

  async findExceptionalSchedule(
    employeeId: string,
    date: LocalDate,
  ): Promise<ExceptionalSchedule | null> {
    const doc = await this.models.ExceptionalSchedule.findOne({
      employeeId,
      date,
    }).lean();
    return doc ? DocumentMappers.toExceptionalSchedule(doc) : null;
  }

  async saveExceptionalSchedule(schedule: ExceptionalSchedule): Promise<ExceptionalSchedule> {
    await this.models.ExceptionalSchedule.replaceOne(
      { employeeId: schedule.employeeId, date: schedule.date },
      schedule,
      { upsert: true },
    );
    return schedule;
  }

  async findOpenSession(employeeId: string, date: LocalDate): Promise<AttendanceSession | null> {
    const doc = await this.models.AttendanceSession.findOne({
      employeeId,
      date,
      status: 'open',
    }).lean();
    return doc ? DocumentMappers.toSession(doc) : null;
  }

  async listSessionsForDay(employeeId: string, date: LocalDate): Promise<AttendanceSession[]> {
    const docs = await this.models.AttendanceSession.find({ employeeId, date })
      .sort({ 'checkIn.time': 1 })
      .lean();
    return docs.map((doc) => DocumentMappers.toSession(doc));
  }

  async listSessionsByDate(date: LocalDate): Promise<AttendanceSession[]> {
    const docs = await this.models.AttendanceSession.find({ date }).lean();
    return docs.map((doc) => DocumentMappers.toSession(doc));
  }

  async listOpenSessions(): Promise<AttendanceSession[]> {
    const docs = await this.models.AttendanceSession.find({ status: 'open' }).lean();
    return docs.map((doc) => DocumentMappers.toSession(doc));
  }

  async listHistory(employeeId: string, limit: number): Promise<AttendanceSession[]> {
    const docs = await this.models.AttendanceSession.find({ employeeId })
      .sort({ 'checkIn.time': -1 })
      .limit(limit)
      .lean();
    return docs.map((doc) => DocumentMappers.toSession(doc));
  }

  async insertOpenSession(input: NewSessionInput): Promise<AttendanceSession | null> {
    try {
      const doc = await this.models.AttendanceSession.create({
        employeeId: input.employeeId,
        date: input.date,
        checkIn: DocumentMappers.fromCheckPoint(input.checkIn),
        checkOut: null,
        isLate: input.isLate,
        isEarly: false,
        lateReason: input.lateReason,
        earlyReason: null,
        status: 'open',
        scheduledStart: input.scheduledStart,
        scheduledEnd: input.scheduledEnd,
      });
      return DocumentMappers.toSession(doc.toObject());
    } catch (error) {
      // Partial unique index on open sessions
      if (isDuplicateKeyError(error)) return null;
      throw error;
    }
  }

  async closeSession(
    sessionId: string,
    input: CloseSessionInput,
  ): Promise<AttendanceSession | null> {
    if (!isValidObjectId(sessionId)) return null;

    const doc = await this.models.AttendanceSession.findOneAndUpdate(
      { status: 'open' },
      {
        $set: {
          checkOut: DocumentMappers.fromCheckPoint(input.checkOut),
          isEarly: input.isEarly,
          earlyReason: input.earlyReason,
          scheduledEnd: input.scheduledEnd,
          status: 'closed',
        },
      },
      { new: true },
    )
      .where('_id')
      .equals(sessionId)
      .lean();
    return doc ? DocumentMappers.toSession(doc) : null;
  }

  async findConversation(employeeId: string): Promise<ConversationState | null> {
    const doc = await this.models.ConversationState.findOne({ employeeId }).lean();
    return doc ? DocumentMappers.toConversation(doc) : null;
  }

  async saveConversation(state: ConversationState): Promise<void> {
    await this.models.ConversationState.replaceOne(
      { employeeId: state.employeeId },
      DocumentMappers.fromConversation(state),
      { upsert: true },
    );
  }

  async deleteConversation(employeeId: string): Promise<boolean> {
    const result = await this.models.ConversationState.deleteOne({ employeeId });
    return result.deletedCount > 0;
  }

  async takeExpiredConversations(now: Date): Promise<ConversationState[]> {
    const docs = await this.models.ConversationState.find({
      expiresAt: { $lte: now },
    }).lean();

    const taken: ConversationState[] = [];
    for (const doc of docs) {
      // A replacement saved in the meantime carries a later expiresAt and survives
      const result = await this.models.ConversationState.deleteOne({
        employeeId: doc.employeeId,
        expiresAt: doc.expiresAt,
      });
      if (result.deletedCount > 0) {
        taken.push(DocumentMappers.toConversation(doc));
      }
    }
    return taken;
  }

  async hasNotification(
    ruleId: NotificationRuleId,
    subjectId: string,
    date: LocalDate,
  ): Promise<boolean> {
    const found = await this.models.NotificationRecord.exists({
      ruleId,
      subjectId,
      date,
    });
    return found !== null;
  }

  async saveNotification(record: NotificationRecord): Promise<boolean> {
    try {
      await this.models.NotificationRecord.create(record);
      return true;
    } catch (error) {
      if (isDuplicateKeyError(error)) return false;
      throw error;
    }
  }

  async close(): Promise<void> {
    await this.connection.close();
  }
}
