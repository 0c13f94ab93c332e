// handlers/AdminCommandHandler.ts
import { EngineConfig } from '../config/engineConfig';
import { AttendanceStore } from '../lib/store/AttendanceStore';
import { AdminCommand } from '../schemas/attendance';
import { AttendanceLedger } from '../services/Attendance/AttendanceLedger';
import { NotificationService } from '../services/NotificationService';
import { WorkScheduleResolver } from '../services/WorkScheduleResolver';
import { AppError, ErrorCode } from '../types/attendance/error';
import { Clock, systemClock } from '../utils/dateUtils';
import { Logger, createSilentLogger } from '../utils/logger';
import * as messages from '../utils/messages';
import { Reply, reply, replyError } from './reply';

export interface AdminCommandHandlerOptions {
  config: EngineConfig;
  store: AttendanceStore;
  resolver: WorkScheduleResolver;
  ledger: AttendanceLedger;
  notifications: NotificationService;
  clock?: Clock;
  logger?: Logger;
}

type CommandFn = (adminId: string, args: string[]) => Promise<Reply[]>;

export const ADMIN_USAGE = [
  'add_admin <id>',
  'exceptional_hours <employeeId> <yyyy-MM-dd> <HH:mm> <HH:mm> [reason]',
  'set_hours <employeeId> <HH:mm> <HH:mm>',
  'deactivate <employeeId>',
  'activate <employeeId>',
  'list_employees',
  'report [yyyy-MM-dd]',
  'history <employeeId> [limit]',
  'send_summary',
].join('\n');

export class AdminCommandHandler {
  private readonly config: EngineConfig;
  private readonly store: AttendanceStore;
  private readonly resolver: WorkScheduleResolver;
  private readonly ledger: AttendanceLedger;
  private readonly notifications: NotificationService;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly commands: Record<string, CommandFn>;

  constructor(options: AdminCommandHandlerOptions) {
    this.config = options.config;
    this.store = options.store;
    this.resolver = options.resolver;
    this.ledger = options.ledger;
    this.notifications = options.notifications;
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? createSilentLogger('AdminCommandHandler');

    this.commands = {
      add_admin: (adminId, args) => this.addAdmin(adminId, args),
      exceptional_hours: (adminId, args) => this.exceptionalHours(adminId, args),
      set_hours: (adminId, args) => this.setHours(adminId, args),
      deactivate: (adminId, args) => this.setActive(adminId, args, false),
      activate: (adminId, args) => this.setActive(adminId, args, true),
      list_employees: (adminId) => this.listEmployees(adminId),
      report: (adminId, args) => this.report(adminId, args),
      history: (adminId, args) => this.history(adminId, args),
      send_summary: (adminId) => this.sendSummary(adminId),
    };
  }

  async handle(command: AdminCommand): Promise<Reply[]> {
    const admin = await this.store.findAdmin(command.adminId);
    if (!admin) {
      this.logger.warn('Admin command from non-admin', {
        senderId: command.adminId,
        command: command.name,
      });
      return reply(command.adminId, messages.errorReply(ErrorCode.UNAUTHORIZED));
    }

    const run = Object.prototype.hasOwnProperty.call(this.commands, command.name)
      ? this.commands[command.name]
      : undefined;
    if (!run) {
      return reply(command.adminId, `Unknown command "${command.name}".\n${ADMIN_USAGE}`);
    }

    this.logger.info('Admin command', {
      adminId: command.adminId,
      command: command.name,
      args: command.args,
    });
    return run(command.adminId, command.args);
  }

  private usage(adminId: string, line: string): Reply[] {
    return reply(adminId, `Usage: ${line}`);
  }

  // The generic NOT_REGISTERED text addresses the employee, not the admin
  private failure(adminId: string, employeeId: string, error: AppError): Reply[] {
    return error.code === ErrorCode.NOT_REGISTERED
      ? this.notRegistered(adminId, employeeId)
      : replyError(adminId, error);
  }

  private notRegistered(adminId: string, employeeId: string): Reply[] {
    return reply(adminId, `Employee ${employeeId} is not registered.`);
  }

  private async addAdmin(adminId: string, args: string[]): Promise<Reply[]> {
    const [newAdminId] = args;
    if (!newAdminId) return this.usage(adminId, 'add_admin <id>');

    const existing = await this.store.findAdmin(newAdminId);
    if (existing) return reply(adminId, `${newAdminId} is already an admin.`);

    await this.store.saveAdmin({
      adminId: newAdminId,
      createdBy: adminId,
      createdAt: this.clock.now(),
      dailySummary: true,
      alerts: true,
    });
    return reply(adminId, `Admin ${newAdminId} added.`);
  }

  private async exceptionalHours(adminId: string, args: string[]): Promise<Reply[]> {
    const [employeeId, date, start, end, ...reason] = args;
    if (!employeeId || !date || !start || !end) {
      return this.usage(
        adminId,
        'exceptional_hours <employeeId> <yyyy-MM-dd> <HH:mm> <HH:mm> [reason]',
      );
    }

    const saved = await this.resolver.setExceptionalSchedule(
      { employeeId, date, start, end, reason: reason.join(' ') },
      adminId,
    );
    if (!saved.success) return this.failure(adminId, employeeId, saved.error);

    const { data } = saved;
    const notice = `Your hours on ${data.date} are ${data.start}-${data.end}.`;
    const told = await this.notifications.send(data.employeeId, notice);
    return reply(
      adminId,
      `Hours for ${data.employeeId} on ${data.date} set to ${data.start}-${data.end}.${
        told.success ? '' : ' The employee could not be notified.'
      }`,
    );
  }

  private async setHours(adminId: string, args: string[]): Promise<Reply[]> {
    const [employeeId, start, end] = args;
    if (!employeeId || !start || !end) {
      return this.usage(adminId, 'set_hours <employeeId> <HH:mm> <HH:mm>');
    }

    const updated = await this.resolver.setStandardHours(employeeId, start, end);
    if (!updated.success) return this.failure(adminId, employeeId, updated.error);
    return reply(
      adminId,
      `Standard hours for ${employeeId} set to ${updated.data.standardStart}-${updated.data.standardEnd}.`,
    );
  }

  private async setActive(adminId: string, args: string[], active: boolean): Promise<Reply[]> {
    const [employeeId] = args;
    if (!employeeId) {
      return this.usage(adminId, `${active ? 'activate' : 'deactivate'} <employeeId>`);
    }

    const employee = await this.store.setEmployeeActive(employeeId, active);
    if (!employee) return this.notRegistered(adminId, employeeId);
    return reply(adminId, `${employee.name} is now ${active ? 'active' : 'inactive'}.`);
  }

  private async listEmployees(adminId: string): Promise<Reply[]> {
    const employees = await this.store.listEmployees();
    return reply(adminId, messages.employeeList(employees));
  }

  private async report(adminId: string, args: string[]): Promise<Reply[]> {
    const date = args[0] ?? this.ledger.today();
    const summary = await this.ledger.dailySummary(date);
    if (!summary.success) return replyError(adminId, summary.error);
    return reply(adminId, messages.dailySummaryText(summary.data, this.config.timezone));
  }

  private async history(adminId: string, args: string[]): Promise<Reply[]> {
    const [employeeId, rawLimit] = args;
    if (!employeeId) return this.usage(adminId, 'history <employeeId> [limit]');

    const limit = rawLimit === undefined ? 10 : Number.parseInt(rawLimit, 10);
    if (!Number.isFinite(limit) || limit < 1) {
      return this.usage(adminId, 'history <employeeId> [limit]');
    }

    const history = await this.ledger.history(employeeId, limit);
    if (!history.success) return replyError(adminId, history.error);
    return reply(adminId, messages.historyText(history.data, this.config.timezone));
  }

  private async sendSummary(adminId: string): Promise<Reply[]> {
    const summary = await this.ledger.dailySummary(this.ledger.today());
    if (!summary.success) return replyError(adminId, summary.error);

    const sent = await this.notifications.notifyAdmins(
      messages.dailySummaryText(summary.data, this.config.timezone),
      'dailySummary',
    );
    if (!sent.success) return replyError(adminId, sent.error);
    return reply(
      adminId,
      `Summary sent to ${sent.data.sent.length} admin(s), ${sent.data.failed.length} failed.`,
    );
  }
}
