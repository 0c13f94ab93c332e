// handlers/AttendanceEventHandler.ts
import { EngineConfig } from '../config/engineConfig';
import { AttendanceStore } from '../lib/store/AttendanceStore';
import {
  ContactShared,
  InboundEventSchema,
  LocationShared,
  TextReceived,
} from '../schemas/attendance';
import { describeIssues } from '../schemas/employee';
import { AttendanceLedger, workDurationMinutes } from '../services/Attendance/AttendanceLedger';
import { ConversationStateMachine } from '../services/Attendance/ConversationStateMachine';
import { LocationVerifier } from '../services/location/LocationVerifier';
import { NotificationService } from '../services/NotificationService';
import { WorkScheduleResolver } from '../services/WorkScheduleResolver';
import { AttendanceSession, Employee, PendingKind } from '../types/attendance';
import { toAppError } from '../types/attendance/error';
import { Clock, systemClock, toLocalDate } from '../utils/dateUtils';
import { Logger, createSilentLogger } from '../utils/logger';
import * as messages from '../utils/messages';
import { AdminCommandHandler } from './AdminCommandHandler';
import { Reply, reply, replyError } from './reply';

export interface AttendanceEventHandlerOptions {
  config: EngineConfig;
  store: AttendanceStore;
  verifier: LocationVerifier;
  resolver: WorkScheduleResolver;
  ledger: AttendanceLedger;
  conversations: ConversationStateMachine;
  notifications: NotificationService;
  admin: AdminCommandHandler;
  clock?: Clock;
  logger?: Logger;
}

const HISTORY_LIMIT = 7;

export class AttendanceEventHandler {
  private readonly config: EngineConfig;
  private readonly store: AttendanceStore;
  private readonly verifier: LocationVerifier;
  private readonly resolver: WorkScheduleResolver;
  private readonly ledger: AttendanceLedger;
  private readonly conversations: ConversationStateMachine;
  private readonly notifications: NotificationService;
  private readonly admin: AdminCommandHandler;
  private readonly clock: Clock;
  private readonly logger: Logger;

  constructor(options: AttendanceEventHandlerOptions) {
    this.config = options.config;
    this.store = options.store;
    this.verifier = options.verifier;
    this.resolver = options.resolver;
    this.ledger = options.ledger;
    this.conversations = options.conversations;
    this.notifications = options.notifications;
    this.admin = options.admin;
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? createSilentLogger('AttendanceEventHandler');
  }

  /** Validates an inbound event and returns the replies to push. */
  async handle(input: unknown): Promise<Reply[]> {
    const parsed = InboundEventSchema.safeParse(input);
    if (!parsed.success) {
      this.logger.warn('Dropping malformed inbound event', {
        error: describeIssues(parsed.error),
      });
      return [];
    }

    const event = parsed.data;
    const sender = event.type === 'AdminCommand' ? event.adminId : event.employeeId;
    try {
      switch (event.type) {
        case 'ContactShared':
          return await this.onContact(event);
        case 'LocationShared':
          return await this.onLocation(event);
        case 'TextReceived':
          return await this.onText(event);
        case 'AdminCommand':
          return await this.admin.handle(event);
      }
    } catch (error) {
      const appError = toAppError(error);
      this.logger.error('Event handling failed', {
        type: event.type,
        sender,
        code: appError.code,
        error: appError.message,
      });
      return replyError(sender, appError);
    }
  }

  private async onContact(event: ContactShared): Promise<Reply[]> {
    const existing = await this.store.findEmployee(event.employeeId);
    const employee: Employee = existing
      ? { ...existing, name: event.name, phone: event.phone, active: true }
      : {
          employeeId: event.employeeId,
          name: event.name,
          phone: event.phone,
          standardStart: this.config.defaultWorkHours.start,
          standardEnd: this.config.defaultWorkHours.end,
          active: true,
          registeredAt: this.clock.now(),
        };

    const saved = await this.store.saveEmployee(employee);
    this.logger.info(existing ? 'Employee re-registered' : 'Employee registered', {
      employeeId: saved.employeeId,
    });
    return reply(saved.employeeId, messages.registered(saved));
  }

  private async onLocation(event: LocationShared): Promise<Reply[]> {
    const { employeeId } = event;
    const employee = await this.store.findEmployee(employeeId);
    if (!employee || !employee.active) {
      return reply(employeeId, messages.REGISTER_PROMPT);
    }

    const verification = this.verifier.verifyAgainstOffice(event.lat, event.lon);
    if (!verification.success) return replyError(employeeId, verification.error);

    const { distanceMeters, withinRadius } = verification.data;
    if (!withinRadius) {
      this.logger.info('Location outside geofence', {
        employeeId,
        distanceMeters: Math.round(distanceMeters),
      });
      return reply(
        employeeId,
        messages.outsideGeofence(distanceMeters, this.config.office.radiusMeters),
      );
    }

    const location = { latitude: event.lat, longitude: event.lon };
    const date = toLocalDate(event.time, this.config.timezone);
    const open = await this.store.findOpenSession(employeeId, date);
    const kind: PendingKind = open ? 'check-out' : 'check-in';

    const outcome =
      kind === 'check-out'
        ? await this.ledger.checkOut(employeeId, event.time, location, distanceMeters)
        : await this.ledger.checkIn(employeeId, event.time, location, distanceMeters);
    if (!outcome.success) return replyError(employeeId, outcome.error);

    if (outcome.data.status === 'justification-required') {
      return reply(
        employeeId,
        messages.reasonPrompt(
          outcome.data.pending,
          this.config.timezone,
          this.config.conversationTtlMinutes,
        ),
      );
    }
    return reply(employeeId, this.recordedText(kind, outcome.data.session));
  }

  private async onText(event: TextReceived): Promise<Reply[]> {
    const { employeeId } = event;
    const command = event.text.trim().toLowerCase();

    if (command === 'cancel') {
      const aborted = await this.conversations.abort(employeeId);
      if (!aborted.success) return replyError(employeeId, aborted.error);
      return reply(
        employeeId,
        aborted.data ? messages.PENDING_CANCELLED : messages.NOTHING_PENDING,
      );
    }

    const handled = await this.conversations.handleText(employeeId, event.text);
    if (!handled.success) return replyError(employeeId, handled.error);

    if (handled.data.handled) {
      const { kind, result } = handled.data;
      if (!result.success) return replyError(employeeId, result.error);
      await this.alertAdmins(employeeId, result.data);
      return reply(employeeId, this.recordedText(kind, result.data));
    }

    if (command === 'status') return this.statusReply(employeeId);
    if (command === 'history') {
      const history = await this.ledger.history(employeeId, HISTORY_LIMIT);
      if (!history.success) return replyError(employeeId, history.error);
      return reply(employeeId, messages.historyText(history.data, this.config.timezone));
    }
    return reply(employeeId, messages.HELP_TEXT);
  }

  private async statusReply(employeeId: string): Promise<Reply[]> {
    const today = this.ledger.today();
    const [status, hours] = await Promise.all([
      this.ledger.status(employeeId, today),
      this.resolver.effectiveHours(employeeId, today),
    ]);
    if (!status.success) return replyError(employeeId, status.error);
    if (!hours.success) return replyError(employeeId, hours.error);
    return reply(
      employeeId,
      messages.statusText(status.data, hours.data, this.config.timezone),
    );
  }

  private recordedText(kind: PendingKind, session: AttendanceSession): string {
    return kind === 'check-in'
      ? messages.checkInRecorded(session, this.config.timezone)
      : messages.checkOutRecorded(
          session,
          this.config.timezone,
          workDurationMinutes(session),
        );
  }

  /** Late and early sessions are reported to admins subscribed to alerts. */
  private async alertAdmins(employeeId: string, session: AttendanceSession): Promise<void> {
    const closing = session.status === 'closed';
    if (closing ? !session.isEarly : !session.isLate) return;

    const employee = await this.store.findEmployee(employeeId);
    if (!employee) return;

    const text = closing
      ? messages.earlyAlert(employee, session, this.config.timezone)
      : messages.lateAlert(employee, session, this.config.timezone);
    const sent = await this.notifications.notifyAdmins(text, 'alerts');
    if (!sent.success) {
      this.logger.warn('Admin alert not sent', {
        employeeId,
        code: sent.error.code,
        error: sent.error.message,
      });
    }
  }
}
