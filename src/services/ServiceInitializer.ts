// services/ServiceInitializer.ts
import { EngineConfig } from '../config/engineConfig';
import { AdminCommandHandler } from '../handlers/AdminCommandHandler';
import { AttendanceEventHandler } from '../handlers/AttendanceEventHandler';
import { AttendanceStore } from '../lib/store/AttendanceStore';
import { Clock, systemClock } from '../utils/dateUtils';
import { Logger, createLogger } from '../utils/logger';
import { AttendanceLedger } from './Attendance/AttendanceLedger';
import { ConversationStateMachine } from './Attendance/ConversationStateMachine';
import { EmployeeLock, MemoryEmployeeLock } from './Attendance/EmployeeLock';
import { MessagingTransport } from './LineMessagingTransport';
import { LocationVerifier } from './location/LocationVerifier';
import { NotificationService } from './NotificationService';
import { NotificationScheduler } from './scheduler/NotificationScheduler';
import { HealthPinger, NotificationRule, createDefaultRules } from './scheduler/rules';
import { WorkScheduleResolver } from './WorkScheduleResolver';

export interface ServiceDependencies {
  config: EngineConfig;
  store: AttendanceStore;
  transport: MessagingTransport;
  lock?: EmployeeLock;
  clock?: Clock;
  pinger?: HealthPinger;
  // Extra rules evaluated after the default table
  rules?: NotificationRule[];
  loggerFor?: (service: string) => Logger;
}

export type InitializedServices = {
  verifier: LocationVerifier;
  resolver: WorkScheduleResolver;
  ledger: AttendanceLedger;
  conversations: ConversationStateMachine;
  notifications: NotificationService;
  scheduler: NotificationScheduler;
  adminHandler: AdminCommandHandler;
  eventHandler: AttendanceEventHandler;
};

export function initializeServices(deps: ServiceDependencies): InitializedServices {
  const { config, store } = deps;
  const clock = deps.clock ?? systemClock;
  const loggerFor =
    deps.loggerFor ??
    ((service: string) =>
      createLogger(service, { level: config.logLevel, logDir: config.logDir }));

  const verifier = new LocationVerifier(config.office);

  const resolver = new WorkScheduleResolver({
    store,
    defaultHours: config.defaultWorkHours,
    clock,
    logger: loggerFor('WorkScheduleResolver'),
  });

  const ledger = new AttendanceLedger({
    store,
    resolver,
    timezone: config.timezone,
    conversationTtlMinutes: config.conversationTtlMinutes,
    lock: deps.lock ?? new MemoryEmployeeLock(),
    clock,
    logger: loggerFor('AttendanceLedger'),
  });

  const conversations = new ConversationStateMachine({
    ledger,
    store,
    clock,
    logger: loggerFor('ConversationStateMachine'),
  });

  const notifications = new NotificationService({
    transport: deps.transport,
    admins: store,
    timeoutMs: config.scheduler.dispatchTimeoutMs,
    logger: loggerFor('NotificationService'),
  });

  const rules = [
    ...createDefaultRules({
      config,
      store,
      ledger,
      resolver,
      notifications,
      pinger: deps.pinger,
    }),
    ...(deps.rules ?? []),
  ];

  const scheduler = new NotificationScheduler({
    rules,
    store,
    conversations,
    notifications,
    timezone: config.timezone,
    tickSeconds: config.scheduler.tickSeconds,
    clock,
    logger: loggerFor('NotificationScheduler'),
  });

  const adminHandler = new AdminCommandHandler({
    config,
    store,
    resolver,
    ledger,
    notifications,
    clock,
    logger: loggerFor('AdminCommandHandler'),
  });

  const eventHandler = new AttendanceEventHandler({
    config,
    store,
    verifier,
    resolver,
    ledger,
    conversations,
    notifications,
    admin: adminHandler,
    clock,
    logger: loggerFor('AttendanceEventHandler'),
  });

  return {
    verifier,
    resolver,
    ledger,
    conversations,
    notifications,
    scheduler,
    adminHandler,
    eventHandler,
  };
}
