// index.ts
import type Redis from 'ioredis';
import { EngineConfig } from './config/engineConfig';
import { connectMongo } from './lib/mongoose';
import { closeRedis, createRedisClient } from './lib/redis';
import { AttendanceStore } from './lib/store/AttendanceStore';
import { MemoryAttendanceStore } from './lib/store/MemoryAttendanceStore';
import { MongoAttendanceStore } from './lib/store/MongoAttendanceStore';
import {
  EmployeeLock,
  MemoryEmployeeLock,
  RedisEmployeeLock,
} from './services/Attendance/EmployeeLock';
import {
  LineMessagingTransport,
  MessagingTransport,
} from './services/LineMessagingTransport';
import {
  InitializedServices,
  ServiceDependencies,
  initializeServices,
} from './services/ServiceInitializer';
import { systemClock } from './utils/dateUtils';
import { Logger, createLogger } from './utils/logger';

export { loadConfig } from './config/engineConfig';
export type { EngineConfig } from './config/engineConfig';
export { fromLineEvent } from './handlers/lineEvents';
export type { Reply } from './handlers/reply';
export * from './types/attendance';

export type EngineOverrides = Partial<
  Pick<ServiceDependencies, 'store' | 'transport' | 'lock' | 'clock' | 'pinger' | 'rules' | 'loggerFor'>
>;

export interface AttendanceEngine extends InitializedServices {
  config: EngineConfig;
  store: AttendanceStore;
  /** Stops the scheduler, then releases the store and lock connections. */
  close(): Promise<void>;
}

async function openStore(config: EngineConfig, logger: Logger): Promise<AttendanceStore> {
  if (config.storeDriver === 'memory') {
    logger.warn('Using the in-memory store; data is lost on exit');
    return new MemoryAttendanceStore();
  }
  const store = new MongoAttendanceStore(await connectMongo(config.mongoUri, logger));
  await store.init();
  return store;
}

/**
 * Builds the engine from an explicit configuration. The engine owns the store
 * connection and the Redis client it opens; overrides it is given are the
 * caller's to manage.
 */
export async function createAttendanceEngine(
  config: EngineConfig,
  overrides: EngineOverrides = {},
): Promise<AttendanceEngine> {
  const logger =
    overrides.loggerFor?.('AttendanceEngine') ??
    createLogger('AttendanceEngine', { level: config.logLevel, logDir: config.logDir });

  const store = overrides.store ?? (await openStore(config, logger));

  let redis: Redis | null = null;
  let lock: EmployeeLock;
  if (overrides.lock) {
    lock = overrides.lock;
  } else if (config.redisUrl) {
    redis = createRedisClient(config.redisUrl, logger);
    lock = new RedisEmployeeLock(redis, { logger });
  } else {
    lock = new MemoryEmployeeLock();
  }

  const transport: MessagingTransport =
    overrides.transport ?? new LineMessagingTransport(config.lineChannelAccessToken, logger);

  const services = initializeServices({ ...overrides, config, store, transport, lock });

  for (const adminId of config.bootstrapAdminIds) {
    if (!(await store.findAdmin(adminId))) {
      await store.saveAdmin({
        adminId,
        createdAt: (overrides.clock ?? systemClock).now(),
        dailySummary: true,
        alerts: true,
      });
      logger.info('Bootstrap admin registered', { adminId });
    }
  }

  return {
    ...services,
    config,
    store,
    async close() {
      await services.scheduler.stop();
      if (redis) await closeRedis(redis);
      if (!overrides.store) await store.close();
    },
  };
}
