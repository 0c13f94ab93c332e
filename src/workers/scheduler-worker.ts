// workers/scheduler-worker.ts

import * as dotenv from 'dotenv';
import { resolve } from 'path';
import { loadConfig } from '../config/engineConfig';
import { createAttendanceEngine } from '../index';
import { createLogger, describeError } from '../utils/logger';

dotenv.config({ path: resolve(__dirname, '../../.env') });

const logger = createLogger('scheduler-worker');

async function main(): Promise<void> {
  const config = loadConfig();
  const engine = await createAttendanceEngine(config);
  logger.info('Scheduler worker starting', {
    timezone: config.timezone,
    storeDriver: config.storeDriver,
  });
  engine.scheduler.start();

  let stopping = false;
  const shutdown = (signal: string) => {
    if (stopping) return;
    stopping = true;
    logger.info(`Received ${signal}, waiting for the current tick`);
    void engine.close().then(
      () => {
        logger.info('Scheduler worker stopped');
        process.exit(0);
      },
      (error: unknown) => {
        logger.error('Shutdown failed', { error: describeError(error) });
        process.exit(1);
      },
    );
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((error: unknown) => {
  logger.error('Scheduler worker failed to start', { error: describeError(error) });
  process.exit(1);
});
