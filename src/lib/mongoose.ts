// lib/mongoose.ts
import mongoose, { Connection } from 'mongoose';
import { Logger } from '../utils/logger';
import { retry } from '../utils/retry';

export async function connectMongo(uri: string, logger: Logger): Promise<Connection> {
  const connection = await retry(
    () =>
      mongoose
        .createConnection(uri, { serverSelectionTimeoutMS: 5000 })
        .asPromise(),
    { logger, label: 'MongoDB connection' },
  );

  connection.on('error', (error: Error) => {
    logger.error('MongoDB connection error', { error: error.message });
  });
  connection.on('disconnected', () => {
    logger.warn('MongoDB disconnected');
  });

  logger.info('MongoDB connected', { database: connection.name });
  return connection;
}
