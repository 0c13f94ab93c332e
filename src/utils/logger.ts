import path from 'path';
import winston from 'winston';

export type Logger = winston.Logger;

export interface LoggerOptions {
  level?: string;
  // When set, errors and combined output are also written here
  logDir?: string;
}

export const createLogger = (service: string, options: LoggerOptions = {}) => {
  const transports: winston.transport[] = [new winston.transports.Console()];

  if (options.logDir) {
    transports.push(
      new winston.transports.File({
        filename: path.join(options.logDir, 'error.log'),
        level: 'error',
      }),
      new winston.transports.File({
        filename: path.join(options.logDir, 'combined.log'),
      }),
    );
  }

  return winston.createLogger({
    level: options.level ?? process.env.LOG_LEVEL ?? 'info',
    format: winston.format.combine(
      winston.format.timestamp(),
      winston.format.errors({ stack: true }),
      winston.format.json(),
    ),
    defaultMeta: { service },
    transports,
  });
};

/** A logger that drops everything, for tests and embedded use. */
export const createSilentLogger = (service = 'silent') =>
  winston.createLogger({
    silent: true,
    defaultMeta: { service },
    transports: [new winston.transports.Console({ silent: true })],
  });

export const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
